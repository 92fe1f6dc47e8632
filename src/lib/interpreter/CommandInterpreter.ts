// File: src/lib/interpreter/CommandInterpreter.ts

export type InterpretationResult =
    | { ok: true; plan: unknown }
    | { ok: false; reason: string };

/**
 * Turns free text into plan-shaped data. The output is untrusted JSON;
 * `parsePlan` decides what it means.
 */
export interface CommandInterpreter {
    interpret(command: string): Promise<InterpretationResult>;
}
