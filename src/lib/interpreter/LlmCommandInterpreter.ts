// File: src/lib/interpreter/LlmCommandInterpreter.ts
import { AIClient } from '../AIClient';
import { systemMessage, userMessage } from '../models/Conversation';
import { InterpreterPrompts } from '../prompts';
import { errorMessage } from '../utils';
import { CommandInterpreter, InterpretationResult } from './CommandInterpreter';

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)\s*```/;

/**
 * Pulls the JSON out of a model reply that may be wrapped in a Markdown fence.
 */
export function extractJson(reply: string): string {
    if (reply.includes('```')) {
        const match = CODE_FENCE.exec(reply);
        if (match) {
            return match[1].trim();
        }
    }
    return reply.trim();
}

type TextModel = Pick<AIClient, 'getResponseTextFromAI'>;

export class LlmCommandInterpreter implements CommandInterpreter {
    constructor(private readonly client: TextModel) {}

    async interpret(command: string): Promise<InterpretationResult> {
        let reply: string;
        try {
            reply = await this.client.getResponseTextFromAI([
                systemMessage(InterpreterPrompts.systemPrompt()),
                userMessage(InterpreterPrompts.commandPrompt(command)),
            ]);
        } catch (error) {
            return { ok: false, reason: `Interpreter request failed: ${errorMessage(error)}` };
        }

        const cleaned = extractJson(reply);
        try {
            return { ok: true, plan: JSON.parse(cleaned) };
        } catch {
            return { ok: false, reason: `Could not parse JSON response from the interpreter. Response: ${reply}` };
        }
    }
}
