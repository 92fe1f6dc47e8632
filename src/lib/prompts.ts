// src/lib/prompts.ts
import { OPERATION_CATALOG } from './operations/OperationRegistry';
import { OPERATION_KINDS } from './operations/types';

function operationList(): string {
    return OPERATION_KINDS.map((kind, i) => {
        const params = OPERATION_CATALOG[kind].parameters
            .map(p => (p.required ? p.name : `${p.name} (optional)`))
            .join(', ');
        return `${i + 1}. ${kind} - Parameters: ${params}`;
    }).join('\n');
}

/**
 * Prompts used by the command interpreter.
 */
export const InterpreterPrompts = {
    /**
     * System message describing the operation catalog and both reply shapes.
     */
    systemPrompt: (): string => `You are a file system command interpreter. Parse the natural language command into a structured format.

Based on the command, identify the operation(s) and parameters. The possible operations are:
${operationList()}

Locations may be well-known names (Desktop, Downloads, Documents, Pictures, Music, Videos, Movies, home), drive references ("drive D"), absolute paths, or paths relative to the current location (e.g. "Desktop/movies").

The command may contain multiple operations that need to be performed in sequence.
If it's a single operation, output a JSON object with the operation and parameters:
{"operation": "create_folder", "parameters": {"folder_name": "reports", "location": "Desktop"}}

If the command contains multiple sequential operations, output a JSON object with an "operations" array:
{
    "has_multiple_operations": true,
    "operations": [
        {"operation": "create_folder", "parameters": {"folder_name": "movies", "location": "Desktop"}},
        {"operation": "create_folder", "parameters": {"folder_name": "hollywood", "location": "Desktop/movies"}}
    ]
}

If the command is unclear, return:
{"operation": "unknown", "parameters": {}}

Always return only the JSON without any markdown formatting or code blocks.`,

    /** User turn wrapping the raw command text. */
    commandPrompt: (command: string): string => `Command: ${command}`,
};
