// File: src/lib/AIClient.ts
import chalk from 'chalk';
import { Config } from './Config';
import BaseModel, { ModelLogger } from './models/BaseModel';
import OpenAIChatModel from './models/OpenAIChatModel';
import GeminiModel from './models/GeminiModel';
import { Message } from './models/Conversation';

/**
 * Picks the chat model for the configured provider and forwards requests to it.
 */
class AIClient {
    private model: BaseModel;

    constructor(config: Config) {
        const log: ModelLogger = config.logging.verbose ? (line) => console.log(line) : () => {};
        const interpreter = config.interpreter;
        this.model = interpreter.provider === 'gemini'
            ? new GeminiModel(interpreter, log)
            : new OpenAIChatModel(interpreter, log);
        log(chalk.dim(`Using ${interpreter.provider} model ${this.model.modelName}`));
    }

    get modelName(): string {
        return this.model.modelName;
    }

    async getResponseTextFromAI(messages: Message[]): Promise<string> {
        if (messages.length === 0) {
            throw new Error('Cannot get raw AI response with empty message history.');
        }
        try {
            return await this.model.getResponseFromAI(messages);
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            console.error(chalk.red(`Error getting response from AI model (${this.model.modelName}):`), errorMessage);
            throw error;
        }
    }
}

export { AIClient };
