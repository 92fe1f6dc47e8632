// File: src/lib/models/BaseModel.ts
import chalk from 'chalk';
import { InterpreterConfig } from '../Config';
import { Message } from './Conversation';

export interface ModelLogger {
    (line: string): void;
}

/**
 * Shared shape of the chat models the interpreter can talk to.
 * Subclasses implement `callModel`; retries with exponential back-off live here.
 */
abstract class BaseModel {
    readonly modelName: string;
    protected readonly config: InterpreterConfig;
    protected readonly log: ModelLogger;

    constructor(config: InterpreterConfig, log: ModelLogger = () => {}) {
        this.config = config;
        this.modelName = config.model_name;
        this.log = log;
    }

    protected abstract callModel(messages: Message[]): Promise<string>;

    async getResponseFromAI(messages: Message[]): Promise<string> {
        if (messages.length === 0) {
            throw new Error('Cannot get AI response with empty message history.');
        }

        const maxRetries = this.config.max_retries;
        for (let attempt = 0; ; attempt++) {
            try {
                this.log(chalk.dim(`Sending ${messages.length} message(s) to ${this.modelName} (attempt ${attempt + 1}/${maxRetries + 1})...`));
                const text = await this.callModel(messages);
                this.log(chalk.dim(`Received ${text.length} characters from ${this.modelName}.`));
                return text;
            } catch (error) {
                if (attempt >= maxRetries || !this.isRetryable(error)) {
                    throw error;
                }
                const delay = this.config.retry_base_delay_ms * Math.pow(2, attempt);
                console.warn(chalk.yellow(`${this.modelName} request failed (${error instanceof Error ? error.message : String(error)}). Retrying in ${delay}ms...`));
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    /** Rate limits, server errors and dropped connections are worth another try. */
    protected isRetryable(error: unknown): boolean {
        if (typeof error !== 'object' || error === null) return false;
        const status = 'status' in error ? error.status : undefined;
        if (typeof status === 'number') {
            return status === 408 || status === 429 || status >= 500;
        }
        const code = 'code' in error ? error.code : undefined;
        return code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ECONNREFUSED';
    }
}

export default BaseModel;
