import OpenAI from 'openai';
import BaseModel, { ModelLogger } from './BaseModel';
import { InterpreterConfig } from '../Config';
import { Message } from './Conversation';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toChatMessage(message: Message): ChatMessage {
    switch (message.role) {
        case 'system': return { role: 'system', content: message.content };
        case 'assistant': return { role: 'assistant', content: message.content };
        case 'user': return { role: 'user', content: message.content };
    }
}

/**
 * Chat model for OpenAI and any OpenAI-compatible endpoint (OpenRouter sets `base_url`).
 */
export default class OpenAIChatModel extends BaseModel {
    private client: OpenAI;

    constructor(config: InterpreterConfig, log?: ModelLogger) {
        super(config, log);
        if (!config.api_key) {
            const name = config.provider === 'openrouter' ? 'OpenRouter' : 'OpenAI';
            throw new Error(`${name} API key is missing in the configuration.`);
        }
        // Retries are handled by BaseModel so the back-off settings apply to every provider.
        this.client = new OpenAI({ apiKey: config.api_key, baseURL: config.base_url, maxRetries: 0 });
    }

    protected async callModel(messages: Message[]): Promise<string> {
        const res = await this.client.chat.completions.create({
            model: this.modelName,
            messages: messages.map(toChatMessage),
            temperature: this.config.temperature,
        });
        return res.choices[0]?.message?.content?.trim() ?? '';
    }
}
