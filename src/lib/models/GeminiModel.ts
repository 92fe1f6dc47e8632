// File: src/lib/models/GeminiModel.ts
import { Content, FinishReason, GoogleGenerativeAI } from '@google/generative-ai';
import BaseModel, { ModelLogger } from './BaseModel';
import { InterpreterConfig } from '../Config';
import { Message } from './Conversation';

class GeminiModel extends BaseModel {
    private genAI: GoogleGenerativeAI;

    constructor(config: InterpreterConfig, log?: ModelLogger) {
        super(config, log);
        if (!config.api_key) {
            throw new Error('Gemini API key is missing in the configuration.');
        }
        this.genAI = new GoogleGenerativeAI(config.api_key);
    }

    protected async callModel(messages: Message[]): Promise<string> {
        // Gemini takes system text as `systemInstruction`, not as a turn.
        const systemText = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n');
        const model = this.genAI.getGenerativeModel({
            model: this.modelName,
            ...(systemText ? { systemInstruction: systemText } : {}),
        });

        const result = await model.generateContent({
            contents: this.toContents(messages),
            generationConfig: { temperature: this.config.temperature },
        });

        const candidate = result.response.candidates?.[0];
        const finishReason = candidate?.finishReason;
        if (finishReason && finishReason !== FinishReason.STOP && finishReason !== FinishReason.MAX_TOKENS) {
            throw new Error(`Model ${this.modelName} generation blocked. Reason: ${finishReason}.`);
        }
        return result.response.text().trim();
    }

    /** Consecutive turns from the same side are merged; Gemini wants them alternating. */
    private toContents(messages: Message[]): Content[] {
        const contents: Content[] = [];
        for (const message of messages) {
            if (message.role === 'system' || !message.content) continue;
            const role = message.role === 'assistant' ? 'model' : 'user';
            const last = contents[contents.length - 1];
            if (last && last.role === role) {
                last.parts.push({ text: message.content });
            } else {
                contents.push({ role, parts: [{ text: message.content }] });
            }
        }
        return contents;
    }
}

export default GeminiModel;
