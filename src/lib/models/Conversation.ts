// File: src/lib/models/Conversation.ts

export interface Message {
    role: 'user' | 'assistant' | 'system';
    content: string;
}

export function systemMessage(content: string): Message {
    return { role: 'system', content };
}

export function userMessage(content: string): Message {
    return { role: 'user', content };
}
