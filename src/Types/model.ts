// src/Types/model.ts

/**
 * One message as returned by the mailbox transport, before any MIME parsing.
 */
export interface RawMessage {
    id: string;
    source: Buffer;
}

export interface DecodedMessage {
    sender: string;
    subject: string;
    // Transport-native Date header value, never reparsed
    date: string;
    bodyPlain?: string;
    bodyHtml?: string;
}

export interface EmailRecord {
    sender: string;
    subject: string;
    date: string;
    body: string;
}

export interface IndexEntryMetadata {
    sender: string;
    subject: string;
    date: string;
    id: string;
}

export interface IndexEntry {
    id: string;
    text: string;
    embedding: number[];
    metadata: IndexEntryMetadata;
}

export interface ScoredIndexEntry extends IndexEntry {
    score: number;
}

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
    role: ConversationRole;
    content: string;
}

export interface RetrievalContext {
    entries: ScoredIndexEntry[];
    text: string;
}

export interface DateRange {
    startDate: string;
    endDate: string;
}

export interface MailboxCredentials {
    user: string;
    password: string;
}

export interface LLMResponse {
    content: string;
    usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
    };
}

export interface LLMMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LLMOptions {
    temperature?: number;
    max_tokens?: number;
    timeout?: number;
}

export interface LLMProvider {
    generateResponse(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}

export interface EmbeddingProvider {
    embedDocuments(texts: string[]): Promise<number[][]>;
    embedQuery(text: string): Promise<number[]>;
}

/**
 * Completion and embedding capability of one configured model provider.
 */
export interface AIProvider extends LLMProvider, EmbeddingProvider {
    readonly name: LLMProviderType;
}

export type LLMProviderType = 'ollama' | 'gemini';

export interface BackendResponse<T> {
    data?: T;
    error?: string;
    message?: string;
    isSuccess: boolean;
}
