import OpenAI from 'openai';
import type { AIProvider, LLMMessage, LLMOptions, LLMProviderType, LLMResponse } from '../../Types/model';
import { createLogger } from '../../utils/logger';

export interface OpenAICompatibleSettings {
    apiKey: string;
    baseURL: string;
    llmModel: string;
    embeddingModel: string;
    temperature: number;
}

/**
 * Talks to any server exposing the OpenAI chat-completions and embeddings endpoints.
 * Both Ollama and Gemini publish such an endpoint, so the variants only differ in settings.
 */
export abstract class OpenAICompatibleProvider implements AIProvider {
    abstract readonly name: LLMProviderType;

    protected client: OpenAI;
    protected llmModel: string;
    protected embeddingModel: string;
    protected temperature: number;
    private logger = createLogger('AIProvider');

    constructor(settings: OpenAICompatibleSettings) {
        this.client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseURL,
            // Failures surface to the caller as-is
            maxRetries: 0,
        });
        this.llmModel = settings.llmModel;
        this.embeddingModel = settings.embeddingModel;
        this.temperature = settings.temperature;
    }

    async generateResponse(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.llmModel,
                    messages,
                    temperature: options?.temperature ?? this.temperature,
                    max_tokens: options?.max_tokens,
                },
                options?.timeout ? { timeout: options.timeout } : undefined
            );

            return {
                content: response.choices[0]?.message?.content || '',
                usage: {
                    prompt_tokens: response.usage?.prompt_tokens,
                    completion_tokens: response.usage?.completion_tokens,
                    total_tokens: response.usage?.total_tokens,
                }
            };
        } catch (error) {
            this.logger.error(`${this.name} completion error:`, error);
            throw error;
        }
    }

    async embedDocuments(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) return [];

        try {
            const response = await this.client.embeddings.create({
                model: this.embeddingModel,
                input: texts,
            });

            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            if (ordered.length !== texts.length) {
                throw new Error(`${this.name} returned ${ordered.length} embeddings for ${texts.length} inputs`);
            }
            return ordered.map(item => item.embedding);
        } catch (error) {
            this.logger.error(`${this.name} embedding error:`, error);
            throw error;
        }
    }

    async embedQuery(text: string): Promise<number[]> {
        const [embedding] = await this.embedDocuments([text]);
        return embedding;
    }
}
