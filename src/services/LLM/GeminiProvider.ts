import type { GeminiSettings } from '../../config/environment';
import { OpenAICompatibleProvider } from './OpenAICompatibleProvider';

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

export class GeminiProvider extends OpenAICompatibleProvider {
    readonly name = 'gemini' as const;

    constructor(settings: GeminiSettings, temperature: number) {
        super({
            apiKey: settings.apiKey,
            baseURL: GEMINI_OPENAI_BASE_URL,
            llmModel: settings.llmModel,
            embeddingModel: settings.embeddingModel,
            temperature,
        });
    }
}
