import type { OllamaSettings } from '../../config/environment';
import { OpenAICompatibleProvider } from './OpenAICompatibleProvider';

export class OllamaProvider extends OpenAICompatibleProvider {
    readonly name = 'ollama' as const;

    constructor(settings: OllamaSettings, temperature: number) {
        super({
            // Ollama ignores the key but the SDK requires one
            apiKey: 'ollama',
            baseURL: `${settings.baseUrl.replace(/\/+$/, '')}/v1`,
            llmModel: settings.llmModel,
            embeddingModel: settings.embeddingModel,
            temperature,
        });
    }
}
