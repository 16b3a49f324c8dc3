import type { AppConfig } from '../../config/environment';
import type { AIProvider } from '../../Types/model';
import { GeminiProvider } from './GeminiProvider';
import { OllamaProvider } from './OllamaProvider';

/**
 * Resolves the configured provider once at startup; components receive the instance.
 */
export class LLMProviderFactory {
  static createProvider(config: AppConfig): AIProvider {
    const settings = config.provider;
    switch (settings.type) {
      case 'ollama':
        return new OllamaProvider(settings.ollama, config.llmTemperature);
      case 'gemini':
        return new GeminiProvider(settings.gemini, config.llmTemperature);
    }
  }
}
