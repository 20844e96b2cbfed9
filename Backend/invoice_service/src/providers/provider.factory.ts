import { ExtractionConfig } from '../config/configuration';
import { CompletionProvider } from './completion.provider';
import { GeminiCompletionProvider } from './gemini.provider';
import { OllamaCompletionProvider } from './ollama.provider';
import { OpenAICompletionProvider } from './openai.provider';

export function createCompletionProvider(
  config: ExtractionConfig,
): CompletionProvider {
  switch (config.provider) {
    case 'google':
      return new GeminiCompletionProvider(config);
    case 'openai':
      return new OpenAICompletionProvider(config);
    case 'ollama':
      return new OllamaCompletionProvider(config);
  }
}
