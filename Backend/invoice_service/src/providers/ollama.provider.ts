import { Logger } from '@nestjs/common';
import axios from 'axios';
import { ExtractionConfig } from '../config/configuration';
import { getErrorMessage } from '../common/errors';
import { fail, ok, Result } from '../common/result';
import { CompletionFailure, CompletionProvider } from './completion.provider';

interface OllamaGenerateResponse {
  response?: string;
  error?: string;
}

interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

const AVAILABILITY_TIMEOUT_MS = 2000;
const LIST_TIMEOUT_MS = 5000;

/**
 * Client du serveur d'inférence local Ollama.
 */
export class OllamaCompletionProvider implements CompletionProvider {
  readonly name = 'ollama' as const;
  private readonly logger = new Logger(OllamaCompletionProvider.name);

  constructor(private readonly config: ExtractionConfig) {
    this.logger.log(`Client Ollama initialisé, URL: ${config.baseUrl}`);
  }

  async generate(
    systemInstruction: string,
    prompt: string,
  ): Promise<Result<string, CompletionFailure>> {
    try {
      this.logger.log(
        `Envoi de la requête au modèle Ollama: ${this.config.model}`,
      );
      const { data } = await axios.post<OllamaGenerateResponse>(
        `${this.config.baseUrl}/api/generate`,
        {
          model: this.config.model,
          prompt,
          system: systemInstruction,
          stream: false,
          options: {
            temperature: this.config.temperature,
            top_p: this.config.topP,
            top_k: this.config.topK,
            num_predict: this.config.maxOutputTokens,
          },
        },
        { timeout: this.config.timeoutMs },
      );

      if (data.error) {
        return fail({
          kind: 'transport',
          message: `Erreur Ollama: ${data.error}`,
        });
      }
      const text = data.response ?? '';
      if (!text.trim()) {
        return fail({ kind: 'empty', message: "Réponse vide d'Ollama" });
      }
      return ok(text);
    } catch (error: unknown) {
      return fail({ kind: 'transport', message: getErrorMessage(error) });
    }
  }

  async listModels(): Promise<Result<string[], CompletionFailure>> {
    try {
      const { data } = await axios.get<OllamaTagsResponse>(
        `${this.config.baseUrl}/api/tags`,
        { timeout: LIST_TIMEOUT_MS },
      );
      const models = (data.models ?? []).map((model) => model.name);
      this.logger.log(`${models.length} modèle(s) Ollama disponible(s)`);
      return ok(models);
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      this.logger.error(`Connexion à Ollama impossible: ${message}`);
      return fail({ kind: 'transport', message });
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await axios.get(`${this.config.baseUrl}/api/tags`, {
        timeout: AVAILABILITY_TIMEOUT_MS,
      });
      return true;
    } catch (error: unknown) {
      this.logger.warn(`Ollama injoignable: ${getErrorMessage(error)}`);
      return false;
    }
  }
}
