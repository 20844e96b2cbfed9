import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { ExtractionConfig } from '../config/configuration';
import { getErrorMessage } from '../common/errors';
import { fail, ok, Result } from '../common/result';
import { CompletionFailure, CompletionProvider } from './completion.provider';

const MISSING_API_KEY: CompletionFailure = {
  kind: 'configuration',
  message: "OPENAI_API_KEY n'est pas défini",
};

export class OpenAICompletionProvider implements CompletionProvider {
  readonly name = 'openai' as const;
  private readonly logger = new Logger(OpenAICompletionProvider.name);
  private readonly openai: OpenAI | null;

  constructor(private readonly config: ExtractionConfig) {
    this.openai = config.apiKey
      ? new OpenAI({
          apiKey: config.apiKey,
          baseURL: config.baseUrl || undefined,
          timeout: config.timeoutMs,
          maxRetries: 0,
        })
      : null;
  }

  async generate(
    systemInstruction: string,
    prompt: string,
  ): Promise<Result<string, CompletionFailure>> {
    if (!this.openai) {
      return fail(MISSING_API_KEY);
    }

    try {
      this.logger.log(
        `Envoi du texte à l'API OpenAI (${this.config.model})...`,
      );
      const response = await this.openai.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: systemInstruction },
          { role: 'user', content: prompt },
        ],
        temperature: this.config.temperature,
        top_p: this.config.topP,
        max_tokens: this.config.maxOutputTokens,
      });

      const usage = response.usage;
      this.logger.debug(
        `Tokens utilisés: entrée=${usage?.prompt_tokens ?? 0}, ` +
          `sortie=${usage?.completion_tokens ?? 0}`,
      );

      const choice = response.choices[0];
      if (choice?.finish_reason === 'content_filter') {
        return fail({
          kind: 'blocked',
          message: 'Génération bloquée par le filtre de contenu',
        });
      }

      const content = choice?.message.content ?? '';
      if (!content.trim()) {
        return fail({
          kind: 'empty',
          message: "Réponse vide de l'API OpenAI",
        });
      }
      return ok(content);
    } catch (error: unknown) {
      return fail({ kind: 'transport', message: getErrorMessage(error) });
    }
  }

  async listModels(): Promise<Result<string[], CompletionFailure>> {
    if (!this.openai) {
      return fail(MISSING_API_KEY);
    }
    try {
      const page = await this.openai.models.list();
      return ok(page.data.map((model) => model.id).sort());
    } catch (error: unknown) {
      return fail({ kind: 'transport', message: getErrorMessage(error) });
    }
  }

  async isAvailable(): Promise<boolean> {
    return (await this.listModels()).ok;
  }
}
