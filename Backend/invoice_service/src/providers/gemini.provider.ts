import { Logger } from '@nestjs/common';
import {
  FinishReason,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
} from '@google/genai';
import { ExtractionConfig } from '../config/configuration';
import { getErrorMessage } from '../common/errors';
import { fail, ok, Result } from '../common/result';
import { CompletionFailure, CompletionProvider } from './completion.provider';

const SAFETY_SETTINGS = [
  {
    category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    threshold: HarmBlockThreshold.BLOCK_LOW_AND_ABOVE,
  },
  {
    category: HarmCategory.HARM_CATEGORY_HARASSMENT,
    threshold: HarmBlockThreshold.BLOCK_LOW_AND_ABOVE,
  },
];

const MISSING_API_KEY: CompletionFailure = {
  kind: 'configuration',
  message: "GOOGLE_API_KEY n'est pas défini",
};

export class GeminiCompletionProvider implements CompletionProvider {
  readonly name = 'google' as const;
  private readonly logger = new Logger(GeminiCompletionProvider.name);
  private readonly ai: GoogleGenAI | null;

  constructor(private readonly config: ExtractionConfig) {
    this.ai = config.apiKey
      ? new GoogleGenAI({
          apiKey: config.apiKey,
          httpOptions: { timeout: config.timeoutMs },
        })
      : null;
  }

  async generate(
    systemInstruction: string,
    prompt: string,
  ): Promise<Result<string, CompletionFailure>> {
    if (!this.ai) {
      return fail(MISSING_API_KEY);
    }

    try {
      this.logger.log(`Envoi du texte à Gemini (${this.config.model})...`);
      const response = await this.ai.models.generateContent({
        model: this.config.model,
        contents: prompt,
        config: {
          systemInstruction,
          temperature: this.config.temperature,
          topP: this.config.topP,
          topK: this.config.topK,
          maxOutputTokens: this.config.maxOutputTokens,
          safetySettings: SAFETY_SETTINGS,
        },
      });

      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        return fail({
          kind: 'blocked',
          message: `Génération bloquée : ${blockReason}`,
        });
      }

      const text = response.text ?? '';
      if (!text.trim()) {
        const candidate = response.candidates?.[0];
        if (candidate?.finishReason === FinishReason.SAFETY) {
          const ratings = JSON.stringify(candidate.safetyRatings ?? []);
          return fail({
            kind: 'blocked',
            message: `Génération bloquée (safety ratings: ${ratings})`,
          });
        }
        return fail({ kind: 'empty', message: 'Réponse vide de Gemini' });
      }
      return ok(text);
    } catch (error: unknown) {
      return fail({ kind: 'transport', message: getErrorMessage(error) });
    }
  }

  async listModels(): Promise<Result<string[], CompletionFailure>> {
    if (!this.ai) {
      return fail(MISSING_API_KEY);
    }
    try {
      const models: string[] = [];
      const pager = await this.ai.models.list();
      for await (const model of pager) {
        const supportsGeneration =
          model.supportedActions?.includes('generateContent') ?? true;
        if (model.name && supportsGeneration) {
          models.push(model.name);
        }
      }
      return ok(models);
    } catch (error: unknown) {
      return fail({ kind: 'transport', message: getErrorMessage(error) });
    }
  }

  async isAvailable(): Promise<boolean> {
    return (await this.listModels()).ok;
  }
}
