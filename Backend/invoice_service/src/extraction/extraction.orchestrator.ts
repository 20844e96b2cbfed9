import { Logger } from '@nestjs/common';
import { ExtractionConfig } from '../config/configuration';
import { withTimeout } from '../common/timeout';
import { absentFields, ExtractedFields } from '../models/invoice.model';
import { parseCompletion } from '../invoice_parser/output.parser';
import {
  buildExtractionPrompt,
  SYSTEM_INSTRUCTION,
} from '../invoice_parser/prompts';
import { CompletionProvider } from '../providers/completion.provider';

/**
 * Texte de facture -> prompt -> fournisseur -> champs bruts.
 * Un seul appel, sans nouvelle tentative : tout échec donne des champs
 * absents.
 */
export class ExtractionOrchestrator {
  private readonly logger = new Logger(ExtractionOrchestrator.name);

  constructor(
    readonly config: ExtractionConfig,
    private readonly provider: CompletionProvider,
  ) {}

  async extract(documentText: string): Promise<ExtractedFields> {
    if (!documentText.trim()) {
      this.logger.error('Texte de facture vide, extraction ignorée');
      return absentFields();
    }

    this.logger.log(
      `Analyse de la facture avec ${this.provider.name} (${this.config.model})...`,
    );
    const completion = await withTimeout(
      this.provider.generate(
        SYSTEM_INSTRUCTION,
        buildExtractionPrompt(documentText),
      ),
      this.config.timeoutMs,
    );

    if (!completion.ok) {
      const { kind, message } = completion.error;
      this.logger.error(`Échec de l'extraction LLM [${kind}]: ${message}`);
      return absentFields();
    }

    this.logger.debug(`Réponse du LLM: ${completion.value.substring(0, 200)}`);
    return parseCompletion(completion.value);
  }
}
