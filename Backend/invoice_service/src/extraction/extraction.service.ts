import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  APP_CONFIG,
  AppConfig,
  buildExtractionConfig,
  ProviderName,
  ProviderSelection,
} from '../config/configuration';
import { Result } from '../common/result';
import {
  absentFields,
  DocumentDraft,
  ExtractedFieldsView,
  toFieldsView,
} from '../models/invoice.model';
import {
  TEXT_EXTRACTOR,
  TextExtractor,
  UploadedDocument,
} from '../ocr/text_extractor';
import { CompletionFailure } from '../providers/completion.provider';
import { createCompletionProvider } from '../providers/provider.factory';
import { ExtractionOrchestrator } from './extraction.orchestrator';

export interface ProviderStatus {
  provider: ProviderName;
  model: string;
  available: boolean;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);
  private readonly appConfig: AppConfig;
  private readonly defaultOrchestrator: ExtractionOrchestrator;

  constructor(
    configService: ConfigService,
    @Inject(TEXT_EXTRACTOR) private readonly textExtractor: TextExtractor,
  ) {
    this.appConfig = configService.getOrThrow<AppConfig>(APP_CONFIG);
    this.defaultOrchestrator = this.createOrchestrator();
  }

  get defaultProvider(): ProviderName {
    return this.defaultOrchestrator.config.provider;
  }

  /**
   * Un changement de fournisseur ou de modèle crée un nouvel orchestrateur.
   */
  createOrchestrator(
    selection: ProviderSelection = {},
  ): ExtractionOrchestrator {
    const config = buildExtractionConfig(this.appConfig, selection);
    return new ExtractionOrchestrator(config, createCompletionProvider(config));
  }

  private orchestratorFor(
    selection: ProviderSelection,
  ): ExtractionOrchestrator {
    return selection.provider || selection.model
      ? this.createOrchestrator(selection)
      : this.defaultOrchestrator;
  }

  async extractFromText(
    text: string,
    selection: ProviderSelection = {},
  ): Promise<ExtractedFieldsView> {
    const fields = await this.orchestratorFor(selection).extract(text);
    return toFieldsView(fields);
  }

  /**
   * Traite les documents dans l'ordre d'envoi. Chaque brouillon est relu
   * indépendamment ; un document illisible ne bloque pas les suivants.
   */
  async processDocuments(
    documents: UploadedDocument[],
    selection: ProviderSelection = {},
  ): Promise<DocumentDraft[]> {
    const orchestrator = this.orchestratorFor(selection);
    const drafts: DocumentDraft[] = [];

    for (const [index, document] of documents.entries()) {
      this.logger.log(`Traitement de la facture: ${document.filename}`);
      const text = await this.textExtractor.extract(document);

      if (!text.ok) {
        this.logger.error(
          `Document illisible ${document.filename}: ${text.error.message}`,
        );
        drafts.push({
          index,
          filename: document.filename,
          ...toFieldsView(absentFields()),
          error: text.error.message,
        });
        continue;
      }

      const fields = await orchestrator.extract(text.value);
      drafts.push({
        index,
        filename: document.filename,
        ...toFieldsView(fields),
      });
    }

    this.logger.log(`${drafts.length} document(s) traité(s)`);
    return drafts;
  }

  async listModels(
    provider: ProviderName,
  ): Promise<Result<string[], CompletionFailure>> {
    const config = buildExtractionConfig(this.appConfig, { provider });
    return createCompletionProvider(config).listModels();
  }

  async providerStatus(provider: ProviderName): Promise<ProviderStatus> {
    const config = buildExtractionConfig(this.appConfig, { provider });
    const available = await createCompletionProvider(config).isAvailable();
    return { provider, model: config.model, available };
  }
}
