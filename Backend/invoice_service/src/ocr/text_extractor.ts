import { Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';
import { ExtractionError, getErrorMessage } from '../common/errors';
import { fail, ok, Result } from '../common/result';

export const TEXT_EXTRACTOR = Symbol('TEXT_EXTRACTOR');

export interface UploadedDocument {
  filename: string;
  mimetype: string;
  buffer: Buffer;
}

export interface TextExtractor {
  extract(document: UploadedDocument): Promise<Result<string, ExtractionError>>;
}

/**
 * Extraction du texte des factures PDF, limitée aux premières pages.
 */
export class PdfTextExtractor implements TextExtractor {
  private readonly logger = new Logger(PdfTextExtractor.name);

  constructor(private readonly maxPages: number) {
    this.logger.log(`Extracteur PDF initialisé avec max_pages=${maxPages}`);
  }

  private isPdf(document: UploadedDocument): boolean {
    const ext = document.filename.toLowerCase().split('.').pop() || '';
    return document.mimetype === 'application/pdf' || ext === 'pdf';
  }

  async extract(
    document: UploadedDocument,
  ): Promise<Result<string, ExtractionError>> {
    const { filename } = document;

    if (!this.isPdf(document)) {
      this.logger.error(`Format non pris en charge: ${filename}`);
      return fail(
        new ExtractionError(`Format non pris en charge: ${filename}`, filename),
      );
    }

    try {
      this.logger.log(`Extraction du texte depuis: ${filename}`);
      const data = await pdfParse(document.buffer, { max: this.maxPages });
      const pages = Math.min(data.numpages, this.maxPages);

      if (!data.text.trim()) {
        this.logger.error(`Aucun texte extrait de ${filename}`);
        return fail(
          new ExtractionError(`Aucun texte extrait de ${filename}`, filename),
        );
      }

      this.logger.log(
        `${data.text.length} caractères extraits (${pages} page(s))`,
      );
      return ok(data.text);
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      this.logger.error(`Échec de l'extraction pour ${filename}: ${message}`);
      return fail(
        new ExtractionError(
          `Impossible d'extraire le texte du fichier: ${message}`,
          filename,
        ),
      );
    }
  }
}
