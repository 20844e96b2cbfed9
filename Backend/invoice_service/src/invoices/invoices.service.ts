import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { getErrorMessage } from '../common/errors';
import { fail, ok, Result } from '../common/result';
import {
  InvoiceRecord,
  InvoiceSearchFilters,
  InvoiceStats,
} from '../models/invoice.model';
import { parseDate, validateDateRange } from '../normalization/date.normalizer';
import {
  InvoiceDraft,
  normalizeInvoice,
} from '../validation/invoice.validator';
import { ExportFormat, toCsv, toXlsx } from './invoice.export';
import { INVOICE_STORE, InvoiceStore } from './invoice.store';

export interface SavedInvoice {
  id: number;
  companyName: string;
  invoiceDate: string;
  totalAmount: number;
}

@Injectable()
export class InvoicesService implements OnModuleDestroy {
  private readonly logger = new Logger(InvoicesService.name);
  private readonly currencySymbol: string;

  constructor(
    @Inject(INVOICE_STORE) private readonly store: InvoiceStore,
    configService: ConfigService,
  ) {
    this.currencySymbol =
      configService.getOrThrow<AppConfig>(APP_CONFIG).currencySymbol;
  }

  onModuleDestroy(): void {
    this.store.close();
  }

  /**
   * Enregistre un brouillon relu. Rien n'est écrit si un seul champ est
   * invalide.
   * Une erreur du stockage est journalisée puis propagée.
   */
  async save(draft: InvoiceDraft): Promise<Result<SavedInvoice, string[]>> {
    const normalized = normalizeInvoice(draft);
    if (!normalized.ok) {
      return normalized;
    }

    try {
      const id = await this.store.insert(normalized.value);
      return ok({ id, ...normalized.value });
    } catch (error: unknown) {
      this.logger.error(
        `Échec de l'enregistrement de la facture: ${getErrorMessage(error)}`,
      );
      throw error;
    }
  }

  /**
   * Les bornes acceptent tout format de date connu ; elles sont inclusives.
   */
  async search(
    filters: InvoiceSearchFilters,
  ): Promise<Result<InvoiceRecord[], string[]>> {
    const errors: string[] = [];
    const from = filters.from ? parseDate(filters.from) : undefined;
    const to = filters.to ? parseDate(filters.to) : undefined;

    if (from === null) {
      errors.push(`Date de début invalide : ${filters.from}`);
    }
    if (to === null) {
      errors.push(`Date de fin invalide : ${filters.to}`);
    }
    if (from && to && !validateDateRange(from, to)) {
      errors.push(
        'Plage de dates invalide : la date de début doit précéder la date de fin',
      );
    }
    if (errors.length > 0) {
      return fail(errors);
    }

    const company = filters.company?.trim();
    const results = await this.store.search({
      from: from ?? undefined,
      to: to ?? undefined,
      company: company || undefined,
    });
    return ok(results);
  }

  async stats(): Promise<InvoiceStats> {
    return this.store.stats();
  }

  async delete(id: number): Promise<boolean> {
    return this.store.delete(id);
  }

  async export(
    format: ExportFormat,
    filters: InvoiceSearchFilters,
  ): Promise<Result<Buffer, string[]>> {
    const results = await this.search(filters);
    if (!results.ok) {
      return results;
    }
    this.logger.log(`Export ${format} de ${results.value.length} facture(s)`);
    return ok(
      format === 'csv'
        ? Buffer.from(toCsv(results.value, this.currencySymbol), 'utf-8')
        : toXlsx(results.value, this.currencySymbol),
    );
  }
}
