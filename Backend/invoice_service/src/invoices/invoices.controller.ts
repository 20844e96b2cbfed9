import {
  Body,
  Controller,
  Delete,
  Get,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Query,
  StreamableFile,
} from '@nestjs/common';
import { getErrorMessage } from '../common/errors';
import { InvoiceSearchFilters } from '../models/invoice.model';
import {
  EXPORT_CONTENT_TYPES,
  EXPORT_FORMATS,
  ExportFormat,
  exportFilename,
} from './invoice.export';
import { InvoicesService } from './invoices.service';

interface SaveInvoiceBody {
  companyName?: string;
  invoiceDate?: string;
  totalAmount?: string | number;
}

// Express renvoie un tableau pour un paramètre répété
interface SearchQuery {
  from?: unknown;
  to?: unknown;
  company?: unknown;
}

interface ExportQuery extends SearchQuery {
  format?: unknown;
}

function isExportFormat(value: unknown): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function queryParam(
  query: SearchQuery,
  key: keyof SearchQuery,
): string | undefined {
  const value = query[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new HttpException(
    `Paramètre de recherche invalide : ${key}`,
    HttpStatus.BAD_REQUEST,
  );
}

function toFilters(query: SearchQuery): InvoiceSearchFilters {
  return {
    from: queryParam(query, 'from'),
    to: queryParam(query, 'to'),
    company: queryParam(query, 'company'),
  };
}

function validationError(errors: string[]): HttpException {
  return new HttpException(
    { message: 'Données de facture invalides', errors },
    HttpStatus.BAD_REQUEST,
  );
}

@Controller('invoices')
export class InvoicesController {
  private readonly logger = new Logger(InvoicesController.name);

  constructor(private readonly invoicesService: InvoicesService) {}

  @Post()
  async save(@Body() body: SaveInvoiceBody) {
    try {
      const saved = await this.invoicesService.save({
        companyName: body.companyName ?? '',
        invoiceDate: body.invoiceDate ?? '',
        totalAmount: body.totalAmount ?? '',
      });
      if (!saved.ok) {
        throw validationError(saved.error);
      }
      return {
        success: true,
        message: 'Facture enregistrée avec succès',
        invoice: saved.value,
      };
    } catch (error: unknown) {
      if (error instanceof HttpException) {
        throw error;
      }
      const errorMessage = getErrorMessage(error);
      this.logger.error(
        `Erreur lors de l'enregistrement de la facture: ${errorMessage}`,
      );
      throw new HttpException(
        `Erreur lors de l'enregistrement de la facture: ${errorMessage}`,
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  @Get()
  async search(@Query() query: SearchQuery) {
    const results = await this.invoicesService.search(toFilters(query));
    if (!results.ok) {
      throw validationError(results.error);
    }
    return { count: results.value.length, invoices: results.value };
  }

  @Get('stats')
  async stats() {
    return this.invoicesService.stats();
  }

  @Get('export')
  async export(@Query() query: ExportQuery): Promise<StreamableFile> {
    const format = query.format ?? 'csv';
    if (!isExportFormat(format)) {
      throw new HttpException(
        `Format d'export inconnu : ${String(format)} (attendu : ${EXPORT_FORMATS.join(', ')})`,
        HttpStatus.BAD_REQUEST,
      );
    }

    const file = await this.invoicesService.export(format, toFilters(query));
    if (!file.ok) {
      throw validationError(file.error);
    }
    return new StreamableFile(file.value, {
      type: EXPORT_CONTENT_TYPES[format],
      disposition: `attachment; filename="${exportFilename(format)}"`,
    });
  }

  @Delete(':id')
  async delete(@Param('id', ParseIntPipe) id: number) {
    const deleted = await this.invoicesService.delete(id);
    if (!deleted) {
      throw new HttpException(
        `Facture ${id} introuvable`,
        HttpStatus.NOT_FOUND,
      );
    }
    return { success: true, message: `Facture ${id} supprimée` };
  }
}
