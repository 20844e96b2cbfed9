import {
  Body,
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import {
  isProviderName,
  PROVIDER_NAMES,
  ProviderName,
  ProviderSelection,
} from '../config/configuration';
import { ExtractionService } from './extraction.service';

const MAX_FILES_PER_BATCH = 20;

interface SelectionBody {
  provider?: string;
  model?: string;
}

interface ExtractTextBody extends SelectionBody {
  text?: string;
}

interface UploadedFilePayload {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

function parseProvider(value: unknown): ProviderName {
  if (!isProviderName(value)) {
    throw new HttpException(
      `Fournisseur inconnu : ${String(value)} (attendu : ${PROVIDER_NAMES.join(', ')})`,
      HttpStatus.BAD_REQUEST,
    );
  }
  return value;
}

function parseSelection(body: SelectionBody): ProviderSelection {
  return {
    provider: body.provider ? parseProvider(body.provider) : undefined,
    model: body.model?.trim() || undefined,
  };
}

@Controller('extraction')
export class ExtractionController {
  private readonly logger = new Logger(ExtractionController.name);

  constructor(private readonly extractionService: ExtractionService) {}

  @Post('documents')
  @UseInterceptors(FilesInterceptor('files', MAX_FILES_PER_BATCH))
  async processDocuments(
    @UploadedFiles() files: UploadedFilePayload[] | undefined,
    @Body() body: SelectionBody,
  ) {
    if (!files || files.length === 0) {
      throw new HttpException('Aucun fichier reçu', HttpStatus.BAD_REQUEST);
    }
    const selection = parseSelection(body);

    this.logger.log(`Traitement de ${files.length} fichier(s)`);
    const drafts = await this.extractionService.processDocuments(
      files.map((file) => ({
        filename: file.originalname,
        mimetype: file.mimetype,
        buffer: file.buffer,
      })),
      selection,
    );
    return { drafts };
  }

  @Post('text')
  async extractText(@Body() body: ExtractTextBody) {
    if (!body.text?.trim()) {
      throw new HttpException(
        'Le champ "text" est requis',
        HttpStatus.BAD_REQUEST,
      );
    }
    return this.extractionService.extractFromText(
      body.text,
      parseSelection(body),
    );
  }

  @Get('providers')
  getProviders() {
    return {
      providers: PROVIDER_NAMES,
      default: this.extractionService.defaultProvider,
    };
  }

  @Get('providers/:provider/models')
  async listModels(@Param('provider') provider: string) {
    const name = parseProvider(provider);
    const models = await this.extractionService.listModels(name);
    if (!models.ok) {
      this.logger.error(
        `Liste des modèles ${name} indisponible: ${models.error.message}`,
      );
      throw new HttpException(models.error.message, HttpStatus.BAD_GATEWAY);
    }
    return { provider: name, models: models.value };
  }

  @Get('providers/:provider/status')
  async getStatus(@Param('provider') provider: string) {
    return this.extractionService.providerStatus(parseProvider(provider));
  }
}
