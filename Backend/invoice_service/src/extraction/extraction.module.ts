import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { PdfTextExtractor, TEXT_EXTRACTOR } from '../ocr/text_extractor';
import { ExtractionController } from './extraction.controller';
import { ExtractionService } from './extraction.service';

@Module({
  controllers: [ExtractionController],
  providers: [
    ExtractionService,
    {
      provide: TEXT_EXTRACTOR,
      useFactory: (configService: ConfigService) =>
        new PdfTextExtractor(
          configService.getOrThrow<AppConfig>(APP_CONFIG).ocr.maxPages,
        ),
      inject: [ConfigService],
    },
  ],
  exports: [ExtractionService],
})
export class ExtractionModule {}
