import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { ExtractionModule } from './extraction/extraction.module';
import { InvoicesModule } from './invoices/invoices.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ExtractionModule,
    InvoicesModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
