import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { INVOICE_STORE, SqliteInvoiceStore } from './invoice.store';
import { InvoicesController } from './invoices.controller';
import { InvoicesService } from './invoices.service';

@Module({
  controllers: [InvoicesController],
  providers: [
    InvoicesService,
    {
      provide: INVOICE_STORE,
      useFactory: (configService: ConfigService) =>
        new SqliteInvoiceStore(
          configService.getOrThrow<AppConfig>(APP_CONFIG).database.path,
        ),
      inject: [ConfigService],
    },
  ],
  exports: [InvoicesService],
})
export class InvoicesModule {}
