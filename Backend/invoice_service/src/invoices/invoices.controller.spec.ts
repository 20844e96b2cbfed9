import { HttpException, HttpStatus, StreamableFile } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { APP_CONFIG, loadConfiguration } from '../config/configuration';
import { INVOICE_STORE, SqliteInvoiceStore } from './invoice.store';
import { InvoicesController } from './invoices.controller';
import { InvoicesService } from './invoices.service';

async function rejection(promise: Promise<unknown>): Promise<HttpException> {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('HttpException attendue');
}

describe('InvoicesController', () => {
  let module: TestingModule;
  let controller: InvoicesController;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      controllers: [InvoicesController],
      providers: [
        InvoicesService,
        { provide: INVOICE_STORE, useValue: new SqliteInvoiceStore(':memory:') },
        {
          provide: ConfigService,
          useValue: new ConfigService({ [APP_CONFIG]: loadConfiguration({}) }),
        },
      ],
    }).compile();

    controller = module.get(InvoicesController);
  });

  afterEach(async () => {
    await module.close();
  });

  it('enregistre une facture relue', async () => {
    await expect(
      controller.save({ companyName: 'Acme', invoiceDate: '17-Jun-24', totalAmount: 1500.5 }),
    ).resolves.toEqual({
      success: true,
      message: 'Facture enregistrée avec succès',
      invoice: { id: 1, companyName: 'Acme', invoiceDate: '2024-06-17', totalAmount: 1500.5 },
    });
  });

  it('répond 400 avec la liste des erreurs', async () => {
    const error = await rejection(controller.save({ companyName: 'Unknown', invoiceDate: '17-Jun-24' }));

    expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(error.getResponse()).toEqual({
      message: 'Données de facture invalides',
      errors: ['Nom de société invalide', 'Montant invalide : '],
    });
  });

  it('enregistre un montant numérique sans le convertir en texte', async () => {
    const result = await controller.save({
      companyName: 'Acme',
      invoiceDate: '2024-01-15',
      totalAmount: 1e-7,
    });

    expect(result.invoice.totalAmount).toBe(0);
  });

  it('répond 400 pour un montant numérique non fini', async () => {
    const error = await rejection(
      controller.save({
        companyName: 'Acme',
        invoiceDate: '2024-01-15',
        totalAmount: Number.POSITIVE_INFINITY,
      }),
    );

    expect(error.getResponse()).toEqual({
      message: 'Données de facture invalides',
      errors: ['Montant invalide : Infinity'],
    });
  });

  it('répond 400 pour un paramètre de recherche répété', async () => {
    const error = await rejection(
      controller.search({ company: ['acme', 'globex'] }),
    );

    expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(error.getResponse()).toBe(
      'Paramètre de recherche invalide : company',
    );
  });

  it('recherche et compte les factures', async () => {
    await controller.save({ companyName: 'Acme', invoiceDate: '2024-01-15', totalAmount: '10' });
    await controller.save({ companyName: 'Globex', invoiceDate: '2024-02-15', totalAmount: '20' });

    const result = await controller.search({ company: 'glob' });

    expect(result.count).toBe(1);
    expect(result.invoices[0].companyName).toBe('Globex');
    await expect(controller.stats()).resolves.toEqual({
      totalInvoices: 2,
      totalAmount: 30,
      uniqueCompanies: 2,
    });
  });

  it('répond 400 pour une plage de dates inversée', async () => {
    const error = await rejection(controller.search({ from: '2024-12-31', to: '2024-01-01' }));

    expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
  });

  it('renvoie un fichier CSV', async () => {
    const file = await controller.export({ format: 'csv' });

    expect(file).toBeInstanceOf(StreamableFile);
    expect(file.getHeaders().type).toBe('text/csv');
    expect(file.getHeaders().disposition).toMatch(/^attachment; filename="invoices_\d{8}_\d{6}\.csv"$/);
  });

  it("refuse un format d'export inconnu", async () => {
    const error = await rejection(controller.export({ format: 'pdf' }));

    expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
  });

  it('répond 404 pour une facture inexistante', async () => {
    const error = await rejection(controller.delete(42));

    expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
  });
});
