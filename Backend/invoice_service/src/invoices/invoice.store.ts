import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import {
  InvoiceRecord,
  InvoiceSearchFilters,
  InvoiceStats,
  NormalizedInvoice,
} from '../models/invoice.model';

export const INVOICE_STORE = Symbol('INVOICE_STORE');

export interface InvoiceStore {
  insert(invoice: NormalizedInvoice): Promise<number>;
  search(filters?: InvoiceSearchFilters): Promise<InvoiceRecord[]>;
  stats(): Promise<InvoiceStats>;
  delete(id: number): Promise<boolean>;
  close(): void;
}

interface InvoiceRow {
  id: number;
  company_name: string;
  invoice_date: string;
  total_amount: number;
  created_at: string;
  updated_at: string;
}

interface StatsRow {
  total_invoices: number;
  total_amount: number | null;
  unique_companies: number;
}

const SELECT_COLUMNS = `SELECT id, company_name, invoice_date, total_amount,
  created_at, updated_at FROM invoices`;

function toRecord(row: InvoiceRow): InvoiceRecord {
  return {
    id: row.id,
    companyName: row.company_name,
    invoiceDate: row.invoice_date,
    totalAmount: row.total_amount,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Stockage SQLite des factures. Chaque écriture est une instruction unique,
 * validée automatiquement.
 */
export class SqliteInvoiceStore implements InvoiceStore {
  private readonly logger = new Logger(SqliteInvoiceStore.name);
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS invoices (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        company_name TEXT NOT NULL,
        invoice_date DATE NOT NULL,
        total_amount DECIMAL(10, 2) NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );
      CREATE INDEX IF NOT EXISTS idx_invoice_date ON invoices(invoice_date);
      CREATE INDEX IF NOT EXISTS idx_company_name ON invoices(company_name);
    `);
    this.logger.log('Base de données initialisée');
  }

  async insert(invoice: NormalizedInvoice): Promise<number> {
    const result = this.db
      .prepare(
        `INSERT INTO invoices (company_name, invoice_date, total_amount)
         VALUES (?, ?, ?)`,
      )
      .run(invoice.companyName, invoice.invoiceDate, invoice.totalAmount);

    const id = Number(result.lastInsertRowid);
    this.logger.log(`Facture ${id} enregistrée pour ${invoice.companyName}`);
    return id;
  }

  async search(filters: InvoiceSearchFilters = {}): Promise<InvoiceRecord[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filters.from) {
      conditions.push('invoice_date >= ?');
      params.push(filters.from);
    }
    if (filters.to) {
      conditions.push('invoice_date <= ?');
      params.push(filters.to);
    }
    if (filters.company) {
      conditions.push("company_name LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLike(filters.company)}%`);
    }

    const where =
      conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<unknown[], InvoiceRow>(
        `${SELECT_COLUMNS}${where} ORDER BY invoice_date DESC, id DESC`,
      )
      .all(...params);

    this.logger.log(`La recherche a renvoyé ${rows.length} résultat(s)`);
    return rows.map(toRecord);
  }

  async stats(): Promise<InvoiceStats> {
    const row = this.db
      .prepare<[], StatsRow>(
        `SELECT COUNT(*) AS total_invoices,
                SUM(total_amount) AS total_amount,
                COUNT(DISTINCT company_name) AS unique_companies
         FROM invoices`,
      )
      .get();

    return {
      totalInvoices: row?.total_invoices ?? 0,
      totalAmount: row?.total_amount ?? 0,
      uniqueCompanies: row?.unique_companies ?? 0,
    };
  }

  async delete(id: number): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM invoices WHERE id = ?').run(id);
    const deleted = result.changes > 0;
    if (deleted) {
      this.logger.log(`Facture ${id} supprimée`);
    }
    return deleted;
  }

  close(): void {
    this.db.close();
  }
}
