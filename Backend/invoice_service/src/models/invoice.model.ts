/**
 * Valeur affichée pour un champ introuvable.
 */
export const UNKNOWN = 'Unknown';

/**
 * Champ brut renvoyé par le LLM : trouvé, ou absent.
 * L'absence n'est traduite en `"Unknown"` qu'à l'affichage.
 */
export type FieldValue = { kind: 'found'; value: string } | { kind: 'absent' };

/**
 * Données extraites d'une facture, avant revue humaine
 */
export interface ExtractedFields {
  companyName: FieldValue;
  invoiceDate: FieldValue;
  totalAmount: FieldValue;
}

/**
 * Forme éditable renvoyée au client : jamais vide, jamais null
 */
export interface ExtractedFieldsView {
  companyName: string;
  invoiceDate: string;
  totalAmount: string;
}

/**
 * Brouillon d'un document traité dans un lot
 */
export interface DocumentDraft extends ExtractedFieldsView {
  index: number;
  filename: string;
  error?: string;
}

/**
 * Facture validée, prête à être enregistrée
 */
export interface NormalizedInvoice {
  companyName: string;
  invoiceDate: string; // YYYY-MM-DD
  totalAmount: number;
}

/**
 * Facture enregistrée
 */
export interface InvoiceRecord extends NormalizedInvoice {
  id: number;
  createdAt: string;
  updatedAt: string;
}

export interface InvoiceSearchFilters {
  from?: string;
  to?: string;
  company?: string;
}

export interface InvoiceStats {
  totalInvoices: number;
  totalAmount: number;
  uniqueCompanies: number;
}

export const ABSENT: FieldValue = { kind: 'absent' };

export function found(value: string): FieldValue {
  return { kind: 'found', value };
}

export function absentFields(): ExtractedFields {
  return { companyName: ABSENT, invoiceDate: ABSENT, totalAmount: ABSENT };
}

/**
 * Interprète une saisie : vide ou `"Unknown"` vaut absence.
 */
export function fieldFromText(text: string): FieldValue {
  const trimmed = text.trim();
  if (!trimmed || trimmed === UNKNOWN) {
    return ABSENT;
  }
  return found(trimmed);
}

export function fieldToText(field: FieldValue): string {
  return field.kind === 'found' ? field.value : UNKNOWN;
}

export function toFieldsView(fields: ExtractedFields): ExtractedFieldsView {
  return {
    companyName: fieldToText(fields.companyName),
    invoiceDate: fieldToText(fields.invoiceDate),
    totalAmount: fieldToText(fields.totalAmount),
  };
}
