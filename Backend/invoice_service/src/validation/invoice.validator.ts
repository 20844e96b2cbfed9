import { Logger } from '@nestjs/common';
import { UNKNOWN, NormalizedInvoice } from '../models/invoice.model';
import { parseAmount, roundToCents } from '../normalization/amount.normalizer';
import { parseDate } from '../normalization/date.normalizer';
import { fail, ok, Result } from '../common/result';

const logger = new Logger('InvoiceValidator');

/**
 * Saisie de l'utilisateur après revue du brouillon. Un montant déjà
 * numérique (corps JSON) n'est pas repassé par le texte.
 */
export interface InvoiceDraft {
  companyName: string;
  invoiceDate: string;
  totalAmount: string | number;
}

export interface ValidationOutcome {
  ok: boolean;
  errors: string[];
}

export function isValidCompanyName(companyName: string): boolean {
  const trimmed = companyName.trim();
  return trimmed !== '' && trimmed !== UNKNOWN;
}

/**
 * Dernier contrôle avant l'enregistrement. Les règles sont évaluées
 * indépendamment et les erreurs cumulées.
 */
export function validateInvoice(
  draft: InvoiceDraft,
  normalizedDate: string | null,
  normalizedAmount: number | null,
): ValidationOutcome {
  const errors: string[] = [];

  if (!isValidCompanyName(draft.companyName)) {
    errors.push('Nom de société invalide');
  }
  if (normalizedDate === null) {
    errors.push(`Format de date invalide : ${draft.invoiceDate}`);
  }
  if (normalizedAmount === null) {
    errors.push(`Montant invalide : ${draft.totalAmount}`);
  }

  return { ok: errors.length === 0, errors };
}

function normalizeAmount(amount: string | number): number | null {
  if (typeof amount === 'number') {
    return Number.isFinite(amount) ? amount : null;
  }
  return parseAmount(amount);
}

/**
 * Normalise puis valide un brouillon : tout ou rien.
 */
export function normalizeInvoice(
  draft: InvoiceDraft,
): Result<NormalizedInvoice, string[]> {
  const invoiceDate = parseDate(draft.invoiceDate);
  const totalAmount = normalizeAmount(draft.totalAmount);
  const outcome = validateInvoice(draft, invoiceDate, totalAmount);

  if (!outcome.ok || invoiceDate === null || totalAmount === null) {
    logger.warn(`Facture refusée : ${outcome.errors.join(', ')}`);
    return fail(outcome.errors);
  }

  return ok({
    companyName: draft.companyName.trim(),
    invoiceDate,
    totalAmount: roundToCents(totalAmount),
  });
}
