import { Logger } from '@nestjs/common';
import { UNKNOWN } from '../models/invoice.model';

const logger = new Logger('AmountNormalizer');

const NUMERIC = /^-?(\d+\.?\d*|\.\d+)$/;

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

// Supprime toutes les occurrences de `char` sauf la dernière
function keepLastOccurrence(text: string, char: string): string {
  const last = text.lastIndexOf(char);
  return text.slice(0, last).split(char).join('') + text.slice(last);
}

/**
 * Convertit un montant libre (symboles monétaires, séparateurs US ou
 * européens) en nombre, ou `null` s'il est illisible.
 *
 * Le dernier séparateur rencontré est la décimale. Une virgule seule est
 * toujours décimale : `"1,234"` vaut 1.234.
 */
export function parseAmount(amountStr: string): number | null {
  if (!amountStr || amountStr === UNKNOWN) {
    return null;
  }

  let cleaned = amountStr.replace(/[^\d.,-]/g, '');

  if (countOf(cleaned, '.') > 1) {
    cleaned = keepLastOccurrence(cleaned, '.');
  }
  if (countOf(cleaned, ',') > 1) {
    cleaned = keepLastOccurrence(cleaned, ',');
  }

  const hasComma = cleaned.includes(',');
  const hasDot = cleaned.includes('.');

  if (hasComma && !hasDot) {
    cleaned = cleaned.replace(',', '.');
  } else if (hasComma && hasDot) {
    cleaned =
      cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.')
        ? cleaned.replace(/\./g, '').replace(',', '.')
        : cleaned.replace(/,/g, '');
  }

  if (!NUMERIC.test(cleaned)) {
    logger.warn(`Impossible d'interpréter le montant '${amountStr}'`);
    return null;
  }

  const amount = Number(cleaned);
  logger.debug(`Montant '${amountStr}' interprété comme ${amount}`);
  return amount;
}

const amountFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * `formatAmount(1500.5)` -> `"$1,500.50"`
 */
export function formatAmount(amount: number, currency = '$'): string {
  return `${currency}${amountFormatter.format(amount)}`;
}

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}
