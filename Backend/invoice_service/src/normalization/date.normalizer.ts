import { Logger } from '@nestjs/common';
import { format, isAfter, isValid, parse } from 'date-fns';
import { UNKNOWN } from '../models/invoice.model';

const logger = new Logger('DateNormalizer');

const CANONICAL_FORMAT = 'yyyy-MM-dd';

const CANONICAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

// date-fns place `yy` dans le siècle centré sur l'année de référence :
// avec 2019, 69-99 donne 19xx et 00-68 donne 20xx.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1);

interface DateFormat {
  pattern: RegExp;
  format: string;
}

/**
 * Formats essayés dans l'ordre : le premier qui correspond gagne.
 * L'ordre départage les cas ambigus (JJ/MM avant MM/JJ).
 */
const DATE_FORMATS: DateFormat[] = [
  { pattern: /^\d{1,2}-[a-z]{3}-\d{2}$/i, format: 'd-MMM-yy' },
  { pattern: /^\d{1,2}-[a-z]{3}-\d{4}$/i, format: 'd-MMM-yyyy' },
  { pattern: /^\d{1,2}-\d{1,2}-\d{4}$/, format: 'd-M-yyyy' },
  { pattern: /^\d{1,2}\.\d{1,2}\.\d{4}$/, format: 'd.M.yyyy' },
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'd/M/yyyy' },
  { pattern: /^\d{4}-\d{1,2}-\d{1,2}$/, format: 'yyyy-M-d' },
  { pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, format: 'M/d/yyyy' },
  { pattern: /^[a-z]+ \d{1,2}, \d{4}$/i, format: 'MMMM d, yyyy' },
  { pattern: /^[a-z]{3} \d{1,2}, \d{4}$/i, format: 'MMM d, yyyy' },
  { pattern: /^\d{1,2} [a-z]+ \d{4}$/i, format: 'd MMMM yyyy' },
  { pattern: /^\d{1,2} [a-z]{3} \d{4}$/i, format: 'd MMM yyyy' },
];

function parseCanonical(value: string): Date | null {
  if (!CANONICAL_DATE.test(value)) {
    return null;
  }
  const date = parse(value, CANONICAL_FORMAT, TWO_DIGIT_YEAR_REFERENCE);
  return isValid(date) ? date : null;
}

/**
 * Convertit une date libre en `YYYY-MM-DD`, ou `null` si aucun format
 * ne correspond.
 */
export function parseDate(dateStr: string): string | null {
  if (!dateStr || dateStr === UNKNOWN) {
    return null;
  }

  const cleaned = dateStr.trim().replace(/\s+/g, ' ');

  for (const candidate of DATE_FORMATS) {
    if (!candidate.pattern.test(cleaned)) {
      continue;
    }
    const date = parse(cleaned, candidate.format, TWO_DIGIT_YEAR_REFERENCE);
    if (isValid(date)) {
      const result = format(date, CANONICAL_FORMAT);
      logger.debug(
        `Date '${cleaned}' interprétée comme '${result}' (format ${candidate.format})`,
      );
      return result;
    }
  }

  logger.warn(`Impossible d'interpréter la date : ${dateStr}`);
  return null;
}

/**
 * Vrai si `fromDate <= toDate`. Toute borne non canonique rend la plage
 * invalide.
 */
export function validateDateRange(fromDate: string, toDate: string): boolean {
  const from = parseCanonical(fromDate);
  const to = parseCanonical(toDate);
  if (!from || !to) {
    return false;
  }
  return !isAfter(from, to);
}
