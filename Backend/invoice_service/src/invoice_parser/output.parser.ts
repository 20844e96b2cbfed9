import { Logger } from '@nestjs/common';
import {
  absentFields,
  ExtractedFields,
  FieldValue,
  fieldFromText,
} from '../models/invoice.model';

const logger = new Logger('OutputParser');

// Chaque champ s'arrête au libellé suivant ou à la fin de la ligne,
// de sorte qu'un libellé manquant n'empêche pas d'extraire les autres.
const COMPANY_NAME =
  /Company name:\s*([^\n]*?)\s*(?=Invoice date:|Total amount:|\n|$)/i;
const INVOICE_DATE =
  /Invoice date:\s*([^\n]*?)\s*(?=Total amount:|Company name:|\n|$)/i;
const TOTAL_AMOUNT =
  /Total amount:\s*([^\n]*?)\s*(?=Company name:|Invoice date:|\n|$)/i;

// Le signe moins n'est retenu qu'en début de texte ou après un espace, un
// symbole monétaire ou une parenthèse : `Ref-2024` n'est pas négatif.
const NUMERIC_RUN = /(?:(?<![^\s$€£(])-)?\d(?:[\d.,]*\d)?/;
// Virgule suivie d'une ou deux décimales en fin de nombre : décimale
// européenne
const DECIMAL_COMMA = /,\d{1,2}$/;

function capture(pattern: RegExp, text: string): FieldValue {
  const match = pattern.exec(text);
  return fieldFromText(match ? match[1] : '');
}

/**
 * Nettoyage grossier du montant : premier nombre du texte, sans séparateurs
 * de milliers à la virgule. La désambiguïsation complète revient à
 * `parseAmount`.
 */
export function cleanAmount(raw: string): string {
  const match = NUMERIC_RUN.exec(raw);
  if (!match) {
    return raw;
  }
  const run = match[0];
  return DECIMAL_COMMA.test(run) ? run : run.replace(/,/g, '');
}

/**
 * Découpe la réponse du LLM en trois champs. Ne lève jamais d'exception :
 * un champ introuvable est absent.
 */
export function parseCompletion(completion: string): ExtractedFields {
  if (!completion.trim()) {
    logger.warn('Réponse vide du LLM, aucun champ extrait');
    return absentFields();
  }

  const totalAmount = capture(TOTAL_AMOUNT, completion);

  const fields: ExtractedFields = {
    companyName: capture(COMPANY_NAME, completion),
    invoiceDate: capture(INVOICE_DATE, completion),
    totalAmount:
      totalAmount.kind === 'found'
        ? { kind: 'found', value: cleanAmount(totalAmount.value) }
        : totalAmount,
  };

  logger.debug(`Champs extraits : ${JSON.stringify(fields)}`);
  return fields;
}
