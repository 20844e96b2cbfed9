export const SYSTEM_INSTRUCTION = `You are an invoice examiner. Your job is to interpret the text of an invoice and extract the information from the document accurately and precisely.`;

export const EXTRACTION_PROMPT = `Extract the company name, invoice date, and total amount from the invoice.
Only return the required information without adding extra words or sentences.
The output should strictly follow this format:
Company name: <company_name> Invoice date: <invoice_date> Total amount: <total_amount>

Ensure:
- The company name is enclosed within \`Company name:\`
- The invoice date is enclosed within \`Invoice date:\`
- The total amount is enclosed within \`Total amount:\`
- No extra text or comments are included.
- Use the exact field names and order as provided above.`;

/**
 * Le texte de la facture précède les consignes, suivies du format attendu.
 */
export function buildExtractionPrompt(invoiceText: string): string {
  return `${invoiceText}\n\n${EXTRACTION_PROMPT}`;
}
