import { FakeCompletionProvider } from '../../test/fakes';
import { buildExtractionConfig, loadConfiguration } from '../config/configuration';
import { absentFields } from '../models/invoice.model';
import { EXTRACTION_PROMPT, SYSTEM_INSTRUCTION } from '../invoice_parser/prompts';
import { ExtractionOrchestrator } from './extraction.orchestrator';

describe('ExtractionOrchestrator', () => {
  const config = buildExtractionConfig(loadConfiguration({ LLM_TIMEOUT_MS: '50' }));
  let provider: FakeCompletionProvider;
  let orchestrator: ExtractionOrchestrator;

  beforeEach(() => {
    provider = new FakeCompletionProvider();
    orchestrator = new ExtractionOrchestrator(config, provider);
  });

  it('envoie le texte de la facture avec les consignes fixes', async () => {
    provider.respondWith('Company name: Acme Invoice date: 17-Jun-24 Total amount: $1,234.56');

    const fields = await orchestrator.extract('ACME INC\nInvoice #42\nTotal due $1,234.56');

    expect(fields).toEqual({
      companyName: { kind: 'found', value: 'Acme' },
      invoiceDate: { kind: 'found', value: '17-Jun-24' },
      totalAmount: { kind: 'found', value: '1234.56' },
    });
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].systemInstruction).toBe(SYSTEM_INSTRUCTION);
    expect(provider.calls[0].prompt).toBe(
      `ACME INC\nInvoice #42\nTotal due $1,234.56\n\n${EXTRACTION_PROMPT}`,
    );
  });

  it("renvoie des champs absents quand le fournisseur échoue", async () => {
    provider.failWith({ kind: 'blocked', message: 'Génération bloquée : SAFETY' });

    await expect(orchestrator.extract('facture')).resolves.toEqual(absentFields());
  });

  it("n'appelle pas le fournisseur pour un texte vide", async () => {
    await expect(orchestrator.extract('   ')).resolves.toEqual(absentFields());
    expect(provider.calls).toHaveLength(0);
  });

  it('abandonne un appel trop long', async () => {
    provider.reply = () => new Promise(() => undefined);

    await expect(orchestrator.extract('facture')).resolves.toEqual(absentFields());
  });

  it('absorbe une exception du fournisseur', async () => {
    provider.reply = async () => {
      throw new Error('ECONNRESET');
    };

    await expect(orchestrator.extract('facture')).resolves.toEqual(absentFields());
  });
});
