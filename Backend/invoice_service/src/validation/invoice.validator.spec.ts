import { isValidCompanyName, normalizeInvoice, validateInvoice } from './invoice.validator';

describe('isValidCompanyName', () => {
  it('refuse les noms vides ou inconnus', () => {
    expect(isValidCompanyName('Valid Company')).toBe(true);
    expect(isValidCompanyName('ABC Corp')).toBe(true);
    expect(isValidCompanyName('')).toBe(false);
    expect(isValidCompanyName('   ')).toBe(false);
    expect(isValidCompanyName('Unknown')).toBe(false);
  });
});

describe('validateInvoice', () => {
  it('cumule une erreur par champ invalide', () => {
    const outcome = validateInvoice(
      { companyName: 'Unknown', invoiceDate: 'bad', totalAmount: 'abc' },
      null,
      null,
    );

    expect(outcome).toEqual({
      ok: false,
      errors: ['Nom de société invalide', 'Format de date invalide : bad', 'Montant invalide : abc'],
    });
  });

  it('accepte un triplet complet', () => {
    const outcome = validateInvoice(
      { companyName: 'Test Company', invoiceDate: '17-Jun-24', totalAmount: '1500.50' },
      '2024-06-17',
      1500.5,
    );

    expect(outcome).toEqual({ ok: true, errors: [] });
  });
});

describe('normalizeInvoice', () => {
  it('normalise chaque champ', () => {
    const result = normalizeInvoice({
      companyName: '  Acme Corp ',
      invoiceDate: '17-Jun-24',
      totalAmount: '$1,234.567',
    });

    expect(result).toEqual({
      ok: true,
      value: { companyName: 'Acme Corp', invoiceDate: '2024-06-17', totalAmount: 1234.57 },
    });
  });

  it('refuse tout le brouillon si un seul champ est invalide', () => {
    const result = normalizeInvoice({
      companyName: 'Acme Corp',
      invoiceDate: '17-Jun-24',
      totalAmount: 'Unknown',
    });

    expect(result).toEqual({ ok: false, error: ['Montant invalide : Unknown'] });
  });

  it('renvoie exactement trois erreurs pour un brouillon entièrement invalide', () => {
    const result = normalizeInvoice({
      companyName: 'Unknown',
      invoiceDate: 'bad',
      totalAmount: 'abc',
    });

    expect(result.ok).toBe(false);
    expect(result.ok ? [] : result.error).toHaveLength(3);
  });

  it('accepte un montant nul ou négatif', () => {
    const zero = normalizeInvoice({ companyName: 'Acme', invoiceDate: '2024-01-01', totalAmount: '0' });
    const credit = normalizeInvoice({ companyName: 'Acme', invoiceDate: '2024-01-01', totalAmount: '-20.00' });

    expect(zero.ok && zero.value.totalAmount).toBe(0);
    expect(credit.ok && credit.value.totalAmount).toBe(-20);
  });

  it('reprend tel quel un montant déjà numérique', () => {
    const large = normalizeInvoice({
      companyName: 'Acme',
      invoiceDate: '2024-01-01',
      totalAmount: 1e21,
    });
    const tiny = normalizeInvoice({
      companyName: 'Acme',
      invoiceDate: '2024-01-01',
      totalAmount: 1e-7,
    });

    expect(large.ok && large.value.totalAmount).toBeCloseTo(1e21, -6);
    expect(tiny.ok && tiny.value.totalAmount).toBe(0);
  });

  it('refuse un montant numérique non fini', () => {
    const result = normalizeInvoice({
      companyName: 'Acme',
      invoiceDate: '2024-01-01',
      totalAmount: Number.POSITIVE_INFINITY,
    });

    expect(result).toEqual({ ok: false, error: ['Montant invalide : Infinity'] });
  });
});
