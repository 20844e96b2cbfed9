import { GoogleGenAI } from '@google/genai';
import { buildExtractionConfig, loadConfiguration } from '../config/configuration';
import { GeminiCompletionProvider } from './gemini.provider';

const mockGenerate = jest.fn();
const mockList = jest.fn();

jest.mock('@google/genai', () => ({
  __esModule: true,
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: mockGenerate, list: mockList },
  })),
  HarmCategory: {
    HARM_CATEGORY_HATE_SPEECH: 'HARM_CATEGORY_HATE_SPEECH',
    HARM_CATEGORY_HARASSMENT: 'HARM_CATEGORY_HARASSMENT',
  },
  HarmBlockThreshold: { BLOCK_LOW_AND_ABOVE: 'BLOCK_LOW_AND_ABOVE' },
  FinishReason: { STOP: 'STOP', SAFETY: 'SAFETY' },
}));

async function* pages<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('GeminiCompletionProvider', () => {
  const config = buildExtractionConfig(loadConfiguration({ GOOGLE_API_KEY: 'test-key' }));

  beforeEach(() => {
    mockGenerate.mockReset();
    mockList.mockReset();
  });

  it('passe les consignes et les réglages de génération', async () => {
    mockGenerate.mockResolvedValue({ text: 'Company name: Acme' });

    const result = await new GeminiCompletionProvider(config).generate('sys', 'prompt');

    expect(result).toEqual({ ok: true, value: 'Company name: Acme' });
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key', httpOptions: { timeout: 60000 } });
    expect(mockGenerate).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents: 'prompt',
      config: {
        systemInstruction: 'sys',
        temperature: 0,
        topP: 0.95,
        topK: 64,
        maxOutputTokens: 8192,
        safetySettings: [
          { category: 'HARM_CATEGORY_HATE_SPEECH', threshold: 'BLOCK_LOW_AND_ABOVE' },
          { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_LOW_AND_ABOVE' },
        ],
      },
    });
  });

  it('signale un prompt bloqué', async () => {
    mockGenerate.mockResolvedValue({ text: undefined, promptFeedback: { blockReason: 'SAFETY' } });

    await expect(new GeminiCompletionProvider(config).generate('sys', 'prompt')).resolves.toEqual({
      ok: false,
      error: { kind: 'blocked', message: 'Génération bloquée : SAFETY' },
    });
  });

  it('signale une réponse interrompue par les filtres', async () => {
    mockGenerate.mockResolvedValue({
      text: undefined,
      candidates: [{ finishReason: 'SAFETY', safetyRatings: [] }],
    });

    await expect(new GeminiCompletionProvider(config).generate('sys', 'prompt')).resolves.toEqual({
      ok: false,
      error: { kind: 'blocked', message: 'Génération bloquée (safety ratings: [])' },
    });
  });

  it('signale une réponse vide', async () => {
    mockGenerate.mockResolvedValue({ text: '', candidates: [{ finishReason: 'STOP' }] });

    await expect(new GeminiCompletionProvider(config).generate('sys', 'prompt')).resolves.toEqual({
      ok: false,
      error: { kind: 'empty', message: 'Réponse vide de Gemini' },
    });
  });

  it('ne garde que les modèles capables de générer du contenu', async () => {
    mockList.mockResolvedValue(
      pages([
        { name: 'models/gemini-2.0-flash', supportedActions: ['generateContent', 'countTokens'] },
        { name: 'models/text-embedding-004', supportedActions: ['embedContent'] },
      ]),
    );

    await expect(new GeminiCompletionProvider(config).listModels()).resolves.toEqual({
      ok: true,
      value: ['models/gemini-2.0-flash'],
    });
  });

  it('échoue sans clé API', async () => {
    const provider = new GeminiCompletionProvider(buildExtractionConfig(loadConfiguration({})));

    await expect(provider.generate('sys', 'prompt')).resolves.toEqual({
      ok: false,
      error: { kind: 'configuration', message: "GOOGLE_API_KEY n'est pas défini" },
    });
  });
});
