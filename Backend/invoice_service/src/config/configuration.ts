import { registerAs } from '@nestjs/config';

export const PROVIDER_NAMES = ['google', 'openai', 'ollama'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  google: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  ollama: 'llama3',
};

export interface GenerationSettings {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

/**
 * Configuration figée d'un orchestrateur. Changer de fournisseur ou de
 * modèle revient à en construire une nouvelle.
 */
export interface ExtractionConfig extends GenerationSettings {
  readonly provider: ProviderName;
  readonly model: string;
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export interface AppConfig {
  port: number;
  appTitle: string;
  currencySymbol: string;
  database: {
    path: string;
  };
  ocr: {
    maxPages: number;
  };
  llm: GenerationSettings & {
    provider: string;
    model: string;
    timeoutMs: number;
    googleApiKey: string;
    openaiApiKey: string;
    openaiBaseUrl: string;
    ollamaBaseUrl: string;
  };
  // Variables numériques illisibles, remplacées par leur valeur par défaut
  invalidSettings: string[];
}

export interface ProviderSelection {
  provider?: ProviderName;
  model?: string;
}

type Env = Record<string, string | undefined>;

export function isProviderName(value: unknown): value is ProviderName {
  return (
    typeof value === 'string' && PROVIDER_NAMES.some((name) => name === value)
  );
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  invalid: string[],
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    invalid.push(key);
    return fallback;
  }
  return value;
}

export function loadConfiguration(env: Env): AppConfig {
  const invalid: string[] = [];
  const provider = env.LLM_PROVIDER || 'google';

  return {
    port: readNumber(env, 'PORT', 4444, invalid),
    appTitle: env.APP_TITLE || 'InvoiceIQ',
    currencySymbol: env.CURRENCY_SYMBOL || '$',
    database: {
      path: env.DATABASE_PATH || 'invoices.db',
    },
    ocr: {
      maxPages: readNumber(env, 'MAX_PAGES_PER_PDF', 10, invalid),
    },
    llm: {
      provider,
      model:
        env.LLM_MODEL ||
        (isProviderName(provider) ? DEFAULT_MODELS[provider] : ''),
      temperature: readNumber(env, 'LLM_TEMPERATURE', 0, invalid),
      topP: readNumber(env, 'LLM_TOP_P', 0.95, invalid),
      topK: readNumber(env, 'LLM_TOP_K', 64, invalid),
      maxOutputTokens: readNumber(env, 'LLM_MAX_OUTPUT_TOKENS', 8192, invalid),
      timeoutMs: readNumber(env, 'LLM_TIMEOUT_MS', 60000, invalid),
      googleApiKey: env.GOOGLE_API_KEY || '',
      openaiApiKey: env.OPENAI_API_KEY || '',
      openaiBaseUrl: env.OPENAI_BASE_URL || '',
      ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
    },
    invalidSettings: invalid,
  };
}

export const APP_CONFIG = 'app';

export default registerAs(
  APP_CONFIG,
  (): AppConfig => loadConfiguration(process.env),
);

/**
 * Liste les problèmes de configuration sans bloquer le démarrage.
 */
export function validateConfiguration(config: AppConfig): string[] {
  const errors = config.invalidSettings.map(
    (key) => `${key} n'est pas un nombre valide, valeur par défaut utilisée`,
  );

  const { provider, googleApiKey, openaiApiKey } = config.llm;
  if (!isProviderName(provider)) {
    errors.push(
      `LLM_PROVIDER inconnu : ${provider} (attendu : ${PROVIDER_NAMES.join(', ')})`,
    );
  } else if (provider === 'google' && !googleApiKey) {
    errors.push(
      "GOOGLE_API_KEY n'est pas défini. Renseignez-le dans le fichier .env.",
    );
  } else if (provider === 'openai' && !openaiApiKey) {
    errors.push(
      "OPENAI_API_KEY n'est pas défini. Renseignez-le dans le fichier .env.",
    );
  }

  return errors;
}

/**
 * Construit la configuration d'extraction pour le fournisseur choisi
 * (celui de la requête, sinon celui de l'environnement).
 */
export function buildExtractionConfig(
  config: AppConfig,
  selection: ProviderSelection = {},
): ExtractionConfig {
  const { llm } = config;
  const provider: ProviderName =
    selection.provider ??
    (isProviderName(llm.provider) ? llm.provider : 'google');

  const model =
    selection.model ||
    (provider === llm.provider && llm.model
      ? llm.model
      : DEFAULT_MODELS[provider]);

  const credentials: Record<
    ProviderName,
    { apiKey: string; baseUrl: string }
  > = {
    google: { apiKey: llm.googleApiKey, baseUrl: '' },
    openai: { apiKey: llm.openaiApiKey, baseUrl: llm.openaiBaseUrl },
    ollama: { apiKey: '', baseUrl: llm.ollamaBaseUrl.replace(/\/+$/, '') },
  };

  return Object.freeze({
    provider,
    model,
    ...credentials[provider],
    temperature: llm.temperature,
    topP: llm.topP,
    topK: llm.topK,
    maxOutputTokens: llm.maxOutputTokens,
    timeoutMs: llm.timeoutMs,
  });
}
