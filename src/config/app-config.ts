import {
  SUPPORTED_LANGS,
  isSupportedLang,
  type SupportedLang,
} from '../quotes/quote.types';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type GenerationMode = 'live' | 'mock';

export type GenerationConfig = {
  mode: GenerationMode;
  apiKey: string | null;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
};

export type AppConfig = {
  port: number;
  requestBodyLimit: string;
  corsOrigins: string[];
  service: {
    name: string;
    version: string;
  };
  languages: SupportedLang[];
  generation: GenerationConfig;
  throttle: {
    ttlMs: number;
    limit: number;
  };
};

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string, fallback: string): string {
  const raw = (env[name] ?? '').trim();
  return raw || fallback;
}

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function envBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw);
}

function envList(env: Env, name: string): string[] {
  return (env[name] ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

/**
 * Reads the process environment once at startup. Everything downstream gets
 * the resulting object through the `APP_CONFIG` provider.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const apiKey = (env.GOOGLE_API_KEY ?? '').trim() || null;
  const forceMock = envBoolean(env, 'QUOTE_MOCK_MODE', false);

  const languages = Array.from(
    new Set(
      envList(env, 'QUOTE_LANGUAGES')
        .map((l) => l.toLowerCase())
        .filter(isSupportedLang),
    ),
  );

  const config: AppConfig = {
    port: envNumber(env, 'PORT', 3000),
    requestBodyLimit: envString(env, 'REQUEST_BODY_LIMIT', '1mb'),
    corsOrigins: envList(env, 'CORS_ORIGINS'),
    service: {
      name: envString(env, 'SERVICE_NAME', 'quotation-service'),
      version: envString(env, 'SERVICE_VERSION', '1.0.0'),
    },
    languages: languages.length ? languages : [...SUPPORTED_LANGS],
    generation: {
      mode: apiKey && !forceMock ? 'live' : 'mock',
      apiKey,
      model: envString(env, 'GEMINI_MODEL', 'gemini-2.5-flash'),
      temperature: envNumber(env, 'GEMINI_TEMPERATURE', 0.4),
      maxOutputTokens: Math.max(
        64,
        Math.floor(envNumber(env, 'GEMINI_MAX_OUTPUT_TOKENS', 1024)),
      ),
      timeoutMs: Math.max(
        1,
        Math.floor(envNumber(env, 'GEMINI_TIMEOUT_MS', 15_000)),
      ),
    },
    throttle: {
      ttlMs: envNumber(env, 'THROTTLE_TTL_MS', 60_000),
      limit: envNumber(env, 'THROTTLE_LIMIT', 120),
    },
  };

  return Object.freeze(config);
}
