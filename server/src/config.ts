import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';

export interface AppConfig {
  port: number;
  supabaseUrl: string;
  supabaseKey: string;
  supportedLanguages: string[];
  defaultLanguage: string;
  anonymousUserId: string;
  storeTimeoutMs: number;
  geoLayerLimit: number;
  corsOrigins: string[];
  /** Prefix for species and disease image URLs; empty yields root-relative paths. */
  staticUrlBase: string;
}

const DEFAULT_PORT = 3000;
const DEFAULT_SUPPORTED_LANGUAGES = ['en', 'ru'];
const DEFAULT_LANGUAGE = 'en';
const DEFAULT_ANONYMOUS_USER_ID = 'default_user_id';
const DEFAULT_STORE_TIMEOUT_MS = 10_000;
const DEFAULT_GEO_LAYER_LIMIT = 10_000;

function loadEnvFile(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

function readString(value: string | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}

function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  const entries = readString(value)
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? Array.from(new Set(entries)) : [...fallback];
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = Number(readString(value));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    loadEnvFile();
  }

  const supabaseUrl = readString(env.SUPABASE_URL);
  const supabaseKey = readString(env.SUPABASE_SERVICE_ROLE_KEY) || readString(env.SUPABASE_ANON_KEY);

  if (!supabaseUrl) {
    console.warn('[config] SUPABASE_URL is missing. The document store cannot be reached.');
  }
  if (!supabaseKey) {
    console.warn('[config] SUPABASE_SERVICE_ROLE_KEY or SUPABASE_ANON_KEY is missing.');
  }

  const defaultLanguage = readString(env.DEFAULT_LANGUAGE) || DEFAULT_LANGUAGE;
  const languages = parseList(env.SUPPORTED_LANGUAGES, DEFAULT_SUPPORTED_LANGUAGES);
  const supportedLanguages = languages.includes(defaultLanguage)
    ? languages
    : [defaultLanguage, ...languages];

  return {
    port: parsePositiveInteger(env.PORT, DEFAULT_PORT),
    supabaseUrl,
    supabaseKey,
    supportedLanguages,
    defaultLanguage,
    anonymousUserId: readString(env.ANONYMOUS_USER_ID) || DEFAULT_ANONYMOUS_USER_ID,
    storeTimeoutMs: parsePositiveInteger(env.STORE_TIMEOUT_MS, DEFAULT_STORE_TIMEOUT_MS),
    geoLayerLimit: parsePositiveInteger(env.GEO_LAYER_LIMIT, DEFAULT_GEO_LAYER_LIMIT),
    corsOrigins: parseList(env.CORS_ORIGINS, []),
    staticUrlBase: readString(env.STATIC_URL_BASE).replace(/\/+$/, ''),
  };
}
