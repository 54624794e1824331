import fs from 'fs';
import path from 'path';

export const DEFAULT_BASE_URL = 'https://paatshala.ictkerala.org';
export const DEFAULT_CONFIG_FILE = '.config';
export const DEFAULT_OUTPUT_DIR = 'output';
export const DEFAULT_CONCURRENCY = 4;

export interface PaatshalaConfig {
  baseUrl: string;
  cookie: string | null;
  username: string | null;
  password: string | null;
  configFile: string;
  outputDir: string;
  concurrency: number;
  enableWriteTools: boolean;
}

export interface StoredCredentials {
  cookie: string | null;
  username: string | null;
  password: string | null;
}

const CREDENTIAL_KEYS = ['cookie', 'username', 'password'] as const;
type CredentialKey = typeof CREDENTIAL_KEYS[number];

function isCredentialKey(key: string): key is CredentialKey {
  return (CREDENTIAL_KEYS as readonly string[]).includes(key);
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["']|["']$/g, '');
}

/**
 * Read the line-oriented `key=value` credentials file.
 * Blank lines and `#` comments are ignored; keys are case-insensitive.
 */
export function readCredentialsFile(filePath: string): StoredCredentials {
  const result: StoredCredentials = { cookie: null, username: null, password: null };
  if (!fs.existsSync(filePath)) return result;

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    console.error(`[Config] Could not read ${filePath}:`, error instanceof Error ? error.message : String(error));
    return result;
  }

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || !line.includes('=')) continue;
    const eq = line.indexOf('=');
    const key = line.slice(0, eq).trim().toLowerCase();
    const value = stripQuotes(line.slice(eq + 1));
    if (isCredentialKey(key) && value) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Update keys in the credentials file in place, appending any that are missing.
 * Comments and unrelated keys are preserved. Returns false when the file cannot be written.
 */
export function writeCredentialsFile(filePath: string, updates: Partial<StoredCredentials>): boolean {
  const pending = new Map<string, string>();
  for (const key of CREDENTIAL_KEYS) {
    const value = updates[key];
    if (value) pending.set(key, value);
  }
  if (pending.size === 0) return true;

  try {
    const lines = fs.existsSync(filePath)
      ? fs.readFileSync(filePath, 'utf-8').split(/\r?\n/)
      : [];
    if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

    const out = lines.map(line => {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) return line;
      const key = trimmed.slice(0, trimmed.indexOf('=')).trim().toLowerCase();
      const replacement = pending.get(key);
      if (replacement === undefined) return line;
      pending.delete(key);
      return `${key}=${replacement}`;
    });

    for (const [key, value] of pending) {
      out.push(`${key}=${value}`);
    }

    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, out.join('\n') + '\n', { mode: 0o600 });
    return true;
  } catch (error) {
    console.error(`[Config] Could not write ${filePath}:`, error instanceof Error ? error.message : String(error));
    return false;
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build the runtime configuration. Environment variables win over the credentials file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PaatshalaConfig {
  const configFile = env.PAATSHALA_CONFIG_FILE || DEFAULT_CONFIG_FILE;
  const stored = readCredentialsFile(configFile);

  return {
    baseUrl: (env.PAATSHALA_BASE_URL || DEFAULT_BASE_URL).replace(/\/$/, ''),
    cookie: env.PAATSHALA_COOKIE || stored.cookie,
    username: env.PAATSHALA_USERNAME || stored.username,
    password: env.PAATSHALA_PASSWORD || stored.password,
    configFile,
    outputDir: env.PAATSHALA_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    concurrency: parsePositiveInt(env.PAATSHALA_CONCURRENCY, DEFAULT_CONCURRENCY),
    enableWriteTools: env.ENABLE_WRITE_TOOLS === 'true',
  };
}
