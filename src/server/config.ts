import { promises as fs } from 'fs';
import path from 'path';

export const DEFAULT_PORT = 8080;
export const DEFAULT_DATABASE_URL = path.join('data', 'persons.db');

export type ConfigReadOptions = {
  basePath?: string;
  env?: NodeJS.ProcessEnv;
};

export type ServerConfig = {
  port: number;
  databaseUrl: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const resolveEnvPath = (basePath?: string) =>
  path.join(basePath ?? process.cwd(), '.env');

export const parseEnv = (raw: string) => {
  const values: Record<string, string> = {};
  raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .forEach((line) => {
      const index = line.indexOf('=');
      if (index === -1) return;
      const key = line.slice(0, index).trim();
      const value = unquote(line.slice(index + 1).trim());
      if (key) {
        values[key] = value;
      }
    });
  return values;
};

const unquote = (value: string) => {
  if (value.length >= 2 && (value.startsWith('"') || value.startsWith("'")) && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

const readEnvFile = async (filePath: string): Promise<Record<string, string>> => {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return parseEnv(raw);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
};

export const parsePort = (raw: string): number => {
  const port = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid PORT value: ${raw}`);
  }
  return port;
};

/**
 * Resolve the server configuration. The process environment wins over the
 * `.env` file in `basePath`; empty values count as unset.
 */
export const readConfig = async (options: ConfigReadOptions = {}): Promise<ServerConfig> => {
  const env = options.env ?? process.env;
  const fileValues = await readEnvFile(resolveEnvPath(options.basePath));

  const pick = (key: string): string | undefined => {
    const fromEnv = env[key]?.trim();
    if (fromEnv) return fromEnv;
    const fromFile = fileValues[key]?.trim();
    return fromFile || undefined;
  };

  const rawPort = pick('PORT');
  return {
    port: rawPort === undefined ? DEFAULT_PORT : parsePort(rawPort),
    databaseUrl: pick('DATABASE_URL') ?? DEFAULT_DATABASE_URL
  };
};
