import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'dotenv';
import { EnvironmentConfigSchema, type MediumConfig } from './types.js';

export const DEFAULT_CONFIG_PATH = path.join('config', 'token.config');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** dotenv-style file holding MEDIUM_AUTH_TOKEN */
  configPath?: string;
  /** Takes precedence over values from the file */
  env?: Record<string, string | undefined>;
}

async function readEnvFile(configPath: string): Promise<Record<string, string>> {
  try {
    const raw = await fs.readFile(configPath, 'utf-8');
    return parse(raw);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(
      `Failed to read config file "${configPath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load the Medium configuration from the token file and environment.
 * Nothing is written back to process.env.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MediumConfig> {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const env = options.env ?? process.env;
  const fileValues = await readEnvFile(configPath);

  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) merged[key] = value;
  }

  if (!merged.MEDIUM_AUTH_TOKEN?.trim()) {
    throw new ConfigError(`MEDIUM_AUTH_TOKEN is not set (looked in ${configPath} and the environment)`);
  }

  const parsed = EnvironmentConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return Object.freeze({
    token: parsed.data.MEDIUM_AUTH_TOKEN,
    baseUrl: parsed.data.MEDIUM_API_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: parsed.data.MEDIUM_REQUEST_TIMEOUT_MS,
  });
}
