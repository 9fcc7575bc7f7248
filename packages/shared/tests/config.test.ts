import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir, remove } from 'fs-extra';
import { loadConfig, ConfigError } from '../src/config.js';

describe('loadConfig', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = path.join(process.cwd(), 'test-output', 'config');
    configPath = path.join(testDir, 'token.config');
    await ensureDir(testDir);
  });

  afterEach(async () => {
    await remove(testDir);
  });

  it('should read the token from the config file', async () => {
    await fs.writeFile(configPath, 'MEDIUM_AUTH_TOKEN=test-token\n');

    const config = await loadConfig({ configPath, env: {} });

    expect(config).toEqual({
      token: 'test-token',
      baseUrl: 'https://api.medium.com/v1',
      timeoutMs: 60000,
    });
  });

  it('should prefer values already present in the environment', async () => {
    await fs.writeFile(configPath, 'MEDIUM_AUTH_TOKEN=file-token\n');

    const config = await loadConfig({ configPath, env: { MEDIUM_AUTH_TOKEN: 'env-token' } });

    expect(config.token).toBe('env-token');
  });

  it('should apply optional overrides and strip trailing slashes', async () => {
    await fs.writeFile(
      configPath,
      [
        'MEDIUM_AUTH_TOKEN="test-token"',
        'MEDIUM_API_BASE_URL=http://localhost:4010/v1/',
        'MEDIUM_REQUEST_TIMEOUT_MS=5000',
      ].join('\n')
    );

    const config = await loadConfig({ configPath, env: {} });

    expect(config).toEqual({
      token: 'test-token',
      baseUrl: 'http://localhost:4010/v1',
      timeoutMs: 5000,
    });
  });

  it('should fail when the token is missing everywhere', async () => {
    await expect(
      loadConfig({ configPath: path.join(testDir, 'missing.config'), env: {} })
    ).rejects.toThrow(ConfigError);
    await expect(
      loadConfig({ configPath: path.join(testDir, 'missing.config'), env: {} })
    ).rejects.toThrow('MEDIUM_AUTH_TOKEN is not set');
  });

  it('should treat an empty token as missing', async () => {
    await fs.writeFile(configPath, 'MEDIUM_AUTH_TOKEN=\n');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow('MEDIUM_AUTH_TOKEN is not set');
  });

  it('should reject an invalid timeout', async () => {
    await fs.writeFile(configPath, 'MEDIUM_AUTH_TOKEN=test-token\nMEDIUM_REQUEST_TIMEOUT_MS=soon\n');

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow('Invalid configuration');
  });

  it('should not write anything into the given environment', async () => {
    await fs.writeFile(configPath, 'MEDIUM_AUTH_TOKEN=test-token\n');
    const env: Record<string, string | undefined> = {};

    await loadConfig({ configPath, env });

    expect(env).toEqual({});
  });
});
