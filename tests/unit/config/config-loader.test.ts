/**
 * Config Loader Tests
 *
 * Uses temporary directories for config files and explicit env objects.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createConfigLoader } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'opensearch-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): void {
    writeFileSync(join(dir, 'opensearch.json'), JSON.stringify(content));
  }

  it('uses defaults when no file exists', async () => {
    const config = await createConfigLoader(join(dir, 'missing'), {}).load();

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over defaults', async () => {
    writeConfig({
      version: 1,
      applicationName: 'browser',
      locale: 'de_DE',
      http: { userAgent: 'browser/2.0' },
      logging: { level: 'info' },
    });

    const loader = createConfigLoader(dir, {});
    const config = await loader.load();

    expect(config.applicationName).toBe('browser');
    expect(config.locale).toBe('de_DE');
    expect(config.http).toEqual({ userAgent: 'browser/2.0', maxResponseBytes: 2 * 1024 * 1024 });
    expect(config.logging.level).toBe('info');
    expect(config.logging.pretty).toBe(true);
    expect(loader.getLoadedConfigFile()?.applicationName).toBe('browser');
  });

  it('lets environment variables win over the file', async () => {
    writeConfig({ applicationName: 'browser', suggestions: { timeoutMs: 5000 } });

    const config = await createConfigLoader(dir, {
      OPENSEARCH_APP_NAME: 'from-env',
      OPENSEARCH_LOCALE: 'fr_FR',
      OPENSEARCH_USER_AGENT: 'env-agent/1.0',
      OPENSEARCH_SUGGEST_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug',
    }).load();

    expect(config.applicationName).toBe('from-env');
    expect(config.locale).toBe('fr_FR');
    expect(config.http.userAgent).toBe('env-agent/1.0');
    expect(config.suggestions.timeoutMs).toBe(2500);
    expect(config.logging.level).toBe('debug');
  });

  it('ignores unusable environment values', async () => {
    const config = await createConfigLoader(dir, {
      OPENSEARCH_SUGGEST_TIMEOUT_MS: 'soon',
      LOG_LEVEL: 'loud',
    }).load();

    expect(config.suggestions.timeoutMs).toBe(DEFAULT_CONFIG.suggestions.timeoutMs);
    expect(config.logging.level).toBe(DEFAULT_CONFIG.logging.level);
  });

  it('finds the config directory under DATA_PATH', async () => {
    mkdirSync(join(dir, 'config'));
    writeFileSync(join(dir, 'config', 'opensearch.json'), JSON.stringify({ applicationName: 'data-path' }));

    const config = await createConfigLoader(undefined, { DATA_PATH: dir }).load();

    expect(config.applicationName).toBe('data-path');
    expect(config.paths).toEqual({ data: dir, config: join(dir, 'config') });
  });

  it('rejects unknown keys', async () => {
    writeConfig({ applicationName: 'x', colour: 'blue' });

    const error: unknown = await createConfigLoader(dir, {}).load().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('rejects values of the wrong type', async () => {
    writeConfig({ suggestions: { timeoutMs: -1 } });

    await expect(createConfigLoader(dir, {}).load()).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
    });
  });

  it('rejects invalid JSON', async () => {
    writeFileSync(join(dir, 'opensearch.json'), '{ not json');

    await expect(createConfigLoader(dir, {}).load()).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
    });
  });

  it('rejects a newer file version', async () => {
    writeConfig({ version: 99 });

    await expect(createConfigLoader(dir, {}).load()).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'Config file version (99) is newer than supported (1)',
    });
  });

  it('accepts the bundled config file', async () => {
    const config = await createConfigLoader('data/config', {}).load();

    expect(config.applicationName).toBe(DEFAULT_CONFIG.applicationName);
    expect(config.suggestions.timeoutMs).toBe(10_000);
  });
});
