import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '../core/errors.js';
import {
  CONFIG_FILE_NAME,
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  configFileSchema,
  type ConfigFile,
  type MergedConfig,
} from './config-schema.js';

const LOG_LEVELS: readonly MergedConfig['logging']['level'][] = ['debug', 'info', 'warn', 'error'];

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/opensearch.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private loadedConfig: ConfigFile | null = null;

  constructor(
    private readonly configPath: string | null = null,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    const config = this.deepClone(DEFAULT_CONFIG);

    // DATA_PATH moves the config directory, so it applies before the file is read
    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
    }

    this.loadedConfig = await this.loadConfigFile(this.configPath ?? config.paths.config);
    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);
    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): ConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Load and validate the config file. A missing file is not an error.
   */
  private async loadConfigFile(directory: string): Promise<ConfigFile | null> {
    const filePath = join(directory, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to read config file ${filePath}: ${message}`, 'CONFIG_UNREADABLE');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Config file ${filePath} is not valid JSON: ${message}`, 'CONFIG_INVALID');
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Config file ${filePath} is invalid: ${issues}`, 'CONFIG_INVALID');
    }

    if (parsed.data.version !== undefined && parsed.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigError(
        `Config file version (${String(parsed.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`,
        'CONFIG_INVALID'
      );
    }

    return parsed.data;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: MergedConfig, file: ConfigFile): void {
    if (file.applicationName !== undefined) {
      config.applicationName = file.applicationName;
    }
    if (file.locale !== undefined) {
      config.locale = file.locale;
    }

    if (file.http) {
      if (file.http.userAgent !== undefined) config.http.userAgent = file.http.userAgent;
      if (file.http.maxResponseBytes !== undefined) {
        config.http.maxResponseBytes = file.http.maxResponseBytes;
      }
    }

    if (file.suggestions?.timeoutMs !== undefined) {
      config.suggestions.timeoutMs = file.suggestions.timeoutMs;
    }

    if (file.logging) {
      if (file.logging.level !== undefined) config.logging.level = file.logging.level;
      if (file.logging.pretty !== undefined) config.logging.pretty = file.logging.pretty;
      if (file.logging.logDir !== undefined) config.logging.logDir = file.logging.logDir;
      if (file.logging.maxFiles !== undefined) config.logging.maxFiles = file.logging.maxFiles;
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const appName = this.env['OPENSEARCH_APP_NAME'];
    if (appName) {
      config.applicationName = appName;
    }

    const locale = this.env['OPENSEARCH_LOCALE'];
    if (locale) {
      config.locale = locale;
    }

    const userAgent = this.env['OPENSEARCH_USER_AGENT'];
    if (userAgent) {
      config.http.userAgent = userAgent;
    }

    const timeout = this.env['OPENSEARCH_SUGGEST_TIMEOUT_MS'];
    if (timeout) {
      const timeoutMs = parseInt(timeout, 10);
      if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
        config.suggestions.timeoutMs = timeoutMs;
      }
    }

    const logLevel = this.env['LOG_LEVEL'];
    const level = LOG_LEVELS.find((l) => l === logLevel);
    if (level) {
      config.logging.level = level;
    }
  }

  /**
   * Deep clone an object.
   */
  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath ?? null, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}
