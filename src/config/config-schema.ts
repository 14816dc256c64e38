import { z } from 'zod';

/**
 * Config file schema (data/config/opensearch.json).
 * All fields are optional - defaults are used for missing values.
 */
export const configFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive().optional(),

    /** Value substituted for `{source}` template parameters */
    applicationName: z.string().min(1).optional(),

    /** Locale behind `{language}`, e.g. "en_US"; null = system locale */
    locale: z.string().min(1).nullable().optional(),

    http: z
      .object({
        /** User-Agent sent with suggestion and image requests */
        userAgent: z.string().min(1).optional(),
        /** Maximum accepted response size in bytes */
        maxResponseBytes: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    suggestions: z
      .object({
        /** Deadline applied by the CLI to a suggestions request */
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
        pretty: z.boolean().optional(),
        /** Directory for log files; null disables file output */
        logDir: z.string().min(1).nullable().optional(),
        maxFiles: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merged configuration (defaults + file + env).
 */
export interface MergedConfig {
  applicationName: string;
  locale: string | null;
  http: {
    userAgent: string;
    maxResponseBytes: number;
  };
  suggestions: {
    timeoutMs: number;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    pretty: boolean;
    logDir: string | null;
    maxFiles: number;
  };
  paths: {
    data: string;
    config: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  applicationName: 'opensearch-description',
  locale: null,
  http: {
    userAgent: 'opensearch-description/0.1',
    maxResponseBytes: 2 * 1024 * 1024,
  },
  suggestions: {
    timeoutMs: 10_000,
  },
  logging: {
    level: 'warn',
    pretty: true,
    logDir: null,
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
  },
};

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

/** Name of the config file inside the config directory */
export const CONFIG_FILE_NAME = 'opensearch.json';
