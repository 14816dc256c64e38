import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files, null = no file output */
  logDir: string | null;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: null,
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_FILE_PREFIX = 'opensearch-';

/**
 * Generate timestamp-based log filename.
 */
function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_FILE_PREFIX}${timestamp}.log`;
}

/**
 * Cleanup old log files, keeping only the most recent maxFiles.
 * Also removes empty log files.
 */
function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime) // newest first
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch {
      // Another process may have removed it already
    }
  }
}

/**
 * Create a configured logger instance.
 *
 * Console output goes to stderr so that commands printing results on stdout
 * stay pipeable. When `logDir` is set, a timestamped file is written as well
 * and old or empty files are pruned.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true, destination: 2 },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 2 },
    });
  }

  if (logDir) {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs(logDir, maxFiles);

    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
        colorize: false,
      },
    });
  }

  return pino({ level, transport: { targets } });
}

/**
 * Logger that discards everything. Default for library components when the
 * caller does not inject one.
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
