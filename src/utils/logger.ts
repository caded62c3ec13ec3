/**
 * Process-wide logger
 * Writes coloured lines to stderr so stdout stays clean for piping
 */

import chalk from 'chalk';

type LogMeta = Record<string, unknown>;

const REDACTED_KEYS = ['token', 'apikey', 'authorization', 'password', 'secret'];

export class Logger {
  constructor(private debugEnabled: boolean = false) {}

  get isDebug(): boolean {
    return this.debugEnabled;
  }

  debug(message: string, meta?: LogMeta): void {
    if (!this.debugEnabled) return;
    this.write(chalk.gray('[debug]'), message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(chalk.blue('[info]'), message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(chalk.yellow('[warn]'), message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write(chalk.red('[error]'), message, meta);
  }

  private write(prefix: string, message: string, meta?: LogMeta): void {
    const suffix = meta ? ' ' + chalk.dim(JSON.stringify(redact(meta))) : '';
    process.stderr.write(`${prefix} ${message}${suffix}\n`);
  }
}

/**
 * Mask values whose key looks like a credential, recursing into nested objects
 */
export function redact(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    const lower = key.toLowerCase().replace(/[-_]/g, '');
    if (REDACTED_KEYS.some((k) => lower.includes(k))) {
      out[key] = '[REDACTED]';
    } else {
      out[key] = redactValue(value);
    }
  }
  return out;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (typeof value === 'object' && value !== null) {
    return redact(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

let instance = new Logger();

export function initLogger(debug: boolean): Logger {
  instance = new Logger(debug);
  return instance;
}

export function getLogger(): Logger {
  return instance;
}
