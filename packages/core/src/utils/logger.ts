import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

/**
 * Level for the shared logger.
 *
 * MODKIT_LOG_LEVEL names a level outright; otherwise MODKIT_VERBOSE=1 means
 * debug and NODE_ENV=development means info. Anything else logs errors only.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = env[ENV_VARS.LOG_LEVEL]?.trim().toLowerCase();
  if (explicit && isLogLevel(explicit)) {
    return explicit;
  }
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

/**
 * Render log metadata. Errors, nested ones included, keep their name and
 * message plus the code and details modkit errors carry.
 */
export function formatLogMeta(meta: unknown): string {
  if (meta !== null && typeof meta === 'object') {
    return `\n${JSON.stringify(meta, errorReplacer, 2)}`;
  }
  return meta === undefined ? '' : ` ${String(meta)}`;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (!(value instanceof Error)) {
    return value;
  }
  const serialized: Record<string, unknown> = { name: value.name, message: value.message };
  if ('code' in value && value.code !== undefined) {
    serialized.code = value.code;
  }
  if ('details' in value && value.details !== undefined) {
    serialized.details = value.details;
  }
  return serialized;
}

/**
 * Console logger writing to stderr, so command output on stdout stays clean
 */
class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(`${new Date().toISOString()} ${PREFIXES[level]} ${message}${formatLogMeta(meta)}`);
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new ConsoleLogger(resolveLogLevel());
