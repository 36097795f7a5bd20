/**
 * Level-filtered logging to stderr
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

type LoggerConfig = {
  level: LogLevel;
  prefix?: string;
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && LEVELS.some(level => level === value);

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: 'info' }) {
    this.level = config.level;
    this.prefix = config.prefix || 'schema-scout';
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (!this.shouldLog(level)) return;
    // stdout stays free for anything piped out of the server process
    process.stderr.write(
      `[${this.prefix}] ${level.toUpperCase()}: ${message}${meta ? ` ${JSON.stringify(meta)}` : ''}\n`
    );
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
