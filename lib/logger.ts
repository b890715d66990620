/**
 * logger.ts
 * Leveled console logger with a context tag per call.
 */

import { env, LOG_LEVELS, type LogLevel } from './env';

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private formatData(data?: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'string') return data;
    if (data instanceof Error) return `${data.name}: ${data.message}\n${data.stack || ''}`;

    if (typeof data === 'object') {
      try {
        return JSON.stringify(data, (_key, value: unknown) => {
          // nested errors lose their fields under plain JSON.stringify
          if (value instanceof Error) {
            return { name: value.name, message: value.message, stack: value.stack };
          }
          return value;
        }, 2);
      } catch {
        return String(data);
      }
    }
    return String(data);
  }

  debug(context: string, message: string, data?: unknown) {
    if (this.enabled('debug')) console.debug(`[${context}] ${message}`, this.formatData(data));
  }

  info(context: string, message: string, data?: unknown) {
    if (this.enabled('info')) console.info(`[${context}] ${message}`, this.formatData(data));
  }

  warn(context: string, message: string, data?: unknown) {
    if (this.enabled('warn')) console.warn(`[${context}] ${message}`, this.formatData(data));
  }

  error(context: string, message: string, data?: unknown) {
    console.error(`[${context}] ${message}`, this.formatData(data));
  }
}

export const logger = new Logger(env.LOG_LEVEL);
