/**
 * Shared plumbing for log providers: severity filtering, timestamps,
 * default fields and the level shorthands. Subclasses only decide where
 * a stamped event goes.
 */

import { LOG_LEVELS } from './ILogProvider.js';
import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

export interface BaseLogProviderOptions {
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Merged into every event's fields (event fields win). */
  defaultFields?: Record<string, unknown>;
}

export abstract class BaseLogProvider implements ILogProvider {
  private readonly minRank: number;
  private readonly defaultFields: Record<string, unknown> | undefined;

  protected constructor(options: BaseLogProviderOptions = {}) {
    this.minRank = LOG_LEVELS.indexOf(options.minLevel ?? 'debug');
    this.defaultFields = options.defaultFields;
  }

  protected abstract write(event: LogEvent): void;

  abstract flush(): Promise<void>;

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const fields =
      this.defaultFields || event.fields
        ? { ...this.defaultFields, ...event.fields }
        : undefined;

    this.write({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields ? { fields } : {}),
    });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
