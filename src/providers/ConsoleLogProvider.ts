/**
 * Console-based log provider.
 * Keeps every event in an inspectable buffer (tests assert on it) and
 * optionally echoes to stdout/stderr.
 */

import { BaseLogProvider } from './BaseLogProvider.js';
import type { BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent, LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions extends BaseLogProviderOptions {
  /** Echo events as they arrive. warn/error go to stderr. Default: false. */
  outputToConsole?: boolean;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** All accepted events, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;

  constructor(options: ConsoleLogProviderOptions = {}) {
    super(options);
    this.outputToConsole = options.outputToConsole ?? false;
  }

  protected write(event: LogEvent): void {
    this.events.push(event);

    if (this.outputToConsole) {
      const line = `[${event.level.toUpperCase()}] ${event.message}${
        event.fields ? ` ${JSON.stringify(event.fields)}` : ''
      }`;
      if (event.level === 'warn' || event.level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // synchronous sink
  }

  /** Buffered events of one level. */
  byLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /** Clear the event buffer between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
