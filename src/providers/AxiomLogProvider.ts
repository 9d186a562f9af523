/**
 * Axiom log provider.
 * Buffers events and ships them in batches to Axiom's ingest API.
 * A failed flush keeps the batch for the next attempt; the buffer is
 * capped, dropping the oldest events first. Disabled (no-op) when
 * apiToken is empty.
 */

import { BaseLogProvider } from './BaseLogProvider.js';
import type { BaseLogProviderOptions } from './BaseLogProvider.js';
import type { LogEvent } from './ILogProvider.js';

export interface AxiomLogProviderOptions extends BaseLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  dataset: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000. 0 disables. */
  flushIntervalMs?: number;
  /** Buffer cap. Default: 1_000. */
  maxBufferSize?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends BaseLogProvider {
  private buffer: LogEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private readonly enabled: boolean;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  /** Events discarded because the buffer was full. */
  dropped = 0;
  /** Last ingest failure, cleared by a successful flush. */
  lastFlushError: string | null = null;

  constructor(options: AxiomLogProviderOptions) {
    super(options);
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 1_000;
    this.enabled = Boolean(this.apiToken);

    const intervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && intervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, intervalMs);
      this.flushTimer.unref();
    }
  }

  /** Number of events waiting to be shipped. */
  get pending(): number {
    return this.buffer.length;
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.buffer.push(event);
    if (this.buffer.length > this.maxBufferSize) {
      const excess = this.buffer.length - this.maxBufferSize;
      this.buffer.splice(0, excess);
      this.dropped += excess;
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.send([...this.buffer]).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  private async send(batch: LogEvent[]): Promise<void> {
    try {
      const response = await fetch(`${AXIOM_INGEST_URL}/${this.dataset}/ingest`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });

      if (!response.ok) {
        this.lastFlushError = `Axiom ingest responded ${response.status}`;
        return;
      }

      // Drop only what was shipped; events logged meanwhile stay queued.
      const shipped = new Set(batch);
      this.buffer = this.buffer.filter((e) => !shipped.has(e));
      this.lastFlushError = null;
    } catch (err) {
      this.lastFlushError = err instanceof Error ? err.message : String(err);
    }
  }
}
