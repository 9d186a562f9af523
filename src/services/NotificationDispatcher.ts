/**
 * Notification dispatcher.
 * Wraps the notification sink with bounded retries and linear backoff.
 * Delivery happens in the background: publish() returns immediately and
 * failures end up in the log, never in the caller.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  INotificationSink,
  Notification,
  NotificationEvent,
} from '../providers/INotificationSink.js';

/** Notifications collected during one unit-of-work run, published after commit. */
export class Outbox {
  private readonly items: Notification[] = [];

  add(topic: string, event: NotificationEvent, payload: Record<string, unknown>): void {
    this.items.push({ topic, event, payload });
  }

  get notifications(): readonly Notification[] {
    return this.items;
  }
}

export interface NotificationDispatcherOptions {
  /** Tries per notification. Default: 3. */
  maxAttempts?: number;
  /** Wait before retry n is backoffMs * n. Default: 200. */
  backoffMs?: number;
  logProvider?: ILogProvider;
  /** Default: timers/promises setTimeout. */
  sleep?: (ms: number) => Promise<unknown>;
}

export class NotificationDispatcher {
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly sink: INotificationSink,
    private readonly options: NotificationDispatcherOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 200;
    this.sleep = options.sleep ?? sleep;
  }

  /** Start delivering `notifications`. Never throws. */
  publish(notifications: readonly Notification[]): void {
    for (const notification of notifications) {
      const delivery: Promise<void> = this.deliver(notification).finally(() => {
        this.inFlight.delete(delivery);
      });
      this.inFlight.add(delivery);
    }
  }

  /** Resolve once every delivery started so far has finished or given up. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async deliver(notification: Notification): Promise<void> {
    const { topic, event, payload } = notification;
    const log = this.options.logProvider;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.sink.broadcast(topic, event, payload);
        return;
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        log?.warn('Notification delivery failed', { topic, event, attempt, error });

        if (attempt === this.maxAttempts) {
          log?.error('Notification dropped after retries', {
            topic,
            event,
            attempts: attempt,
            error,
          });
          return;
        }

        await this.sleep(this.backoffMs * attempt);
      }
    }
  }
}
