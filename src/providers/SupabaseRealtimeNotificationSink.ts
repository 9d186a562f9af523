/**
 * Supabase Realtime implementation of INotificationSink.
 * Sends a broadcast message on a channel named after the topic; clients
 * subscribed to that channel receive it. The channel is released after
 * each send.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { INotificationSink, NotificationEvent } from './INotificationSink.js';

export class SupabaseRealtimeNotificationSink implements INotificationSink {
  constructor(private readonly db: SupabaseClient) {}

  async broadcast(
    topic: string,
    event: NotificationEvent,
    payload: Record<string, unknown>
  ): Promise<void> {
    const channel = this.db.channel(topic);

    try {
      const status = await channel.send({ type: 'broadcast', event, payload });
      if (status !== 'ok') {
        throw new Error(`Failed to broadcast ${event} on ${topic}: ${status}`);
      }
    } finally {
      await this.db.removeChannel(channel);
    }
  }
}
