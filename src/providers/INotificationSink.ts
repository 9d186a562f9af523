/**
 * Outbound notification channel.
 * Delivery is best-effort: callers go through NotificationDispatcher,
 * which retries and never lets a sink failure reach the caller.
 */

export type NotificationEvent =
  | 'partnership_request'
  | 'status_changed'
  | 'new_interaction'
  | 'milestone_reached'
  | 'settings_updated'
  | 'achievement_unlocked'
  | 'new_answer'
  | 'new_reaction';

export interface Notification {
  /** `user:<userId>` or `partnerships:<partnershipId>`. */
  topic: string;
  event: NotificationEvent;
  payload: Record<string, unknown>;
}

export interface INotificationSink {
  /** Deliver one message. Rejects when delivery failed. */
  broadcast(topic: string, event: NotificationEvent, payload: Record<string, unknown>): Promise<void>;
}

export function userTopic(userId: string): string {
  return `user:${userId}`;
}

export function partnershipTopic(partnershipId: string): string {
  return `partnerships:${partnershipId}`;
}
