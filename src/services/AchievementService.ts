/**
 * Achievement ledger and reward dispatcher.
 * Grants run inside the caller's transaction: the grant row, the points
 * and the user's achievement list commit together or not at all.
 */

import { getAchievement } from '../engine/achievements.js';
import type { AchievementCategory, MetricsSnapshot } from '../engine/achievements.js';
import { evaluateAchievements } from '../engine/achievements.js';
import { NotFoundError } from '../errors.js';
import { userTopic } from '../providers/INotificationSink.js';
import type { TransactionScope } from '../repositories/ITransaction.js';
import type { Partnership } from '../types/models.js';
import type { Outbox } from './NotificationDispatcher.js';

export class AchievementService {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Grant `type` to `userId` unless already held.
   * Returns false when the user already has it (no points, no message).
   */
  async grant(
    tx: TransactionScope,
    userId: string,
    type: string,
    outbox: Outbox
  ): Promise<boolean> {
    const definition = getAchievement(type);

    if (await tx.achievements.exists(userId, type)) return false;

    const user = await tx.users.findById(userId);
    if (!user) {
      throw new NotFoundError(`User "${userId}" not found`, { userId });
    }

    await tx.achievements.insert({ userId, achievementType: type, grantedAt: this.clock() });
    await tx.users.update({
      ...user,
      points: user.points + definition.points,
      stats: {
        ...user.stats,
        achievements: user.stats.achievements.includes(type)
          ? user.stats.achievements
          : [...user.stats.achievements, type],
      },
    });

    outbox.add(userTopic(userId), 'achievement_unlocked', {
      achievementType: type,
      title: definition.title,
      description: definition.description,
      points: definition.points,
    });
    return true;
  }

  /**
   * Evaluate pair-scoped rules and grant what the pair newly earned to both
   * members. Both mirror rows get the same achievements list.
   * Returns the newly earned types.
   */
  async grantToPair(
    tx: TransactionScope,
    forward: Partnership,
    reverse: Partnership,
    categories: readonly AchievementCategory[],
    metrics: MetricsSnapshot,
    outbox: Outbox
  ): Promise<string[]> {
    const earned = evaluateAchievements(categories, metrics, forward.achievements);
    if (earned.length === 0) return [];

    for (const type of earned) {
      await this.grant(tx, forward.userId, type, outbox);
      await this.grant(tx, forward.partnerId, type, outbox);
    }

    const achievements = [...forward.achievements, ...earned];
    await tx.partnerships.update({ ...forward, achievements });
    await tx.partnerships.update({ ...reverse, achievements });
    return earned;
  }

  /** Evaluate user-scoped rules against the user's ledger and grant the rest. */
  async grantToUser(
    tx: TransactionScope,
    userId: string,
    categories: readonly AchievementCategory[],
    metrics: MetricsSnapshot,
    outbox: Outbox
  ): Promise<string[]> {
    const held = (await tx.achievements.findByUser(userId)).map((g) => g.achievementType);
    const earned = evaluateAchievements(categories, metrics, held);

    for (const type of earned) {
      await this.grant(tx, userId, type, outbox);
    }
    return earned;
  }
}
