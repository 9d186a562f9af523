/**
 * Runtime input checks shared by the services.
 * Each check appends human-readable messages to an error list; the
 * service throws one ValidationError carrying all of them.
 */

import { ValidationError } from '../errors.js';
import {
  ANSWER_VISIBILITIES,
  INTERACTION_TYPES,
  PARTNERSHIP_STATUSES,
} from '../types/models.js';
import type {
  AnswerVisibility,
  CustomSettings,
  InteractionType,
  PartnershipStatus,
} from '../types/models.js';

export const MAX_NICKNAME_LENGTH = 50;
export const MAX_ANSWER_LENGTH = 2000;
export const MAX_REACTION_LENGTH = 32;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPartnershipStatus(value: unknown): value is PartnershipStatus {
  return PARTNERSHIP_STATUSES.some((status) => status === value);
}

export function isInteractionType(value: unknown): value is InteractionType {
  return INTERACTION_TYPES.some((type) => type === value);
}

export function isAnswerVisibility(value: unknown): value is AnswerVisibility {
  return ANSWER_VISIBILITIES.some((visibility) => visibility === value);
}

/** Throw one ValidationError listing every collected message. */
export function assertValid(errors: readonly string[]): void {
  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), { fields: [...errors] });
  }
}

export function checkStatus(value: unknown, errors: string[]): void {
  if (!isPartnershipStatus(value)) {
    errors.push(`status must be one of: ${PARTNERSHIP_STATUSES.join(', ')}`);
  }
}

export function checkNickname(value: unknown, errors: string[]): void {
  if (value === undefined || value === null) return;
  if (typeof value !== 'string') {
    errors.push('nickname must be a string');
  } else if (value.length > MAX_NICKNAME_LENGTH) {
    errors.push(`nickname must be at most ${MAX_NICKNAME_LENGTH} characters`);
  }
}

function section(
  settings: Record<string, unknown>,
  key: keyof CustomSettings,
  errors: string[]
): Record<string, unknown> {
  const value = settings[key];
  if (!isRecord(value)) {
    errors.push(`customSettings.${key} is required and must be an object`);
    return {};
  }
  for (const [flag, flagValue] of Object.entries(value)) {
    if (typeof flagValue !== 'boolean') {
      errors.push(`customSettings.${key}.${flag} must be a boolean`);
    }
  }
  return value;
}

function flag(values: Record<string, unknown>, key: string): boolean {
  const value = values[key];
  return typeof value === 'boolean' ? value : true;
}

/**
 * Validate a settings object and return it in canonical shape.
 * Missing flags inside a present section default to true.
 */
export function parseCustomSettings(value: unknown, errors: string[]): CustomSettings | null {
  if (!isRecord(value)) {
    errors.push('customSettings must be an object');
    return null;
  }

  const before = errors.length;
  const notifications = section(value, 'notificationPreferences', errors);
  const privacy = section(value, 'privacySettings', errors);
  const display = section(value, 'displayPreferences', errors);
  if (errors.length > before) return null;

  return {
    notificationPreferences: {
      answers: flag(notifications, 'answers'),
      dailyReminder: flag(notifications, 'dailyReminder'),
      achievements: flag(notifications, 'achievements'),
    },
    privacySettings: {
      shareStreak: flag(privacy, 'shareStreak'),
      shareAchievements: flag(privacy, 'shareAchievements'),
    },
    displayPreferences: {
      showLevel: flag(display, 'showLevel'),
      showStreak: flag(display, 'showStreak'),
    },
  };
}
