/**
 * Consistency checker.
 * Scans every partnership row and reports mirrors that are missing,
 * duplicated or disagree on a shared field. Reports only: a broken pair
 * needs a human to decide which side is right.
 */

import { isDeepStrictEqual } from 'node:util';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IUnitOfWork } from '../repositories/ITransaction.js';
import { SHARED_PARTNERSHIP_FIELDS } from '../types/models.js';
import type { Partnership, SharedPartnershipField } from '../types/models.js';

export type ConsistencyIssueKind =
  | 'missing_mirror'
  | 'duplicate_mirror'
  | 'self_relationship'
  | 'diverged';

export interface ConsistencyIssue {
  kind: ConsistencyIssueKind;
  partnershipId: string;
  userId: string;
  partnerId: string;
  /** Mirror row, when one exists. */
  mirrorId?: string;
  /** Shared fields whose values differ (diverged only). */
  fields?: SharedPartnershipField[];
}

export interface ConsistencyReport {
  checked: number;
  issues: ConsistencyIssue[];
}

function pairKey(userId: string, partnerId: string): string {
  return `${userId}:${partnerId}`;
}

export function divergingFields(a: Partnership, b: Partnership): SharedPartnershipField[] {
  return SHARED_PARTNERSHIP_FIELDS.filter((field) => !isDeepStrictEqual(a[field], b[field]));
}

/** Pure scan of a snapshot of rows. */
export function findIssues(rows: readonly Partnership[]): ConsistencyIssue[] {
  const byPair = new Map<string, Partnership[]>();
  for (const row of rows) {
    const key = pairKey(row.userId, row.partnerId);
    byPair.set(key, [...(byPair.get(key) ?? []), row]);
  }

  const issues: ConsistencyIssue[] = [];
  const issue = (kind: ConsistencyIssueKind, row: Partnership, extra: Partial<ConsistencyIssue> = {}) =>
    issues.push({ kind, partnershipId: row.id, userId: row.userId, partnerId: row.partnerId, ...extra });

  for (const [, group] of byPair) {
    const [row, ...duplicates] = group;
    for (const duplicate of duplicates) {
      issue('duplicate_mirror', duplicate, { mirrorId: row.id });
    }

    if (row.userId === row.partnerId) {
      issue('self_relationship', row);
      continue;
    }

    const mirror = byPair.get(pairKey(row.partnerId, row.userId))?.[0];
    if (!mirror) {
      issue('missing_mirror', row);
      continue;
    }

    // each pair is compared once, from the side with the smaller id
    if (row.id < mirror.id) {
      const fields = divergingFields(row, mirror);
      if (fields.length > 0) issue('diverged', row, { mirrorId: mirror.id, fields });
    }
  }

  return issues;
}

export class ConsistencyService {
  constructor(
    private readonly uow: IUnitOfWork,
    private readonly logProvider?: ILogProvider
  ) {}

  async check(): Promise<ConsistencyReport> {
    const rows = await this.uow.run((tx) => tx.partnerships.findAll());
    const issues = findIssues(rows);

    for (const found of issues) {
      this.logProvider?.error('Partnership consistency issue', { ...found });
    }
    this.logProvider?.info('Partnership consistency check finished', {
      checked: rows.length,
      issues: issues.length,
    });

    return { checked: rows.length, issues };
  }
}
