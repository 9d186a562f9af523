/**
 * Supabase implementation of ITransactionBackend.
 * Reads go straight to the tables; a commit hands the whole changeset to
 * the apply_changeset() Postgres function, which applies it in one
 * database transaction (see supabase/migrations).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { TransientError, WriteConflictError } from '../errors.js';
import type {
  AnswerRow,
  ChangesetResult,
  InteractionRow,
  PartnershipRow,
  QuestionRow,
  UserAchievementRow,
  UserRow,
} from '../types/database.js';
import type { Changeset, ITransactionBackend, RowReader } from './ITransactionBackend.js';
import {
  changesetToPayload,
  rowToAnswer,
  rowToGrant,
  rowToInteraction,
  rowToPartnership,
  rowToQuestion,
  rowToUser,
} from './mappers.js';

function unavailable(action: string, message: string): TransientError {
  return new TransientError('STORE_UNAVAILABLE', `Failed to ${action}: ${message}`);
}

export class SupabaseBackend implements ITransactionBackend {
  constructor(private readonly db: SupabaseClient) {}

  reader(signal: AbortSignal): RowReader {
    const db = this.db;

    return {
      async userById(id) {
        const { data, error } = await db
          .from('users')
          .select('*')
          .eq('id', id)
          .abortSignal(signal)
          .maybeSingle();

        if (error) throw unavailable('find user', error.message);
        return data ? rowToUser(data as UserRow) : null;
      },

      async partnershipById(id) {
        const { data, error } = await db
          .from('partnerships')
          .select('*')
          .eq('id', id)
          .abortSignal(signal)
          .maybeSingle();

        if (error) throw unavailable('find partnership', error.message);
        return data ? rowToPartnership(data as PartnershipRow) : null;
      },

      async partnershipByPair(userId, partnerId) {
        const { data, error } = await db
          .from('partnerships')
          .select('*')
          .eq('user_id', userId)
          .eq('partner_id', partnerId)
          .abortSignal(signal)
          .maybeSingle();

        if (error) throw unavailable('find partnership by pair', error.message);
        return data ? rowToPartnership(data as PartnershipRow) : null;
      },

      async partnershipsByUser(userId) {
        const { data, error } = await db
          .from('partnerships')
          .select('*')
          .eq('user_id', userId)
          .order('inserted_at', { ascending: true })
          .abortSignal(signal);

        if (error) throw unavailable('list partnerships', error.message);
        return ((data ?? []) as PartnershipRow[]).map(rowToPartnership);
      },

      async allPartnerships() {
        const { data, error } = await db
          .from('partnerships')
          .select('*')
          .abortSignal(signal);

        if (error) throw unavailable('list all partnerships', error.message);
        return ((data ?? []) as PartnershipRow[]).map(rowToPartnership);
      },

      async interactionsByPartnerships(partnershipIds, since) {
        if (partnershipIds.length === 0) return [];

        let query = db
          .from('partnership_interactions')
          .select('*')
          .in('partnership_id', [...partnershipIds]);
        if (since) query = query.gte('inserted_at', since.toISOString());

        const { data, error } = await query
          .order('inserted_at', { ascending: false })
          .abortSignal(signal);

        if (error) throw unavailable('list interactions', error.message);
        return ((data ?? []) as InteractionRow[]).map(rowToInteraction);
      },

      async grantExists(userId, achievementType) {
        const { count, error } = await db
          .from('user_achievements')
          .select('*', { count: 'exact', head: true })
          .eq('user_id', userId)
          .eq('achievement_type', achievementType)
          .abortSignal(signal);

        if (error) throw unavailable('check achievement', error.message);
        return (count ?? 0) > 0;
      },

      async grantsByUser(userId) {
        const { data, error } = await db
          .from('user_achievements')
          .select('*')
          .eq('user_id', userId)
          .order('granted_at', { ascending: true })
          .abortSignal(signal);

        if (error) throw unavailable('list achievements', error.message);
        return ((data ?? []) as UserAchievementRow[]).map(rowToGrant);
      },

      async questionById(id) {
        const { data, error } = await db
          .from('questions')
          .select('*')
          .eq('id', id)
          .abortSignal(signal)
          .maybeSingle();

        if (error) throw unavailable('find question', error.message);
        return data ? rowToQuestion(data as QuestionRow) : null;
      },

      async activeQuestions() {
        const { data, error } = await db
          .from('questions')
          .select('*')
          .eq('active', true)
          .abortSignal(signal);

        if (error) throw unavailable('list questions', error.message);
        return ((data ?? []) as QuestionRow[]).map(rowToQuestion);
      },

      async answerById(id) {
        const { data, error } = await db
          .from('answers')
          .select('*')
          .eq('id', id)
          .abortSignal(signal)
          .maybeSingle();

        if (error) throw unavailable('find answer', error.message);
        return data ? rowToAnswer(data as AnswerRow) : null;
      },

      async answersByUser(userId) {
        const { data, error } = await db
          .from('answers')
          .select('*')
          .eq('user_id', userId)
          .order('inserted_at', { ascending: false })
          .abortSignal(signal);

        if (error) throw unavailable('list answers', error.message);
        return ((data ?? []) as AnswerRow[]).map(rowToAnswer);
      },

      async answersByPartnerships(partnershipIds) {
        if (partnershipIds.length === 0) return [];

        const { data, error } = await db
          .from('answers')
          .select('*')
          .in('partnership_id', [...partnershipIds])
          .order('inserted_at', { ascending: false })
          .abortSignal(signal);

        if (error) throw unavailable('list partnership answers', error.message);
        return ((data ?? []) as AnswerRow[]).map(rowToAnswer);
      },
    };
  }

  async commit(changeset: Changeset): Promise<void> {
    const { data, error } = await this.db.rpc('apply_changeset', {
      p_changeset: changesetToPayload(changeset),
    });

    if (error) throw unavailable('apply changeset', error.message);

    const result = data as ChangesetResult;
    if (result.status === 'conflict') {
      throw new WriteConflictError(result.reason);
    }
  }
}
