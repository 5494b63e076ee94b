import type { SupabaseClient } from '@supabase/supabase-js';
import {
  REQUIRED_INTAKE_FIELDS,
  type GuideTree,
  type IntakeAnswers,
  type SessionRecord,
} from '../orchestrator/types.js';
import { SessionRowSchema } from './schemas.js';

export interface IntakeUpdate {
  intake_json: IntakeAnswers;
  intake_done: boolean;
  /** True only on the update that supplied the last missing required field. */
  completed_now: boolean;
}

/**
 * Durable per-session record: guide tree, intake answers and the serialized
 * orchestrator state. Implementations throw on storage failures; callers in
 * the phase loop capture them as Results.
 */
export interface SessionStore {
  create(guide: GuideTree): Promise<SessionRecord>;
  delete(sessionId: string): Promise<void>;
  get(sessionId: string): Promise<SessionRecord | null>;
  storeIntakeField(sessionId: string, field: string, value: string): Promise<IntakeUpdate>;
  loadState(sessionId: string): Promise<unknown>;
  saveState(sessionId: string, state: unknown): Promise<void>;
}

export function missingIntakeFields(intake: IntakeAnswers): string[] {
  return REQUIRED_INTAKE_FIELDS.filter((field) => !(field in intake));
}

/**
 * Merge one answer into the intake record. Answers only accumulate, and
 * intake_done never goes back to false once set.
 */
export function applyIntakeAnswer(
  record: Pick<SessionRecord, 'intake_json' | 'intake_done'>,
  field: string,
  value: string,
): IntakeUpdate {
  const intake_json = { ...record.intake_json, [field]: value };
  const allPresent = missingIntakeFields(intake_json).length === 0;
  const completed_now = allPresent && !record.intake_done;
  return { intake_json, intake_done: record.intake_done || allPresent, completed_now };
}

const SESSION_COLUMNS = 'session_id, guide_json, intake_json, intake_done, created_at';
// Postgres code for a malformed uuid, i.e. an id that cannot exist
const INVALID_TEXT_REPRESENTATION = '22P02';

export class SupabaseSessionStore implements SessionStore {
  constructor(private readonly db: SupabaseClient) {}

  async create(guide: GuideTree): Promise<SessionRecord> {
    const { data, error } = await this.db
      .from('draft_sessions')
      .insert({ guide_json: guide, intake_json: {}, intake_done: false })
      .select(SESSION_COLUMNS)
      .single();
    if (error) throw new Error(`Failed to create session: ${error.message}`);
    return SessionRowSchema.parse(data);
  }

  async delete(sessionId: string): Promise<void> {
    const { error } = await this.db
      .from('draft_sessions')
      .delete()
      .eq('session_id', sessionId);
    if (error) throw new Error(`Failed to delete session: ${error.message}`);
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const { data, error } = await this.db
      .from('draft_sessions')
      .select(SESSION_COLUMNS)
      .eq('session_id', sessionId)
      .maybeSingle();
    if (error) {
      if (error.code === INVALID_TEXT_REPRESENTATION) return null;
      throw new Error(`Failed to load session: ${error.message}`);
    }
    return data ? SessionRowSchema.parse(data) : null;
  }

  async storeIntakeField(sessionId: string, field: string, value: string): Promise<IntakeUpdate> {
    const session = await this.get(sessionId);
    if (!session) throw new Error(`Session ${sessionId} not found`);

    const update = applyIntakeAnswer(session, field, value);
    const { error } = await this.db
      .from('draft_sessions')
      .update({ intake_json: update.intake_json, intake_done: update.intake_done })
      .eq('session_id', sessionId);
    if (error) throw new Error(`Failed to store intake field: ${error.message}`);
    return update;
  }

  async loadState(sessionId: string): Promise<unknown> {
    const { data, error } = await this.db
      .from('draft_sessions')
      .select('state_json')
      .eq('session_id', sessionId)
      .maybeSingle();
    if (error) throw new Error(`Failed to load orchestrator state: ${error.message}`);
    const row: unknown = data;
    if (!row || typeof row !== 'object' || !('state_json' in row)) return null;
    return row.state_json ?? null;
  }

  async saveState(sessionId: string, state: unknown): Promise<void> {
    const { error } = await this.db
      .from('draft_sessions')
      .update({ state_json: state })
      .eq('session_id', sessionId);
    if (error) throw new Error(`Failed to save orchestrator state: ${error.message}`);
  }
}
