import type { SupabaseClient } from '@supabase/supabase-js';
import type { SectionDraftRecord, SectionRef } from '../orchestrator/types.js';
import { SectionRowSchema } from './schemas.js';

/**
 * One draft record per guide section, keyed by (session, chapter, section).
 * saveDraft and markSaved resolve to false when the record does not exist.
 */
export interface SectionStore {
  initialize(sessionId: string, refs: SectionRef[]): Promise<void>;
  list(sessionId: string): Promise<SectionDraftRecord[]>;
  saveDraft(sessionId: string, ref: SectionRef, content: string): Promise<boolean>;
  markSaved(sessionId: string, ref: SectionRef): Promise<boolean>;
  nextPending(sessionId: string): Promise<SectionRef | null>;
}

const SECTION_COLUMNS = 'session_id, chapter_index, section_index, content, status, saved_at';

export class SupabaseSectionStore implements SectionStore {
  constructor(private readonly db: SupabaseClient) {}

  async initialize(sessionId: string, refs: SectionRef[]): Promise<void> {
    if (refs.length === 0) return;
    const rows = refs.map((ref) => ({
      session_id: sessionId,
      chapter_index: ref.chapter_index,
      section_index: ref.section_index,
      content: '',
      status: 'pending',
    }));
    const { error } = await this.db.from('draft_sections').insert(rows);
    if (error) throw new Error(`Failed to create section records: ${error.message}`);
  }

  async list(sessionId: string): Promise<SectionDraftRecord[]> {
    const { data, error } = await this.db
      .from('draft_sections')
      .select(SECTION_COLUMNS)
      .eq('session_id', sessionId)
      .order('chapter_index', { ascending: true })
      .order('section_index', { ascending: true });
    if (error) throw new Error(`Failed to list sections: ${error.message}`);
    return SectionRowSchema.array().parse(data ?? []);
  }

  async saveDraft(sessionId: string, ref: SectionRef, content: string): Promise<boolean> {
    const { data, error } = await this.db
      .from('draft_sections')
      .update({ content })
      .eq('session_id', sessionId)
      .eq('chapter_index', ref.chapter_index)
      .eq('section_index', ref.section_index)
      .select('chapter_index');
    if (error) throw new Error(`Failed to save draft: ${error.message}`);
    return Array.isArray(data) && data.length > 0;
  }

  async markSaved(sessionId: string, ref: SectionRef): Promise<boolean> {
    const { data: existing, error: readError } = await this.db
      .from('draft_sections')
      .select('status')
      .eq('session_id', sessionId)
      .eq('chapter_index', ref.chapter_index)
      .eq('section_index', ref.section_index)
      .maybeSingle();
    if (readError) throw new Error(`Failed to read section: ${readError.message}`);
    if (!existing) return false;
    if (SectionRowSchema.pick({ status: true }).parse(existing).status === 'saved') return true;

    const { error } = await this.db
      .from('draft_sections')
      .update({ status: 'saved', saved_at: new Date().toISOString() })
      .eq('session_id', sessionId)
      .eq('chapter_index', ref.chapter_index)
      .eq('section_index', ref.section_index);
    if (error) throw new Error(`Failed to mark section saved: ${error.message}`);
    return true;
  }

  async nextPending(sessionId: string): Promise<SectionRef | null> {
    const { data, error } = await this.db
      .from('draft_sections')
      .select('chapter_index, section_index')
      .eq('session_id', sessionId)
      .eq('status', 'pending')
      .order('chapter_index', { ascending: true })
      .order('section_index', { ascending: true })
      .limit(1)
      .maybeSingle();
    if (error) throw new Error(`Failed to find next pending section: ${error.message}`);
    if (!data) return null;
    const row = SectionRowSchema.pick({ chapter_index: true, section_index: true }).parse(data);
    return { chapter_index: row.chapter_index, section_index: row.section_index };
  }
}
