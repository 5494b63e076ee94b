import type { SupabaseClient } from '@supabase/supabase-js';
import type { MemoryEntry } from '../orchestrator/types.js';
import { MemoryRowSchema } from './schemas.js';

export type NewMemoryEntry = Omit<MemoryEntry, 'created_at'>;

/**
 * Append-only conversational log, categorised by phase and section key.
 * search returns entries carrying every requested category, most recent first.
 */
export interface MemoryStore {
  append(entry: NewMemoryEntry): Promise<void>;
  search(sessionId: string, categories: string[], limit: number): Promise<MemoryEntry[]>;
}

export class SupabaseMemoryStore implements MemoryStore {
  constructor(private readonly db: SupabaseClient) {}

  async append(entry: NewMemoryEntry): Promise<void> {
    const { error } = await this.db.from('draft_memory_entries').insert({
      session_id: entry.session_id,
      role: entry.role,
      content: entry.content,
      categories: entry.categories,
    });
    if (error) throw new Error(`Failed to append memory entry: ${error.message}`);
  }

  async search(sessionId: string, categories: string[], limit: number): Promise<MemoryEntry[]> {
    const { data, error } = await this.db
      .from('draft_memory_entries')
      .select('session_id, role, content, categories, created_at')
      .eq('session_id', sessionId)
      .contains('categories', categories)
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(limit);
    if (error) throw new Error(`Failed to search memory: ${error.message}`);
    return MemoryRowSchema.array().parse(data ?? []);
  }
}
