import { attempt, type Result } from '../lib/result.js';
import type { MemoryEntry, MemoryRole, PhaseContext } from './types.js';

/**
 * Append to the conversational log. A failed write is logged and reported
 * as false; the turn carries on without it.
 */
export async function remember(
  ctx: PhaseContext,
  role: MemoryRole,
  content: string,
  categories: string[],
): Promise<boolean> {
  const result = await attempt(() =>
    ctx.memory.append({ session_id: ctx.session.session_id, role, content, categories }),
  );
  if (!result.ok) {
    ctx.log.warn({ error: result.error.message, categories }, 'Failed to append memory entry');
  }
  return result.ok;
}

/** Most recent entries carrying all categories, newest first. */
export function recall(
  ctx: PhaseContext,
  categories: string[],
  limit: number,
): Promise<Result<MemoryEntry[]>> {
  return attempt(() => ctx.memory.search(ctx.session.session_id, categories, limit));
}

/** Recent entries as `role: content` lines, oldest first, for prompts. */
export function renderContext(entries: MemoryEntry[]): string {
  return [...entries].reverse().map((e) => `${e.role}: ${e.content}`).join('\n');
}
