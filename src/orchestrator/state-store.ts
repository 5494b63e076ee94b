import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { SessionStore } from '../services/session-store.js';
import { formatSectionId, parseSectionId } from './section-id.js';
import { PHASES, type OrchestratorState } from './types.js';

/** The one on-disk shape of orchestrator state. */
export const SerializedStateSchema = z.object({
  session_id: z.string().min(1),
  phase: z.enum(PHASES),
  current_section_id: z.string().nullable().default(null),
});

export type SerializedState = z.infer<typeof SerializedStateSchema>;

export function initialState(sessionId: string): OrchestratorState {
  return { phase: 'intake', session_id: sessionId };
}

export function serializeState(state: OrchestratorState): SerializedState {
  return {
    session_id: state.session_id,
    phase: state.phase,
    current_section_id: state.phase === 'intake' || !state.current_section
      ? null
      : formatSectionId(state.current_section),
  };
}

/**
 * Rebuild typed state from a stored record. Returns null for anything that
 * does not fit the schema, including execution or reflection without a
 * section id.
 */
export function deserializeState(raw: unknown): OrchestratorState | null {
  const parsed = SerializedStateSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { session_id, phase, current_section_id } = parsed.data;
  const section = current_section_id === null ? null : parseSectionId(current_section_id);
  if (current_section_id !== null && !section) return null;

  switch (phase) {
    case 'intake':
      return { phase, session_id };
    case 'planning':
      return { phase, session_id, current_section: section };
    case 'execution':
    case 'reflection':
      return section ? { phase, session_id, current_section: section } : null;
  }
}

/**
 * Loads and saves orchestrator state through the session store. Neither
 * direction throws: an unreadable record means "start fresh", a failed save
 * is logged and reported as false.
 */
export class OrchestratorStateStore {
  constructor(
    private readonly sessions: SessionStore,
    private readonly log: Logger,
  ) {}

  async load(sessionId: string): Promise<OrchestratorState | null> {
    let raw: unknown;
    try {
      raw = await this.sessions.loadState(sessionId);
    } catch (err) {
      this.log.error({ sessionId, error: errorMessage(err) }, 'Failed to load orchestrator state');
      return null;
    }
    if (raw == null) return null;

    const state = deserializeState(raw);
    if (!state) {
      this.log.warn({ sessionId, raw }, 'Discarding unreadable orchestrator state');
      return null;
    }
    if (state.session_id !== sessionId) {
      this.log.warn({ sessionId, stored: state.session_id }, 'Discarding orchestrator state for another session');
      return null;
    }
    return state;
  }

  async save(state: OrchestratorState): Promise<boolean> {
    try {
      await this.sessions.saveState(state.session_id, serializeState(state));
      return true;
    } catch (err) {
      this.log.error(
        { sessionId: state.session_id, phase: state.phase, error: errorMessage(err) },
        'Failed to save orchestrator state',
      );
      return false;
    }
  }
}
