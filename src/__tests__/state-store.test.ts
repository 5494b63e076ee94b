import { describe, it, expect, beforeEach } from 'vitest';
import {
  deserializeState,
  initialState,
  OrchestratorStateStore,
  serializeState,
} from '../orchestrator/state-store.js';
import type { OrchestratorState } from '../orchestrator/types.js';
import { InMemorySessionStore, silentLogger } from './helpers/fakes.js';

describe('serializeState / deserializeState', () => {
  it('starts sessions in intake with no section', () => {
    expect(serializeState(initialState('s1'))).toEqual({
      session_id: 's1',
      phase: 'intake',
      current_section_id: null,
    });
  });

  it('round-trips every phase', () => {
    const states: OrchestratorState[] = [
      { phase: 'intake', session_id: 's1' },
      { phase: 'planning', session_id: 's1', current_section: null },
      { phase: 'planning', session_id: 's1', current_section: { chapter_index: 0, section_index: 1 } },
      { phase: 'execution', session_id: 's1', current_section: { chapter_index: 2, section_index: 0 } },
      { phase: 'reflection', session_id: 's1', current_section: { chapter_index: 1, section_index: 3 } },
    ];
    for (const state of states) {
      expect(deserializeState(serializeState(state))).toEqual(state);
    }
  });

  it('writes the section as a chapter.section string', () => {
    const state: OrchestratorState = {
      phase: 'execution',
      session_id: 's1',
      current_section: { chapter_index: 2, section_index: 0 },
    };
    expect(serializeState(state).current_section_id).toBe('2.0');
  });

  it('treats a missing current_section_id as null', () => {
    expect(deserializeState({ session_id: 's1', phase: 'planning' })).toEqual({
      phase: 'planning',
      session_id: 's1',
      current_section: null,
    });
  });

  it('rejects records that do not fit the schema', () => {
    expect(deserializeState(null)).toBeNull();
    expect(deserializeState('intake')).toBeNull();
    expect(deserializeState({ session_id: 's1', phase: 'drafting' })).toBeNull();
    expect(deserializeState({ session_id: '', phase: 'intake' })).toBeNull();
    expect(deserializeState({ session_id: 's1', phase: 'planning', current_section_id: 'one' })).toBeNull();
  });

  it('rejects execution and reflection without a section', () => {
    expect(deserializeState({ session_id: 's1', phase: 'execution', current_section_id: null })).toBeNull();
    expect(deserializeState({ session_id: 's1', phase: 'reflection' })).toBeNull();
  });
});

describe('OrchestratorStateStore', () => {
  let sessions: InMemorySessionStore;
  let store: OrchestratorStateStore;

  beforeEach(() => {
    sessions = new InMemorySessionStore();
    store = new OrchestratorStateStore(sessions, silentLogger);
  });

  it('saves and loads state', async () => {
    const state: OrchestratorState = {
      phase: 'reflection',
      session_id: 's1',
      current_section: { chapter_index: 0, section_index: 0 },
    };
    expect(await store.save(state)).toBe(true);
    expect(sessions.states.get('s1')).toEqual({ session_id: 's1', phase: 'reflection', current_section_id: '0.0' });
    expect(await store.load('s1')).toEqual(state);
  });

  it('returns null when nothing is stored', async () => {
    expect(await store.load('s1')).toBeNull();
  });

  it('returns null for a corrupt record', async () => {
    sessions.states.set('s1', { phase: 42 });
    expect(await store.load('s1')).toBeNull();
  });

  it('returns null for a record belonging to another session', async () => {
    sessions.states.set('s1', { session_id: 's2', phase: 'intake', current_section_id: null });
    expect(await store.load('s1')).toBeNull();
  });

  it('returns null when the read fails', async () => {
    sessions.failLoadState = true;
    expect(await store.load('s1')).toBeNull();
  });

  it('reports a failed write as false', async () => {
    sessions.failSaveState = true;
    expect(await store.save(initialState('s1'))).toBe(false);
  });
});
