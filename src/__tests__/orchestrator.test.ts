import { describe, it, expect, beforeEach } from 'vitest';
import { GuideParseError } from '../lib/errors.js';
import { ok } from '../lib/result.js';
import type { Phase } from '../orchestrator/types.js';
import { makeHarness, type Harness } from './helpers/fakes.js';

let h: Harness;

beforeEach(() => {
  h = makeHarness();
});

async function phaseOf(sessionId: string): Promise<Phase | undefined> {
  return (await h.orchestrator.getSnapshot(sessionId))?.phase;
}

describe('Orchestrator.startSession', () => {
  it('creates one pending record per section and starts at intake', async () => {
    const session = await h.orchestrator.startSession('Chapter 1 ...');

    expect(h.guideParser.parse).toHaveBeenCalledWith('Chapter 1 ...');
    expect(h.sections.records).toHaveLength(4);
    expect(h.sections.records.every((r) => r.status === 'pending' && r.content === '')).toBe(true);
    expect(h.sessions.states.get(session.session_id)).toEqual({
      session_id: session.session_id,
      phase: 'intake',
      current_section_id: null,
    });
    expect(h.memory.entries).toEqual([
      {
        session_id: session.session_id,
        role: 'system',
        content: 'New drafting session for guide "Capstone Report Guide" with 2 chapters and 4 sections.',
        categories: ['session'],
        created_at: new Date(0).toISOString(),
      },
    ]);
  });

  it('propagates guide parse failures without creating a session', async () => {
    h.guideParser.parse.mockRejectedValueOnce(new GuideParseError('Guide contains no sections'));

    await expect(h.orchestrator.startSession('nonsense')).rejects.toBeInstanceOf(GuideParseError);
    expect(h.sessions.records.size).toBe(0);
    expect(h.sections.records).toHaveLength(0);
  });

  it('removes the session again when its section records cannot be created', async () => {
    h.sections.failWrites = true;

    await expect(h.orchestrator.startSession('guide')).rejects.toThrow('section write failed');
    expect(h.sessions.records.size).toBe(0);
    expect(h.sessions.states.size).toBe(0);
    expect(h.memory.entries).toEqual([]);
  });

  it('still creates the session when the initial state cannot be saved', async () => {
    h.sessions.failSaveState = true;

    const session = await h.orchestrator.startSession('guide');

    expect(await phaseOf(session.session_id)).toBe('intake');
  });
});

describe('Orchestrator.advance', () => {
  it('reports an unknown session in the response', async () => {
    expect(await h.orchestrator.advance('nope', 'Hello')).toEqual({
      message: 'Session with ID nope not found',
      metadata: { phase: 'error', error: 'session_not_found' },
    });
  });

  it('flips the intake-complete signal exactly once, on the last required field', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    h.drafting.intakeReply
      .mockResolvedValueOnce(ok('Which department are you in? [DEPARTMENT]'))
      .mockResolvedValueOnce(ok('What is your report called? [TITLE]'))
      .mockResolvedValueOnce(ok('How many farms will you visit? [SAMPLE_SIZE]'))
      .mockResolvedValueOnce(ok('What do you want to achieve? [OBJECTIVES]'))
      .mockResolvedValueOnce(ok('What problem are you addressing? [PROBLEM_STATEMENT]'));

    const turns = ['Hello', 'Biology', 'Soil health', '40 farms', 'Measure nitrogen', 'Nitrogen depletion', 'Thanks'];
    const flags: unknown[] = [];
    const done: unknown[] = [];
    for (const message of turns) {
      const response = await h.orchestrator.advance(session_id, message);
      flags.push(response.metadata.intake_completed_now);
      done.push(response.metadata.intake_done);
    }

    expect(flags).toEqual([false, false, false, false, false, true, false]);
    expect(done).toEqual([false, false, false, false, false, true, true]);
    expect(h.sessions.records.get(session_id)?.intake_done).toBe(true);
    expect(await phaseOf(session_id)).toBe('intake');
  });

  it('walks planning, execution and reflection for a selected section', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    await h.orchestrator.advance(session_id, 'Hello');

    const selected = await h.orchestrator.selectSection(session_id, '0.1');
    expect(selected).toEqual({
      ok: true,
      value: {
        message: 'Let\'s plan "1.2 Problem Statement" (Introduction). What key points should this section cover? List them as bullet points, one per line.',
        metadata: {
          phase: 'planning',
          section_id: '0.1',
          section_title: '1.2 Problem Statement',
          state_saved: true,
        },
      },
    });

    const phases: Array<Phase | undefined> = [await phaseOf(session_id)];
    const planned = await h.orchestrator.advance(session_id, '- Gap in the literature\n- Why it matters');
    phases.push(await phaseOf(session_id));
    const drafted = await h.orchestrator.advance(session_id, 'Draft it');
    phases.push(await phaseOf(session_id));
    const reflected = await h.orchestrator.advance(session_id, 'It reads well');
    phases.push(await phaseOf(session_id));

    expect(phases).toEqual(['planning', 'execution', 'reflection', 'planning']);
    expect(planned.metadata.bullet_points).toEqual(['Gap in the literature', 'Why it matters']);
    expect(drafted).toMatchObject({ message: 'Drafted section text.', metadata: { phase: 'reflection', section_id: '0.1' } });
    expect(reflected.metadata).toMatchObject({ phase: 'planning', section_completed: true });

    const snapshot = await h.orchestrator.getSnapshot(session_id);
    expect(snapshot?.current_section_id).toBe('0.1');
    expect(snapshot?.sections_status).toEqual({ '0.0': 'pending', '0.1': 'saved', '1.0': 'pending', '1.1': 'pending' });
  });

  it('starts fresh at intake when stored state is unreadable', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    h.sessions.states.set(session_id, { phase: 'execution' });

    const response = await h.orchestrator.advance(session_id, 'Hello');

    expect(response.metadata.phase).toBe('intake');
    expect(h.sessions.states.get(session_id)).toEqual({ session_id, phase: 'intake', current_section_id: null });
  });

  it('starts fresh at intake when the state read fails', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    h.sessions.failLoadState = true;

    const response = await h.orchestrator.advance(session_id, 'Hello');

    expect(response.metadata.phase).toBe('intake');
  });

  it('returns the response even when the new state cannot be saved', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    await h.orchestrator.selectSection(session_id, '0.0');
    h.sessions.failSaveState = true;

    const response = await h.orchestrator.advance(session_id, '- A point');

    expect(response.metadata.phase).toBe('execution');
    expect(h.sessions.states.get(session_id)).toEqual({ session_id, phase: 'planning', current_section_id: '0.0' });
  });
});

describe('Orchestrator.selectSection', () => {
  it('rejects unknown sessions', async () => {
    expect(await h.orchestrator.selectSection('nope', '0.0')).toEqual({ ok: false, error: 'session_not_found' });
  });

  it('rejects sections outside the guide', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');

    expect(await h.orchestrator.selectSection(session_id, '2.0')).toEqual({ ok: false, error: 'unknown_section' });
    expect(await h.orchestrator.selectSection(session_id, 'intro')).toEqual({ ok: false, error: 'unknown_section' });
  });

  it('re-points planning at another section', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    await h.orchestrator.selectSection(session_id, '0.0');

    const result = await h.orchestrator.selectSection(session_id, '1.1');

    expect(result.ok).toBe(true);
    expect((await h.orchestrator.getSnapshot(session_id))?.current_section_id).toBe('1.1');
  });

  it('refuses to switch sections mid-draft', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');
    await h.orchestrator.selectSection(session_id, '0.0');
    await h.orchestrator.advance(session_id, '- A point');

    expect(await h.orchestrator.selectSection(session_id, '1.0')).toEqual({ ok: false, error: 'invalid_transition' });
    expect(await phaseOf(session_id)).toBe('execution');
  });
});

describe('Orchestrator.saveSection', () => {
  it('is idempotent', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');

    expect(await h.orchestrator.saveSection(session_id, '1.0')).toBe(true);
    expect(await h.orchestrator.saveSection(session_id, '1.0')).toBe(true);
    expect((await h.orchestrator.getSnapshot(session_id))?.sections_status['1.0']).toBe('saved');
  });

  it('returns false for malformed or missing sections', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');

    expect(await h.orchestrator.saveSection(session_id, 'x')).toBe(false);
    expect(await h.orchestrator.saveSection(session_id, '7.7')).toBe(false);
    expect(await h.orchestrator.saveSection('nope', '0.0')).toBe(false);
  });
});

describe('Orchestrator.getSnapshot', () => {
  it('returns null for unknown sessions', async () => {
    expect(await h.orchestrator.getSnapshot('nope')).toBeNull();
  });

  it('describes a new session', async () => {
    const session = await h.orchestrator.startSession('guide');

    expect(await h.orchestrator.getSnapshot(session.session_id)).toEqual({
      session_id: session.session_id,
      guide_json: session.guide_json,
      intake_json: {},
      intake_done: false,
      sections_status: { '0.0': 'pending', '0.1': 'pending', '1.0': 'pending', '1.1': 'pending' },
      phase: 'intake',
      current_section_id: null,
      created_at: '2026-01-01T00:00:00.000Z',
    });
  });
});

describe('Orchestrator.updateIntake', () => {
  it('returns null for unknown sessions', async () => {
    expect(await h.orchestrator.updateIntake('nope', 'title', 'X')).toBeNull();
  });

  it('reports intake_done once every required field is present', async () => {
    const { session_id } = await h.orchestrator.startSession('guide');

    expect(await h.orchestrator.updateIntake(session_id, 'title', 'Soil health')).toBe(false);
    await h.orchestrator.updateIntake(session_id, 'department', 'Biology');
    await h.orchestrator.updateIntake(session_id, 'objectives', 'Measure nitrogen');
    await h.orchestrator.updateIntake(session_id, 'problem_statement', 'Depletion');
    expect(await h.orchestrator.updateIntake(session_id, 'sample_size', '40')).toBe(true);
  });
});
