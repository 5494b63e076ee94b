import { attempt, fail, ok, type Result } from '../lib/result.js';
import type { Logger } from '../lib/logger.js';
import type { DraftingService } from '../services/drafting.js';
import type { GuideParser } from '../services/guide-parser.js';
import type { MemoryStore } from '../services/memory-store.js';
import type { SearchService } from '../services/search.js';
import type { SectionStore } from '../services/section-store.js';
import type { SessionStore } from '../services/session-store.js';
import { handleExecution, handleIntake, handlePlanning, handleReflection } from './phases/index.js';
import { formatSectionId, parseSectionId } from './section-id.js';
import { listSectionRefs, resolveSection, sectionExists } from './section-resolver.js';
import { initialState, OrchestratorStateStore } from './state-store.js';
import type {
  ChatResponse,
  OrchestratorState,
  PhaseContext,
  PhaseOutcome,
  SessionRecord,
  SessionSnapshot,
  SectionStatus,
} from './types.js';

export interface OrchestratorDeps {
  sessions: SessionStore;
  sections: SectionStore;
  memory: MemoryStore;
  drafting: DraftingService;
  search: SearchService;
  guideParser: GuideParser;
  logger: Logger;
}

export type SelectSectionError = 'session_not_found' | 'unknown_section' | 'invalid_transition';

/**
 * Drives the per-session phase machine:
 * intake → planning → execution → reflection → planning → …
 *
 * Each call loads state fresh from storage, runs exactly one phase handler and
 * writes the resulting state back. Nothing is cached between calls, so
 * concurrent calls for one session are last-writer-wins.
 */
export class Orchestrator {
  private readonly stateStore: OrchestratorStateStore;

  constructor(private readonly deps: OrchestratorDeps) {
    this.stateStore = new OrchestratorStateStore(deps.sessions, deps.logger);
  }

  /**
   * Parse the guide and create the session with one pending record per
   * section. Guide parse failures propagate: there is nothing to drive
   * without a tree. A session whose section records cannot be created is
   * deleted again before the error propagates.
   */
  async startSession(guideText: string): Promise<SessionRecord> {
    const guide = await this.deps.guideParser.parse(guideText);
    const session = await this.deps.sessions.create(guide);
    const refs = listSectionRefs(guide);
    const log = this.deps.logger.child({ sessionId: session.session_id });

    const initialized = await attempt(() => this.deps.sections.initialize(session.session_id, refs));
    if (!initialized.ok) {
      log.error({ error: initialized.error.message }, 'Failed to create section records; removing session');
      const removed = await attempt(() => this.deps.sessions.delete(session.session_id));
      if (!removed.ok) {
        log.error({ error: removed.error.message }, 'Failed to remove session without section records');
      }
      throw initialized.error;
    }

    if (!(await this.stateStore.save(initialState(session.session_id)))) {
      log.warn('Initial state not persisted; first request will start fresh at intake');
    }
    const noted = await attempt(() =>
      this.deps.memory.append({
        session_id: session.session_id,
        role: 'system',
        content: `New drafting session for guide "${guide.title}" with ${guide.chapters.length} chapters and ${refs.length} sections.`,
        categories: ['session'],
      }),
    );
    if (!noted.ok) {
      log.warn({ error: noted.error.message }, 'Failed to record session start in memory');
    }

    log.info({ chapters: guide.chapters.length, sections: refs.length }, 'Session created');
    return session;
  }

  /** The "advance workflow" operation: one user message in, one reply out. */
  async advance(sessionId: string, message: string): Promise<ChatResponse> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      return {
        message: `Session with ID ${sessionId} not found`,
        metadata: { phase: 'error', error: 'session_not_found' },
      };
    }

    const state = (await this.stateStore.load(sessionId)) ?? initialState(sessionId);
    const log = this.deps.logger.child({
      sessionId,
      phase: state.phase,
      sectionId: state.phase === 'intake' || !state.current_section ? null : formatSectionId(state.current_section),
    });
    log.debug({ messageLength: message.length }, 'Advancing workflow');

    const ctx: PhaseContext = { ...this.deps, session, log };
    const outcome = await this.dispatch(ctx, state, message);

    if (outcome.state.phase !== state.phase) {
      log.info({ from: state.phase, to: outcome.state.phase }, 'Phase transition');
    }
    const persisted = await this.stateStore.save(outcome.state);
    if (!persisted) {
      log.warn('State not persisted; the next request will not see this transition');
    }
    return outcome.response;
  }

  private dispatch(ctx: PhaseContext, state: OrchestratorState, message: string): Promise<PhaseOutcome> {
    switch (state.phase) {
      case 'intake':
        return handleIntake(ctx, state, message);
      case 'planning':
        return handlePlanning(ctx, state, message);
      case 'execution':
        return handleExecution(ctx, state, message);
      case 'reflection':
        return handleReflection(ctx, state, message);
    }
  }

  /**
   * External section selection: the only way out of intake, and the way to
   * point planning at another section. Mid-draft phases are left alone.
   */
  async selectSection(sessionId: string, sectionId: string): Promise<Result<ChatResponse, SelectSectionError>> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) return fail<SelectSectionError>('session_not_found');

    const ref = parseSectionId(sectionId);
    if (!ref || !sectionExists(session.guide_json, ref)) return fail<SelectSectionError>('unknown_section');

    const state = (await this.stateStore.load(sessionId)) ?? initialState(sessionId);
    if (state.phase !== 'intake' && state.phase !== 'planning') return fail<SelectSectionError>('invalid_transition');

    const next: OrchestratorState = { phase: 'planning', session_id: sessionId, current_section: ref };
    const persisted = await this.stateStore.save(next);
    const section = resolveSection(session.guide_json, ref);
    this.deps.logger.child({ sessionId }).info({ sectionId, from: state.phase }, 'Section selected');

    return ok<ChatResponse>({
      message: `Let's plan "${section.section_title}" (${section.chapter_title}). What key points should this section cover? List them as bullet points, one per line.`,
      metadata: {
        phase: 'planning',
        section_id: formatSectionId(ref),
        section_title: section.section_title,
        state_saved: persisted,
      },
    });
  }

  /** Manual save from the HTTP layer; false for an unknown session or section. */
  async saveSection(sessionId: string, sectionId: string): Promise<boolean> {
    const ref = parseSectionId(sectionId);
    if (!ref) return false;
    if (!(await this.deps.sessions.get(sessionId))) return false;
    return this.deps.sections.markSaved(sessionId, ref);
  }

  /** The "current state" read: session, intake, per-section status and phase. */
  async getSnapshot(sessionId: string): Promise<SessionSnapshot | null> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) return null;

    const [records, stored] = await Promise.all([
      this.deps.sections.list(sessionId),
      this.stateStore.load(sessionId),
    ]);
    const state = stored ?? initialState(sessionId);

    const sections_status: Record<string, SectionStatus> = {};
    for (const record of records) {
      sections_status[formatSectionId(record)] = record.status;
    }

    return {
      session_id: session.session_id,
      guide_json: session.guide_json,
      intake_json: session.intake_json,
      intake_done: session.intake_done,
      sections_status,
      phase: state.phase,
      current_section_id: state.phase === 'intake' || !state.current_section
        ? null
        : formatSectionId(state.current_section),
      created_at: session.created_at,
    };
  }

  /** Direct intake update from the HTTP layer, bypassing the chat turn. */
  async updateIntake(sessionId: string, field: string, value: string): Promise<boolean | null> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) return null;
    const update = await this.deps.sessions.storeIntakeField(sessionId, field, value);
    return update.intake_done;
  }
}
