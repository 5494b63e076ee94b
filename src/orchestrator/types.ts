import type { Logger } from '../lib/logger.js';
import type { DraftingService } from '../services/drafting.js';
import type { MemoryStore } from '../services/memory-store.js';
import type { SearchService } from '../services/search.js';
import type { SectionStore } from '../services/section-store.js';
import type { SessionStore } from '../services/session-store.js';

// ─── Guide tree ──────────────────────────────────────────────────────

export interface GuideSection {
  title?: string;
  requirements?: string | string[];
  description?: string;
}

export interface GuideChapter {
  title?: string;
  description?: string;
  sections: GuideSection[];
}

export interface GuideTree {
  title: string;
  description?: string;
  chapters: GuideChapter[];
}

// ─── Sections ────────────────────────────────────────────────────────

/** Addresses one section of the guide tree. Wire form is "c.s", both 0-based. */
export interface SectionRef {
  chapter_index: number;
  section_index: number;
}

export interface SectionInfo {
  section_id: string;
  chapter_title: string;
  chapter_index: number;
  section_title: string;
  section_index: number;
  requirements: string;
  description: string;
}

export type SectionStatus = 'pending' | 'saved';

export interface SectionDraftRecord {
  session_id: string;
  chapter_index: number;
  section_index: number;
  content: string;
  status: SectionStatus;
  saved_at: string | null;
}

// ─── Orchestrator state ──────────────────────────────────────────────

export const PHASES = ['intake', 'planning', 'execution', 'reflection'] as const;
export type Phase = (typeof PHASES)[number];

export type OrchestratorState =
  | { phase: 'intake'; session_id: string }
  | { phase: 'planning'; session_id: string; current_section: SectionRef | null }
  | { phase: 'execution'; session_id: string; current_section: SectionRef }
  | { phase: 'reflection'; session_id: string; current_section: SectionRef };

export type StateOf<P extends Phase> = Extract<OrchestratorState, { phase: P }>;

// ─── Session ─────────────────────────────────────────────────────────

export type IntakeAnswers = Record<string, string>;

export const REQUIRED_INTAKE_FIELDS = [
  'title',
  'department',
  'objectives',
  'problem_statement',
  'sample_size',
] as const;

export interface SessionRecord {
  session_id: string;
  guide_json: GuideTree;
  intake_json: IntakeAnswers;
  intake_done: boolean;
  created_at: string;
}

export interface SessionSnapshot {
  session_id: string;
  guide_json: GuideTree;
  intake_json: IntakeAnswers;
  intake_done: boolean;
  sections_status: Record<string, SectionStatus>;
  phase: Phase;
  current_section_id: string | null;
  created_at: string;
}

// ─── Memory ──────────────────────────────────────────────────────────

export type MemoryRole = 'user' | 'assistant' | 'system';

export interface MemoryEntry {
  session_id: string;
  role: MemoryRole;
  content: string;
  categories: string[];
  created_at: string;
}

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

// ─── Responses ───────────────────────────────────────────────────────

export interface ChatMetadata {
  phase: Phase | 'error';
  section_id?: string | null;
  [key: string]: unknown;
}

export interface ChatResponse {
  message: string;
  metadata: ChatMetadata;
}

// ─── Phase handlers ──────────────────────────────────────────────────

export interface PhaseContext {
  session: SessionRecord;
  sessions: SessionStore;
  sections: SectionStore;
  memory: MemoryStore;
  drafting: DraftingService;
  search: SearchService;
  log: Logger;
}

export interface PhaseOutcome {
  response: ChatResponse;
  state: OrchestratorState;
}

export type PhaseHandler<P extends Phase> = (
  ctx: PhaseContext,
  state: StateOf<P>,
  message: string,
) => Promise<PhaseOutcome>;
