import type { LLMProvider } from '../lib/llm-provider.js';
import { attempt, fail, ok, type Result } from '../lib/result.js';
import type {
  GuideTree,
  IntakeAnswers,
  MemoryEntry,
  SearchResult,
  SectionInfo,
} from '../orchestrator/types.js';
import {
  EXECUTOR_SYSTEM_PROMPT,
  INTAKE_SYSTEM_PROMPT,
  PLANNER_SYSTEM_PROMPT,
  REFLECTOR_SYSTEM_PROMPT,
} from './prompts.js';

export interface IntakeReplyInput {
  guide: GuideTree;
  intake: IntakeAnswers;
  missing_fields: string[];
  history: MemoryEntry[];
  message: string;
}

export interface PlanningPromptInput {
  intake: IntakeAnswers;
  section: SectionInfo;
  completed_sections: string[];
  history: MemoryEntry[];
  message: string;
}

export interface DraftInput {
  section: SectionInfo;
  bullets: string[];
  search_results: SearchResult[];
  prior_context: string;
}

export interface ReflectionInput {
  section: SectionInfo;
  draft: string;
  reflection: string;
}

/**
 * The language-model side of each phase. Every call resolves to a Result;
 * nothing here throws into the phase loop.
 */
export interface DraftingService {
  intakeReply(input: IntakeReplyInput): Promise<Result<string>>;
  planningPrompt(input: PlanningPromptInput): Promise<Result<string>>;
  draftSection(input: DraftInput): Promise<Result<string>>;
  socraticQuestions(input: ReflectionInput): Promise<Result<string>>;
}

export interface LlmDraftingOptions {
  model: string;
  maxTokens: number;
}

function renderHistory(history: MemoryEntry[]): string {
  if (history.length === 0) return 'No previous conversation.';
  return history.map((entry) => `${entry.role}: ${entry.content}`).join('\n');
}

function renderGuide(guide: GuideTree): string {
  return guide.chapters
    .map((chapter, c) => {
      const sections = chapter.sections
        .map((section, s) => `  ${c}.${s} ${section.title ?? `Section ${s + 1}`}`)
        .join('\n');
      return `${chapter.title ?? `Chapter ${c + 1}`}\n${sections}`;
    })
    .join('\n');
}

function renderSearchResults(results: SearchResult[]): string {
  if (results.length === 0) return 'No search results available.';
  return results
    .map((r, i) => `[Source ${i + 1}] ${r.title}\n${r.url}\n${r.snippet}`)
    .join('\n\n');
}

export class LlmDraftingService implements DraftingService {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: LlmDraftingOptions,
  ) {}

  intakeReply(input: IntakeReplyInput): Promise<Result<string>> {
    const prompt = `REPORT GUIDE: ${input.guide.title}
${renderGuide(input.guide)}

ANSWERS SO FAR:
${JSON.stringify(input.intake, null, 2)}

MISSING REQUIRED FIELDS: ${input.missing_fields.length > 0 ? input.missing_fields.join(', ') : 'none'}

CONVERSATION:
${renderHistory(input.history)}

STUDENT: ${input.message}`;
    return this.complete(INTAKE_SYSTEM_PROMPT, prompt, 1000);
  }

  planningPrompt(input: PlanningPromptInput): Promise<Result<string>> {
    const { section } = input;
    const prompt = `SECTION: "${section.section_title}" in chapter "${section.chapter_title}"

REPORT TITLE: ${input.intake.title ?? ''}
REPORT TOPIC: ${input.intake.topic ?? ''}

SECTION REQUIREMENTS:
${section.requirements || 'None stated.'}

SECTION DESCRIPTION: ${section.description || 'No description provided.'}

SECTIONS ALREADY COMPLETED: ${input.completed_sections.length > 0 ? input.completed_sections.join(', ') : 'none'}

CONVERSATION:
${renderHistory(input.history)}

STUDENT: ${input.message}`;
    return this.complete(PLANNER_SYSTEM_PROMPT, prompt, 1000);
  }

  draftSection(input: DraftInput): Promise<Result<string>> {
    const { section } = input;
    const prompt = `Write the section "${section.section_title}" (chapter "${section.chapter_title}").

REQUIREMENTS:
${section.requirements || 'None stated.'}

DESCRIPTION: ${section.description || 'No description provided.'}

KEY POINTS TO COVER:
${input.bullets.map((b) => `- ${b}`).join('\n')}

SEARCH RESULTS:
${renderSearchResults(input.search_results)}

PRIOR CONTEXT:
${input.prior_context || 'No previous context available.'}`;
    return this.complete(EXECUTOR_SYSTEM_PROMPT, prompt, 2000);
  }

  socraticQuestions(input: ReflectionInput): Promise<Result<string>> {
    const prompt = `SECTION: "${input.section.section_title}"

DRAFT:
${input.draft || '(No draft text is available for this section.)'}

STUDENT'S REFLECTION:
${input.reflection}`;
    return this.complete(REFLECTOR_SYSTEM_PROMPT, prompt, 1000);
  }

  private async complete(system: string, prompt: string, maxTokens: number): Promise<Result<string>> {
    const result = await attempt(() =>
      this.llm.chat({
        model: this.options.model,
        max_tokens: Math.min(maxTokens, this.options.maxTokens),
        temperature: 0.7,
        system,
        messages: [{ role: 'user', content: prompt }],
      }),
    );
    if (!result.ok) return result;

    const text = result.value.text.trim();
    return text ? ok(text) : fail(new Error('LLM returned empty response'));
  }
}
