import { describe, it, expect, vi } from 'vitest';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';
import { resolveSection } from '../orchestrator/section-resolver.js';
import { LlmDraftingService } from '../services/drafting.js';
import { EXECUTOR_SYSTEM_PROMPT, INTAKE_SYSTEM_PROMPT } from '../services/prompts.js';
import { makeGuide } from './helpers/fakes.js';

function makeLlm(text = '  Reply text  ') {
  return {
    name: 'fake',
    chat: vi.fn(async (_params: ChatParams): Promise<ChatResponse> => ({
      text,
      usage: { input_tokens: 10, output_tokens: 5 },
    })),
  } satisfies LLMProvider;
}

const section = resolveSection(makeGuide(), '0.1');

describe('LlmDraftingService', () => {
  it('returns the trimmed model reply', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    const result = await service.intakeReply({
      guide: makeGuide(),
      intake: { title: 'Soil health' },
      missing_fields: ['department', 'sample_size'],
      history: [],
      message: 'Hello',
    });

    expect(result).toEqual({ ok: true, value: 'Reply text' });
    const params = llm.chat.mock.calls[0][0];
    expect(params).toMatchObject({ model: 'test-model', max_tokens: 1000, temperature: 0.7, system: INTAKE_SYSTEM_PROMPT });
    expect(params.messages[0].content).toContain('MISSING REQUIRED FIELDS: department, sample_size');
    expect(params.messages[0].content).toContain('  0.1 1.2 Problem Statement');
    expect(params.messages[0].content).toContain('No previous conversation.');
  });

  it('caps each call at the configured token limit', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 500 });

    await service.draftSection({ section, bullets: ['A'], search_results: [], prior_context: '' });

    expect(llm.chat.mock.calls[0][0].max_tokens).toBe(500);
  });

  it('renders bullets, sources and context into the draft prompt', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    await service.draftSection({
      section,
      bullets: ['Point A', 'Point B'],
      search_results: [{ title: 'Soil survey', url: 'https://example.org/soil', snippet: 'Levels fell.' }],
      prior_context: 'user: Go',
    });

    const params = llm.chat.mock.calls[0][0];
    expect(params.system).toBe(EXECUTOR_SYSTEM_PROMPT);
    expect(params.max_tokens).toBe(2000);
    const prompt = params.messages[0].content;
    expect(prompt).toContain('KEY POINTS TO COVER:\n- Point A\n- Point B');
    expect(prompt).toContain('[Source 1] Soil survey\nhttps://example.org/soil\nLevels fell.');
    expect(prompt).toContain('REQUIREMENTS:\nState the problem.\nExplain why it matters.');
    expect(prompt).toContain('PRIOR CONTEXT:\nuser: Go');
  });

  it('says so when there are no sources', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    await service.draftSection({ section, bullets: ['A'], search_results: [], prior_context: '' });

    const prompt = llm.chat.mock.calls[0][0].messages[0].content;
    expect(prompt).toContain('SEARCH RESULTS:\nNo search results available.');
    expect(prompt).toContain('PRIOR CONTEXT:\nNo previous context available.');
  });

  it('marks a missing draft in the reflection prompt', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    await service.socraticQuestions({ section, draft: '', reflection: 'Fine' });

    expect(llm.chat.mock.calls[0][0].messages[0].content).toContain('(No draft text is available for this section.)');
  });

  it('lists completed sections in the planning prompt', async () => {
    const llm = makeLlm();
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    await service.planningPrompt({
      intake: { title: 'Soil health', topic: 'Nitrogen' },
      section,
      completed_sections: ['1.1 Background'],
      history: [],
      message: 'Ready',
    });

    const prompt = llm.chat.mock.calls[0][0].messages[0].content;
    expect(prompt).toContain('SECTIONS ALREADY COMPLETED: 1.1 Background');
    expect(prompt).toContain('REPORT TITLE: Soil health');
  });

  it('fails on an empty reply', async () => {
    const service = new LlmDraftingService(makeLlm('   '), { model: 'test-model', maxTokens: 4096 });

    const result = await service.socraticQuestions({ section, draft: 'Text', reflection: 'Fine' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('LLM returned empty response');
  });

  it('captures a provider error as a failed result', async () => {
    const llm = makeLlm();
    llm.chat.mockRejectedValueOnce(new Error('overloaded'));
    const service = new LlmDraftingService(llm, { model: 'test-model', maxTokens: 4096 });

    const result = await service.planningPrompt({
      intake: {},
      section,
      completed_sections: [],
      history: [],
      message: 'Ready',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('overloaded');
  });
});
