/**
 * Reflection phase: ask Socratic follow-up questions about the draft, then
 * mark the section saved and return to planning.
 */

import { attempt } from '../../lib/result.js';
import { recall, remember } from '../memory.js';
import { formatSectionId } from '../section-id.js';
import { resolveSection } from '../section-resolver.js';
import type { PhaseContext, PhaseHandler } from '../types.js';

const CLOSING_MESSAGE = "Thank you for your reflections. Let's move on to the next section.";

async function latestDraft(ctx: PhaseContext, sectionKey: string): Promise<string> {
  const found = await recall(ctx, ['execution', sectionKey, 'draft'], 1);
  if (!found.ok) {
    ctx.log.warn({ error: found.error.message }, 'Could not retrieve draft');
    return '';
  }
  return found.value[0]?.content ?? '';
}

export const handleReflection: PhaseHandler<'reflection'> = async (ctx, state, message) => {
  const ref = state.current_section;
  const sectionKey = formatSectionId(ref);

  await remember(ctx, 'user', message, ['reflection', sectionKey]);

  const draft = await latestDraft(ctx, sectionKey);
  const section = resolveSection(ctx.session.guide_json, ref);

  const marked = await attempt(() => ctx.sections.markSaved(state.session_id, ref));
  if (!marked.ok) {
    ctx.log.error({ sectionKey, error: marked.error.message }, 'Failed to mark section saved');
  } else if (!marked.value) {
    ctx.log.warn({ sectionKey }, 'No section record to mark saved');
  }
  const sectionCompleted = marked.ok && marked.value;

  const questions = await ctx.drafting.socraticQuestions({ section, draft, reflection: message });
  if (!questions.ok) {
    ctx.log.error({ error: questions.error.message }, 'Reflection question generation failed');
  }
  const text = questions.ok ? questions.value : CLOSING_MESSAGE;

  await remember(ctx, 'assistant', text, ['reflection', sectionKey]);

  return {
    response: {
      message: text,
      metadata: {
        phase: 'planning',
        section_id: sectionKey,
        section_completed: sectionCompleted,
        reflection_received: true,
      },
    },
    state: { phase: 'planning', session_id: state.session_id, current_section: ref },
  };
};
