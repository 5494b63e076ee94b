/**
 * Planning phase: gather bullet points for the current section.
 *
 * With no section selected yet, the next pending section is chosen and the
 * user is asked for bullets. A reply containing at least one bullet is stored
 * and moves the workflow to execution; otherwise the handler asks again.
 */

import { attempt } from '../../lib/result.js';
import { extractBulletPoints } from '../bullets.js';
import { recall, remember } from '../memory.js';
import { formatSectionId } from '../section-id.js';
import { resolveSection } from '../section-resolver.js';
import type { PhaseContext, PhaseHandler, SectionInfo, SectionRef } from '../types.js';

const HISTORY_LIMIT = 10;

async function pickSection(ctx: PhaseContext): Promise<SectionRef> {
  const next = await attempt(() => ctx.sections.nextPending(ctx.session.session_id));
  if (!next.ok) {
    ctx.log.warn({ error: next.error.message }, 'Could not look up next pending section');
  } else if (next.value) {
    return next.value;
  }
  return { chapter_index: 0, section_index: 0 };
}

async function completedSections(ctx: PhaseContext): Promise<string[]> {
  const records = await attempt(() => ctx.sections.list(ctx.session.session_id));
  if (!records.ok) {
    ctx.log.warn({ error: records.error.message }, 'Could not list sections');
    return [];
  }
  return records.value
    .filter((r) => r.status === 'saved')
    .map((r) => resolveSection(ctx.session.guide_json, r).section_title);
}

async function askForBullets(ctx: PhaseContext, section: SectionInfo, message: string): Promise<string> {
  const history = await recall(ctx, ['planning', section.section_id], HISTORY_LIMIT);
  const reply = await ctx.drafting.planningPrompt({
    intake: ctx.session.intake_json,
    section,
    completed_sections: await completedSections(ctx),
    history: history.ok ? [...history.value].reverse() : [],
    message,
  });
  if (reply.ok) return reply.value;

  ctx.log.error({ error: reply.error.message }, 'Planning prompt generation failed');
  return `Let's plan the section "${section.section_title}". What key points should it cover? Please list them as bullet points, one per line.`;
}

export const handlePlanning: PhaseHandler<'planning'> = async (ctx, state, message) => {
  const ref = state.current_section ?? await pickSection(ctx);
  const sectionKey = formatSectionId(ref);
  const section = resolveSection(ctx.session.guide_json, ref);

  await remember(ctx, 'user', message, ['planning', sectionKey]);

  const bullets = state.current_section ? extractBulletPoints(message) : [];
  if (bullets.length === 0) {
    const text = await askForBullets(ctx, section, message);
    await remember(ctx, 'assistant', text, ['planning', sectionKey]);
    return {
      response: {
        message: text,
        metadata: {
          phase: 'planning',
          section_id: sectionKey,
          section_title: section.section_title,
          bullet_points_requested: true,
        },
      },
      state: { phase: 'planning', session_id: state.session_id, current_section: ref },
    };
  }

  await remember(
    ctx,
    'system',
    JSON.stringify({ section_id: sectionKey, bullet_points: bullets }),
    ['planning', 'bullet_points', sectionKey],
  );

  const text = `Great! I've captured ${bullets.length} bullet point${bullets.length === 1 ? '' : 's'} for "${section.section_title}". Send any message when you're ready and I'll generate a draft from them.`;
  await remember(ctx, 'assistant', text, ['planning', sectionKey]);

  return {
    response: {
      message: text,
      metadata: {
        phase: 'execution',
        section_id: sectionKey,
        section_title: section.section_title,
        bullet_points: bullets,
      },
    },
    state: { phase: 'execution', session_id: state.session_id, current_section: ref },
  };
};
