/**
 * Execution phase: turn the section's bullet points into a draft.
 */

import { attempt } from '../../lib/result.js';
import { DEFAULT_BULLETS, decodeBulletSet } from '../bullets.js';
import { recall, remember, renderContext } from '../memory.js';
import { formatSectionId } from '../section-id.js';
import { resolveSection } from '../section-resolver.js';
import type { PhaseContext, PhaseHandler, SearchResult, SectionInfo } from '../types.js';

const CONTEXT_LIMIT = 10;

/**
 * Latest stored bullet set for the section, or the default outline when none
 * can be read.
 */
export async function loadBullets(ctx: PhaseContext, sectionKey: string): Promise<string[]> {
  const found = await recall(ctx, ['planning', 'bullet_points', sectionKey], 1);
  if (!found.ok) {
    ctx.log.warn({ error: found.error.message }, 'Could not retrieve bullet points');
    return [...DEFAULT_BULLETS];
  }
  const latest = found.value[0];
  const bullets = latest ? decodeBulletSet(latest.content) : null;
  if (!bullets) {
    ctx.log.info({ sectionKey }, 'No bullet points found, using default outline');
    return [...DEFAULT_BULLETS];
  }
  return bullets;
}

async function gatherSearchResults(
  ctx: PhaseContext,
  sectionKey: string,
  section: SectionInfo,
  bullets: string[],
): Promise<SearchResult[]> {
  const results = await ctx.search.search(sectionKey, section, bullets);
  if (!results.ok) {
    ctx.log.warn({ error: results.error.message }, 'Search failed, drafting without sources');
    return [];
  }
  return results.value;
}

export const handleExecution: PhaseHandler<'execution'> = async (ctx, state, message) => {
  const ref = state.current_section;
  const sectionKey = formatSectionId(ref);

  await remember(ctx, 'user', message, ['execution', sectionKey]);

  const section = resolveSection(ctx.session.guide_json, ref);
  const bullets = await loadBullets(ctx, sectionKey);
  const searchResults = await gatherSearchResults(ctx, sectionKey, section, bullets);

  const recent = await recall(ctx, [sectionKey], CONTEXT_LIMIT);
  const priorContext = recent.ok ? renderContext(recent.value) : '';

  const drafted = await ctx.drafting.draftSection({
    section,
    bullets,
    search_results: searchResults,
    prior_context: priorContext,
  });
  if (!drafted.ok) {
    ctx.log.error({ sectionKey, error: drafted.error.message }, 'Draft generation failed');
  }
  const draft = drafted.ok ? drafted.value : `Draft generation failed: ${drafted.error.message}`;

  await remember(ctx, 'assistant', draft, ['execution', sectionKey, 'draft']);

  const saved = await attempt(() => ctx.sections.saveDraft(state.session_id, ref, draft));
  if (!saved.ok) {
    ctx.log.error({ sectionKey, error: saved.error.message }, 'Failed to save draft');
  } else if (!saved.value) {
    ctx.log.warn({ sectionKey }, 'No section record to save draft into');
  }

  return {
    response: {
      message: draft,
      metadata: {
        phase: 'reflection',
        section_id: sectionKey,
        section_title: section.section_title,
        generated_content: true,
        draft_saved: saved.ok && saved.value,
        sources: searchResults.length,
      },
    },
    state: { phase: 'reflection', session_id: state.session_id, current_section: ref },
  };
};
