/**
 * Intake phase: collect the report's global metadata one question at a time.
 *
 * The field a reply answers is decided from the *previous* assistant question,
 * not the reply itself. Completing the required fields flips intake_done but
 * does not move the phase; a section must be selected first.
 */

import { attempt } from '../../lib/result.js';
import { missingIntakeFields } from '../../services/session-store.js';
import { classifyIntakeField } from '../field-classifier.js';
import { recall, remember } from '../memory.js';
import type { PhaseHandler } from '../types.js';

const HISTORY_LIMIT = 10;
const FALLBACK_REPLY = "I'm sorry, I'm having trouble processing your request. Could you please try again?";

export const handleIntake: PhaseHandler<'intake'> = async (ctx, state, message) => {
  const history = await recall(ctx, ['intake'], HISTORY_LIMIT);
  if (!history.ok) {
    ctx.log.warn({ error: history.error.message }, 'Could not read intake history');
  }
  const entries = history.ok ? history.value : [];
  const previousQuestion = entries.find((entry) => entry.role === 'assistant')?.content ?? '';
  const field = classifyIntakeField(previousQuestion);

  let intake = { ...ctx.session.intake_json, [field]: message };
  let intakeDone = ctx.session.intake_done;
  let completedNow = false;
  const stored = await attempt(() => ctx.sessions.storeIntakeField(state.session_id, field, message));
  if (stored.ok) {
    intake = stored.value.intake_json;
    intakeDone = stored.value.intake_done;
    completedNow = stored.value.completed_now;
  } else {
    ctx.log.error({ field, error: stored.error.message }, 'Failed to store intake field');
  }

  await remember(ctx, 'user', message, ['intake']);

  const missing = missingIntakeFields(intake);
  const reply = await ctx.drafting.intakeReply({
    guide: ctx.session.guide_json,
    intake,
    missing_fields: missing,
    history: [...entries].reverse(),
    message,
  });
  if (!reply.ok) {
    ctx.log.error({ error: reply.error.message }, 'Intake reply generation failed');
  }
  const text = reply.ok ? reply.value : FALLBACK_REPLY;

  await remember(ctx, 'assistant', text, ['intake']);

  if (completedNow) {
    ctx.log.info({ fields: Object.keys(intake) }, 'All required intake fields present');
  }

  return {
    response: {
      message: text,
      metadata: {
        phase: 'intake',
        section_id: null,
        field,
        intake_done: intakeDone,
        intake_completed_now: completedNow,
        missing_fields: missing,
      },
    },
    state,
  };
};
