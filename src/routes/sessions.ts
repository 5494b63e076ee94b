import { Hono } from 'hono';
import { z } from 'zod';
import { GuideParseError } from '../lib/errors.js';
import { formatIssues, validateBody } from '../lib/validate.js';
import type { Orchestrator } from '../orchestrator/core.js';
import { MAX_GUIDE_TEXT_CHARS } from '../services/guide-parser.js';

const MAX_MESSAGE_CHARS = 20_000;

export const createSessionSchema = z.object({
  guide_text: z.string().trim().min(1).max(MAX_GUIDE_TEXT_CHARS),
});

export const chatSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_CHARS),
});

export const intakeResponseSchema = z.object({
  field: z.string().trim().min(1).max(100),
  value: z.string().trim().min(1).max(MAX_MESSAGE_CHARS),
});

export const sectionSchema = z.object({
  section_id: z.string().regex(/^\d+\.\d+$/, 'section_id must look like "chapter.section"'),
});

async function readJson(c: { req: { json: () => Promise<unknown> } }): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

/**
 * Session endpoints. The orchestrator is injected so the router holds no
 * client singletons of its own.
 */
export function createSessionRoutes(orchestrator: Orchestrator) {
  const sessions = new Hono();

  sessions.post('/', async (c) => {
    const parsed = validateBody(createSessionSchema, await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }

    try {
      const session = await orchestrator.startSession(parsed.data.guide_text);
      return c.json({ session_id: session.session_id }, 201);
    } catch (err) {
      if (err instanceof GuideParseError) {
        c.get('log').warn({ error: err.message }, 'Guide could not be parsed');
        return c.json({ error: `Failed to parse guide: ${err.message}`, code: err.code }, 422);
      }
      throw err;
    }
  });

  sessions.get('/:id/state', async (c) => {
    const snapshot = await orchestrator.getSnapshot(c.req.param('id'));
    if (!snapshot) return c.json({ error: 'Session not found' }, 404);
    return c.json(snapshot);
  });

  sessions.post('/:id/chat', async (c) => {
    const parsed = validateBody(chatSchema, await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }
    const response = await orchestrator.advance(c.req.param('id'), parsed.data.message);
    if (response.metadata.error === 'session_not_found') {
      return c.json({ error: 'Session not found' }, 404);
    }
    return c.json(response);
  });

  sessions.post('/:id/intake-response', async (c) => {
    const parsed = validateBody(intakeResponseSchema, await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }
    const intakeDone = await orchestrator.updateIntake(c.req.param('id'), parsed.data.field, parsed.data.value);
    if (intakeDone === null) return c.json({ error: 'Session not found' }, 404);
    return c.json({ intake_done: intakeDone });
  });

  sessions.post('/:id/select-section', async (c) => {
    const parsed = validateBody(sectionSchema, await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }
    const result = await orchestrator.selectSection(c.req.param('id'), parsed.data.section_id);
    if (result.ok) return c.json(result.value);

    switch (result.error) {
      case 'session_not_found':
        return c.json({ error: 'Session not found' }, 404);
      case 'unknown_section':
        return c.json({ error: `Section ${parsed.data.section_id} does not exist in this guide`, code: result.error }, 404);
      case 'invalid_transition':
        return c.json({ error: 'Finish the current draft and reflection before switching sections', code: result.error }, 409);
    }
  });

  sessions.post('/:id/save-section', async (c) => {
    const parsed = validateBody(sectionSchema, await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: formatIssues(parsed.issues) }, 400);
    }
    const saved = await orchestrator.saveSection(c.req.param('id'), parsed.data.section_id);
    return c.json({ saved });
  });

  return sessions;
}
