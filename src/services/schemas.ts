import { z } from 'zod';

// ─── Guide tree (LLM parser output, also the stored guide_json) ─────

export const GuideSectionSchema = z.object({
  title: z.string().optional(),
  requirements: z.union([z.string(), z.array(z.string())]).optional(),
  description: z.string().optional(),
});

export const GuideChapterSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  sections: z.array(GuideSectionSchema).default([]),
});

export const GuideTreeSchema = z.object({
  title: z.string().default('Report Guide'),
  description: z.string().optional(),
  chapters: z.array(GuideChapterSchema),
});

// ─── Supabase rows ───────────────────────────────────────────────────

export const SessionRowSchema = z.object({
  session_id: z.string(),
  guide_json: GuideTreeSchema,
  intake_json: z.record(z.string()).nullable().transform((v) => v ?? {}),
  intake_done: z.boolean().nullable().transform((v) => v ?? false),
  created_at: z.string(),
});

export const SectionRowSchema = z.object({
  session_id: z.string(),
  chapter_index: z.number().int(),
  section_index: z.number().int(),
  content: z.string().nullable().transform((v) => v ?? ''),
  status: z.enum(['pending', 'saved']),
  saved_at: z.string().nullable(),
});

export const MemoryRowSchema = z.object({
  session_id: z.string(),
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
  categories: z.array(z.string()).nullable().transform((v) => v ?? []),
  created_at: z.string(),
});

// ─── Search results ──────────────────────────────────────────────────

export const SearchResultsSchema = z.array(
  z.object({
    title: z.string().default(''),
    url: z.string().default(''),
    snippet: z.string().default(''),
  }),
);

export const PerplexityResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().optional() }).optional(),
  })).optional(),
  citations: z.array(z.string()).optional(),
});
