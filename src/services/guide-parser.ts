import { GuideParseError, errorMessage } from '../lib/errors.js';
import { repairJSON } from '../lib/json-repair.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { GuideTree } from '../orchestrator/types.js';
import { GuideTreeSchema } from './schemas.js';

export interface GuideParser {
  /** Rejects with GuideParseError when the text does not yield a usable tree. */
  parse(text: string): Promise<GuideTree>;
}

/** Longest guide text accepted for parsing. */
export const MAX_GUIDE_TEXT_CHARS = 60_000;

const GUIDE_SYSTEM_PROMPT = `You convert thesis/report guide text into structured JSON.
Output ONLY valid JSON, no text before or after, with this exact shape:

{
  "title": "GUIDE_TITLE",
  "chapters": [
    {
      "title": "CHAPTER_TITLE",
      "sections": [
        { "title": "SECTION_TITLE", "requirements": "FULL_SECTION_REQUIREMENTS" }
      ]
    }
  ]
}

Rules:
- Include EVERY chapter and section in the guide. Do not skip any.
- Keep section numbers (like "1.1" or "3.3.2") in the titles.
- Copy each section's requirements in full, including lists and specific instructions.
- If the guide uses other terms ("Parts", "Units"), map them to chapters and sections.`;

export class LlmGuideParser implements GuideParser {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: { model: string; maxTokens: number },
  ) {}

  async parse(text: string): Promise<GuideTree> {
    if (!text.trim()) {
      throw new GuideParseError('No guide text provided');
    }
    if (text.length > MAX_GUIDE_TEXT_CHARS) {
      throw new GuideParseError(`Guide text exceeds ${MAX_GUIDE_TEXT_CHARS} characters`);
    }

    let responseText: string;
    try {
      const response = await this.llm.chat({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: 0,
        system: GUIDE_SYSTEM_PROMPT,
        messages: [{
          role: 'user',
          content: `Extract ALL chapters and sections from this guide:\n\n${text}`,
        }],
      });
      responseText = response.text;
    } catch (err) {
      throw new GuideParseError(`Guide parsing request failed: ${errorMessage(err)}`);
    }

    const repaired = repairJSON(responseText);
    if (repaired === undefined) {
      throw new GuideParseError('Guide parser returned no JSON');
    }

    const parsed = GuideTreeSchema.safeParse(repaired);
    if (!parsed.success) {
      throw new GuideParseError('Guide parser returned an unexpected structure', parsed.error.issues);
    }

    const guide = parsed.data;
    if (!guide.chapters.some((chapter) => chapter.sections.length > 0)) {
      throw new GuideParseError('Guide contains no sections');
    }
    return guide;
  }
}
