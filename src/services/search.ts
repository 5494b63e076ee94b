import { repairJSON } from '../lib/json-repair.js';
import { attempt, ok, type Result } from '../lib/result.js';
import type { SearchResult, SectionInfo } from '../orchestrator/types.js';
import { PerplexityResponseSchema, SearchResultsSchema } from './schemas.js';

export interface SearchService {
  search(sectionId: string, section: SectionInfo, bullets: string[]): Promise<Result<SearchResult[]>>;
}

/** Used when no search provider is configured. */
export class DisabledSearchService implements SearchService {
  async search(): Promise<Result<SearchResult[]>> {
    return ok([]);
  }
}

const PERPLEXITY_URL = 'https://api.perplexity.ai/chat/completions';
const PERPLEXITY_MODEL = 'sonar-pro';

export class PerplexitySearchService implements SearchService {
  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  search(sectionId: string, section: SectionInfo, bullets: string[]): Promise<Result<SearchResult[]>> {
    return attempt(async () => {
      const query = `Find up to 5 authoritative, citable sources for a report section titled "${section.section_title}" (section ${sectionId}).
Requirements: ${section.requirements || 'none stated'}
Key points: ${bullets.join('; ')}

Return ONLY a JSON array: [{"title": "...", "url": "...", "snippet": "one or two sentence summary"}]`;

      const response = await this.fetchImpl(PERPLEXITY_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: PERPLEXITY_MODEL,
          messages: [{ role: 'user', content: query }],
          temperature: 0.2,
          max_tokens: 2048,
        }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Perplexity API error (${response.status}): ${body.slice(0, 300)}`);
      }

      const data = PerplexityResponseSchema.parse(await response.json());
      const parsed = SearchResultsSchema.safeParse(repairJSON(data.choices?.[0]?.message?.content ?? ''));
      if (parsed.success) return parsed.data.filter((r) => r.url || r.snippet);

      // Model ignored the format; fall back to the bare citation list
      return (data.citations ?? []).map((url) => ({ title: url, url, snippet: '' }));
    });
  }
}
