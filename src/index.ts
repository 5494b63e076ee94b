import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { createLazyAnthropicClient } from './lib/anthropic.js';
import { loadConfig } from './lib/config.js';
import { AnthropicProvider } from './lib/llm-provider.js';
import logger from './lib/logger.js';
import { createSupabaseClient } from './lib/supabase.js';
import { Orchestrator } from './orchestrator/core.js';
import { LlmDraftingService } from './services/drafting.js';
import { LlmGuideParser } from './services/guide-parser.js';
import { SupabaseMemoryStore } from './services/memory-store.js';
import { DisabledSearchService, PerplexitySearchService } from './services/search.js';
import { SupabaseSectionStore } from './services/section-store.js';
import { SupabaseSessionStore } from './services/session-store.js';

const config = loadConfig();
const db = createSupabaseClient(config.supabase);
const llm = new AnthropicProvider({
  getClient: createLazyAnthropicClient(config.anthropic.apiKey),
  logger,
});

if (!config.anthropic.apiKey) {
  logger.warn('ANTHROPIC_API_KEY not set; guide parsing and drafting will fail until it is configured');
}
if (!config.perplexityApiKey) {
  logger.info('PERPLEXITY_API_KEY not set; drafting without web search');
}

const orchestrator = new Orchestrator({
  sessions: new SupabaseSessionStore(db),
  sections: new SupabaseSectionStore(db),
  memory: new SupabaseMemoryStore(db),
  drafting: new LlmDraftingService(llm, {
    model: config.anthropic.model,
    maxTokens: config.anthropic.maxTokens,
  }),
  search: config.perplexityApiKey
    ? new PerplexitySearchService(config.perplexityApiKey)
    : new DisabledSearchService(),
  guideParser: new LlmGuideParser(llm, {
    model: config.anthropic.lightModel,
    maxTokens: Math.max(config.anthropic.maxTokens, 8192),
  }),
  logger,
});

const app = createApp({ orchestrator, allowedOrigins: config.allowedOrigins });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, env: config.env }, 'Draft orchestrator listening');
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
