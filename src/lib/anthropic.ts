import Anthropic from '@anthropic-ai/sdk';

/**
 * Lazily create the Anthropic client so the server can boot (and tests can
 * import modules) when no Anthropic key is configured.
 */
export function createLazyAnthropicClient(apiKey: string | undefined): () => Anthropic {
  let client: Anthropic | null = null;
  return () => {
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY environment variable is required for drafting');
    }
    if (!client) {
      client = new Anthropic({ apiKey });
    }
    return client;
  };
}

/**
 * Concatenate the text blocks of an Anthropic response.
 * Returns an empty string when the model produced no text.
 */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
