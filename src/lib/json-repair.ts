import logger from './logger.js';

function closeUnbalanced(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

function tryParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Best-effort recovery of a JSON value from LLM output: strips markdown
 * fences and surrounding prose, drops trailing commas and closes a truncated
 * tail. Returns undefined when nothing parses; callers validate the shape.
 */
export function repairJSON(text: string): unknown {
  if (!text.trim()) return undefined;

  let cleaned = text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  const start = firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket) ? firstBrace : firstBracket;
  if (start >= 0) {
    const closeChar = cleaned[start] === '{' ? '}' : ']';
    const end = cleaned.lastIndexOf(closeChar);
    cleaned = end > start ? cleaned.slice(start, end + 1) : cleaned.slice(start);
  }

  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const relaxed = tryParse(noTrailing);
  if (relaxed !== undefined) return relaxed;

  const closed = closeUnbalanced(noTrailing);
  if (closed !== noTrailing) {
    const recovered = tryParse(closed);
    if (recovered !== undefined) return recovered;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return undefined;
}
