const BULLET_RE = /^[-•*]\s+(.+)$/;
const NUMBERED_RE = /^\d+[.)]\s+(.+)$/;

export const DEFAULT_BULLETS: readonly string[] = [
  'Introduction to the topic',
  'Main arguments',
  'Supporting evidence',
  'Conclusion',
];

/**
 * Pull bullet points out of a planning message. Accepts `-`, `*`, `•`,
 * `1.` and `1)` markers. Once a bullet has been seen, an unmarked line longer
 * than three characters is kept as a bullet of its own.
 */
export function extractBulletPoints(message: string): string[] {
  const bullets: string[] = [];
  for (const rawLine of message.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = BULLET_RE.exec(line) ?? NUMBERED_RE.exec(line);
    if (match?.[1]?.trim()) {
      bullets.push(match[1].trim());
    } else if (!match && bullets.length > 0 && line.length > 3) {
      bullets.push(line);
    }
  }
  return bullets;
}

/**
 * Decode a stored bullet set. Returns null for anything that is not
 * `{ bullet_points: string[] }` with at least one non-empty entry.
 */
export function decodeBulletSet(content: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || !('bullet_points' in parsed)) return null;
  const raw = parsed.bullet_points;
  if (!Array.isArray(raw)) return null;
  const bullets = raw.filter((b): b is string => typeof b === 'string' && b.trim().length > 0);
  return bullets.length > 0 ? bullets : null;
}
