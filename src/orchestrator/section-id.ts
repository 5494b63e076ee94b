import type { SectionRef } from './types.js';

const SECTION_ID_RE = /^(\d+)\.(\d+)$/;

/**
 * Parses a "chapter.section" identifier. Returns null unless the input is
 * exactly two dot-separated non-negative integers.
 */
export function parseSectionId(raw: string): SectionRef | null {
  const match = SECTION_ID_RE.exec(raw);
  if (!match) return null;
  const chapter_index = Number(match[1]);
  const section_index = Number(match[2]);
  if (!Number.isSafeInteger(chapter_index) || !Number.isSafeInteger(section_index)) return null;
  return { chapter_index, section_index };
}

export function formatSectionId(ref: SectionRef): string {
  return `${ref.chapter_index}.${ref.section_index}`;
}
