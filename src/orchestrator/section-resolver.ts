import { formatSectionId, parseSectionId } from './section-id.js';
import type { GuideTree, SectionInfo, SectionRef } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function normalizeRequirements(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) {
    return raw.filter((r): r is string => typeof r === 'string').join('\n');
  }
  return '';
}

function fallbackSection(sectionId: string): SectionInfo {
  return {
    section_id: sectionId,
    chapter_title: 'Unknown Chapter',
    chapter_index: -1,
    section_title: 'Unknown Section',
    section_index: -1,
    requirements: '',
    description: 'No description available.',
  };
}

/**
 * Look up a section's metadata in a parsed guide. The guide comes from an LLM
 * and is not trusted: any malformed id, out-of-range index or missing key
 * yields the fixed "Unknown" record instead of an error.
 */
export function resolveSection(guide: unknown, sectionId: string | SectionRef): SectionInfo {
  const id = typeof sectionId === 'string' ? sectionId : formatSectionId(sectionId);
  const ref = typeof sectionId === 'string' ? parseSectionId(sectionId) : sectionId;
  if (!ref || ref.chapter_index < 0 || ref.section_index < 0) return fallbackSection(id);

  const chapters = asRecord(guide)?.chapters;
  if (!Array.isArray(chapters)) return fallbackSection(id);
  const chapter = asRecord(chapters[ref.chapter_index]);
  if (!chapter) return fallbackSection(id);

  const sections = chapter.sections;
  if (!Array.isArray(sections)) return fallbackSection(id);
  const section = asRecord(sections[ref.section_index]);
  if (!section) return fallbackSection(id);

  return {
    section_id: id,
    chapter_title: typeof chapter.title === 'string' && chapter.title
      ? chapter.title
      : `Chapter ${ref.chapter_index + 1}`,
    chapter_index: ref.chapter_index,
    section_title: typeof section.title === 'string' && section.title
      ? section.title
      : `Section ${ref.section_index + 1}`,
    section_index: ref.section_index,
    requirements: normalizeRequirements(section.requirements),
    description: typeof section.description === 'string' ? section.description : '',
  };
}

/** Every section of the guide, in chapter/section order. */
export function listSectionRefs(guide: GuideTree): SectionRef[] {
  return guide.chapters.flatMap((chapter, chapter_index) =>
    chapter.sections.map((_, section_index) => ({ chapter_index, section_index })),
  );
}

export function sectionExists(guide: GuideTree, ref: SectionRef): boolean {
  return resolveSection(guide, ref).chapter_index !== -1;
}
