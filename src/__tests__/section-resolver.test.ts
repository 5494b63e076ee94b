import { describe, it, expect } from 'vitest';
import { listSectionRefs, resolveSection, sectionExists } from '../orchestrator/section-resolver.js';
import { formatSectionId, parseSectionId } from '../orchestrator/section-id.js';
import { makeGuide } from './helpers/fakes.js';

const UNKNOWN = {
  chapter_title: 'Unknown Chapter',
  chapter_index: -1,
  section_title: 'Unknown Section',
  section_index: -1,
  requirements: '',
  description: 'No description available.',
};

describe('parseSectionId / formatSectionId', () => {
  it('parses a chapter.section pair', () => {
    expect(parseSectionId('1.0')).toEqual({ chapter_index: 1, section_index: 0 });
    expect(parseSectionId('12.34')).toEqual({ chapter_index: 12, section_index: 34 });
  });

  it('rejects anything that is not two dot-separated integers', () => {
    for (const raw of ['', '1', '1.', '.1', '1.2.3', 'a.b', '-1.0', '1.0 ', ' 1.0', '1,0']) {
      expect(parseSectionId(raw)).toBeNull();
    }
  });

  it('formats refs back to the wire form', () => {
    expect(formatSectionId({ chapter_index: 3, section_index: 7 })).toBe('3.7');
  });
});

describe('resolveSection', () => {
  const guide = makeGuide();

  it('resolves a section by string id', () => {
    expect(resolveSection(guide, '1.1')).toEqual({
      section_id: '1.1',
      chapter_title: 'Methodology',
      chapter_index: 1,
      section_title: '2.2 Sampling',
      section_index: 1,
      requirements: 'Describe the sample and how it was chosen.',
      description: '',
    });
  });

  it('resolves a section by ref and joins list requirements with newlines', () => {
    const info = resolveSection(guide, { chapter_index: 0, section_index: 1 });
    expect(info.section_id).toBe('0.1');
    expect(info.requirements).toBe('State the problem.\nExplain why it matters.');
    expect(info.description).toBe('One page.');
  });

  it('returns the Unknown record for a malformed id', () => {
    expect(resolveSection(guide, 'intro')).toEqual({ section_id: 'intro', ...UNKNOWN });
  });

  it('returns the Unknown record for out-of-range indices', () => {
    expect(resolveSection(guide, '5.0')).toEqual({ section_id: '5.0', ...UNKNOWN });
    expect(resolveSection(guide, '0.9')).toEqual({ section_id: '0.9', ...UNKNOWN });
  });

  it('returns the Unknown record when the guide shape is wrong', () => {
    expect(resolveSection(null, '0.0')).toEqual({ section_id: '0.0', ...UNKNOWN });
    expect(resolveSection({ chapters: 'none' }, '0.0')).toEqual({ section_id: '0.0', ...UNKNOWN });
    expect(resolveSection({ chapters: [{ title: 'Only' }] }, '0.0')).toEqual({ section_id: '0.0', ...UNKNOWN });
    expect(resolveSection({ chapters: [{ sections: ['text'] }] }, '0.0')).toEqual({ section_id: '0.0', ...UNKNOWN });
  });

  it('fills in positional titles when the guide omits them', () => {
    const info = resolveSection({ chapters: [{}, { title: '', sections: [{}, { requirements: 42 }] }] }, '1.1');
    expect(info).toEqual({
      section_id: '1.1',
      chapter_title: 'Chapter 2',
      chapter_index: 1,
      section_title: 'Section 2',
      section_index: 1,
      requirements: '',
      description: '',
    });
  });

  it('drops non-string requirement entries', () => {
    const info = resolveSection({ chapters: [{ sections: [{ requirements: ['a', 3, 'b'] }] }] }, '0.0');
    expect(info.requirements).toBe('a\nb');
  });
});

describe('listSectionRefs / sectionExists', () => {
  it('lists every section in order', () => {
    expect(listSectionRefs(makeGuide()).map(formatSectionId)).toEqual(['0.0', '0.1', '1.0', '1.1']);
  });

  it('checks existence against the tree', () => {
    const guide = makeGuide();
    expect(sectionExists(guide, { chapter_index: 1, section_index: 1 })).toBe(true);
    expect(sectionExists(guide, { chapter_index: 2, section_index: 0 })).toBe(false);
  });
});
