import type { HeadingVocabulary, Section, SectionKind } from '../types/index.js';
import { FENCE_PATTERN } from '../utils/text.js';
import { DEFAULT_HEADING_VOCABULARY, classifyHeading } from './HeadingVocabulary.js';

const HEADING_PATTERN = /^ {0,3}(#{1,6})[ \t]+(\S.*?)(?:[ \t]+#+)?[ \t]*\r?$/;

export interface SectionSplitterOptions {
  vocabulary?: HeadingVocabulary;
}

interface HeadingLine {
  depth: number;
  text: string;
  lineStart: number;             // Offset of the heading line
  contentStart: number;          // Offset just past the heading line break
  vocabularyKind: SectionKind | null;
}

/**
 * SectionSplitter cuts converted markdown into an ordered, flat sequence
 * of typed sections.
 *
 * - An ATX heading (`#` to `######`) starts a section; its content runs to
 *   the next heading line. Lines inside fenced code blocks are not headings.
 * - Text before the first heading becomes an `Other` section when non-empty.
 * - Kinds come from the heading vocabulary; unmatched headings are
 *   `BodySection` at level 1 and `Subsection` deeper.
 * - The first heading is the `Title` when it is shallower than every other
 *   heading and matches nothing in the vocabulary.
 *
 * Never fails: text without headings comes back as a single `Other` section.
 */
export class SectionSplitter {
  private readonly vocabulary: HeadingVocabulary;

  constructor(options: SectionSplitterOptions = {}) {
    this.vocabulary = options.vocabulary ?? DEFAULT_HEADING_VOCABULARY;
  }

  split(markdown: string): Section[] {
    const headings = this.findHeadings(markdown);
    const sections: Section[] = [];

    const preambleEnd = headings.length > 0 ? headings[0].lineStart : markdown.length;
    if (preambleEnd > 0) {
      sections.push({
        kind: 'Other',
        heading: '',
        level: 1,
        depth: 0,
        rawContent: markdown.slice(0, preambleEnd),
        order: 0,
      });
    }

    if (headings.length === 0) {
      return sections;
    }

    const titleIndex = this.findTitleIndex(headings);
    const bodyDepths = headings
      .filter((_, index) => index !== titleIndex)
      .map(heading => heading.depth);
    const topDepth = bodyDepths.length > 0 ? Math.min(...bodyDepths) : headings[0].depth;

    headings.forEach((heading, index) => {
      const contentEnd = index + 1 < headings.length ? headings[index + 1].lineStart : markdown.length;
      const level = index === titleIndex ? 1 : Math.max(1, heading.depth - topDepth + 1);

      sections.push({
        kind: index === titleIndex ? 'Title' : this.resolveKind(heading.vocabularyKind, level),
        heading: heading.text,
        level,
        depth: heading.depth,
        rawContent: markdown.slice(heading.contentStart, contentEnd),
        order: sections.length,
      });
    });

    return sections;
  }

  private findHeadings(markdown: string): HeadingLine[] {
    const headings: HeadingLine[] = [];
    let offset = 0;
    let openFence: string | null = null;

    for (const line of markdown.split('\n')) {
      const lineStart = offset;
      offset += line.length + 1;

      const fenceMatch = line.match(FENCE_PATTERN);
      if (openFence) {
        if (fenceMatch && fenceMatch[1][0] === openFence[0] && fenceMatch[1].length >= openFence.length) {
          openFence = null;
        }
        continue;
      }
      if (fenceMatch) {
        openFence = fenceMatch[1];
        continue;
      }

      const headingMatch = line.match(HEADING_PATTERN);
      if (headingMatch) {
        const text = headingMatch[2].trim();
        headings.push({
          depth: headingMatch[1].length,
          text,
          lineStart,
          contentStart: Math.min(offset, markdown.length),
          vocabularyKind: classifyHeading(text, this.vocabulary),
        });
      }
    }

    return headings;
  }

  /**
   * Index of the title heading, or -1.
   */
  private findTitleIndex(headings: HeadingLine[]): number {
    const explicit = headings.findIndex(heading => heading.vocabularyKind === 'Title');
    if (explicit !== -1) {
      return explicit;
    }

    const [first, ...rest] = headings;
    if (rest.length > 0 && first.vocabularyKind === null && rest.every(heading => heading.depth > first.depth)) {
      return 0;
    }
    return -1;
  }

  private resolveKind(vocabularyKind: SectionKind | null, level: number): SectionKind {
    if (vocabularyKind === null || vocabularyKind === 'BodySection') {
      return level === 1 ? 'BodySection' : 'Subsection';
    }
    return vocabularyKind;
  }
}

/**
 * Rebuild markdown from split sections. Heading lines come back in
 * canonical `## Heading` form.
 */
export function joinSections(sections: readonly Section[]): string {
  return sections
    .map(section =>
      section.depth > 0
        ? `${'#'.repeat(section.depth)} ${section.heading}\n${section.rawContent}`
        : section.rawContent
    )
    .join('');
}
