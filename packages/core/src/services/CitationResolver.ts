import type {
  BibEntry,
  CitationGroup,
  CitationMarker,
  CitationRenderRule,
  CitedItem,
  Diagnostic,
  ResolvedSection,
  Section,
} from '../types/index.js';
import type { BibliographyIndex } from '../managers/BibliographyIndex.js';
import { findCodeRanges, isInsideRanges } from '../utils/text.js';

/**
 * A bracketed group found in text, before lookup.
 */
export interface ParsedCitationGroup {
  spanStart: number;
  spanEnd: number;
  sourceText: string;
  keys: string[];
  locators: (string | null)[];
}

export interface ResolveOutput {
  sections: ResolvedSection[];
  unresolvedKeys: Set<string>;
  citedEntries: BibEntry[];      // Resolved groups only, first appearance order
  diagnostics: Diagnostic[];
}

// Non-nested [...] containing an '@', not directly followed by '(' (a link)
const GROUP_PATTERN = /\[([^[\]]*@[^[\]]*)\](?!\()/g;
// Keys never carry TeX specials (% # $ & \ ^ { }), which would break \cite{...}
const PART_PATTERN = /^@([A-Za-z0-9_](?:[\w:.+?<>~/-]*[\w+?<>~/-])?)(?:\s*,\s*(\S.*?))?$/;

/**
 * Find citation groups such as `[@a]`, `[@a; @b]` or `[@a, p. 4]` in text.
 *
 * Every `;`-separated part must be `@key` with an optional `, locator`,
 * otherwise the bracket is plain text. Escaped brackets, links and
 * anything inside code spans or fenced code blocks are skipped.
 */
export function findCitationGroups(text: string): ParsedCitationGroup[] {
  const groups: ParsedCitationGroup[] = [];
  const codeRanges = findCodeRanges(text);
  const pattern = new RegExp(GROUP_PATTERN.source, 'g');
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const spanStart = match.index;
    if (spanStart > 0 && text[spanStart - 1] === '\\') {
      continue;
    }
    if (isInsideRanges(spanStart, codeRanges)) {
      continue;
    }

    const keys: string[] = [];
    const locators: (string | null)[] = [];
    let valid = true;

    for (const part of match[1].split(';')) {
      const partMatch = part.trim().match(PART_PATTERN);
      if (!partMatch) {
        valid = false;
        break;
      }
      keys.push(partMatch[1]);
      locators.push(partMatch[2] ?? null);
    }

    if (valid && keys.length > 0) {
      groups.push({
        spanStart,
        spanEnd: spanStart + match[0].length,
        sourceText: match[0],
        keys,
        locators,
      });
    }
  }

  return groups;
}

/**
 * CitationResolver rewrites citation markers into citation commands.
 *
 * Each group resolves all-or-nothing: when every key is in the index the
 * group becomes one command listing the keys in their written order;
 * otherwise the whole group becomes the style's flagged placeholder and
 * its missing keys are reported. Keys are never guessed or fuzzy-matched.
 *
 * The index is only read. Output depends on the inputs alone, so running
 * it twice gives the same result.
 */
export class CitationResolver {
  constructor(
    private readonly index: BibliographyIndex,
    private readonly style: CitationRenderRule
  ) {}

  resolve(sections: readonly Section[]): ResolveOutput {
    const unresolvedKeys = new Set<string>();
    const missingCounts = new Map<string, number>();
    const citedEntries: BibEntry[] = [];
    const cited = new Set<string>();

    const resolvedSections = sections.map(section => {
      const resolved = this.resolveSection(section);

      for (const group of resolved.citations) {
        if (group.resolved) {
          for (const key of group.keys) {
            const entry = this.index.get(key);
            if (entry && !cited.has(key)) {
              cited.add(key);
              citedEntries.push(entry);
            }
          }
          continue;
        }
        for (const key of group.keys) {
          if (!this.index.has(key)) {
            unresolvedKeys.add(key);
            missingCounts.set(key, (missingCounts.get(key) ?? 0) + 1);
          }
        }
      }

      return resolved;
    });

    const diagnostics: Diagnostic[] = [...missingCounts].map(([key, count]) => ({
      category: 'citation',
      code: 'CITATION_NOT_FOUND',
      message: `Citation key "${key}" not found in bibliography (${count} ${count === 1 ? 'occurrence' : 'occurrences'})`,
      stage: 'ResolvingCitations',
      key,
    }));

    return { sections: resolvedSections, unresolvedKeys, citedEntries, diagnostics };
  }

  /**
   * Resolve the groups of one section. Offsets refer to `rawContent`.
   */
  resolveSection(section: Section): ResolvedSection {
    const citations: CitationGroup[] = [];
    const markers: CitationMarker[] = [];
    const pieces: string[] = [];
    let cursor = 0;

    for (const parsed of findCitationGroups(section.rawContent)) {
      const entries = parsed.keys.map(key => this.index.get(key));
      const found = entries.map(entry => entry !== undefined);
      const resolved = found.every(Boolean);

      let renderedText: string;
      if (resolved) {
        const items: CitedItem[] = [];
        entries.forEach((entry, i) => {
          if (entry) {
            items.push({ entry, locator: parsed.locators[i] });
          }
        });
        renderedText = this.style.renderCitation(items);
      } else {
        renderedText = this.style.renderUnresolved(parsed.keys, parsed.sourceText);
      }

      citations.push({ ...parsed, resolved, renderedText });
      parsed.keys.forEach((key, i) => {
        markers.push({
          key,
          spanStart: parsed.spanStart,
          spanEnd: parsed.spanEnd,
          resolved,
          found: found[i],
          renderedText: resolved ? renderedText : null,
        });
      });

      pieces.push(section.rawContent.slice(cursor, parsed.spanStart), renderedText);
      cursor = parsed.spanEnd;
    }
    pieces.push(section.rawContent.slice(cursor));

    return {
      kind: section.kind,
      heading: section.heading,
      level: section.level,
      depth: section.depth,
      rawContent: section.rawContent,
      order: section.order,
      resolvedContent: pieces.join(''),
      citations,
      markers,
    };
  }
}
