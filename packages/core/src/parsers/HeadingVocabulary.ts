import type { HeadingVocabulary, HeadingVocabularyEntry, SectionKind } from '../types/index.js';
import { normalizeForMatching, stripSectionNumbering } from '../utils/text.js';

/**
 * Default heading vocabulary for English and French medical manuscripts.
 *
 * Rows are tried in order; the first row with a keyword found in the
 * heading decides the kind. Keywords are matched as whole words after
 * normalization, so "Materials and Methods" matches "methods". Words that
 * also open ordinary headings ("Summary of results") are `headings`, matched
 * only against the whole heading.
 */
export const DEFAULT_HEADING_VOCABULARY: HeadingVocabulary = [
  {
    kind: 'References',
    keywords: ['references', 'reference list', 'bibliography', 'bibliographie', 'literature cited', 'works cited'],
  },
  {
    kind: 'Abstract',
    keywords: ['abstract'],
    headings: ['summary', 'resume'],
  },
  {
    kind: 'Keywords',
    keywords: ['keywords', 'keyword', 'key words', 'index terms', 'mots cles', 'mots clefs'],
  },
  {
    kind: 'Title',
    keywords: ['title', 'titre'],
  },
  {
    kind: 'BodySection',
    keywords: [
      'introduction',
      'background',
      'methods',
      'method',
      'methodology',
      'materials',
      'patients',
      'results',
      'findings',
      'discussion',
      'conclusion',
      'conclusions',
      'limitations',
      'case report',
      'case presentation',
      'acknowledgements',
      'acknowledgments',
      'funding',
      'conflicts of interest',
      'methodes',
      'resultats',
      'remerciements',
    ],
  },
];

/**
 * Prepend extra rows so they take precedence over `base`.
 */
export function extendVocabulary(
  base: HeadingVocabulary,
  extra: readonly HeadingVocabularyEntry[]
): HeadingVocabulary {
  return [...extra, ...base];
}

/**
 * Normalize a heading for matching: numbering removed, lower case,
 * diacritics and punctuation stripped.
 */
export function normalizeHeading(heading: string): string {
  return normalizeForMatching(stripSectionNumbering(heading));
}

/**
 * Find the vocabulary kind for a heading, or null when no row matches.
 */
export function classifyHeading(heading: string, vocabulary: HeadingVocabulary): SectionKind | null {
  const normalized = ` ${normalizeHeading(heading)} `;
  if (normalized.trim() === '') {
    return null;
  }

  for (const entry of vocabulary) {
    for (const heading of entry.headings ?? []) {
      if (normalized.trim() === normalizeForMatching(heading)) {
        return entry.kind;
      }
    }
    for (const keyword of entry.keywords) {
      const needle = normalizeForMatching(keyword);
      if (needle && normalized.includes(` ${needle} `)) {
        return entry.kind;
      }
    }
  }

  return null;
}
