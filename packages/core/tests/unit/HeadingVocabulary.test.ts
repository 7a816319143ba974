import {
  DEFAULT_HEADING_VOCABULARY,
  classifyHeading,
  extendVocabulary,
  normalizeHeading,
} from '../../src/parsers/HeadingVocabulary.js';

describe('HeadingVocabulary', () => {
  describe('classifyHeading()', () => {
    const cases: Array<[string, string | null]> = [
      ['Abstract', 'Abstract'],
      ['ABSTRACT', 'Abstract'],
      ['Résumé', 'Abstract'],
      ['Keywords', 'Keywords'],
      ['Mots-clés', 'Keywords'],
      ['References', 'References'],
      ['Bibliographie', 'References'],
      ['Title', 'Title'],
      ['1. Introduction', 'BodySection'],
      ['II. Results', 'BodySection'],
      ['Materials and Methods', 'BodySection'],
      ['Case Report', 'BodySection'],
      ['Study population', null],
      ['Intro', null],
      ['', null],
    ];

    it.each(cases)('should classify "%s" as %s', (heading, expected) => {
      expect(classifyHeading(heading, DEFAULT_HEADING_VOCABULARY)).toBe(expected);
    });

    it('should let earlier rows win', () => {
      // "references" comes before the body row's "methods"
      expect(classifyHeading('References for methods', DEFAULT_HEADING_VOCABULARY)).toBe('References');
    });

    it('should match whole-heading words only when they are the whole heading', () => {
      expect(classifyHeading('Summary', DEFAULT_HEADING_VOCABULARY)).toBe('Abstract');
      expect(classifyHeading('2. Summary', DEFAULT_HEADING_VOCABULARY)).toBe('Abstract');
      expect(classifyHeading('Summary of results', DEFAULT_HEADING_VOCABULARY)).toBe('BodySection');
      expect(classifyHeading('Summary of the cohort', DEFAULT_HEADING_VOCABULARY)).toBeNull();
      expect(classifyHeading('Résumé des résultats', DEFAULT_HEADING_VOCABULARY)).toBe('BodySection');
    });
  });

  describe('extendVocabulary()', () => {
    it('should add new keywords', () => {
      const vocabulary = extendVocabulary(DEFAULT_HEADING_VOCABULARY, [{ kind: 'Abstract', keywords: ['synopsis'] }]);

      expect(classifyHeading('Synopsis', vocabulary)).toBe('Abstract');
      expect(classifyHeading('Synopsis', DEFAULT_HEADING_VOCABULARY)).toBeNull();
    });

    it('should accept whole-heading rows', () => {
      const vocabulary = extendVocabulary(DEFAULT_HEADING_VOCABULARY, [{ kind: 'Keywords', keywords: [], headings: ['tags'] }]);

      expect(classifyHeading('Tags', vocabulary)).toBe('Keywords');
      expect(classifyHeading('Tags and labels', vocabulary)).toBeNull();
    });

    it('should give extra rows precedence', () => {
      const vocabulary = extendVocabulary(DEFAULT_HEADING_VOCABULARY, [{ kind: 'BodySection', keywords: ['summary'] }]);

      expect(classifyHeading('Summary', vocabulary)).toBe('BodySection');
    });
  });

  describe('normalizeHeading()', () => {
    it('should drop numbering, case, accents and punctuation', () => {
      expect(normalizeHeading('2.3 Statistical Analysis')).toBe('statistical analysis');
      expect(normalizeHeading('A) Méthodes:')).toBe('methodes');
      expect(normalizeHeading('  Conflicts-of-Interest  ')).toBe('conflicts of interest');
    });
  });
});
