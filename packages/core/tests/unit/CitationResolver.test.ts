/**
 * Unit tests for CitationResolver
 *
 * Tests cover:
 * - Marker grammar (groups, locators, non-markers)
 * - All-or-nothing group resolution
 * - Unresolved key reporting and diagnostics
 * - Cited entry order
 * - Determinism
 */

import { CitationResolver, findCitationGroups } from '../../src/services/CitationResolver.js';
import { createNumericStyle } from '../../src/services/CitationStyles.js';
import { BibliographyIndex } from '../../src/managers/BibliographyIndex.js';
import type { Section } from '../../src/types/index.js';

const BIBLIOGRAPHY = `@article{smith2020, author = {Smith, John}, title = {Sleep}, journal = {J Sleep}, year = 2020}
@article{wilson2019, author = {Wilson, Ann}, title = {Exercise}, year = 2019}
@book{doe2018, author = {Doe, Jane}, title = {Methods}, year = 2018}
@misc{van_der_berg, title = {Underscored}}
`;

function makeSection(rawContent: string, order = 0): Section {
  return { kind: 'BodySection', heading: 'Background', level: 1, depth: 2, rawContent, order };
}

function buildIndex(): BibliographyIndex {
  const built = BibliographyIndex.build(BIBLIOGRAPHY);
  if (!built.ok) {
    throw new Error('test bibliography failed to load');
  }
  return built.value;
}

describe('findCitationGroups()', () => {
  it('should find single and multi-key groups with locators', () => {
    expect(findCitationGroups('See [@a] and [@b; @c, chap. 3].')).toEqual([
      { spanStart: 4, spanEnd: 8, sourceText: '[@a]', keys: ['a'], locators: [null] },
      { spanStart: 13, spanEnd: 30, sourceText: '[@b; @c, chap. 3]', keys: ['b', 'c'], locators: [null, 'chap. 3'] },
    ]);
  });

  it('should accept keys with punctuation inside', () => {
    const groups = findCitationGroups('[@doi:10.1000/xyz-1; @Smith_2020a]');

    expect(groups[0].keys).toEqual(['doi:10.1000/xyz-1', 'Smith_2020a']);
  });

  it.each(['[@a%b]', '[@a#b]', '[@a$b]', '[@a&b]', '[@smith2020; @a%b]'])(
    'should leave %p as text since the key holds a TeX special',
    text => {
      expect(findCitationGroups(text)).toEqual([]);
    },
  );

  it('should still accept colon, slash and plus in keys', () => {
    expect(findCitationGroups('[@smith:2020; @a/b+c]')[0].keys).toEqual(['smith:2020', 'a/b+c']);
  });

  it('should ignore brackets that are not citation groups', () => {
    expect(findCitationGroups('Email [me@example.com] and [see @smith2020] here')).toEqual([]);
  });

  it('should ignore links, escaped brackets and code', () => {
    const text = '[@smith2020](http://example.org) \\[@smith2020] `[@smith2020]`\n```\n[@smith2020]\n```\n';

    expect(findCitationGroups(text)).toEqual([]);
  });
});

describe('CitationResolver', () => {
  let index: BibliographyIndex;
  let resolver: CitationResolver;

  beforeEach(() => {
    index = buildIndex();
    resolver = new CitationResolver(index, createNumericStyle());
  });

  it('should replace a resolvable marker with a citation command', () => {
    const output = resolver.resolve([makeSection('Background text [@smith2020].')]);

    const section = output.sections[0];
    expect(section.resolvedContent).toBe('Background text \\cite{smith2020}.');
    expect(section.citations).toEqual([
      {
        spanStart: 16,
        spanEnd: 28,
        sourceText: '[@smith2020]',
        keys: ['smith2020'],
        locators: [null],
        resolved: true,
        renderedText: '\\cite{smith2020}',
      },
    ]);
    expect(section.markers).toEqual([
      { key: 'smith2020', spanStart: 16, spanEnd: 28, resolved: true, found: true, renderedText: '\\cite{smith2020}' },
    ]);
    expect(output.unresolvedKeys.size).toBe(0);
    expect(output.diagnostics).toEqual([]);
  });

  it('should flag a partially resolvable group as a whole', () => {
    const output = resolver.resolve([makeSection('[@wilson2019; @unknownkey]')]);

    const section = output.sections[0];
    expect(section.resolvedContent).toBe('\\textbf{[??~\\detokenize{wilson2019; unknownkey}]}');
    expect(section.markers.map(marker => [marker.key, marker.resolved, marker.found, marker.renderedText])).toEqual([
      ['wilson2019', false, true, null],
      ['unknownkey', false, false, null],
    ]);
    expect([...output.unresolvedKeys]).toEqual(['unknownkey']);
    expect(output.citedEntries).toEqual([]);
    expect(output.diagnostics).toEqual([
      {
        category: 'citation',
        code: 'CITATION_NOT_FOUND',
        message: 'Citation key "unknownkey" not found in bibliography (1 occurrence)',
        stage: 'ResolvingCitations',
        key: 'unknownkey',
      },
    ]);
  });

  it('should keep keys in their written order', () => {
    const output = resolver.resolve([makeSection('[@wilson2019; @smith2020]')]);

    expect(output.sections[0].resolvedContent).toBe('\\cite{wilson2019,smith2020}');
  });

  it('should render locators per item', () => {
    const output = resolver.resolve([makeSection('[@smith2020, p. 12; @doe2018]')]);

    expect(output.sections[0].resolvedContent).toBe('\\cite[p. 12]{smith2020}, \\cite{doe2018}');
  });

  it('should flag every occurrence of a missing key but report it once', () => {
    const output = resolver.resolve([
      makeSection('A [@ghost]. B [@ghost].', 0),
      makeSection('C [@ghost; @smith2020].', 1),
    ]);

    expect(output.sections[0].resolvedContent).toBe(
      'A \\textbf{[??~\\detokenize{ghost}]}. B \\textbf{[??~\\detokenize{ghost}]}.'
    );
    expect(output.sections[1].resolvedContent).toBe('C \\textbf{[??~\\detokenize{ghost; smith2020}]}.');
    expect([...output.unresolvedKeys]).toEqual(['ghost']);
    expect(output.diagnostics.map(diagnostic => diagnostic.message)).toEqual([
      'Citation key "ghost" not found in bibliography (3 occurrences)',
    ]);
  });

  it('should list cited entries once, in first-citation order', () => {
    const output = resolver.resolve([
      makeSection('[@wilson2019] then [@smith2020]', 0),
      makeSection('[@smith2020; @doe2018] and [@doe2018; @missing]', 1),
    ]);

    expect(output.citedEntries.map(entry => entry.key)).toEqual(['wilson2019', 'smith2020', 'doe2018']);
  });

  it('should not escape keys inside citation commands', () => {
    const output = resolver.resolve([makeSection('[@van_der_berg]')]);

    expect(output.sections[0].resolvedContent).toBe('\\cite{van_der_berg}');
  });

  it('should leave text without markers unchanged', () => {
    const section = makeSection('No citations [here](http://example.org).');

    const output = resolver.resolve([section]);

    expect(output.sections[0]).toEqual({ ...section, resolvedContent: section.rawContent, citations: [], markers: [] });
  });

  it('should not modify the index', () => {
    const keysBefore = index.keys();

    resolver.resolve([makeSection('[@smith2020; @nobody]')]);

    expect(index.keys()).toEqual(keysBefore);
    expect(index.has('nobody')).toBe(false);
  });

  it('should produce identical output on repeated runs', () => {
    const sections = [makeSection('[@doe2018] [@x; @smith2020] [@wilson2019, fig. 2]', 0), makeSection('[@y]', 1)];

    expect(resolver.resolve(sections)).toEqual(resolver.resolve(sections));
  });
});
