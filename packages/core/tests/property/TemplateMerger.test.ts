import fc from 'fast-check';
import { TemplateMerger } from '../../src/services/TemplateMerger.js';
import { SECTION_KINDS } from '../../src/types/index.js';
import type { PlaceholderSpec, ResolvedSection, Template } from '../../src/types/index.js';

/**
 * Property-based tests for TemplateMerger
 *
 * These tests verify that every section is accounted for exactly once,
 * either placed in a placeholder or listed as unused.
 */
describe('TemplateMerger Property-Based Tests', () => {
  const sectionsArbitrary = fc
    .array(
      fc.record({
        kind: fc.constantFrom(...SECTION_KINDS),
        heading: fc.constantFrom('Background', 'Methods', 'Notes', 'Summary'),
        level: fc.integer({ min: 1, max: 3 }),
        body: fc.stringMatching(/^[a-z ]{0,12}$/),
      }),
      { maxLength: 10 }
    )
    .map(rows =>
      rows.map(
        (row, order): ResolvedSection => ({
          kind: row.kind,
          heading: row.heading,
          level: row.level,
          depth: row.level + 1,
          rawContent: row.body,
          order,
          resolvedContent: row.body,
          citations: [],
          markers: [],
        })
      )
    );

  const placeholdersArbitrary = fc
    .array(
      fc.record({
        kind: fc.constantFrom(...SECTION_KINDS),
        repeat: fc.boolean(),
        required: fc.boolean(),
        insert: fc.constantFrom<PlaceholderSpec['insert']>('content', 'heading', 'section'),
        heading: fc.option(fc.constantFrom('Methods', 'Summary'), { nil: undefined }),
      }),
      { maxLength: 6 }
    )
    .map(rows => rows.map((row, index): PlaceholderSpec => ({ name: `p${index}`, ...row })));

  function toTemplate(placeholders: PlaceholderSpec[]): Template {
    return {
      name: 'generated',
      source: placeholders.map(spec => `{{SECTION:${spec.name}}}`).join('\n'),
      placeholders,
      contentFormat: 'verbatim',
    };
  }

  /**
   * Property 1: Used and unused sections partition the input
   */
  it('should account for every section exactly once', () => {
    fc.assert(
      fc.property(sectionsArbitrary, placeholdersArbitrary, (sections, placeholders) => {
        const result = new TemplateMerger().merge(sections, toTemplate(placeholders));

        const used = result.sectionsUsed.flatMap(fill => fill.sections.map(section => section.order));
        const unused = result.sectionsUnused.map(section => section.order);

        expect([...used, ...unused].sort((a, b) => a - b)).toEqual(sections.map(section => section.order));
      }),
      { numRuns: 50 }
    );
  });

  /**
   * Property 2: Every declared placeholder is either filled or empty
   */
  it('should either fill or list each placeholder', () => {
    fc.assert(
      fc.property(sectionsArbitrary, placeholdersArbitrary, (sections, placeholders) => {
        const result = new TemplateMerger().merge(sections, toTemplate(placeholders));

        const filled = result.sectionsUsed.map(fill => fill.placeholder);
        expect([...filled, ...result.emptyPlaceholders].sort()).toEqual(placeholders.map(spec => spec.name).sort());
      }),
      { numRuns: 50 }
    );
  });
});
