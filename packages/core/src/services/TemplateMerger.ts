import type {
  BibEntry,
  CitationRenderRule,
  Diagnostic,
  HeadingVocabulary,
  MergeResult,
  PlaceholderFill,
  PlaceholderSpec,
  ResolvedSection,
  SectionKind,
  SectionRef,
  Template,
} from '../types/index.js';
import { DEFAULT_HEADING_VOCABULARY, classifyHeading, normalizeHeading } from '../parsers/HeadingVocabulary.js';
import { findTemplateTokens } from '../parsers/TemplateParser.js';
import { escapeLatex, getSectionCommand } from '../utils/latex.js';
import { LatexContentRenderer } from './LatexContentRenderer.js';

const DOCUMENT_START = '\\begin{document}';

export interface TemplateMergerOptions {
  style?: CitationRenderRule;        // Renders {{BIBLIOGRAPHY}}
  citedEntries?: readonly BibEntry[];
  vocabulary?: HeadingVocabulary;    // Recognises explicit "Title" headings
}

/**
 * Index-addressed section queues, one per kind.
 *
 * Each kind keeps a cursor to its first possibly-unused section. Plain
 * placeholders consume from the cursor; heading-constrained placeholders
 * scan the kind's list without moving the cursor, so nothing is reordered.
 */
class SectionQueue {
  private readonly indicesByKind = new Map<SectionKind, number[]>();
  private readonly cursors = new Map<SectionKind, number>();
  private readonly used: boolean[];

  constructor(private readonly sections: readonly ResolvedSection[]) {
    this.used = sections.map(() => false);
    sections.forEach((section, index) => {
      const indices = this.indicesByKind.get(section.kind) ?? [];
      indices.push(index);
      this.indicesByKind.set(section.kind, indices);
    });
  }

  take(spec: PlaceholderSpec): number[] {
    const indices = this.indicesByKind.get(spec.kind) ?? [];
    const taken: number[] = [];

    if (spec.heading === undefined) {
      let cursor = this.cursors.get(spec.kind) ?? 0;
      while (cursor < indices.length && (taken.length === 0 || spec.repeat)) {
        const index = indices[cursor];
        cursor++;
        if (!this.used[index]) {
          this.used[index] = true;
          taken.push(index);
        }
      }
      this.cursors.set(spec.kind, cursor);
      return taken;
    }

    const wanted = normalizeHeading(spec.heading);
    for (const index of indices) {
      if (!this.used[index] && normalizeHeading(this.sections[index].heading) === wanted) {
        this.used[index] = true;
        taken.push(index);
        if (!spec.repeat) {
          break;
        }
      }
    }
    return taken;
  }

  /**
   * Claim the unused subsections nested under a placed section: those that
   * follow it before the next section at its level or shallower.
   */
  takeDescendants(parentIndex: number): number[] {
    const parent = this.sections[parentIndex];
    const taken: number[] = [];
    if (parent.depth === 0) {
      return taken;
    }

    for (let index = parentIndex + 1; index < this.sections.length; index++) {
      const section = this.sections[index];
      if (section.level <= parent.level) {
        break;
      }
      if (section.kind === 'Subsection' && !this.used[index]) {
        this.used[index] = true;
        taken.push(index);
      }
    }
    return taken;
  }

  unusedIndices(): number[] {
    return this.used.flatMap((used, index) => (used ? [] : [index]));
  }
}

interface Placement {
  spec: PlaceholderSpec;
  groups: Array<{ parent: number; children: number[] }>;
}

function toRef(section: ResolvedSection): SectionRef {
  return { order: section.order, kind: section.kind, heading: section.heading };
}

/**
 * TemplateMerger places resolved sections into a template's placeholders.
 *
 * Placeholders are filled in declaration order, first-fit by kind (and
 * heading, when declared). Nothing here is fatal: a required placeholder
 * without a match is left empty with a warning, and sections no placeholder
 * takes are listed and dropped from the document.
 */
export class TemplateMerger {
  private readonly vocabulary: HeadingVocabulary;

  constructor(private readonly options: TemplateMergerOptions = {}) {
    this.vocabulary = options.vocabulary ?? DEFAULT_HEADING_VOCABULARY;
  }

  merge(sections: readonly ResolvedSection[], template: Template): MergeResult {
    const diagnostics: Diagnostic[] = [];
    const tokens = findTemplateTokens(template.source);
    const declared = new Map(template.placeholders.map(spec => [spec.name, spec]));
    const inSource = new Set<string>();

    for (const token of tokens) {
      if (token.name === null) {
        continue;
      }
      if (!declared.has(token.name) && !inSource.has(token.name)) {
        diagnostics.push({
          category: 'structural',
          code: 'UNDECLARED_TOKEN',
          message: `Template token {{SECTION:${token.name}}} has no placeholder declaration; it was left empty`,
          stage: 'Merging',
          placeholder: token.name,
        });
      }
      inSource.add(token.name);
    }

    for (const spec of template.placeholders) {
      if (!inSource.has(spec.name)) {
        diagnostics.push({
          category: 'structural',
          code: 'PLACEHOLDER_NOT_IN_SOURCE',
          message: `Placeholder "${spec.name}" is declared but {{SECTION:${spec.name}}} does not appear in template "${template.name}"`,
          stage: 'Merging',
          placeholder: spec.name,
        });
      }
    }

    const queue = new SectionQueue(sections);
    const placements = new Map<string, Placement>();
    const sectionsUsed: PlaceholderFill[] = [];
    const emptyPlaceholders: string[] = [];

    for (const spec of template.placeholders) {
      if (!inSource.has(spec.name)) {
        continue;
      }

      const groups = queue.take(spec).map(parent => ({
        parent,
        children: spec.insert === 'heading' ? [] : queue.takeDescendants(parent),
      }));

      if (groups.length === 0) {
        emptyPlaceholders.push(spec.name);
        if (spec.required) {
          const headed = spec.heading === undefined ? '' : ` headed "${spec.heading}"`;
          diagnostics.push({
            category: 'structural',
            code: 'REQUIRED_PLACEHOLDER_MISSING',
            message: `Required placeholder "${spec.name}" missing: no matching ${spec.kind} section${headed}`,
            stage: 'Merging',
            placeholder: spec.name,
          });
        }
        continue;
      }

      placements.set(spec.name, { spec, groups });
      sectionsUsed.push({
        placeholder: spec.name,
        sections: groups.flatMap(group => [group.parent, ...group.children]).map(index => toRef(sections[index])),
      });
    }

    const sectionsUnused: SectionRef[] = [];
    for (const index of queue.unusedIndices()) {
      const section = sections[index];
      sectionsUnused.push(toRef(section));
      if (section.depth === 0 && !section.rawContent.trim()) {
        continue;
      }
      const label = section.depth === 0 ? 'Text before the first heading' : `Section "${section.heading}"`;
      diagnostics.push({
        category: 'structural',
        code: 'SECTION_UNUSED',
        message: `${label} (${section.kind}) has no placeholder; its content was dropped`,
        stage: 'Merging',
        sectionOrder: section.order,
      });
    }

    const rendered = new Map<string, string>();
    for (const [name, placement] of placements) {
      rendered.set(name, this.renderPlacement(sections, placement, template));
    }

    const preamble = this.options.style?.renderPreamble?.() ?? '';
    const placed = [...tokens];
    if (preamble && !tokens.some(token => token.type === 'citationPackages')) {
      const documentStart = template.source.indexOf(DOCUMENT_START);
      if (documentStart === -1) {
        diagnostics.push({
          category: 'structural',
          code: 'CITATION_PACKAGES_NOT_PLACED',
          message: `Template "${template.name}" has neither {{CITATION_PACKAGES}} nor ${DOCUMENT_START}; add the ${this.options.style?.name} citation packages by hand`,
          stage: 'Merging',
        });
      } else {
        placed.push({ start: documentStart, end: documentStart, type: 'citationPackages', name: null });
        placed.sort((a, b) => a.start - b.start);
      }
    }

    const pieces: string[] = [];
    let cursor = 0;
    for (const token of placed) {
      pieces.push(template.source.slice(cursor, token.start));
      if (token.type === 'bibliography') {
        pieces.push(this.renderBibliography());
      } else if (token.type === 'citationPackages') {
        // Zero-width tokens are insertions ahead of \begin{document}
        pieces.push(token.start === token.end && preamble ? `${preamble}\n\n` : preamble);
      } else if (token.name !== null) {
        pieces.push(rendered.get(token.name) ?? '');
      }
      cursor = token.end;
    }
    pieces.push(template.source.slice(cursor));

    return {
      finalDocument: pieces.join(''),
      sectionsUsed,
      sectionsUnused,
      emptyPlaceholders,
      diagnostics,
    };
  }

  private renderBibliography(): string {
    const style = this.options.style;
    if (!style?.renderBibliography) {
      return '';
    }
    return style.renderBibliography(this.options.citedEntries ?? []);
  }

  private renderPlacement(
    sections: readonly ResolvedSection[],
    placement: Placement,
    template: Template
  ): string {
    const { spec, groups } = placement;
    const blocks: string[] = [];

    for (const group of groups) {
      const parent = sections[group.parent];

      if (spec.insert === 'heading') {
        blocks.push(this.renderHeadingText(parent, template));
        continue;
      }

      if (spec.insert === 'section') {
        blocks.push(this.renderHeaded(parent, getSectionCommand(parent.level), template));
      } else {
        blocks.push(this.renderBody(parent, template));
      }

      for (const childIndex of group.children) {
        const child = sections[childIndex];
        const command = spec.insert === 'section' ? getSectionCommand(child.level) : '\\paragraph*';
        blocks.push(this.renderHeaded(child, command, template));
      }
    }

    return blocks.filter(block => block.length > 0).join('\n\n');
  }

  private renderHeaded(section: ResolvedSection, command: string, template: Template): string {
    const body = this.renderBody(section, template);
    if (section.depth === 0) {
      return body;
    }
    const heading = `${command}{${this.renderHeading(section.heading, template)}}`;
    return body ? `${heading}\n\n${body}` : heading;
  }

  private renderHeadingText(section: ResolvedSection, template: Template): string {
    // A heading that merely says "Title" carries the title in its body
    if (section.depth === 0 || classifyHeading(section.heading, this.vocabulary) === 'Title') {
      return this.renderBody(section, template).replace(/\s*\n\s*/g, ' ');
    }
    return this.renderHeading(section.heading, template);
  }

  private renderHeading(heading: string, template: Template): string {
    if (template.contentFormat === 'verbatim') {
      return heading;
    }
    return new LatexContentRenderer().renderMarkdown(heading) || escapeLatex(heading);
  }

  private renderBody(section: ResolvedSection, template: Template): string {
    if (template.contentFormat === 'verbatim') {
      return section.resolvedContent.trim();
    }
    return new LatexContentRenderer().render(section).trim();
  }
}
