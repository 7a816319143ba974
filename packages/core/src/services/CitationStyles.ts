import type { BibEntry, CitationRenderRule, CitedItem } from '../types/index.js';
import { escapeLatex } from '../utils/latex.js';

export type CitationStyleName = 'numeric' | 'natbib' | 'biblatex';

export const CITATION_STYLE_NAMES: readonly CitationStyleName[] = ['numeric', 'natbib', 'biblatex'];

export interface BibliographyFileOptions {
  bibliographyFile?: string;     // Without the .bib extension
  bibliographyStyle?: string;    // natbib only
}

/**
 * Render `\cmd{a,b}`, or one command per item when any item carries a locator.
 */
export function renderCiteCommand(command: string, items: readonly CitedItem[]): string {
  if (items.every(item => item.locator === null)) {
    return `${command}{${items.map(item => item.entry.key).join(',')}}`;
  }
  return items
    .map(item =>
      item.locator === null
        ? `${command}{${item.entry.key}}`
        : `${command}[${escapeLatex(item.locator)}]{${item.entry.key}}`
    )
    .join(', ');
}

/**
 * Visibly flagged placeholder for a group that could not be resolved.
 */
export function renderUnresolvedMarker(keys: readonly string[]): string {
  return `\\textbf{[??~\\detokenize{${keys.join('; ')}}]}`;
}

/**
 * Numeric `\cite` style with a self-contained Vancouver-like
 * `thebibliography` block in first-citation order.
 */
export function createNumericStyle(): CitationRenderRule {
  return {
    name: 'numeric',
    renderCitation: items => renderCiteCommand('\\cite', items),
    renderUnresolved: keys => renderUnresolvedMarker(keys),
    renderBibliography: entries => {
      if (entries.length === 0) {
        return '';
      }
      const widest = '9'.repeat(String(entries.length).length);
      const items = entries.map(entry => `\\bibitem{${entry.key}} ${formatVancouver(entry)}`);
      return [`\\begin{thebibliography}{${widest}}`, ...items, '\\end{thebibliography}'].join('\n');
    },
  };
}

/**
 * Author-year natbib style (`\citep`), bibliography produced by BibTeX.
 */
export function createNatbibStyle(options: BibliographyFileOptions = {}): CitationRenderRule {
  const file = options.bibliographyFile ?? 'references';
  const style = options.bibliographyStyle ?? 'plainnat';
  return {
    name: 'natbib',
    renderCitation: items => renderCiteCommand('\\citep', items),
    renderUnresolved: keys => renderUnresolvedMarker(keys),
    renderBibliography: () => `\\bibliographystyle{${style}}\n\\bibliography{${file}}`,
    renderPreamble: () => '\\usepackage{natbib}',
  };
}

/**
 * biblatex style (`\autocite`), bibliography printed from the `\addbibresource` file.
 */
export function createBiblatexStyle(options: BibliographyFileOptions = {}): CitationRenderRule {
  const file = options.bibliographyFile ?? 'references';
  return {
    name: 'biblatex',
    renderCitation: items => renderCiteCommand('\\autocite', items),
    renderUnresolved: keys => renderUnresolvedMarker(keys),
    renderBibliography: () => '\\printbibliography',
    renderPreamble: () => `\\usepackage[backend=biber]{biblatex}\n\\addbibresource{${file}.bib}`,
  };
}

export function isCitationStyleName(value: string): value is CitationStyleName {
  return CITATION_STYLE_NAMES.some(name => name === value);
}

export function getCitationStyle(name: CitationStyleName, options: BibliographyFileOptions = {}): CitationRenderRule {
  switch (name) {
    case 'numeric':
      return createNumericStyle();
    case 'natbib':
      return createNatbibStyle(options);
    case 'biblatex':
      return createBiblatexStyle(options);
  }
}

// ============================================================================
// Vancouver formatting
// ============================================================================

const MAX_LISTED_AUTHORS = 6;

/**
 * Format one entry as `Smith J, Doe A. Title. Journal. 2020;12(3):45-67.`
 *
 * Field values are BibTeX, i.e. already LaTeX; only protective braces are removed.
 */
export function formatVancouver(entry: BibEntry): string {
  const fields = entry.fields;
  const parts: string[] = [];

  const authors = formatAuthors(fields.author ?? fields.editor ?? '');
  if (authors) {
    parts.push(authors);
  }

  if (fields.title) {
    parts.push(stripBraces(fields.title));
  }

  const container = fields.journal ?? fields.booktitle ?? fields.publisher;
  if (container) {
    parts.push(stripBraces(container));
  }

  let issue = fields.year ?? '';
  if (fields.volume) {
    issue += `;${fields.volume}`;
    if (fields.number) {
      issue += `(${fields.number})`;
    }
  }
  if (fields.pages) {
    issue += `:${fields.pages.replace(/-+/g, '-')}`;
  }
  if (issue) {
    parts.push(issue);
  }

  if (parts.length === 0) {
    return `${escapeLatex(entry.key)}.`;
  }

  return parts.map(part => part.replace(/[.\s]+$/, '')).join('. ') + '.';
}

function formatAuthors(authorField: string): string {
  if (!authorField.trim()) {
    return '';
  }

  const names = authorField
    .split(/\s+and\s+/)
    .map(name => name.trim())
    .filter(name => name.length > 0);

  const formatted = names
    .filter(name => name !== 'others')
    .slice(0, MAX_LISTED_AUTHORS)
    .map(formatAuthorName);

  const truncated = names.length > MAX_LISTED_AUTHORS || names.includes('others');
  return formatted.join(', ') + (truncated ? ', et al' : '');
}

function formatAuthorName(name: string): string {
  const clean = stripBraces(name);
  let last: string;
  let given: string;

  if (clean.includes(',')) {
    const [lastPart, ...rest] = clean.split(',');
    last = lastPart.trim();
    given = rest.join(' ').trim();
  } else {
    const words = clean.split(/\s+/);
    last = words.pop() ?? '';
    given = words.join(' ');
  }

  const initials = given
    .split(/[\s-]+/)
    .filter(word => word.length > 0)
    .map(word => word[0].toUpperCase())
    .join('');

  return initials ? `${last} ${initials}` : last;
}

function stripBraces(text: string): string {
  return text.replace(/(?<!\\)[{}]/g, '');
}
