import type { ResolvedSection } from '../types/index.js';
import { escapeLatex } from '../utils/latex.js';
import { FENCE_PATTERN } from '../utils/text.js';

const SENTINEL_OPEN = '\uE000';
const SENTINEL_CLOSE = '\uE001';
const SENTINEL_PATTERN = /\uE000(\d+)\uE001/g;

// Command boundaries survive escaping as private-use characters
const MARKS: ReadonlyArray<[string, string]> = [
  ['\uE010', '\\textbf{'],
  ['\uE011', '\\emph{'],
  ['\uE012', '\\textsuperscript{'],
  ['\uE013', '\\textsubscript{'],
  ['\uE01F', '}'],
];
const [BOLD, EMPH, SUP, SUB, CLOSE] = MARKS.map(([mark]) => mark);

const BULLET_ITEM = /^\s{0,3}[-*+][ \t]+(.*)$/;
const ORDERED_ITEM = /^\s{0,3}\d+[.)][ \t]+(.*)$/;
const TABLE_ROW = /^\s*\|/;
const TABLE_SEPARATOR = /^\s*\|?\s*:?-+:?\s*(?:\|\s*:?-+:?\s*)*\|?\s*$/;
const QUOTE_LINE = /^\s{0,3}>\s?(.*)$/;

/**
 * Escape a URL for use inside `\href` or `\url`.
 */
function escapeUrl(url: string): string {
  return url.replace(/([%#\\])/g, '\\$1');
}

/**
 * Converts section markdown (as produced by a DOCX converter) into LaTeX.
 *
 * Handles paragraphs, bullet and numbered lists, block quotes, pipe
 * tables, fenced code, emphasis, strong, code spans, links, images,
 * super/subscripts and backslash escapes. Math (`$...$`, `$$...$$`)
 * passes through untouched. Citation commands are substituted after
 * escaping so they are never altered.
 *
 * One instance per merge: the protected-span store is reset on each call.
 */
export class LatexContentRenderer {
  private store: string[] = [];

  /**
   * Render a resolved section's body, placing each citation group's rendered text.
   */
  render(section: ResolvedSection): string {
    this.store = [];
    const pieces: string[] = [];
    let cursor = 0;

    for (const group of section.citations) {
      pieces.push(section.rawContent.slice(cursor, group.spanStart), this.protect(group.renderedText));
      cursor = group.spanEnd;
    }
    pieces.push(section.rawContent.slice(cursor));

    return this.restore(this.renderBlocks(pieces.join('')));
  }

  /**
   * Render plain markdown with no citation groups.
   */
  renderMarkdown(markdown: string): string {
    this.store = [];
    return this.restore(this.renderBlocks(markdown));
  }

  private renderBlocks(text: string): string {
    const lines = text
      .replace(/<!--[\s\S]*?-->/g, '')
      .split('\n')
      .map(line => line.replace(/\r$/, ''));
    const blocks: string[] = [];
    let i = 0;

    while (i < lines.length) {
      const line = lines[i];

      if (!line.trim()) {
        i++;
        continue;
      }

      const fence = line.match(FENCE_PATTERN);
      if (fence) {
        const body: string[] = [];
        i++;
        while (i < lines.length) {
          const closing = lines[i].match(FENCE_PATTERN);
          if (closing && closing[1][0] === fence[1][0] && closing[1].length >= fence[1].length) {
            i++;
            break;
          }
          body.push(lines[i]);
          i++;
        }
        blocks.push(this.protect(`\\begin{verbatim}\n${body.join('\n')}\n\\end{verbatim}`));
        continue;
      }

      if (BULLET_ITEM.test(line) || ORDERED_ITEM.test(line)) {
        const consumed = this.renderList(lines, i);
        blocks.push(consumed.latex);
        i = consumed.next;
        continue;
      }

      if (TABLE_ROW.test(line)) {
        const rows: string[] = [];
        while (i < lines.length && TABLE_ROW.test(lines[i])) {
          rows.push(lines[i]);
          i++;
        }
        blocks.push(this.renderTable(rows));
        continue;
      }

      if (QUOTE_LINE.test(line)) {
        const inner: string[] = [];
        let quoteMatch: RegExpMatchArray | null;
        while (i < lines.length && (quoteMatch = lines[i].match(QUOTE_LINE)) !== null) {
          inner.push(quoteMatch[1]);
          i++;
        }
        blocks.push(`\\begin{quote}\n${this.renderBlocks(inner.join('\n'))}\n\\end{quote}`);
        continue;
      }

      const paragraph: string[] = [];
      while (i < lines.length && lines[i].trim() && !FENCE_PATTERN.test(lines[i])) {
        paragraph.push(lines[i]);
        i++;
      }
      blocks.push(this.renderParagraph(paragraph));
    }

    return blocks.join('\n\n');
  }

  private renderParagraph(lines: string[]): string {
    const standaloneImage = lines.length === 1 ? lines[0].trim().match(/^!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)$/) : null;
    if (standaloneImage) {
      const [, caption, url] = standaloneImage;
      const figure = ['\\begin{figure}[htbp]', '\\centering', `\\includegraphics[width=\\linewidth]{${url}}`];
      if (caption.trim()) {
        figure.push(`\\caption{${this.renderInline(caption)}}`);
      }
      figure.push('\\end{figure}');
      return figure.join('\n');
    }

    return this.renderInline(lines.map(line => line.replace(/^\s+/, '')).join('\n'));
  }

  private renderList(lines: string[], start: number): { latex: string; next: number } {
    const ordered = ORDERED_ITEM.test(lines[start]) && !BULLET_ITEM.test(lines[start]);
    const itemPattern = ordered ? ORDERED_ITEM : BULLET_ITEM;
    const otherPattern = ordered ? BULLET_ITEM : ORDERED_ITEM;
    const items: string[][] = [];
    let i = start;

    while (i < lines.length) {
      const line = lines[i];
      const itemMatch = line.match(itemPattern);

      if (itemMatch && !/^\s{4,}/.test(line)) {
        items.push([itemMatch[1]]);
        i++;
        continue;
      }

      if (!line.trim()) {
        let peek = i + 1;
        while (peek < lines.length && !lines[peek].trim()) {
          peek++;
        }
        if (peek < lines.length && (itemPattern.test(lines[peek]) || /^\s{2,}\S/.test(lines[peek]))) {
          i = peek;
          continue;
        }
        break;
      }

      if (otherPattern.test(line) && !/^\s{2,}/.test(line)) {
        break;
      }

      items[items.length - 1].push(line.trim().replace(itemPattern, '$1').replace(otherPattern, '$1'));
      i++;
    }

    const environment = ordered ? 'enumerate' : 'itemize';
    const body = items.map(item => `  \\item ${this.renderInline(item.join('\n'))}`);
    return {
      latex: [`\\begin{${environment}}`, ...body, `\\end{${environment}}`].join('\n'),
      next: i,
    };
  }

  private renderTable(rows: string[]): string {
    const splitRow = (row: string): string[] =>
      row
        .trim()
        .replace(/^\|/, '')
        .replace(/\|$/, '')
        .split('|')
        .map(cell => cell.trim());

    const separatorIndex = rows.findIndex(row => TABLE_SEPARATOR.test(row));
    const header = separatorIndex === 1 ? splitRow(rows[0]) : null;
    const bodyRows = rows.filter((_, index) => index !== separatorIndex && !(header && index === 0)).map(splitRow);

    const columnCount = Math.max(header?.length ?? 0, ...bodyRows.map(row => row.length), 1);
    const alignments = separatorIndex === -1
      ? Array.from({ length: columnCount }, () => 'l')
      : splitRow(rows[separatorIndex]).map(cell => {
          if (cell.startsWith(':') && cell.endsWith(':')) return 'c';
          if (cell.endsWith(':')) return 'r';
          return 'l';
        });
    while (alignments.length < columnCount) {
      alignments.push('l');
    }

    const renderRow = (cells: string[]): string => {
      const padded = [...cells];
      while (padded.length < columnCount) {
        padded.push('');
      }
      return padded.map(cell => this.renderInline(cell)).join(' & ') + ' \\\\';
    };

    const out = [`\\begin{tabular}{${alignments.join('')}}`, '\\hline'];
    if (header) {
      out.push(renderRow(header), '\\hline');
    }
    for (const row of bodyRows) {
      out.push(renderRow(row));
    }
    out.push('\\hline', '\\end{tabular}');
    return out.join('\n');
  }

  private renderInline(text: string): string {
    let out = text;

    // Hard line breaks: two trailing spaces or a trailing backslash
    out = out.replace(/(?: {2,}|\\)\n/g, () => `${this.protect('\\\\')}\n`);

    // Code spans
    out = out.replace(/(`+)([\s\S]*?[^`])\1(?!`)/g, (_match, _ticks: string, code: string) =>
      this.protect(`\\texttt{${escapeLatex(code.trim())}}`)
    );

    // Math
    out = out.replace(/\$\$([\s\S]+?)\$\$/g, (_match, math: string) => this.protect(`\\[${math}\\]`));
    out = out.replace(/\$(?!\s)[^$\n]+?(?<!\s)\$(?!\d)/g, match => this.protect(match));

    // Images, links, autolinks
    out = out.replace(/!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g, (_match, _alt: string, url: string) =>
      this.protect(`\\includegraphics[width=\\linewidth]{${url}}`)
    );
    out = out.replace(/\[([^\]]+)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g, (_match, label: string, url: string) =>
      this.protect(`\\href{${escapeUrl(url)}}{${this.renderInline(label)}}`)
    );
    out = out.replace(/<((?:https?|ftp|mailto):[^>\s]+)>/g, (_match, url: string) =>
      this.protect(`\\url{${escapeUrl(url)}}`)
    );

    // Backslash escapes
    out = out.replace(/\\([\\`*_{}[\]()#+\-.!|~^$&%<>"'])/g, (_match, char: string) => this.protect(escapeLatex(char)));

    // Emphasis and scripts
    out = out.replace(/\*\*(?=\S)([\s\S]*?\S)\*\*/g, `${BOLD}$1${CLOSE}`);
    out = out.replace(/(^|\W)__(?=\S)([\s\S]*?\S)__(?!\w)/g, `$1${BOLD}$2${CLOSE}`);
    out = out.replace(/\*(?=\S)([\s\S]*?\S)\*/g, `${EMPH}$1${CLOSE}`);
    out = out.replace(/(^|\W)_(?=\S)([\s\S]*?\S)_(?!\w)/g, `$1${EMPH}$2${CLOSE}`);
    out = out.replace(/~~(?=\S)([\s\S]*?\S)~~/g, '$1');
    out = out.replace(/\^([^\s^]+)\^/g, `${SUP}$1${CLOSE}`);
    out = out.replace(/~([^\s~]+)~/g, `${SUB}$1${CLOSE}`);

    out = escapeLatex(out);

    for (const [mark, command] of MARKS) {
      out = out.split(mark).join(command);
    }
    return out;
  }

  private protect(latex: string): string {
    this.store.push(latex);
    return `${SENTINEL_OPEN}${this.store.length - 1}${SENTINEL_CLOSE}`;
  }

  private restore(text: string): string {
    let out = text;
    for (let pass = 0; pass <= this.store.length && out.includes(SENTINEL_OPEN); pass++) {
      out = out.replace(SENTINEL_PATTERN, (_match, index: string) => this.store[Number(index)] ?? '');
    }
    return out;
  }
}
