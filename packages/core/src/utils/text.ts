import type { SourcePosition } from '../types/index.js';

/**
 * Normalize text for keyword matching: lower case, diacritics removed,
 * punctuation collapsed to single spaces.
 */
export function normalizeForMatching(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD') // Decompose accented characters
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^\w\s]/g, ' ')
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Strip leading section numbering such as "1.", "2.3 ", "IV." or "A)".
 */
export function stripSectionNumbering(heading: string): string {
  return heading
    .replace(/^\s*(?:\d+(?:\.\d+)*|[IVXLC]+|[A-Z])[.)](?:\s+|$)/, '')
    .replace(/^\s*\d+(?:\.\d+)+\s+/, '')
    .replace(/^\s*\d+\s+(?=\D)/, '')
    .trim();
}

/**
 * Line-start table for one source text; offsets map to 1-based
 * line/column by binary search.
 */
export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(private readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  positionAt(offset: number): SourcePosition {
    const target = Math.min(offset, this.text.length);
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= target) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { offset, line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }
}

export function formatPosition(position: SourcePosition): string {
  return `line ${position.line}, column ${position.column}`;
}

/**
 * Matches the opening or closing line of a fenced code block.
 */
export const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Find the [start, end) ranges of fenced code blocks and inline code spans.
 *
 * Fences run from the opening fence line to the matching closing fence
 * (or the end of text). Inline spans pair backtick runs of equal length
 * outside fences.
 */
export function findCodeRanges(text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let offset = 0;
  let fence: { marker: string; start: number } | null = null;
  let proseStart = 0;

  const lines = text.split('\n');
  for (const line of lines) {
    const lineEnd = offset + line.length;
    const fenceMatch = line.match(FENCE_PATTERN);

    if (fence) {
      if (fenceMatch && fenceMatch[1][0] === fence.marker[0] && fenceMatch[1].length >= fence.marker.length) {
        ranges.push([fence.start, lineEnd]);
        fence = null;
        proseStart = lineEnd;
      }
    } else if (fenceMatch) {
      collectInlineCode(text, proseStart, offset, ranges);
      fence = { marker: fenceMatch[1], start: offset };
    }

    offset = lineEnd + 1;
  }

  if (fence) {
    ranges.push([fence.start, text.length]);
  } else {
    collectInlineCode(text, proseStart, text.length, ranges);
  }

  return ranges.sort((a, b) => a[0] - b[0]);
}

function collectInlineCode(
  text: string,
  start: number,
  end: number,
  ranges: Array<[number, number]>
): void {
  const pattern = /`+/g;
  pattern.lastIndex = start;
  let open: RegExpExecArray | null;

  while ((open = pattern.exec(text)) !== null && open.index < end) {
    const ticks = open[0];
    const closeAt = findClosingTicks(text, open.index + ticks.length, end, ticks.length);
    if (closeAt === -1) {
      continue;
    }
    ranges.push([open.index, closeAt + ticks.length]);
    pattern.lastIndex = closeAt + ticks.length;
  }
}

function findClosingTicks(text: string, from: number, end: number, length: number): number {
  const pattern = /`+/g;
  pattern.lastIndex = from;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null && match.index < end) {
    if (match[0].length === length) {
      return match.index;
    }
  }
  return -1;
}

export function isInsideRanges(offset: number, ranges: ReadonlyArray<[number, number]>): boolean {
  for (const [start, end] of ranges) {
    if (offset < start) {
      return false;
    }
    if (offset < end) {
      return true;
    }
  }
  return false;
}
