import { ConcreteTreeContractError } from "./errors";

export interface Position {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export interface SpanTracker {
  readonly sourceLength: number;
  position(offset: number): Position;
  span(start: number, end: number): Span;
  zeroWidth(offset: number): Span;
}

/**
 * Builds a tracker for one source buffer. Offsets are taken in whatever unit
 * the grammar engine reports (UTF-16 code units for web-tree-sitter), and
 * columns are counted in the same unit.
 */
export function createSpanTracker(source: string): SpanTracker {
  const lineStarts = computeLineStarts(source);
  const sourceLength = source.length;

  const position = (offset: number): Position => {
    if (!Number.isInteger(offset) || offset < 0 || offset > sourceLength) {
      throw new ConcreteTreeContractError(`span: offset ${offset} outside source of length ${sourceLength}`);
    }
    const lineIndex = findLineIndex(lineStarts, offset);
    return { offset, line: lineIndex + 1, column: offset - lineStarts[lineIndex] + 1 };
  };

  const span = (start: number, end: number): Span => {
    if (end < start) {
      throw new ConcreteTreeContractError(`span: end ${end} precedes start ${start}`);
    }
    return { start: position(start), end: position(end) };
  };

  return {
    sourceLength,
    position,
    span,
    zeroWidth: (offset) => span(offset, offset),
  };
}

function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10) {
      starts.push(i + 1);
    } else if (ch === 13) {
      if (source.charCodeAt(i + 1) === 10) {
        i++;
      }
      starts.push(i + 1);
    }
  }
  return starts;
}

function findLineIndex(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

export function spanContains(outer: Span, inner: Span): boolean {
  return outer.start.offset <= inner.start.offset && inner.end.offset <= outer.end.offset;
}

export function isZeroWidth(span: Span): boolean {
  return span.start.offset === span.end.offset;
}

// Zero-width spans overlap nothing.
export function spansOverlap(a: Span, b: Span): boolean {
  if (isZeroWidth(a) || isZeroWidth(b)) return false;
  return a.start.offset < b.end.offset && b.start.offset < a.end.offset;
}

export function compareSpans(a: Span, b: Span): number {
  return a.start.offset - b.start.offset || a.end.offset - b.end.offset;
}

export function formatSpan(span: Span): string {
  return `${span.start.line}:${span.start.column}-${span.end.line}:${span.end.column}`;
}
