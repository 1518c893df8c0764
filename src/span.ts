/**
 * Span Candidate
 *
 * A piece of text together with the half-open range [start, stop) it
 * occupies in the line it was cut from. Every stage of the pipeline hands
 * these around so the source position survives trimming and narrowing.
 */

// ============================================================================
// TYPES
// ============================================================================

export class SpanCandidate {
  readonly value: string;
  readonly start: number;
  readonly stop: number;

  constructor(start: number, stop: number, value: string) {
    if (!Number.isInteger(start) || !Number.isInteger(stop) || start < 0 || stop < start) {
      throw new RangeError(`Invalid span [${start}, ${stop})`);
    }
    if (stop - start !== value.length) {
      throw new RangeError(`Span [${start}, ${stop}) does not fit value "${value}"`);
    }
    this.value = value;
    this.start = start;
    this.stop = stop;
    Object.freeze(this);
  }

  get length(): number {
    return this.value.length;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): { value: string; start: number; stop: number } {
    return { value: this.value, start: this.start, stop: this.stop };
  }
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Cut `line[start, stop)` and drop surrounding whitespace, moving the
 * offsets onto the trimmed text.
 */
export function trimmedSpan(line: string, start: number, stop: number): SpanCandidate {
  const raw = line.slice(start, stop);
  const leading = raw.length - raw.trimStart().length;
  const trailing = raw.length - raw.trimEnd().length;

  if (leading === raw.length) {
    return new SpanCandidate(start, start, '');
  }

  const trimmedStart = start + leading;
  const trimmedStop = start + raw.length - trailing;
  return new SpanCandidate(trimmedStart, trimmedStop, line.slice(trimmedStart, trimmedStop));
}

/**
 * Keep the tail of a span from `offset` (relative to the span) onwards.
 */
export function spanSuffix(span: SpanCandidate, offset: number): SpanCandidate {
  return new SpanCandidate(span.start + offset, span.stop, span.value.slice(offset));
}

/**
 * True when the span reproduces itself when cut from `line`.
 */
export function isSpanOf(span: SpanCandidate, line: string): boolean {
  return span.stop <= line.length && line.slice(span.start, span.stop) === span.value;
}
