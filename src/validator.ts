/**
 * Definition Validator
 *
 * Aligns the characters of an abbreviation against a definition window,
 * both read right to left, and narrows the window to the shortest suffix
 * whose first aligned character starts a word.
 *
 * Based on: A. Schwartz and M. Hearst, "A Simple Algorithm for Identifying
 * Abbreviation Definitions in Biomedical Text", Biocomputing 2003, 451-462.
 */

import { spanSuffix, type SpanCandidate } from './span.js';
import { countOccurrences, isAlphanumeric, splitWords } from './text.js';
import {
  fail,
  resolveConfig,
  succeed,
  type ExtractionConfig,
  type StageResult,
  type ValidatorFailureReason,
} from './types.js';

export type ValidatorResult = StageResult<SpanCandidate, ValidatorFailureReason>;

type AlignmentResult = StageResult<number, 'definition-not-found' | 'alignment-out-of-bounds'>;

// ============================================================================
// ALIGNMENT
// ============================================================================

/**
 * Offset into `definition` where the alignment with `abbrev` begins
 */
export function alignBackward(definition: string, abbrev: string): AlignmentResult {
  let s = abbrev.length - 1;
  let l = definition.length - 1;

  while (true) {
    if (l < 0 || s < 0) {
      return fail(
        'alignment-out-of-bounds',
        `Alignment of ${abbrev} ran past the start of ${definition}`
      );
    }

    const longChar = definition[l].toLowerCase();
    const shortChar = abbrev[s].toLowerCase();

    // Punctuation in the abbreviation is stepped over; this round still
    // compares the character just read
    if (!isAlphanumeric(abbrev[s])) s--;

    if (s === 0) {
      if (shortChar === longChar) {
        if (l === 0 || !isAlphanumeric(definition[l - 1])) {
          return succeed(l);
        }
        l--;
      } else {
        l--;
        if (l === -1) {
          return fail('definition-not-found', `Definition ${abbrev} was not found in ${definition}`);
        }
      }
    } else {
      if (shortChar === longChar) s--;
      l--;
    }
  }
}

// ============================================================================
// SELECTION
// ============================================================================

/**
 * Narrow a definition window to the span that spells out `abbrev`,
 * then apply the length-ratio and parenthesis checks
 */
export function selectDefinition(
  definition: SpanCandidate,
  abbrev: SpanCandidate,
  config?: Partial<ExtractionConfig>
): ValidatorResult {
  const { definitionWordSlack, definitionWordMultiplier } = resolveConfig(config);

  if (definition.length < abbrev.length) {
    return fail('abbreviation-longer-than-definition', 'Abbreviation is longer than definition');
  }

  if (splitWords(definition.value).includes(abbrev.value)) {
    return fail('abbreviation-is-full-word', 'Abbreviation is full word of definition');
  }

  const alignment = alignBackward(definition.value, abbrev.value);
  if (!alignment.success) return alignment;

  const narrowed = spanSuffix(definition, alignment.value);

  const words = splitWords(narrowed.value).length;
  const length = abbrev.length;
  const maxWords = Math.min(length + definitionWordSlack, length * definitionWordMultiplier);
  if (words > maxWords) {
    return fail(
      'length-ratio-exceeded',
      `Did not meet min(|A|+${definitionWordSlack}, |A|*${definitionWordMultiplier}) constraint`
    );
  }

  if (countOccurrences(narrowed.value, '(') !== countOccurrences(narrowed.value, ')')) {
    return fail(
      'unbalanced-definition-parentheses',
      'Unbalanced parentheses not allowed in a definition'
    );
  }

  return succeed(narrowed);
}
