/**
 * Candidate Finder
 *
 * Finds parenthesized spans in a line that look like abbreviations,
 * e.g. "WHO" in "the World Health Organization (WHO) said".
 *
 * Rules (Schwartz & Hearst):
 * - 2 <= length <= 10
 * - at most 2 tokens
 * - contains a letter
 * - starts with a letter or digit
 *
 * Dotted or spaced letter runs ("U.S.A.", "A. B. C") are accepted outright.
 */

import { trimmedSpan, type SpanCandidate } from './span.js';
import { countOccurrences, hasLetter, isAlphanumeric, splitWords } from './text.js';
import {
  fail,
  resolveConfig,
  type ExtractionConfig,
  type LineFailureReason,
  type StageResult,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export type CandidateScan = StageResult<Iterable<SpanCandidate>, LineFailureReason>;

const LETTER_RUN = /^(?:\p{L}\.?\s?){2,}/u;

// ============================================================================
// ACCEPTANCE
// ============================================================================

/**
 * Decide whether a trimmed parenthesis interior is a plausible abbreviation
 */
export function isAbbreviationCandidate(
  candidate: string,
  config: ExtractionConfig = resolveConfig()
): boolean {
  if (LETTER_RUN.test(candidate.trimStart())) return true;
  if (candidate.length < config.minCandidateLength) return false;
  if (candidate.length > config.maxCandidateLength) return false;
  if (splitWords(candidate).length > config.maxCandidateTokens) return false;
  if (!hasLetter(candidate)) return false;
  if (!isAlphanumeric(candidate[0])) return false;
  return true;
}

// ============================================================================
// SCANNING
// ============================================================================

/**
 * Index just past the parenthesis closing the one at `openIndex`,
 * or -1 when the line ends first
 */
function findClosing(line: string, openIndex: number): number {
  let depth = 1;
  for (let i = openIndex + 1; i < line.length; i++) {
    if (line[i] === '(') depth++;
    else if (line[i] === ')') depth--;
    if (depth === 0) return i + 1;
  }
  return -1;
}

function* scanCandidates(line: string, config: ExtractionConfig): Generator<SpanCandidate> {
  let searchFrom = 0;

  while (true) {
    const openIndex = line.indexOf('(', searchFrom);
    if (openIndex === -1) return;

    const closeEnd = findClosing(line, openIndex);
    if (closeEnd === -1) {
      // No partner for this one; nested openings after it still get a turn
      searchFrom = openIndex + 1;
      continue;
    }
    searchFrom = closeEnd;

    const candidate = trimmedSpan(line, openIndex + 1, closeEnd - 1);
    if (isAbbreviationCandidate(candidate.value, config)) {
      yield candidate;
    }
  }
}

/**
 * Check a line's parentheses and lazily yield its abbreviation candidates
 * in order of appearance. Malformed balance or ordering fails the whole line.
 */
export function findCandidates(line: string, config?: Partial<ExtractionConfig>): CandidateScan {
  if (!line.includes('(')) {
    return { success: true, value: [] };
  }

  if (countOccurrences(line, '(') !== countOccurrences(line, ')')) {
    return fail('unbalanced-parentheses', `Unbalanced parentheses: ${line}`);
  }

  if (line.indexOf('(') > line.indexOf(')')) {
    return fail('misordered-parentheses', `First parenthesis is a closing one: ${line}`);
  }

  return { success: true, value: scanCandidates(line, resolveConfig(config)) };
}
