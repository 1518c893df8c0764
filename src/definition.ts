/**
 * Definition Locator
 *
 * Picks the window of words in front of an abbreviation candidate that
 * could spell it out. The window starts at the token where, counting back
 * from the parenthesis, the number of tokens beginning with the
 * abbreviation's first character (the key) reaches the number of times the
 * key occurs inside the abbreviation.
 *
 *   "the World Health Organization (WHO)"  key "w", one "w" in "who"
 *    -> window starts at "World"
 */

import { trimmedSpan, type SpanCandidate } from './span.js';
import { countOccurrences, tokenizeWithOffsets } from './text.js';
import { fail, succeed, type LocatorFailureReason, type StageResult } from './types.js';

export type LocatorResult = StageResult<SpanCandidate, LocatorFailureReason>;

/**
 * Return the definition window preceding `candidate` in `line`
 */
export function locateDefinition(candidate: SpanCandidate, line: string): LocatorResult {
  // Leave out the space and the opening parenthesis before the candidate
  const tokens = tokenizeWithOffsets(line.slice(0, Math.max(0, candidate.start - 2)));
  const key = candidate.value.charAt(0).toLowerCase();
  const firstChars = tokens.map(t => t.text.charAt(0).toLowerCase());

  const definitionFreq = firstChars.filter(c => c === key).length;
  const candidateFreq = countOccurrences(candidate.value.toLowerCase(), key);

  if (candidateFreq > definitionFreq) {
    return fail(
      'insufficient-key-tokens',
      'There are less keys in the tokens in front of candidate than there are in the candidate'
    );
  }

  let startIndex = -1;
  let count = 0;
  for (let i = firstChars.length - 1; i >= 0 && candidateFreq > 0; i--) {
    if (firstChars[i] === key && ++count === candidateFreq) {
      startIndex = i;
      break;
    }
  }

  if (startIndex === -1) {
    return fail('definition-start-not-found', `Candidate ${candidate.value} not found`);
  }

  return succeed(trimmedSpan(line, tokens[startIndex].start, candidate.start - 1));
}
