/**
 * Shared types for the extraction pipeline: stage results, omission
 * reasons, configuration and the logger seam.
 */

import type { SpanCandidate } from './span.js';

// ============================================================================
// STAGE RESULTS
// ============================================================================

/** Reasons a whole line is skipped by the candidate finder */
export type LineFailureReason = 'unbalanced-parentheses' | 'misordered-parentheses';

/** Reasons the definition locator drops a candidate */
export type LocatorFailureReason = 'insufficient-key-tokens' | 'definition-start-not-found';

/** Reasons the definition validator drops a candidate */
export type ValidatorFailureReason =
  | 'abbreviation-longer-than-definition'
  | 'abbreviation-is-full-word'
  | 'definition-not-found'
  | 'alignment-out-of-bounds'
  | 'length-ratio-exceeded'
  | 'unbalanced-definition-parentheses';

export type OmissionReason = LineFailureReason | LocatorFailureReason | ValidatorFailureReason;

export type StageResult<T, R extends OmissionReason = OmissionReason> =
  | { success: true; value: T }
  | { success: false; reason: R; error: string };

export function succeed<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<R extends OmissionReason>(
  reason: R,
  error: string
): { success: false; reason: R; error: string } {
  return { success: false, reason, error };
}

// ============================================================================
// PIPELINE OUTPUT
// ============================================================================

export interface AbbreviationPair {
  abbreviation: SpanCandidate;
  definition: SpanCandidate;
  /** 0-based index of the line the pair was found on */
  line: number;
}

export interface Omission {
  line: number;
  scope: 'line' | 'candidate';
  reason: OmissionReason;
  error: string;
  candidate?: SpanCandidate;
  /** Raw definition window, when the locator got that far */
  definition?: SpanCandidate;
}

export interface ExtractionResult {
  /** Abbreviation text to definition text */
  definitions: Record<string, string>;
  /** Abbreviation text to the spans it was found at */
  pairs: Map<string, AbbreviationPair>;
  /** Pairs accepted, counting ones a later line overwrote */
  kept: number;
  /** Candidates dropped by the locator or validator */
  omitted: number;
  /** Lines dropped for malformed parentheses */
  skippedLines: number;
  omissions: Omission[];
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ExtractionConfig {
  /** Shortest candidate accepted by the length rule */
  minCandidateLength: number;

  /** Longest candidate accepted by the length rule */
  maxCandidateLength: number;

  /** Most whitespace-separated tokens a candidate may have */
  maxCandidateTokens: number;

  /** Definition may have at most |A| + slack words ... */
  definitionWordSlack: number;

  /** ... and at most |A| * multiplier words */
  definitionWordMultiplier: number;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  minCandidateLength: 2,
  maxCandidateLength: 10,
  maxCandidateTokens: 2,
  definitionWordSlack: 5,
  definitionWordMultiplier: 2,
};

export function resolveConfig(config?: Partial<ExtractionConfig>): ExtractionConfig {
  return { ...DEFAULT_EXTRACTION_CONFIG, ...config };
}

// ============================================================================
// LOGGING
// ============================================================================

export interface ExtractionLogger {
  debug(message: string): void;
}

export const silentLogger: ExtractionLogger = {
  debug: () => {},
};
