/**
 * abbrev-pairs - abbreviation definition extraction (Schwartz-Hearst)
 *
 * @packageDocumentation
 */

// ============================================================================
// SPANS
// ============================================================================

export { SpanCandidate, trimmedSpan, spanSuffix, isSpanOf } from './span.js';

// ============================================================================
// TYPES & CONFIGURATION
// ============================================================================

export {
  DEFAULT_EXTRACTION_CONFIG,
  resolveConfig,
  silentLogger,
  type AbbreviationPair,
  type ExtractionConfig,
  type ExtractionLogger,
  type ExtractionResult,
  type LineFailureReason,
  type LocatorFailureReason,
  type Omission,
  type OmissionReason,
  type StageResult,
  type ValidatorFailureReason,
} from './types.js';

// ============================================================================
// PIPELINE STAGES
// ============================================================================

export { findCandidates, isAbbreviationCandidate, type CandidateScan } from './candidates.js';
export { locateDefinition, type LocatorResult } from './definition.js';
export { alignBackward, selectDefinition, type ValidatorResult } from './validator.js';

// ============================================================================
// PIPELINE
// ============================================================================

export {
  extractAbbreviationDefinitionPairs,
  extractFromLine,
  extractFromLines,
  mergeExtractionResults,
  type CandidateOutcome,
  type ExtractOptions,
  type ExtractionSource,
  type LineOutcome,
} from './extract.js';

// ============================================================================
// LINE SOURCES
// ============================================================================

export { decodeLine, splitLineBuffers, yieldLinesFromFile, yieldLinesFromText } from './lines.js';
