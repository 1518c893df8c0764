/**
 * Extraction Pipeline
 *
 * Runs candidate finding, definition locating and definition validation
 * over every line of a document and collects the accepted pairs.
 *
 * Failures stay local: a line with malformed parentheses is skipped, a
 * rejected candidate is counted and recorded, and everything else on the
 * line and in the document carries on.
 */

import { findCandidates } from './candidates.js';
import { locateDefinition } from './definition.js';
import { yieldLinesFromFile, yieldLinesFromText } from './lines.js';
import type { SpanCandidate } from './span.js';
import {
  resolveConfig,
  silentLogger,
  type AbbreviationPair,
  type ExtractionConfig,
  type ExtractionLogger,
  type ExtractionResult,
  type Omission,
  type OmissionReason,
} from './types.js';
import { selectDefinition } from './validator.js';

// ============================================================================
// TYPES
// ============================================================================

export type ExtractionSource =
  | { filePath: string; text?: string }
  | { filePath?: undefined; text: string }
  | { filePath?: undefined; text?: undefined };

export interface ExtractOptions {
  config?: Partial<ExtractionConfig>;
  logger?: ExtractionLogger;
}

export type CandidateOutcome =
  | { status: 'kept'; pair: AbbreviationPair }
  | { status: 'omitted'; omission: Omission };

export type LineOutcome =
  | { status: 'skipped'; omission: Omission }
  | { status: 'processed'; candidates: CandidateOutcome[] };

// ============================================================================
// SINGLE LINE
// ============================================================================

function candidateOmission(
  line: number,
  candidate: SpanCandidate,
  reason: OmissionReason,
  error: string,
  definition?: SpanCandidate
): Omission {
  return { line, scope: 'candidate', reason, error, candidate, definition };
}

function* processCandidates(
  candidates: Iterable<SpanCandidate>,
  line: string,
  index: number,
  config: ExtractionConfig
): Generator<CandidateOutcome> {
  for (const candidate of candidates) {
    const located = locateDefinition(candidate, line);
    if (!located.success) {
      yield {
        status: 'omitted',
        omission: candidateOmission(index, candidate, located.reason, located.error),
      };
      continue;
    }

    const selected = selectDefinition(located.value, candidate, config);
    if (!selected.success) {
      yield {
        status: 'omitted',
        omission: candidateOmission(index, candidate, selected.reason, selected.error, located.value),
      };
      continue;
    }

    yield { status: 'kept', pair: { abbreviation: candidate, definition: selected.value, line: index } };
  }
}

/**
 * Run the pipeline on one line and report what happened to each candidate
 */
export function extractFromLine(
  line: string,
  index = 0,
  config?: Partial<ExtractionConfig>
): LineOutcome {
  const resolved = resolveConfig(config);
  const scan = findCandidates(line, resolved);
  if (!scan.success) {
    return {
      status: 'skipped',
      omission: { line: index, scope: 'line', reason: scan.reason, error: scan.error },
    };
  }
  return { status: 'processed', candidates: [...processCandidates(scan.value, line, index, resolved)] };
}

// ============================================================================
// DOCUMENT
// ============================================================================

function emptyResult(): ExtractionResult {
  return {
    definitions: {},
    pairs: new Map(),
    kept: 0,
    omitted: 0,
    skippedLines: 0,
    omissions: [],
  };
}

/**
 * Extract abbreviation/definition pairs from a sequence of lines.
 * A later definition of the same abbreviation replaces an earlier one.
 */
export function extractFromLines(lines: Iterable<string>, options: ExtractOptions = {}): ExtractionResult {
  const logger = options.logger ?? silentLogger;
  const result = emptyResult();

  let index = 0;
  for (const line of lines) {
    const outcome = extractFromLine(line, index, options.config);

    if (outcome.status === 'skipped') {
      logger.debug(`Error: ${outcome.omission.error}`);
      result.skippedLines++;
      result.omissions.push(outcome.omission);
    } else {
      for (const entry of outcome.candidates) {
        if (entry.status === 'omitted') {
          const { candidate, definition, error } = entry.omission;
          logger.debug(
            definition
              ? `${index} Omitting definition ${definition} for candidate ${candidate}. Reason: ${error}`
              : `${index} Omitting candidate ${candidate}. Reason: ${error}`
          );
          result.omitted++;
          result.omissions.push(entry.omission);
          continue;
        }

        const key = entry.pair.abbreviation.value;
        result.pairs.set(key, entry.pair);
        result.definitions[key] = entry.pair.definition.value;
        result.kept++;
      }
    }
    index++;
  }

  logger.debug(`${result.kept} abbreviations detected and kept (${result.omitted} omitted)`);
  return result;
}

/**
 * Extract abbreviation/definition pairs from a file or an in-memory
 * document. With neither, the result is empty; with both, the file wins.
 */
export function extractAbbreviationDefinitionPairs(
  source: ExtractionSource,
  options: ExtractOptions = {}
): ExtractionResult {
  if (source.filePath) {
    return extractFromLines(yieldLinesFromFile(source.filePath), options);
  }
  if (source.text) {
    return extractFromLines(yieldLinesFromText(source.text), options);
  }
  return emptyResult();
}

/**
 * Combine results in order; later pairs replace earlier ones
 */
export function mergeExtractionResults(results: ExtractionResult[]): ExtractionResult {
  const merged = emptyResult();
  for (const result of results) {
    for (const [key, pair] of result.pairs) {
      merged.pairs.set(key, pair);
      merged.definitions[key] = pair.definition.value;
    }
    merged.kept += result.kept;
    merged.omitted += result.omitted;
    merged.skippedLines += result.skippedLines;
    merged.omissions.push(...result.omissions);
  }
  return merged;
}
