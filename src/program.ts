/**
 * abbrev-pairs command definitions
 *
 * Commands:
 *   extract - Extract abbreviation/definition pairs from files or text
 *   explain - Show what each pipeline stage did with one line
 */

import { Command, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import ora from 'ora';

import {
  extractAbbreviationDefinitionPairs,
  extractFromLine,
  mergeExtractionResults,
  type CandidateOutcome,
} from './extract.js';
import type { ExtractionLogger, ExtractionResult } from './types.js';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '0.1.0';

// ============================================================================
// OUTPUT FORMATTERS
// ============================================================================

const OUTPUT_FORMATS = ['json', 'table', 'tsv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function escapeTSV(str: string): string {
  return str.replace(/[\t\n\r]/g, ' ');
}

export function formatResult(
  result: ExtractionResult,
  format: OutputFormat,
  withOffsets = false
): string {
  const entries = [...result.pairs.entries()].sort((a, b) => a[0].localeCompare(b[0]));

  switch (format) {
    case 'json':
      if (!withOffsets) {
        return JSON.stringify(Object.fromEntries(entries.map(([key, pair]) => [key, pair.definition.value])), null, 2);
      }
      return JSON.stringify(Object.fromEntries(entries), null, 2);

    case 'tsv':
      return entries
        .map(([key, pair]) => {
          const columns = [escapeTSV(key), escapeTSV(pair.definition.value)];
          if (withOffsets) {
            columns.push(
              String(pair.line),
              String(pair.abbreviation.start),
              String(pair.abbreviation.stop),
              String(pair.definition.start),
              String(pair.definition.stop)
            );
          }
          return columns.join('\t');
        })
        .join('\n');

    case 'table': {
      const width = Math.max('Abbreviation'.length, ...entries.map(([key]) => key.length));
      const header = `${'Abbreviation'.padEnd(width)} | Definition`;
      const separator = '-'.repeat(header.length);
      const rows = entries.map(([key, pair]) => `${key.padEnd(width)} | ${pair.definition.value}`);
      return [header, separator, ...rows].join('\n');
    }
  }
}

function describeOutcome(outcome: CandidateOutcome): string[] {
  if (outcome.status === 'kept') {
    const { abbreviation, definition } = outcome.pair;
    return [
      `  Candidate "${abbreviation}" [${abbreviation.start}, ${abbreviation.stop})`,
      `    Kept:    "${definition}" [${definition.start}, ${definition.stop})`,
    ];
  }

  const { candidate, definition, reason, error } = outcome.omission;
  const lines = candidate ? [`  Candidate "${candidate}" [${candidate.start}, ${candidate.stop})`] : [];
  if (definition) {
    lines.push(`    Window:  "${definition}" [${definition.start}, ${definition.stop})`);
  }
  lines.push(`    Omitted: ${reason} (${error})`);
  return lines;
}

// ============================================================================
// EXTRACT COMMAND
// ============================================================================

interface ExtractCommandOptions {
  text?: string;
  format: string;
  offsets?: boolean;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const stderrLogger: ExtractionLogger = {
  debug: message => console.error(message),
};

function createExtractCommand(): Command {
  return new Command('extract')
    .description('Extract abbreviation/definition pairs from text files')
    .argument('[files...]', 'Text files to scan, one sentence per line')
    .option('-t, --text <text>', 'Scan this text instead of (or after) files')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('json')
    )
    .option('--offsets', 'Include line numbers and character offsets')
    .option('-o, --output <file>', 'Output file (defaults to stdout)')
    .option('-v, --verbose', 'Log every omitted candidate to stderr')
    .option('-q, --quiet', 'Suppress progress output')
    .action((files: string[], options: ExtractCommandOptions, command: Command) => {
      if (files.length === 0 && options.text === undefined) {
        command.error('Error: give at least one file or --text');
      }

      const format = isOutputFormat(options.format) ? options.format : 'json';
      const logger = options.verbose ? stderrLogger : undefined;
      const spinner = options.quiet ? null : ora('Extracting abbreviations...').start();

      try {
        const results = files.map(file =>
          extractAbbreviationDefinitionPairs({ filePath: path.resolve(file) }, { logger })
        );
        if (options.text !== undefined) {
          results.push(extractAbbreviationDefinitionPairs({ text: options.text }, { logger }));
        }
        const merged = mergeExtractionResults(results);

        if (spinner) {
          const summary = `Kept ${merged.pairs.size} abbreviations (${merged.omitted} candidates omitted, ${merged.skippedLines} lines skipped)`;
          if (merged.pairs.size === 0) spinner.warn(summary);
          else spinner.succeed(summary);
        }

        const output = formatResult(merged, format, options.offsets ?? false);

        if (options.output) {
          fs.writeFileSync(options.output, output);
          if (!options.quiet) {
            console.log(`Output written to ${options.output}`);
          }
        } else {
          console.log(output);
        }
      } catch (error) {
        if (spinner) spinner.fail('Extraction failed');
        command.error(error instanceof Error ? error.message : String(error));
      }
    });
}

// ============================================================================
// EXPLAIN COMMAND
// ============================================================================

function createExplainCommand(): Command {
  return new Command('explain')
    .description('Show how each candidate in one line is accepted or rejected')
    .argument('<line>', 'Line of text to analyze')
    .action((line: string) => {
      const outcome = extractFromLine(line.trim());

      console.log('\n=== Line ===\n');
      console.log(line.trim());

      if (outcome.status === 'skipped') {
        console.log('\n=== Result ===\n');
        console.log(`Line skipped: ${outcome.omission.reason} (${outcome.omission.error})`);
        console.log('');
        return;
      }

      console.log(`\n=== Candidates (${outcome.candidates.length}) ===\n`);
      for (const candidate of outcome.candidates) {
        for (const text of describeOutcome(candidate)) {
          console.log(text);
        }
      }

      const kept = outcome.candidates.filter(c => c.status === 'kept').length;
      console.log('\n=== Result ===\n');
      console.log(`Kept: ${kept}, omitted: ${outcome.candidates.length - kept}`);
      console.log('');
    });
}

// ============================================================================
// MAIN PROGRAM
// ============================================================================

export function createProgram(): Command {
  return new Command()
    .name('abbrev-pairs')
    .description('Abbreviation definition extraction (Schwartz-Hearst)')
    .version(VERSION)
    .addCommand(createExtractCommand())
    .addCommand(createExplainCommand());
}
