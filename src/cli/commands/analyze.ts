/**
 * CLI command: `docsync analyze <code-path> <doc-path>`
 *
 * Collects source and documentation files, runs the consistency engine
 * and prints the report in the requested format.
 *
 * Exit codes:
 * - 0: Report printed
 * - 1: Bad arguments, unreadable input, invalid config or analysis error
 *
 * @module cli/commands/analyze
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { createEngine, type SourceText } from '../../engine/consistency-engine.js';
import { ReportFormatter } from '../../report/report-formatter.js';
import { readEngineConfig, toEngineOptions, ConfigError } from '../../config/reader.js';
import type { EngineConfig } from '../../config/schema.js';
import type { ReferenceMatching } from '../../extraction/reference-extractor.js';
import type { ConsistencyReport } from '../../types/consistency.js';
import { collectSources } from '../source-loader.js';

/**
 * Options shared by `analyze` and `check`.
 */
export interface AnalyzeOptions {
  /** JSON output for scripting */
  json?: boolean;
  /** One CSV-like line */
  quiet?: boolean;
  /** Markdown block for pull request comments */
  markdown?: boolean;
  /** Show gap lists and breakdown */
  verbose?: boolean;
  /** Reference matching mode, overrides the config file */
  matching?: ReferenceMatching;
  /** Config file path (default: .docsync.json) */
  configPath?: string;
}

/**
 * Inputs and result of one CLI analysis run.
 */
export interface AnalysisRun {
  config: EngineConfig;
  code: SourceText[];
  docs: SourceText[];
  report: ConsistencyReport;
}

/**
 * CLI command for analyzing code/documentation consistency.
 *
 * @param codePath - File or directory of source code
 * @param docPath - File or directory of documentation
 * @returns Exit code (0 for success)
 */
export async function analyzeCommand(
  codePath?: string,
  docPath?: string,
  options: AnalyzeOptions = {}
): Promise<number> {
  if (codePath === '--help' || codePath === '-h') {
    showAnalyzeHelp();
    return 0;
  }

  const run = await runAnalysis('analyze', codePath, docPath, options);
  if (!run) {
    return 1;
  }

  printReport(run.report, options);
  return run.report.status === 'error' ? 1 : 0;
}

/**
 * Load config and inputs, then analyze. Problems are reported here and
 * yield undefined.
 */
export async function runAnalysis(
  command: string,
  codePath: string | undefined,
  docPath: string | undefined,
  options: AnalyzeOptions
): Promise<AnalysisRun | undefined> {
  const interactive = !options.json && !options.quiet && !options.markdown;

  if (!codePath || !docPath) {
    reportError(`Usage: docsync ${command} <code-path> <doc-path>`, options);
    return undefined;
  }

  let config: EngineConfig;
  try {
    config = await readEngineConfig(options.configPath);
  } catch (err) {
    const field = err instanceof ConfigError && err.field ? ` (${err.field})` : '';
    reportError(`${errorMessage(err)}${field}`, options);
    return undefined;
  }

  const engineOptions = toEngineOptions(config);
  if (options.matching) {
    engineOptions.matching = options.matching;
  }

  let spinner: ReturnType<typeof p.spinner> | undefined;
  if (interactive) {
    spinner = p.spinner();
    spinner.start('Collecting sources...');
  }

  let code: SourceText[];
  let docs: SourceText[];
  try {
    code = await collectSources(codePath, 'code');
    docs = await collectSources(docPath, 'docs');
  } catch (err) {
    spinner?.stop('Could not read sources');
    reportError(`Could not read sources: ${errorMessage(err)}`, options);
    return undefined;
  }

  if (code.length === 0) {
    spinner?.stop('No source files found');
    reportError(`No source files found in ${codePath}`, options);
    return undefined;
  }

  spinner?.message(`Analyzing ${code.length} code file(s) against ${docs.length} doc file(s)...`);
  const report = createEngine(engineOptions).analyzeSources(code, docs);
  spinner?.stop('Analysis complete');

  return { config, code, docs, report };
}

/**
 * Print a report in the format the options select.
 */
export function printReport(report: ConsistencyReport, options: AnalyzeOptions): void {
  const formatter = new ReportFormatter();

  if (options.json) {
    console.log(formatter.formatJson(report));
  } else if (options.quiet) {
    console.log(formatter.formatQuiet(report));
  } else if (options.markdown) {
    console.log(formatter.formatMarkdown(report));
  } else {
    console.log(formatter.formatText(report, { verbose: options.verbose }));
  }
}

/**
 * Report an error as JSON in --json mode, through clack otherwise.
 */
export function reportError(message: string, options: AnalyzeOptions): void {
  if (options.json) {
    console.log(JSON.stringify({ error: message }));
  } else {
    p.log.error(message);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Display help text for the analyze command.
 */
function showAnalyzeHelp(): void {
  console.log(`
${pc.bold('docsync analyze')} - Score how well documentation describes code

Usage:
  docsync analyze <code-path> <doc-path> [options]
  docsync a <code-path> <doc-path> [options]

Paths may be single files or directories (searched recursively).

Options:
  --verbose       Show vocabulary gaps and undocumented counts per kind
  --quiet         One line: percent,label,issueCount,syncedCount
  --json          Output the full report as JSON
  --markdown      Output a markdown block for pull request comments
  --match=word    Match entity names on word boundaries
  --config=PATH   Config file (default: .docsync.json)
  --help, -h      Show this help message

Labels:
  ProductionQuality  above 85%
  HighAlignment      above 65%
  PartialAlignment   above 40%
  PoorAlignment      40% or less

Examples:
  docsync analyze src/ README.md
  docsync a src/ docs/ --verbose
  docsync analyze app.py README.md --json
`);
}
