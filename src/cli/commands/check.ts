/**
 * CLI command: `docsync check <code-path> <doc-path>`
 *
 * CI gate. Prints the report like `analyze`, then fails when the score
 * is below the threshold or no documentation was found.
 *
 * Exit codes:
 * - 0: Score meets the threshold
 * - 1: Below threshold, no documentation, or any `analyze` failure
 *
 * @module cli/commands/check
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { printReport, reportError, runAnalysis, type AnalyzeOptions } from './analyze.js';

export interface CheckOptions extends AnalyzeOptions {
  /** Minimum passing score (0-1), overrides `ci.threshold` in config */
  threshold?: number;
}

/**
 * CLI command for gating a build on documentation consistency.
 *
 * @param codePath - File or directory of source code
 * @param docPath - File or directory of documentation
 * @returns Exit code (0 = pass, 1 = fail)
 */
export async function checkCommand(
  codePath?: string,
  docPath?: string,
  options: CheckOptions = {}
): Promise<number> {
  if (codePath === '--help' || codePath === '-h') {
    showCheckHelp();
    return 0;
  }

  if (options.threshold !== undefined && (options.threshold < 0 || options.threshold > 1)) {
    reportError(`Threshold must be between 0 and 1, got ${options.threshold}`, options);
    return 1;
  }

  const run = await runAnalysis('check', codePath, docPath, options);
  if (!run) {
    return 1;
  }

  const { report, docs } = run;
  const threshold = options.threshold ?? run.config.ci.threshold;
  const hasDocs = docs.length > 0;
  const passed = hasDocs && report.status !== 'error' && report.score >= threshold;

  if (options.json) {
    console.log(JSON.stringify({ passed, threshold, report }, null, 2));
    return passed ? 0 : 1;
  }

  printReport(report, options);

  if (!options.quiet && !options.markdown) {
    if (!hasDocs) {
      p.log.error(`No documentation found in ${docPath}`);
    } else if (passed) {
      p.log.success(`Score ${report.score.toFixed(4)} meets threshold ${threshold}`);
    } else {
      p.log.error(`Score ${report.score.toFixed(4)} is below threshold ${threshold}`);
    }
  }

  return passed ? 0 : 1;
}

/**
 * Display help text for the check command.
 */
function showCheckHelp(): void {
  console.log(`
${pc.bold('docsync check')} - Fail when documentation drifts from code

Usage:
  docsync check <code-path> <doc-path> [options]
  docsync ci <code-path> <doc-path> [options]

Options:
  --threshold=N   Minimum score between 0 and 1 (default: ci.threshold, 0.15)
  --verbose       Show vocabulary gaps and undocumented counts per kind
  --quiet         One line: percent,label,issueCount,syncedCount
  --json          Output { passed, threshold, report } as JSON
  --markdown      Output a markdown block for pull request comments
  --match=word    Match entity names on word boundaries
  --config=PATH   Config file (default: .docsync.json)
  --help, -h      Show this help message

Exit Codes:
  0   Score meets the threshold
  1   Score below threshold, no documentation found, or analysis failed

Examples:
  docsync check src/ README.md
  docsync ci src/ docs/ --threshold=0.4 --markdown
`);
}
