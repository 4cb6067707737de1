#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { z } from 'zod';
import { analyzeCommand, type AnalyzeOptions } from './cli/commands/analyze.js';
import { checkCommand } from './cli/commands/check.js';
import type { ReferenceMatching } from './extraction/reference-extractor.js';

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

/**
 * Parse threshold value from command-line arguments.
 * Looks for --threshold=N format.
 */
function parseThreshold(args: string[]): number | undefined {
  const thresholdArg = args.find(a => a.startsWith('--threshold='));
  if (thresholdArg) {
    const value = parseFloat(thresholdArg.split('=')[1]);
    if (!isNaN(value)) return value;
  }
  return undefined;
}

/**
 * Parse --match=substring|word. Unknown values are returned as an error string.
 */
function parseMatching(args: string[]): ReferenceMatching | { error: string } | undefined {
  const matchArg = args.find(a => a.startsWith('--match='));
  if (!matchArg) return undefined;
  const value = matchArg.slice('--match='.length);
  if (value === 'substring' || value === 'word') return value;
  return { error: `Unknown match mode "${value}". Use --match=substring or --match=word.` };
}

function parseConfigPath(args: string[]): string | undefined {
  const configArg = args.find(a => a.startsWith('--config='));
  return configArg ? configArg.slice('--config='.length) : undefined;
}

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = PackageInfoSchema.parse(require('../package.json'));

  let tsVersion = 'unknown';
  try {
    tsVersion = PackageInfoSchema.parse(require('typescript/package.json')).version;
  } catch {
    tsVersion = 'not installed';
  }

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js         ${process.version}`);
  console.log(`TypeScript      ${tsVersion}`);
  console.log(`Platform        ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V' || args.includes('--version') || args.includes('-V')) {
    await printVersion();
    return;
  }

  switch (command) {
    case 'analyze':
    case 'a':
    case 'check':
    case 'ci': {
      const isCheck = command === 'check' || command === 'ci';
      const help = args.includes('--help') || args.includes('-h');
      const matching = parseMatching(args);
      const json = args.includes('--json');

      if (typeof matching === 'object') {
        if (json) {
          console.log(JSON.stringify({ error: matching.error }));
        } else {
          p.log.error(matching.error);
        }
        process.exit(1);
      }

      const paths = args.slice(1).filter(a => !a.startsWith('-'));
      const options: AnalyzeOptions = {
        json,
        quiet: args.includes('--quiet') || args.includes('-q'),
        markdown: args.includes('--markdown') || args.includes('--md'),
        verbose: args.includes('--verbose') || args.includes('-v'),
        matching,
        configPath: parseConfigPath(args),
      };

      const exitCode = isCheck
        ? await checkCommand(help ? '--help' : paths[0], paths[1], {
            ...options,
            threshold: parseThreshold(args),
          })
        : await analyzeCommand(help ? '--help' : paths[0], paths[1], options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
      break;
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

function showHelp() {
  console.log(`
${pc.bold('docsync')} - Measure how well documentation describes the code it documents

Usage:
  docsync <command> [options]

Commands:
  analyze, a <code> <docs>   Score documentation against code and print the report
  check, ci <code> <docs>    Same report; exit 1 below the threshold (for CI)
  help                       Show this help message

Options:
  --verbose, -v    Show vocabulary gaps and undocumented counts per kind
  --quiet, -q      One line: percent,label,issueCount,syncedCount
  --json           Output JSON
  --markdown       Output a markdown block for pull request comments
  --threshold=N    Minimum passing score for check (0-1, default 0.15)
  --match=word     Match entity names on word boundaries instead of substrings
  --config=PATH    Config file (default: .docsync.json)
  --version, -V    Show version information

Examples:
  docsync analyze src/ README.md
  docsync a app.py README.md --verbose
  docsync check src/ docs/ --threshold=0.4
  docsync ci src/ README.md --markdown > comment.md

Configuration:
  Settings are read from .docsync.json when present. Every field is
  optional: labels, suggestions, matching, normalizer, extraction,
  language, operational_triggers and ci.
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
