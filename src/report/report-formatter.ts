/**
 * Formatter for consistency reports.
 *
 * Provides multiple output formats:
 * - Text: Human-readable with colors
 * - Verbose: Adds gap lists and the per-kind breakdown
 * - Quiet: CSV-like for scripting
 * - JSON: Structured output
 * - Markdown: For pull request comments
 */

import pc from 'picocolors';
import {
  ENTITY_KINDS,
  type AlignmentLabel,
  type ConsistencyReport,
  type EntityKind,
} from '../types/consistency.js';

export interface FormatOptions {
  /** Show gap lists and breakdown */
  verbose?: boolean;
}

const KIND_HEADINGS: Readonly<Record<EntityKind, string>> = {
  function: 'Functions',
  class: 'Classes',
  method: 'Methods',
  'config-key': 'Config keys',
};

/** Terms listed per gap category in verbose and markdown output. */
const MAX_LISTED_TERMS = 10;

export class ReportFormatter {
  /**
   * Format a report as human-readable text.
   *
   * Standard: "✅ ProductionQuality: 91% alignment" plus summary and suggestions
   * Verbose: includes gap lists and undocumented counts per kind
   */
  formatText(report: ConsistencyReport, options?: FormatOptions): string {
    const lines: string[] = [];

    const colorFn = this.getLabelColor(report.label);
    lines.push(`${report.icon} ${colorFn(report.label)}: ${colorFn(`${report.percent}%`)} alignment`);
    lines.push(report.summary);

    if (report.status !== 'analyzed') {
      lines.push(pc.dim(`status: ${report.status}`));
    }

    if (options?.verbose) {
      lines.push('');
      lines.push(pc.bold('Vocabulary:'));
      lines.push(this.formatTerms('Common', report.gaps.common, pc.green));
      lines.push(this.formatTerms('Missing in docs', report.gaps.missingInDoc, pc.yellow));
      lines.push(this.formatTerms('Missing in code', report.gaps.missingInCode, pc.red));

      lines.push('');
      lines.push(pc.bold('Undocumented entities:'));
      for (const kind of ENTITY_KINDS) {
        const count = report.stats.breakdown.undocumentedByKind[kind];
        lines.push(`  ${KIND_HEADINGS[kind].padEnd(12)} ${count}`);
      }
      lines.push(
        pc.dim(
          `  ${report.stats.documentedEntityCount} of ${report.stats.entityCount} entities documented`
        )
      );
    }

    if (report.suggestions.length > 0) {
      lines.push('');
      lines.push(pc.bold('Suggestions:'));
      for (const suggestion of report.suggestions) {
        lines.push(`  * ${suggestion}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format as CSV-like output for scripting.
   * Format: percent,label,issueCount,syncedCount
   */
  formatQuiet(report: ConsistencyReport): string {
    return `${report.percent},${report.label},${report.stats.issueCount},${report.stats.syncedCount}`;
  }

  /**
   * Format as pretty-printed JSON.
   */
  formatJson(report: ConsistencyReport): string {
    return JSON.stringify(report, null, 2);
  }

  /**
   * Format as a markdown block suitable for a pull request comment.
   */
  formatMarkdown(report: ConsistencyReport): string {
    const { stats } = report;
    const lines: string[] = [
      `## ${report.icon} Documentation consistency: ${report.percent}%`,
      '',
      `**${report.label}**. ${report.summary}`,
      '',
      '| Metric | Count |',
      '| --- | --- |',
      `| Synced terms | ${stats.syncedCount} |`,
      `| Code terms missing in docs | ${stats.issueCount} |`,
      `| Doc terms missing in code | ${stats.breakdown.zombieTerms} |`,
      `| Documented entities | ${stats.documentedEntityCount}/${stats.entityCount} |`,
      `| Operational gaps | ${stats.breakdown.operationalGaps} |`,
      `| Stale sections | ${stats.breakdown.staleSections} |`,
    ];

    if (report.entities.undocumented.length > 0) {
      lines.push('', '### Undocumented', '');
      for (const entity of report.entities.undocumented) {
        lines.push(`- \`${entity.name}\` (${entity.kind})`);
      }
    }

    if (report.suggestions.length > 0) {
      lines.push('', '### Suggestions', '');
      for (const suggestion of report.suggestions) {
        lines.push(`- ${suggestion}`);
      }
    }

    return lines.join('\n');
  }

  private getLabelColor(label: AlignmentLabel): (s: string) => string {
    switch (label) {
      case 'ProductionQuality': return pc.green;
      case 'HighAlignment': return pc.cyan;
      case 'PartialAlignment': return pc.yellow;
      case 'PoorAlignment': return pc.red;
    }
  }

  private formatTerms(
    name: string,
    terms: readonly string[],
    colorFn: (s: string) => string
  ): string {
    const padded = `${name}:`.padEnd(17);
    if (terms.length === 0) {
      return `  ${padded} ${pc.dim('none')}`;
    }
    const shown = terms.slice(0, MAX_LISTED_TERMS).join(', ');
    const more = terms.length > MAX_LISTED_TERMS ? pc.dim(` (+${terms.length - MAX_LISTED_TERMS} more)`) : '';
    return `  ${padded} ${colorFn(shown)}${more}`;
  }
}
