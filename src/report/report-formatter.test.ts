import { describe, it, expect, beforeEach } from 'vitest';
import { ReportFormatter } from './report-formatter.js';
import { NO_LOGIC_MESSAGE, ReportBuilder } from './report-builder.js';
import type { ConsistencyReport } from '../types/consistency.js';

function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

describe('ReportFormatter', () => {
  let formatter: ReportFormatter;
  let report: ConsistencyReport;

  beforeEach(() => {
    formatter = new ReportFormatter();
    report = new ReportBuilder().build(
      0.7,
      {
        common: new Set(['price', 'total']),
        missingInDoc: new Set(['calc']),
        missingInCode: new Set(['checkout']),
      },
      [],
      {
        documented: [{ name: 'total', kind: 'config-key' }],
        undocumented: [{ name: 'calcPrice', kind: 'function' }],
      }
    );
  });

  describe('formatText()', () => {
    it('leads with icon, label and percent', () => {
      const lines = stripAnsi(formatter.formatText(report)).split('\n');

      expect(lines[0]).toBe('🟢 HighAlignment: 70% alignment');
      expect(lines[1]).toBe(
        '70% vocabulary alignment. Documentation debt: 1 of 2 code entities lack documentation.'
      );
    });

    it('lists suggestions', () => {
      const text = stripAnsi(formatter.formatText(report));

      expect(text).toContain('Suggestions:\n  * Document function "calcPrice".');
    });

    it('omits the breakdown unless verbose', () => {
      expect(stripAnsi(formatter.formatText(report))).not.toContain('Vocabulary:');
    });

    it('shows gap lists and per-kind counts when verbose', () => {
      const lines = stripAnsi(formatter.formatText(report, { verbose: true })).split('\n');

      expect(lines).toContain('  Common:           price, total');
      expect(lines).toContain('  Missing in docs:  calc');
      expect(lines).toContain('  Missing in code:  checkout');
      expect(lines).toContain('  Functions    1');
      expect(lines).toContain('  Config keys  0');
      expect(lines).toContain('  1 of 2 entities documented');
    });

    it('shows the status of degenerate reports', () => {
      const degenerate = new ReportBuilder().buildDegenerate('no-logic', NO_LOGIC_MESSAGE);

      expect(stripAnsi(formatter.formatText(degenerate))).toContain('status: no-logic');
    });
  });

  describe('formatQuiet()', () => {
    it('returns percent,label,issueCount,syncedCount', () => {
      expect(formatter.formatQuiet(report)).toBe('70,HighAlignment,1,2');
    });
  });

  describe('formatJson()', () => {
    it('round-trips the report data', () => {
      const parsed: unknown = JSON.parse(formatter.formatJson(report));

      expect(parsed).toEqual(JSON.parse(JSON.stringify(report)));
      expect(parsed).toMatchObject({ percent: 70, gaps: { common: ['price', 'total'] } });
    });
  });

  describe('formatMarkdown()', () => {
    it('renders a heading, metrics table and undocumented list', () => {
      const lines = formatter.formatMarkdown(report).split('\n');

      expect(lines[0]).toBe('## 🟢 Documentation consistency: 70%');
      expect(lines).toContain('| Synced terms | 2 |');
      expect(lines).toContain('| Documented entities | 1/2 |');
      expect(lines).toContain('- `calcPrice` (function)');
      expect(lines[lines.length - 1]).toBe('- Documentation mentions terms absent from code (possibly stale): checkout');
    });
  });
});
