/**
 * Tests for ConsistencyEngine.
 *
 * No mocking needed - the engine is pure; configuration is injected.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConsistencyEngine, createEngine } from './consistency-engine.js';
import { NO_CODE_MESSAGE, NO_DOC_MESSAGE, NO_LOGIC_MESSAGE } from '../report/report-builder.js';
import { normalize } from '../normalization/text-normalizer.js';

function* failingNames(): Generator<string> {
  throw new Error('pattern table corrupted');
}

describe('ConsistencyEngine', () => {
  let engine: ConsistencyEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('analyze()', () => {
    it('counts a function as documented when the doc contains its name as a substring', () => {
      const report = engine.analyze('def add(a, b): return a + b', 'This function adds two numbers.');

      expect(report.status).toBe('analyzed');
      expect(report.entities.documented.map((e) => e.name)).toEqual(['add']);
      expect(report.gaps.common).toEqual([]);
      expect(report.gaps.missingInDoc).toEqual(['add']);
      expect(report.score).toBe(0);
      expect(report.label).toBe('PoorAlignment');
      expect(report.suggestions).toContain(
        'CRITICAL: No common vocabulary found. Rename identifiers to match domain terms or describe the code in its own terms.'
      );
    });

    it('reports the function as undocumented under word matching', () => {
      const report = createEngine({ matching: 'word' }).analyze(
        'def add(a, b): return a + b',
        'This function adds two numbers.'
      );

      expect(report.entities.undocumented.map((e) => e.name)).toEqual(['add']);
      expect(report.suggestions).toContain('Document function "add".');
    });

    it('syncs the term when the doc uses the name itself', () => {
      const report = engine.analyze('def add(a, b): return a + b', 'Use add to sum two numbers.');

      expect(report.gaps.common).toEqual(['add']);
      expect(report.gaps.missingInDoc).toEqual([]);
      expect(report.stats.syncedCount).toBe(1);
      expect(report.stats.issueCount).toBe(0);
    });

    it('returns the empty-documentation report for a class without docs', () => {
      const report = engine.analyze('class PaymentGateway: ...', '');

      expect(report.status).toBe('no-input');
      expect(report.score).toBe(0);
      expect(report.label).toBe('PoorAlignment');
      expect(report.gaps.missingInDoc).toEqual(['paymentgateway']);
      expect(report.entities.undocumented).toEqual([
        { name: 'PaymentGateway', kind: 'class', line: 1 },
      ]);
      expect(report.suggestions).toEqual([NO_DOC_MESSAGE]);
    });

    it('scores identical code and documentation as 1', () => {
      const text = 'def calculate_total(items):\n    return sum(items)';
      const report = engine.analyze(text, text);

      expect(report.score).toBe(1);
      expect(report.percent).toBe(100);
      expect(report.label).toBe('ProductionQuality');
      expect(report.icon).toBe('✅');
      expect(report.gaps.missingInDoc).toEqual([]);
      expect(report.gaps.missingInCode).toEqual([]);
    });

    it('reports an operational gap for an undocumented distance computation', () => {
      const report = engine.analyze(
        'def dist(p, q):\n    return euclid(p, q)',
        'Returns how far apart the points are.'
      );

      expect(report.operationalGaps.map((gap) => gap.trigger)).toEqual(['dist']);
      expect(report.suggestions[0]).toBe(
        'Code performs "dist" but the documentation never mentions it (expected one of: distance, distances, euclidean).'
      );
    });

    it('returns the no-logic report when no entities are found', () => {
      const report = engine.analyze('just some words here', 'Some documentation.');

      expect(report.status).toBe('no-logic');
      expect(report.score).toBe(0);
      expect(report.suggestions).toEqual([NO_LOGIC_MESSAGE]);
    });

    it('returns the no-input report for blank code', () => {
      const report = engine.analyze('  \n', 'anything');

      expect(report.status).toBe('no-input');
      expect(report.score).toBe(0);
      expect(report.suggestions).toEqual([NO_CODE_MESSAGE]);
    });

    it('returns a degenerate report when the doc is empty and code has no entities', () => {
      const report = engine.analyze('anything', '');

      expect(report.score).toBe(0);
      expect(report.label).toBe('PoorAlignment');
      expect(report.suggestions).toHaveLength(1);
    });

    it('is idempotent', () => {
      const code = 'class Cart:\n    def add_item(self, item):\n        """Add an item."""\n';
      const doc = '## class: Cart\nA cart holds items. Use add_item to add one.';

      expect(engine.analyze(code, doc)).toEqual(engine.analyze(code, doc));
    });

    it('partitions the vocabulary union', () => {
      const code = 'def load_cart(user):\n    return fetch_items(user, discount)';
      const doc = 'Loads the cart for a user and applies shipping.';
      const report = engine.analyze(code, doc);

      const all = [...report.gaps.common, ...report.gaps.missingInDoc, ...report.gaps.missingInCode];
      expect(all).toHaveLength(new Set(all).size);
      expect(new Set(all)).toEqual(new Set([...normalize(code), ...normalize(doc)]));
      expect(report.visual).toEqual([
        report.gaps.common.length,
        report.gaps.missingInDoc.length,
        report.gaps.missingInCode.length,
      ]);
    });

    it('counts entities mentioned only in comments as documented', () => {
      const code = '# format_price renders money\ndef format_price(value):\n    pass';
      const report = engine.analyze(code, 'Money helpers.');

      expect(report.entities.documented.map((e) => e.name)).toEqual(['format_price']);
    });

    it('does not treat code after a glob string as comment text', () => {
      const code = "const pattern = 'src/*';\nfunction computeTax(x) { return x; }\n/* end */";
      const report = engine.analyze(code, 'Nothing relevant here at all.');

      expect(report.entities.documented).toEqual([]);
      expect(report.entities.undocumented.map((e) => e.name)).toEqual(['computeTax']);
    });

    it('keeps the first entity of each case-insensitive name', () => {
      const report = engine.analyze('class Cart:\n    pass\nconfig = {"cart": 1}', 'Cart docs.');

      expect(report.entities.documented).toEqual([{ name: 'Cart', kind: 'class', line: 1 }]);
    });

    it('converts internal failures into an error report', () => {
      const failing = createEngine({ extraction: { ignoredNames: failingNames() } });

      const report = failing.analyze('def add(a, b): pass', 'Adds.');

      expect(report.status).toBe('error');
      expect(report.score).toBe(0);
      expect(report.suggestions).toEqual(['Analysis failed: pattern table corrupted']);
    });

    it('returns a frozen report', () => {
      const report = engine.analyze('def add(a, b): pass', 'add');

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.suggestions)).toBe(true);
    });

    it('uses the configured language for raw text', () => {
      const python = createEngine({ language: 'python' });
      const code = 'class Cart:\n    def add_item(self):\n        pass';

      const report = python.analyze(code, 'Cart and add_item.');

      expect(report.entities.documented.map((e) => [e.name, e.kind])).toEqual([
        ['Cart', 'class'],
        ['add_item', 'method'],
      ]);
    });

    it('applies configured label thresholds', () => {
      const lenient = createEngine({
        report: { thresholds: { production: 0.2, high: 0.1, partial: 0.05 } },
      });

      const report = lenient.analyze('def add(a, b): return a + b', 'Use add to sum two numbers.');

      expect(report.label).toBe('ProductionQuality');
    });
  });

  describe('analyzeSources()', () => {
    it('tags entities with their file and flags stale doc sections', () => {
      const report = engine.analyzeSources(
        [
          { path: 'cart.py', content: 'class Cart:\n    def add_item(self):\n        pass\n' },
          { path: 'util.ts', content: 'export function formatPrice(value: number) {}' },
        ],
        [
          {
            path: 'README.md',
            content: '## class: Cart\nA shopping cart.\n## function: legacy_export\nWrites CSV files.\n',
          },
        ]
      );

      expect(report.entities.documented).toEqual([
        { name: 'Cart', kind: 'class', origin: 'cart.py', line: 1 },
      ]);
      expect(report.entities.undocumented.map((e) => e.name)).toEqual(['add_item', 'formatPrice']);
      expect(report.staleSections).toEqual([
        {
          name: 'legacy_export',
          kind: 'function',
          description: 'Writes CSV files.',
          explicit: true,
          origin: 'README.md',
        },
      ]);
      expect(report.suggestions).toContain('Document method "add_item" (cart.py:2).');
      expect(report.suggestions).toContain('Document function "formatPrice" (util.ts:1).');
      expect(report.suggestions).toContain(
        'Documentation section "legacy_export" describes no function in the code.'
      );
    });

    it('reads sections only from markdown docs', () => {
      const report = engine.analyzeSources(
        [{ path: 'cart.py', content: 'def checkout():\n    pass\n' }],
        [{ path: 'NOTES.txt', content: '## function: ghost\nNot parsed as a section.\n' }]
      );

      expect(report.staleSections).toEqual([]);
    });

    it('returns the no-input report when no code is given', () => {
      expect(engine.analyzeSources([], [{ path: 'README.md', content: 'Docs.' }]).status).toBe(
        'no-input'
      );
    });
  });
});
