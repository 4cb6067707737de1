import { describe, it, expect } from 'vitest';
import { PythonEntityExtractor } from './python-extractor.js';

const SOURCE = [
  '"""Module docstring.',
  '',
  'def not_real():',
  '"""',
  'MAX_RETRIES = 3',
  '',
  'class Cart:',
  '    def add_item(self, item):',
  '        def helper():',
  '            pass',
  '        return helper',
  '',
  '    async def checkout(self):',
  '        pass',
  '',
  'def total(cart):',
  '    prices = {"unit_price": 1}',
  '    return 0',
].join('\n');

describe('PythonEntityExtractor', () => {
  const extractor = new PythonEntityExtractor();

  it('reports the python language', () => {
    expect(extractor.language).toBe('python');
  });

  it('separates methods, functions, classes and config keys by block structure', () => {
    const entities = extractor.extract(SOURCE, 'cart.py');

    expect(entities.map((e) => [e.name, e.kind, e.line])).toEqual([
      ['MAX_RETRIES', 'config-key', 5],
      ['Cart', 'class', 7],
      ['add_item', 'method', 8],
      ['helper', 'function', 9],
      ['checkout', 'method', 13],
      ['total', 'function', 16],
      ['unit_price', 'config-key', 17],
    ]);
    expect(entities.every((e) => e.origin === 'cart.py')).toBe(true);
  });

  it('skips commented-out definitions', () => {
    const entities = extractor.extract('# def hidden():\ndef shown():\n    pass');

    expect(entities.map((e) => e.name)).toEqual(['shown']);
  });

  it('ignores a triple quote inside a single-line string', () => {
    const code = `QUOTE = '"""'\ndef compute_tax(x):\n    return x\nclass Invoice:\n    pass`;

    expect(extractor.extract(code).map((e) => [e.name, e.kind])).toEqual([
      ['QUOTE', 'config-key'],
      ['compute_tax', 'function'],
      ['Invoice', 'class'],
    ]);
  });

  it('ignores a triple quote inside a trailing comment', () => {
    const code = 'x = 1  # wrap docs in """\ndef compute_tax(x):\n    return x';

    expect(extractor.extract(code).map((e) => e.name)).toEqual(['compute_tax']);
  });

  it('resumes scanning after a docstring closes mid-line', () => {
    const code = "def load():\n    '''Reads the\n    cart.''' # done\n    pass\ndef save_cart():\n    pass";

    expect(extractor.extract(code).map((e) => e.name)).toEqual(['load', 'save_cart']);
  });

  it('does not treat control-flow colons as config keys', () => {
    const code = 'def run_job():\n    try:\n        pass\n    except ValueError:\n        pass';

    expect(extractor.extract(code).map((e) => e.name)).toEqual(['run_job']);
  });

  it('honors extraction options', () => {
    const custom = new PythonEntityExtractor({ ignoredNames: ['total'] });

    expect(custom.extract('PRICES = {"total": 1, "subtotal": 2}').map((e) => e.name)).toEqual([
      'PRICES',
      'subtotal',
    ]);
  });
});
