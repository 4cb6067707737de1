import { describe, it, expect } from 'vitest';
import { TypeScriptEntityExtractor } from './typescript-extractor.js';

describe('TypeScriptEntityExtractor', () => {
  const extractor = new TypeScriptEntityExtractor();

  it('walks declarations in source order', () => {
    const code = [
      'export interface CartItem { sku: string }',
      'export class Cart {',
      '  #total = 0;',
      '  addItem(item: CartItem): void {}',
      '  private onChange = () => {};',
      '}',
      'export function checkout(cart: Cart) {}',
      'const applyDiscount = (price: number) => price * 0.9;',
      'export const settings = { retryLimit: 3, timeoutMs };',
    ].join('\n');

    const entities = extractor.extract(code, 'cart.ts');

    expect(entities.map((e) => [e.name, e.kind, e.line])).toEqual([
      ['CartItem', 'class', 1],
      ['Cart', 'class', 2],
      ['addItem', 'method', 4],
      ['onChange', 'method', 5],
      ['checkout', 'function', 7],
      ['applyDiscount', 'function', 8],
      ['retryLimit', 'config-key', 9],
      ['timeoutMs', 'config-key', 9],
    ]);
  });

  it('parses JavaScript files', () => {
    const code = 'export default class Store {}\nconst helper = function () {};';

    expect(extractor.extract(code, 'store.js').map((e) => [e.name, e.kind])).toEqual([
      ['Store', 'class'],
      ['helper', 'function'],
    ]);
  });

  it('recovers declarations from malformed input', () => {
    expect(extractor.extract('function broken( {').map((e) => e.name)).toEqual(['broken']);
  });

  it('ignores names in comments and strings', () => {
    const code = '// function ghost() {}\nconst label = "class Phantom";\nfunction realOne() {}';

    expect(extractor.extract(code).map((e) => e.name)).toEqual(['realOne']);
  });

  it('returns nothing for blank input', () => {
    expect(extractor.extract('  ')).toEqual([]);
  });
});
