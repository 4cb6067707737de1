import { describe, it, expect } from 'vitest';
import {
  buildTermVector,
  cosineSimilarity,
  countTerms,
  similarity,
  vectorNorm,
} from './term-vector.js';

describe('countTerms', () => {
  it('counts raw frequencies', () => {
    expect(countTerms(['cart', 'total', 'cart'])).toEqual(new Map([['cart', 2], ['total', 1]]));
  });
});

describe('buildTermVector', () => {
  it('applies sublinear term frequency', () => {
    const vector = buildTermVector(['cart', 'cart', 'total']);

    expect(vector.get('cart')).toBeCloseTo(1 + Math.log(2), 10);
    expect(vector.get('total')).toBe(1);
  });
});

describe('vectorNorm', () => {
  it('returns the euclidean length', () => {
    expect(vectorNorm(new Map([['a1', 3], ['b1', 4]]))).toBe(5);
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for identical vectors', () => {
    const vector = buildTermVector(['price', 'price', 'total', 'cart']);

    expect(cosineSimilarity(vector, vector)).toBe(1);
  });

  it('is 0 for disjoint vectors', () => {
    expect(cosineSimilarity(new Map([['cart', 1]]), new Map([['price', 1]]))).toBe(0);
  });

  it('is 0 when either vector is empty', () => {
    expect(cosineSimilarity(new Map(), new Map([['cart', 1]]))).toBe(0);
    expect(cosineSimilarity(new Map(), new Map())).toBe(0);
  });

  it('rounds to four decimals', () => {
    const a = new Map([['cart', 1], ['total', 1]]);
    const b = new Map([['cart', 1]]);

    expect(cosineSimilarity(a, b)).toBe(0.7071);
  });

  it('is symmetric', () => {
    const a = buildTermVector(['load', 'cart', 'cart', 'price', 'discount', 'total']);
    const b = buildTermVector(['cart', 'total', 'total', 'checkout', 'price']);

    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });
});

describe('similarity', () => {
  it('normalizes both texts before comparing', () => {
    expect(similarity('calculate the total', 'Calculate totals')).toBe(0.5);
  });

  it('is 0 for blank input', () => {
    expect(similarity('', 'cart total')).toBe(0);
  });
});
