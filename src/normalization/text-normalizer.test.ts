/**
 * Unit tests for TextNormalizer.
 *
 * No mocking needed - normalization is pure string processing over the
 * bundled stopword list.
 */

import { describe, it, expect } from 'vitest';
import { TextNormalizer, normalize, splitCamelCase } from './text-normalizer.js';
import { getDefaultStopwords } from './stopwords.js';

describe('TextNormalizer', () => {
  describe('normalize()', () => {
    it('returns an empty sequence for empty input', () => {
      expect(normalize('')).toEqual([]);
      expect(normalize('   \n\t ')).toEqual([]);
    });

    it('lowercases and splits underscores', () => {
      expect(normalize('calc_price')).toEqual(['calc', 'price']);
      expect(normalize('Calc Price')).toEqual(['calc', 'price']);
    });

    it('replaces structural punctuation with separators instead of deleting it', () => {
      expect(normalize('total(items)')).toEqual(['total', 'items']);
      expect(normalize('config.host=localhost;')).toEqual(['config', 'host', 'localhost']);
      expect(normalize('{"retries": 3}')).toEqual(['retries']);
    });

    it('strips markdown emphasis and code spans', () => {
      expect(normalize('Use `calc_price` for **checkout** totals')).toEqual([
        'use',
        'calc',
        'price',
        'checkout',
        'totals',
      ]);
    });

    it('drops single-character tokens and numbers', () => {
      expect(normalize('x y 42 2024 tax')).toEqual(['tax']);
    });

    it('drops English and software-generic stopwords', () => {
      expect(normalize('This function returns the class of a module')).toEqual([]);
    });

    it('keeps repeated tokens', () => {
      expect(normalize('price price price')).toEqual(['price', 'price', 'price']);
    });

    it('is deterministic', () => {
      const text = 'def compute_distance(point_a, point_b): return dist';
      expect(normalize(text)).toEqual(normalize(text));
    });
  });

  describe('options', () => {
    it('accepts extra stopwords', () => {
      const normalizer = new TextNormalizer({ extraStopwords: ['Price'] });
      expect(normalizer.normalize('calc price')).toEqual(['calc']);
    });

    it('replaces the base stopword list', () => {
      const normalizer = new TextNormalizer({ stopwords: ['calc'] });
      expect(normalizer.normalize('the calc price')).toEqual(['the', 'price']);
    });

    it('accepts a custom punctuation set', () => {
      const normalizer = new TextNormalizer({ stopwords: [], punctuation: '-' });
      expect(normalizer.normalize('re-run (now)')).toEqual(['re', 'run', '(now)']);
    });

    it('splits identifiers when enabled', () => {
      const normalizer = new TextNormalizer({ splitIdentifiers: true });
      expect(normalizer.normalize('calcPrice')).toEqual(['calc', 'price']);
      expect(new TextNormalizer().normalize('calcPrice')).toEqual(['calcprice']);
    });

    it('reports stopwords case-insensitively', () => {
      const normalizer = new TextNormalizer();
      expect(normalizer.isStopword('The')).toBe(true);
      expect(normalizer.isStopword('invoice')).toBe(false);
    });
  });

  describe('splitCamelCase()', () => {
    it('splits lower-to-upper and acronym boundaries', () => {
      expect(splitCamelCase('parseHTTPResponse')).toBe('parse HTTP Response');
      expect(splitCamelCase('PaymentGateway')).toBe('Payment Gateway');
    });
  });

  describe('bundled stopwords', () => {
    it('contains English and software-generic words', () => {
      const stopwords = getDefaultStopwords();
      expect(stopwords.has('the')).toBe(true);
      expect(stopwords.has('function')).toBe(true);
      expect(stopwords.has('returns')).toBe(true);
      expect(stopwords.has('distance')).toBe(false);
    });
  });
});
