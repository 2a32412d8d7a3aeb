/**
 * Unit Tests for ConversionOptions
 *
 * Tests cover:
 * - Defaults and immutability
 * - Rejection of unsupported orient, delimiter, encoding and ranges
 */

import { describe, it, expect } from '@jest/globals';
import {
  createConversionOptions,
  isSupportedEncoding,
  parseConversionOptions,
} from '../../src/core/conversion-options.js';
import { InvalidOptionError } from '../../src/core/errors.js';

describe('ConversionOptions', () => {
  describe('Defaults', () => {
    it('should fill every field with its default', () => {
      expect(createConversionOptions()).toEqual({
        delimiter: ',',
        encoding: 'utf-8',
        skipRows: 0,
        header: true,
        orient: 'records',
        indent: null,
      });
    });

    it('should treat undefined fields as defaults', () => {
      const options = parseConversionOptions({
        delimiter: undefined,
        orient: undefined,
        indent: undefined,
      });
      expect(options.delimiter).toBe(',');
      expect(options.orient).toBe('records');
      expect(options.indent).toBeNull();
    });

    it('should return a frozen object', () => {
      const options = createConversionOptions({ orient: 'split', indent: 2 });
      expect(Object.isFrozen(options)).toBe(true);
      expect(options.orient).toBe('split');
      expect(options.indent).toBe(2);
    });
  });

  describe('Validation', () => {
    it('should reject an unsupported orient at construction', () => {
      expect(() => parseConversionOptions({ orient: 'pivot' })).toThrow(
        InvalidOptionError
      );
      expect(() => parseConversionOptions({ orient: 'pivot' })).toThrow(
        'Invalid conversion options: orient: unsupported JSON orient: pivot (expected records, values, split)'
      );
    });

    it('should reject a multi-character delimiter', () => {
      expect(() => parseConversionOptions({ delimiter: '||' })).toThrow(
        'delimiter: delimiter must be a single character'
      );
    });

    it('should reject a quote or line break as delimiter', () => {
      expect(() => parseConversionOptions({ delimiter: '"' })).toThrow(
        'delimiter cannot be a quote or line break'
      );
      expect(() => parseConversionOptions({ delimiter: '\n' })).toThrow(
        'delimiter cannot be a quote or line break'
      );
    });

    it('should accept tab and semicolon delimiters', () => {
      expect(parseConversionOptions({ delimiter: '\t' }).delimiter).toBe('\t');
      expect(parseConversionOptions({ delimiter: ';' }).delimiter).toBe(';');
    });

    it('should reject an unknown encoding', () => {
      expect(() => parseConversionOptions({ encoding: 'not-a-codec' })).toThrow(
        'encoding: unsupported encoding: not-a-codec'
      );
    });

    it('should reject negative or fractional skip_rows', () => {
      expect(() => parseConversionOptions({ skipRows: -1 })).toThrow(
        InvalidOptionError
      );
      expect(() => parseConversionOptions({ skipRows: 1.5 })).toThrow(
        InvalidOptionError
      );
    });

    it('should accept any non-negative integer indentation', () => {
      expect(parseConversionOptions({ indent: 0 }).indent).toBe(0);
      expect(createConversionOptions({ indent: 12 }).indent).toBe(12);
      expect(() => parseConversionOptions({ indent: -1 })).toThrow(
        InvalidOptionError
      );
      expect(() => parseConversionOptions({ indent: 2.5 })).toThrow(
        InvalidOptionError
      );
    });

    it('should reject unknown option names', () => {
      expect(() => parseConversionOptions({ colour: 'blue' })).toThrow(
        InvalidOptionError
      );
    });
  });

  describe('isSupportedEncoding', () => {
    it('should recognise common labels', () => {
      expect(isSupportedEncoding('utf-8')).toBe(true);
      expect(isSupportedEncoding('UTF8')).toBe(true);
      expect(isSupportedEncoding('latin1')).toBe(true);
    });

    it('should reject unknown labels', () => {
      expect(isSupportedEncoding('klingon')).toBe(false);
    });
  });
});
