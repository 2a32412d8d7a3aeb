/**
 * Unit Tests for CsvConverter
 *
 * Tests cover:
 * - string→string, file→string and file→file conversions
 * - Default output path derivation
 * - Failures leave no output file behind
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import { createConversionOptions } from '../../src/core/conversion-options.js';
import { CsvConverter, defaultOutputPath } from '../../src/core/csv-converter.js';
import { EncodingError, NotFoundError, ParseError } from '../../src/core/errors.js';
import { createTempDir } from '../helpers/temp-dir.js';

describe('CsvConverter', () => {
  const converter = new CsvConverter();
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  function writeCsv(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  describe('defaultOutputPath', () => {
    it('should replace the extension with .json', () => {
      expect(defaultOutputPath('/data/exports/sales.csv')).toBe('/data/exports/sales.json');
      expect(defaultOutputPath('/data/archive.tar.csv')).toBe('/data/archive.tar.json');
    });

    it('should append .json when there is no extension', () => {
      expect(defaultOutputPath('/data/sales')).toBe('/data/sales.json');
      expect(defaultOutputPath('sales')).toBe('sales.json');
    });
  });

  describe('convertString', () => {
    it('should convert text with the given options', () => {
      const options = createConversionOptions({ orient: 'values' });
      expect(converter.convertString('h1,h2\n1,2', options)).toBe('[["1","2"]]');
    });

    it('should propagate ParseError', () => {
      expect(() =>
        converter.convertString('a\n"open', createConversionOptions())
      ).toThrow(ParseError);
    });
  });

  describe('convertFileToString', () => {
    it('should read, skip and reshape a file', async () => {
      const filePath = writeCsv('report.csv', '# generated\nid,label\n7,seven\n');
      const options = createConversionOptions({ skipRows: 1, orient: 'split' });

      await expect(converter.convertFileToString(filePath, options)).resolves.toBe(
        '{"columns":["id","label"],"data":[["7","seven"]]}'
      );
    });

    it('should reject with NotFoundError for a missing file', async () => {
      await expect(
        converter.convertFileToString(path.join(dir, 'nope.csv'), createConversionOptions())
      ).rejects.toThrow(NotFoundError);
    });
  });

  describe('convertFileToFile', () => {
    it('should write next to the source by default', async () => {
      const filePath = writeCsv('people.csv', 'name,age\nAlice,25\nBob,30\n');

      const written = await converter.convertFileToFile(
        filePath,
        undefined,
        createConversionOptions()
      );

      expect(written).toBe(path.join(dir, 'people.json'));
      expect(fs.readFileSync(written, 'utf-8')).toBe(
        '[{"name":"Alice","age":"25"},{"name":"Bob","age":"30"}]'
      );
    });

    it('should write to an explicit output path', async () => {
      const filePath = writeCsv('people.csv', 'name\nZoë\n');
      const outputPath = path.join(dir, 'out', 'result.json');
      fs.mkdirSync(path.dirname(outputPath));

      const written = await converter.convertFileToFile(
        filePath,
        outputPath,
        createConversionOptions({ indent: 2 })
      );

      expect(written).toBe(outputPath);
      expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
        '[\n  {\n    "name": "Zoë"\n  }\n]'
      );
    });

    it('should not create an output file when the source is missing', async () => {
      const filePath = path.join(dir, 'absent.csv');

      await expect(
        converter.convertFileToFile(filePath, undefined, createConversionOptions())
      ).rejects.toThrow(NotFoundError);
      expect(fs.existsSync(path.join(dir, 'absent.json'))).toBe(false);
    });

    it('should not create an output file when decoding fails', async () => {
      const filePath = path.join(dir, 'binary.csv');
      fs.writeFileSync(filePath, Buffer.from([0xc3, 0x28]));

      await expect(
        converter.convertFileToFile(filePath, undefined, createConversionOptions())
      ).rejects.toThrow(EncodingError);
      expect(fs.existsSync(path.join(dir, 'binary.json'))).toBe(false);
    });
  });
});
