import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { escapeCsvField, toCsv, writeCsv } from '../../src/reporting/csv.js';

describe('csv', () => {
  describe('escapeCsvField', () => {
    it('leaves plain values alone', () => {
      expect(escapeCsvField('7203.T')).toBe('7203.T');
      expect(escapeCsvField(-1.5)).toBe('-1.5');
      expect(escapeCsvField(true)).toBe('true');
    });

    it('writes missing and non-finite values as empty', () => {
      expect(escapeCsvField(null)).toBe('');
      expect(escapeCsvField(undefined)).toBe('');
      expect(escapeCsvField(Number.NaN)).toBe('');
      expect(escapeCsvField(Number.POSITIVE_INFINITY)).toBe('');
    });

    it('quotes commas, quotes and line breaks', () => {
      expect(escapeCsvField('Toyota, Inc.')).toBe('"Toyota, Inc."');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('toCsv', () => {
    it('joins the header and rows with a trailing newline', () => {
      expect(
        toCsv(
          ['symbol', 'pnl'],
          [
            ['7203.T', 24_625],
            ['6758.T', null],
          ],
        ),
      ).toBe('symbol,pnl\n7203.T,24625\n6758.T,\n');
    });
  });

  describe('writeCsv', () => {
    it('writes the file', () => {
      const dir = mkdtempSync(join(tmpdir(), 'orb-csv-'));
      try {
        const path = join(dir, 'out.csv');
        writeCsv(path, ['a'], [[1], [2]]);
        expect(readFileSync(path, 'utf-8')).toBe('a\n1\n2\n');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
