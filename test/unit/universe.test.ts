import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import {
  filterBySector,
  listSectors,
  loadUniverse,
  resolveSymbols,
} from '../../src/config/universe.js';

const UNIVERSE = [
  { symbol: '7203.T', name: 'Toyota Motor', sector: 'Automotive' },
  { symbol: '7267.T', name: 'Honda Motor', sector: 'Automotive' },
  { symbol: '6758.T', name: 'Sony Group', sector: 'Technology' },
  { symbol: '9999.T', name: 'Unlisted', sector: '' },
];

describe('universe', () => {
  describe('loadUniverse', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'orb-universe-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads entries and defaults missing fields', () => {
      const path = join(dir, 'universe.json');
      writeFileSync(path, JSON.stringify([{ symbol: '7203.T', name: 'Toyota Motor' }, { symbol: '6758.T' }]));

      expect(loadUniverse(path)).toEqual([
        { symbol: '7203.T', name: 'Toyota Motor', sector: '' },
        { symbol: '6758.T', name: '', sector: '' },
      ]);
    });

    it('returns an empty list for a missing file', () => {
      expect(loadUniverse(join(dir, 'missing.json'))).toEqual([]);
    });

    it('rejects entries without a symbol', () => {
      const path = join(dir, 'universe.json');
      writeFileSync(path, JSON.stringify([{ name: 'Nameless' }]));

      expect(() => loadUniverse(path)).toThrow(`Invalid universe file ${path}: 0.symbol: Required`);
    });

    it('loads the shipped universe', () => {
      const universe = loadUniverse('config/universe.json');

      expect(universe).toHaveLength(49);
      expect(universe[0]).toEqual({ symbol: '7203.T', name: 'Toyota Motor', sector: 'Automotive' });
    });
  });

  describe('filterBySector', () => {
    it('matches sectors case-insensitively', () => {
      expect(filterBySector(UNIVERSE, 'automotive').map((e) => e.symbol)).toEqual([
        '7203.T',
        '7267.T',
      ]);
      expect(filterBySector(UNIVERSE, 'Energy')).toEqual([]);
    });
  });

  describe('listSectors', () => {
    it('lists distinct non-empty sectors in order', () => {
      expect(listSectors(UNIVERSE)).toEqual(['Automotive', 'Technology']);
    });
  });

  describe('resolveSymbols', () => {
    it('uses the whole universe when nothing is configured', () => {
      expect(resolveSymbols([], UNIVERSE)).toBe(UNIVERSE);
    });

    it('keeps configured order and fills unknown symbols', () => {
      expect(resolveSymbols(['6758.T', '1234.T'], UNIVERSE)).toEqual([
        { symbol: '6758.T', name: 'Sony Group', sector: 'Technology' },
        { symbol: '1234.T', name: '', sector: '' },
      ]);
    });
  });
});
