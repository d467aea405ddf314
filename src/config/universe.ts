import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { configManager } from './manager.js';

const log = createLogger('universe');

const universeSchema = z.array(
  z.object({
    symbol: z.string().min(1),
    name: z.string().default(''),
    sector: z.string().default(''),
  }),
);

export type UniverseEntry = z.infer<typeof universeSchema>[number];

/** Reads the symbol universe (JSON array of {symbol, name, sector}); a missing file yields []. */
export function loadUniverse(path: string = configManager.get('market.universePath')): UniverseEntry[] {
  if (!existsSync(path)) {
    log.warn({ path }, 'Universe file not found');
    return [];
  }

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = universeSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid universe file ${path}: ${messages}`);
  }
  return result.data;
}

export function filterBySector(universe: UniverseEntry[], sector: string): UniverseEntry[] {
  const wanted = sector.toLowerCase();
  return universe.filter((entry) => entry.sector.toLowerCase() === wanted);
}

export function listSectors(universe: UniverseEntry[]): string[] {
  return [...new Set(universe.map((entry) => entry.sector).filter((s) => s.length > 0))].sort();
}

/**
 * Configured symbols, or the whole universe when none are configured.
 * Symbols outside the universe get an entry with an empty name and sector.
 */
export function resolveSymbols(configured: string[], universe: UniverseEntry[]): UniverseEntry[] {
  if (configured.length === 0) return universe;
  const bySymbol = new Map(universe.map((entry) => [entry.symbol, entry]));
  return configured.map((symbol) => bySymbol.get(symbol) ?? { symbol, name: '', sector: '' });
}
