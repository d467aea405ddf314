import { z } from 'zod';
import { BAR_INTERVALS } from '../data/types.js';

const timeRegex = /^([01]\d|2[0-3]):[0-5]\d$/;
const dateRegex = /^\d{4}-\d{2}-\d{2}$/;

const clockTime = z.string().regex(timeRegex, 'Must be HH:MM format');
const isoDate = z.string().regex(dateRegex, 'Must be YYYY-MM-DD format');
const ratio = z.number().min(0).max(1);

export const barIntervalSchema = z.enum(BAR_INTERVALS);

// ── Database ─────────────────────────────────────────────────────────────────
const dbSchemas = {
  'db.host': z.string().min(1),
  'db.port': z.number().int().min(1).max(65_535),
  'db.name': z.string().min(1),
  'db.user': z.string().min(1),
  'db.password': z.string(),
  'db.poolMax': z.number().int().min(1).max(100),
  'db.ssl': z.boolean(),
};

// ── Historical pricing API ───────────────────────────────────────────────────
const apiSchemas = {
  'api.baseUrl': z.string().url(),
  'api.accessToken': z.string(),
  'api.appKey': z.string(),
  'api.username': z.string(),
  'api.password': z.string(),
  'api.timeoutMs': z.number().int().min(1_000).max(300_000),
  'api.retryAttempts': z.number().int().min(1).max(10),
  'api.retryDelayMs': z.number().int().min(0).max(60_000),
  'api.useCache': z.boolean(),
};

// ── Market ───────────────────────────────────────────────────────────────────
const marketSchemas = {
  'market.utcOffsetMinutes': z.number().int().min(-720).max(840),
  'market.currency': z.string().length(3),
  'market.limitCheck': z.boolean(),
  'market.sessionClose': clockTime,
  'market.universePath': z.string().min(1),
};

// ── Strategy ─────────────────────────────────────────────────────────────────
const strategySchemas = {
  'strategy.sessionOpen': clockTime,
  'strategy.rangeStart': clockTime,
  'strategy.rangeEnd': clockTime,
  'strategy.entryStart': clockTime,
  'strategy.entryEnd': clockTime,
  'strategy.forceExitTime': clockTime,
  'strategy.profitTarget': ratio.nullable(),
  'strategy.stopLoss': ratio.nullable(),
  'strategy.interval': barIntervalSchema,
};

// ── Market filter ────────────────────────────────────────────────────────────
const filterSchemas = {
  'filter.enabled': z.boolean(),
  'filter.threshold': ratio,
  'filter.minSymbols': z.number().int().min(1).max(500),
  'filter.baselineEnd': clockTime,
  'filter.checkStart': clockTime,
  'filter.checkEnd': clockTime,
};

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = {
  'backtest.startDate': isoDate,
  'backtest.endDate': isoDate,
  'backtest.symbols': z.array(z.string().min(1)),
  'backtest.initialCapital': z.number().positive(),
  'backtest.commissionRate': ratio,
  'backtest.mode': z.enum(['per-symbol', 'portfolio']),
};

// ── Reports ──────────────────────────────────────────────────────────────────
const reportsSchemas = {
  'reports.outputDir': z.string().min(1),
  'reports.charts': z.boolean(),
  'reports.optimizationPath': z.string().min(1),
};

// ── Merged schema ────────────────────────────────────────────────────────────
export const configSchemas = {
  ...dbSchemas,
  ...apiSchemas,
  ...marketSchemas,
  ...strategySchemas,
  ...filterSchemas,
  ...backtestSchemas,
  ...reportsSchemas,
};

export const configObjectSchema = z.object(configSchemas);

export type AppConfig = z.infer<typeof configObjectSchema>;
export type ConfigKey = keyof AppConfig;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(configSchemas, key);
}

/**
 * Look up the Zod schema for a given config key.
 * Returns undefined for unknown keys.
 */
export function getConfigSchema(key: string): z.ZodTypeAny | undefined {
  return isConfigKey(key) ? configSchemas[key] : undefined;
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are rejected.
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = getConfigSchema(key);
  if (!schema) {
    return { valid: false, error: `Unknown config key: ${key}` };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}
