import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { configManager } from './manager.js';

const log = createLogger('optimization-config');

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Must be HH:MM format');
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');
const ratio = z.number().min(0).max(1);
const minutes = z.number().int().min(1).max(600);

function parameterSchema<T extends z.ZodTypeAny>(value: T) {
  return z
    .object({
      description: z.string().default(''),
      values: z.array(value).min(1),
      labels: z.array(z.string()).optional(),
      default: value,
    })
    .refine((p) => !p.labels || p.labels.length === p.values.length, {
      message: 'labels must have one entry per value',
      path: ['labels'],
    });
}

export const optimizationSchema = z.object({
  fixed: z
    .object({
      startDate: isoDate.optional(),
      endDate: isoDate.optional(),
      initialCapital: z.number().positive().optional(),
      commissionRate: ratio.optional(),
      rangeStart: clockTime.optional(),
    })
    .default({}),
  parameters: z.object({
    profitTarget: parameterSchema(ratio),
    stopLoss: parameterSchema(ratio),
    rangeDuration: parameterSchema(minutes),
    entryWindow: parameterSchema(minutes),
    forceExitTime: parameterSchema(clockTime),
  }),
  sectors: z.array(z.string().min(1)).default([]),
});

export type OptimizationGrid = z.infer<typeof optimizationSchema>;
export type OptimizableParameter = keyof OptimizationGrid['parameters'];

export const OPTIMIZABLE_PARAMETERS: OptimizableParameter[] = [
  'profitTarget',
  'stopLoss',
  'rangeDuration',
  'entryWindow',
  'forceExitTime',
];

export function isOptimizableParameter(name: string): name is OptimizableParameter {
  return OPTIMIZABLE_PARAMETERS.some((p) => p === name);
}

export function parseOptimizationGrid(doc: unknown): OptimizationGrid {
  const result = optimizationSchema.safeParse(doc);
  if (!result.success) {
    const messages = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid optimization config: ${messages}`);
  }
  return result.data;
}

export function loadOptimizationGrid(
  path: string = configManager.get('reports.optimizationPath'),
): OptimizationGrid {
  if (!existsSync(path)) {
    throw new Error(`Optimization config not found: ${path}`);
  }
  const grid = parseOptimizationGrid(parseYaml(readFileSync(path, 'utf-8')));
  log.info({ path, sectors: grid.sectors.length }, 'Optimization config loaded');
  return grid;
}

/** Values paired with their display labels. */
export function parameterValues(
  grid: OptimizationGrid,
  parameter: OptimizableParameter,
): { value: number | string; label: string }[] {
  const spec = grid.parameters[parameter];
  const values: (number | string)[] = spec.values;
  return values.map((value, i) => ({ value, label: spec.labels?.[i] ?? String(value) }));
}
