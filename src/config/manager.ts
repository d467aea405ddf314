import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import {
  type AppConfig,
  type ConfigKey,
  configObjectSchema,
  isConfigKey,
  validateConfigValue,
} from './schema-validator.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Converts a config key to an environment variable name.
 * e.g. "db.host" → "DB_HOST"
 *      "strategy.profitTarget" → "STRATEGY_PROFIT_TARGET"
 *      "api.accessToken" → "API_ACCESS_TOKEN"
 */
export function configKeyToEnvVar(key: string): string {
  return key
    .replace(/\./g, '_')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toUpperCase();
}

export class ConfigManager {
  private fileValues = new Map<ConfigKey, unknown>();
  private overrides = new Map<ConfigKey, unknown>();
  private resolved: AppConfig | null = null;

  /**
   * Load a YAML config file. Without an explicit path, ORB_CONFIG or
   * config/config.yaml is used; a missing default file means "defaults only".
   */
  load(path?: string): void {
    const explicit = path ?? (process.env.ORB_CONFIG || undefined);
    const resolvedPath = explicit ?? DEFAULT_CONFIG_PATH;

    if (!existsSync(resolvedPath)) {
      if (explicit) {
        throw new Error(`Config file not found: ${resolvedPath}`);
      }
      log.info({ path: resolvedPath }, 'No config file found, using defaults');
      this.applyDocument({});
      return;
    }

    const doc: unknown = parseYaml(readFileSync(resolvedPath, 'utf-8'));
    this.applyDocument(doc ?? {});
    log.info({ path: resolvedPath, keys: this.fileValues.size }, 'Config loaded');
  }

  /** Replace file-level values with a nested document (as parsed from YAML). */
  applyDocument(doc: unknown): void {
    if (!isPlainObject(doc)) {
      throw new Error('Config document must be a mapping');
    }
    this.fileValues.clear();
    this.collect(doc, '');
    this.resolved = null;
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.resolve()[key];
  }

  getAll(): AppConfig {
    return { ...this.resolve() };
  }

  set(key: ConfigKey, value: unknown): void {
    const { valid, error } = validateConfigValue(key, value);
    if (!valid) {
      throw new Error(`Invalid config value for ${key}: ${error}`);
    }
    this.overrides.set(key, value);
    this.resolved = null;
    log.info({ key }, 'Config updated');
  }

  reset(): void {
    this.fileValues.clear();
    this.overrides.clear();
    this.resolved = null;
  }

  private collect(node: Record<string, unknown>, prefix: string): void {
    for (const [name, value] of Object.entries(node)) {
      const key = prefix ? `${prefix}.${name}` : name;
      if (isConfigKey(key)) {
        const { valid, error } = validateConfigValue(key, value);
        if (!valid) {
          throw new Error(`Invalid config value for ${key}: ${error}`);
        }
        this.fileValues.set(key, value);
      } else if (isPlainObject(value)) {
        this.collect(value, key);
      } else {
        log.warn({ key }, 'Ignoring unknown config key');
      }
    }
  }

  private resolve(): AppConfig {
    if (this.resolved) return this.resolved;

    const raw: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      raw[def.key] = JSON.parse(def.value);
    }
    for (const [key, value] of this.fileValues) {
      raw[key] = value;
    }
    for (const def of CONFIG_DEFAULTS) {
      const envOverride = this.getEnvOverride(def.key);
      if (envOverride !== undefined) raw[def.key] = envOverride;
    }
    for (const [key, value] of this.overrides) {
      raw[key] = value;
    }

    const result = configObjectSchema.safeParse(raw);
    if (!result.success) {
      const messages = result.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new Error(`Invalid configuration: ${messages}`);
    }

    this.resolved = result.data;
    return result.data;
  }

  /**
   * Values are parsed as JSON when that yields a valid value for the key, or
   * the raw string when that is valid instead (so DB_PASSWORD=1234 stays a
   * string). Otherwise the parsed value is kept and the schema reports it:
   * API_TIMEOUT_MS=900000 fails as too large, not as a string. An empty
   * variable counts as unset.
   */
  private getEnvOverride(key: ConfigKey): unknown | undefined {
    const envValue = process.env[configKeyToEnvVar(key)];
    if (envValue === undefined || envValue === '') return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(envValue);
    } catch {
      return envValue;
    }
    if (validateConfigValue(key, parsed).valid) return parsed;
    return validateConfigValue(key, envValue).valid ? envValue : parsed;
  }
}

export const configManager = new ConfigManager();
