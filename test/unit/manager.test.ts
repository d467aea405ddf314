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

import { ConfigManager, configKeyToEnvVar } from '../../src/config/manager.js';
import { stubConfigEnv } from '../helpers/config-env.js';

describe('ConfigManager', () => {
  let manager: ConfigManager;
  let dir: string;

  function writeConfig(content: string): string {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    stubConfigEnv();
    manager = new ConfigManager();
    dir = mkdtempSync(join(tmpdir(), 'orb-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the defaults', () => {
    manager.applyDocument({});

    expect(manager.get('strategy.rangeStart')).toBe('09:05');
    expect(manager.get('backtest.initialCapital')).toBe(1_000_000);
    expect(manager.get('filter.enabled')).toBe(false);
  });

  it('reads nested YAML sections as dotted keys', () => {
    manager.load(
      writeConfig(
        ['strategy:', '  profitTarget: 0.03', '  entryEnd: "10:30"', 'backtest:', '  symbols: [7203.T]'].join(
          '\n',
        ),
      ),
    );

    expect(manager.get('strategy.profitTarget')).toBe(0.03);
    expect(manager.get('strategy.entryEnd')).toBe('10:30');
    expect(manager.get('backtest.symbols')).toEqual(['7203.T']);
    expect(manager.get('strategy.stopLoss')).toBe(0.01);
  });

  it('ignores unknown keys', () => {
    manager.applyDocument({ strategy: { bogus: 1 }, extra: 'x' });
    expect(manager.get('strategy.rangeEnd')).toBe('09:15');
  });

  it('rejects invalid file values with the key name', () => {
    expect(() => manager.applyDocument({ strategy: { rangeStart: '9:05' } })).toThrow(
      'Invalid config value for strategy.rangeStart: Must be HH:MM format',
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => manager.applyDocument(['a'])).toThrow('Config document must be a mapping');
  });

  it('treats an empty file as defaults', () => {
    manager.load(writeConfig(''));
    expect(manager.get('backtest.mode')).toBe('per-symbol');
  });

  it('fails when an explicit path is missing', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => manager.load(path)).toThrow(`Config file not found: ${path}`);
  });

  it('takes the path from ORB_CONFIG', () => {
    const path = writeConfig('backtest:\n  mode: portfolio\n');
    vi.stubEnv('ORB_CONFIG', path);

    manager.load();

    expect(manager.get('backtest.mode')).toBe('portfolio');
  });

  it('derives environment variable names from keys', () => {
    expect(configKeyToEnvVar('db.host')).toBe('DB_HOST');
    expect(configKeyToEnvVar('strategy.profitTarget')).toBe('STRATEGY_PROFIT_TARGET');
    expect(configKeyToEnvVar('market.utcOffsetMinutes')).toBe('MARKET_UTC_OFFSET_MINUTES');
  });

  describe('environment overrides', () => {
    it('override file values', () => {
      vi.stubEnv('STRATEGY_PROFIT_TARGET', '0.05');
      manager.applyDocument({ strategy: { profitTarget: 0.03 } });

      expect(manager.get('strategy.profitTarget')).toBe(0.05);
    });

    it('map camelCase segments to snake case', () => {
      vi.stubEnv('API_ACCESS_TOKEN', 'test-token');
      vi.stubEnv('MARKET_UTC_OFFSET_MINUTES', '0');
      manager.applyDocument({});

      expect(manager.get('api.accessToken')).toBe('test-token');
      expect(manager.get('market.utcOffsetMinutes')).toBe(0);
    });

    it('keep numeric-looking strings as strings', () => {
      vi.stubEnv('DB_PASSWORD', '1234');
      manager.applyDocument({});

      expect(manager.get('db.password')).toBe('1234');
    });

    it('parse JSON arrays', () => {
      vi.stubEnv('BACKTEST_SYMBOLS', '["7203.T","6758.T"]');
      manager.applyDocument({});

      expect(manager.get('backtest.symbols')).toEqual(['7203.T', '6758.T']);
    });

    it('report out-of-range numbers as such', () => {
      vi.stubEnv('API_TIMEOUT_MS', '900000');
      manager.applyDocument({});

      expect(() => manager.get('api.timeoutMs')).toThrow(
        'Invalid configuration: api.timeoutMs: Number must be less than or equal to 300000',
      );
    });

    it('treat empty variables as unset', () => {
      vi.stubEnv('API_RETRY_ATTEMPTS', '');
      manager.applyDocument({ api: { retryAttempts: 5 } });

      expect(manager.get('api.retryAttempts')).toBe(5);
    });

    it('fail resolution on invalid values', () => {
      vi.stubEnv('DB_PORT', 'not-a-port');
      manager.applyDocument({});

      expect(() => manager.get('db.port')).toThrow('Invalid configuration: db.port');
    });
  });

  describe('set', () => {
    it('overrides file and environment values', () => {
      vi.stubEnv('BACKTEST_START_DATE', '2025-01-06');
      manager.applyDocument({ backtest: { startDate: '2025-02-03' } });

      manager.set('backtest.startDate', '2025-03-03');

      expect(manager.get('backtest.startDate')).toBe('2025-03-03');
    });

    it('rejects invalid values', () => {
      manager.applyDocument({});
      expect(() => manager.set('backtest.mode', 'both')).toThrow(
        'Invalid config value for backtest.mode',
      );
      expect(manager.get('backtest.mode')).toBe('per-symbol');
    });

    it('is cleared by reset', () => {
      manager.set('reports.charts', false);
      manager.reset();

      expect(manager.get('reports.charts')).toBe(true);
    });
  });

  it('returns a copy from getAll', () => {
    manager.applyDocument({});
    const all = manager.getAll();
    all['strategy.stopLoss'] = 0.5;

    expect(manager.get('strategy.stopLoss')).toBe(0.01);
  });
});
