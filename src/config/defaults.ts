import type { ConfigKey } from './schema-validator.js';

export interface ConfigDefault {
  key: ConfigKey;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Database
  { key: 'db.host', value: '"localhost"', category: 'db', description: 'PostgreSQL host' },
  { key: 'db.port', value: '5432', category: 'db', description: 'PostgreSQL port' },
  { key: 'db.name', value: '"market_data"', category: 'db', description: 'Database name' },
  { key: 'db.user', value: '"postgres"', category: 'db', description: 'Database user' },
  { key: 'db.password', value: '"postgres"', category: 'db', description: 'Database password' },
  { key: 'db.poolMax', value: '5', category: 'db', description: 'Connection pool size' },
  { key: 'db.ssl', value: 'false', category: 'db', description: 'Use TLS for the connection' },

  // Historical pricing API
  {
    key: 'api.baseUrl',
    value: '"https://api.refinitiv.com"',
    category: 'api',
    description: 'Historical pricing API base URL',
  },
  {
    key: 'api.accessToken',
    value: '""',
    category: 'api',
    description: 'Static bearer token (skips the password grant when set)',
  },
  { key: 'api.appKey', value: '""', category: 'api', description: 'Application key / client id' },
  { key: 'api.username', value: '""', category: 'api', description: 'API user name' },
  { key: 'api.password', value: '""', category: 'api', description: 'API password' },
  { key: 'api.timeoutMs', value: '30000', category: 'api', description: 'HTTP timeout (ms)' },
  {
    key: 'api.retryAttempts',
    value: '3',
    category: 'api',
    description: 'Attempts per request on rate limit or network error',
  },
  {
    key: 'api.retryDelayMs',
    value: '2000',
    category: 'api',
    description: 'Base back-off between attempts (ms, linear)',
  },
  {
    key: 'api.useCache',
    value: 'true',
    category: 'api',
    description: 'Serve bars from PostgreSQL before calling the API',
  },

  // Market
  {
    key: 'market.utcOffsetMinutes',
    value: '540',
    category: 'market',
    description: 'Exchange UTC offset in minutes (Tokyo = 540)',
  },
  { key: 'market.currency', value: '"JPY"', category: 'market', description: 'Report currency' },
  {
    key: 'market.limitCheck',
    value: 'true',
    category: 'market',
    description: 'Skip symbols that hit the daily price limit',
  },
  {
    key: 'market.sessionClose',
    value: '"15:30"',
    category: 'market',
    description: 'Last bar requested by the cache warm-up (local)',
  },
  {
    key: 'market.universePath',
    value: '"config/universe.json"',
    category: 'market',
    description: 'Symbol universe with names and sectors',
  },

  // Strategy
  {
    key: 'strategy.sessionOpen',
    value: '"09:00"',
    category: 'strategy',
    description: 'First bar requested each day (local)',
  },
  {
    key: 'strategy.rangeStart',
    value: '"09:05"',
    category: 'strategy',
    description: 'Opening range start (local, inclusive)',
  },
  {
    key: 'strategy.rangeEnd',
    value: '"09:15"',
    category: 'strategy',
    description: 'Opening range end (local, inclusive)',
  },
  {
    key: 'strategy.entryStart',
    value: '"09:15"',
    category: 'strategy',
    description: 'Entry window start (local, inclusive)',
  },
  {
    key: 'strategy.entryEnd',
    value: '"10:00"',
    category: 'strategy',
    description: 'Entry window end (local, exclusive)',
  },
  {
    key: 'strategy.forceExitTime',
    value: '"15:00"',
    category: 'strategy',
    description: 'Force-exit time (local)',
  },
  {
    key: 'strategy.profitTarget',
    value: '0.02',
    category: 'strategy',
    description: 'Profit target as a ratio; null closes at force-exit only',
  },
  { key: 'strategy.stopLoss', value: '0.01', category: 'strategy', description: 'Stop loss ratio' },
  { key: 'strategy.interval', value: '"1min"', category: 'strategy', description: 'Bar interval' },

  // Market filter
  { key: 'filter.enabled', value: 'false', category: 'filter', description: 'Enable market filter' },
  {
    key: 'filter.threshold',
    value: '0.01',
    category: 'filter',
    description: 'Median morning move that blocks the opposite side',
  },
  {
    key: 'filter.minSymbols',
    value: '10',
    category: 'filter',
    description: 'Symbols needed before the filter decides',
  },
  {
    key: 'filter.baselineEnd',
    value: '"09:05"',
    category: 'filter',
    description: 'End of the opening baseline window (local)',
  },
  {
    key: 'filter.checkStart',
    value: '"09:25"',
    category: 'filter',
    description: 'Start of the check window (local)',
  },
  {
    key: 'filter.checkEnd',
    value: '"09:30"',
    category: 'filter',
    description: 'End of the check window (local)',
  },

  // Backtest
  { key: 'backtest.startDate', value: '"2025-10-01"', category: 'backtest', description: 'First day' },
  { key: 'backtest.endDate', value: '"2025-10-31"', category: 'backtest', description: 'Last day' },
  {
    key: 'backtest.symbols',
    value: '[]',
    category: 'backtest',
    description: 'Symbols to test; empty means the whole universe',
  },
  {
    key: 'backtest.initialCapital',
    value: '1000000',
    category: 'backtest',
    description: 'Starting capital (per symbol in per-symbol mode)',
  },
  {
    key: 'backtest.commissionRate',
    value: '0',
    category: 'backtest',
    description: 'One-way commission rate',
  },
  {
    key: 'backtest.mode',
    value: '"per-symbol"',
    category: 'backtest',
    description: 'per-symbol | portfolio',
  },

  // Reports
  { key: 'reports.outputDir', value: '"Output"', category: 'reports', description: 'Report root' },
  { key: 'reports.charts', value: 'true', category: 'reports', description: 'Render PNG charts' },
  {
    key: 'reports.optimizationPath',
    value: '"config/optimization.yaml"',
    category: 'reports',
    description: 'Parameter grid for the optimizer',
  },
];
