import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { configManager } from '../config/manager.js';
import { createLogger } from '../utils/logger.js';
import {
  ApiError,
  AuthError,
  MarketDataError,
  RateLimitError,
  ValidationError,
} from './errors.js';
import type { Bar, BarInterval, DailyBar, MarketDataProvider } from './types.js';

const log = createLogger('historical-pricing');

export const TOKEN_PATH = '/auth/oauth2/v1/token';
export const INTRADAY_PATH = '/data/historical-pricing/v1/views/intraday-summaries';
export const INTERDAY_PATH = '/data/historical-pricing/v1/views/interday-summaries';

export const INTERVAL_CODES: Record<BarInterval, string> = {
  '1min': 'PT1M',
  '5min': 'PT5M',
  '10min': 'PT10M',
  '15min': 'PT15M',
  '30min': 'PT30M',
  '1h': 'PT1H',
};

const FIELDS = ['OPEN_PRC', 'HIGH_1', 'LOW_1', 'TRDPRC_1', 'ACVOL_UNS'];
const MAX_ROWS = 10_000;
const TOKEN_EXPIRY_MARGIN_SECONDS = 30;

// ── Response schemas ──────────────────────────────────────────────────

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().optional(),
  token_type: z.string().optional(),
});

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const historyResponseSchema = z.array(
  z
    .object({
      headers: z.array(z.object({ name: z.string() }).passthrough()).default([]),
      data: z.array(z.array(cellSchema)).default([]),
    })
    .passthrough(),
);

type HistoryResponse = z.infer<typeof historyResponseSchema>;
type Cell = z.infer<typeof cellSchema>;

interface ParsedRow {
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// ── Row parsing ───────────────────────────────────────────────────────

function numberAt(row: Cell[], index: number | undefined): number | null {
  if (index === undefined) return null;
  const value = row[index];
  if (value == null || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Nanosecond timestamps ("...00.000000000Z") trimmed to milliseconds. */
export function normalizeTimestamp(raw: string): string {
  const trimmed = raw.replace(/(\.\d{3})\d+/, '$1');
  const zoned = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed) ? trimmed : `${trimmed}Z`;
  const date = new Date(zoned);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid timestamp in API response: ${raw}`);
  }
  return date.toISOString();
}

export function parseHistoryRows(payload: HistoryResponse, timeColumn: string): ParsedRow[] {
  const rows: ParsedRow[] = [];

  for (const block of payload) {
    const columns = new Map(block.headers.map((h, i) => [h.name, i]));
    const timeIndex = columns.get(timeColumn);
    if (timeIndex === undefined) continue;

    for (const row of block.data) {
      const time = row[timeIndex];
      const open = numberAt(row, columns.get('OPEN_PRC'));
      const close = numberAt(row, columns.get('TRDPRC_1'));
      if (typeof time !== 'string' || open === null || close === null) continue;

      rows.push({
        time,
        open,
        high: numberAt(row, columns.get('HIGH_1')) ?? Math.max(open, close),
        low: numberAt(row, columns.get('LOW_1')) ?? Math.min(open, close),
        close,
        volume: numberAt(row, columns.get('ACVOL_UNS')) ?? 0,
      });
    }
  }

  return rows;
}

function headerRecord(headers: object): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key.toLowerCase()] = value == null ? undefined : String(value);
  }
  return out;
}

// ── Client ────────────────────────────────────────────────────────────

export interface HistoricalPricingOptions {
  baseUrl: string;
  accessToken?: string;
  appKey?: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
}

export class HistoricalPricingClient implements MarketDataProvider {
  private http: AxiosInstance;
  private options: HistoricalPricingOptions;
  private token: string | null = null;
  private tokenExpiresAt = 0;

  constructor(options: HistoricalPricingOptions) {
    this.options = options;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30_000,
      validateStatus: () => true,
    });
  }

  get isConnected(): boolean {
    return this.token !== null;
  }

  async connect(): Promise<void> {
    if (this.options.accessToken) {
      this.token = this.options.accessToken;
      this.tokenExpiresAt = Number.POSITIVE_INFINITY;
      log.info('Using configured access token');
      return;
    }

    const { username, password, appKey } = this.options;
    if (!username || !password || !appKey) {
      throw AuthError.missingCredentials();
    }

    const body = new URLSearchParams({
      grant_type: 'password',
      username,
      password,
      client_id: appKey,
      scope: 'trapi',
      takeExclusiveSignOnControl: 'true',
    });

    const response = await this.send(() =>
      this.http.post<unknown>(TOKEN_PATH, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }),
    );
    if (response.status === 400 || response.status === 401) {
      throw AuthError.invalidCredentials();
    }
    this.assertOk(TOKEN_PATH, response);

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, 'Invalid token response');
    }

    this.token = parsed.data.access_token;
    const ttl = parsed.data.expires_in ?? 300;
    this.tokenExpiresAt = Date.now() + (ttl - TOKEN_EXPIRY_MARGIN_SECONDS) * 1000;
    log.info({ expiresIn: ttl }, 'Authenticated with historical pricing API');
  }

  disconnect(): void {
    this.token = null;
    this.tokenExpiresAt = 0;
    log.info('Disconnected from historical pricing API');
  }

  async getIntradayBars(
    symbol: string,
    start: string,
    end: string,
    interval: BarInterval,
  ): Promise<Bar[]> {
    const payload = await this.fetchHistory(`${INTRADAY_PATH}/${encodeURIComponent(symbol)}`, {
      interval: INTERVAL_CODES[interval],
      start,
      end,
      fields: FIELDS.join(','),
      summaryTimestampLabel: 'startPeriod',
      count: MAX_ROWS,
    });

    const bars = parseHistoryRows(payload, 'DATE_TIME').map((row) => ({
      timestamp: normalizeTimestamp(row.time),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    }));
    bars.sort((a, b) => a.timestamp.localeCompare(b.timestamp));

    log.debug({ symbol, interval, bars: bars.length }, 'Intraday bars fetched');
    return bars;
  }

  async getDailyBars(symbol: string, startDate: string, endDate: string): Promise<DailyBar[]> {
    const payload = await this.fetchHistory(`${INTERDAY_PATH}/${encodeURIComponent(symbol)}`, {
      interval: 'P1D',
      start: startDate,
      end: endDate,
      fields: FIELDS.join(','),
    });

    const bars = parseHistoryRows(payload, 'DATE').map((row) => ({
      date: row.time.slice(0, 10),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    }));
    bars.sort((a, b) => a.date.localeCompare(b.date));

    log.debug({ symbol, bars: bars.length }, 'Daily bars fetched');
    return bars;
  }

  private async ensureToken(): Promise<string> {
    if (!this.token || Date.now() >= this.tokenExpiresAt) {
      await this.connect();
    }
    if (!this.token) {
      throw AuthError.missingCredentials();
    }
    return this.token;
  }

  private async fetchHistory(
    path: string,
    params: Record<string, string | number>,
  ): Promise<HistoryResponse> {
    const token = await this.ensureToken();

    log.debug({ path, params }, 'API request');
    const response = await this.send(() =>
      this.http.get<unknown>(path, {
        params,
        headers: { Authorization: `Bearer ${token}` },
      }),
    );

    if (response.status === 401) {
      this.token = null;
      throw AuthError.invalidCredentials();
    }
    this.assertOk(path, response);

    const parsed = historyResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    return parsed.data;
  }

  /** Transport failures (no HTTP response) surface as NETWORK_ERROR. */
  private async send(request: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
    try {
      return await request();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new MarketDataError(`Network error: ${message}`, 'NETWORK_ERROR');
    }
  }

  private assertOk(path: string, response: AxiosResponse<unknown>): void {
    if (response.status >= 200 && response.status < 300) return;

    if (response.status === 429) {
      const err = RateLimitError.fromHeaders(headerRecord(response.headers));
      log.warn({ path, retryAfter: err.retryAfterSeconds }, 'Rate limited');
      throw err;
    }

    throw ApiError.fromResponse(response.status, response.data);
  }
}

export function createHistoricalPricingClient(): HistoricalPricingClient {
  return new HistoricalPricingClient({
    baseUrl: configManager.get('api.baseUrl'),
    accessToken: configManager.get('api.accessToken') || undefined,
    appKey: configManager.get('api.appKey') || undefined,
    username: configManager.get('api.username') || undefined,
    password: configManager.get('api.password') || undefined,
    timeoutMs: configManager.get('api.timeoutMs'),
  });
}
