/**
 * NASA POWER Provider
 * Source: NASA POWER point API (public, no key required)
 *
 * Endpoints:
 *   {base}/api/temporal/daily/point    start/end YYYYMMDD, keys YYYYMMDD
 *   {base}/api/temporal/monthly/point  start/end YYYY,     keys YYYYMM (+ YYYY13 annual)
 *
 * Missing values arrive as -999 and are passed through for the feature
 * engineer to repair. Rows after the requested end (the rest of the current
 * year for monthly requests) and trailing rows with no real value are dropped.
 */

import axios from 'axios';
import { z } from 'zod';
import { ProviderError, describeError } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { ForecastMode, RawRow, RawSeries } from '../contracts/rainfall.types.js';
import { MISSING_SENTINEL, REQUIRED_FIELDS } from '../rainfall.constants.js';

export interface DateRange {
  start: Date;
  end: Date;
}

export interface EnvironmentalDataProvider {
  fetch(latitude: number, longitude: number, mode: ForecastMode, range: DateRange): Promise<RawSeries>;
}

export interface HttpGetter {
  get(url: string, config: { params: Record<string, string | number>; timeout: number }): Promise<{ status: number; data: unknown }>;
}

const PowerResponseSchema = z.object({
  properties: z.object({
    parameter: z.record(z.record(z.number())),
  }),
});

const DAILY_KEY = /^(\d{4})(\d{2})(\d{2})$/;
const MONTHLY_KEY = /^(\d{4})(0[1-9]|1[0-2])$/;

function compactDate(d: Date): string {
  return d.toISOString().slice(0, 10).replace(/-/g, '');
}

/** Provider key → ISO date; null for keys outside the mode's calendar (annual YYYY13) */
export function keyToDate(key: string, mode: ForecastMode): string | null {
  if (mode === 'monthly') {
    const m = MONTHLY_KEY.exec(key);
    return m ? `${m[1]}-${m[2]}-01` : null;
  }
  const d = DAILY_KEY.exec(key);
  return d ? `${d[1]}-${d[2]}-${d[3]}` : null;
}

function isBlank(values: Record<string, number>): boolean {
  return Object.values(values).every((v) => v === MISSING_SENTINEL);
}

/**
 * Pivot { field: { key: value } } into chronologically sorted rows.
 * `through` (ISO date) drops later rows.
 */
export function toRawSeries(
  parameter: Record<string, Record<string, number>>,
  mode: ForecastMode,
  through?: string,
): RawSeries {
  const byDate = new Map<string, Record<string, number>>();

  for (const [field, series] of Object.entries(parameter)) {
    for (const [key, value] of Object.entries(series)) {
      const date = keyToDate(key, mode);
      if (!date || (through !== undefined && date > through)) continue;
      const values = byDate.get(date) ?? {};
      values[field] = value;
      byDate.set(date, values);
    }
  }

  const rows: RawRow[] = [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, values]) => ({ date, values }));

  let end = rows.length;
  while (end > 0 && isBlank(rows[end - 1].values)) end--;

  return { mode, rows: rows.slice(0, end) };
}

export interface NasaPowerConfig {
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
}

export class NasaPowerProvider implements EnvironmentalDataProvider {
  private readonly logger: Logger;

  constructor(
    private readonly config: NasaPowerConfig,
    private readonly http: HttpGetter = axios,
  ) {
    this.logger = config.logger ?? defaultLogger;
  }

  async fetch(latitude: number, longitude: number, mode: ForecastMode, range: DateRange): Promise<RawSeries> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/temporal/${mode}/point`;
    const params = {
      parameters: REQUIRED_FIELDS.join(','),
      community: 'RE',
      latitude,
      longitude,
      start: mode === 'daily' ? compactDate(range.start) : String(range.start.getUTCFullYear()),
      end: mode === 'daily' ? compactDate(range.end) : String(range.end.getUTCFullYear()),
      format: 'JSON',
    };

    const startMs = Date.now();
    let data: unknown;
    try {
      const response = await this.http.get(url, { params, timeout: this.config.timeoutMs });
      data = response.data;
    } catch (err) {
      throw new ProviderError(`NASA POWER ${mode} request failed: ${describeError(err)}`);
    }

    const parsed = PowerResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(`NASA POWER ${mode} response has an unexpected shape`);
    }

    const series = toRawSeries(parsed.data.properties.parameter, mode, range.end.toISOString().slice(0, 10));
    if (series.rows.length === 0) {
      throw new ProviderError(`NASA POWER returned no ${mode} rows`);
    }

    this.logger.info(
      { mode, latitude, longitude, rows: series.rows.length, latencyMs: Date.now() - startMs },
      'NASA POWER data fetched',
    );
    return series;
  }
}

/** Lookback window ending today (UTC) */
export function lookbackRange(mode: ForecastMode, today: Date, lookback: { days: number; years: number }): DateRange {
  const end = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate()));
  const start =
    mode === 'daily'
      ? new Date(end.getTime() - lookback.days * 24 * 60 * 60 * 1000)
      : new Date(Date.UTC(end.getUTCFullYear() - lookback.years, 0, 1));
  return { start, end };
}
