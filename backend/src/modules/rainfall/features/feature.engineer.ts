/**
 * RAINFALL — Feature Engineer
 * ===========================
 *
 * Raw provider table → fixed-length feature window.
 *
 * Pipeline: column completion → sentinel repair (ffill, bfill) →
 * daily clip → log1p → lags → causal rolling stats → drop incomplete rows →
 * tail N. All lag / rolling values of row i use rows <= i only.
 */

import { InsufficientDataError, ValidationError } from '../../../common/errors.js';
import type { FeatureWindow, ForecastMode, RawSeries } from '../contracts/rainfall.types.js';
import {
  COVARIATE_FIELDS,
  FEATURE_NAMES,
  LAGS,
  LOG_TARGET_COLUMN,
  MISSING_SENTINEL,
  REQUIRED_FIELDS,
  ROLLING_SPAN,
  TARGET_FIELD,
  WINDOW_COLUMNS,
  WINDOW_LENGTH,
} from '../rainfall.constants.js';
import { rollingMean, rollingStd } from './rolling.stats.js';

type Column = Array<number | null>;

function isMissing(v: number | undefined): boolean {
  return v === undefined || !Number.isFinite(v) || v === MISSING_SENTINEL;
}

/**
 * Forward fill, then backward fill. A column with no known value stays null.
 */
export function fillGaps(values: Column): Column {
  const out = [...values];
  let last: number | null = null;
  for (let i = 0; i < out.length; i++) {
    const v = out[i];
    if (v === null) out[i] = last;
    else last = v;
  }
  let next: number | null = null;
  for (let i = out.length - 1; i >= 0; i--) {
    const v = out[i];
    if (v === null) out[i] = next;
    else next = v;
  }
  return out;
}

function log1pColumn(values: Column): Column {
  return values.map((v) => {
    if (v === null) return null;
    const t = Math.log1p(v);
    return Number.isFinite(t) ? t : null;
  });
}

function shift(values: Column, lag: number): Column {
  return values.map((_, i) => (i - lag >= 0 ? values[i - lag] : null));
}

function assertChronological(raw: RawSeries): void {
  for (let i = 1; i < raw.rows.length; i++) {
    if (raw.rows[i].date <= raw.rows[i - 1].date) {
      throw new ValidationError(
        `Raw series must be strictly increasing: ${raw.rows[i - 1].date} followed by ${raw.rows[i].date}`,
      );
    }
  }
}

export class FeatureEngineer {
  build(raw: RawSeries, mode: ForecastMode): FeatureWindow {
    if (raw.mode !== mode) {
      throw new ValidationError(`Raw series is ${raw.mode}, expected ${mode}`);
    }
    assertChronological(raw);

    const windowLength = WINDOW_LENGTH[mode];
    const span = ROLLING_SPAN[mode];

    // 1-2. Column completion + sentinel repair
    const repaired = new Map<string, Column>();
    for (const field of REQUIRED_FIELDS) {
      const present = raw.rows.some((r) => field in r.values);
      const column: Column = raw.rows.map((r) => {
        if (!present) return 0;
        const v = r.values[field];
        return isMissing(v) ? null : v;
      });
      repaired.set(field, fillGaps(column));
    }

    // 3. Daily clip
    if (mode === 'daily') {
      for (const [field, column] of repaired) {
        repaired.set(field, column.map((v) => (v === null ? null : Math.max(0, v))));
      }
    }

    // 4. Log transform
    const derived = new Map<string, Column>();
    for (const field of COVARIATE_FIELDS) {
      derived.set(`log_${field}`, log1pColumn(repaired.get(field) ?? []));
    }
    const logTarget = log1pColumn(repaired.get(TARGET_FIELD) ?? []);

    // 5-6. Lags + rolling stats
    for (const lag of LAGS) {
      derived.set(`${LOG_TARGET_COLUMN}_lag${lag}`, shift(logTarget, lag));
    }
    derived.set('rain_rolling_mean', rollingMean(logTarget, span));
    derived.set('rain_rolling_std', rollingStd(logTarget, span));
    derived.set(LOG_TARGET_COLUMN, logTarget);

    // 7. Drop incomplete rows, keep the tail
    const rows: number[][] = [];
    const dates: string[] = [];
    raw.rows.forEach((r, i) => {
      const row: number[] = [];
      for (const col of WINDOW_COLUMNS) {
        const v = derived.get(col)?.[i] ?? null;
        if (v === null) return;
        row.push(v);
      }
      rows.push(row);
      dates.push(r.date);
    });

    if (rows.length < windowLength) {
      throw new InsufficientDataError(mode, rows.length, windowLength);
    }

    return {
      mode,
      featureNames: FEATURE_NAMES,
      targetColumn: LOG_TARGET_COLUMN,
      columns: WINDOW_COLUMNS,
      rows: rows.slice(-windowLength),
      dates: dates.slice(-windowLength),
    };
  }
}
