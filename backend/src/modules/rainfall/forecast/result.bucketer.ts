/**
 * RAINFALL — Result Bucketer
 * ==========================
 *
 * Aligns a forecast sequence onto the chart's fixed calendar slots:
 *   daily   → 7 days, Sunday..Saturday (current week, or next with anchor 'next')
 *   monthly → 3 months, first day of the current month + 0, 1, 2
 *
 * Short sequences are padded with 0, long ones truncated. Dates are UTC.
 */

import type {
  BucketEntry,
  BucketedForecast,
  DatedForecast,
  ForecastMode,
  ForecastSequence,
  WeekAnchor,
} from '../contracts/rainfall.types.js';
import { BUCKET_SIZE } from '../rainfall.constants.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

/** Sunday of the week containing `today`, or of the following week */
export function weekStart(today: Date, anchor: WeekAnchor): Date {
  const midnight = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const sunday = midnight - today.getUTCDay() * DAY_MS;
  return new Date(anchor === 'next' ? sunday + 7 * DAY_MS : sunday);
}

export function weekDates(today: Date, anchor: WeekAnchor): string[] {
  const start = weekStart(today, anchor).getTime();
  return Array.from({ length: BUCKET_SIZE.daily }, (_, i) => formatDate(new Date(start + i * DAY_MS)));
}

export function monthDates(today: Date): string[] {
  const year = today.getUTCFullYear();
  const month = today.getUTCMonth();
  // Date.UTC normalizes month overflow into the following year
  return Array.from({ length: BUCKET_SIZE.monthly }, (_, i) => formatDate(new Date(Date.UTC(year, month + i, 1))));
}

/** Step k dated k days (or months) after the last observed row; no padding */
export function datedSequence(sequence: ForecastSequence, mode: ForecastMode, lastObserved: string): DatedForecast {
  const [year, month, day] = lastObserved.split('-').map(Number);
  const base = Date.UTC(year, month - 1, day);

  const entries: BucketEntry[] = sequence.map((step) => ({
    date:
      mode === 'daily'
        ? formatDate(new Date(base + step.horizonIndex * DAY_MS))
        : formatDate(new Date(Date.UTC(year, month - 1 + step.horizonIndex, 1))),
    rainfall: round2(Math.max(0, step.valueMm)),
  }));

  return { mode, entries };
}

export class ResultBucketer {
  constructor(private readonly weekAnchor: WeekAnchor = 'current') {}

  bucket(sequence: ForecastSequence, mode: ForecastMode, today: Date): BucketedForecast {
    const dates = mode === 'daily' ? weekDates(today, this.weekAnchor) : monthDates(today);

    const entries: BucketEntry[] = dates.map((date, i) => {
      const step = sequence[i];
      return {
        date,
        rainfall: step ? round2(Math.max(0, step.valueMm)) : 0,
      };
    });

    return { mode, entries };
  }
}
