/**
 * Shared builders for rainfall tests
 */

import { vi } from 'vitest';
import type { ModelArtifacts } from '../artifacts/artifact.registry.js';
import { LinearPredictor } from '../artifacts/predictor.model.js';
import { StandardScaler } from '../artifacts/scaler.js';
import type { ForecastIntent, ForecastMode, RawSeries } from '../contracts/rainfall.types.js';
import { WINDOW_COLUMNS } from '../rainfall.constants.js';

export const WIDTH = WINDOW_COLUMNS.length;
export const TARGET_IDX = WIDTH - 1;

export const BASE_COVARIATES: Record<string, number> = {
  RH2M: 80,
  WS10M: 2,
  T2M: 27,
  WD10M: 200,
  ALLSKY_SFC_SW_DWN: 18,
  EVPTRNS: 3,
  PS: 100,
  QV2M: 17,
  T2M_RANGE: 7,
  TS: 28,
  CLRSKY_SFC_SW_DWN: 25,
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function dateAt(mode: ForecastMode, i: number): string {
  if (mode === 'daily') {
    return new Date(Date.UTC(2024, 0, 1) + i * DAY_MS).toISOString().slice(0, 10);
  }
  return new Date(Date.UTC(2020, i, 1)).toISOString().slice(0, 10);
}

export function makeRawSeries(
  mode: ForecastMode,
  n: number,
  rain: (i: number) => number = () => 2,
): RawSeries {
  return {
    mode,
    rows: Array.from({ length: n }, (_, i) => ({
      date: dateAt(mode, i),
      values: { ...BASE_COVARIATES, PRECTOTCORR: rain(i) },
    })),
  };
}

/** Identity scaling over the full window width */
export function identityScaler(): StandardScaler {
  return new StandardScaler({ mean: Array(WIDTH).fill(0), std: Array(WIDTH).fill(1) });
}

/** Predicts the current (scaled) target: tomorrow looks like today */
export function persistencePredictor(): LinearPredictor {
  const weights = Array<number>(WIDTH).fill(0);
  weights[TARGET_IDX] = 1;
  return new LinearPredictor({ weights, bias: 0 });
}

export function fakeArtifacts(mode: ForecastMode = 'daily'): ModelArtifacts {
  return {
    mode,
    predictor: persistencePredictor(),
    scaler: identityScaler(),
    version: 'test',
    loadedAt: '2024-01-01T00:00:00.000Z',
  };
}

export function forecastIntent(mode: ForecastMode, horizon: number): ForecastIntent {
  return Object.freeze({
    mode,
    horizon,
    latitude: 6.585,
    longitude: 3.983,
    confidence: 0.9,
    source: 'model',
    explanation: 'test intent',
  } satisfies ForecastIntent);
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
