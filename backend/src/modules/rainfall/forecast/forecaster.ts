/**
 * RAINFALL — Autoregressive Forecaster
 * ====================================
 *
 * Turns a single-step predictor into a horizon-length sequence. Each step:
 *
 *   1. scale W, predict from the last scaled row        → ŷ_k (scaled)
 *   2. last scaled row with target := ŷ_k, inverse      → log_k
 *      rain_k = max(0, expm1(log_k))
 *   3. emit { horizonIndex: k, valueMm: rain_k }
 *   4. synthesize r_k: covariates held at W's last row, lags + rolling stats
 *      from the target history extended with log_k, target := log_k
 *   5. W := tail_N(W ++ r_k)
 *
 * Step k+1 depends on log_k, so the loop is strictly sequential.
 *
 * A predict() failure on one step is degraded, not fatal: ŷ_k = 0, the step
 * is flagged `degraded`, and the loop continues so bucket sizes stay fixed.
 */

import { ValidationError, describeError } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { Predictor } from '../artifacts/predictor.model.js';
import type { Scaler } from '../artifacts/scaler.js';
import type { FeatureWindow, ForecastSequence, ForecastStep } from '../contracts/rainfall.types.js';
import { mean, sampleStd } from '../features/rolling.stats.js';
import {
  LAGS,
  LOG_TARGET_COLUMN,
  ROLLING_MEAN_COLUMN,
  ROLLING_SPAN,
  ROLLING_STD_COLUMN,
} from '../rainfall.constants.js';

export interface StepInferenceDegradation {
  horizonIndex: number;
  error: string;
}

export interface ForecasterOptions {
  logger?: Logger;
  onDegradation?: (event: StepInferenceDegradation) => void;
}

function requireColumn(columns: readonly string[], name: string): number {
  const idx = columns.indexOf(name);
  if (idx < 0) {
    throw new ValidationError(`Feature window has no column ${name}`);
  }
  return idx;
}

function lastOf<T>(items: readonly T[]): T {
  const item = items[items.length - 1];
  if (item === undefined) {
    throw new ValidationError('Feature window is empty');
  }
  return item;
}

export class Forecaster {
  private readonly logger: Logger;

  constructor(private readonly options: ForecasterOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  async forecast(
    window: FeatureWindow,
    horizon: number,
    predictor: Predictor,
    scaler: Scaler,
  ): Promise<ForecastSequence> {
    if (!Number.isInteger(horizon) || horizon < 1) {
      throw new ValidationError(`Horizon must be a positive integer, got ${horizon}`);
    }
    if (window.rows.length === 0) {
      throw new ValidationError('Feature window is empty');
    }

    const { columns } = window;
    const targetIdx = columns.length - 1;
    if (columns[targetIdx] !== window.targetColumn) {
      throw new ValidationError(`Target column ${window.targetColumn} must be last`);
    }
    const lagIdx = LAGS.map((lag) => ({ lag, idx: requireColumn(columns, `${LOG_TARGET_COLUMN}_lag${lag}`) }));
    const meanIdx = requireColumn(columns, ROLLING_MEAN_COLUMN);
    const stdIdx = requireColumn(columns, ROLLING_STD_COLUMN);

    const windowLength = window.rows.length;
    const span = ROLLING_SPAN[window.mode];
    let rows: number[][] = window.rows.map((r) => [...r]);
    const steps: ForecastStep[] = [];

    for (let k = 1; k <= horizon; k++) {
      // 1. Scale + predict
      const scaledLast = [...lastOf(scaler.transform(rows))];
      let predicted: number;
      let degraded = false;
      try {
        predicted = await predictor.predict(scaledLast);
        if (!Number.isFinite(predicted)) {
          throw new Error(`non-finite prediction ${predicted}`);
        }
      } catch (err) {
        predicted = 0;
        degraded = true;
        const event = { horizonIndex: k, error: describeError(err) };
        this.logger.warn({ ...event, mode: window.mode }, 'Step inference failed, using degraded prediction 0');
        this.options.onDegradation?.(event);
      }

      // 2. Inverse transform through the target column
      scaledLast[targetIdx] = predicted;
      const logK = lastOf(scaler.inverse([scaledLast]))[targetIdx];
      const rain = Math.max(0, Math.expm1(logK));

      // 3. Emit
      steps.push({ horizonIndex: k, valueMm: Number.isFinite(rain) ? rain : 0, degraded });

      // 4. Synthesize the next row
      const history = [...rows.map((r) => r[targetIdx]), logK];
      const next = [...lastOf(rows)];
      for (const { lag, idx } of lagIdx) {
        next[idx] = history[history.length - 1 - lag] ?? history[history.length - 2];
      }
      const recent = history.slice(-span);
      next[meanIdx] = mean(recent);
      next[stdIdx] = sampleStd(recent);
      next[targetIdx] = logK;

      // 5. Slide
      rows = [...rows, next].slice(-windowLength);
    }

    this.logger.debug?.(
      { mode: window.mode, horizon, degradedSteps: steps.filter((s) => s.degraded).length },
      'Autoregressive forecast complete',
    );

    return steps;
  }
}
