/**
 * Feature Engineer Tests
 */

import { describe, it, expect } from 'vitest';
import { InsufficientDataError, ValidationError } from '../../../../common/errors.js';
import { FeatureEngineer, fillGaps } from '../feature.engineer.js';
import { mean, rollingMean, rollingStd, sampleStd } from '../rolling.stats.js';
import { FEATURE_NAMES, WINDOW_COLUMNS } from '../../rainfall.constants.js';
import { BASE_COVARIATES, TARGET_IDX, makeRawSeries } from '../../__tests__/fixtures.js';

const col = (name: string) => WINDOW_COLUMNS.indexOf(name);

describe('rolling stats', () => {
  it('computes mean and sample std', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138, 3);
    expect(sampleStd([5])).toBeNaN();
  });

  it('leaves incomplete trailing windows empty', () => {
    expect(rollingMean([1, 2, 3, 4], 3)).toEqual([null, null, 2, 3]);
    expect(rollingMean([1, null, 3, 4, 5], 2)).toEqual([null, null, null, 3.5, 4.5]);
    expect(rollingStd([1, 1, 1], 3)).toEqual([null, null, 0]);
  });

  it('fills forward then backward', () => {
    expect(fillGaps([null, 1, null, null, 4, null])).toEqual([1, 1, 1, 1, 4, 4]);
    expect(fillGaps([null, null])).toEqual([null, null]);
  });
});

describe('FeatureEngineer', () => {
  const engineer = new FeatureEngineer();

  it('produces a 15-row daily window with the target column last', () => {
    const window = engineer.build(makeRawSeries('daily', 22), 'daily');

    expect(window.rows).toHaveLength(15);
    expect(window.dates).toHaveLength(15);
    expect(window.dates[0]).toBe('2024-01-08');
    expect(window.dates[14]).toBe('2024-01-22');
    expect(window.columns).toEqual(WINDOW_COLUMNS);
    expect(window.featureNames).toEqual(FEATURE_NAMES);
    expect(window.columns[TARGET_IDX]).toBe('log_PRECTOTCORR');
    expect(window.targetColumn).toBe('log_PRECTOTCORR');
    for (const row of window.rows) {
      expect(row).toHaveLength(17);
      expect(row[TARGET_IDX]).toBeCloseTo(Math.log1p(2), 12);
    }
  });

  it('raises InsufficientDataError below 15 daily rows', () => {
    expect(() => engineer.build(makeRawSeries('daily', 21), 'daily')).toThrow(InsufficientDataError);
    try {
      engineer.build(makeRawSeries('daily', 21), 'daily');
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      if (err instanceof InsufficientDataError) {
        expect(err.usableRows).toBe(14);
        expect(err.requiredRows).toBe(15);
      }
    }
  });

  it('needs 7 monthly rows', () => {
    expect(engineer.build(makeRawSeries('monthly', 14), 'monthly').rows).toHaveLength(7);
    expect(() => engineer.build(makeRawSeries('monthly', 13), 'monthly')).toThrow(InsufficientDataError);
  });

  it('computes lags and rolling stats from earlier rows only', () => {
    const window = engineer.build(makeRawSeries('daily', 22, (i) => i), 'daily');
    const last = window.rows[14];
    const logs = [15, 16, 17, 18, 19, 20, 21].map((v) => Math.log1p(v));

    expect(last[TARGET_IDX]).toBeCloseTo(Math.log1p(21), 12);
    expect(last[col('log_PRECTOTCORR_lag1')]).toBeCloseTo(Math.log1p(20), 12);
    expect(last[col('log_PRECTOTCORR_lag3')]).toBeCloseTo(Math.log1p(18), 12);
    expect(last[col('log_PRECTOTCORR_lag7')]).toBeCloseTo(Math.log1p(14), 12);
    expect(last[col('rain_rolling_mean')]).toBeCloseTo(mean(logs), 12);
    expect(last[col('rain_rolling_std')]).toBeCloseTo(sampleStd(logs), 12);
  });

  it('does not let a later row change earlier rows', () => {
    const base = engineer.build(makeRawSeries('daily', 25, (i) => i % 5), 'daily');
    const changed = engineer.build(makeRawSeries('daily', 25, (i) => (i === 24 ? 40 : i % 5)), 'daily');

    expect(changed.rows.slice(0, 14)).toEqual(base.rows.slice(0, 14));
    expect(changed.rows[14]).not.toEqual(base.rows[14]);
  });

  it('repairs the -999 sentinel from the previous value', () => {
    const raw = makeRawSeries('daily', 25, (i) => (i === 20 ? -999 : i + 1));
    const window = engineer.build(raw, 'daily');

    // Window covers source rows 10..24
    expect(window.dates[10]).toBe('2024-01-21');
    expect(window.rows[10][TARGET_IDX]).toBeCloseTo(Math.log1p(20), 12);
    expect(window.rows[11][col('log_PRECTOTCORR_lag1')]).toBeCloseTo(Math.log1p(20), 12);
  });

  it('materializes an absent field as zeros', () => {
    const raw = makeRawSeries('daily', 22);
    for (const row of raw.rows) delete row.values.EVPTRNS;

    const window = engineer.build(raw, 'daily');
    expect(window.rows.every((r) => r[col('log_EVPTRNS')] === 0)).toBe(true);
    expect(window.rows[0][col('log_RH2M')]).toBeCloseTo(Math.log1p(BASE_COVARIATES.RH2M), 12);
  });

  it('drops every row when a field is never known', () => {
    const raw = makeRawSeries('daily', 22);
    for (const row of raw.rows) row.values.PS = -999;

    expect(() => engineer.build(raw, 'daily')).toThrow(InsufficientDataError);
  });

  it('clips negative daily values to zero before the log transform', () => {
    const raw = makeRawSeries('daily', 22);
    for (const row of raw.rows) row.values.T2M_RANGE = -3;

    const window = engineer.build(raw, 'daily');
    expect(window.rows.every((r) => r[col('log_T2M_RANGE')] === 0)).toBe(true);
  });

  it('rejects unordered or mismatched input', () => {
    const raw = makeRawSeries('daily', 22);
    raw.rows[5].date = raw.rows[4].date;
    expect(() => engineer.build(raw, 'daily')).toThrow(ValidationError);
    expect(() => engineer.build(makeRawSeries('monthly', 14), 'daily')).toThrow(ValidationError);
  });
});
