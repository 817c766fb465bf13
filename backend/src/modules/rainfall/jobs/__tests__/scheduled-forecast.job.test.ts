/**
 * Scheduled Forecast Job Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import cron from 'node-cron';
import type { BucketedForecast, PublishOutcome, PublishSink, RawSeries } from '../../contracts/rainfall.types.js';
import { FeatureEngineer } from '../../features/feature.engineer.js';
import { Forecaster } from '../../forecast/forecaster.js';
import { ResultBucketer } from '../../forecast/result.bucketer.js';
import { sinkUrls } from '../../publish/forecast.publisher.js';
import { SCHEDULES, ScheduledForecastRunner } from '../scheduled-forecast.job.js';
import { fakeArtifacts, makeRawSeries, mockLogger } from '../../__tests__/fixtures.js';

vi.mock('node-cron', () => ({
  default: {
    schedule: vi.fn(() => ({ stop: vi.fn() })),
  },
}));

const TODAY = new Date('2024-11-20T00:00:00Z');

function setup() {
  const fetch = vi.fn(async (_lat: number, _lon: number, mode: 'daily' | 'monthly'): Promise<RawSeries> =>
    makeRawSeries(mode, 30),
  );
  const publish = vi.fn(
    async (_bucket: BucketedForecast, _sink: PublishSink): Promise<PublishOutcome> => ({
      status: 'success',
      attempts: 1,
      httpStatus: 200,
    }),
  );
  const logger = mockLogger();
  const runner = new ScheduledForecastRunner({
    provider: { fetch },
    engineer: new FeatureEngineer(),
    artifacts: { get: async (mode) => fakeArtifacts(mode) },
    forecaster: new Forecaster({ logger }),
    bucketer: new ResultBucketer(),
    publisher: { publish },
    sinks: sinkUrls('http://charts.local'),
    location: { latitude: 6.585, longitude: 3.983 },
    lookback: { days: 60, years: 3 },
    logger,
    clock: { now: () => Date.now(), utcNow: () => TODAY },
  });
  return { runner, fetch, publish, logger };
}

describe('ScheduledForecastRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('publishes a 7-day chart for the weekly job', async () => {
    const t = setup();

    const result = await t.runner.runWeekly();

    expect(result.status).toBe('published');
    expect(result.steps.map((s) => s.name)).toEqual(['FETCH', 'ENGINEER', 'FORECAST', 'BUCKET', 'PUBLISH']);
    expect(result.steps.every((s) => s.ok)).toBe(true);
    const [bucket, sink] = t.publish.mock.calls[0];
    expect(sink.url).toBe('http://charts.local/api/rainfall/daily-forecast');
    expect(bucket.entries).toHaveLength(7);
    expect(bucket.entries[0]).toEqual({ date: '2024-11-17', rainfall: 2 });
    expect(bucket.entries.every((e) => e.rainfall === 2)).toBe(true);
  });

  it('publishes a 3-month chart for the monthly job', async () => {
    const t = setup();

    const result = await t.runner.runMonthly();

    expect(result.status).toBe('published');
    expect(result.forecast?.entries.map((e) => e.date)).toEqual(['2024-11-01', '2024-12-01', '2025-01-01']);
    expect(t.fetch.mock.calls[0][2]).toBe('monthly');
  });

  it('reports the failing step', async () => {
    const t = setup();
    t.fetch.mockRejectedValueOnce(new Error('provider offline'));

    const result = await t.runner.runWeekly();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('FETCH: provider offline');
    expect(result.steps).toEqual([{ name: 'FETCH', ok: false, ms: expect.any(Number), error: 'provider offline' }]);
    expect(t.publish).not.toHaveBeenCalled();
  });

  it('marks a rejected publish as failed', async () => {
    const t = setup();
    t.publish.mockResolvedValueOnce({ status: 'failed', attempts: 1, httpStatus: 503, error: 'Sink responded with HTTP 503' });

    const result = await t.runner.runWeekly();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Sink responded with HTTP 503');
  });

  it('skips a run while the previous one is in progress', async () => {
    const t = setup();
    let release: (series: RawSeries) => void = () => undefined;
    t.fetch.mockImplementationOnce(
      () =>
        new Promise<RawSeries>((resolve) => {
          release = resolve;
        }),
    );

    const first = t.runner.runWeekly();
    expect(t.runner.isRunning('daily')).toBe(true);

    const second = await t.runner.runWeekly();
    expect(second.status).toBe('skipped');

    // The monthly job is independent
    expect((await t.runner.runMonthly()).status).toBe('published');

    release(makeRawSeries('daily', 30));
    expect((await first).status).toBe('published');
    expect(t.runner.isRunning('daily')).toBe(false);
  });

  it('schedules both cron jobs in the configured timezone', () => {
    const t = setup();

    t.runner.start({ enabled: true, timezone: 'Africa/Lagos' });

    expect(cron.schedule).toHaveBeenCalledTimes(2);
    expect(cron.schedule).toHaveBeenCalledWith(SCHEDULES.daily, expect.any(Function), { timezone: 'Africa/Lagos' });
    expect(cron.schedule).toHaveBeenCalledWith('0 0 1 * *', expect.any(Function), { timezone: 'Africa/Lagos' });
    t.runner.stop();
  });

  it('does not schedule when disabled', () => {
    const t = setup();

    t.runner.start({ enabled: false, timezone: 'UTC' });

    expect(cron.schedule).not.toHaveBeenCalled();
  });
});
