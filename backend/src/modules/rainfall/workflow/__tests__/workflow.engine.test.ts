/**
 * Workflow Engine Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ArtifactLoadError,
  ProviderError,
  SessionBusyError,
  ValidationError,
} from '../../../../common/errors.js';
import type {
  BucketedForecast,
  DatedForecast,
  ForecastIntent,
  Intent,
  PublishOutcome,
  PublishSink,
} from '../../contracts/rainfall.types.js';
import { FeatureEngineer } from '../../features/feature.engineer.js';
import { Forecaster } from '../../forecast/forecaster.js';
import { ResultBucketer } from '../../forecast/result.bucketer.js';
import { InterpretationService } from '../../interpret/interpretation.service.js';
import { sinkUrls } from '../../publish/forecast.publisher.js';
import { USER_MESSAGES } from '../../rainfall.constants.js';
import { InMemoryRainfallStore, type QueryCompletion } from '../../storage/rainfall.store.js';
import { WorkflowEngine, type WorkflowDeps } from '../workflow.engine.js';
import { fakeArtifacts, forecastIntent, makeRawSeries, mockLogger } from '../../__tests__/fixtures.js';

const TODAY = new Date('2024-05-15T08:00:00Z');

function setup(overrides: Partial<WorkflowDeps> = {}) {
  const store = new InMemoryRainfallStore(() => TODAY);
  const writes: QueryCompletion[] = [];
  const openSession = store.openSession.bind(store);
  vi.spyOn(store, 'openSession').mockImplementation(async () => {
    const session = await openSession();
    return {
      ...session,
      completeQuery: async (sessionId: string, completion: QueryCompletion) => {
        writes.push(completion);
        return session.completeQuery(sessionId, completion);
      },
    };
  });

  const classify = vi.fn(async (_query: string): Promise<Intent> => forecastIntent('daily', 3));
  const fetch = vi.fn(async () => makeRawSeries('daily', 30));
  const get = vi.fn(async () => fakeArtifacts('daily'));
  const interpret = vi.fn(async (_intent: ForecastIntent, _forecast: DatedForecast) => 'Expect light rain.');
  const publish = vi.fn(
    async (_bucket: BucketedForecast, _sink: PublishSink): Promise<PublishOutcome> => ({
      status: 'success',
      attempts: 1,
      httpStatus: 200,
    }),
  );
  const logger = mockLogger();

  const deps: WorkflowDeps = {
    classifier: { classify },
    provider: { fetch },
    engineer: new FeatureEngineer(),
    artifacts: { get },
    forecaster: new Forecaster({ logger }),
    bucketer: new ResultBucketer(),
    interpreter: { interpret },
    store,
    lookback: { days: 60, years: 3 },
    publish: { publisher: { publish }, sinks: sinkUrls('http://charts.local') },
    logger,
    clock: { now: () => Date.now(), utcNow: () => TODAY },
    ...overrides,
  };

  return { engine: new WorkflowEngine(deps), store, writes, classify, fetch, get, interpret, publish, logger };
}

async function seed(store: InMemoryRainfallStore, sessionId = 's1', queryText = 'Will it rain this week?') {
  await store.createQuery({ sessionId, userId: 'u1', queryText });
}

describe('WorkflowEngine', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the daily forecast path and persists once', async () => {
    const t = setup();
    await seed(t.store);

    const result = await t.engine.run('s1', 'Will it rain this week?');

    expect(result.status).toBe('completed');
    expect(result.responseText).toBe('Expect light rain.');
    expect(result.persisted).toBe(true);
    expect(result.sequence).toHaveLength(3);
    expect(result.forecast?.entries.map((e) => e.date)).toEqual([
      '2024-05-12',
      '2024-05-13',
      '2024-05-14',
      '2024-05-15',
      '2024-05-16',
      '2024-05-17',
      '2024-05-18',
    ]);
    expect(result.forecast?.entries.map((e) => e.rainfall)).toEqual([2, 2, 2, 0, 0, 0, 0]);
    expect(result.publish?.status).toBe('success');

    expect(t.writes).toEqual([{ responseText: 'Expect light rain.', status: 'completed' }]);
    const record = await t.store.getQuery('s1');
    expect(record?.completed).toBe(true);
    expect(record?.responseText).toBe('Expect light rain.');
    expect(t.store.openSessions).toBe(0);

    expect(t.fetch).toHaveBeenCalledWith(6.585, 3.983, 'daily', {
      start: new Date('2024-03-16T00:00:00Z'),
      end: new Date('2024-05-15T00:00:00Z'),
    });
    expect(t.publish.mock.calls[0][1]).toEqual({ mode: 'daily', url: 'http://charts.local/api/rainfall/daily-forecast' });
  });

  it('runs the monthly path with three slots', async () => {
    const t = setup({
      classifier: { classify: async () => forecastIntent('monthly', 3) },
      provider: { fetch: async () => makeRawSeries('monthly', 20) },
      artifacts: { get: async () => fakeArtifacts('monthly') },
    });
    await seed(t.store);

    const result = await t.engine.run('s1', 'Rain next month?');

    expect(result.status).toBe('completed');
    expect(result.forecast?.entries).toEqual([
      { date: '2024-05-01', rainfall: 2 },
      { date: '2024-06-01', rainfall: 2 },
      { date: '2024-07-01', rainfall: 2 },
    ]);
  });

  it('takes the fallback path for unrelated queries', async () => {
    const t = setup();
    t.classify.mockResolvedValueOnce({ ...forecastIntent('daily', 7), mode: 'unrelated' });
    await seed(t.store);

    const result = await t.engine.run('s1', 'Tell me a joke');

    expect(result.status).toBe('fallback');
    expect(result.responseText).toBe(USER_MESSAGES.unrelated);
    expect(t.fetch).not.toHaveBeenCalled();
    expect(t.writes).toEqual([{ responseText: USER_MESSAGES.unrelated, status: 'fallback', errorCode: undefined }]);
  });

  it('falls back when classification fails', async () => {
    const t = setup();
    t.classify.mockRejectedValueOnce(new ValidationError('Query text is empty'));
    await seed(t.store);

    const result = await t.engine.run('s1', '');

    expect(result.status).toBe('fallback');
    expect(result.responseText).toBe(USER_MESSAGES.uncertainIntent);
    expect(result.errorCode).toBe('VALIDATION_ERROR');
    expect(t.writes).toHaveLength(1);
  });

  it('persists the generic message when the provider fails', async () => {
    const t = setup();
    t.fetch.mockRejectedValueOnce(new ProviderError('NASA POWER daily request failed: timeout'));
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('failed');
    expect(result.errorCode).toBe('PROVIDER_ERROR');
    expect(result.responseText).toBe(USER_MESSAGES.generic);
    expect(t.interpret).not.toHaveBeenCalled();
    expect(t.publish).not.toHaveBeenCalled();
    expect(t.writes).toEqual([{ responseText: USER_MESSAGES.generic, status: 'failed', errorCode: 'PROVIDER_ERROR' }]);
  });

  it('uses a specific message for insufficient data', async () => {
    const t = setup();
    t.fetch.mockResolvedValueOnce(makeRawSeries('daily', 10));
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('failed');
    expect(result.errorCode).toBe('INSUFFICIENT_DATA');
    expect(result.responseText).toBe(USER_MESSAGES.insufficientData('daily'));
  });

  it('fails the session when artifacts cannot be loaded', async () => {
    const t = setup();
    t.get.mockRejectedValueOnce(new ArtifactLoadError('Cannot read rainfall-daily.model.json'));
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('failed');
    expect(result.errorCode).toBe('ARTIFACT_LOAD_ERROR');
    expect(t.writes).toHaveLength(1);
  });

  it('normalizes unexpected errors', async () => {
    const t = setup();
    t.interpret.mockRejectedValueOnce(new TypeError('cannot read properties of undefined'));
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('failed');
    expect(result.errorCode).toBe('UNEXPECTED_ERROR');
    expect(result.responseText).toBe(USER_MESSAGES.generic);
  });

  it('keeps the session alive when publishing fails', async () => {
    const t = setup();
    t.publish.mockRejectedValueOnce(new Error('sink exploded'));
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('completed');
    expect(result.publish).toEqual({ status: 'failed', attempts: 0, error: 'sink exploded', errorCode: 'UNEXPECTED_ERROR' });
    expect(t.writes).toHaveLength(1);
  });

  it('skips publishing when it is not configured', async () => {
    const t = setup({ publish: undefined });
    await seed(t.store);

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('completed');
    expect(result.publish).toBeUndefined();
    expect(t.publish).not.toHaveBeenCalled();
  });

  it('rejects a second concurrent run for the same session', async () => {
    const t = setup();
    let release: (intent: Intent) => void = () => undefined;
    t.classify.mockImplementationOnce(
      () =>
        new Promise<Intent>((resolve) => {
          release = resolve;
        }),
    );
    await seed(t.store);

    const first = t.engine.run('s1', 'rain?');
    await vi.waitFor(() => expect(t.classify).toHaveBeenCalledTimes(1));
    expect(t.engine.isActive('s1')).toBe(true);

    await expect(t.engine.run('s1', 'rain?')).rejects.toThrow(SessionBusyError);

    release(forecastIntent('daily', 3));
    await expect(first).resolves.toMatchObject({ status: 'completed' });
    expect(t.engine.isActive('s1')).toBe(false);
    expect(t.writes).toHaveLength(1);
  });

  it('never re-enters a completed session', async () => {
    const t = setup();
    await seed(t.store);
    await t.engine.run('s1', 'rain?');

    await expect(t.engine.run('s1', 'rain?')).rejects.toThrow(ValidationError);
    await expect(t.engine.run('unknown', 'rain?')).rejects.toThrow(ValidationError);
    expect(t.writes).toHaveLength(1);
    expect(t.store.openSessions).toBe(0);
  });

  it('reports a failed terminal write without a second attempt', async () => {
    const t = setup();
    await seed(t.store);
    vi.spyOn(t.store, 'openSession').mockImplementation(async () => ({
      getQuery: async () => ({
        sessionId: 's1',
        userId: 'u1',
        queryText: 'rain?',
        responseText: null,
        responseTime: null,
        completed: false,
        status: 'processing',
        errorCode: null,
        createdAt: TODAY,
      }),
      completeQuery: async (_id: string, completion: QueryCompletion) => {
        t.writes.push(completion);
        throw new Error('connection lost');
      },
      release: async () => undefined,
    }));

    const result = await t.engine.run('s1', 'rain?');

    expect(result.status).toBe('completed');
    expect(result.persisted).toBe(false);
    expect(t.writes).toHaveLength(1);
    expect(t.logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: 's1', error: 'connection lost' }),
      'Terminal persistence write failed',
    );
  });

  it('describes only the requested steps, dated after the last observation', async () => {
    const logger = mockLogger();
    const generate = vi.fn(async () => {
      throw new Error('model offline');
    });
    const t = setup({
      classifier: { classify: async () => forecastIntent('daily', 1) },
      interpreter: new InterpretationService({ generate }, logger),
    });
    await seed(t.store);

    const result = await t.engine.run('s1', 'Will it rain tomorrow?');

    // 30 daily rows from 2024-01-01: the last observation is 2024-01-30
    expect(result.responseText).toBe(
      [
        'Rainfall forecast (daily) for lat 6.585, lon 3.983:',
        '- 2024-01-31: 2.00 mm',
        '1 of 1 day is expected to be wet; the highest value is 2.00 mm on 2024-01-31.',
      ].join('\n'),
    );
    expect(result.responseText).not.toContain('0.00 mm');
    // The chart payload keeps its fixed seven slots
    expect(result.forecast?.entries).toHaveLength(7);
  });

  it('passes every step of a horizon longer than the chart to the interpreter', async () => {
    const t = setup({ classifier: { classify: async () => forecastIntent('daily', 14) } });
    await seed(t.store);

    await t.engine.run('s1', 'Rain over the next two weeks?');

    const forecast = t.interpret.mock.calls[0][1];
    expect(forecast.entries).toHaveLength(14);
    expect(forecast.entries[0].date).toBe('2024-01-31');
    expect(forecast.entries[13].date).toBe('2024-02-13');
  });

  it('closes the record when the session lookup fails', async () => {
    const t = setup();
    await seed(t.store);
    vi.spyOn(t.store, 'openSession').mockImplementation(async () => {
      const session = await InMemoryRainfallStore.prototype.openSession.call(t.store);
      return {
        ...session,
        getQuery: async () => {
          throw new Error('cursor killed');
        },
        completeQuery: async (sessionId: string, completion: QueryCompletion) => {
          t.writes.push(completion);
          return session.completeQuery(sessionId, completion);
        },
      };
    });

    await expect(t.engine.run('s1', 'rain?')).rejects.toThrow('cursor killed');

    expect(t.writes).toEqual([{ responseText: USER_MESSAGES.generic, status: 'failed', errorCode: 'UNEXPECTED_ERROR' }]);
    const record = await t.store.getQuery('s1');
    expect(record?.completed).toBe(true);
    expect(record?.status).toBe('failed');
    expect(t.store.openSessions).toBe(0);
    expect(t.engine.isActive('s1')).toBe(false);
  });
});
