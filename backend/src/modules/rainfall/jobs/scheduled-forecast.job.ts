/**
 * SCHEDULED FORECAST JOB
 * ======================
 *
 * Chart updates only, no chat answers:
 *   weekly   every Sunday 11:00   → 7-day forecast  → daily sink
 *   monthly  1st of month 00:00   → 3-month forecast → monthly sink
 *
 * FETCH → ENGINEER → FORECAST → BUCKET → PUBLISH, with a synthetic intent.
 * A run is skipped while the previous run of the same job is in progress.
 */

import type { FastifyInstance } from 'fastify';
import cron, { type ScheduledTask } from 'node-cron';
import { describeError } from '../../../common/errors.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../../../common/logger.js';
import type { ArtifactSource } from '../artifacts/artifact.registry.js';
import type {
  BucketedForecast,
  FeatureWindow,
  ForecastIntent,
  ForecastMode,
  ForecastSequence,
  PublishOutcome,
  PublishSink,
  RawSeries,
} from '../contracts/rainfall.types.js';
import type { FeatureEngineer } from '../features/feature.engineer.js';
import type { Forecaster } from '../forecast/forecaster.js';
import type { ResultBucketer } from '../forecast/result.bucketer.js';
import { lookbackRange, type EnvironmentalDataProvider } from '../providers/nasa-power.provider.js';
import { BUCKET_SIZE } from '../rainfall.constants.js';
import type { BucketPublisher } from '../workflow/workflow.engine.js';

export const SCHEDULES: Record<ForecastMode, string> = {
  daily: '0 11 * * 0',
  monthly: '0 0 1 * *',
};

const STEP_NAMES = ['FETCH', 'ENGINEER', 'FORECAST', 'BUCKET', 'PUBLISH'] as const;
type StepName = (typeof STEP_NAMES)[number];

export interface ScheduledStepResult {
  name: StepName;
  ok: boolean;
  ms: number;
  error?: string;
}

export interface ScheduledRunResult {
  mode: ForecastMode;
  status: 'published' | 'failed' | 'skipped';
  steps: ScheduledStepResult[];
  forecast?: BucketedForecast;
  publish?: PublishOutcome;
  error?: string;
  durationMs: number;
}

export interface ScheduledForecastDeps {
  provider: EnvironmentalDataProvider;
  engineer: FeatureEngineer;
  artifacts: ArtifactSource;
  forecaster: Forecaster;
  bucketer: ResultBucketer;
  publisher: BucketPublisher;
  sinks: Record<ForecastMode, PublishSink>;
  location: { latitude: number; longitude: number };
  lookback: { days: number; years: number };
  logger?: Logger;
  clock?: Clock;
}

export interface SchedulerConfig {
  enabled: boolean;
  timezone: string;
}

class StepFailure extends Error {}

export class ScheduledForecastRunner {
  private readonly running = new Set<ForecastMode>();
  private readonly tasks: ScheduledTask[] = [];
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: ScheduledForecastDeps) {
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? defaultClock;
  }

  isRunning(mode: ForecastMode): boolean {
    return this.running.has(mode);
  }

  runWeekly(): Promise<ScheduledRunResult> {
    return this.run('daily');
  }

  runMonthly(): Promise<ScheduledRunResult> {
    return this.run('monthly');
  }

  async run(mode: ForecastMode): Promise<ScheduledRunResult> {
    const startMs = this.clock.now();
    if (this.running.has(mode)) {
      this.logger.warn({ mode }, 'Scheduled forecast already running, skipping');
      return { mode, status: 'skipped', steps: [], durationMs: 0 };
    }
    this.running.add(mode);

    const intent: ForecastIntent = Object.freeze({
      mode,
      horizon: BUCKET_SIZE[mode],
      latitude: this.deps.location.latitude,
      longitude: this.deps.location.longitude,
      confidence: 1,
      source: 'model',
      explanation: `Scheduled ${mode} chart update`,
    } satisfies ForecastIntent);

    const steps: ScheduledStepResult[] = [];
    const step = async <T>(name: StepName, work: () => Promise<T>): Promise<T> => {
      const t0 = this.clock.now();
      try {
        const value = await work();
        steps.push({ name, ok: true, ms: this.clock.now() - t0 });
        return value;
      } catch (err) {
        const error = describeError(err);
        steps.push({ name, ok: false, ms: this.clock.now() - t0, error });
        throw new StepFailure(`${name}: ${error}`);
      }
    };

    try {
      const today = this.clock.utcNow();
      const raw: RawSeries = await step('FETCH', () =>
        this.deps.provider.fetch(intent.latitude, intent.longitude, mode, lookbackRange(mode, today, this.deps.lookback)),
      );
      const window: FeatureWindow = await step('ENGINEER', async () => this.deps.engineer.build(raw, mode));
      const sequence: ForecastSequence = await step('FORECAST', async () => {
        const artifacts = await this.deps.artifacts.get(mode);
        return this.deps.forecaster.forecast(window, intent.horizon, artifacts.predictor, artifacts.scaler);
      });
      const bucket = await step('BUCKET', async () => this.deps.bucketer.bucket(sequence, mode, today));
      const publish = await step('PUBLISH', () => this.deps.publisher.publish(bucket, this.deps.sinks[mode]));

      const durationMs = this.clock.now() - startMs;
      if (publish.status !== 'success') {
        this.logger.error({ mode, error: publish.error, attempts: publish.attempts }, 'Scheduled forecast publish failed');
        return { mode, status: 'failed', steps, forecast: bucket, publish, error: publish.error, durationMs };
      }
      this.logger.info({ mode, entries: bucket.entries, durationMs }, 'Scheduled forecast published');
      return { mode, status: 'published', steps, forecast: bucket, publish, durationMs };
    } catch (err) {
      const error = describeError(err);
      this.logger.error({ mode, error }, 'Scheduled forecast failed');
      return { mode, status: 'failed', steps, error, durationMs: this.clock.now() - startMs };
    } finally {
      this.running.delete(mode);
    }
  }

  start(config: SchedulerConfig): void {
    if (!config.enabled) {
      console.log('[RainfallScheduler] Disabled by config');
      return;
    }
    for (const mode of ['daily', 'monthly'] as const) {
      const task = cron.schedule(
        SCHEDULES[mode],
        () => {
          this.run(mode).catch((err: unknown) => {
            this.logger.error({ mode, error: describeError(err) }, 'Scheduled forecast crashed');
          });
        },
        { timezone: config.timezone },
      );
      this.tasks.push(task);
    }
    console.log(`[RainfallScheduler] Started (weekly "${SCHEDULES.daily}", monthly "${SCHEDULES.monthly}", tz ${config.timezone})`);
  }

  stop(): void {
    if (this.tasks.length === 0) return;
    for (const task of this.tasks) task.stop();
    this.tasks.length = 0;
    console.log('[RainfallScheduler] Stopped');
  }
}

export function registerScheduledForecastJob(
  app: FastifyInstance,
  runner: ScheduledForecastRunner,
  config: SchedulerConfig,
): void {
  app.addHook('onReady', async () => {
    runner.start(config);
  });

  app.addHook('onClose', async () => {
    runner.stop();
  });

  app.log.info('[RainfallScheduler] Registered');
}
