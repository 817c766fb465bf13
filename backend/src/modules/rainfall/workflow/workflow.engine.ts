/**
 * RAINFALL — Workflow Engine
 * ==========================
 *
 *   START → CLASSIFY ─┬─ daily|monthly → FETCH → ENGINEER → FORECAST → [PUBLISH] → SUMMARIZE → PERSIST → DONE
 *                     └─ unrelated / classify failed → FALLBACK → DONE
 *
 * Any stage after CLASSIFY that fails short-circuits to ERROR, which persists
 * the error message. Every run ends in exactly one terminal write.
 *
 * One active run per session id; a completed session is never re-entered.
 */

import {
  AppError,
  InsufficientDataError,
  SessionBusyError,
  ValidationError,
  describeError,
  toAppError,
} from '../../../common/errors.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../../../common/logger.js';
import type { ArtifactSource } from '../artifacts/artifact.registry.js';
import type {
  BucketedForecast,
  DatedForecast,
  ForecastIntent,
  ForecastMode,
  ForecastSequence,
  Intent,
  PublishOutcome,
  PublishSink,
  RawSeries,
  FeatureWindow,
  StageResult,
  TerminalResult,
  TerminalStatus,
  WorkflowState,
} from '../contracts/rainfall.types.js';
import { isForecastIntent } from '../contracts/rainfall.types.js';
import type { FeatureEngineer } from '../features/feature.engineer.js';
import type { Forecaster } from '../forecast/forecaster.js';
import { datedSequence, formatDate, type ResultBucketer } from '../forecast/result.bucketer.js';
import { lookbackRange, type EnvironmentalDataProvider } from '../providers/nasa-power.provider.js';
import { USER_MESSAGES } from '../rainfall.constants.js';
import type { PersistenceSession, PersistenceStore } from '../storage/rainfall.store.js';

export interface IntentSource {
  classify(query: string): Promise<Intent>;
}

export interface Interpreter {
  interpret(intent: ForecastIntent, forecast: DatedForecast): Promise<string>;
}

export interface BucketPublisher {
  publish(bucket: BucketedForecast, sink: PublishSink): Promise<PublishOutcome>;
}

export interface WorkflowDeps {
  classifier: IntentSource;
  provider: EnvironmentalDataProvider;
  engineer: FeatureEngineer;
  artifacts: ArtifactSource;
  forecaster: Forecaster;
  bucketer: ResultBucketer;
  interpreter: Interpreter;
  store: PersistenceStore;
  lookback: { days: number; years: number };
  /** Present when interactive sessions also push chart data */
  publish?: {
    publisher: BucketPublisher;
    sinks: Record<ForecastMode, PublishSink>;
  };
  logger?: Logger;
  clock?: Clock;
}

interface ForecastProduct {
  sequence: ForecastSequence;
  dated: DatedForecast;
  bucket: BucketedForecast;
}

export class WorkflowEngine {
  private readonly active = new Set<string>();
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: WorkflowDeps) {
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? defaultClock;
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  async run(sessionId: string, userQuery: string): Promise<TerminalResult> {
    if (!sessionId.trim()) {
      throw new ValidationError('Session id is required');
    }
    if (this.active.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    this.active.add(sessionId);

    const startedAt = this.clock.now();
    let session: PersistenceSession | undefined;
    try {
      session = await this.deps.store.openSession();
      const record = await this.loadRecord(session, sessionId);
      if (!record) {
        throw new ValidationError(`Unknown session ${sessionId}`);
      }
      if (record.completed) {
        throw new ValidationError(`Session ${sessionId} is already completed`);
      }

      return await this.execute(session, { sessionId, userQuery, stage: 'START', completed: false }, startedAt);
    } finally {
      this.active.delete(sessionId);
      if (session) {
        await session.release().catch((err: unknown) => {
          this.logger.error({ sessionId, error: describeError(err) }, 'Failed to release persistence session');
        });
      }
    }
  }

  /** A failed lookup still closes the record, so it never stays 'processing' */
  private async loadRecord(session: PersistenceSession, sessionId: string) {
    try {
      return await session.getQuery(sessionId);
    } catch (err) {
      const error = toAppError(err);
      this.logger.error({ sessionId, code: error.code, error: error.message }, 'Session lookup failed');
      await new TerminalWriter(session, this.logger).write(sessionId, {
        responseText: USER_MESSAGES.generic,
        status: 'failed',
        errorCode: error.code,
      });
      throw err;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // PIPELINE
  // ═══════════════════════════════════════════════════════════════

  private async execute(session: PersistenceSession, initial: WorkflowState, startedAt: number): Promise<TerminalResult> {
    let state = initial;
    const terminal = new TerminalWriter(session, this.logger);

    // CLASSIFY
    state = { ...state, stage: 'CLASSIFY' };
    const classified = await this.stage(state, () => this.deps.classifier.classify(state.userQuery));
    if (!classified.ok) {
      return this.fallback(terminal, { ...state, error: classified.error }, USER_MESSAGES.uncertainIntent, startedAt);
    }
    state = { ...state, intent: classified.value };
    if (!isForecastIntent(classified.value)) {
      return this.fallback(terminal, state, USER_MESSAGES.unrelated, startedAt);
    }
    const intent: ForecastIntent = classified.value;

    // FETCH
    state = { ...state, stage: 'FETCH' };
    const fetched = await this.stage(state, () => {
      const range = lookbackRange(intent.mode, this.clock.utcNow(), this.deps.lookback);
      return this.deps.provider.fetch(intent.latitude, intent.longitude, intent.mode, range);
    });
    if (!fetched.ok) return this.fail(terminal, state, fetched.error, startedAt);
    state = { ...state, raw: fetched.value };

    // ENGINEER
    state = { ...state, stage: 'ENGINEER' };
    const raw: RawSeries = fetched.value;
    const engineered = await this.stage(state, async () => this.deps.engineer.build(raw, intent.mode));
    if (!engineered.ok) return this.fail(terminal, state, engineered.error, startedAt);
    state = { ...state, window: engineered.value };

    // FORECAST (+ bucket)
    state = { ...state, stage: 'FORECAST' };
    const window: FeatureWindow = engineered.value;
    const forecasted = await this.stage(state, () => this.forecast(intent, window));
    if (!forecasted.ok) return this.fail(terminal, state, forecasted.error, startedAt);
    const { sequence, dated, bucket } = forecasted.value;
    state = { ...state, sequence, bucket };

    // PUBLISH (never aborts)
    let publish: PublishOutcome | undefined;
    if (this.deps.publish) {
      state = { ...state, stage: 'PUBLISH' };
      publish = await this.publish(state.sessionId, bucket, this.deps.publish.sinks[intent.mode]);
      state = { ...state, publish };
    }

    // SUMMARIZE
    state = { ...state, stage: 'SUMMARIZE' };
    const summarized = await this.stage(state, () => this.deps.interpreter.interpret(intent, dated));
    if (!summarized.ok) return this.fail(terminal, state, summarized.error, startedAt);
    state = { ...state, interpretation: summarized.value };

    // PERSIST → DONE
    state = { ...state, stage: 'PERSIST' };
    const persisted = await terminal.write(state.sessionId, { responseText: summarized.value, status: 'completed' });
    state = { ...state, stage: 'DONE', completed: true };

    this.logger.info(
      { sessionId: state.sessionId, mode: intent.mode, horizon: intent.horizon, publish: publish?.status },
      'Workflow completed',
    );
    return this.result(state, 'completed', summarized.value, persisted, startedAt, { sequence, bucket, publish });
  }

  private async forecast(intent: ForecastIntent, window: FeatureWindow): Promise<ForecastProduct> {
    const artifacts = await this.deps.artifacts.get(intent.mode);
    const sequence = await this.deps.forecaster.forecast(window, intent.horizon, artifacts.predictor, artifacts.scaler);
    const lastObserved = window.dates[window.dates.length - 1] ?? formatDate(this.clock.utcNow());
    const dated = datedSequence(sequence, intent.mode, lastObserved);
    const bucket = this.deps.bucketer.bucket(sequence, intent.mode, this.clock.utcNow());
    return { sequence, dated, bucket };
  }

  private async publish(sessionId: string, bucket: BucketedForecast, sink: PublishSink): Promise<PublishOutcome> {
    if (!this.deps.publish) {
      return { status: 'failed', attempts: 0, error: 'publishing disabled' };
    }
    try {
      return await this.deps.publish.publisher.publish(bucket, sink);
    } catch (err) {
      const error = toAppError(err);
      this.logger.warn({ sessionId, sink: sink.url, error: error.message }, 'Publish failed, continuing session');
      return { status: 'failed', attempts: 0, error: error.message, errorCode: error.code };
    }
  }

  private async stage<T>(state: WorkflowState, work: () => Promise<T>): Promise<StageResult<T>> {
    const startMs = this.clock.now();
    try {
      const value = await work();
      this.logger.debug?.({ sessionId: state.sessionId, stage: state.stage, ms: this.clock.now() - startMs }, 'Stage completed');
      return { ok: true, value };
    } catch (err) {
      const error = toAppError(err);
      this.logger.error(
        { sessionId: state.sessionId, stage: state.stage, ms: this.clock.now() - startMs, code: error.code, error: error.message },
        'Stage failed',
      );
      return { ok: false, error };
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // TERMINALS
  // ═══════════════════════════════════════════════════════════════

  private async fallback(
    terminal: TerminalWriter,
    state: WorkflowState,
    message: string,
    startedAt: number,
  ): Promise<TerminalResult> {
    const next: WorkflowState = { ...state, stage: 'FALLBACK' };
    const persisted = await terminal.write(next.sessionId, {
      responseText: message,
      status: 'fallback',
      errorCode: next.error?.code,
    });
    this.logger.info({ sessionId: next.sessionId, mode: next.intent?.mode, error: next.error?.code }, 'Workflow fell back');
    return this.result({ ...next, stage: 'DONE', completed: true }, 'fallback', message, persisted, startedAt);
  }

  private async fail(
    terminal: TerminalWriter,
    state: WorkflowState,
    error: AppError,
    startedAt: number,
  ): Promise<TerminalResult> {
    const next: WorkflowState = { ...state, stage: 'ERROR', error };
    const message =
      error instanceof InsufficientDataError && next.intent && isForecastIntent(next.intent)
        ? USER_MESSAGES.insufficientData(next.intent.mode)
        : USER_MESSAGES.generic;
    const persisted = await terminal.write(next.sessionId, {
      responseText: message,
      status: 'failed',
      errorCode: error.code,
    });
    return this.result({ ...next, stage: 'DONE', completed: true }, 'failed', message, persisted, startedAt);
  }

  private result(
    state: WorkflowState,
    status: TerminalStatus,
    responseText: string,
    persisted: boolean,
    startedAt: number,
    extra: { sequence?: ForecastSequence; bucket?: BucketedForecast; publish?: PublishOutcome } = {},
  ): TerminalResult {
    return {
      sessionId: state.sessionId,
      status,
      responseText,
      persisted,
      intent: state.intent,
      forecast: extra.bucket,
      sequence: extra.sequence,
      publish: extra.publish,
      errorCode: state.error?.code,
      durationMs: this.clock.now() - startedAt,
    };
  }
}

/** Guards the single terminal write of one run */
class TerminalWriter {
  private written = false;

  constructor(
    private readonly session: PersistenceSession,
    private readonly logger: Logger,
  ) {}

  async write(
    sessionId: string,
    completion: { responseText: string; status: TerminalStatus; errorCode?: string },
  ): Promise<boolean> {
    if (this.written) {
      throw new ValidationError(`Terminal result for session ${sessionId} was already written`);
    }
    this.written = true;
    try {
      await this.session.completeQuery(sessionId, completion);
      return true;
    } catch (err) {
      this.logger.error({ sessionId, status: completion.status, error: describeError(err) }, 'Terminal persistence write failed');
      return false;
    }
  }
}
