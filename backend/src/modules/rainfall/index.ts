/**
 * RAINFALL MODULE
 * ===============
 *
 * Wires the capability graph (language model, data provider, artifacts,
 * store, publisher) into the workflow engine, the scheduled runner and the
 * HTTP routes. Every capability can be overridden for tests.
 */

import axios from 'axios';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { defaultClock, type Clock, type Logger } from '../../common/logger.js';
import type { Env } from '../../config/env.js';
import { ArtifactRegistry, type ArtifactSource } from './artifacts/artifact.registry.js';
import { FeatureEngineer } from './features/feature.engineer.js';
import { Forecaster } from './forecast/forecaster.js';
import { ResultBucketer } from './forecast/result.bucketer.js';
import { IntentClassifier } from './intent/intent.classifier.js';
import { InterpretationService } from './interpret/interpretation.service.js';
import { ScheduledForecastRunner, registerScheduledForecastJob } from './jobs/scheduled-forecast.job.js';
import { GeminiLanguageModel, type LanguageModel } from './llm/language.model.js';
import { NasaPowerProvider, type EnvironmentalDataProvider } from './providers/nasa-power.provider.js';
import { ForecastPublisher, sinkUrls, type HttpPoster } from './publish/forecast.publisher.js';
import { registerRainfallRoutes } from './rainfall.routes.js';
import type { PersistenceStore } from './storage/rainfall.store.js';
import { WorkflowEngine } from './workflow/workflow.engine.js';

export interface RainfallOverrides {
  llm?: LanguageModel;
  provider?: EnvironmentalDataProvider;
  artifacts?: ArtifactSource;
  http?: HttpPoster;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface RainfallServices {
  engine: WorkflowEngine;
  scheduler: ScheduledForecastRunner;
  store: PersistenceStore;
}

export function createRainfallServices(
  config: Env,
  store: PersistenceStore,
  logger: Logger,
  overrides: RainfallOverrides = {},
): RainfallServices {
  const clock = overrides.clock ?? defaultClock;
  const llm = overrides.llm ?? new GeminiLanguageModel({
    apiKey: config.GEMINI_API_KEY,
    model: config.LLM_MODEL,
    timeoutMs: config.LLM_TIMEOUT_MS,
  });
  const provider = overrides.provider ?? new NasaPowerProvider({
    baseUrl: config.NASA_POWER_BASE_URL,
    timeoutMs: config.PROVIDER_TIMEOUT_MS,
    logger,
  });
  const artifacts = overrides.artifacts ?? new ArtifactRegistry(path.resolve(config.MODEL_DIR), logger);

  const engineer = new FeatureEngineer();
  const forecaster = new Forecaster({ logger });
  const bucketer = new ResultBucketer(config.WEEK_ANCHOR);
  const publisher = new ForecastPublisher(overrides.http ?? axios, {
    maxAttempts: config.PUBLISH_MAX_ATTEMPTS,
    timeoutMs: config.PUBLISH_TIMEOUT_MS,
    retryDelayMs: config.PUBLISH_RETRY_DELAY_MS,
    logger,
    sleep: overrides.sleep,
  });
  const sinks = sinkUrls(config.PUBLISH_BASE_URL);
  const lookback = { days: config.DAILY_LOOKBACK_DAYS, years: config.MONTHLY_LOOKBACK_YEARS };

  const classifier = new IntentClassifier(
    llm,
    {
      latitude: config.DEFAULT_LATITUDE,
      longitude: config.DEFAULT_LONGITUDE,
      dailyHorizon: config.DEFAULT_DAILY_HORIZON,
      monthlyHorizon: config.DEFAULT_MONTHLY_HORIZON,
    },
    logger,
  );

  const engine = new WorkflowEngine({
    classifier,
    provider,
    engineer,
    artifacts,
    forecaster,
    bucketer,
    interpreter: new InterpretationService(llm, logger),
    store,
    lookback,
    publish: config.PUBLISH_INTERACTIVE ? { publisher, sinks } : undefined,
    logger,
    clock,
  });

  const scheduler = new ScheduledForecastRunner({
    provider,
    engineer,
    artifacts,
    forecaster,
    bucketer,
    publisher,
    sinks,
    location: { latitude: config.DEFAULT_LATITUDE, longitude: config.DEFAULT_LONGITUDE },
    lookback,
    logger,
    clock,
  });

  return { engine, scheduler, store };
}

export async function registerRainfallModule(
  app: FastifyInstance,
  config: Env,
  store: PersistenceStore,
  overrides: RainfallOverrides = {},
): Promise<RainfallServices> {
  const services = createRainfallServices(config, store, app.log, overrides);

  await registerRainfallRoutes(app, {
    store,
    workflow: services.engine,
    scheduler: services.scheduler,
  });
  registerScheduledForecastJob(app, services.scheduler, {
    enabled: config.SCHEDULER_ENABLED,
    timezone: config.SCHEDULER_TZ,
  });

  return services;
}

console.log('[Rainfall] Module loaded');
