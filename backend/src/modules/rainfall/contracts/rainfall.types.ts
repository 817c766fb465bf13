/**
 * RAINFALL — Contracts
 * ====================
 *
 * Types shared by every stage of the forecast pipeline.
 */

import type { AppError } from '../../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// INTENT
// ═══════════════════════════════════════════════════════════════

export type ForecastMode = 'daily' | 'monthly';
export type IntentMode = ForecastMode | 'unrelated';
export type IntentSource = 'model' | 'keyword';

export interface Intent {
  readonly mode: IntentMode;
  readonly horizon: number; // days or months
  readonly latitude: number;
  readonly longitude: number;
  readonly confidence: number; // 0..1
  readonly source: IntentSource;
  readonly explanation: string;
}

/** Intent routed onto the forecast path */
export type ForecastIntent = Intent & { readonly mode: ForecastMode };

export function isForecastIntent(intent: Intent): intent is ForecastIntent {
  return intent.mode === 'daily' || intent.mode === 'monthly';
}

// ═══════════════════════════════════════════════════════════════
// SERIES + FEATURES
// ═══════════════════════════════════════════════════════════════

export interface RawRow {
  date: string; // YYYY-MM-DD (first of month for monthly)
  values: Record<string, number>;
}

export interface RawSeries {
  mode: ForecastMode;
  rows: RawRow[];
}

export interface FeatureWindow {
  mode: ForecastMode;
  /** Non-target feature columns, in scaler order */
  featureNames: readonly string[];
  targetColumn: string;
  /** featureNames followed by targetColumn */
  columns: readonly string[];
  rows: number[][];
  dates: string[];
}

// ═══════════════════════════════════════════════════════════════
// FORECAST
// ═══════════════════════════════════════════════════════════════

export interface ForecastStep {
  horizonIndex: number; // 1-based
  valueMm: number; // >= 0
  /** predict() failed for this step and 0 was used as the scaled prediction */
  degraded: boolean;
}

export type ForecastSequence = ForecastStep[];

export interface BucketEntry {
  date: string; // YYYY-MM-DD
  rainfall: number;
}

export interface BucketedForecast {
  mode: ForecastMode;
  entries: BucketEntry[];
}

/** Horizon-length forecast, step k dated k days (or months) after the last observed row */
export interface DatedForecast {
  mode: ForecastMode;
  entries: BucketEntry[];
}

export type WeekAnchor = 'current' | 'next';

// ═══════════════════════════════════════════════════════════════
// PUBLISH
// ═══════════════════════════════════════════════════════════════

export interface PublishSink {
  mode: ForecastMode;
  url: string;
}

export interface PublishOutcome {
  status: 'success' | 'failed';
  attempts: number;
  httpStatus?: number;
  error?: string;
  errorCode?: string;
}

// ═══════════════════════════════════════════════════════════════
// WORKFLOW
// ═══════════════════════════════════════════════════════════════

export type WorkflowStage =
  | 'START'
  | 'CLASSIFY'
  | 'FETCH'
  | 'ENGINEER'
  | 'FORECAST'
  | 'PUBLISH'
  | 'SUMMARIZE'
  | 'PERSIST'
  | 'FALLBACK'
  | 'ERROR'
  | 'DONE';

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AppError };

export interface WorkflowState {
  readonly sessionId: string;
  readonly userQuery: string;
  readonly stage: WorkflowStage;
  readonly intent?: Intent;
  readonly raw?: RawSeries;
  readonly window?: FeatureWindow;
  readonly sequence?: ForecastSequence;
  readonly bucket?: BucketedForecast;
  readonly publish?: PublishOutcome;
  readonly interpretation?: string;
  readonly error?: AppError;
  readonly completed: boolean;
}

export type TerminalStatus = 'completed' | 'fallback' | 'failed';

export interface TerminalResult {
  sessionId: string;
  status: TerminalStatus;
  responseText: string;
  persisted: boolean;
  intent?: Intent;
  forecast?: BucketedForecast;
  sequence?: ForecastSequence;
  publish?: PublishOutcome;
  errorCode?: string;
  durationMs: number;
}
