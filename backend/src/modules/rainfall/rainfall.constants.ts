/**
 * RAINFALL — Constants
 * ====================
 */

import type { ForecastMode } from './contracts/rainfall.types.js';

// Environmental covariates requested from the provider, in model order
export const COVARIATE_FIELDS = [
  'RH2M',
  'WS10M',
  'T2M',
  'WD10M',
  'ALLSKY_SFC_SW_DWN',
  'EVPTRNS',
  'PS',
  'QV2M',
  'T2M_RANGE',
  'TS',
  'CLRSKY_SFC_SW_DWN',
] as const;

export const TARGET_FIELD = 'PRECTOTCORR';

export const REQUIRED_FIELDS: readonly string[] = [...COVARIATE_FIELDS, TARGET_FIELD];

// Provider missing-value flag
export const MISSING_SENTINEL = -999;

// Derived column names
export const LOG_TARGET_COLUMN = `log_${TARGET_FIELD}`;
export const LAGS = [1, 3, 7] as const;
export const LAG_COLUMNS = LAGS.map((lag) => `${LOG_TARGET_COLUMN}_lag${lag}`);
export const ROLLING_MEAN_COLUMN = 'rain_rolling_mean';
export const ROLLING_STD_COLUMN = 'rain_rolling_std';

/**
 * Feature columns fed to the scaler, target excluded. The window appends
 * LOG_TARGET_COLUMN after these, so the target is always the last column.
 */
export const FEATURE_NAMES: readonly string[] = [
  ...COVARIATE_FIELDS.map((f) => `log_${f}`),
  ...LAG_COLUMNS,
  ROLLING_MEAN_COLUMN,
  ROLLING_STD_COLUMN,
];

export const WINDOW_COLUMNS: readonly string[] = [...FEATURE_NAMES, LOG_TARGET_COLUMN];

// Rows kept in the feature window
export const WINDOW_LENGTH: Record<ForecastMode, number> = {
  daily: 15,
  monthly: 7,
};

// Trailing span of the rolling mean / std
export const ROLLING_SPAN: Record<ForecastMode, number> = {
  daily: 7,
  monthly: 3,
};

// Chart slots per payload
export const BUCKET_SIZE: Record<ForecastMode, number> = {
  daily: 7,
  monthly: 3,
};

// Keyword classification when the language model cannot answer
export const KEYWORD_FALLBACK_CONFIDENCE = 0.3;

// Horizon bounds accepted from the language model
export const MAX_HORIZON: Record<ForecastMode, number> = {
  daily: 31,
  monthly: 12,
};

export const USER_MESSAGES = {
  unrelated:
    'I apologize, but my function is specialized for rainfall prediction. Please ask a query related to predicting rainfall.',
  uncertainIntent:
    'I could not process your request due to an uncertain intent or missing parameters. Please ensure your query clearly specifies a daily or monthly forecast.',
  insufficientData: (mode: ForecastMode) =>
    `There is not enough recent weather data for this location to produce a ${mode} forecast. Please try again later.`,
  generic: 'I encountered a problem processing your request. Please try again later.',
} as const;
