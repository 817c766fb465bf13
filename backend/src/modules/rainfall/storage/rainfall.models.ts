/**
 * RAINFALL — Mongo Models
 * =======================
 * rainfall_queries    one record per chat session
 * rainfall_forecasts  chart payloads received by the publish sinks
 */

import mongoose, { Schema, type Model } from 'mongoose';
import type { BucketEntry, ForecastMode } from '../contracts/rainfall.types.js';

export type QueryStatus = 'processing' | 'completed' | 'fallback' | 'failed';

export interface IRainfallQuery {
  sessionId: string;
  userId: string;
  queryText: string;
  responseText: string | null;
  responseTime: Date | null;
  completed: boolean;
  status: QueryStatus;
  errorCode: string | null;
  createdAt: Date;
}

export interface IRainfallForecast {
  type: ForecastMode;
  payload: BucketEntry[];
  createdAt: Date;
}

function modelFor<T>(name: string, schema: Schema<T>): Model<T> {
  const existing = mongoose.models[name];
  return existing ?? mongoose.model<T>(name, schema);
}

const RainfallQuerySchema = new Schema<IRainfallQuery>(
  {
    sessionId: { type: String, required: true, unique: true },
    userId: { type: String, required: true, index: true },
    queryText: { type: String, required: true },
    responseText: { type: String, default: null },
    responseTime: { type: Date, default: null },
    completed: { type: Boolean, default: false },
    status: {
      type: String,
      enum: ['processing', 'completed', 'fallback', 'failed'],
      default: 'processing',
    },
    errorCode: { type: String, default: null },
    createdAt: { type: Date, default: () => new Date() },
  },
  { collection: 'rainfall_queries' }
);

RainfallQuerySchema.index({ userId: 1, createdAt: -1 });

const BucketEntrySchema = new Schema<BucketEntry>(
  {
    date: { type: String, required: true },
    rainfall: { type: Number, required: true },
  },
  { _id: false }
);

const RainfallForecastSchema = new Schema<IRainfallForecast>(
  {
    type: { type: String, enum: ['daily', 'monthly'], required: true },
    payload: { type: [BucketEntrySchema], required: true },
    createdAt: { type: Date, default: () => new Date() },
  },
  { collection: 'rainfall_forecasts' }
);

RainfallForecastSchema.index({ type: 1, createdAt: -1 });

export const RainfallQueryModel = modelFor<IRainfallQuery>('RainfallQuery', RainfallQuerySchema);
export const RainfallForecastModel = modelFor<IRainfallForecast>('RainfallForecast', RainfallForecastSchema);
