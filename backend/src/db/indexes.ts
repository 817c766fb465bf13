/**
 * Database Indexes
 * Run on startup, after connectMongo()
 */

import { describeError } from '../common/errors.js';
import { mongoose } from './mongoose.js';

export async function ensureIndexes(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  try {
    const queries = db.collection('rainfall_queries');
    await queries.createIndex({ sessionId: 1 }, { unique: true });
    await queries.createIndex({ userId: 1, createdAt: -1 });
    console.log('[DB] rainfall_queries indexes created');
  } catch (err) {
    console.log('[DB] rainfall_queries indexes already exist or error:', describeError(err));
  }

  try {
    await db.collection('rainfall_forecasts').createIndex({ type: 1, createdAt: -1 });
    console.log('[DB] rainfall_forecasts indexes created');
  } catch (err) {
    console.log('[DB] rainfall_forecasts indexes already exist or error:', describeError(err));
  }

  console.log('[DB] Indexes ensured');
}
