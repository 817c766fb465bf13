/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';

export { mongoose };

export async function connectMongo(url: string, dbName: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(url, { dbName, serverSelectionTimeoutMS: 10_000 });
  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}
