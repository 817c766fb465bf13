import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import {
  InMemoryRainfallStore,
  MongoRainfallStore,
  type PersistenceStore,
} from './modules/rainfall/storage/rainfall.store.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  RAINFALL FORECAST BACKEND');
  console.log('═══════════════════════════════════════════════════════════════');

  let store: PersistenceStore;
  const storeMode = env.MONGO_URL ? 'MONGO' : 'MEMORY';
  if (storeMode === 'MONGO') {
    console.log('[Rainfall] Connecting to MongoDB...');
    await connectMongo(env.MONGO_URL, env.DB_NAME);
    await ensureIndexes();
    store = new MongoRainfallStore();
  } else {
    console.log('[Rainfall] MONGO_URL not set, using in-memory store');
    store = new InMemoryRainfallStore();
  }

  const { app } = await buildApp(env, { store, storeMode });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Rainfall] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Rainfall] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => {
      console.error('[Rainfall] Shutdown failed:', err);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => {
      console.error('[Rainfall] Shutdown failed:', err);
      process.exit(1);
    });
  });

  await app.listen({ port: env.PORT, host: '0.0.0.0' });
  console.log(`[Rainfall] ✅ Listening on port ${env.PORT}`);
}

main().catch((err) => {
  console.error('[Rainfall] Fatal startup error:', err);
  process.exit(1);
});
