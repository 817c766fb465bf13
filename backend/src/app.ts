import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import { registerRainfallModule, type RainfallOverrides, type RainfallServices } from './modules/rainfall/index.js';
import type { PersistenceStore } from './modules/rainfall/storage/rainfall.store.js';

export interface AppDeps {
  store: PersistenceStore;
  storeMode: 'MONGO' | 'MEMORY';
  overrides?: RainfallOverrides;
}

/**
 * Build Fastify Application
 */
export async function buildApp(
  config: Env,
  deps: AppDeps,
): Promise<{ app: FastifyInstance; services: RainfallServices }> {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  await app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation / body parsing errors
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  // Health endpoint
  app.get('/api/health', async () => ({
    ok: true,
    store: deps.storeMode,
    mongo: deps.storeMode === 'MONGO' ? isMongoConnected() : null,
    timestamp: new Date().toISOString(),
  }));

  console.log('[BOOT] Registering Rainfall Module...');
  const services = await registerRainfallModule(app, config, deps.store, deps.overrides);
  console.log('[BOOT] ✅ Rainfall Module registered at /api/rainfall/*');

  return { app, services };
}
