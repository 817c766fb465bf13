/**
 * RAINFALL — Routes
 * =================
 *
 * POST /api/rainfall/user-input                 store query, dispatch workflow
 * GET  /api/rainfall/chatbot-response?userId=   latest answer for a user
 * GET  /api/rainfall/sessions/:sessionId        one query record
 * POST /api/rainfall/daily-forecast             chart sink (7 entries)
 * POST /api/rainfall/monthly-forecast           chart sink (3 entries)
 * GET  /api/rainfall/forecasts/:type/latest     latest stored chart payload
 * POST /api/rainfall/admin/update-weekly-chart  run the weekly job now
 * POST /api/rainfall/admin/update-monthly-chart run the monthly job now
 */

import type { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { NotFoundError, ValidationError, describeError } from '../../common/errors.js';
import type { ForecastMode, TerminalResult } from './contracts/rainfall.types.js';
import type { ScheduledRunResult } from './jobs/scheduled-forecast.job.js';
import { BUCKET_SIZE } from './rainfall.constants.js';
import type { QueryRecord, PersistenceStore } from './storage/rainfall.store.js';

export interface RainfallRouteDeps {
  store: PersistenceStore;
  workflow: { run(sessionId: string, userQuery: string): Promise<TerminalResult> };
  scheduler: {
    runWeekly(): Promise<ScheduledRunResult>;
    runMonthly(): Promise<ScheduledRunResult>;
  };
}

const UserInputBody = z.object({
  userId: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
  message: z.string().trim().min(1, 'message must not be empty'),
});

const ChatbotQuery = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
});

const ForecastType = z.enum(['daily', 'monthly']);

function sinkBody(mode: ForecastMode) {
  return z
    .array(
      z.object({
        date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
        rainfall: z.number().finite().min(0),
      }),
    )
    .length(BUCKET_SIZE[mode], `${mode} forecast needs exactly ${BUCKET_SIZE[mode]} entries`);
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue?.message ?? 'invalid input'}`);
  }
  return result.data;
}

function serializeQuery(record: QueryRecord) {
  return {
    sessionId: record.sessionId,
    userId: record.userId,
    queryText: record.queryText,
    responseText: record.responseText,
    responseTime: record.responseTime ? record.responseTime.toISOString() : null,
    createdAt: record.createdAt.toISOString(),
    status: record.status,
    isCompleted: record.completed,
  };
}

export async function registerRainfallRoutes(app: FastifyInstance, deps: RainfallRouteDeps): Promise<void> {
  const { store, workflow, scheduler } = deps;

  app.post('/api/rainfall/user-input', async (req, reply) => {
    const body = parse(UserInputBody, req.body);
    const sessionId = uuidv4();

    await store.createQuery({ sessionId, userId: body.userId, queryText: body.message });

    // Detached: the client polls /chatbot-response
    workflow
      .run(sessionId, body.message)
      .then((result) => {
        app.log.info({ sessionId, status: result.status, durationMs: result.durationMs }, '[Rainfall] Session finished');
      })
      .catch((err: unknown) => {
        app.log.error({ sessionId, error: describeError(err) }, '[Rainfall] Session crashed');
      });

    return reply.code(202).send({ ok: true, data: { sessionId, status: 'processing' } });
  });

  app.get('/api/rainfall/chatbot-response', async (req) => {
    const { userId } = parse(ChatbotQuery, req.query);
    const latest = await store.latestQueryForUser(userId);

    if (!latest) {
      // Nothing pending for this user
      return {
        ok: true,
        data: { sessionId: null, queryText: null, responseText: null, responseTime: null, createdAt: null, isCompleted: true },
      };
    }
    return { ok: true, data: serializeQuery(latest) };
  });

  app.get<{ Params: { sessionId: string } }>('/api/rainfall/sessions/:sessionId', async (req) => {
    const record = await store.getQuery(req.params.sessionId);
    if (!record) {
      throw new NotFoundError(`Session ${req.params.sessionId} not found`);
    }
    return { ok: true, data: serializeQuery(record) };
  });

  for (const mode of ['daily', 'monthly'] as const) {
    const schema = sinkBody(mode);
    app.post(`/api/rainfall/${mode}-forecast`, async (req) => {
      const payload = parse(schema, req.body);
      const record = await store.saveForecast(mode, payload);
      app.log.info({ mode, entries: payload.length }, '[Rainfall] Chart forecast stored');
      return { ok: true, data: { type: record.type, count: record.payload.length, createdAt: record.createdAt.toISOString() } };
    });
  }

  app.get<{ Params: { type: string } }>('/api/rainfall/forecasts/:type/latest', async (req) => {
    const type = parse(ForecastType, req.params.type);
    const record = await store.latestForecast(type);
    if (!record) {
      throw new NotFoundError(`No ${type} forecast stored yet`);
    }
    return { ok: true, data: { type: record.type, payload: record.payload, createdAt: record.createdAt.toISOString() } };
  });

  app.post('/api/rainfall/admin/update-weekly-chart', async () => {
    const result = await scheduler.runWeekly();
    return { ok: result.status === 'published', data: result };
  });

  app.post('/api/rainfall/admin/update-monthly-chart', async () => {
    const result = await scheduler.runMonthly();
    return { ok: result.status === 'published', data: result };
  });

  app.log.info('[Rainfall] Routes registered at /api/rainfall/*');
}
