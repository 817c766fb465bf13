/**
 * RAINFALL — Persistence Store
 * ============================
 *
 * PersistenceStore serves the HTTP routes; PersistenceSession is opened per
 * workflow run and must be released on every exit path.
 *
 * Implementations:
 *   MongoRainfallStore     mongoose, one ClientSession per workflow run
 *   InMemoryRainfallStore  tests and MEMORY mode (no MONGO_URL)
 */

import mongoose, { type ClientSession } from 'mongoose';
import { NotFoundError } from '../../../common/errors.js';
import type { BucketEntry, ForecastMode, TerminalStatus } from '../contracts/rainfall.types.js';
import { RainfallForecastModel, RainfallQueryModel, type QueryStatus } from './rainfall.models.js';

export interface QueryRecord {
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

export interface ForecastRecord {
  type: ForecastMode;
  payload: BucketEntry[];
  createdAt: Date;
}

export interface NewQuery {
  sessionId: string;
  userId: string;
  queryText: string;
}

export interface QueryCompletion {
  responseText: string;
  status: TerminalStatus;
  errorCode?: string;
}

export interface PersistenceSession {
  getQuery(sessionId: string): Promise<QueryRecord | null>;
  /** Terminal write: sets the answer and marks the record completed */
  completeQuery(sessionId: string, completion: QueryCompletion): Promise<void>;
  release(): Promise<void>;
}

export interface PersistenceStore {
  createQuery(input: NewQuery): Promise<QueryRecord>;
  getQuery(sessionId: string): Promise<QueryRecord | null>;
  latestQueryForUser(userId: string): Promise<QueryRecord | null>;
  saveForecast(type: ForecastMode, payload: BucketEntry[]): Promise<ForecastRecord>;
  latestForecast(type: ForecastMode): Promise<ForecastRecord | null>;
  openSession(): Promise<PersistenceSession>;
}

// ═══════════════════════════════════════════════════════════════
// MAPPERS
// ═══════════════════════════════════════════════════════════════

function toQueryRecord(doc: {
  sessionId: string;
  userId: string;
  queryText: string;
  responseText?: string | null;
  responseTime?: Date | null;
  completed: boolean;
  status: QueryStatus;
  errorCode?: string | null;
  createdAt: Date;
}): QueryRecord {
  return {
    sessionId: doc.sessionId,
    userId: doc.userId,
    queryText: doc.queryText,
    responseText: doc.responseText ?? null,
    responseTime: doc.responseTime ?? null,
    completed: doc.completed,
    status: doc.status,
    errorCode: doc.errorCode ?? null,
    createdAt: doc.createdAt,
  };
}

function toForecastRecord(doc: {
  type: ForecastMode;
  payload: ReadonlyArray<{ date: string; rainfall: number }>;
  createdAt: Date;
}): ForecastRecord {
  return {
    type: doc.type,
    payload: doc.payload.map((e) => ({ date: e.date, rainfall: e.rainfall })),
    createdAt: doc.createdAt,
  };
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

class MongoPersistenceSession implements PersistenceSession {
  constructor(private readonly session: ClientSession) {}

  async getQuery(sessionId: string): Promise<QueryRecord | null> {
    const doc = await RainfallQueryModel.findOne({ sessionId }).session(this.session).lean().exec();
    return doc ? toQueryRecord(doc) : null;
  }

  async completeQuery(sessionId: string, completion: QueryCompletion): Promise<void> {
    const result = await RainfallQueryModel.updateOne(
      { sessionId },
      {
        $set: {
          responseText: completion.responseText,
          responseTime: new Date(),
          completed: true,
          status: completion.status,
          errorCode: completion.errorCode ?? null,
        },
      },
    )
      .session(this.session)
      .exec();

    if (result.matchedCount === 0) {
      throw new NotFoundError(`No query record for session ${sessionId}`);
    }
  }

  async release(): Promise<void> {
    await this.session.endSession();
  }
}

export class MongoRainfallStore implements PersistenceStore {
  async createQuery(input: NewQuery): Promise<QueryRecord> {
    const doc = await RainfallQueryModel.create({
      ...input,
      responseText: null,
      responseTime: null,
      completed: false,
      status: 'processing',
      errorCode: null,
      createdAt: new Date(),
    });
    return toQueryRecord(doc);
  }

  async getQuery(sessionId: string): Promise<QueryRecord | null> {
    const doc = await RainfallQueryModel.findOne({ sessionId }).lean().exec();
    return doc ? toQueryRecord(doc) : null;
  }

  async latestQueryForUser(userId: string): Promise<QueryRecord | null> {
    const doc = await RainfallQueryModel.findOne({ userId }).sort({ createdAt: -1 }).lean().exec();
    return doc ? toQueryRecord(doc) : null;
  }

  async saveForecast(type: ForecastMode, payload: BucketEntry[]): Promise<ForecastRecord> {
    const doc = await RainfallForecastModel.create({ type, payload, createdAt: new Date() });
    return toForecastRecord(doc);
  }

  async latestForecast(type: ForecastMode): Promise<ForecastRecord | null> {
    const doc = await RainfallForecastModel.findOne({ type }).sort({ createdAt: -1 }).lean().exec();
    return doc ? toForecastRecord(doc) : null;
  }

  async openSession(): Promise<PersistenceSession> {
    return new MongoPersistenceSession(await mongoose.startSession());
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryRainfallStore implements PersistenceStore {
  private readonly queries = new Map<string, QueryRecord>();
  private readonly forecasts: ForecastRecord[] = [];
  private seq = 0;
  openSessions = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createQuery(input: NewQuery): Promise<QueryRecord> {
    const record: QueryRecord = {
      ...input,
      responseText: null,
      responseTime: null,
      completed: false,
      status: 'processing',
      errorCode: null,
      // Strictly increasing so "latest" is stable within one millisecond
      createdAt: new Date(this.now().getTime() + this.seq++),
    };
    this.queries.set(input.sessionId, record);
    return { ...record };
  }

  async getQuery(sessionId: string): Promise<QueryRecord | null> {
    const record = this.queries.get(sessionId);
    return record ? { ...record } : null;
  }

  async latestQueryForUser(userId: string): Promise<QueryRecord | null> {
    let latest: QueryRecord | null = null;
    for (const record of this.queries.values()) {
      if (record.userId !== userId) continue;
      if (!latest || record.createdAt.getTime() >= latest.createdAt.getTime()) latest = record;
    }
    return latest ? { ...latest } : null;
  }

  async saveForecast(type: ForecastMode, payload: BucketEntry[]): Promise<ForecastRecord> {
    const record: ForecastRecord = {
      type,
      payload: payload.map((e) => ({ ...e })),
      createdAt: new Date(this.now().getTime() + this.seq++),
    };
    this.forecasts.push(record);
    return { ...record, payload: record.payload.map((e) => ({ ...e })) };
  }

  async latestForecast(type: ForecastMode): Promise<ForecastRecord | null> {
    for (let i = this.forecasts.length - 1; i >= 0; i--) {
      const record = this.forecasts[i];
      if (record.type === type) return { ...record, payload: record.payload.map((e) => ({ ...e })) };
    }
    return null;
  }

  async openSession(): Promise<PersistenceSession> {
    this.openSessions++;
    let released = false;
    return {
      getQuery: (sessionId) => this.getQuery(sessionId),
      completeQuery: async (sessionId, completion) => {
        const record = this.queries.get(sessionId);
        if (!record) {
          throw new NotFoundError(`No query record for session ${sessionId}`);
        }
        this.queries.set(sessionId, {
          ...record,
          responseText: completion.responseText,
          responseTime: this.now(),
          completed: true,
          status: completion.status,
          errorCode: completion.errorCode ?? null,
        });
      },
      release: async () => {
        if (released) return;
        released = true;
        this.openSessions--;
      },
    };
  }
}
