/**
 * RAINFALL — Forecast Publisher
 * =============================
 *
 * Posts one bucketed payload to a chart sink.
 * - Transport failures (timeout, connection errors): retried, same payload
 * - Non-2xx response: failed immediately
 * - Wrong bucket size: rejected before the first attempt
 */

import axios from 'axios';
import {
  AppError,
  PersistentPublishError,
  TransientPublishError,
  ValidationError,
  describeError,
} from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { BucketedForecast, PublishOutcome, PublishSink } from '../contracts/rainfall.types.js';
import { BUCKET_SIZE } from '../rainfall.constants.js';

export interface HttpPoster {
  post(
    url: string,
    data: unknown,
    config: {
      timeout: number;
      headers: Record<string, string>;
      validateStatus: (status: number) => boolean;
    },
  ): Promise<{ status: number; data: unknown }>;
}

export interface PublisherConfig {
  maxAttempts?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSPORT_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** No response received: the request may never have reached the sink */
export function isTransportFailure(err: unknown): boolean {
  if (axios.isAxiosError(err)) return err.response === undefined;
  const code = errorCode(err);
  return code !== undefined && TRANSPORT_CODES.has(code);
}

export function sinkUrls(baseUrl: string): Record<'daily' | 'monthly', PublishSink> {
  const base = baseUrl.replace(/\/+$/, '');
  return {
    daily: { mode: 'daily', url: `${base}/api/rainfall/daily-forecast` },
    monthly: { mode: 'monthly', url: `${base}/api/rainfall/monthly-forecast` },
  };
}

export class ForecastPublisher {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly http: HttpPoster,
    config: PublisherConfig = {},
  ) {
    this.maxAttempts = config.maxAttempts ?? 3;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.retryDelayMs = config.retryDelayMs ?? 500;
    this.logger = config.logger ?? defaultLogger;
    this.sleep = config.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async publish(bucket: BucketedForecast, sink: PublishSink): Promise<PublishOutcome> {
    const expected = BUCKET_SIZE[bucket.mode];
    if (sink.mode !== bucket.mode) {
      throw new ValidationError(`Cannot publish a ${bucket.mode} bucket to the ${sink.mode} sink`);
    }
    if (bucket.entries.length !== expected) {
      throw new ValidationError(`A ${bucket.mode} bucket needs ${expected} entries, got ${bucket.entries.length}`);
    }

    // Frozen once: every attempt sends the same body
    const payload = Object.freeze(bucket.entries.map((e) => Object.freeze({ ...e })));
    let lastError: AppError | undefined;
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt++;
      try {
        const res = await this.http.post(sink.url, payload, {
          timeout: this.timeoutMs,
          headers: { 'Content-Type': 'application/json' },
          validateStatus: () => true,
        });

        if (res.status >= 200 && res.status < 300) {
          this.logger.info({ sink: sink.url, attempt, mode: bucket.mode }, 'Forecast published');
          return { status: 'success', attempts: attempt, httpStatus: res.status };
        }

        const err = new PersistentPublishError(`Sink responded with HTTP ${res.status}`, res.status);
        this.logger.error({ sink: sink.url, status: res.status, attempt }, 'Publish rejected (no retry)');
        return { status: 'failed', attempts: attempt, httpStatus: res.status, error: err.message, errorCode: err.code };
      } catch (err) {
        if (!isTransportFailure(err)) {
          const failure = new PersistentPublishError(describeError(err));
          this.logger.error({ sink: sink.url, attempt, error: failure.message }, 'Publish failed (no retry)');
          return { status: 'failed', attempts: attempt, error: failure.message, errorCode: failure.code };
        }

        lastError = new TransientPublishError(describeError(err));
        if (attempt < this.maxAttempts) {
          const delay = this.retryDelayMs * 2 ** (attempt - 1);
          this.logger.warn({ sink: sink.url, attempt, delay, error: lastError.message }, 'Publish transport failure, retrying');
          await this.sleep(delay);
        }
      }
    }

    this.logger.error({ sink: sink.url, attempts: attempt, error: lastError?.message }, 'Publish failed after retries');
    return {
      status: 'failed',
      attempts: attempt,
      error: lastError?.message ?? 'publish failed',
      errorCode: lastError?.code ?? 'TRANSIENT_PUBLISH_ERROR',
    };
  }
}
