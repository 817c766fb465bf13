/**
 * RAINFALL — Intent Classifier
 * ============================
 *
 * Asks the language model for { mode, confidence, explanation, horizon,
 * coordinates }. Whenever the model cannot answer (not configured, error,
 * timeout, unparsable output) the keyword rule decides instead:
 *   query contains "month" → monthly, otherwise daily; confidence 0.3.
 */

import { z } from 'zod';
import { ValidationError, describeError } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { ForecastMode, Intent, IntentMode } from '../contracts/rainfall.types.js';
import { KEYWORD_FALLBACK_CONFIDENCE, MAX_HORIZON } from '../rainfall.constants.js';
import { extractJsonObject, type LanguageModel } from '../llm/language.model.js';

export interface IntentDefaults {
  latitude: number;
  longitude: number;
  dailyHorizon: number;
  monthlyHorizon: number;
}

const ModelIntentSchema = z.object({
  mode: z
    .string()
    .transform((m) => m.trim().toLowerCase())
    .pipe(z.enum(['daily', 'monthly', 'unrelated'])),
  confidence: z.coerce.number().min(0).max(1).catch(0.5),
  explanation: z.string().catch('No explanation given.'),
  days: z.coerce.number().int().positive().optional().catch(undefined),
  months: z.coerce.number().int().positive().optional().catch(undefined),
  latitude: z.coerce.number().min(-90).max(90).optional().catch(undefined),
  longitude: z.coerce.number().min(-180).max(180).optional().catch(undefined),
});

type ModelIntent = z.infer<typeof ModelIntentSchema>;

const SYSTEM_PROMPT = [
  'You are a weather intent classifier for a rainfall forecasting service.',
  'Classify the user query as "daily", "monthly" or "unrelated".',
  'Rules:',
  '- "today", "tomorrow", "next 5 days", "this week" => daily',
  '- "this month", "next month", "monthly", "next 3 months" => monthly',
  '- anything that is not a rainfall forecast request => unrelated',
  'If the query names a number of days or months, return it as "days" or "months".',
  'If the query names coordinates, return them as "latitude" and "longitude".',
  'Respond ONLY with a JSON object:',
  '{ "mode": "daily|monthly|unrelated", "confidence": 0.0, "explanation": "reason", "days": 7, "months": 3 }',
].join('\n');

const KEYWORD_EXPLANATION: Record<ForecastMode, string> = {
  daily: "Keyword fallback: no 'month' in query",
  monthly: "Keyword fallback: query mentions 'month'",
};

function clampHorizon(mode: ForecastMode, requested: number | undefined, fallback: number): number {
  const value = requested ?? fallback;
  return Math.min(Math.max(1, Math.round(value)), MAX_HORIZON[mode]);
}

export function keywordMode(query: string): ForecastMode {
  return query.toLowerCase().includes('month') ? 'monthly' : 'daily';
}

export class IntentClassifier {
  private readonly logger: Logger;

  constructor(
    private readonly llm: LanguageModel,
    private readonly defaults: IntentDefaults,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async classify(query: string): Promise<Intent> {
    const text = query.trim();
    if (!text) {
      throw new ValidationError('Query text is empty');
    }

    let parsed: ModelIntent;
    try {
      const raw = await this.llm.generate(`User Query: ${text}`, {
        system: SYSTEM_PROMPT,
        temperature: 0,
        maxTokens: 160,
      });
      const result = ModelIntentSchema.safeParse(extractJsonObject(raw));
      if (!result.success) {
        throw new Error(`unexpected intent shape: ${result.error.issues[0]?.message ?? 'unknown'}`);
      }
      parsed = result.data;
    } catch (err) {
      this.logger.warn({ error: describeError(err) }, 'Intent model unavailable, using keyword fallback');
      return this.fromKeywords(text);
    }

    const intent = this.build(parsed.mode, {
      confidence: parsed.confidence,
      explanation: parsed.explanation,
      days: parsed.days,
      months: parsed.months,
      latitude: parsed.latitude,
      longitude: parsed.longitude,
    });
    this.logger.info({ mode: intent.mode, confidence: intent.confidence, horizon: intent.horizon }, 'Intent classified');
    return intent;
  }

  fromKeywords(query: string): Intent {
    const mode = keywordMode(query);
    return Object.freeze({
      mode,
      horizon: mode === 'daily' ? this.defaults.dailyHorizon : this.defaults.monthlyHorizon,
      latitude: this.defaults.latitude,
      longitude: this.defaults.longitude,
      confidence: KEYWORD_FALLBACK_CONFIDENCE,
      source: 'keyword',
      explanation: KEYWORD_EXPLANATION[mode],
    } satisfies Intent);
  }

  private build(
    mode: IntentMode,
    fields: {
      confidence: number;
      explanation: string;
      days?: number;
      months?: number;
      latitude?: number;
      longitude?: number;
    },
  ): Intent {
    const horizon =
      mode === 'monthly'
        ? clampHorizon('monthly', fields.months, this.defaults.monthlyHorizon)
        : clampHorizon('daily', fields.days, this.defaults.dailyHorizon);

    return Object.freeze({
      mode,
      horizon,
      latitude: fields.latitude ?? this.defaults.latitude,
      longitude: fields.longitude ?? this.defaults.longitude,
      confidence: fields.confidence,
      source: 'model',
      explanation: fields.explanation,
    } satisfies Intent);
  }
}
