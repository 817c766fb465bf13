/**
 * RAINFALL — Interpretation Service
 * =================================
 *
 * Turns the dated forecast into the chat answer. The language model writes
 * a short summary with recommendations; without it the answer is a fixed
 * textual rendering of the same numbers.
 */

import { describeError } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/logger.js';
import type { DatedForecast, ForecastIntent } from '../contracts/rainfall.types.js';
import type { LanguageModel } from '../llm/language.model.js';

const SYSTEM_PROMPT = 'You are a helpful weather prediction assistant.';

// Daily rainfall (mm) counted as a wet day
const WET_DAY_MM = 1;

function buildPrompt(intent: ForecastIntent, forecast: DatedForecast): string {
  return [
    'You are an expert meteorologist and agricultural advisor.',
    '',
    `The ${intent.mode} rainfall forecast for location (lat=${intent.latitude}, lon=${intent.longitude}) is:`,
    JSON.stringify(forecast.entries, null, 2),
    '',
    'Please produce a concise, human-friendly interpretation that includes:',
    '1) A 2-3 sentence summary of the rainfall expectation (e.g., number of wet days, heavy rainfall risk)',
    '2) 3 short, actionable recommendations for farmers/water managers (use bullet points)',
    'Keep it short and direct.',
  ].join('\n');
}

export function describeForecast(intent: ForecastIntent, forecast: DatedForecast): string {
  const unit = intent.mode === 'daily' ? 'day' : 'month';
  const lines = forecast.entries.map((e) => `- ${e.date}: ${e.rainfall.toFixed(2)} mm`);
  const total = forecast.entries.reduce((sum, e) => sum + e.rainfall, 0);
  const peak = forecast.entries.reduce((best, e) => (e.rainfall > best.rainfall ? e : best), forecast.entries[0] ?? { date: '-', rainfall: 0 });

  const summary =
    intent.mode === 'daily'
      ? `${forecast.entries.filter((e) => e.rainfall >= WET_DAY_MM).length} of ${forecast.entries.length} ${forecast.entries.length === 1 ? 'day is' : 'days are'} expected to be wet`
      : `Average expected rainfall is ${(total / Math.max(1, forecast.entries.length)).toFixed(2)} mm per ${unit}`;

  return [
    `Rainfall forecast (${intent.mode}) for lat ${intent.latitude}, lon ${intent.longitude}:`,
    ...lines,
    `${summary}; the highest value is ${peak.rainfall.toFixed(2)} mm on ${peak.date}.`,
  ].join('\n');
}

export class InterpretationService {
  private readonly logger: Logger;

  constructor(
    private readonly llm: LanguageModel,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async interpret(intent: ForecastIntent, forecast: DatedForecast): Promise<string> {
    try {
      const text = await this.llm.generate(buildPrompt(intent, forecast), {
        system: SYSTEM_PROMPT,
        temperature: 0.6,
        maxTokens: 400,
      });
      return text.trim();
    } catch (err) {
      this.logger.warn({ error: describeError(err), mode: intent.mode }, 'Interpretation model unavailable, using plain summary');
      return describeForecast(intent, forecast);
    }
  }
}
