/**
 * RAINFALL — Language Model Capability
 * ====================================
 *
 * Narrow text-in / text-out contract used by intent classification and
 * interpretation. Gemini backs it in production; tests inject fakes.
 */

import { GoogleGenAI } from '@google/genai';
import { CapabilityError, describeError } from '../../../common/errors.js';

export interface GenerateOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LanguageModel {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CapabilityError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** First `{` to last `}`: models often wrap JSON in prose or code fences */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new CapabilityError('Model response contains no JSON object');
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new CapabilityError(`Model response is not valid JSON: ${describeError(err)}`);
  }
}

export interface GeminiConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class GeminiLanguageModel implements LanguageModel {
  private readonly ai: GoogleGenAI | null;

  constructor(private readonly config: GeminiConfig) {
    this.ai = config.apiKey ? new GoogleGenAI({ apiKey: config.apiKey }) : null;
  }

  get configured(): boolean {
    return this.ai !== null;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (!this.ai) {
      throw new CapabilityError('Language model is not configured (GEMINI_API_KEY missing)');
    }

    let text: string | undefined;
    try {
      const response = await withTimeout(
        this.ai.models.generateContent({
          model: this.config.model,
          contents: prompt,
          config: {
            systemInstruction: options.system,
            temperature: options.temperature,
            maxOutputTokens: options.maxTokens,
          },
        }),
        this.config.timeoutMs,
        'Language model call',
      );
      text = response.text;
    } catch (err) {
      if (err instanceof CapabilityError) throw err;
      throw new CapabilityError(`Language model call failed: ${describeError(err)}`);
    }

    if (!text || !text.trim()) {
      throw new CapabilityError('Language model returned an empty response');
    }
    return text;
  }
}
