/**
 * MODEL ARTIFACT REGISTRY
 *
 * Loads the predictor + scaler pair for a mode from MODEL_DIR once and
 * shares it read-only for the process lifetime. A failed load is not cached,
 * so the next session tries again.
 *
 * Files:
 *   rainfall-<mode>.model.json   { kind: 'linear' | 'mlp', ... }
 *   rainfall-<mode>.scaler.json  { kind: 'minmax' | 'standard', ... }
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ArtifactLoadError, AppError, describeError } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import type { ForecastMode } from '../contracts/rainfall.types.js';
import { WINDOW_COLUMNS } from '../rainfall.constants.js';
import { DensePredictor, LinearPredictor, type Predictor } from './predictor.model.js';
import { MinMaxScaler, StandardScaler, type Scaler } from './scaler.js';

const finite = z.number().finite();

const ModelFileSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('linear'),
    version: z.string().optional(),
    weights: z.array(finite).min(1),
    bias: finite,
  }),
  z.object({
    kind: z.literal('mlp'),
    version: z.string().optional(),
    layers: z
      .array(
        z.object({
          weights: z.array(z.array(finite).min(1)).min(1),
          bias: z.array(finite).min(1),
          activation: z.enum(['linear', 'relu', 'tanh', 'sigmoid']),
        }),
      )
      .min(1),
  }),
]);

const ScalerFileSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('minmax'),
    dataMin: z.array(finite).min(1),
    dataMax: z.array(finite).min(1),
    featureRange: z.tuple([finite, finite]).default([0, 1]),
  }),
  z.object({
    kind: z.literal('standard'),
    mean: z.array(finite).min(1),
    std: z.array(finite).min(1),
  }),
]);

export interface ModelArtifacts {
  readonly mode: ForecastMode;
  readonly predictor: Predictor;
  readonly scaler: Scaler;
  readonly version: string;
  readonly loadedAt: string;
}

export interface ArtifactSource {
  get(mode: ForecastMode): Promise<ModelArtifacts>;
}

export function artifactPaths(modelDir: string, mode: ForecastMode): { model: string; scaler: string } {
  return {
    model: path.join(modelDir, `rainfall-${mode}.model.json`),
    scaler: path.join(modelDir, `rainfall-${mode}.scaler.json`),
  };
}

async function readJson(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (err) {
    throw new ArtifactLoadError(`Cannot read ${file}: ${describeError(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ArtifactLoadError(`Invalid JSON in ${file}: ${describeError(err)}`);
  }
}

export function buildPredictor(input: unknown): { predictor: Predictor; version: string } {
  const parsed = ModelFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ArtifactLoadError(`Invalid model artifact: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  const file = parsed.data;
  try {
    const predictor =
      file.kind === 'linear'
        ? new LinearPredictor({ weights: file.weights, bias: file.bias })
        : new DensePredictor(file.layers);
    return { predictor, version: file.version ?? 'unversioned' };
  } catch (err) {
    throw new ArtifactLoadError(`Invalid model artifact: ${describeError(err)}`);
  }
}

export function buildScaler(input: unknown): Scaler {
  const parsed = ScalerFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ArtifactLoadError(`Invalid scaler artifact: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  const file = parsed.data;
  try {
    return file.kind === 'minmax'
      ? new MinMaxScaler({ dataMin: file.dataMin, dataMax: file.dataMax, featureRange: file.featureRange })
      : new StandardScaler({ mean: file.mean, std: file.std });
  } catch (err) {
    throw new ArtifactLoadError(`Invalid scaler artifact: ${describeError(err)}`);
  }
}

export class ArtifactRegistry implements ArtifactSource {
  private cache = new Map<ForecastMode, Promise<ModelArtifacts>>();

  constructor(
    private readonly modelDir: string,
    private readonly logger: Logger,
  ) {}

  get(mode: ForecastMode): Promise<ModelArtifacts> {
    const cached = this.cache.get(mode);
    if (cached) return cached;

    const loading = this.load(mode).catch((err: unknown) => {
      this.cache.delete(mode);
      throw err instanceof AppError ? err : new ArtifactLoadError(describeError(err));
    });
    this.cache.set(mode, loading);
    return loading;
  }

  private async load(mode: ForecastMode): Promise<ModelArtifacts> {
    const files = artifactPaths(this.modelDir, mode);
    const [modelJson, scalerJson] = await Promise.all([readJson(files.model), readJson(files.scaler)]);

    const { predictor, version } = buildPredictor(modelJson);
    const scaler = buildScaler(scalerJson);

    const width = WINDOW_COLUMNS.length;
    if (scaler.width !== width) {
      throw new ArtifactLoadError(`Scaler for ${mode} covers ${scaler.width} columns, window has ${width}`);
    }
    if (predictor.inputWidth !== width) {
      throw new ArtifactLoadError(`Predictor for ${mode} takes ${predictor.inputWidth} inputs, window has ${width}`);
    }

    this.logger.info({ mode, version, predictor: predictor.kind, scaler: scaler.kind }, 'Model artifacts loaded');

    return Object.freeze({
      mode,
      predictor,
      scaler,
      version,
      loadedAt: new Date().toISOString(),
    });
  }
}
