/**
 * Point predictors exported from the offline training run.
 * Pure TypeScript inference: one scaled feature row in, one scaled value out.
 */

import { ValidationError } from '../../../common/errors.js';

export interface Predictor {
  readonly kind: 'linear' | 'mlp';
  readonly inputWidth: number;
  predict(row: readonly number[]): number | Promise<number>;
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function checkInput(row: readonly number[], width: number): void {
  if (row.length !== width) {
    throw new ValidationError(`Predictor expects ${width} inputs, got ${row.length}`);
  }
  if (row.some((v) => !Number.isFinite(v))) {
    throw new ValidationError('Predictor input contains non-finite values');
  }
}

export interface LinearParams {
  weights: readonly number[];
  bias: number;
}

export class LinearPredictor implements Predictor {
  readonly kind = 'linear' as const;
  readonly inputWidth: number;
  private readonly weights: readonly number[];
  private readonly bias: number;

  constructor(params: LinearParams) {
    this.weights = [...params.weights];
    this.bias = params.bias;
    this.inputWidth = this.weights.length;
  }

  predict(row: readonly number[]): number {
    checkInput(row, this.inputWidth);
    return dot(this.weights, row) + this.bias;
  }
}

export type Activation = 'linear' | 'relu' | 'tanh' | 'sigmoid';

export interface DenseLayer {
  /** weights[unit][input] */
  weights: readonly (readonly number[])[];
  bias: readonly number[];
  activation: Activation;
}

function activate(z: number, fn: Activation): number {
  switch (fn) {
    case 'relu':
      return z > 0 ? z : 0;
    case 'tanh':
      return Math.tanh(z);
    case 'sigmoid':
      // Numeric stability
      if (z >= 0) return 1 / (1 + Math.exp(-z));
      return Math.exp(z) / (1 + Math.exp(z));
    case 'linear':
      return z;
  }
}

export class DensePredictor implements Predictor {
  readonly kind = 'mlp' as const;
  readonly inputWidth: number;
  private readonly layers: readonly DenseLayer[];

  constructor(layers: readonly DenseLayer[]) {
    if (layers.length === 0) {
      throw new ValidationError('MLP needs at least one layer');
    }
    let width = layers[0].weights[0]?.length ?? 0;
    this.inputWidth = width;
    for (const [idx, layer] of layers.entries()) {
      if (layer.weights.length !== layer.bias.length) {
        throw new ValidationError(`Layer ${idx}: ${layer.weights.length} units but ${layer.bias.length} biases`);
      }
      if (layer.weights.some((unit) => unit.length !== width)) {
        throw new ValidationError(`Layer ${idx}: expected ${width} inputs per unit`);
      }
      width = layer.weights.length;
    }
    if (width !== 1) {
      throw new ValidationError(`MLP output layer must have 1 unit, has ${width}`);
    }
    this.layers = layers;
  }

  predict(row: readonly number[]): number {
    checkInput(row, this.inputWidth);
    let x: readonly number[] = row;
    for (const layer of this.layers) {
      x = layer.weights.map((unit, u) => activate(dot(unit, x) + layer.bias[u], layer.activation));
    }
    return x[0];
  }
}
