/**
 * Column-wise scalers fitted offline.
 * Both are invertible over the full window width (features + target).
 */

import { ValidationError } from '../../../common/errors.js';

export interface Scaler {
  readonly kind: 'minmax' | 'standard';
  readonly width: number;
  transform(rows: readonly (readonly number[])[]): number[][];
  inverse(rows: readonly (readonly number[])[]): number[][];
}

function checkWidth(rows: readonly (readonly number[])[], width: number): void {
  for (const row of rows) {
    if (row.length !== width) {
      throw new ValidationError(`Scaler expects ${width} columns, got ${row.length}`);
    }
  }
}

export interface MinMaxParams {
  dataMin: readonly number[];
  dataMax: readonly number[];
  featureRange: readonly [number, number];
}

export class MinMaxScaler implements Scaler {
  readonly kind = 'minmax' as const;
  readonly width: number;
  private readonly min: readonly number[];
  private readonly range: readonly number[];
  private readonly lo: number;
  private readonly span: number;

  constructor(params: MinMaxParams) {
    if (params.dataMin.length !== params.dataMax.length) {
      throw new ValidationError('dataMin and dataMax must have the same length');
    }
    this.width = params.dataMin.length;
    this.min = [...params.dataMin];
    // constant columns scale by 1
    this.range = params.dataMax.map((max, i) => max - params.dataMin[i] || 1);
    this.lo = params.featureRange[0];
    this.span = params.featureRange[1] - params.featureRange[0];
  }

  transform(rows: readonly (readonly number[])[]): number[][] {
    checkWidth(rows, this.width);
    return rows.map((row) => row.map((v, j) => ((v - this.min[j]) / this.range[j]) * this.span + this.lo));
  }

  inverse(rows: readonly (readonly number[])[]): number[][] {
    checkWidth(rows, this.width);
    return rows.map((row) => row.map((v, j) => ((v - this.lo) / this.span) * this.range[j] + this.min[j]));
  }
}

export interface StandardParams {
  mean: readonly number[];
  std: readonly number[];
}

export class StandardScaler implements Scaler {
  readonly kind = 'standard' as const;
  readonly width: number;
  private readonly mean: readonly number[];
  private readonly std: readonly number[];

  constructor(params: StandardParams) {
    if (params.mean.length !== params.std.length) {
      throw new ValidationError('mean and std must have the same length');
    }
    this.width = params.mean.length;
    this.mean = [...params.mean];
    this.std = params.std.map((s) => s || 1);
  }

  transform(rows: readonly (readonly number[])[]): number[][] {
    checkWidth(rows, this.width);
    return rows.map((row) => row.map((v, j) => (v - this.mean[j]) / this.std[j]));
  }

  inverse(rows: readonly (readonly number[])[]): number[][] {
    checkWidth(rows, this.width);
    return rows.map((row) => row.map((v, j) => v * this.std[j] + this.mean[j]));
  }
}
