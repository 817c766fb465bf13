/**
 * Trailing-window statistics shared by feature engineering and the
 * autoregressive loop, so both compute rolling features identically.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Sample standard deviation (n - 1 denominator) */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) ** 2;
  return Math.sqrt(sq / (values.length - 1));
}

function trailing(
  values: ReadonlyArray<number | null>,
  span: number,
  stat: (window: readonly number[]) => number,
): Array<number | null> {
  return values.map((_, i) => {
    if (i + 1 < span) return null;
    const window: number[] = [];
    for (let j = i - span + 1; j <= i; j++) {
      const v = values[j];
      if (v === null) return null;
      window.push(v);
    }
    const out = stat(window);
    return Number.isFinite(out) ? out : null;
  });
}

export function rollingMean(values: ReadonlyArray<number | null>, span: number): Array<number | null> {
  return trailing(values, span, mean);
}

export function rollingStd(values: ReadonlyArray<number | null>, span: number): Array<number | null> {
  return trailing(values, span, sampleStd);
}
