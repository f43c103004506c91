/**
 * Wilson score interval for a binomial proportion
 */

/**
 * Standard normal quantile (Acklam's rational approximation, relative error < 1.2e-9)
 */
export function normalQuantile(p: number): number {
  if (!(p > 0 && p < 1)) {
    throw new RangeError(`Quantile probability must be in (0, 1), got ${p}`);
  }
  const a = [
    -39.69683028665376,
    220.9460984245205,
    -275.9285104469687,
    138.357751867269,
    -30.66479806614716,
    2.506628277459239,
  ];
  const b = [
    -54.47609879822406,
    161.5858368580409,
    -155.6989798598866,
    66.80131188771972,
    -13.28068155288572,
  ];
  const c = [
    -0.007784894002430293,
    -0.3223964580411365,
    -2.400758277161838,
    -2.549732539343734,
    4.374664141464968,
    2.938163982698783,
  ];
  const d = [
    0.007784695709041462,
    0.3224671290700398,
    2.445134137142996,
    3.754408661907416,
  ];
  const low = 0.02425;

  const tail = (q: number): number => {
    const u = Math.sqrt(-2 * Math.log(q));
    return (
      (((((c[0] * u + c[1]) * u + c[2]) * u + c[3]) * u + c[4]) * u + c[5]) /
      ((((d[0] * u + d[1]) * u + d[2]) * u + d[3]) * u + 1)
    );
  };

  if (p < low) return tail(p);
  if (p > 1 - low) return -tail(1 - p);

  const q = p - 0.5;
  const r = q * q;
  return (
    ((((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q) /
    (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1)
  );
}

/**
 * Two-sided Wilson interval at the given confidence level.
 * Bounds are clamped to [0, 1] and always bracket the observed rate.
 */
export function wilsonInterval(
  successes: number,
  total: number,
  confidence: number = 0.95
): [number, number] | null {
  if (total === 0) return null;

  const z = normalQuantile(1 - (1 - confidence) / 2);
  const p = successes / total;
  const n = total;
  const denominator = 1 + (z * z) / n;
  const centre = p + (z * z) / (2 * n);
  const adjustment = z * Math.sqrt((p * (1 - p) + (z * z) / (4 * n)) / n);

  return [
    Math.min(p, Math.max(0, (centre - adjustment) / denominator)),
    Math.max(p, Math.min(1, (centre + adjustment) / denominator)),
  ];
}
