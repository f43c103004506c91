/**
 * Family-wise significance threshold: alpha split evenly across the hypotheses tested
 */
export function bonferroniThreshold(alpha: number, hypotheses: number): number {
  return alpha / Math.max(1, hypotheses);
}
