/**
 * Exact binomial tail
 * ===================
 * Evaluated in log space so large bet counts do not underflow.
 */

function logFactorials(n: number): Float64Array {
  const table = new Float64Array(n + 1);
  for (let i = 2; i <= n; i++) {
    table[i] = table[i - 1] + Math.log(i);
  }
  return table;
}

/**
 * One-sided exact test: P(X >= successes) for X ~ Binomial(trials, p)
 */
export function binomialUpperTail(successes: number, trials: number, p: number): number {
  if (!Number.isInteger(successes) || !Number.isInteger(trials) || trials < 0) {
    throw new RangeError(`Invalid binomial arguments: ${successes} of ${trials}`);
  }
  if (!(p > 0 && p < 1)) {
    throw new RangeError(`Success probability must be in (0, 1), got ${p}`);
  }
  if (successes <= 0) return 1;
  if (successes > trials) return 0;

  const logF = logFactorials(trials);
  const logP = Math.log(p);
  const logQ = Math.log1p(-p);
  const logTerms = new Float64Array(trials - successes + 1);
  let max = -Infinity;
  for (let k = successes; k <= trials; k++) {
    const logChoose = logF[trials] - logF[k] - logF[trials - k];
    const term = logChoose + k * logP + (trials - k) * logQ;
    logTerms[k - successes] = term;
    if (term > max) max = term;
  }

  let total = 0;
  for (const term of logTerms) total += Math.exp(term - max);
  return Math.min(1, Math.exp(max) * total);
}
