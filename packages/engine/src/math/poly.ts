export type PeriodicTerm = {
  a: number; // amplitude
  b: number; // phase, radians
  c: number; // frequency, radians per millennium
};

/**
 * Evaluate polynomial c0 + c1*t + c2*t^2 + ...
 */
export function evalPoly(coeffs: readonly number[], t: number): number {
  // Horner's method
  let acc = 0;
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = acc * t + (coeffs[i] ?? 0);
  }
  return acc;
}

export function sumPeriodicTerms(terms: readonly PeriodicTerm[], t: number): number {
  let sum = 0;
  for (const term of terms) {
    sum += term.a * Math.cos(term.b + term.c * t);
  }
  return sum;
}

/**
 * Polynomial in t whose i-th coefficient is the periodic-term sum of group i.
 * Accumulates group by group with t^i, lowest order first.
 */
export function evalPeriodicSeries(groups: readonly (readonly PeriodicTerm[])[], t: number): number {
  let sum = 0;
  groups.forEach((terms, i) => {
    sum += sumPeriodicTerms(terms, t) * t ** i;
  });
  return sum;
}
