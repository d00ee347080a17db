import { describe, expect, it } from "vitest";
import {
  dayFractionToLocalHours,
  limitDegrees,
  limitDegrees180,
  limitDegrees180pm,
  limitMinutes,
  limitZeroToOne,
} from "../src/math/angles";
import { evalPeriodicSeries, evalPoly, sumPeriodicTerms } from "../src/math/poly";

function evalPolyNaive(coeffs: readonly number[], t: number): number {
  return coeffs.reduce((sum, c, i) => sum + c * t ** i, 0);
}

function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

describe("evalPoly", () => {
  it("evaluates known polynomials correctly", () => {
    expect(evalPoly([], 3)).toBe(0);
    expect(evalPoly([7], -100)).toBe(7);
    expect(evalPoly([2, -3, 5], 2)).toBe(16); // 2 - 6 + 20
    expect(evalPoly([1, 2, 3, 4], -1)).toBe(-2); // 1 - 2 + 3 - 4
  });

  it("matches naive polynomial evaluation for deterministic random vectors", () => {
    const rand = createRng(0x5eeda11);

    for (let n = 0; n < 200; n++) {
      const degree = 1 + Math.floor(rand() * 10);
      const coeffs = Array.from({ length: degree }, () => rand() * 20 - 10);
      const t = rand() * 2 - 1;
      expect(evalPoly(coeffs, t)).toBeCloseTo(evalPolyNaive(coeffs, t), 10);
    }
  });
});

describe("periodic series", () => {
  it("sums amplitude * cos(phase + frequency * t)", () => {
    expect(sumPeriodicTerms([], 4)).toBe(0);
    expect(sumPeriodicTerms([{ a: 1, b: Math.PI, c: 0 }], 5)).toBe(-1);
    expect(
      sumPeriodicTerms(
        [
          { a: 3, b: 0, c: 0 },
          { a: 2, b: 0, c: Math.PI / 2 },
        ],
        2,
      ),
    ).toBeCloseTo(1, 12); // 3 + 2*cos(pi)
  });

  it("weights group i by t^i", () => {
    const groups = [[{ a: 2, b: 0, c: 0 }], [{ a: 3, b: 0, c: 0 }], [{ a: 0.5, b: 0, c: 0 }]];
    expect(evalPeriodicSeries(groups, 2)).toBe(10); // 2 + 3*2 + 0.5*4
    expect(evalPeriodicSeries(groups, 0)).toBe(2);
  });
});

describe("angle limits", () => {
  it("wraps known values", () => {
    expect(limitDegrees(370)).toBeCloseTo(10, 10);
    expect(limitDegrees(-90)).toBeCloseTo(270, 10);
    expect(limitDegrees(720)).toBe(0);
    expect(limitDegrees(123.5)).toBe(123.5);

    expect(limitDegrees180pm(190)).toBeCloseTo(-170, 10);
    expect(limitDegrees180pm(-190)).toBeCloseTo(170, 10);
    expect(limitDegrees180pm(180)).toBe(180);
    expect(limitDegrees180pm(-180)).toBe(180);
    expect(limitDegrees180pm(540)).toBe(180);

    expect(limitDegrees180(200)).toBeCloseTo(20, 10);
    expect(limitDegrees180(-30)).toBeCloseTo(150, 10);

    expect(limitZeroToOne(1.25)).toBe(0.25);
    expect(limitZeroToOne(-0.25)).toBe(0.75);
  });

  it("keeps tiny negatives inside the half-open range", () => {
    expect(limitDegrees(-1e-17)).toBeGreaterThanOrEqual(0);
    expect(limitDegrees(-1e-17)).toBeLessThan(360);
    expect(limitDegrees180(-1e-17)).toBeLessThan(180);
    expect(limitZeroToOne(-1e-17)).toBeLessThan(1);
  });

  it("is idempotent and range-bounded for deterministic random inputs", () => {
    const rand = createRng(0x0a11e5);

    for (let i = 0; i < 500; i++) {
      const x = (rand() - 0.5) * 1e5;

      const w = limitDegrees(x);
      expect(limitDegrees(w)).toBe(w);
      expect(w).toBeGreaterThanOrEqual(0);
      expect(w).toBeLessThan(360);

      const pm = limitDegrees180pm(x);
      expect(limitDegrees180pm(pm)).toBe(pm);
      expect(pm).toBeGreaterThan(-180);
      expect(pm).toBeLessThanOrEqual(180);

      const half = limitDegrees180(x);
      expect(half).toBeGreaterThanOrEqual(0);
      expect(half).toBeLessThan(180);

      const frac = limitZeroToOne(x / 360);
      expect(frac).toBeGreaterThanOrEqual(0);
      expect(frac).toBeLessThan(1);
    }
  });

  it("pulls minutes back by a day outside (-20, 20)", () => {
    expect(limitMinutes(5)).toBe(5);
    expect(limitMinutes(-20)).toBe(-20);
    expect(limitMinutes(20)).toBe(20);
    expect(limitMinutes(-1430)).toBe(10);
    expect(limitMinutes(1435)).toBe(-5);
  });

  it("converts day fractions to local hours", () => {
    expect(dayFractionToLocalHours(0.5, 0)).toBe(12);
    expect(dayFractionToLocalHours(0.5, -4)).toBeCloseTo(8, 12);
    expect(dayFractionToLocalHours(0.9, 5)).toBeCloseTo(2.6, 12);
  });
});
