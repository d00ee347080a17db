import { z } from "zod";
import nutationTerms from "../data/nutation_terms.json";

export type NutationTerm = {
  // Integer multipliers of D, M, M', F, Omega
  yd: number;
  ym: number;
  ymPrime: number;
  yf: number;
  yOmega: number;

  // Longitude: (a + b*JCE) * sin, obliquity: (c + d*JCE) * cos, 0.0001 arcsec
  a: number;
  b: number;
  c: number;
  d: number;
};

const NutationTermsSchema = z
  .object({
    multipliers: z.array(z.tuple([z.number(), z.number(), z.number(), z.number(), z.number()])),
    coefficients: z.array(z.tuple([z.number(), z.number(), z.number(), z.number()])),
  })
  .refine((t) => t.multipliers.length === t.coefficients.length, {
    message: "multipliers and coefficients must pair by index",
  });

const parsed = NutationTermsSchema.parse(nutationTerms);

export const NUTATION_TERMS: readonly NutationTerm[] = parsed.multipliers.map(
  ([yd, ym, ymPrime, yf, yOmega], i) => {
    const [a, b, c, d] = parsed.coefficients[i] ?? [0, 0, 0, 0];
    return Object.freeze({ yd, ym, ymPrime, yf, yOmega, a, b, c, d });
  },
);
