import { z } from "zod";
import earthPeriodicTerms from "../data/earth_periodic_terms.json";
import type { PeriodicTerm } from "../math/poly";

/**
 * Truncated VSOP87 periodic terms for the Earth, one group per power of the
 * Julian ephemeris millennium. Rows are [amplitude, phase, frequency].
 */
const TermRowSchema = z.tuple([z.number(), z.number(), z.number()]);
const TermGroupsSchema = z.array(z.array(TermRowSchema).min(1)).min(1);

const EarthTermsSchema = z.object({
  longitude: TermGroupsSchema.length(6),
  latitude: TermGroupsSchema.length(2),
  radius: TermGroupsSchema.length(5),
});

type TermGroups = readonly (readonly PeriodicTerm[])[];

const toGroups = (rows: z.infer<typeof TermGroupsSchema>): TermGroups =>
  rows.map((group) => group.map(([a, b, c]) => Object.freeze({ a, b, c })));

const parsed = EarthTermsSchema.parse(earthPeriodicTerms);

export const L_TERMS: TermGroups = toGroups(parsed.longitude);
export const B_TERMS: TermGroups = toGroups(parsed.latitude);
export const R_TERMS: TermGroups = toGroups(parsed.radius);
