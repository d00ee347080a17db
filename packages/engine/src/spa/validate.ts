import { z } from "zod";
import type { SpaInput } from "@sunspa/shared";
import { SpaInputError } from "./errors";

type Bound = {
  min?: number;
  max?: number;
  minExclusive?: boolean;
  maxExclusive?: boolean;
  int?: boolean;
};

function describeBound(b: Bound): string {
  const lo = b.min === undefined ? "(-Infinity" : `${b.minExclusive ? "(" : "["}${b.min}`;
  const hi = b.max === undefined ? "Infinity)" : `${b.max}${b.maxExclusive ? ")" : "]"}`;
  return `${b.int ? "an integer " : ""}within ${lo}, ${hi}`;
}

function ranged(b: Bound): z.ZodNumber {
  const expected = describeBound(b);
  let s = z.number({ invalid_type_error: expected, required_error: expected }).finite(expected);
  if (b.int) s = s.int(expected);
  if (b.min !== undefined) s = b.minExclusive ? s.gt(b.min, expected) : s.gte(b.min, expected);
  if (b.max !== undefined) s = b.maxExclusive ? s.lt(b.max, expected) : s.lte(b.max, expected);
  return s;
}

const BaseInputSchema = z.object({
  year: ranged({ min: -2000, max: 6000, int: true }),
  month: ranged({ min: 1, max: 12, int: true }),
  day: ranged({ min: 1, max: 31, int: true }),
  hour: ranged({ min: 0, max: 24, int: true }),
  minute: ranged({ min: 0, max: 59, int: true }),
  second: ranged({ min: 0, max: 60, maxExclusive: true }),
  timezone: ranged({ min: -18, max: 18 }),
  deltaUt1: ranged({ min: -1, max: 1, minExclusive: true, maxExclusive: true }),
  deltaT: ranged({ min: -8000, max: 8000 }),
  longitude: ranged({ min: -180, max: 180 }),
  latitude: ranged({ min: -90, max: 90 }),
  elevation: ranged({ min: -6500000 }),
  pressure: ranged({ min: 0, max: 5000 }),
  temperature: ranged({ min: -273, max: 6000, minExclusive: true }),
  atmosRefract: ranged({ min: -5, max: 5 }),
});

// Surface orientation only matters for the incidence angle
const IncidenceInputSchema = BaseInputSchema.extend({
  slope: ranged({ min: -360, max: 360 }),
  azmRotation: ranged({ min: -360, max: 360 }),
});

function endOfDayRule(
  value: { hour: number; minute: number; second: number },
  ctx: z.RefinementCtx,
): void {
  if (value.hour !== 24) return;
  if (value.minute > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["minute"], message: "0 when hour is 24" });
  }
  if (value.second > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["second"], message: "0 when hour is 24" });
  }
}

const schemas = {
  base: BaseInputSchema.superRefine(endOfDayRule),
  incidence: IncidenceInputSchema.superRefine(endOfDayRule),
};

function receivedValue(input: SpaInput, field: string): unknown {
  return Object.entries(input).find(([key]) => key === field)?.[1];
}

/**
 * Throws SpaInputError for the first field outside its documented range.
 */
export function validateSpaInput(input: SpaInput, opts: { incidence: boolean }): void {
  const result = (opts.incidence ? schemas.incidence : schemas.base).safeParse(input);
  if (result.success) return;

  const issue = result.error.issues[0];
  const field = String(issue?.path[0] ?? "input");
  throw new SpaInputError(field, receivedValue(input, field), issue?.message ?? "a valid value");
}
