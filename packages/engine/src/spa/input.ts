import type { Observer, SpaInput } from "@sunspa/shared";

export const SPA_INPUT_DEFAULTS = {
  hour: 0,
  minute: 0,
  second: 0,
  timezone: 0,
  deltaUt1: 0,
  deltaT: 0,
  elevation: 0,
  pressure: 1013,
  temperature: 15,
  slope: 0,
  azmRotation: 0,
  atmosRefract: 0.5667,
} as const satisfies Partial<SpaInput>;

export type SpaInputInit = Pick<SpaInput, "year" | "month" | "day" | "longitude" | "latitude"> &
  Partial<SpaInput>;

export function createSpaInput(init: SpaInputInit): SpaInput {
  return { ...SPA_INPUT_DEFAULTS, ...init };
}

type CalendarField = "year" | "month" | "day" | "hour" | "minute" | "second" | "timezone";

export type DateInputOptions = Partial<
  Omit<SpaInput, CalendarField | "longitude" | "latitude" | "elevation">
> & {
  // Hours east of UTC; defaults to the host zone's offset at `date`
  utcOffsetHours?: number;
};

/**
 * Build an input from an instant, reading calendar fields at the given UTC offset.
 */
export function inputFromDate(date: Date, observer: Observer, opts: DateInputOptions = {}): SpaInput {
  const { utcOffsetHours, ...rest } = opts;
  const timezone = utcOffsetHours ?? -date.getTimezoneOffset() / 60;
  const local = new Date(date.getTime() + timezone * 3600_000);

  return createSpaInput({
    year: local.getUTCFullYear(),
    month: local.getUTCMonth() + 1,
    day: local.getUTCDate(),
    hour: local.getUTCHours(),
    minute: local.getUTCMinutes(),
    second: local.getUTCSeconds() + local.getUTCMilliseconds() / 1000,
    timezone,
    longitude: observer.lonDeg,
    latitude: observer.latDeg,
    elevation: observer.elevM ?? 0,
    ...rest,
  });
}
