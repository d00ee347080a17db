import type { SpaInput } from "@sunspa/shared";
import {
  dayFractionToLocalHours,
  deg2rad,
  limitDegrees,
  limitDegrees180,
  limitDegrees180pm,
  limitMinutes,
  limitZeroToOne,
  rad2deg,
} from "../math/angles";
import { evalPoly } from "../math/poly";
import { julianDay } from "../time/julian";
import { geocentricSun } from "./geocentric";
import { SUN_RADIUS } from "./refraction";

// Reported for every event output when the sun never crosses the horizon
export const NO_SUN_EVENT = -99999;

// Sidereal degrees per solar day
const SIDEREAL_RATE = 360.985647;

const SUN_MEAN_LONGITUDE_COEFFS = [
  280.4664567, 360007.6982779, 0.03032028, 1 / 49931, -1 / 15300, -1 / 2000000,
];

/** Values on the previous, current and next day at 0h UT. */
export type DaySamples = {
  prev: number;
  cur: number;
  next: number;
};

export type RtsSample = {
  nu: number; // sidereal time at the day fraction
  alpha: number; // interpolated right ascension
  delta: number; // interpolated declination
  hPrime: number; // local hour angle, (-180, 180]
  altitude: number; // sun altitude
};

export type SunEvents = {
  srha: number; // sunrise hour angle
  ssha: number; // sunset hour angle
  sta: number; // sun transit altitude
  sunTransit: number;
  sunrise: number;
  sunset: number;
};

export type SunEventsInput = Pick<
  SpaInput,
  "year" | "month" | "day" | "timezone" | "longitude" | "latitude" | "deltaT" | "atmosRefract"
>;

export const sunMeanLongitude = (jme: number): number =>
  limitDegrees(evalPoly(SUN_MEAN_LONGITUDE_COEFFS, jme));

/** Equation of time in minutes. */
export function equationOfTime(
  jme: number,
  alpha: number,
  delPsi: number,
  epsilon: number,
): number {
  const m = sunMeanLongitude(jme);
  return limitMinutes(4 * (m - 0.0057183 - alpha + delPsi * Math.cos(deg2rad(epsilon))));
}

export const approxSunTransitTime = (alphaZero: number, longitude: number, nu: number): number =>
  (alphaZero - longitude - nu) / 360;

/**
 * Hour angle at which the sun's center reaches altitude h0Prime, in [0, 180),
 * or NO_SUN_EVENT when it never does on that day.
 */
export function sunHourAngleAtRiseSet(latitude: number, deltaZero: number, h0Prime: number): number {
  const latRad = deg2rad(latitude);
  const deltaZeroRad = deg2rad(deltaZero);
  const argument =
    (Math.sin(deg2rad(h0Prime)) - Math.sin(latRad) * Math.sin(deltaZeroRad)) /
    (Math.cos(latRad) * Math.cos(deltaZeroRad));

  if (Math.abs(argument) > 1) return NO_SUN_EVENT;
  return limitDegrees180(rad2deg(Math.acos(argument)));
}

/**
 * Second-order interpolation across three daily samples at day offset n.
 * A difference of 2 or more means the samples wrapped through 360 degrees.
 */
export function interpolateDaySamples(s: DaySamples, n: number): number {
  let a = s.cur - s.prev;
  let b = s.next - s.cur;

  if (Math.abs(a) >= 2) a = limitZeroToOne(a);
  if (Math.abs(b) >= 2) b = limitZeroToOne(b);

  return s.cur + (n * (a + b + (b - a) * n)) / 2;
}

export function rtsSunAltitude(latitude: number, delta: number, hPrime: number): number {
  const latRad = deg2rad(latitude);
  const deltaRad = deg2rad(delta);
  return rad2deg(
    Math.asin(
      Math.sin(latRad) * Math.sin(deltaRad) +
        Math.cos(latRad) * Math.cos(deltaRad) * Math.cos(deg2rad(hPrime)),
    ),
  );
}

/**
 * Evaluate the interpolated sun at day fraction m of the current UT day.
 */
export function evaluateAtDayFraction(
  m: number,
  samples: { alpha: DaySamples; delta: DaySamples },
  nu: number,
  longitude: number,
  latitude: number,
  deltaT: number,
): RtsSample {
  const nuAtM = nu + SIDEREAL_RATE * m;
  const n = m + deltaT / 86400;
  const alpha = interpolateDaySamples(samples.alpha, n);
  const delta = interpolateDaySamples(samples.delta, n);
  const hPrime = limitDegrees180pm(nuAtM + longitude - alpha);

  return {
    nu: nuAtM,
    alpha,
    delta,
    hPrime,
    altitude: rtsSunAltitude(latitude, delta, hPrime),
  };
}

/** First-order refinement of a sunrise or sunset day fraction. */
export function sunRiseAndSet(sample: RtsSample, m: number, latitude: number, h0Prime: number): number {
  return (
    m +
    (sample.altitude - h0Prime) /
      (360 *
        Math.cos(deg2rad(sample.delta)) *
        Math.cos(deg2rad(latitude)) *
        Math.sin(deg2rad(sample.hPrime)))
  );
}

function noSunEvents(): SunEvents {
  return {
    srha: NO_SUN_EVENT,
    ssha: NO_SUN_EVENT,
    sta: NO_SUN_EVENT,
    sunTransit: NO_SUN_EVENT,
    sunrise: NO_SUN_EVENT,
    sunset: NO_SUN_EVENT,
  };
}

/**
 * Sun transit, sunrise and sunset in local hours for the calendar day of p.
 * Samples the geocentric sun at 0h UT on the surrounding three days.
 */
export function sunRiseTransitSet(p: SunEventsInput): SunEvents {
  const jd0 = julianDay(
    { year: p.year, month: p.month, day: p.day, hour: 0, minute: 0, second: 0 },
    0,
    0,
  );

  const prev = geocentricSun(jd0 - 1, 0);
  const cur = geocentricSun(jd0, 0);
  const next = geocentricSun(jd0 + 1, 0);

  const samples = {
    alpha: { prev: prev.alpha, cur: cur.alpha, next: next.alpha },
    delta: { prev: prev.delta, cur: cur.delta, next: next.delta },
  };
  const nu = cur.nu;

  const mTransit = approxSunTransitTime(cur.alpha, p.longitude, nu);
  const h0Prime = -(SUN_RADIUS + p.atmosRefract);
  const h0 = sunHourAngleAtRiseSet(p.latitude, cur.delta, h0Prime);

  if (h0 < 0) return noSunEvents();

  const h0Fraction = h0 / 360;
  const mT = limitZeroToOne(mTransit);
  const mR = limitZeroToOne(mTransit - h0Fraction);
  const mS = limitZeroToOne(mTransit + h0Fraction);

  const at = (m: number) =>
    evaluateAtDayFraction(m, samples, nu, p.longitude, p.latitude, p.deltaT);
  const transit = at(mT);
  const rise = at(mR);
  const set = at(mS);

  return {
    srha: rise.hPrime,
    ssha: set.hPrime,
    sta: transit.altitude,
    sunTransit: dayFractionToLocalHours(mT - transit.hPrime / 360, p.timezone),
    sunrise: dayFractionToLocalHours(sunRiseAndSet(rise, mR, p.latitude, h0Prime), p.timezone),
    sunset: dayFractionToLocalHours(sunRiseAndSet(set, mS, p.latitude, h0Prime), p.timezone),
  };
}
