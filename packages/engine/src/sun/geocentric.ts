import type { NutationArguments } from "@sunspa/shared";
import {
  earthHeliocentric,
  geocentricLatitude,
  geocentricLongitude,
} from "../earth/heliocentric";
import { deg2rad, limitDegrees, rad2deg } from "../math/angles";
import {
  eclipticMeanObliquity,
  eclipticTrueObliquity,
  nutationArguments,
  nutationLongitudeAndObliquity,
} from "../nutation/nutation";
import { timeScales, type TimeScales } from "../time/julian";

export type GeocentricSun = TimeScales & {
  l: number;
  b: number;
  r: number;
  theta: number;
  beta: number;
  x: NutationArguments;
  delPsi: number;
  delEps: number;
  epsilon0: number;
  epsilon: number;
  delTau: number;
  lambda: number;
  nu0: number;
  nu: number;
  alpha: number;
  delta: number;
};

export const aberrationCorrection = (r: number): number => -20.4898 / (3600 * r);

export const apparentSunLongitude = (theta: number, delPsi: number, delTau: number): number =>
  theta + delPsi + delTau;

export function greenwichMeanSiderealTime(jd: number, jc: number): number {
  return limitDegrees(
    280.46061837 + 360.98564736629 * (jd - 2451545) + jc * jc * (0.000387933 - jc / 38710000),
  );
}

export const greenwichSiderealTime = (nu0: number, delPsi: number, epsilon: number): number =>
  nu0 + delPsi * Math.cos(deg2rad(epsilon));

export function geocentricRightAscension(lambda: number, epsilon: number, beta: number): number {
  const lambdaRad = deg2rad(lambda);
  const epsRad = deg2rad(epsilon);
  return limitDegrees(
    rad2deg(
      Math.atan2(
        Math.sin(lambdaRad) * Math.cos(epsRad) - Math.tan(deg2rad(beta)) * Math.sin(epsRad),
        Math.cos(lambdaRad),
      ),
    ),
  );
}

export function geocentricDeclination(beta: number, epsilon: number, lambda: number): number {
  const betaRad = deg2rad(beta);
  const epsRad = deg2rad(epsilon);
  return rad2deg(
    Math.asin(
      Math.sin(betaRad) * Math.cos(epsRad) +
        Math.cos(betaRad) * Math.sin(epsRad) * Math.sin(deg2rad(lambda)),
    ),
  );
}

/**
 * Apparent geocentric sun at Julian day jd (UT) with TT - UT = deltaT seconds.
 */
export function geocentricSun(jd: number, deltaT: number): GeocentricSun {
  const t = timeScales(jd, deltaT);

  const { l, b, r } = earthHeliocentric(t.jme);
  const theta = geocentricLongitude(l);
  const beta = geocentricLatitude(b);

  const x = nutationArguments(t.jce);
  const { delPsi, delEps } = nutationLongitudeAndObliquity(t.jce, x);
  const epsilon0 = eclipticMeanObliquity(t.jme);
  const epsilon = eclipticTrueObliquity(delEps, epsilon0);

  const delTau = aberrationCorrection(r);
  const lambda = apparentSunLongitude(theta, delPsi, delTau);
  const nu0 = greenwichMeanSiderealTime(jd, t.jc);
  const nu = greenwichSiderealTime(nu0, delPsi, epsilon);

  return {
    ...t,
    l,
    b,
    r,
    theta,
    beta,
    x,
    delPsi,
    delEps,
    epsilon0,
    epsilon,
    delTau,
    lambda,
    nu0,
    nu,
    alpha: geocentricRightAscension(lambda, epsilon, beta),
    delta: geocentricDeclination(beta, epsilon, lambda),
  };
}
