import type { NutationArguments } from "@sunspa/shared";
import { deg2rad } from "../math/angles";
import { evalPoly } from "../math/poly";
import { NUTATION_TERMS } from "./terms";

export type Nutation = {
  delPsi: number; // longitude, degrees
  delEps: number; // obliquity, degrees
};

// Cubic polynomials in JCE, constant term first (degrees)
const D_COEFFS = [297.85036, 445267.11148, -0.0019142, 1 / 189474];
const M_COEFFS = [357.52772, 35999.05034, -0.0001603, -1 / 300000];
const M_PRIME_COEFFS = [134.96298, 477198.867398, 0.0086972, 1 / 56250];
const F_COEFFS = [93.27191, 483202.017538, -0.0036825, 1 / 327270];
const OMEGA_COEFFS = [125.04452, -1934.136261, 0.0020708, 1 / 450000];

// Mean obliquity in arcseconds, polynomial in U = JME/10
const EPSILON0_COEFFS = [
  84381.448, -4680.93, -1.55, 1999.25, -51.38, -249.67, -39.05, 7.12, 27.87, 5.79, 2.45,
];

export function nutationArguments(jce: number): NutationArguments {
  return {
    d: evalPoly(D_COEFFS, jce),
    m: evalPoly(M_COEFFS, jce),
    mPrime: evalPoly(M_PRIME_COEFFS, jce),
    f: evalPoly(F_COEFFS, jce),
    omega: evalPoly(OMEGA_COEFFS, jce),
  };
}

export function nutationLongitudeAndObliquity(jce: number, x: NutationArguments): Nutation {
  let sumPsi = 0;
  let sumEps = 0;

  for (const t of NUTATION_TERMS) {
    const arg = deg2rad(
      x.d * t.yd + x.m * t.ym + x.mPrime * t.ymPrime + x.f * t.yf + x.omega * t.yOmega,
    );
    sumPsi += (t.a + jce * t.b) * Math.sin(arg);
    sumEps += (t.c + jce * t.d) * Math.cos(arg);
  }

  return { delPsi: sumPsi / 36000000, delEps: sumEps / 36000000 };
}

export const eclipticMeanObliquity = (jme: number): number => evalPoly(EPSILON0_COEFFS, jme / 10);

/** True obliquity in degrees from nutation (degrees) and mean obliquity (arcseconds). */
export const eclipticTrueObliquity = (delEps: number, epsilon0: number): number =>
  delEps + epsilon0 / 3600;
