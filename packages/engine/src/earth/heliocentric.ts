import { limitDegrees, rad2deg } from "../math/angles";
import { evalPeriodicSeries } from "../math/poly";
import { B_TERMS, L_TERMS, R_TERMS } from "./terms";

export type EarthHeliocentric = {
  l: number; // longitude, degrees [0, 360)
  b: number; // latitude, degrees
  r: number; // radius vector, AU
};

export const earthHeliocentricLongitude = (jme: number): number =>
  limitDegrees(rad2deg(evalPeriodicSeries(L_TERMS, jme) / 1e8));

export const earthHeliocentricLatitude = (jme: number): number =>
  rad2deg(evalPeriodicSeries(B_TERMS, jme) / 1e8);

export const earthRadiusVector = (jme: number): number => evalPeriodicSeries(R_TERMS, jme) / 1e8;

export function earthHeliocentric(jme: number): EarthHeliocentric {
  return {
    l: earthHeliocentricLongitude(jme),
    b: earthHeliocentricLatitude(jme),
    r: earthRadiusVector(jme),
  };
}

/** Heliocentric Earth longitude -> geocentric sun longitude. */
export function geocentricLongitude(l: number): number {
  const theta = l + 180;
  return theta >= 360 ? theta - 360 : theta;
}

export const geocentricLatitude = (b: number): number => -b;
