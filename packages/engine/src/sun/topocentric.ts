import { observerGeocentric } from "../geo/coords";
import { deg2rad, limitDegrees, rad2deg } from "../math/angles";

export type TopocentricSun = {
  h: number; // observer hour angle
  xi: number; // equatorial horizontal parallax
  delAlpha: number; // right ascension parallax
  delPrime: number; // topocentric declination
  alphaPrime: number; // topocentric right ascension
  hPrime: number; // topocentric local hour angle
};

export const observerHourAngle = (nu: number, longitude: number, alpha: number): number =>
  limitDegrees(nu + longitude - alpha);

export const sunEquatorialHorizontalParallax = (r: number): number => 8.794 / (3600 * r);

/**
 * Parallax in right ascension and the resulting topocentric declination, degrees.
 */
export function rightAscensionParallax(
  latitude: number,
  elevation: number,
  xi: number,
  h: number,
  delta: number,
): { delAlpha: number; delPrime: number } {
  const { x, y } = observerGeocentric(latitude, elevation);
  const xiRad = deg2rad(xi);
  const hRad = deg2rad(h);
  const deltaRad = deg2rad(delta);

  const denominator = Math.cos(deltaRad) - x * Math.sin(xiRad) * Math.cos(hRad);
  const delAlphaRad = Math.atan2(-x * Math.sin(xiRad) * Math.sin(hRad), denominator);

  return {
    delAlpha: rad2deg(delAlphaRad),
    delPrime: rad2deg(
      Math.atan2((Math.sin(deltaRad) - y * Math.sin(xiRad)) * Math.cos(delAlphaRad), denominator),
    ),
  };
}

export function topocentricSun(
  geo: { nu: number; alpha: number; delta: number; r: number },
  longitude: number,
  latitude: number,
  elevation: number,
): TopocentricSun {
  const h = observerHourAngle(geo.nu, longitude, geo.alpha);
  const xi = sunEquatorialHorizontalParallax(geo.r);
  const { delAlpha, delPrime } = rightAscensionParallax(latitude, elevation, xi, h, geo.delta);

  return {
    h,
    xi,
    delAlpha,
    delPrime,
    alphaPrime: geo.alpha + delAlpha,
    hPrime: h - delAlpha,
  };
}
