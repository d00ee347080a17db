import { deg2rad, limitDegrees, rad2deg } from "../math/angles";

export const topocentricZenithAngle = (e: number): number => 90 - e;

/** Azimuth westward from south. */
export function topocentricAzimuthAngleAstro(
  hPrime: number,
  latitude: number,
  delPrime: number,
): number {
  const hPrimeRad = deg2rad(hPrime);
  const latRad = deg2rad(latitude);
  return limitDegrees(
    rad2deg(
      Math.atan2(
        Math.sin(hPrimeRad),
        Math.cos(hPrimeRad) * Math.sin(latRad) - Math.tan(deg2rad(delPrime)) * Math.cos(latRad),
      ),
    ),
  );
}

/** Azimuth eastward from north. */
export const topocentricAzimuthAngle = (azimuthAstro: number): number =>
  limitDegrees(azimuthAstro + 180);

export function surfaceIncidenceAngle(
  zenith: number,
  azimuthAstro: number,
  azmRotation: number,
  slope: number,
): number {
  const zenithRad = deg2rad(zenith);
  const slopeRad = deg2rad(slope);
  return rad2deg(
    Math.acos(
      Math.cos(zenithRad) * Math.cos(slopeRad) +
        Math.sin(slopeRad) * Math.sin(zenithRad) * Math.cos(deg2rad(azimuthAstro - azmRotation)),
    ),
  );
}
