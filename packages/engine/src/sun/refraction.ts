import { deg2rad, rad2deg } from "../math/angles";

// Apparent angular radius of the sun, degrees
export const SUN_RADIUS = 0.26667;

export function topocentricElevationAngle(
  latitude: number,
  delPrime: number,
  hPrime: number,
): number {
  const latRad = deg2rad(latitude);
  const delPrimeRad = deg2rad(delPrime);
  return rad2deg(
    Math.asin(
      Math.sin(latRad) * Math.sin(delPrimeRad) +
        Math.cos(latRad) * Math.cos(delPrimeRad) * Math.cos(deg2rad(hPrime)),
    ),
  );
}

/**
 * Refraction correction in degrees. Zero once the sun's upper limb is further
 * below the horizon than the refraction at sunrise/sunset.
 */
export function atmosphericRefractionCorrection(
  pressure: number,
  temperature: number,
  atmosRefract: number,
  e0: number,
): number {
  if (e0 < -(SUN_RADIUS + atmosRefract)) return 0;
  return (
    ((pressure / 1010) * (283 / (273 + temperature)) * 1.02) /
    (60 * Math.tan(deg2rad(e0 + 10.3 / (e0 + 5.11))))
  );
}

export const topocentricElevationAngleCorrected = (e0: number, delE: number): number => e0 + delE;
