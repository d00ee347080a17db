// packages/engine/src/geo/coords.ts
export type ObserverGeocentric = {
  x: number; // rho * cos(phi')
  y: number; // rho * sin(phi')
};

const DEG2RAD = Math.PI / 180;

// Polar/equatorial axis ratio, 1 - f
const AXIS_RATIO = 0.99664719;
const EARTH_EQUATORIAL_RADIUS_M = 6378140;

/**
 * Geodetic latitude + elevation -> geocentric position terms in Earth radii.
 *
 * Inputs:
 * - latDeg: geodetic latitude (degrees)
 * - elevM: elevation above the ellipsoid (meters). If omitted, 0.
 */
export function observerGeocentric(latDeg: number, elevM: number = 0): ObserverGeocentric {
  const lat = latDeg * DEG2RAD;

  // Reduced latitude on the flattened Earth
  const u = Math.atan(AXIS_RATIO * Math.tan(lat));
  const h = elevM / EARTH_EQUATORIAL_RADIUS_M;

  return {
    x: Math.cos(u) + h * Math.cos(lat),
    y: AXIS_RATIO * Math.sin(u) + h * Math.sin(lat),
  };
}
