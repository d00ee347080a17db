export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;

export const deg2rad = (deg: number): number => DEG2RAD * deg;
export const rad2deg = (rad: number): number => RAD2DEG * rad;

/** Wrap degrees to [0, 360). */
export function limitDegrees(deg: number): number {
  if (deg >= 0 && deg < 360) return deg;
  const turns = deg / 360;
  let out = 360 * (turns - Math.floor(turns));
  if (out < 0) out += 360;
  // tiny negative inputs round up to a full turn
  if (out >= 360) out -= 360;
  return out;
}

/** Wrap degrees to (-180, 180]. */
export function limitDegrees180pm(deg: number): number {
  if (deg > -180 && deg <= 180) return deg;
  const turns = deg / 360;
  const out = 360 * (turns - Math.floor(turns));
  return out > 180 ? out - 360 : out;
}

/** Wrap degrees to [0, 180). */
export function limitDegrees180(deg: number): number {
  if (deg >= 0 && deg < 180) return deg;
  const halfTurns = deg / 180;
  let out = 180 * (halfTurns - Math.floor(halfTurns));
  if (out < 0) out += 180;
  if (out >= 180) out -= 180;
  return out;
}

/** Wrap a day fraction to [0, 1). */
export function limitZeroToOne(value: number): number {
  if (value >= 0 && value < 1) return value;
  let out = value - Math.floor(value);
  if (out < 0) out += 1;
  if (out >= 1) out -= 1;
  return out;
}

/** Pull minutes that fell outside (-20, 20) back by a whole day. */
export function limitMinutes(minutes: number): number {
  if (minutes < -20) return minutes + 1440;
  if (minutes > 20) return minutes - 1440;
  return minutes;
}

export function dayFractionToLocalHours(dayFraction: number, timezone: number): number {
  return 24 * limitZeroToOne(dayFraction + timezone / 24);
}
