export type Observer = {
  latDeg: number;
  lonDeg: number; // East-positive
  elevM?: number;
};

/**
 * Observer instant and site for one solar position calculation.
 * Calendar fields are local time at `timezone` hours east of UTC.
 */
export type SpaInput = {
  year: number; // -2000..6000
  month: number; // 1..12
  day: number; // 1..31
  hour: number; // 0..24
  minute: number; // 0..59
  second: number; // [0, 60)

  timezone: number; // hours, -18..18
  deltaUt1: number; // UT1 - UTC seconds, (-1, 1)
  deltaT: number; // TT - UT1 seconds, -8000..8000

  longitude: number; // degrees, east-positive
  latitude: number; // degrees
  elevation: number; // meters
  pressure: number; // mbar
  temperature: number; // degrees Celsius

  slope: number; // surface slope from horizontal, degrees
  azmRotation: number; // surface azimuth rotation from south, negative east, degrees
  atmosRefract: number; // refraction at sunrise/sunset, degrees
};

export type SpaOptions = {
  computeIncidence?: boolean;
  computeSunEvents?: boolean;
  validateInputs?: boolean;
  // Filled with the final intermediate snapshot when supplied.
  intermediate?: Partial<SpaIntermediate>;
};

export type SpaOutput = {
  zenith: number; // topocentric zenith angle, degrees
  azimuthAstro: number; // westward from south (astronomers)
  azimuth: number; // eastward from north (navigators)

  incidence?: number; // surface incidence angle, degrees

  // Local decimal hours, -99999 when the sun never crosses the horizon that day
  sunTransit?: number;
  sunrise?: number;
  sunset?: number;
};

export type NutationArguments = {
  d: number; // mean elongation of the moon from the sun
  m: number; // mean anomaly of the sun
  mPrime: number; // mean anomaly of the moon
  f: number; // moon's argument of latitude
  omega: number; // longitude of the moon's ascending node
};

export type SpaIntermediate = {
  jd: number; // Julian day
  jc: number; // Julian century
  jde: number; // Julian ephemeris day
  jce: number; // Julian ephemeris century
  jme: number; // Julian ephemeris millennium

  l: number; // heliocentric longitude, degrees
  b: number; // heliocentric latitude, degrees
  r: number; // earth radius vector, AU

  theta: number; // geocentric longitude
  beta: number; // geocentric latitude

  x: NutationArguments;
  delPsi: number; // nutation in longitude
  delEps: number; // nutation in obliquity
  epsilon0: number; // mean obliquity, arcseconds
  epsilon: number; // true obliquity, degrees

  delTau: number; // aberration correction
  lambda: number; // apparent sun longitude
  nu0: number; // Greenwich mean sidereal time
  nu: number; // Greenwich apparent sidereal time

  alpha: number; // geocentric right ascension
  delta: number; // geocentric declination

  h: number; // observer hour angle
  xi: number; // equatorial horizontal parallax
  delAlpha: number; // right ascension parallax
  delPrime: number; // topocentric declination
  alphaPrime: number; // topocentric right ascension
  hPrime: number; // topocentric local hour angle

  e0: number; // topocentric elevation, uncorrected
  delE: number; // refraction correction
  e: number; // topocentric elevation, corrected

  eot?: number; // equation of time, minutes
  srha?: number; // sunrise hour angle
  ssha?: number; // sunset hour angle
  sta?: number; // sun transit altitude
};

export type Site = {
  id: string;
  name: string;
  utcOffsetHours: number;
  observer: Observer;
};
