export type CalendarInstant = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

export type TimeScales = {
  jd: number;
  jc: number;
  jde: number;
  jce: number;
  jme: number;
};

// First Julian day of the Gregorian calendar (1582-10-15)
const GREGORIAN_REFORM_JD = 2299160;
const J2000 = 2451545;

/**
 * Julian day for a local calendar instant.
 * timezone is in hours east of UTC; deltaUt1 (UT1 - UTC) in seconds.
 */
export function julianDay(t: CalendarInstant, timezone: number, deltaUt1: number): number {
  const dayDecimal =
    t.day + (t.hour - timezone + (t.minute + (t.second + deltaUt1) / 60) / 60) / 24;

  let year = t.year;
  let month = t.month;
  if (month < 3) {
    month += 12;
    year--;
  }

  let jd =
    Math.floor(365.25 * (year + 4716)) + Math.floor(30.6001 * (month + 1)) + dayDecimal - 1524.5;

  if (jd > GREGORIAN_REFORM_JD) {
    const a = Math.trunc(year / 100);
    jd += 2 - a + Math.trunc(a / 4);
  }

  return jd;
}

export const julianCentury = (jd: number): number => (jd - J2000) / 36525;
export const julianEphemerisDay = (jd: number, deltaT: number): number => jd + deltaT / 86400;
export const julianEphemerisCentury = (jde: number): number => (jde - J2000) / 36525;
export const julianEphemerisMillennium = (jce: number): number => jce / 10;

export function timeScales(jd: number, deltaT: number): TimeScales {
  const jde = julianEphemerisDay(jd, deltaT);
  const jce = julianEphemerisCentury(jde);
  return {
    jd,
    jc: julianCentury(jd),
    jde,
    jce,
    jme: julianEphemerisMillennium(jce),
  };
}
