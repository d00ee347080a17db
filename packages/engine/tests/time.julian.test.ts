import { describe, expect, it } from "vitest";
import { julianDay, timeScales, type CalendarInstant } from "../src/time/julian";

function at(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): CalendarInstant {
  return { year, month, day, hour, minute, second };
}

describe("julianDay", () => {
  it("places J2000.0 at 2451545", () => {
    expect(julianDay(at(2000, 1, 1, 12), 0, 0)).toBe(2451545);
  });

  it("matches fixed Gregorian and Julian calendar dates", () => {
    expect(julianDay(at(1957, 10, 4, 19, 26, 24), 0, 0)).toBeCloseTo(2436116.31, 6);
    // Julian calendar, no Gregorian correction
    expect(julianDay(at(333, 1, 27, 12), 0, 0)).toBe(1842713);
  });

  it("applies the Gregorian correction only after the calendar reform", () => {
    expect(julianDay(at(1582, 10, 15), 0, 0)).toBe(2299160.5);
    expect(julianDay(at(1582, 10, 4), 0, 0)).toBe(2299159.5);
  });

  it("shifts local time by the UTC offset", () => {
    expect(julianDay(at(2000, 1, 1, 7), -5, 0)).toBe(2451545);
    expect(julianDay(at(2000, 1, 1, 21, 30), 9.5, 0)).toBe(2451545);
  });

  it("adds UT1 - UTC as seconds of the day", () => {
    const jd = julianDay(at(2000, 1, 1, 12), 0, 0.5);
    expect((jd - 2451545) * 86400).toBeCloseTo(0.5, 4);
  });
});

describe("timeScales", () => {
  it("is zero at J2000 with no deltaT", () => {
    expect(timeScales(2451545, 0)).toEqual({ jd: 2451545, jc: 0, jde: 2451545, jce: 0, jme: 0 });
  });

  it("derives ephemeris scales from deltaT", () => {
    const t = timeScales(2451545 + 36525, 86400);
    expect(t.jc).toBe(1);
    expect(t.jde).toBe(2451545 + 36526);
    expect(t.jce).toBeCloseTo(1 + 1 / 36525, 12);
    expect(t.jme).toBeCloseTo((1 + 1 / 36525) / 10, 12);
  });
});
