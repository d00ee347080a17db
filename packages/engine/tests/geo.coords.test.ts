import { describe, expect, it } from "vitest";
import { observerGeocentric } from "../src/geo/coords";

const AXIS_RATIO = 0.99664719;

describe("observerGeocentric", () => {
  it("puts a sea-level equator observer one equatorial radius out", () => {
    expect(observerGeocentric(0, 0)).toEqual({ x: 1, y: 0 });
    expect(observerGeocentric(0)).toEqual({ x: 1, y: 0 });
    expect(observerGeocentric(0, 6378140)).toEqual({ x: 2, y: 0 });
  });

  it("lies on the reference ellipsoid at zero elevation", () => {
    for (const latDeg of [-89.9, -60, -33.8688, 0.5, 23.4, 42.331429, 75]) {
      const { x, y } = observerGeocentric(latDeg, 0);
      expect(x * x + (y / AXIS_RATIO) ** 2, `lat ${latDeg}`).toBeCloseTo(1, 12);
      expect(Math.sign(y), `lat ${latDeg}`).toBe(Math.sign(latDeg));
    }
  });

  it("approaches the polar radius near the pole", () => {
    const { x, y } = observerGeocentric(90, 0);
    expect(x).toBeCloseTo(0, 12);
    expect(y).toBeCloseTo(AXIS_RATIO, 12);
  });

  it("moves outward along the geodetic normal with elevation", () => {
    const seaLevel = observerGeocentric(36.1408, 0);
    const mountain = observerGeocentric(36.1408, 3000);
    const h = 3000 / 6378140;
    const lat = (36.1408 * Math.PI) / 180;

    expect(mountain.x - seaLevel.x).toBeCloseTo(h * Math.cos(lat), 12);
    expect(mountain.y - seaLevel.y).toBeCloseTo(h * Math.sin(lat), 12);
  });
});
