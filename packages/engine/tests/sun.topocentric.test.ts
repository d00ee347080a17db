import { describe, expect, it } from "vitest";
import { rightAscensionParallax, sunEquatorialHorizontalParallax } from "../src/sun/topocentric";

// Parallax at one astronomical unit
const XI = sunEquatorialHorizontalParallax(1);

describe("rightAscensionParallax", () => {
  it("vanishes on the meridian for a sea-level equator observer", () => {
    const { delAlpha, delPrime } = rightAscensionParallax(0, 0, XI, 0, 0);
    expect(delAlpha).toBeCloseTo(0, 15);
    expect(delPrime).toBeCloseTo(0, 15);
  });

  it("shifts a meridian sun toward the horizon for a northern observer", () => {
    const { delAlpha, delPrime } = rightAscensionParallax(40, 0, XI, 0, 10);
    expect(delAlpha).toBeCloseTo(0, 15);
    expect(delPrime).toBeCloseTo(9.998787239725967, 12);
  });

  it("is antisymmetric in hour angle", () => {
    const west = rightAscensionParallax(40, 0, XI, 60, 10);
    const east = rightAscensionParallax(40, 0, XI, -60, 10);
    expect(west.delAlpha).toBeCloseTo(-0.001647880683267393, 12);
    expect(east.delAlpha).toBeCloseTo(-west.delAlpha, 15);
    expect(east.delPrime).toBeCloseTo(west.delPrime, 15);
  });

  it("reaches the full parallax at the horizon", () => {
    const { delAlpha } = rightAscensionParallax(0, 0, XI, 90, 0);
    expect(delAlpha).toBeCloseTo(-XI, 10);
  });
});
