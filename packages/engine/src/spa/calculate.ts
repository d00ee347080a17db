// packages/engine/src/spa/calculate.ts
import type { SpaInput, SpaIntermediate, SpaOptions, SpaOutput } from "@sunspa/shared";
import { geocentricSun } from "../sun/geocentric";
import { equationOfTime, sunRiseTransitSet } from "../sun/events";
import {
  atmosphericRefractionCorrection,
  topocentricElevationAngle,
  topocentricElevationAngleCorrected,
} from "../sun/refraction";
import {
  surfaceIncidenceAngle,
  topocentricAzimuthAngle,
  topocentricAzimuthAngleAstro,
  topocentricZenithAngle,
} from "../sun/surface";
import { topocentricSun } from "../sun/topocentric";
import { julianDay } from "../time/julian";
import { validateSpaInput } from "./validate";

/**
 * Solar position for one observer instant.
 *
 * Zenith and both azimuths are always produced. Incidence and the sun
 * transit/sunrise/sunset times are produced unless disabled in options.
 * Throws SpaInputError before computing anything when validation is on and
 * an input is out of range.
 */
export function calculate(input: SpaInput, options: SpaOptions = {}): SpaOutput {
  const computeIncidence = options.computeIncidence ?? true;
  const computeSunEvents = options.computeSunEvents ?? true;

  if (options.validateInputs ?? true) {
    validateSpaInput(input, { incidence: computeIncidence });
  }

  const jd = julianDay(input, input.timezone, input.deltaUt1);
  const geo = geocentricSun(jd, input.deltaT);
  const topo = topocentricSun(geo, input.longitude, input.latitude, input.elevation);

  const e0 = topocentricElevationAngle(input.latitude, topo.delPrime, topo.hPrime);
  const delE = atmosphericRefractionCorrection(
    input.pressure,
    input.temperature,
    input.atmosRefract,
    e0,
  );
  const e = topocentricElevationAngleCorrected(e0, delE);

  const zenith = topocentricZenithAngle(e);
  const azimuthAstro = topocentricAzimuthAngleAstro(topo.hPrime, input.latitude, topo.delPrime);
  const out: SpaOutput = {
    zenith,
    azimuthAstro,
    azimuth: topocentricAzimuthAngle(azimuthAstro),
  };

  if (computeIncidence) {
    out.incidence = surfaceIncidenceAngle(zenith, azimuthAstro, input.azmRotation, input.slope);
  }

  let eot: number | undefined;
  let events: ReturnType<typeof sunRiseTransitSet> | undefined;
  if (computeSunEvents) {
    eot = equationOfTime(geo.jme, geo.alpha, geo.delPsi, geo.epsilon);
    events = sunRiseTransitSet(input);
    out.sunTransit = events.sunTransit;
    out.sunrise = events.sunrise;
    out.sunset = events.sunset;
  }

  if (options.intermediate) {
    const snapshot: SpaIntermediate = {
      jd: geo.jd,
      jc: geo.jc,
      jde: geo.jde,
      jce: geo.jce,
      jme: geo.jme,
      l: geo.l,
      b: geo.b,
      r: geo.r,
      theta: geo.theta,
      beta: geo.beta,
      x: geo.x,
      delPsi: geo.delPsi,
      delEps: geo.delEps,
      epsilon0: geo.epsilon0,
      epsilon: geo.epsilon,
      delTau: geo.delTau,
      lambda: geo.lambda,
      nu0: geo.nu0,
      nu: geo.nu,
      alpha: geo.alpha,
      delta: geo.delta,
      ...topo,
      e0,
      delE,
      e,
      // cleared when events are off so a reused buffer holds no stale values
      eot,
      srha: events?.srha,
      ssha: events?.ssha,
      sta: events?.sta,
    };
    Object.assign(options.intermediate, snapshot);
  }

  return out;
}
