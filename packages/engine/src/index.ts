export { calculate } from "./spa/calculate";
export { SpaInputError } from "./spa/errors";
export { validateSpaInput } from "./spa/validate";
export {
  createSpaInput,
  inputFromDate,
  SPA_INPUT_DEFAULTS,
  type DateInputOptions,
  type SpaInputInit,
} from "./spa/input";
export { NO_SUN_EVENT, equationOfTime, sunRiseTransitSet, type SunEvents } from "./sun/events";
export { geocentricSun, type GeocentricSun } from "./sun/geocentric";
export { julianDay, timeScales, type CalendarInstant, type TimeScales } from "./time/julian";
export {
  limitDegrees,
  limitDegrees180,
  limitDegrees180pm,
  limitMinutes,
  limitZeroToOne,
} from "./math/angles";
