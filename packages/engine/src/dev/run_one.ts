import { calculate, createSpaInput } from "../index";
import type { SpaIntermediate } from "@sunspa/shared";

const detroit = createSpaInput({
  year: 2019,
  month: 7,
  day: 2,
  hour: 22,
  timezone: -4,
  deltaUt1: -0.2,
  deltaT: 69.184,
  longitude: -83.045753,
  latitude: 42.331429,
  elevation: 191,
});

const intermediate: Partial<SpaIntermediate> = {};
const output = calculate(detroit, { intermediate });

console.log("Detroit, 2019-07-02 22:00 (UTC-4):");
console.log(JSON.stringify(output, null, 2));

console.log("\nIntermediate:");
console.log(JSON.stringify(intermediate, null, 2));
