import { calculate, NO_SUN_EVENT } from "@sunspa/engine";
import { loadSites, siteInput } from "../src/index";

// SITES_AT: ISO instant to evaluate, defaults to now
const at = process.env.SITES_AT ? new Date(process.env.SITES_AT) : new Date();
if (Number.isNaN(at.getTime())) {
  throw new Error(`SITES_AT is not a valid date: ${process.env.SITES_AT}`);
}

const pad2 = (n: number) => String(n).padStart(2, "0");

function fmtHHMM(hours: number | undefined): string {
  if (hours === undefined || hours === NO_SUN_EVENT) return "--:--";
  const totalMinutes = Math.floor(hours * 60);
  return `${pad2(Math.floor(totalMinutes / 60) % 24)}:${pad2(totalMinutes % 60)}`;
}

const fmtDeg = (deg: number) => `${deg.toFixed(2).padStart(6)}°`;

for (const site of loadSites()) {
  const input = siteInput(site, at);
  const sp = calculate(input);

  console.log(
    `${site.name.padEnd(13)} | ` +
      `${pad2(input.hour)}:${pad2(input.minute)} | ` +
      `Zenith: ${fmtDeg(sp.zenith)} | ` +
      `Sunrise: ${fmtHHMM(sp.sunrise)} | ` +
      `Transit: ${fmtHHMM(sp.sunTransit)} | ` +
      `Sunset: ${fmtHHMM(sp.sunset)}`,
  );
}
