import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "csv-parse/sync";
import { inputFromDate, type DateInputOptions } from "@sunspa/engine";
import type { Site, SpaInput } from "@sunspa/shared";

type CsvRow = Record<string, string>;

const sitesCsvPath = fileURLToPath(new URL("../data/sites.csv", import.meta.url));

let sites: Site[] | null = null;
let sitesById: Map<string, Site> | null = null;

function warn(message: string): void {
  console.warn(`[@sunspa/catalog] ${message}`);
}

// Blank cells read as undefined, anything else must be a finite number
function toNum(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : Number.NaN;
}

function rowToSite(row: CsvRow, line: number): Site | null {
  const id = row.id?.trim();
  const utcOffsetHours = toNum(row.utc_offset_hours);
  const latDeg = toNum(row.lat_deg);
  const lonDeg = toNum(row.lon_deg);
  const elevM = toNum(row.elev_m);

  if (!id) {
    warn(`line ${line}: missing id, skipped`);
    return null;
  }
  if (
    utcOffsetHours === undefined ||
    latDeg === undefined ||
    lonDeg === undefined ||
    Number.isNaN(utcOffsetHours) ||
    Number.isNaN(latDeg) ||
    Number.isNaN(lonDeg) ||
    Number.isNaN(elevM)
  ) {
    warn(`line ${line}: site "${id}" has a non-numeric offset or coordinate, skipped`);
    return null;
  }

  return {
    id,
    name: row.name?.trim() || id,
    utcOffsetHours,
    observer: elevM === undefined ? { latDeg, lonDeg } : { latDeg, lonDeg, elevM },
  };
}

/**
 * Parse a site table with columns id,name,utc_offset_hours,lat_deg,lon_deg,elev_m.
 * Rows that cannot be read are skipped with a warning.
 */
export function parseSitesCsv(text: string): Site[] {
  const rows: CsvRow[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  const out: Site[] = [];
  rows.forEach((row, i) => {
    // header is line 1
    const site = rowToSite(row, i + 2);
    if (site) out.push(site);
  });
  return out;
}

export function loadSites(): Site[] {
  if (!sites) {
    sites = parseSitesCsv(fs.readFileSync(sitesCsvPath, "utf8"));
  }
  return sites;
}

export function loadSite(id: string): Site | undefined {
  if (!sitesById) {
    sitesById = new Map(loadSites().map((site) => [site.id, site]));
  }
  return sitesById.get(id);
}

/** Input for a site at an instant, in the site's fixed UTC offset. */
export function siteInput(site: Site, when: Date, opts: DateInputOptions = {}): SpaInput {
  return inputFromDate(when, site.observer, { utcOffsetHours: site.utcOffsetHours, ...opts });
}
