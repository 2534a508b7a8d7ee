import { parse } from "csv-parse/sync";
import { readFile } from "node:fs/promises";
import { z } from "zod";

export type ZoneInfo = {
  borough: string | null;
  zone: string | null;
};

// zone id -> borough/zone name
export type ZoneLookup = ReadonlyMap<number, ZoneInfo>;

// The TLC file writes missing names as "N/A" (zones 264 and 265)
const MISSING_NAMES = new Set(["", "N/A", "NA"]);

const ZoneNameSchema = z.string().transform((name) => (MISSING_NAMES.has(name) ? null : name));

// Extra columns (service_zone) are ignored
const ZoneRecordSchema = z.object({
  LocationID: z.coerce.number().int(),
  Borough: ZoneNameSchema,
  Zone: ZoneNameSchema,
});

export function parseZoneLookup(csvText: string): ZoneLookup {
  const records: unknown = parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  const rows = z.array(ZoneRecordSchema).parse(records);

  const lookup = new Map<number, ZoneInfo>();
  for (const row of rows) {
    lookup.set(row.LocationID, { borough: row.Borough, zone: row.Zone });
  }
  return lookup;
}

export async function loadZoneLookup(csvPath: string): Promise<ZoneLookup> {
  const content = await readFile(csvPath, "utf-8");
  const lookup = parseZoneLookup(content);
  console.log(`[Zones] ${lookup.size} zones loaded from ${csvPath}`);
  return lookup;
}
