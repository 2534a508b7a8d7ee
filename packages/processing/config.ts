// =============================================================================
// Environment
// =============================================================================
// Every setting has a default pointing at the January 2024 TLC release, so a
// bare `npm run build:data` works without any variables set.

import path from "path";
import { z } from "zod";

const DEFAULT_TRIPS_URL =
  "https://d37ci6vzurychx.cloudfront.net/trip-data/yellow_tripdata_2024-01.parquet";
const DEFAULT_ZONES_URL = "https://d37ci6vzurychx.cloudfront.net/misc/taxi_zone_lookup.csv";

export const CLEAN_FILE_NAME = "taxi_clean.parquet";

const EnvSchema = z.object({
  TAXI_DATA_DIR: z.string().min(1).optional(),
  TAXI_TRIPS_URL: z.string().url().default(DEFAULT_TRIPS_URL),
  TAXI_ZONES_URL: z.string().url().default(DEFAULT_ZONES_URL),
  TAXI_MONTH: z
    .string()
    .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "expected YYYY-MM")
    .default("2024-01"),
  TAXI_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type ProcessingConfig = {
  dataDir: string;
  rawDir: string;
  processedDir: string;
  tripsUrl: string;
  zonesUrl: string;
  rawTripsPath: string;
  rawZonesPath: string;
  cleanPath: string;
  month: string;
  fetchTimeoutMs: number;
};

// File names under data/raw mirror the last path segment of each URL
function fileNameFromUrl(url: string): string {
  const name = path.posix.basename(new URL(url).pathname);
  if (!name) {
    throw new Error(`Cannot derive a file name from URL: ${url}`);
  }
  return name;
}

export function loadProcessingConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ProcessingConfig {
  const parsed = EnvSchema.parse(env);
  const dataDir = path.resolve(cwd, parsed.TAXI_DATA_DIR ?? "data");
  const rawDir = path.join(dataDir, "raw");
  const processedDir = path.join(dataDir, "processed");

  return {
    dataDir,
    rawDir,
    processedDir,
    tripsUrl: parsed.TAXI_TRIPS_URL,
    zonesUrl: parsed.TAXI_ZONES_URL,
    rawTripsPath: path.join(rawDir, fileNameFromUrl(parsed.TAXI_TRIPS_URL)),
    rawZonesPath: path.join(rawDir, fileNameFromUrl(parsed.TAXI_ZONES_URL)),
    cleanPath: path.join(processedDir, CLEAN_FILE_NAME),
    month: parsed.TAXI_MONTH,
    fetchTimeoutMs: parsed.TAXI_FETCH_TIMEOUT_MS,
  };
}
