import { mkdir } from "node:fs/promises";
import path from "path";
import { cleanTrips, printCleaningReport } from "./clean-trips";
import type { TripStore } from "./trip-store";
import type { CleanedTrip } from "./types";
import { fileSize, formatElapsed, formatHumanReadableBytes, pathExists } from "./utils";

/**
 * Returns the cleaned trips for one month, computing them at most once.
 *
 * Any file already at `cleanPath` is loaded as-is: there is no checksum or
 * version check against the raw input or the cleaning rules. Delete the
 * artifact to force a rebuild.
 */
export async function loadCleanedTrips(params: {
  rawTripsPath: string;
  cleanPath: string;
  month: string;
  store: TripStore;
}): Promise<CleanedTrip[]> {
  const { rawTripsPath, cleanPath, month, store } = params;

  if (await pathExists(cleanPath)) {
    console.warn(
      `[Cache] Using existing ${cleanPath} without checking it against ${rawTripsPath}; ` +
        `delete it to rebuild after changing the raw data or cleaning rules`
    );
    return store.readCleanedTrips(cleanPath);
  }

  console.log(`[Cache] ${cleanPath} not found, building it from ${rawTripsPath}`);
  const startTime = Date.now();

  const rawTrips = await store.readRawTrips(rawTripsPath);
  const { trips, report } = cleanTrips(rawTrips, { month });
  printCleaningReport(report);

  await mkdir(path.dirname(cleanPath), { recursive: true });
  await store.writeCleanedTrips(trips, cleanPath);

  console.log(
    `[Cache] Wrote ${formatHumanReadableBytes(fileSize(cleanPath))} to ${cleanPath} in ${formatElapsed(startTime)}`
  );
  return trips;
}
