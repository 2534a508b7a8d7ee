// Fetches the raw TLC files and builds the cleaned trip artifact.
//
// Usage: npm run build:data
//
// Input (downloaded when missing):
// - data/raw/yellow_tripdata_<month>.parquet
// - data/raw/taxi_zone_lookup.csv
//
// Output:
// - data/processed/taxi_clean.parquet (skipped when it already exists)
import { loadProcessingConfig } from "./config";
import { ensureLocal } from "./fetch-data";
import { loadCleanedTrips } from "./trip-cache";
import { DuckDBTripStore } from "./trip-store";
import { formatElapsed } from "./utils";
import { loadZoneLookup } from "./zones";

async function main() {
  const config = loadProcessingConfig();
  console.log("Starting dataset build...");
  console.log(`Data directory: ${config.dataDir}`);
  console.log(`Target month: ${config.month}`);

  const startTime = Date.now();
  await ensureLocal(config.tripsUrl, config.rawTripsPath, { timeoutMs: config.fetchTimeoutMs });
  await ensureLocal(config.zonesUrl, config.rawZonesPath, { timeoutMs: config.fetchTimeoutMs });

  const store = new DuckDBTripStore();
  try {
    const trips = await loadCleanedTrips({
      rawTripsPath: config.rawTripsPath,
      cleanPath: config.cleanPath,
      month: config.month,
      store,
    });
    const zones = await loadZoneLookup(config.rawZonesPath);

    const unmatched = trips.filter((trip) => !zones.has(trip.pickupZoneId)).length;
    if (unmatched > 0) {
      console.warn(`${unmatched} trips have a pickup zone missing from the lookup`);
    }
    console.log(`\n${trips.length} cleaned trips ready`);
  } finally {
    store.close();
  }

  console.log(`Done in ${formatElapsed(startTime)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
