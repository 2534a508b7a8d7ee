import {
  DuckDBTripStore,
  ensureLocal,
  formatElapsed,
  loadCleanedTrips,
  loadProcessingConfig,
  loadZoneLookup,
} from "@taxidash/processing";
import type { ProcessingConfig, TripStore } from "@taxidash/processing";
import { enrichTrips } from "@/lib/enrich";
import { MemoCache } from "@/lib/memo-cache";
import type { EnrichedTrip } from "@/lib/trip-types";

/**
 * Loads the enriched dataset: fetch raw files if missing, load or build the
 * cleaned artifact, join zones. The result is memoized per set of paths for
 * the life of the process; a failed load is not kept.
 */
export class DatasetService {
  readonly load: () => Promise<readonly EnrichedTrip[]>;

  constructor(
    private readonly config: ProcessingConfig = loadProcessingConfig(),
    private readonly createTripStore: () => TripStore = () => new DuckDBTripStore(),
    cache: MemoCache = new MemoCache()
  ) {
    const loadDataset = cache.memoize(
      "loadDataset",
      (config: ProcessingConfig) => this.initialize(config),
      (config) => [config.rawTripsPath, config.rawZonesPath, config.cleanPath, config.month].join("|")
    );
    this.load = () => loadDataset(this.config);
  }

  private async initialize(config: ProcessingConfig): Promise<readonly EnrichedTrip[]> {
    console.log("[Dataset] Initializing...");
    const startTime = Date.now();

    await ensureLocal(config.tripsUrl, config.rawTripsPath, { timeoutMs: config.fetchTimeoutMs });
    await ensureLocal(config.zonesUrl, config.rawZonesPath, { timeoutMs: config.fetchTimeoutMs });

    const store = this.createTripStore();
    const cleaned = await loadCleanedTrips({
      rawTripsPath: config.rawTripsPath,
      cleanPath: config.cleanPath,
      month: config.month,
      store,
    }).finally(() => store.close());

    const zones = await loadZoneLookup(config.rawZonesPath);
    const trips = enrichTrips(cleaned, zones);
    console.log(`[Dataset] ${trips.length} trips ready in ${formatElapsed(startTime)}`);
    return trips;
  }
}
