import { WEEKDAYS } from "@taxidash/processing/types";
import type { Weekday } from "@taxidash/processing/types";
import { DISTANCE_HISTOGRAM, HOURS_PER_DAY, TOP_ZONES_LIMIT } from "./config";
import { identityKey } from "./memo-cache";
import type { MemoCache } from "./memo-cache";
import { applyTripFilter, filterKey } from "./trip-filters";
import type {
  DashboardSnapshot,
  DataCoverage,
  DistanceBin,
  EnrichedTrip,
  FilteredView,
  HourlyFare,
  PaymentCount,
  TripFilter,
  TripMetrics,
  WeekdayHourHeat,
  ZoneCount,
} from "./trip-types";

// Every aggregation is a pure function of the view; an empty view yields an
// empty (or zero-filled) result rather than an error.

// Stable sort by count descending: ties keep first-seen order
function byCountDescending<T extends { tripCount: number }>(rows: T[]): T[] {
  return rows.sort((a, b) => b.tripCount - a.tripCount);
}

export function topZones(view: FilteredView, n: number = TOP_ZONES_LIMIT): readonly ZoneCount[] {
  const groups = new Map<string, { pickupZoneName: string; pickupBorough: string; tripCount: number }>();
  for (const trip of view.trips) {
    const { pickupZoneName, pickupBorough } = trip;
    // Unmatched zones have no group to count in
    if (pickupZoneName === null || pickupBorough === null) continue;

    const key = `${pickupZoneName}\u0000${pickupBorough}`;
    const group = groups.get(key);
    if (group) {
      group.tripCount++;
    } else {
      groups.set(key, { pickupZoneName, pickupBorough, tripCount: 1 });
    }
  }
  return byCountDescending([...groups.values()]).slice(0, Math.max(0, n));
}

/**
 * Mean fare per pickup hour, one row for every hour of the filter's hour
 * range. Hours without trips get a null mean.
 */
export function hourlyMeanFare(view: FilteredView): readonly HourlyFare[] {
  if (view.trips.length === 0) return [];

  const sums = new Array<number>(HOURS_PER_DAY).fill(0);
  const counts = new Array<number>(HOURS_PER_DAY).fill(0);
  for (const trip of view.trips) {
    sums[trip.pickupHour] = (sums[trip.pickupHour] ?? 0) + trip.fareAmount;
    counts[trip.pickupHour] = (counts[trip.pickupHour] ?? 0) + 1;
  }

  const [fromHour, toHour] = view.filter.hourRange;
  const rows: HourlyFare[] = [];
  for (let hour = fromHour; hour <= toHour; hour++) {
    const tripCount = counts[hour] ?? 0;
    const sum = sums[hour] ?? 0;
    rows.push({
      pickupHour: hour,
      tripCount,
      meanFare: tripCount > 0 ? sum / tripCount : null,
    });
  }
  return rows;
}

export function paymentCounts(view: FilteredView): readonly PaymentCount[] {
  const counts = new Map<string, number>();
  for (const trip of view.trips) {
    counts.set(trip.paymentLabel, (counts.get(trip.paymentLabel) ?? 0) + 1);
  }
  return byCountDescending(
    [...counts].map(([paymentLabel, tripCount]) => ({ paymentLabel, tripCount }))
  );
}

const WEEKDAY_INDEX = new Map<Weekday, number>(WEEKDAYS.map((day, index) => [day, index]));

// Always 7 x 24 cells, Monday -> Sunday by hour 0 -> 23
export function weekdayHourHeat(view: FilteredView): WeekdayHourHeat {
  const counts = WEEKDAYS.map(() => new Array<number>(HOURS_PER_DAY).fill(0));
  for (const trip of view.trips) {
    const row = counts[WEEKDAY_INDEX.get(trip.pickupWeekday) ?? -1];
    if (row) {
      row[trip.pickupHour] = (row[trip.pickupHour] ?? 0) + 1;
    }
  }
  return {
    weekdays: WEEKDAYS,
    hours: Array.from({ length: HOURS_PER_DAY }, (_, hour) => hour),
    counts,
  };
}

/**
 * Fixed-width distance bins over [0, maxMiles]; the last bin includes its
 * upper edge. Longer trips fall outside the chart.
 */
export function distanceHistogram(
  view: FilteredView,
  options: { maxMiles?: number; bins?: number } = {}
): readonly DistanceBin[] {
  const maxMiles = options.maxMiles ?? DISTANCE_HISTOGRAM.maxMiles;
  const binCount = options.bins ?? DISTANCE_HISTOGRAM.bins;
  const width = maxMiles / binCount;

  const counts = new Array<number>(binCount).fill(0);
  for (const trip of view.trips) {
    if (trip.tripDistance < 0 || trip.tripDistance > maxMiles) continue;
    const index = Math.min(Math.floor(trip.tripDistance / width), binCount - 1);
    counts[index] = (counts[index] ?? 0) + 1;
  }

  return counts.map((tripCount, i) => ({
    binStart: i * width,
    binEnd: (i + 1) * width,
    tripCount,
  }));
}

export function summarizeTrips(view: FilteredView): TripMetrics {
  const tripCount = view.trips.length;
  if (tripCount === 0) {
    return {
      tripCount,
      meanFare: null,
      totalRevenue: null,
      meanDistance: null,
      meanDurationMinutes: null,
    };
  }

  let fareSum = 0;
  let revenue = 0;
  let distanceSum = 0;
  let durationSum = 0;
  for (const trip of view.trips) {
    fareSum += trip.fareAmount;
    revenue += trip.totalAmount ?? 0;
    distanceSum += trip.tripDistance;
    durationSum += trip.durationMinutes;
  }

  return {
    tripCount,
    meanFare: fareSum / tripCount,
    totalRevenue: revenue,
    meanDistance: distanceSum / tripCount,
    meanDurationMinutes: durationSum / tripCount,
  };
}

export function dataCoverage(trips: readonly EnrichedTrip[]): DataCoverage {
  let firstDate: string | null = null;
  let lastDate: string | null = null;
  for (const trip of trips) {
    if (firstDate === null || trip.pickupDate < firstDate) firstDate = trip.pickupDate;
    if (lastDate === null || trip.pickupDate > lastDate) lastDate = trip.pickupDate;
  }
  return { firstDate, lastDate, rowCount: trips.length };
}

// ============================================================================
// Memoized bundle
// ============================================================================

export type DashboardAggregator = {
  applyFilter: (dataset: readonly EnrichedTrip[], filter: TripFilter) => FilteredView;
  topZones: (view: FilteredView, n?: number) => readonly ZoneCount[];
  hourlyMeanFare: (view: FilteredView) => readonly HourlyFare[];
  paymentCounts: (view: FilteredView) => readonly PaymentCount[];
  weekdayHourHeat: (view: FilteredView) => WeekdayHourHeat;
  distanceHistogram: (view: FilteredView) => readonly DistanceBin[];
  summarizeTrips: (view: FilteredView) => TripMetrics;
  snapshot: (view: FilteredView) => DashboardSnapshot;
};

/**
 * Wraps the filter engine and every aggregation in `cache`. Views are keyed
 * by dataset identity + filter, aggregates by the view key, so the same
 * filter on the same dataset is computed once per process.
 */
export function createDashboardAggregator(cache: MemoCache): DashboardAggregator {
  const byView = <R>(name: string, fn: (view: FilteredView) => R) =>
    cache.memoize(name, fn, (view: FilteredView) => view.key);

  const aggregator: Omit<DashboardAggregator, "snapshot"> = {
    applyFilter: cache.memoize(
      "applyTripFilter",
      applyTripFilter,
      (dataset, filter) => `${identityKey(dataset)}|${filterKey(filter)}`
    ),
    topZones: cache.memoize("topZones", topZones, (view, n = TOP_ZONES_LIMIT) => `${view.key}|${n}`),
    hourlyMeanFare: byView("hourlyMeanFare", hourlyMeanFare),
    paymentCounts: byView("paymentCounts", paymentCounts),
    weekdayHourHeat: byView("weekdayHourHeat", weekdayHourHeat),
    distanceHistogram: byView("distanceHistogram", (view) => distanceHistogram(view)),
    summarizeTrips: byView("summarizeTrips", summarizeTrips),
  };

  return {
    ...aggregator,
    snapshot: (view) => ({
      metrics: aggregator.summarizeTrips(view),
      topZones: aggregator.topZones(view),
      hourlyFare: aggregator.hourlyMeanFare(view),
      payments: aggregator.paymentCounts(view),
      heat: aggregator.weekdayHourHeat(view),
      distance: aggregator.distanceHistogram(view),
    }),
  };
}
