// Shared types for the enriched dataset, filter engine and aggregations

import type { CleanedTrip, Weekday } from "@taxidash/processing/types";

// ============================================================================
// Trip Types
// ============================================================================

// CleanedTrip joined with the zone lookup and payment labels
export type EnrichedTrip = CleanedTrip & {
  pickupBorough: string | null; // null when the zone id is missing from the lookup
  pickupZoneName: string | null;
  paymentLabel: string;
};

// ============================================================================
// Filter Types
// ============================================================================

export type TripFilter = {
  dateRange: [string, string]; // inclusive YYYY-MM-DD bounds
  hourRange: [number, number]; // inclusive, 0-23
  paymentLabels: string[];
};

export type FilteredView = {
  // Dataset identity + canonical filter; aggregations memoize on this
  key: string;
  filter: TripFilter;
  trips: readonly EnrichedTrip[];
};

// ============================================================================
// Aggregate Types
// ============================================================================
// Memoized results are shared between callers and must not be mutated

export type ZoneCount = {
  readonly pickupZoneName: string;
  readonly pickupBorough: string;
  readonly tripCount: number;
};

export type HourlyFare = {
  readonly pickupHour: number;
  readonly tripCount: number;
  readonly meanFare: number | null; // null for an hour without trips
};

export type PaymentCount = {
  readonly paymentLabel: string;
  readonly tripCount: number;
};

export type WeekdayHourHeat = {
  readonly weekdays: readonly Weekday[];
  readonly hours: readonly number[];
  readonly counts: readonly (readonly number[])[]; // [weekday][hour]
};

export type DistanceBin = {
  readonly binStart: number;
  readonly binEnd: number;
  readonly tripCount: number;
};

export type TripMetrics = {
  readonly tripCount: number;
  readonly meanFare: number | null;
  readonly totalRevenue: number | null;
  readonly meanDistance: number | null;
  readonly meanDurationMinutes: number | null;
};

export type DataCoverage = {
  readonly firstDate: string | null;
  readonly lastDate: string | null;
  readonly rowCount: number;
};

export type DashboardSnapshot = {
  readonly metrics: TripMetrics;
  readonly topZones: readonly ZoneCount[];
  readonly hourlyFare: readonly HourlyFare[];
  readonly payments: readonly PaymentCount[];
  readonly heat: WeekdayHourHeat;
  readonly distance: readonly DistanceBin[];
};
