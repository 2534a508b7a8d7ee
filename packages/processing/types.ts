// ============================================================================
// Raw trips (as read from the TLC Parquet release)
// ============================================================================

// Timestamps are naive wall-clock strings ("2024-01-05 08:00:00"). The TLC
// publishes local New York time without an offset, and it is kept that way.
export type RawTrip = {
  pickupTime: string | null;
  dropoffTime: string | null;
  pickupZoneId: number | null;
  dropoffZoneId: number | null;
  tripDistance: number | null; // miles
  fareAmount: number | null;
  totalAmount: number | null;
  passengerCount: number | null;
  paymentType: number | null;
};

// ============================================================================
// Cleaned trips (persisted to the processed Parquet artifact)
// ============================================================================

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type CleanedTrip = {
  // Epoch ms of the naive wall clock; read back with UTC getters only
  pickupAt: number;
  dropoffAt: number;
  pickupZoneId: number;
  dropoffZoneId: number;
  tripDistance: number;
  fareAmount: number;
  totalAmount: number | null;
  passengerCount: number;
  paymentType: number | null;
  // Derived once during cleaning
  durationMinutes: number;
  speedMph: number;
  pickupHour: number; // 0-23
  pickupWeekday: Weekday;
  pickupDate: string; // YYYY-MM-DD
};

export type DropReason =
  | "unparseableTimestamp"
  | "outsideMonth"
  | "missingCritical"
  | "distanceOutOfRange"
  | "fareOutOfRange"
  | "dropoffBeforePickup"
  | "noPassengers";

export type CleaningReport = {
  totalRows: number;
  keptRows: number;
  dropped: Record<DropReason, number>;
};
