import { WEEKDAYS } from "./types";
import type { CleanedTrip, CleaningReport, DropReason, RawTrip, Weekday } from "./types";

export const MAX_TRIP_DISTANCE_MILES = 50;
export const MAX_FARE_AMOUNT = 500;

const MS_PER_MINUTE = 60_000;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Parses a naive "YYYY-MM-DD HH:MM[:SS[.ffffff]]" timestamp into epoch ms,
 * treating the wall clock as UTC. Returns null for anything malformed,
 * including out-of-range fields such as month 13 or hour 24.
 */
export function parseNaiveTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second = "0", fraction = ""] = match;
  const y = Number(year);
  const mo = Number(month) - 1;
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  const ms = fraction ? Math.floor(Number(fraction.padEnd(6, "0")) / 1000) : 0;

  const date = new Date(Date.UTC(y, mo, d, h, mi, s, ms));
  // Date.UTC silently rolls over (Feb 30 -> Mar 1); reject instead
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi ||
    date.getUTCSeconds() !== s
  ) {
    return null;
  }
  return date.getTime();
}

// [start, end) in epoch ms for a "YYYY-MM" month
export function monthWindow(month: string): { start: number; end: number } {
  const match = /^(\d{4})-(\d{2})$/.exec(month);
  if (!match) {
    throw new Error(`Invalid month format: ${month}`);
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  if (monthIndex < 0 || monthIndex > 11) {
    throw new Error(`Invalid month format: ${month}`);
  }
  return {
    start: Date.UTC(year, monthIndex, 1),
    end: Date.UTC(year, monthIndex + 1, 1),
  };
}

export function weekdayOf(epochMs: number): Weekday {
  // getUTCDay: 0 = Sunday; WEEKDAYS starts on Monday
  const weekday = WEEKDAYS[(new Date(epochMs).getUTCDay() + 6) % 7];
  if (!weekday) {
    throw new Error(`No weekday for timestamp ${epochMs}`);
  }
  return weekday;
}

export function dateOf(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

// Speed is 0 whenever the division is undefined (zero-length trips)
export function speedMph(distanceMiles: number, durationMinutes: number): number {
  const speed = distanceMiles / (durationMinutes / 60);
  return Number.isFinite(speed) && speed >= 0 ? speed : 0;
}

function emptyReport(totalRows: number): CleaningReport {
  return {
    totalRows,
    keptRows: 0,
    dropped: {
      unparseableTimestamp: 0,
      outsideMonth: 0,
      missingCritical: 0,
      distanceOutOfRange: 0,
      fareOutOfRange: 0,
      dropoffBeforePickup: 0,
      noPassengers: 0,
    },
  };
}

type CleanResult = { trip: CleanedTrip } | { dropped: DropReason };

function cleanTrip(raw: RawTrip, window: { start: number; end: number }): CleanResult {
  // 1. Timestamps and month window
  if (raw.pickupTime === null || raw.dropoffTime === null) {
    return { dropped: "missingCritical" };
  }
  const pickupAt = parseNaiveTimestamp(raw.pickupTime);
  const dropoffAt = parseNaiveTimestamp(raw.dropoffTime);
  if (pickupAt === null || dropoffAt === null) {
    return { dropped: "unparseableTimestamp" };
  }
  if (pickupAt < window.start || pickupAt >= window.end) {
    return { dropped: "outsideMonth" };
  }

  // 2. Critical columns
  const { pickupZoneId, dropoffZoneId, fareAmount } = raw;
  if (pickupZoneId === null || dropoffZoneId === null || fareAmount === null) {
    return { dropped: "missingCritical" };
  }

  // 3. Range checks
  const { tripDistance, passengerCount } = raw;
  if (tripDistance === null || !(tripDistance > 0 && tripDistance < MAX_TRIP_DISTANCE_MILES)) {
    return { dropped: "distanceOutOfRange" };
  }
  if (!(fareAmount >= 0 && fareAmount <= MAX_FARE_AMOUNT)) {
    return { dropped: "fareOutOfRange" };
  }
  if (dropoffAt < pickupAt) {
    return { dropped: "dropoffBeforePickup" };
  }
  if (passengerCount === null || !(passengerCount > 0)) {
    return { dropped: "noPassengers" };
  }

  // 4. Derived fields
  const durationMinutes = (dropoffAt - pickupAt) / MS_PER_MINUTE;
  return {
    trip: {
      pickupAt,
      dropoffAt,
      pickupZoneId,
      dropoffZoneId,
      tripDistance,
      fareAmount,
      totalAmount: raw.totalAmount,
      passengerCount,
      paymentType: raw.paymentType,
      durationMinutes,
      speedMph: speedMph(tripDistance, durationMinutes),
      pickupHour: new Date(pickupAt).getUTCHours(),
      pickupWeekday: weekdayOf(pickupAt),
      pickupDate: dateOf(pickupAt),
    },
  };
}

/**
 * Validates raw trips for one calendar month and derives duration, speed,
 * hour, weekday and date. Rows failing a rule are dropped, never thrown on;
 * each dropped row is counted once, under the first rule it fails.
 * Input order is preserved.
 */
export function cleanTrips(
  rawTrips: readonly RawTrip[],
  options: { month: string }
): { trips: CleanedTrip[]; report: CleaningReport } {
  const window = monthWindow(options.month);
  const report = emptyReport(rawTrips.length);
  const trips: CleanedTrip[] = [];

  for (const raw of rawTrips) {
    const result = cleanTrip(raw, window);
    if ("trip" in result) {
      trips.push(result.trip);
    } else {
      report.dropped[result.dropped]++;
    }
  }

  report.keptRows = trips.length;
  return { trips, report };
}

export function printCleaningReport(report: CleaningReport): void {
  const warnings: string[] = [];
  const total = report.totalRows;

  const fmt = (count: number, msg: string) => {
    const pct = total > 0 ? ((count / total) * 100).toFixed(2) : "0.00";
    return `${count} rows (${pct}%) with ${msg}`;
  };

  const { dropped } = report;
  if (dropped.unparseableTimestamp > 0) warnings.push(fmt(dropped.unparseableTimestamp, "unparseable pickup/dropoff time"));
  if (dropped.outsideMonth > 0) warnings.push(fmt(dropped.outsideMonth, "pickup outside the target month"));
  if (dropped.missingCritical > 0) warnings.push(fmt(dropped.missingCritical, "NULL time, zone or fare"));
  if (dropped.distanceOutOfRange > 0) warnings.push(fmt(dropped.distanceOutOfRange, `distance not in (0, ${MAX_TRIP_DISTANCE_MILES})`));
  if (dropped.fareOutOfRange > 0) warnings.push(fmt(dropped.fareOutOfRange, `fare not in [0, ${MAX_FARE_AMOUNT}]`));
  if (dropped.dropoffBeforePickup > 0) warnings.push(fmt(dropped.dropoffBeforePickup, "dropoff before pickup"));
  if (dropped.noPassengers > 0) warnings.push(fmt(dropped.noPassengers, "no passengers"));

  console.log(`[Clean] Total rows: ${total}`);
  if (warnings.length > 0) {
    console.warn(`[Clean] Validation warnings (rows dropped):\n  - ${warnings.join("\n  - ")}`);
  } else {
    console.log("[Clean] No validation issues found.");
  }
  console.log(`[Clean] Kept ${report.keptRows} rows`);
}
