import { dateOf, weekdayOf } from "@taxidash/processing/clean-trips";
import type { EnrichedTrip } from "@/lib/trip-types";

// Builds an enriched trip whose derived fields agree with its timestamps
export function makeTrip(fields: {
  pickup: string; // "2024-01-05T08:00"
  minutes: number;
  zone: [string, string] | null; // [zone name, borough]
  paymentType: number | null;
  paymentLabel: string;
  fare: number;
  total: number | null;
  distance: number;
  pickupZoneId?: number;
}): EnrichedTrip {
  const pickupAt = Date.parse(`${fields.pickup}:00Z`);
  return {
    pickupAt,
    dropoffAt: pickupAt + fields.minutes * 60_000,
    pickupZoneId: fields.pickupZoneId ?? 1,
    dropoffZoneId: 1,
    tripDistance: fields.distance,
    fareAmount: fields.fare,
    totalAmount: fields.total,
    passengerCount: 1,
    paymentType: fields.paymentType,
    durationMinutes: fields.minutes,
    speedMph: fields.distance / (fields.minutes / 60),
    pickupHour: new Date(pickupAt).getUTCHours(),
    pickupWeekday: weekdayOf(pickupAt),
    pickupDate: dateOf(pickupAt),
    pickupZoneName: fields.zone?.[0] ?? null,
    pickupBorough: fields.zone?.[1] ?? null,
    paymentLabel: fields.paymentLabel,
  };
}

const MIDTOWN: [string, string] = ["Midtown Center", "Manhattan"];
const JFK: [string, string] = ["JFK Airport", "Queens"];

// Friday 8am x2, Saturday 11pm, Sunday midnight (unmatched zone), Monday 5pm
export function sampleTrips(): EnrichedTrip[] {
  return [
    makeTrip({ pickup: "2024-01-05T08:00", minutes: 15, zone: MIDTOWN, paymentType: 1, paymentLabel: "Credit Card", fare: 10, total: 14.5, distance: 2 }),
    makeTrip({ pickup: "2024-01-05T08:30", minutes: 40, zone: JFK, paymentType: 2, paymentLabel: "Cash", fare: 70, total: 80, distance: 17 }),
    makeTrip({ pickup: "2024-01-06T23:10", minutes: 20, zone: MIDTOWN, paymentType: 1, paymentLabel: "Credit Card", fare: 20, total: 25, distance: 4 }),
    makeTrip({ pickup: "2024-01-07T00:05", minutes: 5, zone: null, paymentType: 9, paymentLabel: "Other", fare: 6, total: null, distance: 1 }),
    makeTrip({ pickup: "2024-01-08T17:45", minutes: 45, zone: JFK, paymentType: 1, paymentLabel: "Credit Card", fare: 70, total: 90.5, distance: 18 }),
  ];
}
