import type { CleanedTrip } from "@taxidash/processing/types";
import type { ZoneLookup } from "@taxidash/processing/zones";
import { OTHER_PAYMENT_LABEL, PAYMENT_LABELS } from "./config";
import type { EnrichedTrip } from "./trip-types";

export function paymentLabelFor(paymentType: number | null): string {
  if (paymentType === null) return OTHER_PAYMENT_LABEL;
  return PAYMENT_LABELS[paymentType] ?? OTHER_PAYMENT_LABEL;
}

/**
 * Left-joins pickup zones and labels payment codes. Trips whose zone id is
 * missing from the lookup are kept with a null borough and zone name.
 * Returns new objects; the cleaned trips are left untouched.
 */
export function enrichTrips(cleaned: readonly CleanedTrip[], zones: ZoneLookup): EnrichedTrip[] {
  return cleaned.map((trip) => {
    const zone = zones.get(trip.pickupZoneId);
    return {
      ...trip,
      pickupBorough: zone?.borough ?? null,
      pickupZoneName: zone?.zone ?? null,
      paymentLabel: paymentLabelFor(trip.paymentType),
    };
  });
}
