import { z } from "zod";
import { OPEN_DATE_RANGE } from "./config";
import { identityKey } from "./memo-cache";
import type { EnrichedTrip, FilteredView, TripFilter } from "./trip-types";

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const HourSchema = z.number().int().min(0).max(23);

export const TripFilterSchema = z.object({
  dateRange: z.tuple([IsoDateSchema, IsoDateSchema]),
  hourRange: z
    .tuple([HourSchema, HourSchema])
    .refine(([from, to]) => from <= to, "hour range start must not be after its end"),
  paymentLabels: z.array(z.string()),
});

export function parseTripFilter(filter: unknown): TripFilter {
  return TripFilterSchema.parse(filter);
}

// Same key for filters that select the same rows (label order and repeats ignored)
export function filterKey(filter: TripFilter): string {
  const labels = [...new Set(filter.paymentLabels)].sort();
  return `${filter.dateRange[0]}..${filter.dateRange[1]}|${filter.hourRange[0]}-${filter.hourRange[1]}|${JSON.stringify(labels)}`;
}

export function paymentOptions(dataset: readonly EnrichedTrip[]): string[] {
  return [...new Set(dataset.map((trip) => trip.paymentLabel))].sort();
}

/**
 * The filter that selects everything: full date coverage, hours 0-23 and
 * every payment label present in the dataset.
 */
export function defaultTripFilter(dataset: readonly EnrichedTrip[]): TripFilter {
  let first: string | null = null;
  let last: string | null = null;
  for (const trip of dataset) {
    if (first === null || trip.pickupDate < first) first = trip.pickupDate;
    if (last === null || trip.pickupDate > last) last = trip.pickupDate;
  }

  return {
    dateRange: first !== null && last !== null ? [first, last] : [...OPEN_DATE_RANGE],
    hourRange: [0, 23],
    paymentLabels: paymentOptions(dataset),
  };
}

/**
 * Keeps trips matching every predicate: pickup date and hour within their
 * inclusive ranges, and a selected payment label. No labels selected means
 * no trips. The dataset is not mutated and the view keeps its row order.
 */
export function applyTripFilter(dataset: readonly EnrichedTrip[], filter: TripFilter): FilteredView {
  const parsed = parseTripFilter(filter);
  const [startDate, endDate] = parsed.dateRange;
  const [fromHour, toHour] = parsed.hourRange;
  const labels = new Set(parsed.paymentLabels);

  const trips =
    labels.size === 0
      ? []
      : dataset.filter(
          (trip) =>
            trip.pickupDate >= startDate &&
            trip.pickupDate <= endDate &&
            trip.pickupHour >= fromHour &&
            trip.pickupHour <= toHour &&
            labels.has(trip.paymentLabel)
        );

  return {
    key: `${identityKey(dataset)}|${filterKey(parsed)}`,
    filter: parsed,
    trips,
  };
}
