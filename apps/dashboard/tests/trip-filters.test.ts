import { describe, expect, test } from "vitest";
import {
  applyTripFilter,
  defaultTripFilter,
  filterKey,
  parseTripFilter,
  paymentOptions,
} from "@/lib/trip-filters";
import type { TripFilter } from "@/lib/trip-types";
import { sampleTrips } from "./fixtures";

const ALL: TripFilter = {
  dateRange: ["2024-01-01", "2024-01-31"],
  hourRange: [0, 23],
  paymentLabels: ["Cash", "Credit Card", "Other"],
};

function pickupTimes(trips: readonly { pickupAt: number }[]): string[] {
  return trips.map((trip) => new Date(trip.pickupAt).toISOString().slice(0, 16));
}

describe("defaultTripFilter", () => {
  test("covers every date, hour and payment label in the dataset", () => {
    expect(defaultTripFilter(sampleTrips())).toEqual({
      dateRange: ["2024-01-05", "2024-01-08"],
      hourRange: [0, 23],
      paymentLabels: ["Cash", "Credit Card", "Other"],
    });
  });

  test("falls back to an open date range for an empty dataset", () => {
    expect(defaultTripFilter([])).toEqual({
      dateRange: ["0001-01-01", "9999-12-31"],
      hourRange: [0, 23],
      paymentLabels: [],
    });
  });
});

describe("paymentOptions", () => {
  test("lists distinct labels alphabetically", () => {
    expect(paymentOptions(sampleTrips())).toEqual(["Cash", "Credit Card", "Other"]);
  });
});

describe("applyTripFilter", () => {
  test("the full filter returns the whole dataset in order", () => {
    const dataset = sampleTrips();
    const view = applyTripFilter(dataset, defaultTripFilter(dataset));

    expect(view.trips).toEqual(dataset);
    expect(view.trips).not.toBe(dataset);
  });

  test("date bounds are inclusive", () => {
    const view = applyTripFilter(sampleTrips(), { ...ALL, dateRange: ["2024-01-05", "2024-01-06"] });
    expect(pickupTimes(view.trips)).toEqual(["2024-01-05T08:00", "2024-01-05T08:30", "2024-01-06T23:10"]);
  });

  test("hour bounds are inclusive", () => {
    const view = applyTripFilter(sampleTrips(), { ...ALL, hourRange: [0, 8] });
    expect(pickupTimes(view.trips)).toEqual(["2024-01-05T08:00", "2024-01-05T08:30", "2024-01-07T00:05"]);
  });

  test("combines every predicate", () => {
    const view = applyTripFilter(sampleTrips(), {
      dateRange: ["2024-01-05", "2024-01-08"],
      hourRange: [8, 17],
      paymentLabels: ["Credit Card"],
    });
    expect(pickupTimes(view.trips)).toEqual(["2024-01-05T08:00", "2024-01-08T17:45"]);
  });

  test("an empty payment selection yields an empty view", () => {
    const view = applyTripFilter(sampleTrips(), { ...ALL, paymentLabels: [] });
    expect(view.trips).toEqual([]);
  });

  test("a start date after the end date yields an empty view", () => {
    const view = applyTripFilter(sampleTrips(), { ...ALL, dateRange: ["2024-01-08", "2024-01-05"] });
    expect(view.trips).toEqual([]);
  });

  test("does not mutate the dataset", () => {
    const dataset = sampleTrips();
    const before = JSON.stringify(dataset);
    applyTripFilter(dataset, { ...ALL, paymentLabels: ["Cash"] });
    expect(JSON.stringify(dataset)).toBe(before);
    expect(dataset).toHaveLength(5);
  });

  test("keys views by dataset identity and canonical filter", () => {
    const dataset = sampleTrips();
    const a = applyTripFilter(dataset, { ...ALL, paymentLabels: ["Cash", "Other"] });
    const b = applyTripFilter(dataset, { ...ALL, paymentLabels: ["Other", "Cash", "Cash"] });
    const c = applyTripFilter(sampleTrips(), { ...ALL, paymentLabels: ["Cash", "Other"] });

    expect(a.key).toBe(b.key);
    expect(c.key).not.toBe(a.key);
  });
});

describe("parseTripFilter", () => {
  test("accepts a valid filter", () => {
    expect(parseTripFilter(ALL)).toEqual(ALL);
  });

  test("rejects hours outside 0-23 or out of order", () => {
    expect(() => parseTripFilter({ ...ALL, hourRange: [0, 24] })).toThrow();
    expect(() => parseTripFilter({ ...ALL, hourRange: [-1, 5] })).toThrow();
    expect(() => parseTripFilter({ ...ALL, hourRange: [1.5, 5] })).toThrow();
    expect(() => parseTripFilter({ ...ALL, hourRange: [9, 3] })).toThrow(
      "hour range start must not be after its end"
    );
  });

  test("rejects malformed dates", () => {
    expect(() => parseTripFilter({ ...ALL, dateRange: ["2024-1-5", "2024-01-31"] })).toThrow(
      "expected YYYY-MM-DD"
    );
  });
});

describe("filterKey", () => {
  test("ignores label order and repeats", () => {
    expect(filterKey({ ...ALL, paymentLabels: ["Other", "Cash", "Other"] })).toBe(
      '2024-01-01..2024-01-31|0-23|["Cash","Other"]'
    );
  });
});
