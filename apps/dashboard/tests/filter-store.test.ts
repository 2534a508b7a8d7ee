import { describe, expect, test, vi } from "vitest";
import { createDashboardAggregator } from "@/lib/aggregations";
import { MemoCache } from "@/lib/memo-cache";
import { createFilterStore } from "@/lib/stores/filter-store";
import { sampleTrips } from "./fixtures";

describe("createFilterStore", () => {
  test("starts from the filter that selects everything", () => {
    const store = createFilterStore(sampleTrips());
    const state = store.getState();

    expect(state.filter).toEqual({
      dateRange: ["2024-01-05", "2024-01-08"],
      hourRange: [0, 23],
      paymentLabels: ["Cash", "Credit Card", "Other"],
    });
    expect(state.view.trips).toHaveLength(5);
    expect(state.snapshot.metrics.tripCount).toBe(5);
    expect(state.isEmpty).toBe(false);
  });

  test("recomputes the view and snapshot on each change", () => {
    const store = createFilterStore(sampleTrips());

    store.getState().setDateRange(["2024-01-05", "2024-01-06"]);
    expect(store.getState().view.trips).toHaveLength(3);

    store.getState().setHourRange([8, 8]);
    expect(store.getState().view.trips).toHaveLength(2);
    expect(store.getState().snapshot.hourlyFare).toEqual([{ pickupHour: 8, tripCount: 2, meanFare: 40 }]);

    store.getState().setPaymentLabels(["Cash"]);
    const { filter, snapshot } = store.getState();
    expect(filter).toEqual({ dateRange: ["2024-01-05", "2024-01-06"], hourRange: [8, 8], paymentLabels: ["Cash"] });
    expect(snapshot.metrics.tripCount).toBe(1);
    expect(snapshot.topZones).toEqual([{ pickupZoneName: "JFK Airport", pickupBorough: "Queens", tripCount: 1 }]);
  });

  test("an empty payment selection flags the view as empty", () => {
    const store = createFilterStore(sampleTrips());

    store.getState().setPaymentLabels([]);
    const { isEmpty, snapshot } = store.getState();

    expect(isEmpty).toBe(true);
    expect(snapshot.metrics.tripCount).toBe(0);
    expect(snapshot.topZones).toEqual([]);
  });

  test("an invalid hour range throws and leaves the state as it was", () => {
    const store = createFilterStore(sampleTrips());
    store.getState().setHourRange([8, 17]);
    const before = store.getState();

    expect(() => store.getState().setHourRange([17, 8])).toThrow("hour range start must not be after its end");
    expect(() => store.getState().setHourRange([0, 24])).toThrow();
    expect(store.getState()).toBe(before);
  });

  test("reset restores the default filter", () => {
    const store = createFilterStore(sampleTrips());
    store.getState().setPaymentLabels(["Other"]);

    store.getState().reset();

    expect(store.getState().filter.paymentLabels).toEqual(["Cash", "Credit Card", "Other"]);
    expect(store.getState().view.trips).toHaveLength(5);
  });

  test("notifies subscribers on change", () => {
    const store = createFilterStore(sampleTrips());
    const listener = vi.fn();
    store.subscribe(listener);

    store.getState().setHourRange([0, 8]);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getState().view.trips).toHaveLength(3);
  });

  test("reuses memoized views from a shared aggregator", () => {
    const dataset = sampleTrips();
    const aggregator = createDashboardAggregator(new MemoCache());
    const store = createFilterStore(dataset, aggregator);
    const initial = store.getState().view;

    store.getState().setPaymentLabels(["Cash"]);
    store.getState().reset();

    expect(store.getState().view).toBe(initial);
  });
});
