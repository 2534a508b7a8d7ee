import { createStore } from "zustand/vanilla";
import { createDashboardAggregator } from "../aggregations";
import type { DashboardAggregator } from "../aggregations";
import { MemoCache } from "../memo-cache";
import { defaultTripFilter } from "../trip-filters";
import type { DashboardSnapshot, EnrichedTrip, FilteredView, TripFilter } from "../trip-types";

export type FilterState = {
  dataset: readonly EnrichedTrip[];
  filter: TripFilter;
  view: FilteredView;
  snapshot: DashboardSnapshot;
  isEmpty: boolean; // presentation shows the "no data" message instead of charts

  // Actions (each recomputes view + snapshot synchronously)
  setDateRange: (dateRange: [string, string]) => void;
  setHourRange: (hourRange: [number, number]) => void;
  setPaymentLabels: (paymentLabels: string[]) => void;
  reset: () => void;
};

// A filter that fails validation throws from the action and leaves the state as it was
export function createFilterStore(
  dataset: readonly EnrichedTrip[],
  aggregator: DashboardAggregator = createDashboardAggregator(new MemoCache())
) {
  const compute = (filter: TripFilter) => {
    const view = aggregator.applyFilter(dataset, filter);
    return {
      filter: view.filter,
      view,
      snapshot: aggregator.snapshot(view),
      isEmpty: view.trips.length === 0,
    };
  };

  return createStore<FilterState>()((set, get) => ({
    dataset,
    ...compute(defaultTripFilter(dataset)),

    setDateRange: (dateRange) => set(compute({ ...get().filter, dateRange })),
    setHourRange: (hourRange) => set(compute({ ...get().filter, hourRange })),
    setPaymentLabels: (paymentLabels) => set(compute({ ...get().filter, paymentLabels })),
    reset: () => set(compute(defaultTripFilter(dataset))),
  }));
}

export type FilterStore = ReturnType<typeof createFilterStore>;
