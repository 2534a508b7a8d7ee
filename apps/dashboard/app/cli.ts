// Terminal dashboard over the cleaned taxi trips.
//
// Usage: npm run dashboard -- --from 2024-01-08 --to 2024-01-14 --hours 7-10 --payment "Credit Card,Cash"
//
// Loads (and on first run builds) the dataset, applies the filters and prints
// the key metrics followed by each aggregate table.
import { ZodError } from "zod";
import { createDashboardAggregator, dataCoverage } from "@/lib/aggregations";
import { EMPTY_VIEW_MESSAGE } from "@/lib/config";
import { formatCount, formatCurrency, formatHour, formatMetrics } from "@/lib/format";
import { MemoCache } from "@/lib/memo-cache";
import { createFilterStore } from "@/lib/stores/filter-store";
import type { FilterStore } from "@/lib/stores/filter-store";
import { paymentOptions } from "@/lib/trip-filters";
import type { DashboardSnapshot } from "@/lib/trip-types";
import { DatasetService } from "@/services/dataset-service";
import { parseCliArgs, USAGE, UsageError } from "./cli-args";
import type { CliOptions } from "./cli-args";

function applyOptions(store: FilterStore, options: CliOptions): void {
  if (options.from !== undefined || options.to !== undefined) {
    const [currentFrom, currentTo] = store.getState().filter.dateRange;
    store.getState().setDateRange([options.from ?? currentFrom, options.to ?? currentTo]);
  }
  if (options.hourRange) {
    store.getState().setHourRange(options.hourRange);
  }
  if (options.paymentLabels) {
    store.getState().setPaymentLabels(options.paymentLabels);
  }
}

function printTables(snapshot: DashboardSnapshot): void {
  console.log("\n--- Top Pickup Zones ---");
  console.table(
    snapshot.topZones.map((row) => ({
      zone: row.pickupZoneName,
      borough: row.pickupBorough,
      trips: formatCount(row.tripCount),
    }))
  );

  console.log("\n--- Average Fare by Hour ---");
  console.table(
    snapshot.hourlyFare.map((row) => ({
      hour: formatHour(row.pickupHour),
      trips: formatCount(row.tripCount),
      avgFare: formatCurrency(row.meanFare),
    }))
  );

  console.log("\n--- Trips by Day of Week and Hour ---");
  console.table(
    snapshot.heat.weekdays.map((weekday, dayIndex) => {
      const row: Record<string, number | string> = { day: weekday };
      for (const hour of snapshot.heat.hours) {
        row[String(hour)] = snapshot.heat.counts[dayIndex]?.[hour] ?? 0;
      }
      return row;
    })
  );

  console.log("\n--- Trip Distance Distribution ---");
  console.table(
    snapshot.distance.map((bin) => ({
      miles: `${bin.binStart.toFixed(2)}-${bin.binEnd.toFixed(2)}`,
      trips: formatCount(bin.tripCount),
    }))
  );

  console.log("\n--- Payment Types ---");
  console.table(
    snapshot.payments.map((row) => ({
      payment: row.paymentLabel,
      trips: formatCount(row.tripCount),
    }))
  );
}

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  const cache = new MemoCache();
  const service = new DatasetService(undefined, undefined, cache);
  const dataset = await service.load();
  const aggregator = createDashboardAggregator(cache);
  const store = createFilterStore(dataset, aggregator);

  const coverage = dataCoverage(dataset);
  console.log("\n=== NYC Yellow Taxi Trips ===");
  console.log(`Date range: ${coverage.firstDate ?? "n/a"} -> ${coverage.lastDate ?? "n/a"}`);
  console.log(`Rows loaded: ${formatCount(coverage.rowCount)}`);
  console.log(`Payment types: ${paymentOptions(dataset).join(", ")}`);

  applyOptions(store, options);
  const { filter, view, snapshot, isEmpty } = store.getState();

  console.log(
    `\nFilters: ${filter.dateRange[0]} -> ${filter.dateRange[1]}, ` +
      `hours ${filter.hourRange[0]}-${filter.hourRange[1]}, ` +
      `payment [${filter.paymentLabels.join(", ")}]`
  );
  console.log(`Trips after filters: ${formatCount(view.trips.length)}`);

  if (isEmpty) {
    console.warn(`\n${EMPTY_VIEW_MESSAGE}`);
    return;
  }

  console.log("\n--- Key Metrics ---");
  console.table(formatMetrics(snapshot.metrics));

  printTables({ ...snapshot, topZones: aggregator.topZones(view, options.top) });
}

main().catch((err) => {
  if (err instanceof UsageError || err instanceof ZodError) {
    console.error(err instanceof ZodError ? err.issues.map((issue) => issue.message).join("\n") : err.message);
    console.error(`\n${USAGE}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
