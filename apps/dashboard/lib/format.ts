import type { TripMetrics } from "./trip-types";

const NOT_AVAILABLE = "n/a";

// =============================================================================
// Number Formatting
// =============================================================================

export function formatCount(count: number): string {
  return count.toLocaleString("en-US");
}

export function formatCurrency(amount: number | null, fractionDigits = 2): string {
  if (amount === null) return NOT_AVAILABLE;
  const formatted = Math.abs(amount).toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
  return `${amount < 0 ? "-" : ""}$${formatted}`;
}

export function formatMiles(miles: number | null): string {
  if (miles === null) return NOT_AVAILABLE;
  return `${miles.toFixed(2)} mi`;
}

export function formatMinutes(minutes: number | null): string {
  if (minutes === null) return NOT_AVAILABLE;
  return `${minutes.toFixed(1)} min`;
}

// =============================================================================
// Time Formatting
// =============================================================================

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

// =============================================================================
// Metrics
// =============================================================================

export function formatMetrics(metrics: TripMetrics): Array<{ metric: string; value: string }> {
  return [
    { metric: "Total Trips", value: formatCount(metrics.tripCount) },
    { metric: "Average Fare", value: formatCurrency(metrics.meanFare) },
    { metric: "Total Revenue", value: formatCurrency(metrics.totalRevenue, 0) },
    { metric: "Avg Distance", value: formatMiles(metrics.meanDistance) },
    { metric: "Avg Duration", value: formatMinutes(metrics.meanDurationMinutes) },
  ];
}
