// =============================================================================
// Payment Labels
// =============================================================================

// TLC payment_type codes
export const PAYMENT_LABELS: Readonly<Record<number, string>> = {
  0: "Flex Fare",
  1: "Credit Card",
  2: "Cash",
  3: "No Charge",
  4: "Dispute",
  5: "Unknown",
  6: "Voided Trip",
};

export const OTHER_PAYMENT_LABEL = "Other";

// =============================================================================
// Aggregation Defaults
// =============================================================================

export const TOP_ZONES_LIMIT = 10;

export const HOURS_PER_DAY = 24;

// Chart range only; longer trips are still counted everywhere else
export const DISTANCE_HISTOGRAM = {
  maxMiles: 30,
  bins: 40,
} as const;

// Used as the default date range when the dataset is empty
export const OPEN_DATE_RANGE: [string, string] = ["0001-01-01", "9999-12-31"];

// =============================================================================
// Presentation
// =============================================================================

export const EMPTY_VIEW_MESSAGE =
  "No trips match your filters. Try widening date/hour/payment selections.";
