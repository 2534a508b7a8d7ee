import { parseArgs } from "util";
import { TOP_ZONES_LIMIT } from "@/lib/config";

export const USAGE = [
  "Usage: npm run dashboard -- [options]",
  "  --from YYYY-MM-DD      first pickup date (default: first date in the data)",
  "  --to YYYY-MM-DD        last pickup date (default: last date in the data)",
  "  --hours H0-H1          pickup hour range, 0-23 (default: 0-23)",
  '  --payment "A,B"        payment labels to keep (default: all)',
  "  --top N                number of pickup zones to list (default: 10)",
].join("\n");

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliOptions = {
  from?: string;
  to?: string;
  hourRange?: [number, number];
  paymentLabels?: string[];
  top: number;
};

function parseHourRange(value: string): [number, number] {
  const match = /^(\d{1,2})(?:-(\d{1,2}))?$/.exec(value.trim());
  if (!match) {
    throw new UsageError(`Invalid --hours value: ${value}`);
  }
  const from = Number(match[1]);
  const to = match[2] === undefined ? from : Number(match[2]);
  return [from, to];
}

// "Credit Card, Cash" -> ["Credit Card", "Cash"]; an empty value selects nothing
function parseLabels(value: string): string[] {
  return value
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

function parseTop(value: string): number {
  const top = Number(value);
  if (!Number.isInteger(top) || top <= 0) {
    throw new UsageError(`Invalid --top value: ${value}`);
  }
  return top;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        from: { type: "string" },
        to: { type: "string" },
        hours: { type: "string" },
        payment: { type: "string" },
        top: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);
  return {
    from: values.from,
    to: values.to,
    hourRange: values.hours === undefined ? undefined : parseHourRange(values.hours),
    paymentLabels: values.payment === undefined ? undefined : parseLabels(values.payment),
    top: values.top === undefined ? TOP_ZONES_LIMIT : parseTop(values.top),
  };
}
