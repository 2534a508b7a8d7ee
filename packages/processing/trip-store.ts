import { DuckDBConnection } from "@duckdb/node-api";
import fs from "fs";
import { rename, rm } from "node:fs/promises";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { z } from "zod";
import { WEEKDAYS } from "./types";
import type { CleanedTrip, RawTrip } from "./types";
import { formatElapsed } from "./utils";

/**
 * Reads and writes trip Parquet files. The cache logic in trip-cache.ts only
 * talks to this interface, so it can run against an in-memory store in tests.
 */
export interface TripStore {
  readRawTrips(parquetPath: string): Promise<RawTrip[]>;
  readCleanedTrips(parquetPath: string): Promise<CleanedTrip[]>;
  writeCleanedTrips(trips: readonly CleanedTrip[], parquetPath: string): Promise<void>;
  close(): void;
}

const RawTripRowSchema = z.object({
  pickupTime: z.string().nullable(),
  dropoffTime: z.string().nullable(),
  pickupZoneId: z.number().int().nullable(),
  dropoffZoneId: z.number().int().nullable(),
  tripDistance: z.number().nullable(),
  fareAmount: z.number().nullable(),
  totalAmount: z.number().nullable(),
  passengerCount: z.number().nullable(),
  paymentType: z.number().int().nullable(),
});

const CleanedTripRowSchema = z.object({
  pickupAt: z.number(),
  dropoffAt: z.number(),
  pickupZoneId: z.number().int(),
  dropoffZoneId: z.number().int(),
  tripDistance: z.number(),
  fareAmount: z.number(),
  totalAmount: z.number().nullable(),
  passengerCount: z.number(),
  paymentType: z.number().int().nullable(),
  durationMinutes: z.number(),
  speedMph: z.number(),
  pickupHour: z.number().int().min(0).max(23),
  pickupWeekday: z.enum(WEEKDAYS),
  pickupDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

// Single quotes are the only thing that needs escaping inside a SQL string literal
function sqlString(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

export class DuckDBTripStore implements TripStore {
  private connection: DuckDBConnection | null = null;

  private async connect(): Promise<DuckDBConnection> {
    if (!this.connection) {
      this.connection = await DuckDBConnection.create();
    }
    return this.connection;
  }

  async readRawTrips(parquetPath: string): Promise<RawTrip[]> {
    const connection = await this.connect();
    console.log(`[DuckDB] Reading raw trips from ${parquetPath}`);
    const startTime = Date.now();

    // Timestamps go through strftime so the naive wall clock survives untouched
    const reader = await connection.runAndReadAll(`
      SELECT
        strftime(CAST(tpep_pickup_datetime AS TIMESTAMP), '%Y-%m-%d %H:%M:%S') as pickupTime,
        strftime(CAST(tpep_dropoff_datetime AS TIMESTAMP), '%Y-%m-%d %H:%M:%S') as dropoffTime,
        CAST(PULocationID AS INTEGER) as pickupZoneId,
        CAST(DOLocationID AS INTEGER) as dropoffZoneId,
        CAST(trip_distance AS DOUBLE) as tripDistance,
        CAST(fare_amount AS DOUBLE) as fareAmount,
        CAST(total_amount AS DOUBLE) as totalAmount,
        CAST(passenger_count AS DOUBLE) as passengerCount,
        CAST(payment_type AS INTEGER) as paymentType
      FROM read_parquet(${sqlString(parquetPath)})
    `);

    const trips = z.array(RawTripRowSchema).parse(reader.getRowObjectsJson());
    console.log(`[DuckDB] ${trips.length} raw trips read in ${formatElapsed(startTime)}`);
    return trips;
  }

  async readCleanedTrips(parquetPath: string): Promise<CleanedTrip[]> {
    const connection = await this.connect();
    console.log(`[DuckDB] Reading cleaned trips from ${parquetPath}`);
    const startTime = Date.now();

    const reader = await connection.runAndReadAll(`
      SELECT
        CAST(epoch_ms(pickup_at) AS DOUBLE) as pickupAt,
        CAST(epoch_ms(dropoff_at) AS DOUBLE) as dropoffAt,
        pickup_zone_id as pickupZoneId,
        dropoff_zone_id as dropoffZoneId,
        trip_distance as tripDistance,
        fare_amount as fareAmount,
        total_amount as totalAmount,
        passenger_count as passengerCount,
        payment_type as paymentType,
        duration_minutes as durationMinutes,
        speed_mph as speedMph,
        pickup_hour as pickupHour,
        pickup_weekday as pickupWeekday,
        strftime(pickup_date, '%Y-%m-%d') as pickupDate
      FROM read_parquet(${sqlString(parquetPath)})
    `);

    const trips = z.array(CleanedTripRowSchema).parse(reader.getRowObjectsJson());
    console.log(`[DuckDB] ${trips.length} cleaned trips read in ${formatElapsed(startTime)}`);
    return trips;
  }

  /**
   * Stages the trips as newline-delimited JSON and lets DuckDB convert them to
   * Parquet. The Parquet file is written under a temporary name and renamed into
   * place, so the cache path only ever holds a complete artifact.
   */
  async writeCleanedTrips(trips: readonly CleanedTrip[], parquetPath: string): Promise<void> {
    const connection = await this.connect();
    const stagingPath = `${parquetPath}.staging.ndjson`;
    const tmpPath = `${parquetPath}.tmp`;
    const startTime = Date.now();

    try {
      await writeNdjson(stagingPath, trips);

      await connection.run(`
        COPY (
          SELECT
            epoch_ms(pickupAt) as pickup_at,
            epoch_ms(dropoffAt) as dropoff_at,
            pickupZoneId as pickup_zone_id,
            dropoffZoneId as dropoff_zone_id,
            tripDistance as trip_distance,
            fareAmount as fare_amount,
            totalAmount as total_amount,
            passengerCount as passenger_count,
            paymentType as payment_type,
            durationMinutes as duration_minutes,
            speedMph as speed_mph,
            pickupHour as pickup_hour,
            pickupWeekday as pickup_weekday,
            CAST(pickupDate AS DATE) as pickup_date
          FROM read_json(${sqlString(stagingPath)}, format = 'newline_delimited', columns = {
            pickupAt: 'BIGINT',
            dropoffAt: 'BIGINT',
            pickupZoneId: 'INTEGER',
            dropoffZoneId: 'INTEGER',
            tripDistance: 'DOUBLE',
            fareAmount: 'DOUBLE',
            totalAmount: 'DOUBLE',
            passengerCount: 'DOUBLE',
            paymentType: 'INTEGER',
            durationMinutes: 'DOUBLE',
            speedMph: 'DOUBLE',
            pickupHour: 'INTEGER',
            pickupWeekday: 'VARCHAR',
            pickupDate: 'VARCHAR'
          })
        ) TO ${sqlString(tmpPath)} (FORMAT PARQUET, COMPRESSION ZSTD)
      `);

      await rename(tmpPath, parquetPath);
    } finally {
      await rm(stagingPath, { force: true });
      await rm(tmpPath, { force: true });
    }

    console.log(`[DuckDB] ${trips.length} cleaned trips written in ${formatElapsed(startTime)}`);
  }

  close(): void {
    this.connection?.closeSync();
    this.connection = null;
  }
}

async function writeNdjson(filePath: string, rows: readonly object[]): Promise<void> {
  await pipeline(Readable.from(ndjsonLines(rows)), fs.createWriteStream(filePath, { encoding: "utf-8" }));
}

function* ndjsonLines(rows: readonly object[]): Generator<string> {
  for (const row of rows) {
    yield `${JSON.stringify(row)}\n`;
  }
}
