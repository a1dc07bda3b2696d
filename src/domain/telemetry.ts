import { OpenFmbError, invalidArgument } from "./errors";
import { isRecord } from "./records";

export const HISTORICAL_LIMIT_MIN = 1;
export const HISTORICAL_LIMIT_MAX = 5000;
export const HISTORICAL_LIMIT_DEFAULT = 100;

export interface MeasurementDto {
  timestamp: string;
  uuid: string;
  data: Record<string, unknown>;
  [key: string]: unknown;
}

/** What `/last-state` yields when the service has no measurement to report. */
export type EmptyMeasurement = Record<string, never>;

export interface LastStateResponseDto {
  latest_measurement?: MeasurementDto;
}

export interface HistoricalResponseDto {
  measurements?: MeasurementDto[];
}

export type TimeBound = Date | string;

export interface HistoricalQuery {
  limit?: number;
  start?: TimeBound;
  end?: TimeBound;
}

function isMeasurement(value: unknown): value is MeasurementDto {
  return isRecord(value);
}

/** Rejects a measurement list containing anything other than JSON objects. */
export function assertMeasurements(values: unknown[]): MeasurementDto[] {
  const index = values.findIndex((value) => !isMeasurement(value));
  if (index !== -1) {
    throw new OpenFmbError({
      code: "api.invalid_payload",
      message: "API returned a malformed measurement.",
      payload: { index, value: values[index] }
    });
  }
  return values.filter(isMeasurement);
}

export function measurementTime(record: MeasurementDto): number {
  const parsed = typeof record.timestamp === "string" ? Date.parse(record.timestamp) : Number.NaN;
  return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
}

// Stable: records sharing a timestamp keep the order the service sent them in.
export function orderMeasurements(records: MeasurementDto[], limit: number): MeasurementDto[] {
  return [...records]
    .sort((left, right) => {
      const a = measurementTime(left);
      const b = measurementTime(right);
      if (a === b) {
        return 0;
      }
      return a < b ? -1 : 1;
    })
    .slice(0, Math.max(0, limit));
}

export function assertHistoricalLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < HISTORICAL_LIMIT_MIN || limit > HISTORICAL_LIMIT_MAX) {
    throw invalidArgument(
      "limit",
      limit,
      `limit must be an integer between ${HISTORICAL_LIMIT_MIN} and ${HISTORICAL_LIMIT_MAX}.`
    );
  }
  return limit;
}

export function toIsoTimestamp(value: TimeBound, field: string): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw invalidArgument(field, String(value), `${field} is not a valid date.`);
    }
    return value.toISOString();
  }
  const trimmed = value.trim();
  if (!trimmed || Number.isNaN(Date.parse(trimmed))) {
    throw invalidArgument(field, value, `${field} must be an ISO-8601 timestamp.`);
  }
  return trimmed;
}
