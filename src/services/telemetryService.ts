import { OpenFmbClient } from "../adapters/http/openFmbApiAdapter";
import {
  EmptyMeasurement,
  HISTORICAL_LIMIT_DEFAULT,
  MeasurementDto,
  TimeBound,
  toIsoTimestamp
} from "../domain/telemetry";
import { TechnicalError, asTechnicalError, invalidArgument } from "../domain/errors";

export type LatestReadingResult =
  | { ok: true; state: MeasurementDto | EmptyMeasurement }
  | { ok: false; error: TechnicalError };

/**
 * Fetches the last state of each device in turn. A device that fails is
 * reported with its error; the remaining devices are still queried.
 */
export async function fetchLatestReadings(
  client: OpenFmbClient,
  deviceUuids: string[]
): Promise<Record<string, LatestReadingResult>> {
  const results: Record<string, LatestReadingResult> = {};
  for (const deviceUuid of deviceUuids) {
    try {
      results[deviceUuid] = { ok: true, state: await client.getLastState(deviceUuid) };
    } catch (error) {
      results[deviceUuid] = { ok: false, error: asTechnicalError(error) };
    }
  }
  return results;
}

export async function fetchHistoricalWindow(
  client: OpenFmbClient,
  deviceUuid: string,
  start: TimeBound,
  end: TimeBound,
  limit = HISTORICAL_LIMIT_DEFAULT
): Promise<MeasurementDto[]> {
  const from = toIsoTimestamp(start, "start");
  const to = toIsoTimestamp(end, "end");
  if (Date.parse(from) > Date.parse(to)) {
    throw invalidArgument("start", from, "start must not be later than end.");
  }
  return client.getHistoricalData(deviceUuid, { limit, start: from, end: to });
}
