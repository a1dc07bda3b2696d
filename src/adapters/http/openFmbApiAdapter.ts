import { FetchLike, HttpClient } from "./httpClient";
import {
  ClientSettingsDto,
  normalizeSettings
} from "../../domain/settings";
import {
  DevicesDto,
  HealthDto,
  deviceUuids,
  isHealthy
} from "../../domain/devices";
import {
  EmptyMeasurement,
  HISTORICAL_LIMIT_DEFAULT,
  HistoricalQuery,
  HistoricalResponseDto,
  LastStateResponseDto,
  MeasurementDto,
  assertHistoricalLimit,
  assertMeasurements,
  orderMeasurements,
  toIsoTimestamp
} from "../../domain/telemetry";
import { OpenFmbError, invalidArgument } from "../../domain/errors";
import { Logger, createLogger, resolveLogLevel } from "../../utils/logger";

export interface OpenFmbClientOptions {
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Client for the OpenFMB telemetry API. Each method issues a single GET
 * against the configured base URL; failures surface as OpenFmbError,
 * except in checkHealth which reports them as `false`.
 *
 * @example
 * const client = new OpenFmbClient({ baseUrl: "http://localhost:8000" });
 * const state = await client.getLastState("7f3c0e1a-5b1d-4c55-9d0e-2f1a6b8c9d10");
 */
export class OpenFmbClient {
  readonly settings: ClientSettingsDto;
  private readonly logger: Logger;
  private readonly http: HttpClient;

  constructor(settings: Partial<ClientSettingsDto> = {}, options: OpenFmbClientOptions = {}) {
    this.settings = normalizeSettings(settings);
    this.logger =
      options.logger ??
      createLogger({
        level: this.settings.debugLogging ? "debug" : resolveLogLevel(process.env.OPENFMB_LOG_LEVEL)
      });
    this.http = new HttpClient(this.settings, { fetch: options.fetch, logger: this.logger });
  }

  /** Verifies that the API and its database are responsive. */
  async checkHealth(): Promise<boolean> {
    try {
      const payload = await this.http.requestJson<HealthDto>({ path: "/test-db" });
      return isHealthy(payload);
    } catch (error) {
      if (error instanceof OpenFmbError) {
        this.logger.warn("Health check failed", { code: error.code, status: error.status });
        return false;
      }
      throw error;
    }
  }

  /**
   * Latest measurement for a device. Resolves to an empty object when the
   * service answers without a `latest_measurement`.
   */
  async getLastState(deviceUuid: string): Promise<MeasurementDto | EmptyMeasurement> {
    const payload = await this.http.requestJson<LastStateResponseDto>({
      path: `${devicePath(deviceUuid)}/last-state`
    });
    return payload?.latest_measurement ?? {};
  }

  /**
   * Historical measurements, oldest first and at most `limit` of them.
   * `start` and `end` are inclusive bounds.
   */
  async getHistoricalData(deviceUuid: string, query: HistoricalQuery = {}): Promise<MeasurementDto[]> {
    const limit = assertHistoricalLimit(query.limit ?? HISTORICAL_LIMIT_DEFAULT);
    const path = `${devicePath(deviceUuid)}/historical`;
    const payload = await this.http.requestJson<HistoricalResponseDto>({
      path,
      query: {
        limit,
        start: query.start !== undefined ? toIsoTimestamp(query.start, "start") : undefined,
        end: query.end !== undefined ? toIsoTimestamp(query.end, "end") : undefined
      }
    });
    const measurements = payload?.measurements;
    if (!Array.isArray(measurements)) {
      return [];
    }
    return orderMeasurements(assertMeasurements(measurements), limit);
  }

  async getDevices(): Promise<DevicesDto> {
    return this.http.requestJson<DevicesDto>({ path: "/devices" });
  }

  async listDevices(): Promise<string[]> {
    return deviceUuids(await this.getDevices());
  }
}

// Identifiers are opaque: only blank ones are refused, the rest are sent as given.
function devicePath(deviceUuid: string): string {
  if (!deviceUuid.trim()) {
    throw invalidArgument("deviceUuid", deviceUuid, "deviceUuid must be a non-empty string.");
  }
  return `/devices/${encodeURIComponent(deviceUuid)}`;
}
