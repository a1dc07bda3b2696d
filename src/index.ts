export { OpenFmbClient } from "./adapters/http/openFmbApiAdapter";
export type { OpenFmbClientOptions } from "./adapters/http/openFmbApiAdapter";
export type { FetchLike } from "./adapters/http/httpClient";
export { OpenFmbError, asTechnicalError } from "./domain/errors";
export type { TechnicalError } from "./domain/errors";
export { defaultSettings, normalizeSettings, settingsFromEnv } from "./domain/settings";
export type { ClientSettingsDto, SettingsEnv } from "./domain/settings";
export {
  HISTORICAL_LIMIT_DEFAULT,
  HISTORICAL_LIMIT_MAX,
  HISTORICAL_LIMIT_MIN,
  orderMeasurements
} from "./domain/telemetry";
export type { EmptyMeasurement, HistoricalQuery, MeasurementDto, TimeBound } from "./domain/telemetry";
export type { ConnectionCheckDto, DevicesDto, DiscoveryResultDto, HealthDto } from "./domain/devices";
export { createLogger } from "./utils/logger";
export type { LogContext, LogLevel, LogSink, Logger } from "./utils/logger";
export { fetchHistoricalWindow, fetchLatestReadings } from "./services/telemetryService";
export type { LatestReadingResult } from "./services/telemetryService";
export { discoverServices, testConnection } from "./services/diagnosticsService";
