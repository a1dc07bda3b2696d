import { OpenFmbError } from "./errors";
import { isRecord } from "./records";

export interface ClientSettingsDto {
  baseUrl: string;
  timeoutS: number;
  apiKey: string;
  debugLogging: boolean;
}

// setTimeout overflows past 2^31 - 1 ms.
export const MAX_TIMEOUT_S = 2147483;

export type SettingsEnv = Record<string, string | undefined>;

export function defaultSettings(): ClientSettingsDto {
  return {
    baseUrl: "http://localhost:8000",
    timeoutS: 5,
    apiKey: "",
    debugLogging: false
  };
}

function assertPositiveNumber(value: unknown, field: string, max: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > max) {
    throw new OpenFmbError({
      code: "settings.invalid_number",
      message: `${field} must be a positive number no greater than ${max}.`
    });
  }
  return parsed;
}

function normalizeBaseUrl(value: unknown): string {
  const trimmed = String(value ?? "").trim().replace(/\/+$/, "");
  if (!/^https?:\/\/[^/]+/i.test(trimmed)) {
    throw new OpenFmbError({
      code: "settings.invalid_base_url",
      message: `baseUrl must be an http(s) URL, got "${trimmed}".`
    });
  }
  return trimmed;
}

export function normalizeSettings(input: unknown): ClientSettingsDto {
  const defaults = defaultSettings();
  const candidate: Record<string, unknown> = isRecord(input) ? input : {};

  return {
    baseUrl: normalizeBaseUrl(candidate.baseUrl ?? defaults.baseUrl),
    timeoutS: assertPositiveNumber(candidate.timeoutS ?? defaults.timeoutS, "timeoutS", MAX_TIMEOUT_S),
    apiKey: String(candidate.apiKey ?? defaults.apiKey),
    debugLogging: Boolean(candidate.debugLogging ?? defaults.debugLogging)
  };
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || !value.trim()) {
    return undefined;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Reads OPENFMB_BASE_URL, OPENFMB_TIMEOUT_S, OPENFMB_API_KEY and
 * OPENFMB_DEBUG. Unset or blank variables fall back to the defaults.
 */
export function settingsFromEnv(env: SettingsEnv): ClientSettingsDto {
  const blankToUndefined = (value: string | undefined) => (value && value.trim() ? value : undefined);
  return normalizeSettings({
    baseUrl: blankToUndefined(env.OPENFMB_BASE_URL),
    timeoutS: blankToUndefined(env.OPENFMB_TIMEOUT_S),
    apiKey: env.OPENFMB_API_KEY,
    debugLogging: parseFlag(env.OPENFMB_DEBUG)
  });
}
