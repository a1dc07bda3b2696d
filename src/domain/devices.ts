import { isRecord } from "./records";

export interface DevicesDto {
  count: number;
  device_uuids: string[];
}

export interface HealthDto {
  database_version?: string;
  [key: string]: unknown;
}

export interface ConnectionCheckDto {
  ok: boolean;
  detail: string;
}

export interface DiscoveryResultDto extends ConnectionCheckDto {
  baseUrl: string;
}

export function isHealthy(payload: unknown): boolean {
  return isRecord(payload) && "database_version" in payload;
}

export function deviceUuids(payload: DevicesDto | null): string[] {
  const uuids = payload?.device_uuids;
  return Array.isArray(uuids) ? uuids : [];
}
