import { OpenFmbClient, OpenFmbClientOptions } from "../adapters/http/openFmbApiAdapter";
import { ConnectionCheckDto, DiscoveryResultDto } from "../domain/devices";
import { ClientSettingsDto } from "../domain/settings";
import { asTechnicalError } from "../domain/errors";

export async function testConnection(client: OpenFmbClient): Promise<ConnectionCheckDto> {
  if (!(await client.checkHealth())) {
    return { ok: false, detail: "database=unavailable" };
  }
  try {
    const devices = await client.getDevices();
    return { ok: true, detail: `database=ok devices=${devices.count}` };
  } catch (error) {
    return { ok: false, detail: asTechnicalError(error).message };
  }
}

/** Checks each candidate base URL in turn with otherwise identical settings. */
export async function discoverServices(
  baseUrls: string[],
  settings: Partial<Omit<ClientSettingsDto, "baseUrl">> = {},
  options: OpenFmbClientOptions = {}
): Promise<DiscoveryResultDto[]> {
  const outcomes: DiscoveryResultDto[] = [];
  for (const baseUrl of baseUrls) {
    try {
      const client = new OpenFmbClient({ ...settings, baseUrl }, options);
      outcomes.push({ baseUrl, ...(await testConnection(client)) });
    } catch (error) {
      outcomes.push({ baseUrl, ok: false, detail: asTechnicalError(error).message });
    }
  }
  return outcomes;
}
