import { describe, expect, it } from "vitest";
import { FetchLike, HttpClient } from "./httpClient";
import { OpenFmbError } from "../../domain/errors";
import { normalizeSettings } from "../../domain/settings";
import {
  fakeFetch,
  hangingFetch,
  jsonResponse,
  recordingLogger,
  stalledBodyFetch,
  textResponse,
  unreachableFetch
} from "../../testing/fakeFetch";

function clientWith(fetch: FetchLike, overrides: object = {}) {
  const { logger, sink } = recordingLogger();
  const settings = normalizeSettings({ baseUrl: "http://grid.test/", ...overrides });
  return { client: new HttpClient(settings, { fetch, logger }), sink };
}

async function captureError(promise: Promise<unknown>): Promise<OpenFmbError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof OpenFmbError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the request to fail");
}

describe("HttpClient", () => {
  it("builds URLs from base, path and defined query values", () => {
    const { client } = clientWith(fakeFetch(() => jsonResponse({})));
    expect(client.buildUrl("/devices", { limit: 5, start: undefined, end: "x y" })).toBe(
      "http://grid.test/devices?limit=5&end=x+y"
    );
    expect(client.buildUrl("/devices")).toBe("http://grid.test/devices");
  });

  it("returns the parsed JSON body", async () => {
    const fetch = fakeFetch(() => jsonResponse({ count: 1, device_uuids: ["a"] }));
    const { client } = clientWith(fetch);

    await expect(client.requestJson({ path: "/devices" })).resolves.toEqual({ count: 1, device_uuids: ["a"] });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe("http://grid.test/devices");
    expect(fetch.mock.calls[0][1]?.method).toBe("GET");
  });

  it("sends the API key header when configured", async () => {
    const fetch = fakeFetch(() => jsonResponse({}));
    const { client } = clientWith(fetch, { apiKey: "test-secret" });

    await client.requestJson({ path: "/devices" });

    expect(fetch.mock.calls[0][1]?.headers).toEqual({
      Accept: "application/json",
      "X-API-Key": "test-secret"
    });
  });

  it("wraps a JSON error body with the status", async () => {
    const { client, sink } = clientWith(fakeFetch(() => jsonResponse({ detail: "Device not found" }, 404)));

    const error = await captureError(client.requestJson({ path: "/devices/nope/last-state" }));

    expect(error.code).toBe("api.request_failed");
    expect(error.status).toBe(404);
    expect(error.message).toBe("API Error: 404");
    expect(error.payload).toEqual({ detail: "Device not found" });
    expect(error.toString()).toBe("API Error: 404 (status_code=404)");
    expect(sink).toHaveBeenCalledWith(
      "error",
      '[ERROR] openfmb-client: HTTP Error 404: {"detail":"Device not found"} {"method":"GET","url":"http://grid.test/devices/nope/last-state","status":404}'
    );
  });

  it("keeps a plain-text error body as detail", async () => {
    const { client } = clientWith(fakeFetch(() => textResponse("upstream exploded", 502)));

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.status).toBe(502);
    expect(error.payload).toEqual({ detail: "upstream exploded" });
  });

  it("reports invalid JSON on a successful status", async () => {
    const { client } = clientWith(fakeFetch(() => textResponse("<html>ok</html>")));

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.code).toBe("http.invalid_json");
    expect(error.message).toBe("API returned invalid JSON.");
    expect(error.payload).toEqual({ url: "http://grid.test/devices" });
  });

  it("maps connection failures to a network error", async () => {
    const { client } = clientWith(unreachableFetch());

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.code).toBe("http.network_error");
    expect(error.status).toBeUndefined();
    expect(error.message).toBe("Could not connect to the OpenFMB API.");
    expect(error.toString()).toBe("Could not connect to the OpenFMB API.");
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("aborts after the timeout and reports status 408", async () => {
    const { client } = clientWith(hangingFetch(), { timeoutS: 0.05 });

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.code).toBe("http.timeout");
    expect(error.status).toBe(408);
    expect(error.message).toBe("Request timed out after 0.05s.");
    expect(error.payload).toEqual({ url: "http://grid.test/devices", timeout: 0.05 });
  });

  it("times out when the body stalls after the headers", async () => {
    const { client } = clientWith(stalledBodyFetch(), { timeoutS: 0.05 });

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.code).toBe("http.timeout");
    expect(error.status).toBe(408);
    expect(error.message).toBe("Request timed out after 0.05s.");
  });

  it("keeps the response status on invalid JSON", async () => {
    const { client } = clientWith(fakeFetch(() => textResponse("", 201)));

    const error = await captureError(client.requestJson({ path: "/devices" }));

    expect(error.code).toBe("http.invalid_json");
    expect(error.status).toBe(201);
  });

  it("logs each request at debug level", async () => {
    const { client, sink } = clientWith(fakeFetch(() => jsonResponse([])));

    await client.requestJson({ path: "/devices" });

    expect(sink.mock.calls.map(([level, line]) => `${level}|${line}`)).toEqual([
      'debug|[DEBUG] openfmb-client: Sending request {"method":"GET","url":"http://grid.test/devices"}',
      'debug|[DEBUG] openfmb-client: Received response {"method":"GET","url":"http://grid.test/devices","status":200}'
    ]);
  });
});
