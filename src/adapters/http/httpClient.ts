import { ClientSettingsDto } from "../../domain/settings";
import { OpenFmbError } from "../../domain/errors";
import { Logger } from "../../utils/logger";

export type QueryValue = string | number | undefined;

export interface HttpRequestOptions {
  method?: "GET";
  path: string;
  query?: Record<string, QueryValue>;
  timeoutMs?: number;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetch?: FetchLike;
  logger: Logger;
}

interface RawResponse {
  status: number;
  text: string;
}

function readBody(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error("Response body read aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void response
      .text()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly defaultTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(settings: ClientSettingsDto, options: HttpClientOptions) {
    this.baseUrl = settings.baseUrl.replace(/\/+$/, "");
    this.apiKey = settings.apiKey;
    this.defaultTimeoutMs = settings.timeoutS * 1000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger;
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        params.append(key, String(value));
      }
    }
    const search = params.toString();
    return `${this.baseUrl}${path}${search ? `?${search}` : ""}`;
  }

  async requestJson<T>(options: HttpRequestOptions): Promise<T> {
    const url = this.buildUrl(options.path, options.query);
    const { status, text } = await this.request(url, options);
    try {
      return JSON.parse(text) as T;
    } catch (error) {
      this.logger.error("Invalid JSON received", { url, status }, error);
      throw new OpenFmbError({
        status,
        code: "http.invalid_json",
        message: "API returned invalid JSON.",
        payload: { url },
        cause: error
      });
    }
  }

  // The timeout covers the whole exchange, body included.
  private async request(url: string, options: HttpRequestOptions): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const handle = setTimeout(() => controller.abort(), timeout);
    const method = options.method ?? "GET";
    const headers: Record<string, string> = { Accept: "application/json" };

    if (this.apiKey) {
      headers["X-API-Key"] = this.apiKey;
    }

    this.logger.debug("Sending request", { method, url });
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        signal: controller.signal
      });
      if (!response.ok) {
        throw await this.buildApiError(response, method, url, controller.signal);
      }
      const text = await readBody(response, controller.signal);
      this.logger.debug("Received response", { method, url, status: response.status });
      return { status: response.status, text };
    } catch (error) {
      if (error instanceof OpenFmbError) {
        throw error;
      }
      if (controller.signal.aborted) {
        const timeoutS = timeout / 1000;
        this.logger.error(`Timeout connecting to ${url}`, { method, url, timeoutS });
        throw new OpenFmbError({
          status: 408,
          code: "http.timeout",
          message: `Request timed out after ${timeoutS}s.`,
          payload: { url, timeout: timeoutS },
          cause: error
        });
      }
      this.logger.error(`Connection failed to ${url}`, { method, url }, error);
      throw new OpenFmbError({
        code: "http.network_error",
        message: "Could not connect to the OpenFMB API.",
        payload: { url },
        cause: error
      });
    } finally {
      clearTimeout(handle);
    }
  }

  private async buildApiError(
    response: Response,
    method: string,
    url: string,
    signal: AbortSignal
  ): Promise<OpenFmbError> {
    const status = response.status;
    const text = await readBody(response, signal).catch(() => response.statusText);
    let payload: unknown;

    try {
      payload = JSON.parse(text);
    } catch {
      payload = { detail: text };
    }

    this.logger.error(`HTTP Error ${status}: ${text}`, { method, url, status });
    return new OpenFmbError({
      status,
      code: "api.request_failed",
      message: `API Error: ${status}`,
      payload
    });
  }
}
