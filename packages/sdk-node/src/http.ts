import { NetworkError, classifyError } from "@flagtier/sdk-core";

/**
 * JSON transport the client talks through. Both methods reject with a
 * NetworkError on any transport or status failure.
 */
export interface Transport {
  get(path: string): Promise<unknown>;
  post(path: string, body: unknown): Promise<unknown>;
}

export interface HttpClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout: number;
}

/**
 * fetch-based Transport with per-request timeout
 */
export class HttpClient implements Transport {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout;
    this.headers = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (config.apiKey) {
      this.headers["X-API-Key"] = config.apiKey;
    }
  }

  get(path: string): Promise<unknown> {
    return this.request("GET", path);
  }

  post(path: string, body: unknown): Promise<unknown> {
    return this.request("POST", path, body);
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body?: unknown,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw NetworkError.fromStatus(
          path,
          response.status,
          response.statusText,
        );
      }

      const text = await response.text();
      if (text.length === 0) {
        return {};
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new NetworkError(`Invalid JSON from ${path}`, undefined, {
          statusCode: response.status,
          cause: error,
        });
      }
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      const classified = classifyError(error);
      throw new NetworkError(
        `${method} ${path} failed: ${classified.message}`,
        classified instanceof NetworkError ? classified.code : undefined,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
