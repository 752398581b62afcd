/**
 * HTTP capability over the global fetch, with a per-request timeout.
 */

import { ReadmeFetchError } from "@onramp/errors";
import { DEFAULT_TIMEOUT_MS, type HttpClient, type HttpResponse } from "./types.js";

export interface FetchHttpClientConfig {
  readonly timeoutMs?: number;
}

/**
 * HttpClient over `fetch`. Any status is returned as-is; timeouts and network
 * failures reject with ReadmeFetchError. An external abort re-throws the
 * AbortError untouched.
 */
export function createFetchHttpClient(config: FetchHttpClientConfig = {}): HttpClient {
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async get(url: string, signal?: AbortSignal): Promise<HttpResponse> {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      // Link external signal to internal controller
      const onExternalAbort = () => controller.abort();
      signal?.addEventListener("abort", onExternalAbort, { once: true });

      try {
        const response = await fetch(url, {
          method: "GET",
          headers: { Accept: "text/plain, text/markdown, */*" },
          redirect: "follow",
          signal: controller.signal,
        });
        if (response.status !== 200) {
          // Drain the body so the connection is released
          await response.text().catch(() => "");
          return { status: response.status, body: "" };
        }
        return { status: response.status, body: await response.text() };
      } catch (error) {
        if (error instanceof DOMException && error.name === "AbortError") {
          if (signal?.aborted) {
            throw error;
          }
          throw new ReadmeFetchError(url, `request timed out after ${timeoutMs}ms`);
        }

        throw new ReadmeFetchError(
          url,
          error instanceof Error ? error.message : String(error),
          undefined,
          error instanceof Error ? error : undefined,
        );
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onExternalAbort);
      }
    },
  };
}

/**
 * Return a fetch-backed client when the runtime has a global `fetch`,
 * `undefined` otherwise. Absence is a valid configuration, not an error.
 */
export function detectHttpClient(config: FetchHttpClientConfig = {}): HttpClient | undefined {
  if (typeof globalThis.fetch !== "function") {
    return undefined;
  }
  return createFetchHttpClient(config);
}
