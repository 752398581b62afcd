import { vi } from "vitest";
import type { HttpClient, HttpResponse } from "../../types.js";

/** `count` distinct plain words with no install phrase or code marker */
export function prose(count: number): string {
  return Array.from({ length: count }, (_, i) => `word${i}`).join(" ");
}

export const PIP_QUICKSTART_README = "Run `pip install foo` then:\n\n```\npython foo.py\n```";

/**
 * In-process HttpClient: URLs in `routes` answer with their response,
 * everything else is a 404. Records every requested URL in order.
 */
export function createFakeHttpClient(routes: Record<string, HttpResponse> = {}) {
  const requested: string[] = [];
  const get = vi.fn(async (url: string): Promise<HttpResponse> => {
    requested.push(url);
    return routes[url] ?? { status: 404, body: "Not Found" };
  });
  const client: HttpClient = { get };
  return { client, get, requested };
}
