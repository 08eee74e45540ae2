import pino, { type Logger } from "pino";
import { vi } from "vitest";

export const BEE_URL = "http://bee.test:1633";

export type LogLine = Record<string, unknown>;

/**
 * A debug-level logger whose JSON lines are kept in memory.
 */
export function createCapturingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  );
  return { logger, lines };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function stubFetch() {
  const mockFetch = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", mockFetch);
  return mockFetch;
}

/**
 * A fetch that never answers and rejects once its signal aborts.
 */
export function hangingFetch(
  _input: Parameters<typeof fetch>[0],
  init?: RequestInit,
): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      reject(new Error("This operation was aborted"));
    });
  });
}

export function requestedUrls(mockFetch: ReturnType<typeof stubFetch>): string[] {
  return mockFetch.mock.calls.map(([input]) => String(input));
}
