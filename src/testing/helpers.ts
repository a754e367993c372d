import { Response } from "undici";
import { vi } from "vitest";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";

export function createTestDeps(overrides: Partial<AppConfig> = {}) {
  const lines: string[] = [];
  return {
    config: { ...DEFAULT_CONFIG, ...overrides },
    logger: new Logger({ component: "test", runId: "run_test", level: "debug", sink: (line) => lines.push(line) }),
    metrics: new MetricsRegistry(),
    logLines: lines,
  };
}

export type RouteHandler = () => Response | Promise<Response>;

/** Fetch stand-in answering from a URL table; unknown URLs get a 404. */
export function stubFetch(routes: Record<string, RouteHandler>) {
  return vi.fn(async (url: string) => {
    const handler = routes[url];
    if (!handler) {
      return new Response("not found", { status: 404 });
    }
    return handler();
  });
}

export function htmlResponse(html: string): RouteHandler {
  return () => new Response(html, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}
