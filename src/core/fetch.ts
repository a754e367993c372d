import { Agent, fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";
import type { AppConfig } from "../config";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`HTTP ${status} while fetching ${url}`);
    this.name = "HttpStatusError";
  }
}

interface GetOptions {
  accept: string;
  timeoutMs: number;
}

/**
 * Issues a GET with the configured user agent and TLS policy and returns the 2xx
 * response. The timeout applies until the response headers arrive; the caller
 * reads the body.
 */
export async function httpGet(
  url: string,
  config: AppConfig,
  options: GetOptions,
  fetchFn: FetchFn = defaultFetch,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": config.userAgent,
        accept: options.accept,
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, url);
  }
  return response;
}

export async function fetchHtml(url: string, config: AppConfig, fetchFn?: FetchFn): Promise<string> {
  const response = await httpGet(
    url,
    config,
    { accept: "text/html,application/xhtml+xml", timeoutMs: config.requestTimeoutMs },
    fetchFn,
  );
  return response.text();
}
