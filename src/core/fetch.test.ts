import { Response, type RequestInit } from "undici";
import { describe, expect, it, vi } from "vitest";
import { createTestDeps } from "../testing/helpers";
import { fetchHtml, httpGet, HttpStatusError } from "./fetch";

const PAGE_URL = "https://www.cgmlst.org/ncs/scheme/";

describe("httpGet", () => {
  it("sends the configured user agent and accept header", async () => {
    const { config } = createTestDeps({ userAgent: "cgmlst-schemes-test" });
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response("<p>ok</p>"));

    await expect(fetchHtml(PAGE_URL, config, fetchFn)).resolves.toBe("<p>ok</p>");
    expect(fetchFn.mock.calls[0][1].headers).toEqual({
      "user-agent": "cgmlst-schemes-test",
      accept: "text/html,application/xhtml+xml",
    });
  });

  it("throws HttpStatusError for a non-success status", async () => {
    const { config } = createTestDeps();
    const fetchFn = vi.fn(async () => new Response("missing", { status: 404 }));

    const result = httpGet(PAGE_URL, config, { accept: "*/*", timeoutMs: 1000 }, fetchFn);

    await expect(result).rejects.toBeInstanceOf(HttpStatusError);
    await expect(result).rejects.toThrow(`HTTP 404 while fetching ${PAGE_URL}`);
  });

  it("aborts a request whose headers do not arrive in time", async () => {
    const { config } = createTestDeps();
    const fetchFn = vi.fn(
      (_url: string, init: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("request aborted")));
        }),
    );

    await expect(httpGet(PAGE_URL, config, { accept: "*/*", timeoutMs: 5 }, fetchFn)).rejects.toThrow("request aborted");
  });

  it("stops the timeout once the headers have arrived", async () => {
    const { config } = createTestDeps();
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response("<p>slow body</p>"));

    const response = await httpGet(PAGE_URL, config, { accept: "*/*", timeoutMs: 5 }, fetchFn);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(fetchFn.mock.calls[0][1].signal?.aborted).toBe(false);
    await expect(response.text()).resolves.toBe("<p>slow body</p>");
  });
});
