import { describe, expect, it } from "vitest";
import { HttpFetch, SourceFetcher } from "../src/sources/fetcher";
import { sha256 } from "../src/utils/hash";
import { stubHttp } from "./helpers/http";

const signal = () => new AbortController().signal;

describe("SourceFetcher", () => {
  it("sends identifying headers and fingerprints the body", async () => {
    const http = stubHttp({ "https://a.test/list": { status: 200, body: "payload" } });
    const fetcher = new SourceFetcher({ http: http.fetch, userAgent: "test-agent/1.0" });

    const payload = await fetcher.fetch("https://a.test/list", signal());

    expect(payload.url).toBe("https://a.test/list");
    expect(payload.body.toString("utf8")).toBe("payload");
    expect(payload.fingerprint).toBe(sha256(Buffer.from("payload")));
    expect(http.calls[0].init.headers["User-Agent"]).toBe("test-agent/1.0");
    expect(http.calls[0].init.headers.Accept).toContain("text/html");
  });

  it("falls through candidate URLs on non-200 answers without retrying them", async () => {
    const http = stubHttp({
      "https://a.test/api": { status: 404, body: "" },
      "https://a.test/page": { status: 200, body: "page" }
    });
    const fetcher = new SourceFetcher({ http: http.fetch, retryDelayMs: 1 });

    const result = await fetcher.fetchFirst(["https://a.test/api", "https://a.test/page"], signal());

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.payload.url).toBe("https://a.test/page");
    expect(http.calls.map((call) => call.url)).toEqual(["https://a.test/api", "https://a.test/page"]);
  });

  it("retries transient failures", async () => {
    const http = stubHttp({
      "https://a.test/api": [
        { status: 503, body: "" },
        new Error("read ECONNRESET"),
        { status: 200, body: "ok" }
      ]
    });
    const fetcher = new SourceFetcher({ http: http.fetch, retries: 2, retryDelayMs: 1 });

    const payload = await fetcher.fetch("https://a.test/api", signal());

    expect(payload.body.toString("utf8")).toBe("ok");
    expect(http.calls).toHaveLength(3);
  });

  it("collects one failure line per location when every location fails", async () => {
    const http = stubHttp({ "https://b.test/two": new Error("getaddrinfo ENOTFOUND b.test") });
    const fetcher = new SourceFetcher({ http: http.fetch, retries: 0 });

    const result = await fetcher.fetchFirst(["https://b.test/one", "https://b.test/two"], signal());

    expect(result).toEqual({
      ok: false,
      failures: [
        "https://b.test/one: HTTP 404 for https://b.test/one",
        "https://b.test/two: getaddrinfo ENOTFOUND b.test"
      ]
    });
  });

  it("gives up on a request that outlives its timeout", async () => {
    const hanging: HttpFetch = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(init.signal.reason));
      });
    const fetcher = new SourceFetcher({ http: hanging, requestTimeoutMs: 20, retries: 0 });

    const result = await fetcher.fetchFirst(["https://slow.test/"], signal());

    expect(result).toEqual({ ok: false, failures: ["https://slow.test/: Request timeout after 20ms"] });
  });

  it("stops trying locations once the caller aborts", async () => {
    const http = stubHttp({});
    const controller = new AbortController();
    controller.abort();
    const fetcher = new SourceFetcher({ http: http.fetch });

    const result = await fetcher.fetchFirst(["https://c.test/1", "https://c.test/2"], controller.signal);

    expect(result).toEqual({ ok: false, failures: ["https://c.test/1: aborted"] });
    expect(http.calls).toHaveLength(0);
  });
});
