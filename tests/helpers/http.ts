import { readFileSync } from "fs";
import path from "path";
import { HttpFetch, HttpRequestInit } from "../../src/sources/fetcher";

export const fixturesDir = path.join(process.cwd(), "fixtures");

export function fixture(name: string): Buffer {
  return readFileSync(path.join(fixturesDir, name));
}

export type StubRoute = { status: number; body: string | Buffer } | Error;

export interface StubHttp {
  fetch: HttpFetch;
  calls: { url: string; init: HttpRequestInit }[];
}

/** Answers from a fixed route table; unknown URLs get a 404. Arrays are consumed one answer per call. */
export function stubHttp(routes: Record<string, StubRoute | StubRoute[]>): StubHttp {
  const calls: StubHttp["calls"] = [];
  const cursors = new Map<string, number>();
  const fetch: HttpFetch = async (url, init) => {
    calls.push({ url, init });
    const entry = routes[url];
    let route: StubRoute | undefined;
    if (Array.isArray(entry)) {
      const index = cursors.get(url) ?? 0;
      cursors.set(url, index + 1);
      route = entry[Math.min(index, entry.length - 1)];
    } else {
      route = entry;
    }
    if (!route) return { status: 404, body: Buffer.from("not found") };
    if (route instanceof Error) throw route;
    return { status: route.status, body: Buffer.isBuffer(route.body) ? route.body : Buffer.from(route.body) };
  };
  return { fetch, calls };
}
