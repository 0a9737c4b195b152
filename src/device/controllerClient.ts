import { ControllerSettings } from "../config/env";
import { errorMessage } from "../errors";
import { ApplyOutcome, RegionBlockingPort, RegionBlockingSettings, RegionBlockingState } from "./regionBlocking";

export interface ControllerRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ControllerResponse {
  status: number;
  body: string;
}

export type ControllerTransport = (request: ControllerRequest) => Promise<ControllerResponse>;

export const nodeControllerTransport: ControllerTransport = async (request) => {
  const res = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: AbortSignal.timeout(30000)
  });
  return { status: res.status, body: await res.text() };
};

type SettingRecord = Record<string, unknown>;

function isRecord(value: unknown): value is SettingRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The settings endpoint answers with a bare array, a single object, or the
 * usual `{ meta, data: [...] }` envelope depending on controller version.
 */
export function parseSettingResponse(body: string): SettingRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new Error(`could not parse usg settings response: ${errorMessage(error)}`);
  }

  if (Array.isArray(parsed) && isRecord(parsed[0])) {
    return parsed[0];
  }
  if (isRecord(parsed)) {
    if (typeof parsed._id === "string" && parsed._id) {
      return parsed;
    }
    const data = parsed.data;
    if (Array.isArray(data) && isRecord(data[0])) {
      return data[0];
    }
  }
  throw new Error("could not parse usg settings response");
}

export function parseCountryList(value: unknown): string[] {
  if (typeof value !== "string" || !value.trim()) return [];
  return value
    .split(",")
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);
}

/**
 * Region blocking through a controller's `usg` setting. Expects a session
 * established elsewhere: the cookie and CSRF token are sent as given.
 */
export class ControllerRegionBlockingClient implements RegionBlockingPort {
  private readonly transport: ControllerTransport;
  private readonly baseUrl: string;

  constructor(
    private readonly settings: ControllerSettings,
    transport: ControllerTransport = nodeControllerTransport
  ) {
    this.transport = transport;
    this.baseUrl = settings.host.replace(/\/+$/, "");
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      Cookie: this.settings.sessionCookie
    };
    if (this.settings.csrfToken) {
      headers["X-Csrf-Token"] = this.settings.csrfToken;
    }
    return headers;
  }

  private url(pathname: string): string {
    return `${this.baseUrl}/api/s/${encodeURIComponent(this.settings.site)}/${pathname}`;
  }

  async getSetting(): Promise<SettingRecord> {
    const res = await this.transport({ method: "GET", url: this.url("rest/setting/usg"), headers: this.headers() });
    if (res.status !== 200) {
      throw new Error(`unexpected status ${res.status} when getting usg settings`);
    }
    return parseSettingResponse(res.body);
  }

  /** The stored list is reported whether or not filtering is enabled. */
  async readState(): Promise<RegionBlockingState> {
    const setting = await this.getSetting();
    return {
      enabled: setting.geo_ip_filtering_enabled === true,
      codes: parseCountryList(setting.geo_ip_filtering_countries)
    };
  }

  async apply(settings: RegionBlockingSettings): Promise<ApplyOutcome> {
    let current: SettingRecord;
    try {
      current = await this.getSetting();
    } catch (error) {
      return { ok: false, error: `failed to get current settings: ${errorMessage(error)}` };
    }

    const updated: SettingRecord = {
      ...current,
      geo_ip_filtering_enabled: settings.enabled,
      geo_ip_filtering_countries: settings.codes.join(","),
      geo_ip_filtering_block: settings.blockAction || "block",
      geo_ip_filtering_traffic_direction: settings.trafficDirection || "both",
      key: current.key ?? "usg"
    };

    try {
      const res = await this.transport({
        method: "POST",
        url: this.url("set/setting/usg"),
        headers: this.headers(),
        body: JSON.stringify(updated)
      });
      if (res.status !== 200) {
        return { ok: false, error: `unexpected status ${res.status} when updating settings: ${res.body}` };
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, error: `failed to update settings: ${errorMessage(error)}` };
    }
  }
}
