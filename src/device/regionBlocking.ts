export type TrafficDirection = "both" | "inbound" | "outbound";

export interface RegionBlockingState {
  enabled: boolean;
  codes: string[];
}

export interface RegionBlockingSettings {
  enabled: boolean;
  codes: readonly string[];
  blockAction: string;
  trafficDirection: TrafficDirection;
}

export type ApplyOutcome = { ok: true } | { ok: false; error: string };

/**
 * The device side of reconciliation. `apply` is a read-modify-write of the
 * device's region blocking setting; applying the same settings twice leaves
 * the device unchanged.
 */
export interface RegionBlockingPort {
  readState(): Promise<RegionBlockingState>;
  apply(settings: RegionBlockingSettings): Promise<ApplyOutcome>;
}
