import { errorMessage } from "../errors";
import { Logger, silentLogger } from "../log/logger";
import { reconcile, ReconciliationResult } from "../reconcile/reconcile";
import { nowUtcIsoSeconds } from "../utils/time";
import { RegionBlockingPort, RegionBlockingState, TrafficDirection } from "./regionBlocking";

export interface ConfigureOptions {
  enabled: boolean;
  dryRun: boolean;
  blockAction?: string;
  trafficDirection?: TrafficDirection;
  logger?: Logger;
}

export interface ConfigureResult {
  timestamp: string;
  dry_run: boolean;
  changed: boolean;
  previous_codes: string[];
  desired_codes: string[];
  added_codes: string[];
  removed_codes: string[];
  enabled_transition: { from: boolean; to: boolean } | null;
  applied: boolean;
  verified: boolean;
  error: string | null;
}

function resultFrom(
  reconciliation: ReconciliationResult,
  base: Pick<ConfigureResult, "timestamp" | "dry_run">
): ConfigureResult {
  return {
    ...base,
    changed: reconciliation.changed,
    previous_codes: [...reconciliation.previousCodes],
    desired_codes: [...reconciliation.desiredCodes],
    added_codes: [...reconciliation.added],
    removed_codes: [...reconciliation.removed],
    enabled_transition: reconciliation.enabledTransition ? { ...reconciliation.enabledTransition } : null,
    applied: false,
    verified: false,
    error: null
  };
}

function sameCodes(a: readonly string[], b: readonly string[]): boolean {
  const left = Array.from(new Set(a)).sort();
  const right = Array.from(new Set(b)).sort();
  return left.length === right.length && left.every((code, i) => code === right[i]);
}

/**
 * Reads the device, reconciles, and writes only when reconciliation says the
 * state changed. A failed write is reported in `error`; nothing is retried.
 */
export async function configureRegionBlocking(
  port: RegionBlockingPort,
  desiredCodes: readonly string[],
  options: ConfigureOptions
): Promise<ConfigureResult> {
  const logger = options.logger ?? silentLogger;
  const base = { timestamp: nowUtcIsoSeconds(), dry_run: options.dryRun };

  let current: RegionBlockingState;
  try {
    current = await port.readState();
  } catch (error) {
    const failed = resultFrom(reconcile([], desiredCodes, false, options.enabled), base);
    return { ...failed, changed: false, error: `failed to get current config: ${errorMessage(error)}` };
  }
  logger.debug(`Current blocked countries: ${current.codes.join(", ") || "(none)"}`);

  const reconciliation = reconcile(current.codes, desiredCodes, current.enabled, options.enabled);
  const result = resultFrom(reconciliation, base);

  if (!reconciliation.changed) {
    logger.info("No changes needed - configuration already matches");
    return { ...result, verified: true };
  }

  logger.info("Changes required:");
  if (reconciliation.enabledTransition) {
    logger.info(`  Enable: ${reconciliation.enabledTransition.from} -> ${reconciliation.enabledTransition.to}`);
  }
  if (reconciliation.added.length) logger.info(`  Adding: ${reconciliation.added.join(", ")}`);
  if (reconciliation.removed.length) logger.info(`  Removing: ${reconciliation.removed.join(", ")}`);

  if (options.dryRun) {
    logger.info("[DRY RUN] Changes not applied");
    return result;
  }

  const outcome = await port.apply({
    enabled: options.enabled,
    codes: reconciliation.desiredCodes,
    blockAction: options.blockAction ?? "block",
    trafficDirection: options.trafficDirection ?? "both"
  });
  if (!outcome.ok) {
    return { ...result, error: `failed to apply changes: ${outcome.error}` };
  }
  logger.info("Configuration applied successfully");

  try {
    const after = await port.readState();
    const verified = after.enabled === options.enabled && sameCodes(after.codes, reconciliation.desiredCodes);
    return { ...result, applied: true, verified };
  } catch (error) {
    return { ...result, applied: true, error: `failed to verify: ${errorMessage(error)}` };
  }
}
