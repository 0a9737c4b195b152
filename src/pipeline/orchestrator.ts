import { ErrorRecord, toErrorRecord } from "../errors";
import { Logger, silentLogger } from "../log/logger";
import { freezeResult, RawSourceResult, SourceAdapter } from "../sources/types";

export interface FetchRunOptions {
  concurrency: number;
  /** Budget for the whole fetch stage. */
  deadlineMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface FetchFailure {
  sourceName: string;
  error: ErrorRecord;
}

export interface FetchRunOutcome {
  results: RawSourceResult[];
  failed: FetchFailure[];
  /** Sources in flight or still queued when the deadline hit. */
  abandoned: string[];
}

const ABANDONED = Symbol("abandoned");

/**
 * Fixed pool of `concurrency` workers draining one shared queue. Adapters that
 * reject are reported and left out; once the deadline (or the caller's signal)
 * fires, whatever is in flight is abandoned and the run resolves with the
 * results completed so far. Result order follows completion, not input.
 */
export async function runFetchDetailed(
  adapters: readonly SourceAdapter[],
  options: FetchRunOptions
): Promise<FetchRunOutcome> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
  }
  const logger = options.logger ?? silentLogger;

  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }
  const timer = setTimeout(
    () => controller.abort(new Error(`Fetch deadline of ${options.deadlineMs}ms exceeded`)),
    options.deadlineMs
  );
  const { signal } = controller;

  const cancelled = new Promise<typeof ABANDONED>((resolve) => {
    if (signal.aborted) resolve(ABANDONED);
    else signal.addEventListener("abort", () => resolve(ABANDONED), { once: true });
  });

  const queue = [...adapters];
  const results: RawSourceResult[] = [];
  const failed: FetchFailure[] = [];
  const abandoned: string[] = [];

  async function worker(): Promise<void> {
    for (let adapter = queue.shift(); adapter; adapter = queue.shift()) {
      if (signal.aborted) {
        abandoned.push(adapter.name());
        continue;
      }
      logger.info(`  Fetching: ${adapter.name()}...`);
      try {
        const outcome = await Promise.race([adapter.scrape(signal), cancelled]);
        if (outcome === ABANDONED) {
          abandoned.push(adapter.name());
          logger.warn(`${adapter.name()}: abandoned at deadline`);
          continue;
        }
        logger.debug(`Status: ${outcome.parseStatus}, Raw countries: ${outcome.rawTokens.length}`);
        results.push(freezeResult(outcome));
      } catch (error) {
        const record = toErrorRecord(error);
        logger.error(`${adapter.name()}: ${record.message}`);
        failed.push({ sourceName: adapter.name(), error: record });
      }
    }
  }

  const workerCount = Math.min(options.concurrency, adapters.length);
  try {
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onExternalAbort);
    if (!signal.aborted) controller.abort(new Error("Fetch run finished"));
  }

  return { results, failed, abandoned };
}

export async function runFetch(
  adapters: readonly SourceAdapter[],
  options: FetchRunOptions
): Promise<RawSourceResult[]> {
  const outcome = await runFetchDetailed(adapters, options);
  return outcome.results;
}
