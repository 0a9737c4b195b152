import { ApplyOutcome, RegionBlockingPort, RegionBlockingSettings, RegionBlockingState } from "./regionBlocking";

/** Queues writes so at most one `apply` is in flight against the device. */
export class SerialRegionBlocking implements RegionBlockingPort {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly inner: RegionBlockingPort) {}

  /** Writes queued or running. */
  get pendingWrites(): number {
    return this.pending;
  }

  readState(): Promise<RegionBlockingState> {
    return this.inner.readState();
  }

  apply(settings: RegionBlockingSettings): Promise<ApplyOutcome> {
    this.pending++;
    const run = this.tail.then(() => this.inner.apply(settings));
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    // The chain only orders writes; `run` carries each write's own rejection to its caller.
    this.tail = settled.then(() => {
      this.pending--;
    });
    return run;
  }
}
