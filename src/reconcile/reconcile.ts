export interface EnabledTransition {
  from: boolean;
  to: boolean;
}

export interface ReconciliationResult {
  readonly previousCodes: readonly string[];
  readonly desiredCodes: readonly string[];
  readonly added: readonly string[];
  readonly removed: readonly string[];
  readonly enabledTransition: EnabledTransition | null;
  /** The only write decision. Callers must not recompute it. */
  readonly changed: boolean;
}

function sortedUnique(codes: Iterable<string>): string[] {
  return Array.from(new Set(codes)).sort();
}

export function reconcile(
  previous: Iterable<string>,
  desired: Iterable<string>,
  previousEnabled: boolean,
  desiredEnabled: boolean
): ReconciliationResult {
  const previousCodes = sortedUnique(previous);
  const desiredCodes = sortedUnique(desired);
  const previousSet = new Set(previousCodes);
  const desiredSet = new Set(desiredCodes);

  const added = desiredCodes.filter((code) => !previousSet.has(code));
  const removed = previousCodes.filter((code) => !desiredSet.has(code));
  const enabledTransition =
    previousEnabled === desiredEnabled ? null : { from: previousEnabled, to: desiredEnabled };

  return Object.freeze({
    previousCodes: Object.freeze(previousCodes),
    desiredCodes: Object.freeze(desiredCodes),
    added: Object.freeze(added),
    removed: Object.freeze(removed),
    enabledTransition: enabledTransition ? Object.freeze(enabledTransition) : null,
    changed: added.length > 0 || removed.length > 0 || enabledTransition !== null
  });
}
