/**
 * Error taxonomy for a reconciliation run.
 *
 * Only SourceUnavailableError and ConfigError abort a run. Malformed codes
 * drop a single record, lookup failures are folded into results, and
 * checkpoint write failures are logged and counted.
 */

export class SyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A record's code cannot be normalized to the 5-digit form */
export class MalformedCodeError extends SyncError {
  constructor(readonly rawCode: unknown) {
    super(`Malformed stop code: ${JSON.stringify(rawCode) ?? String(rawCode)}`);
  }
}

/** The catalog (or the previous snapshot) could not be read at all */
export class SourceUnavailableError extends SyncError {}

/** A single lookup failed */
export class LookupFailure extends SyncError {
  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A single lookup exceeded its time budget */
export class LookupTimeoutError extends LookupFailure {
  constructor(code: string, readonly timeoutMs: number) {
    super(code, `Lookup for ${code} timed out after ${timeoutMs}ms`);
  }
}

/** An intermediate checkpoint could not be persisted */
export class CheckpointWriteError extends SyncError {}

/** Configuration is missing or invalid */
export class ConfigError extends SyncError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
