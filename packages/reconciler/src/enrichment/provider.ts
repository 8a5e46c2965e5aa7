/**
 * Name lookup interface.
 *
 * A lookup resolves one stop code to the name an external source reports
 * for it. The scheduler owns timeouts, retries and failure isolation, so
 * implementations only need to honour the abort signal.
 */

export interface LookupOutcome {
  success: boolean;
  correctedName?: string;
  street?: string;
  /** Why the lookup found nothing, when success is false */
  error?: string;
}

export interface LookupRequestOptions {
  /** Aborted when the scheduler gives up on the item */
  signal?: AbortSignal;
}

export interface NameLookup {
  /** Human-readable name */
  readonly name: string;
  fetch(code: string, options?: LookupRequestOptions): Promise<LookupOutcome>;
}
