/**
 * Per-unit failure backoff for the orchestrator.
 */

import { classifyError, type FailureKind } from "./errors.js";

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  /** Uniform random source in [0, 1) */
  random?: () => number;
  now?: () => Date;
}

export interface FailureState {
  failures: number;
  kind: FailureKind;
  retryAt: Date;
}

/**
 * Tracks consecutive failures per unit key and when each unit may run again.
 *
 * Transient and data failures wait a full-jitter exponential delay,
 * `random(0, min(max, base * 2^(n-1)))`. Configuration and integrity failures
 * need an operator, so they always wait the maximum.
 */
export class FailureBackoff {
  private readonly states = new Map<string, FailureState>();
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(private readonly options: BackoffOptions) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  /** Delay before the next attempt after the `failures`-th consecutive failure */
  delayFor(kind: FailureKind, failures: number): number {
    const { baseMs, maxMs } = this.options;
    if (kind === "configuration" || kind === "integrity") {
      return maxMs;
    }
    const ceiling = Math.min(maxMs, baseMs * 2 ** Math.max(0, failures - 1));
    return Math.floor(this.random() * ceiling);
  }

  recordFailure(key: string, error: unknown): FailureState {
    const kind = classifyError(error);
    const failures = (this.states.get(key)?.failures ?? 0) + 1;
    const retryAt = new Date(this.now().getTime() + this.delayFor(kind, failures));
    const state = { failures, kind, retryAt };
    this.states.set(key, state);
    return state;
  }

  recordSuccess(key: string): void {
    this.states.delete(key);
  }

  /** Whether the unit is still waiting out its backoff */
  isDeferred(key: string): boolean {
    const state = this.states.get(key);
    return state !== undefined && state.retryAt.getTime() > this.now().getTime();
  }

  /**
   * Drop every state under `prefix` whose key is not in `live`, e.g. units
   * whose records were deleted.
   */
  retainOnly(prefix: string, live: Iterable<string>): void {
    const keep = new Set(live);
    for (const key of this.states.keys()) {
      if (key.startsWith(prefix) && !keep.has(key)) {
        this.states.delete(key);
      }
    }
  }

  get(key: string): FailureState | null {
    return this.states.get(key) ?? null;
  }
}
