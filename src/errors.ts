/**
 * Error taxonomy for the pipeline.
 *
 * Every failure the pipeline reports carries one of four kinds. The orchestrator
 * decides how soon to retry a unit from the kind alone.
 */

/** How a failure should be treated by the scheduler */
export type FailureKind = "transient" | "data" | "configuration" | "integrity";

/** Base class for classified pipeline errors */
export class PipelineError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Network or HTTP failure talking to a source */
export class FetchError extends PipelineError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super("transient", message, options);
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/** A source answered, but with something we cannot read */
export class SourceFormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("data", message, options);
  }
}

/** The format converter failed for a chapter */
export class ConversionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("data", message, options);
  }
}

/** A delivery channel refused or failed a batch */
export class DeliveryError extends PipelineError {
  readonly permanent: boolean;

  constructor(message: string, options: { permanent: boolean; cause?: unknown }) {
    super(options.permanent ? "configuration" : "transient", message, options);
    this.permanent = options.permanent;
  }
}

/** Something an operator has to fix: missing book, no destination, unconfigured channel */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
  }
}

/** Stored data contradicts the data model */
export class IntegrityError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("integrity", message, options);
  }
}

/** A unit of work ran past its deadline */
export class TimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("transient", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** The cursor moved between reading it and writing it back */
export class CursorConflictError extends PipelineError {
  constructor(subscriptionId: string) {
    super("transient", `Cursor of subscription ${subscriptionId} changed during delivery`);
  }
}

/** Lookup of a record that does not exist (administrative commands) */
export class NotFoundError extends Error {
  constructor(resourceType: string, id: string) {
    super(`Resource of type ${resourceType} with id ${id} not found.`);
    this.name = "NotFoundError";
  }
}

/**
 * Classify any thrown value. Unclassified errors (driver errors, bugs in adapters)
 * are treated as transient so they are retried with backoff rather than dropped.
 */
export function classifyError(error: unknown): FailureKind {
  return error instanceof PipelineError ? error.kind : "transient";
}

/**
 * One-line description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
