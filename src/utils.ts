/**
 * Utility functions shared by the CLI, the sources and the channels
 */

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { FetchError } from "./errors.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Runs registered cleanup callbacks, then exits.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Delivery")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: string) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted, shutting down...`);

    let failed = false;
    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        failed = true;
        console.error("Cleanup failed:", error);
      }
    }

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    const exitCode = failed ? 1 : signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Whether the module at `moduleUrl` is the script Node was started with,
 * following symlinks such as the npm bin link.
 *
 * @param moduleUrl - The module's `import.meta.url`
 * @param scriptPath - `process.argv[1]`
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined || !existsSync(scriptPath)) return false;
  return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(scriptPath);
}

/**
 * Wait for specified milliseconds. Rejects early with the signal's reason
 * if the signal aborts first.
 *
 * @param ms - Duration to wait in milliseconds
 * @param signal - Optional abort signal
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Create a safe filename from a title.
 * Converts to lowercase, replaces special characters with dashes,
 * and truncates to 50 characters.
 *
 * @param title - Title to convert to filename
 * @returns Sanitized filename, "chapter" when nothing usable remains
 *
 * @example
 * sanitizeFilename('Chapter 1: Introduction') // 'chapter-1-introduction'
 */
export function sanitizeFilename(title: string): string {
  const name = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50)
    .replace(/-$/, "");
  return name || "chapter";
}

/** Retry settings for {@link fetchWithRetry} */
export interface RetryOptions {
  /** Attempts after the first one (default: 2) */
  retries?: number;
  /** Delay before the first retry, doubled each time (default: 500) */
  baseDelayMs?: number;
  /** Abort signal for the whole operation, including waits between attempts */
  signal?: AbortSignal;
}

/**
 * Whether an HTTP status is worth retrying.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Fetch a URL, retrying network errors and retryable statuses with exponential backoff.
 * Non-retryable responses are returned as they are; callers check `response.ok`.
 *
 * @throws {FetchError} When every attempt failed at the network level or the signal aborted
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {},
): Promise<Response> {
  const { retries = 2, baseDelayMs = 500, signal } = options;

  for (let attempt = 0; ; attempt++) {
    let response: Response | undefined;
    let failure: unknown;
    try {
      response = await fetch(url, { ...init, signal });
    } catch (error) {
      failure = error;
    }

    if (signal?.aborted) {
      throw new FetchError(url, `Request to ${url} aborted`, { cause: signal.reason });
    }

    const retryable = response === undefined || isRetryableStatus(response.status);
    if (!retryable || attempt >= retries) {
      if (response) return response;
      throw new FetchError(url, `Request to ${url} failed: ${String(failure)}`, { cause: failure });
    }

    try {
      await delay(baseDelayMs * 2 ** attempt, signal);
    } catch (error) {
      throw new FetchError(url, `Request to ${url} aborted`, { cause: error });
    }
  }
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--author')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a nullable string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--kindle')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      return args[i + 1];
    }
  }
  return null;
}

/**
 * Get all positional (non-flag) arguments in order.
 * Skips values that follow flags (e.g., in '--chunk 3', skips '3').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The non-flag arguments
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positional: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("--") && !arg.startsWith("-")) {
      positional.push(arg);
    }
  }
  return positional;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}
