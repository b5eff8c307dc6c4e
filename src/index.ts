#!/usr/bin/env node
/**
 * Command-line entry point: run the pipeline, single passes, migrations and
 * administrative commands.
 *
 * Usage: serial-courier <command> [options]
 */

import { hostname } from "node:os";
import { ADMIN_USAGE, UsageError, isAdminGroup, runAdminCommand } from "./admin.js";
import { createChannels } from "./channels/index.js";
import { loadConfig, loadEnvFile, type Config, type PassKind } from "./config.js";
import { EpubConverter } from "./convert.js";
import { createLogger, type Logger } from "./log.js";
import { Orchestrator, summarizeReport, type PassReport } from "./orchestrator.js";
import { createAdapterResolver } from "./sources/index.js";
import { PgStore, createPool } from "./store/postgres.js";
import type { Store } from "./store/store.js";
import { formatDuration, hasHelpFlag, isMainModule, onInterrupt, setupSignalHandlers } from "./utils.js";

export const USAGE = `Usage: serial-courier <command> [options]

Commands:
  serve            Run ingestion, conversion and delivery on their intervals
  ingest           Run one ingestion pass and print the report
  convert          Run one conversion pass and print the report
  deliver          Run one delivery pass and print the report
  migrate          Create the database tables

${ADMIN_USAGE}

Configuration is read from the environment and from .env (see .env.example).`;

/** Store the CLI can also migrate */
export interface CliStore extends Store {
  migrate(): Promise<void>;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  openStore: (config: Config) => CliStore;
  print: (line: string) => void;
  logger: Logger;
}

const PASS_COMMANDS = new Map<string, PassKind>([
  ["ingest", "ingest"],
  ["convert", "convert"],
  ["deliver", "deliver"],
]);

function isKnownCommand(command: string): boolean {
  return command === "serve" || command === "migrate" || PASS_COMMANDS.has(command) || isAdminGroup(command);
}

function openPgStore(config: Config): CliStore {
  return new PgStore(createPool(config.databaseUrl));
}

/** Lease owner id, unique per running process */
export function ownerId(): string {
  return `${hostname()}:${process.pid}`;
}

export function createOrchestrator(config: Config, store: Store, logger: Logger): Orchestrator {
  const converter = new EpubConverter();
  return new Orchestrator({
    store,
    adapters: createAdapterResolver(),
    converter,
    channels: createChannels(config, converter, logger),
    owner: ownerId(),
    intervals: config.intervals,
    concurrency: config.concurrency,
    unitDeadlineMs: config.unitDeadlineMs,
    leaseTtlMs: config.leaseTtlMs,
    maxConversionAttempts: config.maxConversionAttempts,
    backoff: config.backoff,
    logger,
  });
}

/**
 * Render a pass report, one line per unit and a summary.
 */
export function formatReport(report: PassReport): string[] {
  const lines = report.units.map((unit) => {
    let line = `  ${unit.id}  ${unit.status}`;
    if (unit.detail) line += `  ${unit.detail}`;
    if (unit.error) line += `  ${unit.error}`;
    return line;
  });
  lines.push(`${report.pass} pass: ${summarizeReport(report)} in ${formatDuration(report.durationMs)}`);
  return lines;
}

async function runCommand(command: string, rest: string[], store: CliStore, config: Config, deps: CliDeps) {
  if (command === "migrate") {
    await store.migrate();
    deps.print("Database is up to date");
    return 0;
  }

  const pass = PASS_COMMANDS.get(command);
  if (pass !== undefined) {
    const report = await createOrchestrator(config, store, deps.logger).runPass(pass);
    if (!report) return 0;
    for (const line of formatReport(report)) deps.print(line);
    return report.units.some((unit) => unit.status === "failed") ? 1 : 0;
  }

  if (isAdminGroup(command)) {
    await runAdminCommand(store, command, rest, deps.print);
  }
  return 0;
}

/**
 * Run the CLI.
 *
 * @returns Exit code; `serve` returns 0 while the orchestrator keeps running
 */
export async function main(args: string[] = process.argv.slice(2), overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = {
    env: process.env,
    openStore: openPgStore,
    print: console.log,
    logger: createLogger(),
    ...overrides,
  };
  const [command, ...rest] = args;

  if (command === undefined || command === "help" || hasHelpFlag(args)) {
    deps.print(USAGE);
    return command === undefined ? 1 : 0;
  }
  if (!isKnownCommand(command)) {
    deps.print(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  let config: Config;
  try {
    config = loadConfig(deps.env);
  } catch (error) {
    deps.logger.error("Cannot start", error);
    return 1;
  }

  const store = deps.openStore(config);

  if (command === "serve") {
    const orchestrator = createOrchestrator(config, store, deps.logger);
    setupSignalHandlers("Courier");
    onInterrupt(() => orchestrator.stop());
    onInterrupt(() => store.close());
    orchestrator.start();
    return 0;
  }

  try {
    return await runCommand(command, rest, store, config, deps);
  } catch (error) {
    if (error instanceof UsageError) {
      deps.print(`${error.message}\n\n${USAGE}`);
    } else {
      deps.logger.error(`${command} failed`, error);
    }
    return 1;
  } finally {
    await store.close();
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url, process.argv[1])) {
  loadEnvFile();
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal:", error);
      process.exitCode = 1;
    },
  );
}
