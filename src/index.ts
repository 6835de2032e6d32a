#!/usr/bin/env node
/**
 * Job Archive Fetcher – CLI
 * Commands: fetch | watch | overview | show
 */

import { program } from "commander";
import { Config } from "./core/domain/entities/config.entity.js";
import { ConfigurationError, errorMessage } from "./core/domain/errors.js";
import { ILogger } from "./core/domain/services/logger.service.js";
import { ArchiveEvent, FetchCycleResult, JOBS_OVERVIEW_PATH } from "./core/domain/types.js";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { PinoLogger } from "./infrastructure/services/pino-logger.service.js";
import { RefreshScheduler } from "./infrastructure/services/refresh-scheduler.service.js";
import { createArchiveStorage } from "./infrastructure/storage/archive-storage.factory.js";
import { getConfigPath } from "./infrastructure/utils/config.utils.js";
import { buildArchiveFetcher } from "./infrastructure/utils/fetcher.utils.js";

// ─── Shared helpers ───────────────────────────────────────────────────────────

function loadRuntime(): { config: Config; logger: ILogger } {
  const { config: configPath } = program.opts<{ config?: string }>();
  const config = new ConfigService(configPath).getConfig();
  const logger = PinoLogger.create(config.logging);
  return { config, logger };
}

function logEvent(logger: ILogger) {
  return (event: ArchiveEvent) => {
    logger.info("Archive event", { jobId: event.jobId, type: event.type });
  };
}

function printFetchResult(result: FetchCycleResult): void {
  const lines: string[] = [
    "Fetch Summary",
    "-------------",
    `Ingested: ${result.created.length}`,
    `Evicted: ${result.deleted.length}`,
    `Failed archives: ${result.failedJobs.length}`,
    `Unreachable locations: ${result.failedLocations.length}`,
  ];
  for (const location of result.failedLocations) {
    lines.push(`  ${location}`);
  }
  if (!result.completed) {
    lines.push("", "The cycle was aborted; see the log for details.");
  }
  console.log(lines.join("\n"));
}

function command<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (e) {
      const prefix = e instanceof ConfigurationError ? "Configuration error" : "Error";
      console.error(`${prefix}: ${errorMessage(e)}`);
      process.exitCode = 1;
    }
  };
}

// ─── CLI ──────────────────────────────────────────────────────────────────────

program
  .name("job-archive-fetcher")
  .description("Mirror completed-job archives into a queryable local cache")
  .option("-c, --config <path>", `Config file path (default: ${getConfigPath()})`);

program
  .command("fetch")
  .description("Rebuild the cache with a single fetch cycle and exit")
  .action(
    command(async () => {
      const { config, logger } = loadRuntime();
      const { fetcher, storage } = buildArchiveFetcher(config, {
        logger,
        listener: logEvent(logger),
      });
      try {
        await fetcher.initialize();
        const result = await fetcher.execute();
        printFetchResult(result);
        if (!result.completed) process.exitCode = 1;
      } finally {
        await storage.close();
      }
    }),
  );

program
  .command("watch")
  .description("Keep the cache in sync on the configured refresh schedule")
  .action(
    command(async () => {
      const { config, logger } = loadRuntime();
      const { fetcher, storage } = buildArchiveFetcher(config, {
        logger,
        listener: logEvent(logger),
      });
      await fetcher.initialize();

      const scheduler = new RefreshScheduler(fetcher, logger.child({ component: "scheduler" }), {
        cron: config.archive.refreshCron,
        runOnStart: true,
      });

      let stopping = false;
      const shutdown = async () => {
        if (stopping) return;
        stopping = true;
        logger.info("Shutting down archive fetcher");
        await scheduler.stop();
        await storage.close();
      };
      const onSignal = () => {
        shutdown().catch((e: unknown) => {
          logger.error("Shutdown failed", { err: errorMessage(e) });
          process.exitCode = 1;
        });
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);

      await scheduler.start();
    }),
  );

program
  .command("overview")
  .description("Print the combined jobs overview from the cache")
  .action(
    command(async () => {
      await printDocument(JOBS_OVERVIEW_PATH);
    }),
  );

program
  .command("show <path>")
  .description("Print the cached document for a REST path, e.g. /jobs/<id>")
  .action(
    command(async (path: string) => {
      await printDocument(path);
    }),
  );

async function printDocument(path: string): Promise<void> {
  const { config, logger } = loadRuntime();
  const storage = createArchiveStorage(config.storage, logger);
  try {
    const json = await storage.get(path);
    if (json === null) {
      console.error(`No cached document at ${path}`);
      process.exitCode = 1;
      return;
    }
    console.log(json);
  } finally {
    await storage.close();
  }
}

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`fatal: ${errorMessage(e)}`);
  process.exitCode = 1;
});
