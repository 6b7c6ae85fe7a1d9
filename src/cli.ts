#!/usr/bin/env node

/**
 * mx-testbed CLI: runs the requested phases for one suite and maps the
 * outcome to the process exit status.
 */

import pc from "picocolors";
import { help } from "./commands/help.js";
import { EXIT_FAILURE, EXIT_INVALID, EXIT_OK, parseArgs } from "./commands/shared.js";
import { loadConfig } from "./config/loader.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { type ExecutionSummary, type Orchestrator, createOrchestrator } from "./orchestrator/orchestrator.js";

function report(summary: ExecutionSummary): void {
  for (const outcome of summary.outcomes) {
    const label = pc.bold(outcome.verb.padEnd(5));
    switch (outcome.status) {
      case "success":
        logger.info(`${label} ${pc.green("ok")}`);
        for (const warning of outcome.warnings) {
          logger.warn(`${label} ${pc.yellow("warning")} ${warning.message}`);
        }
        break;
      case "failure":
        logger.error(`${label} ${pc.red("failed")} ${outcome.error.message}`);
        break;
      case "skipped":
        logger.info(`${label} ${pc.dim("skipped")}`);
        break;
    }
  }
}

async function main(argv: string[]): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    help();
    return EXIT_OK;
  }

  const config = loadConfig(options.configPath, options.overrides);
  logger.info(`${pc.cyan("mx-testbed")} ${config.name}: ${options.verbs.join(" ")}`);

  const orchestrator = createOrchestrator(config);
  installSignalHandlers(orchestrator);

  const summary = await orchestrator.execute(options.verbs);
  report(summary);
  return summary.ok ? EXIT_OK : EXIT_FAILURE;
}

function installSignalHandlers(orchestrator: Orchestrator): void {
  let aborting = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (aborting) return;
    aborting = true;
    logger.warn(`Received ${signal}, tearing down`);
    const errors = await orchestrator.abort();
    if (errors.length > 0) {
      logger.error(`${errors.length} resource(s) could not be removed, run \`mx-testbed down\``);
    }
    process.exit(EXIT_FAILURE);
  };
  process.on("SIGINT", (signal) => {
    shutdown(signal).catch((err: unknown) => logger.error(errorMessage(err)));
  });
  process.on("SIGTERM", (signal) => {
    shutdown(signal).catch((err: unknown) => logger.error(errorMessage(err)));
  });
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof ConfigurationError) {
      logger.error(err.message);
      help();
      process.exit(EXIT_INVALID);
    }
    logger.error(errorMessage(err));
    process.exit(EXIT_FAILURE);
  },
);
