import { loadConfig } from "@chainfeed/config";
import { createLogger, type ILogger } from "@chainfeed/core";
import { isExpectedTermination, toError } from "@chainfeed/feeds";
import type { RegistryHandlers } from "@chainfeed/registry";
import { ServiceRunner } from "@chainfeed/runner";
import { loadHandlers, printingHandlers } from "../handlers.ts";

/**
 * Options shared by every command
 */
export interface CommonOptions {
  config?: string;
  verbose: number;
  handlers?: string;
}

/**
 * A loaded configuration with its runner, stopped by SIGINT/SIGTERM
 */
export interface Session {
  logger: ILogger;
  runner: ServiceRunner;
}

const jsonLogs = () => process.env.LOG_JSON === "true";

/**
 * Load config and handlers and build the runner.
 * Sets a failing exit code and resolves to null when any of it fails.
 */
export async function openSession(options: CommonOptions): Promise<Session | null> {
  let logger = createLogger({
    verbosity: options.verbose > 0 ? options.verbose : undefined,
    json: jsonLogs(),
  });

  try {
    const config = await loadConfig({ configPath: options.config });
    logger = createLogger({
      level: config.logging.level,
      verbosity: options.verbose > 0 ? options.verbose : undefined,
      timestamps: config.logging.timestamps,
      json: jsonLogs() || config.logging.json,
    });

    let handlers: RegistryHandlers;
    if (options.handlers) {
      handlers = await loadHandlers(options.handlers);
      logger.info(`Loaded handlers from ${options.handlers}`);
    } else {
      handlers = printingHandlers();
      logger.debug("No handler module given, printing messages as JSON lines");
    }

    const controller = new AbortController();
    const runner = new ServiceRunner({ config, logger, handlers, signal: controller.signal });

    const shutdown = () => {
      logger.info("Shutting down...");
      controller.abort();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    return { logger, runner };
  } catch (error) {
    logger.error("Failed to start", { error: toError(error) });
    process.exitCode = 1;
    return null;
  }
}

/**
 * Run the command's work, stop the runner and turn the outcome into the
 * exit code. `null` from `work` means it finished without a terminal value.
 */
export async function runSession(session: Session, work: (runner: ServiceRunner) => Promise<Error | null>): Promise<void> {
  let terminal: Error | null;
  try {
    terminal = await work(session.runner);
  } catch (error) {
    terminal = toError(error);
  }

  await session.runner.stop();

  if (terminal === null || isExpectedTermination(terminal)) {
    if (terminal) session.logger.info(terminal.message);
    process.exitCode = 0;
    return;
  }

  session.logger.error("Feed stopped", { error: terminal });
  process.exitCode = 1;
}
