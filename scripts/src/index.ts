#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { loadConfig } from "./config.js";
import { AutomationError } from "./errors.js";
import { createLogger } from "./logging.js";
import { createRunner } from "./utils.js";

const config = loadConfig();
const logger = createLogger({ debug: config.debug });
const program = createProgram({ config, runner: createRunner(logger), logger });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  logger.fatal(e instanceof Error ? e.message : String(e));
  process.exitCode = e instanceof AutomationError ? e.exitCode : 1;
}
