#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { logger } from "./config/logger.js";
import { captureError, flushErrors } from "./observability/sentry.js";
import { installProcessHandlers } from "./process-handlers.js";

installProcessHandlers();

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  logger.error(err instanceof Error ? err.message : String(err));
  captureError(err, { source: "cli" });
  process.exitCode = 1;
} finally {
  await flushErrors();
}
