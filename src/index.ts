#!/usr/bin/env node
import { startServer } from "./server/index.js";
import { logError, getErrorMessage } from "./core/logging.js";

startServer().catch((error: unknown) => {
  logError("Fatal error starting server:", getErrorMessage(error));
  process.exit(1);
});
