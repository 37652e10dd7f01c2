#!/usr/bin/env node
import "dotenv/config";
import { createLogger, logError } from "@webpilot/schemas";
import { createProgram } from "./program.js";

const log = createLogger("webpilot");

process.on("unhandledRejection", (reason) => {
  logError(log, "Unhandled rejection", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  logError(log, "Uncaught exception", err);
  process.exit(1);
});

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    logError(log, "Command failed", err);
    process.exit(1);
  });
