#!/usr/bin/env node
/**
 * taskstack — provision and launch a background job-processing stack.
 *
 * This is the main entry point. It installs error handlers and delegates to
 * Commander; the exit code comes from the command that ran.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(
    "[taskstack] Uncaught exception:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(
    "[taskstack] Unhandled rejection:",
    reason instanceof Error ? (reason.stack ?? reason.message) : reason,
  );
  process.exit(1);
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("[taskstack] CLI failed:", err instanceof Error ? (err.stack ?? err.message) : err);
  process.exit(1);
});
