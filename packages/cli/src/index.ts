#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./program.js";

// Global error handlers
process.on("unhandledRejection", (reason) => {
  console.error("[servicemap] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[servicemap] Uncaught exception:", err);
  process.exit(1);
});

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error("[servicemap] Fatal:", err);
  process.exit(1);
});
