#!/usr/bin/env node
import { cli } from "../src/cli.js";

process.on("uncaughtException", (error) => {
  console.error("\nUnexpected error:", error.message);
  if (process.env.DEBUG) {
    console.error(error.stack);
  }
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error("\nUnhandled rejection:", reason);
  process.exit(1);
});

await cli.parseAsync(process.argv);
