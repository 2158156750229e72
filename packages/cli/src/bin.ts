#!/usr/bin/env tsx
/**
 * wirebridge CLI entry point
 */

import { runCli } from "./cli/index.js";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}
