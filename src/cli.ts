#!/usr/bin/env node
/**
 * Marknote CLI entry point.
 */

import { ExitCodes } from "./lib/models.js";
import { buildProgram } from "./program.js";

// Parse and execute
buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (process.env.DEBUG) {
      console.error(err);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(ExitCodes.FAILURE);
  });
