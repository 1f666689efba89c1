#!/usr/bin/env tsx
/* eslint-disable no-console */

/**
 * Storage layout resolver command line entry point
 */

import { handleCompileCommand } from "../src/cli/index.js";

handleCompileCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
