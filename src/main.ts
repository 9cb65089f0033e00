#!/usr/bin/env node
import "dotenv/config";
import { createProgram } from "./cli.js";
import { errorMessage } from "./errors.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    if (process.env.DEBUG && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exitCode = 1;
  });
