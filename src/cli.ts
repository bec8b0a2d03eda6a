#!/usr/bin/env node
/**
 * CLI entry point for imgspec.
 */

import { extractErrorDetails, ImgspecError } from "./errors.js";
import { log } from "./logger.js";
import { createProgram } from "./program.js";

try {
  await createProgram().parseAsync();
} catch (error: unknown) {
  log.error(error instanceof ImgspecError ? error.message : extractErrorDetails(error));
  process.exit(1);
}
