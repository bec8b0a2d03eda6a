/**
 * Input validation utilities for imgspec.
 *
 * Centralized validation functions for ImageSpec fields.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: builders, engine, cli
 */

import { isAbsolute, posix, win32 } from "node:path";

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Docker repository path component: lowercase alphanumerics with separators. */
const IMAGE_NAME_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*(?:\/[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*)*$/;

/**
 * Validate an environment variable key.
 *
 * @param key - Environment variable key to validate.
 * @returns True if valid.
 */
export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * Validate environment variable key and throw if invalid.
 *
 * @throws ValidationError if key is invalid.
 */
export function validateEnvVarKey(key: string): void {
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
}

/**
 * Sanitize environment variable value for a single Dockerfile line.
 *
 * Removes newlines (CR, LF) and null bytes, which would otherwise split
 * the ENV instruction.
 */
export function sanitizeEnvValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\r\n\x00]/g, "");
}

/** Check an image repository name against the registry naming rules. */
export function validateImageName(name: string): void {
  if (!IMAGE_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid image name '${name}'. Use lowercase letters, digits and separators (., _, -), e.g. 'my-app'.`
    );
  }
}

/**
 * Reject copy targets that would escape the build context.
 *
 * Absolute paths (POSIX or Windows) and any '..' segment are refused.
 *
 * @throws ValidationError naming the offending path.
 */
export function validateCopyPath(path: string): void {
  if (path.trim() === "") {
    throw new ValidationError("Empty path is not allowed in copy list.");
  }
  if (isAbsolute(path) || posix.isAbsolute(path) || win32.isAbsolute(path)) {
    throw new ValidationError(`Absolute paths are not allowed in COPY command: '${path}'`);
  }
  const segments = path.split(/[\\/]+/);
  if (segments.includes("..")) {
    throw new ValidationError(`Paths with '..' are not allowed in COPY command: '${path}'`);
  }
}

/**
 * Parse a boolean-ish environment value ("true", "1", "false", "0").
 *
 * @returns The parsed flag, or the fallback for unset/unknown values.
 */
export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  return fallback;
}
