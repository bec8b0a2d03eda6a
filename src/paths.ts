/**
 * Filesystem path utilities for imgspec.
 *
 * Repository-root discovery, POSIX path normalization for in-container paths,
 * and validated resolution of user-supplied paths.
 *
 * Dependency direction:
 *   This module has minimal internal dependencies (near-leaf module).
 *   It may be imported by: lock-rewriter.ts, build-context.ts, spec-file.ts
 *   It should NOT import from: cli, engine
 */

import { existsSync, statSync } from "node:fs";
import { dirname, join, relative, resolve } from "node:path";

import { REPOSITORY_MARKER } from "./constants.js";
import { PathError } from "./errors.js";

/**
 * Normalize path separators to forward slashes and remove duplicates.
 *
 * @param pathStr - Path string to normalize.
 * @returns Normalized path with single forward slashes.
 */
export function normalizePathSeparators(pathStr: string): string {
  let normalized = pathStr.replace(/\\/g, "/").replace(/\/{2,}/g, "/");

  // Remove trailing slash (unless it's root)
  if (normalized.length > 1) {
    normalized = normalized.replace(/\/$/, "");
  }

  return normalized;
}

/**
 * Find the enclosing repository root by walking parent directories.
 *
 * @param start - File or directory to start from (the start itself is checked first).
 * @returns Absolute root path, or undefined when no marker is found.
 */
export function findRepositoryRoot(start: string): string | undefined {
  let current = resolve(start);

  for (;;) {
    if (existsSync(join(current, REPOSITORY_MARKER))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

/**
 * POSIX path of `target` relative to `root`; "" when they are the same.
 *
 * @throws PathError if target lies outside root.
 */
export function posixRelative(root: string, target: string): string {
  const rel = normalizePathSeparators(relative(root, target));
  if (rel === ".." || rel.startsWith("../")) {
    throw new PathError(`Path ${target} is outside of ${root}`);
  }
  return rel;
}

/**
 * Validate and resolve a file path.
 *
 * @param path - Path to validate.
 * @param base - Directory relative paths are resolved against.
 * @returns Resolved absolute path.
 * @throws PathError if the path does not exist or is not a file.
 */
export function validateFilePath(path: string, base: string = process.cwd()): string {
  const filePath = resolve(base, path);

  if (!existsSync(filePath)) {
    throw new PathError(`File does not exist: ${filePath}`);
  }
  if (!statSync(filePath).isFile()) {
    throw new PathError(`Path is not a file: ${filePath}`);
  }

  return filePath;
}
