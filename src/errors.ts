/**
 * Unified exception hierarchy for imgspec.
 *
 * All custom exceptions inherit from ImgspecError for consistent error handling.
 * The CLI catches these and converts them to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other imgspec modules.
 */

/**
 * Base exception for all imgspec errors.
 *
 * Every fatal condition raised by the builder derives from this class so that
 * callers can tell imgspec failures apart from programming errors.
 */
export class ImgspecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImgspecError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Mutually exclusive ImageSpec fields both set
 *   - Absolute or parent-relative copy paths
 *   - Parameters a selected builder cannot honour
 */
export class ValidationError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Malformed ImageSpec JSON file
 *   - Unknown values in imgspec.yaml
 */
export class ConfigError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Path validation and access errors. */
export class PathError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/**
 * Dependency document errors.
 *
 * Examples:
 *   - pyproject.toml missing next to uv.lock
 *   - Lock file that is not valid TOML
 */
export class DependencyError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "DependencyError";
  }
}

/**
 * Raised when a local package cannot be placed into the image:
 * its path does not exist or no repository root encloses it.
 */
export class ResolutionError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "ResolutionError";
  }
}

/** Raised when a required external tool is not installed or not in PATH. */
export class ToolNotFoundError extends ImgspecError {
  readonly tool: string;

  constructor(tool: string, message = `${tool} not found in PATH`) {
    super(message);
    this.name = "ToolNotFoundError";
    this.tool = tool;
  }
}

/** Raised when the Docker daemon is not running or not reachable. */
export class DockerNotRunningError extends ImgspecError {
  constructor(message = "Docker daemon is not running") {
    super(message);
    this.name = "DockerNotRunningError";
  }
}

/** Raised when the external build tool exits with a non-zero code. */
export class ImageBuildError extends ImgspecError {
  readonly exitCode: number | undefined;

  constructor(message: string, exitCode?: number) {
    super(message);
    this.name = "ImageBuildError";
    this.exitCode = exitCode;
  }
}

/**
 * Raised when no existence-check mechanism produced a conclusive answer.
 * Never conflated with "image does not exist".
 */
export class ExistenceCheckError extends ImgspecError {
  constructor(message: string) {
    super(message);
    this.name = "ExistenceCheckError";
  }
}

/** Raised when an ImageSpec names a builder that is not registered. */
export class BuilderNotFoundError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "BuilderNotFoundError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 *
 * @param error - Unknown error to extract details from.
 * @param maxLength - Maximum length of returned string (default: 1000).
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
