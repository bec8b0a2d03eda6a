/**
 * Constants module for imgspec.
 *
 * All timeout values, file names and container paths are defined here (SSOT).
 */

import { readFileSync } from "node:fs";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // Running from an unusual layout; fall through to the placeholder.
  }
  return "0.0.0";
}

export const VERSION: string = readPackageVersion();

// === Naming (SSOT) ===
export const IMGSPEC_PREFIX = "imgspec";
export const DEFAULT_IMAGE_NAME = "imgspec";
/** Unprivileged user created in every image; owns /root and /home. */
export const CONTAINER_USER = "imgspec";

// === Command Timeouts (milliseconds) ===
export const TOOL_CHECK_TIMEOUT = 30_000; // docker info, aws --version, which
export const REGISTRY_CHECK_TIMEOUT = 60_000; // describe-images, manifest inspect

// === Image Defaults ===
export const DEFAULT_BASE_IMAGE = "debian:bookworm-slim";
export const DEFAULT_UV_BASE_IMAGE = "python:3.12-slim-bookworm";
export const DEFAULT_PLATFORM = "linux/amd64";
export const DEFAULT_PYTHON_VERSION = "3.12";
export const UV_IMAGE = "ghcr.io/astral-sh/uv:0.5.31";
export const MICROMAMBA_IMAGE = "mambaorg/micromamba:2.0.3-debian12-slim";

// === Container Paths ===
export const CONTAINER_HOME = "/root";
export const CONTAINER_VENV = "/root/.venv";
export const CONTAINER_LOCAL_PACKAGES_DIR = "/root/local_packages";
export const MICROMAMBA_ENV_BIN = "/opt/micromamba/envs/runtime/bin";

/** Environment variable baked into every image carrying the spec id. */
export const IMAGE_ID_ENV = "_IMGSPEC_IMAGE_ID";

// === Build Context File Names (SSOT) ===
export const CONTEXT_FILES = {
  DOCKERFILE: "Dockerfile",
  SOURCE_DIR: "src",
  LOCAL_PACKAGES_DIR: "local_packages",
  LOCAL_PACKAGES_LIST: "local_packages.txt",
  REQUIREMENTS_UV: "requirements_uv.txt",
  REQUIREMENTS_REMOTE: "requirements_remote.txt",
  UV_LOCK: "uv.lock",
  PYPROJECT: "pyproject.toml",
  UV_REMOTE_LOCK: "uv_remote.lock",
  PYPROJECT_REMOTE: "pyproject_remote.toml",
  POETRY_LOCK: "poetry.lock",
} as const;

/** Default output names for the standalone remote-only lock export. */
export const EXTERNAL_LOCK_FILE = "uv_external.lock";
export const EXTERNAL_PYPROJECT_FILE = "pyproject_external.toml";

/** Marker whose presence identifies a repository root. */
export const REPOSITORY_MARKER = ".git";

// === imgspec Environment Variables (SSOT for names) ===
export const IMGSPEC_ENV = {
  PUSH_IMAGE: "IMGSPEC_PUSH_IMAGE",
  LOG_LEVEL: "IMGSPEC_LOG_LEVEL",
} as const;

// === Builder Priorities (higher = preferred) ===
export const PRIORITY = {
  DEFAULT: 1,
  LOCK_SPECIALIZED: 2,
} as const;
