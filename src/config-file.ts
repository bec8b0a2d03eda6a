/**
 * Configuration file support for imgspec.
 *
 * Loads build defaults from imgspec.yaml or .imgspecrc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. ./imgspec.yaml, ./imgspec.yml (project-specific)
 *   2. ./.imgspecrc (project-specific, alternative)
 *   3. ~/.imgspec/config.yaml (global)
 *
 * Dependency direction:
 *   This module imports from: errors.ts, logger.ts, validation.ts
 *   It should NOT import from: cli, engine, builders
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { isValidEnvVarKey } from "./validation.js";

/**
 * imgspec configuration options.
 * All fields are optional - spec files and CLI flags take precedence.
 */
export interface ImgspecConfig {
  // Image defaults
  registry?: string;
  platform?: string;
  builder?: string;
  useDepot?: boolean;

  // Build behaviour
  push?: boolean;

  // Environment variables baked into images
  env?: Record<string, string>;
}

/**
 * Config file search paths.
 */
export const PROJECT_CONFIG_FILES = ["imgspec.yaml", "imgspec.yml", ".imgspecrc"];
export const GLOBAL_CONFIG_PATH = join(homedir(), ".imgspec", "config.yaml");

type ScalarValue = string | number | boolean;

function parseScalar(raw: string): ScalarValue | undefined {
  const value = raw.replace(/^["']|["']$/g, "").trim();
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }
  return value === "" ? undefined : value;
}

/**
 * Parse YAML-like config (simple `key: value` format plus an indented
 * `env:` block). Supports basic YAML without external dependencies.
 */
export function parseSimpleYaml(content: string): Record<string, ScalarValue | Record<string, string>> {
  const result: Record<string, ScalarValue | Record<string, string>> = {};
  let envVars: Record<string, string> | undefined;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    if (trimmed === "env:") {
      envVars = {};
      result.env = envVars;
      continue;
    }

    // Indented lines belong to the env block
    if (envVars && /^\s/.test(line)) {
      const envMatch = trimmed.match(/^([^:\s]+):\s*(.*)$/);
      if (envMatch) {
        const [, key = "", value = ""] = envMatch;
        envVars[key] = value.replace(/^["']|["']$/g, "");
      }
      continue;
    }
    envVars = undefined;

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (match) {
      const [, key = "", value = ""] = match;
      const parsed = parseScalar(value);
      if (parsed !== undefined) {
        result[key] = parsed;
      }
    }
  }

  return result;
}

function expectString(parsed: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = parsed[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid value for '${key}' in ${path}: expected a string, got ${String(value)}`);
  }
  return value;
}

function expectBoolean(parsed: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = parsed[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid value for '${key}' in ${path}: expected true or false, got ${String(value)}`);
  }
  return value;
}

/**
 * Parse config text into typed options.
 *
 * @throws ConfigError for values of the wrong type or invalid env keys.
 */
export function parseConfig(content: string, path = "config"): ImgspecConfig {
  const parsed = parseSimpleYaml(content);
  const config: ImgspecConfig = {
    registry: expectString(parsed, "registry", path),
    platform: expectString(parsed, "platform", path),
    builder: expectString(parsed, "builder", path),
    useDepot: expectBoolean(parsed, "useDepot", path),
    push: expectBoolean(parsed, "push", path),
  };

  const env = parsed.env;
  if (typeof env === "object") {
    for (const key of Object.keys(env)) {
      if (!isValidEnvVarKey(key)) {
        throw new ConfigError(`Invalid environment variable name '${key}' in ${path}`);
      }
    }
    config.env = env;
  }

  const known = new Set(["registry", "platform", "builder", "useDepot", "push", "env"]);
  for (const key of Object.keys(parsed)) {
    if (!known.has(key)) {
      log.warn(`Unknown config key '${key}' in ${path} is ignored`);
    }
  }

  return config;
}

/**
 * Load configuration from file.
 */
function loadConfigFile(path: string): ImgspecConfig | null {
  if (!existsSync(path)) {
    return null;
  }
  return parseConfig(readFileSync(path, "utf-8"), path);
}

/**
 * Find and load project-specific config file.
 */
function loadProjectConfig(projectPath: string): ImgspecConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Order: global < project
 */
export function mergeConfigs(...configs: (ImgspecConfig | null)[]): ImgspecConfig {
  const result: ImgspecConfig = {};

  for (const config of configs) {
    if (!config) {continue;}

    // Simple fields: later values override earlier
    if (config.registry !== undefined) {result.registry = config.registry;}
    if (config.platform !== undefined) {result.platform = config.platform;}
    if (config.builder !== undefined) {result.builder = config.builder;}
    if (config.useDepot !== undefined) {result.useDepot = config.useDepot;}
    if (config.push !== undefined) {result.push = config.push;}

    // Env vars: merge (later overrides same keys)
    if (config.env) {
      result.env = { ...(result.env ?? {}), ...config.env };
    }
  }

  return result;
}

/**
 * Load imgspec configuration.
 *
 * Loads and merges configuration from:
 *   1. Global config (~/.imgspec/config.yaml)
 *   2. Project config (./imgspec.yaml, ./.imgspecrc)
 *
 * @param projectPath - Project directory path.
 * @param globalPath - Global config location (overridable for tests).
 * @throws ConfigError when a config file holds invalid values.
 */
export function loadImgspecConfig(projectPath: string, globalPath: string = GLOBAL_CONFIG_PATH): ImgspecConfig {
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  return mergeConfigs(globalConfig, loadProjectConfig(projectPath));
}
