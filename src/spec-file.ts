/**
 * ImageSpec files: JSON documents describing one image.
 *
 * Relative `requirements`, `sourceRoot` and nested base specs resolve against
 * the file's own directory, so a spec file means the same thing whatever
 * directory the CLI runs from.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import type { ImgspecConfig } from "./config-file.js";
import { ConfigError } from "./errors.js";
import { createImageSpec, type ImageSpec, type ImageSpecOptions, type SourceCopyMode } from "./image-spec.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class FieldReader {
  constructor(
    private readonly data: JsonObject,
    private readonly origin: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new ConfigError(`Invalid '${key}' in ${this.origin}: expected ${expected}`);
  }

  string(key: string): string | undefined {
    const value = this.data[key];
    if (value === undefined) {
      return undefined;
    }
    return typeof value === "string" ? value : this.fail(key, "a string");
  }

  boolean(key: string): boolean | undefined {
    const value = this.data[key];
    if (value === undefined) {
      return undefined;
    }
    return typeof value === "boolean" ? value : this.fail(key, "true or false");
  }

  stringList(key: string): string[] | undefined {
    const value = this.data[key];
    if (value === undefined) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      return this.fail(key, "a list of strings");
    }
    return value.map((item) => (typeof item === "string" ? item : this.fail(key, "a list of strings")));
  }

  stringMap(key: string): Record<string, string> | undefined {
    const value = this.data[key];
    if (value === undefined) {
      return undefined;
    }
    if (!isObject(value)) {
      return this.fail(key, "an object of strings");
    }
    const result: Record<string, string> = {};
    for (const [name, item] of Object.entries(value)) {
      result[name] = typeof item === "string" ? item : this.fail(key, "an object of strings");
    }
    return result;
  }

  sourceCopyMode(key: string): SourceCopyMode | undefined {
    const value = this.string(key);
    if (value === undefined || value === "none" || value === "all") {
      return value;
    }
    return this.fail(key, "'none' or 'all'");
  }
}

const KNOWN_KEYS = new Set([
  "name",
  "registry",
  "baseImage",
  "pythonVersion",
  "pythonExec",
  "packages",
  "requirements",
  "condaPackages",
  "condaChannels",
  "aptPackages",
  "env",
  "sourceRoot",
  "sourceCopyMode",
  "copy",
  "commands",
  "entrypoint",
  "platform",
  "builder",
  "useDepot",
  "installProject",
  "pipIndex",
  "pipExtraIndexUrl",
  "pipExtraArgs",
  "cuda",
  "cudnn",
]);

/**
 * Turn parsed JSON into ImageSpec options.
 *
 * @param baseDir - Directory relative paths resolve against.
 * @throws ConfigError on unknown keys or values of the wrong type.
 */
export function parseImageSpecOptions(data: unknown, baseDir: string, origin = "spec"): ImageSpecOptions {
  if (!isObject(data)) {
    throw new ConfigError(`${origin} must contain a JSON object`);
  }
  const unknownKeys = Object.keys(data).filter((key) => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown field(s) in ${origin}: ${unknownKeys.join(", ")}`);
  }

  const read = new FieldReader(data, origin);
  const requirements = read.string("requirements");
  const sourceRoot = read.string("sourceRoot");

  let baseImage: string | ImageSpec | undefined;
  if (isObject(data.baseImage)) {
    baseImage = createImageSpec(parseImageSpecOptions(data.baseImage, baseDir, `${origin} (baseImage)`));
  } else {
    baseImage = read.string("baseImage");
  }

  return {
    name: read.string("name"),
    registry: read.string("registry"),
    baseImage,
    pythonVersion: read.string("pythonVersion"),
    pythonExec: read.string("pythonExec"),
    packages: read.stringList("packages"),
    requirements: requirements ? resolve(baseDir, requirements) : undefined,
    condaPackages: read.stringList("condaPackages"),
    condaChannels: read.stringList("condaChannels"),
    aptPackages: read.stringList("aptPackages"),
    env: read.stringMap("env"),
    sourceRoot: sourceRoot ? resolve(baseDir, sourceRoot) : undefined,
    sourceCopyMode: read.sourceCopyMode("sourceCopyMode"),
    copy: read.stringList("copy"),
    commands: read.stringList("commands"),
    entrypoint: read.stringList("entrypoint"),
    platform: read.string("platform"),
    builder: read.string("builder"),
    useDepot: read.boolean("useDepot"),
    installProject: read.boolean("installProject"),
    pipIndex: read.string("pipIndex"),
    pipExtraIndexUrl: read.stringList("pipExtraIndexUrl"),
    pipExtraArgs: read.string("pipExtraArgs"),
    cuda: read.string("cuda"),
    cudnn: read.string("cudnn"),
  };
}

/** Fill options the spec leaves unset from config defaults; spec env wins per key. */
export function applyConfigDefaults(options: ImageSpecOptions, config: ImgspecConfig): ImageSpecOptions {
  const env = config.env || options.env ? { ...(config.env ?? {}), ...(options.env ?? {}) } : undefined;
  return {
    ...options,
    registry: options.registry ?? config.registry,
    platform: options.platform ?? config.platform,
    builder: options.builder ?? config.builder,
    useDepot: options.useDepot ?? config.useDepot,
    env,
  };
}

/**
 * Load an ImageSpec from a JSON file.
 *
 * @throws ConfigError when the file is missing or malformed.
 * @throws ValidationError when the options describe an invalid spec.
 */
export function loadImageSpecFile(path: string, config: ImgspecConfig = {}): ImageSpec {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    throw new ConfigError(`Spec file not found: ${absolute}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(absolute, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigError(`Failed to parse spec file ${absolute}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const options = parseImageSpecOptions(data, dirname(absolute), absolute);
  return createImageSpec(applyConfigDefaults(options, config));
}
