/**
 * ImageSpec: declarative, content-addressed description of a container image.
 *
 * Specs are frozen records built by createImageSpec. Every derived value
 * (requirement source, id) is computed once at construction; the `with*`
 * helpers return new specs instead of mutating.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, validation.ts
 *   It should NOT import from: builders, engine, cli
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";

import { CONTEXT_FILES, DEFAULT_IMAGE_NAME, DEFAULT_PLATFORM } from "./constants.js";
import { DependencyError, ValidationError } from "./errors.js";
import { validateCopyPath, validateEnvVarKey, validateImageName } from "./validation.js";

export type SourceCopyMode = "none" | "all";

/** Where the Python requirements of an image come from. */
export type RequirementSource =
  | { kind: "none" }
  | { kind: "packages"; packages: readonly string[] }
  | { kind: "requirements-file"; path: string }
  | { kind: "uv-lock"; path: string }
  | { kind: "poetry-lock"; path: string };

export type RequirementKind = RequirementSource["kind"];

/** Caller-facing options; every field is optional. */
export interface ImageSpecOptions {
  name?: string;
  registry?: string;
  baseImage?: string | ImageSpec;
  pythonVersion?: string;
  pythonExec?: string;
  packages?: readonly string[];
  requirements?: string;
  condaPackages?: readonly string[];
  condaChannels?: readonly string[];
  aptPackages?: readonly string[];
  env?: Readonly<Record<string, string>>;
  sourceRoot?: string;
  sourceCopyMode?: SourceCopyMode;
  copy?: readonly string[];
  commands?: readonly string[];
  entrypoint?: readonly string[];
  platform?: string;
  builder?: string;
  useDepot?: boolean;
  installProject?: boolean;
  pipIndex?: string;
  pipExtraIndexUrl?: readonly string[];
  pipExtraArgs?: string;
  cuda?: string;
  cudnn?: string;
}

export interface ImageSpec {
  readonly name: string;
  readonly registry?: string;
  readonly baseImage?: string | ImageSpec;
  readonly pythonVersion?: string;
  readonly pythonExec?: string;
  readonly packages?: readonly string[];
  readonly requirements?: string;
  readonly condaPackages?: readonly string[];
  readonly condaChannels?: readonly string[];
  readonly aptPackages?: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly sourceRoot?: string;
  readonly sourceCopyMode?: SourceCopyMode;
  readonly copy?: readonly string[];
  readonly commands?: readonly string[];
  readonly entrypoint?: readonly string[];
  readonly platform: string;
  readonly builder?: string;
  readonly useDepot: boolean;
  readonly installProject: boolean;
  readonly pipIndex?: string;
  readonly pipExtraIndexUrl?: readonly string[];
  readonly pipExtraArgs?: string;
  readonly cuda?: string;
  readonly cudnn?: string;

  /** Classified once from `packages` / `requirements`. */
  readonly requirementSource: RequirementSource;
  /** Deterministic hash of every set field (16 hex chars). */
  readonly id: string;
}

/** Decide the requirement strategy from the file name, never from contents. */
export function classifyRequirements(
  packages: readonly string[] | undefined,
  requirements: string | undefined
): RequirementSource {
  if (packages && packages.length > 0) {
    return { kind: "packages", packages };
  }
  if (requirements === undefined || requirements === "") {
    return { kind: "none" };
  }
  const file = basename(requirements);
  if (file === CONTEXT_FILES.UV_LOCK) {
    return { kind: "uv-lock", path: requirements };
  }
  if (file === CONTEXT_FILES.POETRY_LOCK) {
    return { kind: "poetry-lock", path: requirements };
  }
  return { kind: "requirements-file", path: requirements };
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === "object" && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
}

function computeSpecId(fields: Omit<ImageSpec, "id" | "requirementSource">): string {
  const { baseImage, ...rest } = fields;
  const payload = canonicalize({
    ...rest,
    baseImage: typeof baseImage === "object" ? { spec: baseImage.id } : baseImage,
  });
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex").slice(0, 16);
}

function freezeList(list: readonly string[] | undefined): readonly string[] | undefined {
  return list === undefined ? undefined : Object.freeze([...list]);
}

/**
 * Validate options and build a frozen ImageSpec.
 *
 * Performs no filesystem access, so invalid combinations fail before a
 * build touches any file.
 *
 * @throws ValidationError on mutually exclusive requirement sources,
 *   invalid names, env keys or copy paths.
 */
export function createImageSpec(options: ImageSpecOptions = {}): ImageSpec {
  const hasPackages = options.packages !== undefined && options.packages.length > 0;
  const hasRequirements = options.requirements !== undefined && options.requirements !== "";
  if (hasPackages && hasRequirements) {
    throw new ValidationError(
      `'packages' and 'requirements' are mutually exclusive (requirements: '${options.requirements}'). ` +
        "Declare dependencies in exactly one place."
    );
  }

  const name = options.name ?? DEFAULT_IMAGE_NAME;
  validateImageName(name);

  for (const key of Object.keys(options.env ?? {})) {
    validateEnvVarKey(key);
  }
  for (const path of options.copy ?? []) {
    validateCopyPath(path);
  }
  if (options.sourceCopyMode === "all" && !options.sourceRoot) {
    throw new ValidationError("sourceCopyMode 'all' requires sourceRoot to be set.");
  }

  const fields: Omit<ImageSpec, "id" | "requirementSource"> = {
    name,
    registry: options.registry?.replace(/\/+$/, ""),
    baseImage: options.baseImage,
    pythonVersion: options.pythonVersion,
    pythonExec: options.pythonExec,
    packages: freezeList(options.packages),
    requirements: options.requirements,
    condaPackages: freezeList(options.condaPackages),
    condaChannels: freezeList(options.condaChannels),
    aptPackages: freezeList(options.aptPackages),
    env: options.env ? Object.freeze({ ...options.env }) : undefined,
    sourceRoot: options.sourceRoot,
    sourceCopyMode: options.sourceCopyMode,
    copy: freezeList(options.copy),
    commands: freezeList(options.commands),
    entrypoint: freezeList(options.entrypoint),
    platform: options.platform ?? DEFAULT_PLATFORM,
    builder: options.builder,
    useDepot: options.useDepot ?? false,
    installProject: options.installProject ?? true,
    pipIndex: options.pipIndex,
    pipExtraIndexUrl: freezeList(options.pipExtraIndexUrl),
    pipExtraArgs: options.pipExtraArgs,
    cuda: options.cuda,
    cudnn: options.cudnn,
  };

  return Object.freeze({
    ...fields,
    requirementSource: classifyRequirements(fields.packages, fields.requirements),
    id: computeSpecId(fields),
  });
}

/** Recover the construction options of an existing spec. */
export function toImageSpecOptions(spec: ImageSpec): ImageSpecOptions {
  const { id: _id, requirementSource: _source, ...options } = spec;
  return options;
}

/**
 * Tag for the built image: the spec id, mixed with the contents of the
 * requirements file (and a lock file's sibling pyproject.toml) when the spec
 * names one. Relative paths resolve against `cwd`, as they do for the build.
 *
 * @throws DependencyError if a declared requirements file or pyproject.toml is missing.
 */
export function imageTag(spec: ImageSpec, cwd: string = process.cwd()): string {
  const source = spec.requirementSource;
  let files: string[] = [];
  switch (source.kind) {
    case "requirements-file":
      files = [resolve(cwd, source.path)];
      break;
    case "uv-lock":
    case "poetry-lock": {
      const lockPath = resolve(cwd, source.path);
      files = [lockPath, join(dirname(lockPath), CONTEXT_FILES.PYPROJECT)];
      break;
    }
    case "none":
    case "packages":
      return spec.id;
  }

  const hash = createHash("sha256");
  hash.update(spec.id);
  for (const file of files) {
    if (!existsSync(file)) {
      throw new DependencyError(`Requirements file not found: ${file} (needed to tag image '${spec.name}')`);
    }
    hash.update(`\n${basename(file)}\n${readFileSync(file, "utf-8")}`);
  }
  return hash.digest("hex").slice(0, 16);
}

/** Fully qualified image reference: `<registry>/<name>:<tag>` or `<name>:<tag>`. */
export function imageName(spec: ImageSpec, cwd?: string): string {
  const repository = spec.registry ? `${spec.registry}/${spec.name}` : spec.name;
  return `${repository}:${imageTag(spec, cwd)}`;
}

/** FROM reference for a spec; nested specs resolve to their own image name. */
export function baseImageReference(spec: ImageSpec, fallback: string, cwd?: string): string {
  const base = spec.baseImage;
  if (base === undefined) {
    return fallback;
  }
  return typeof base === "string" ? base : imageName(base, cwd);
}

// === Immutable modifiers ===

export function withCommands(spec: ImageSpec, commands: readonly string[]): ImageSpec {
  return createImageSpec({ ...toImageSpecOptions(spec), commands: [...(spec.commands ?? []), ...commands] });
}

/** Append packages; fails when the spec already names a requirements file or lock. */
export function withPackages(spec: ImageSpec, packages: readonly string[]): ImageSpec {
  return createImageSpec({ ...toImageSpecOptions(spec), packages: [...(spec.packages ?? []), ...packages] });
}

export function withAptPackages(spec: ImageSpec, aptPackages: readonly string[]): ImageSpec {
  return createImageSpec({
    ...toImageSpecOptions(spec),
    aptPackages: [...(spec.aptPackages ?? []), ...aptPackages],
  });
}

export function withCopy(spec: ImageSpec, paths: readonly string[]): ImageSpec {
  return createImageSpec({ ...toImageSpecOptions(spec), copy: [...(spec.copy ?? []), ...paths] });
}

/** Merge env vars; later keys win. */
export function withEnv(spec: ImageSpec, env: Readonly<Record<string, string>>): ImageSpec {
  return createImageSpec({ ...toImageSpecOptions(spec), env: { ...(spec.env ?? {}), ...env } });
}
