/**
 * Build context materialization.
 *
 * Stages everything the external build tool needs into a scratch directory
 * owned by a single build: requirement files, rewritten lock files, local
 * packages, the filtered source tree, the extra copy list and the Dockerfile.
 */

import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";

import { CONTEXT_FILES, DEFAULT_BASE_IMAGE, IMGSPEC_PREFIX } from "./constants.js";
import { type CopyEntry, type DockerfilePlan, renderDockerfile } from "./dockerfile-gen.js";
import { DependencyError, PathError } from "./errors.js";
import { copyIncludedFiles, IgnoreRuleSet } from "./ignore.js";
import { baseImageReference, type ImageSpec } from "./image-spec.js";
import { rewriteLocalPackages, type LockRewriteResult } from "./lock-rewriter.js";
import { log } from "./logger.js";
import { normalizePathSeparators } from "./paths.js";
import { validateCopyPath } from "./validation.js";

export type DockerfileRenderer = (spec: ImageSpec, plan: DockerfilePlan) => string;

export interface PrepareOptions {
  /** Recipe template; defaults to the full multi-stage template. */
  render?: DockerfileRenderer;
  /** FROM reference when the spec names no base image. */
  defaultBaseImage?: string;
  /** Directory relative requirement and copy paths resolve against. */
  cwd?: string;
}

export interface PreparedContext {
  dir: string;
  plan: DockerfilePlan;
  dockerfile: string;
  /** Present for uv.lock specs. */
  lock?: LockRewriteResult;
}

/**
 * Run `fn` with a fresh scratch directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withBuildContext<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), `${IMGSPEC_PREFIX}-build-`));
  log.debug(`Build context: ${dir}`);
  try {
    return await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

function readRequirementsFile(path: string): string[] {
  if (!existsSync(path)) {
    throw new DependencyError(`Requirements file not found: ${path}`);
  }
  return readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

function writeRequirementsUv(dir: string, lines: readonly string[]): void {
  writeFileSync(join(dir, CONTEXT_FILES.REQUIREMENTS_UV), `${lines.join("\n")}\n`, "utf-8");
}

function stagePoetryFiles(lockPath: string, dir: string): void {
  if (!existsSync(lockPath)) {
    throw new DependencyError(`Lock file not found: ${lockPath}`);
  }
  const manifestPath = join(dirname(lockPath), CONTEXT_FILES.PYPROJECT);
  if (!existsSync(manifestPath)) {
    throw new DependencyError(`pyproject.toml must exist in the same directory as poetry.lock (expected ${manifestPath})`);
  }
  copyFileSync(lockPath, join(dir, CONTEXT_FILES.POETRY_LOCK));
  copyFileSync(manifestPath, join(dir, CONTEXT_FILES.PYPROJECT));
}

/** Stage requirement files; returns the lock rewrite for uv.lock specs. */
function stageRequirements(spec: ImageSpec, dir: string, cwd: string): LockRewriteResult | undefined {
  const source = spec.requirementSource;
  switch (source.kind) {
    case "none":
      return undefined;
    case "packages":
      writeRequirementsUv(dir, source.packages);
      return undefined;
    case "requirements-file":
      writeRequirementsUv(dir, readRequirementsFile(resolve(cwd, source.path)));
      return undefined;
    case "uv-lock":
      return rewriteLocalPackages(spec, dir, { cwd });
    case "poetry-lock":
      stagePoetryFiles(resolve(cwd, source.path), dir);
      return undefined;
  }
}

function stageSourceTree(spec: ImageSpec, dir: string, cwd: string): boolean {
  if (spec.sourceCopyMode !== "all" || !spec.sourceRoot) {
    return false;
  }
  const root = resolve(cwd, spec.sourceRoot);
  const files = copyIncludedFiles(root, join(dir, CONTEXT_FILES.SOURCE_DIR), IgnoreRuleSet.forDirectory(root));
  log.debug(`Copied ${files.length} source file(s) from ${root}`);
  return true;
}

function stageCopies(spec: ImageSpec, dir: string, cwd: string): CopyEntry[] {
  const base = spec.sourceRoot ? resolve(cwd, spec.sourceRoot) : cwd;
  const entries: CopyEntry[] = [];

  for (const path of spec.copy ?? []) {
    validateCopyPath(path);
    const source = resolve(base, path);
    if (!existsSync(source)) {
      throw new PathError(`Path in copy list does not exist: ${source}`);
    }
    const relative = normalizePathSeparators(path).replace(/^\.\//, "");
    const target = join(dir, relative);
    const isDirectory = statSync(source).isDirectory();
    if (isDirectory) {
      copyIncludedFiles(source, target, new IgnoreRuleSet([]));
    } else {
      mkdirSync(dirname(target), { recursive: true });
      copyFileSync(source, target);
    }
    entries.push({ path: relative, isDirectory });
  }

  return entries;
}

/**
 * Populate `dir` for `spec` and write the Dockerfile.
 *
 * @throws DependencyError, ResolutionError, PathError or ValidationError from
 *   the staging steps; nothing is cleaned up here (see withBuildContext).
 */
export function prepareBuildContext(spec: ImageSpec, dir: string, options: PrepareOptions = {}): PreparedContext {
  const cwd = options.cwd ?? process.cwd();
  const render = options.render ?? renderDockerfile;

  const lock = stageRequirements(spec, dir, cwd);
  const plan: DockerfilePlan = {
    baseImage: baseImageReference(spec, options.defaultBaseImage ?? DEFAULT_BASE_IMAGE, cwd),
    localInstallLines: lock?.localInstallLines ?? [],
    hasSourceTree: stageSourceTree(spec, dir, cwd),
    copies: stageCopies(spec, dir, cwd),
  };

  const dockerfile = render(spec, plan);
  writeFileSync(join(dir, CONTEXT_FILES.DOCKERFILE), dockerfile, "utf-8");
  return { dir, plan, dockerfile, lock };
}
