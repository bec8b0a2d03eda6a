/**
 * Lock-file rewriter for uv projects.
 *
 * Splits a uv.lock + pyproject.toml pair into:
 *   - a remote-only pair (registry, git and URL packages) installed in an
 *     early, cacheable layer;
 *   - a set of local path packages copied under local_packages/ with every
 *     reference to them rewritten to /root/local_packages/<repo-relative path>.
 *
 * Dependency direction:
 *   This module imports from: lockfile.ts, ignore.ts, paths.ts, constants.ts, errors.ts, logger.ts
 *   It should NOT import from: builders, engine, cli
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { CONTAINER_LOCAL_PACKAGES_DIR, CONTEXT_FILES, EXTERNAL_LOCK_FILE, EXTERNAL_PYPROJECT_FILE } from "./constants.js";
import { DependencyError, ResolutionError, ValidationError } from "./errors.js";
import { copyIncludedFiles, IgnoreRuleSet } from "./ignore.js";
import type { ImageSpec } from "./image-spec.js";
import {
  classifySource,
  isLocalSource,
  isTable,
  normalizePackageName,
  packageTables,
  parseLockFile,
  parseToml,
  PATH_KEYS,
  readLockedPackage,
  requirementName,
  rewriteDocumentPaths,
  serializeToml,
  type LocalSource,
  type LockedPackage,
  type TomlTable,
} from "./lockfile.js";
import { log } from "./logger.js";
import { findRepositoryRoot, posixRelative } from "./paths.js";

/** A path package placed into the build context. */
export interface LocalPackage {
  name: string;
  kind: LocalSource["kind"];
  /** Absolute path on the host. */
  hostPath: string;
  /** POSIX path relative to the enclosing repository root. */
  relativePath: string;
  containerPath: string;
}

export interface LockRewriteResult {
  localPackages: LocalPackage[];
  /** Lines of local_packages.txt, in lock order. */
  localInstallLines: string[];
  /** Lines of requirements_remote.txt. */
  remoteRequirements: string[];
  /** Names of packages kept in uv_remote.lock. */
  remotePackageNames: string[];
  /** Local packages left out entirely (the project root when installProject is false). */
  skippedPackageNames: string[];
}

const LOCK_EDGE_LISTS = ["dependencies"] as const;
const LOCK_EDGE_GROUPS = ["optional-dependencies", "dev-dependencies"] as const;

// === Pure document transforms ===

function hasPathKey(table: TomlTable): boolean {
  return PATH_KEYS.some((key) => typeof table[key] === "string");
}

function isDroppedName(name: unknown, dropped: ReadonlySet<string>): boolean {
  return typeof name === "string" && dropped.has(normalizePackageName(name));
}

/** Remove `{ name = ... }` edges pointing at dropped packages. */
function filterEdges(value: unknown, dropped: ReadonlySet<string>): unknown {
  if (!Array.isArray(value)) {
    return value;
  }
  return value.filter((edge) => !(isTable(edge) && (isDroppedName(edge["name"], dropped) || hasPathKey(edge))));
}

function filterEdgeGroups(value: unknown, dropped: ReadonlySet<string>): unknown {
  if (!isTable(value)) {
    return value;
  }
  const groups: TomlTable = {};
  for (const [group, edges] of Object.entries(value)) {
    groups[group] = filterEdges(edges, dropped);
  }
  return groups;
}

function stripLockPackage(table: TomlTable, dropped: ReadonlySet<string>): TomlTable {
  const result: TomlTable = { ...table };
  for (const key of LOCK_EDGE_LISTS) {
    if (key in result) {
      result[key] = filterEdges(result[key], dropped);
    }
  }
  for (const key of LOCK_EDGE_GROUPS) {
    if (key in result) {
      result[key] = filterEdgeGroups(result[key], dropped);
    }
  }
  const metadata = result["metadata"];
  if (isTable(metadata)) {
    const cleaned: TomlTable = { ...metadata };
    if ("requires-dist" in cleaned) {
      cleaned["requires-dist"] = filterEdges(cleaned["requires-dist"], dropped);
    }
    if ("requires-dev" in cleaned) {
      cleaned["requires-dev"] = filterEdgeGroups(cleaned["requires-dev"], dropped);
    }
    result["metadata"] = cleaned;
  }
  return result;
}

/**
 * Remote-only lock document: dropped packages and every edge to them removed.
 */
export function removePackagesFromLock(lock: TomlTable, dropped: ReadonlySet<string>): TomlTable {
  if (!Array.isArray(lock["package"])) {
    return { ...lock };
  }
  const packages = packageTables(lock)
    .filter((table) => !isDroppedName(table["name"], dropped))
    .map((table) => stripLockPackage(table, dropped));
  return { ...lock, package: packages };
}

/** Keep only string requirements that do not name a dropped package. */
function filterRequirementList(value: unknown, dropped: ReadonlySet<string>): unknown {
  if (!Array.isArray(value)) {
    return value;
  }
  return value.filter((entry): entry is string => {
    if (typeof entry !== "string") {
      return false;
    }
    const name = requirementName(entry);
    return name === undefined || !dropped.has(normalizePackageName(name));
  });
}

function filterRequirementGroups(value: unknown, dropped: ReadonlySet<string>): unknown {
  if (!isTable(value)) {
    return value;
  }
  const groups: TomlTable = {};
  for (const [group, entries] of Object.entries(value)) {
    groups[group] = filterRequirementList(entries, dropped);
  }
  return groups;
}

/**
 * Remote-only pyproject: table-form (path) dependencies, requirements naming
 * dropped packages and local `tool.uv.sources` entries are removed.
 */
export function removePackagesFromManifest(manifest: TomlTable, dropped: ReadonlySet<string>): TomlTable {
  const result: TomlTable = { ...manifest };

  const project = result["project"];
  if (isTable(project)) {
    const cleaned: TomlTable = { ...project };
    if ("dependencies" in cleaned) {
      cleaned["dependencies"] = filterRequirementList(cleaned["dependencies"], dropped);
    }
    if ("optional-dependencies" in cleaned) {
      cleaned["optional-dependencies"] = filterRequirementGroups(cleaned["optional-dependencies"], dropped);
    }
    result["project"] = cleaned;
  }

  if ("dependency-groups" in result) {
    result["dependency-groups"] = filterRequirementGroups(result["dependency-groups"], dropped);
  }

  const tool = result["tool"];
  const uv = isTable(tool) ? tool["uv"] : undefined;
  if (isTable(tool) && isTable(uv)) {
    const cleanedUv: TomlTable = { ...uv };
    if ("dev-dependencies" in cleanedUv) {
      cleanedUv["dev-dependencies"] = filterRequirementList(cleanedUv["dev-dependencies"], dropped);
    }
    const sources = cleanedUv["sources"];
    if (isTable(sources)) {
      const kept: TomlTable = {};
      for (const [name, source] of Object.entries(sources)) {
        if (dropped.has(normalizePackageName(name)) || (isTable(source) && hasPathKey(source))) {
          continue;
        }
        kept[name] = source;
      }
      cleanedUv["sources"] = kept;
    }
    result["tool"] = { ...tool, uv: cleanedUv };
  }

  return result;
}

function gitRequirement(name: string, url: string): string {
  const hashIndex = url.indexOf("#");
  const commit = hashIndex >= 0 ? url.slice(hashIndex + 1) : "";
  const withoutFragment = hashIndex >= 0 ? url.slice(0, hashIndex) : url;
  const queryIndex = withoutFragment.indexOf("?");
  const base = queryIndex >= 0 ? withoutFragment.slice(0, queryIndex) : withoutFragment;
  const params = new URLSearchParams(queryIndex >= 0 ? withoutFragment.slice(queryIndex + 1) : "");

  const ref = commit || params.get("rev") || params.get("tag") || params.get("branch");
  const subdirectory = params.get("subdirectory");
  const refPart = ref ? `@${ref}` : "";
  const subdirectoryPart = subdirectory ? `#subdirectory=${subdirectory}` : "";
  return `${name} @ git+${base}${refPart}${subdirectoryPart}`;
}

function exportLine(pkg: LockedPackage): string | undefined {
  switch (pkg.source.kind) {
    case "registry":
    case "unspecified":
      return pkg.version ? `${pkg.name}==${pkg.version}` : pkg.name;
    case "git":
      return gitRequirement(pkg.name, pkg.source.url);
    case "url":
      return `${pkg.name} @ ${pkg.source.url}`;
    case "virtual":
    case "directory":
    case "editable":
    case "path":
      return undefined;
  }
}

/** Editable installs, relative/absolute paths and file: URLs. */
export function isPathLikeRequirement(line: string): boolean {
  const trimmed = line.trim();
  return /^(-e\s|--editable\b|\.\.?\/|\/|file:)/.test(trimmed) || / @ file:/.test(trimmed);
}

// === Requirement export ===

/**
 * Markers under which a package is needed: a disjunction of conjunctions of
 * edge markers. An empty conjunction means the package is always needed.
 */
class MarkerSet {
  private readonly conjunctions = new Map<string, readonly string[]>();

  get reached(): boolean {
    return this.conjunctions.size > 0;
  }

  get unconditional(): boolean {
    return this.conjunctions.has("");
  }

  /** @returns false when an equal or weaker conjunction is already present. */
  add(conjunction: readonly string[]): boolean {
    const sorted = [...new Set(conjunction)].sort();
    const members = new Set(sorted);
    for (const existing of this.conjunctions.values()) {
      if (existing.every((marker) => members.has(marker))) {
        return false;
      }
    }
    for (const [key, existing] of this.conjunctions) {
      if (sorted.every((marker) => existing.includes(marker))) {
        this.conjunctions.delete(key);
      }
    }
    this.conjunctions.set(sorted.join("\n"), sorted);
    return true;
  }

  /** PEP 508 marker expression, or undefined when unconditional. */
  format(): string | undefined {
    if (this.unconditional) {
      return undefined;
    }
    const terms = [...this.conjunctions.keys()]
      .sort()
      .flatMap((key) => {
        const markers = this.conjunctions.get(key);
        return markers ? [joinMarkers(markers, " and ")] : [];
      });
    return joinMarkers(terms, " or ");
  }
}

function joinMarkers(parts: readonly string[], operator: string): string {
  return parts.length === 1 ? parts.join("") : parts.map((part) => `(${part})`).join(operator);
}

interface LockEdge {
  targets: number[];
  extras: string[];
  marker?: string;
}

/** Edges of one `{ name, version?, marker?, extra? }` list, resolved to package indexes. */
function readEdges(value: unknown, indexesByName: ReadonlyMap<string, number[]>, tables: readonly TomlTable[]): LockEdge[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isTable).flatMap((edge) => {
    const name = edge["name"];
    if (typeof name !== "string") {
      return [];
    }
    const version = edge["version"];
    const candidates = indexesByName.get(normalizePackageName(name)) ?? [];
    const targets =
      typeof version === "string"
        ? candidates.filter((index) => tables[index]?.["version"] === version)
        : candidates;
    const extra = edge["extra"];
    const marker = edge["marker"];
    return [
      {
        targets,
        extras: Array.isArray(extra) ? extra.filter((item): item is string => typeof item === "string") : [],
        marker: typeof marker === "string" && marker.trim() !== "" ? marker.trim() : undefined,
      },
    ];
  });
}

function groupEdges(
  value: unknown,
  group: string,
  indexesByName: ReadonlyMap<string, number[]>,
  tables: readonly TomlTable[]
): LockEdge[] {
  return isTable(value) ? readEdges(value[group], indexesByName, tables) : [];
}

/**
 * Walk the lock graph from its root packages (the project and every local
 * package) and collect the markers each package is reached under. Extras are
 * followed only when an edge requests them; the roots' `dev` group is
 * included. A lock without any root package treats every entry as a root.
 */
function collectMarkers(tables: readonly TomlTable[]): MarkerSet[] {
  const indexesByName = new Map<string, number[]>();
  tables.forEach((table, index) => {
    const name = table["name"];
    if (typeof name === "string") {
      const key = normalizePackageName(name);
      indexesByName.set(key, [...(indexesByName.get(key) ?? []), index]);
    }
  });

  const isRoot = tables.map((table) => {
    const kind = classifySource(table["source"]).kind;
    return kind === "virtual" || kind === "directory" || kind === "editable" || kind === "path";
  });
  const hasRoot = isRoot.some(Boolean);

  const markers = new Map<string, MarkerSet>();
  const markersFor = (node: string): MarkerSet => {
    let set = markers.get(node);
    if (!set) {
      set = new MarkerSet();
      markers.set(node, set);
    }
    return set;
  };

  const edgesOf = (index: number, extra: string | undefined): LockEdge[] => {
    const table: TomlTable = tables[index] ?? {};
    if (extra !== undefined) {
      return [
        { targets: [index], extras: [], marker: undefined },
        ...groupEdges(table["optional-dependencies"], extra, indexesByName, tables),
      ];
    }
    const edges = readEdges(table["dependencies"], indexesByName, tables);
    return isRoot[index] ? [...edges, ...groupEdges(table["dev-dependencies"], "dev", indexesByName, tables)] : edges;
  };

  type Visit = { index: number; extra?: string; conjunction: readonly string[] };
  const pending: Visit[] = tables.flatMap((_table, index) =>
    !hasRoot || isRoot[index] ? [{ index, conjunction: [] }] : []
  );

  for (let visit = pending.pop(); visit; visit = pending.pop()) {
    const node = visit.extra === undefined ? `${visit.index}` : `${visit.index}[${visit.extra}]`;
    if (!markersFor(node).add(visit.conjunction)) {
      continue;
    }
    for (const edge of edgesOf(visit.index, visit.extra)) {
      const conjunction = edge.marker === undefined ? visit.conjunction : [...visit.conjunction, edge.marker];
      for (const target of edge.targets) {
        pending.push({ index: target, conjunction });
        for (const extra of edge.extras) {
          pending.push({ index: target, extra, conjunction });
        }
      }
    }
  }

  return tables.map((_table, index) => markersFor(`${index}`));
}

/**
 * Requirement list for the remote install layer, taken from a lock document.
 *
 * Only packages reachable from the project (or a local package) are
 * exported, each pinned and carrying the environment markers of the edges
 * that reach it. Virtual and local entries are not exported; a repeated
 * package name keeps its first entry.
 */
export function exportRequirements(lock: TomlTable): string[] {
  const tables = packageTables(lock);
  const markers = collectMarkers(tables);
  const lines: string[] = [];
  const seen = new Set<string>();

  tables.forEach((table, index) => {
    const pkg = readLockedPackage(table);
    const reachedBy = markers[index];
    if (!pkg || !reachedBy?.reached) {
      return;
    }
    const line = exportLine(pkg);
    if (line === undefined || isPathLikeRequirement(line)) {
      return;
    }
    const key = normalizePackageName(pkg.name);
    if (seen.has(key)) {
      log.warn(`Duplicate package '${pkg.name}' in lock file; keeping the first entry`);
      return;
    }
    seen.add(key);
    const marker = reachedBy.format();
    lines.push(marker === undefined ? line : `${line} ; ${marker}`);
  });

  return lines;
}

// === Filesystem operations ===

function readRequired(path: string, what: string): string {
  if (!existsSync(path)) {
    throw new DependencyError(`${what} not found: ${path}`);
  }
  return readFileSync(path, "utf-8");
}

function manifestPathFor(lockPath: string): string {
  const manifestPath = join(dirname(lockPath), CONTEXT_FILES.PYPROJECT);
  if (!existsSync(manifestPath)) {
    throw new DependencyError(
      `pyproject.toml must exist in the same directory as uv.lock (expected ${manifestPath})`
    );
  }
  return manifestPath;
}

function containerPathFor(relativePath: string): string {
  return relativePath === "" ? CONTAINER_LOCAL_PACKAGES_DIR : `${CONTAINER_LOCAL_PACKAGES_DIR}/${relativePath}`;
}

function copyLocalPackage(hostPath: string, target: string): void {
  if (statSync(hostPath).isDirectory()) {
    copyIncludedFiles(hostPath, target, IgnoreRuleSet.forDirectory(hostPath));
  } else {
    mkdirSync(dirname(target), { recursive: true });
    copyFileSync(hostPath, target);
  }
}

function writeLines(path: string, lines: readonly string[]): void {
  writeFileSync(path, lines.length > 0 ? `${lines.join("\n")}\n` : "", "utf-8");
}

/**
 * Stage local packages of a uv.lock spec into `contextDir` and write the
 * rewritten and remote-only documents next to them.
 *
 * Writes uv.lock, pyproject.toml, uv_remote.lock, pyproject_remote.toml and
 * requirements_remote.txt; local_packages/ and local_packages.txt only when
 * at least one local package is installed.
 *
 * @throws ValidationError if the spec does not use a uv.lock.
 * @throws DependencyError if pyproject.toml is missing or a document is invalid.
 * @throws ResolutionError if a local path or its repository root cannot be found.
 */
export function rewriteLocalPackages(
  spec: ImageSpec,
  contextDir: string,
  options: { cwd?: string } = {}
): LockRewriteResult {
  const source = spec.requirementSource;
  if (source.kind !== "uv-lock") {
    throw new ValidationError(`Local package rewriting requires a uv.lock requirements file, got '${source.kind}'`);
  }

  const lockPath = resolve(options.cwd ?? process.cwd(), source.path);
  const lockDir = dirname(lockPath);
  const lock = parseLockFile(readRequired(lockPath, "Lock file"), lockPath);
  const manifestPath = manifestPathFor(lockPath);
  const manifest = parseToml(readFileSync(manifestPath, "utf-8"), manifestPath);

  const localPackages: LocalPackage[] = [];
  const skippedPackageNames: string[] = [];
  const dropped = new Set<string>();

  for (const pkg of lock.packages) {
    if (!isLocalSource(pkg.source)) {
      continue;
    }
    dropped.add(normalizePackageName(pkg.name));

    const hostPath = resolve(lockDir, pkg.source.path);
    if (hostPath === lockDir && !spec.installProject) {
      log.debug(`Skipping project package ${pkg.name} (installProject is false)`);
      skippedPackageNames.push(pkg.name);
      continue;
    }
    if (!existsSync(hostPath)) {
      throw new ResolutionError(`Local package path does not exist: ${hostPath} (package ${pkg.name})`);
    }
    const repoRoot = findRepositoryRoot(hostPath);
    if (repoRoot === undefined) {
      throw new ResolutionError(
        `Could not find a repository root (.git) above ${hostPath} for package ${pkg.name}`
      );
    }

    const relativePath = posixRelative(repoRoot, hostPath);
    const target = join(contextDir, CONTEXT_FILES.LOCAL_PACKAGES_DIR, relativePath);
    copyLocalPackage(hostPath, target);
    localPackages.push({
      name: pkg.name,
      kind: pkg.source.kind,
      hostPath,
      relativePath,
      containerPath: containerPathFor(relativePath),
    });
    log.debug(`Staged local package ${pkg.name} -> ${containerPathFor(relativePath)}`);
  }

  const byHostPath = new Map(localPackages.map((pkg) => [pkg.hostPath, pkg.containerPath]));
  const replace = (path: string): string => byHostPath.get(resolve(lockDir, path)) ?? path;
  const rewrittenLock = rewriteDocumentPaths(lock.document, replace);
  const rewrittenManifest = rewriteDocumentPaths(manifest, replace);

  const remoteLock = removePackagesFromLock(rewrittenLock, dropped);
  const remoteManifest = removePackagesFromManifest(rewrittenManifest, dropped);
  const remoteRequirements = exportRequirements(rewrittenLock);
  const localInstallLines = localPackages.map((pkg) =>
    pkg.kind === "editable" ? `-e ${pkg.containerPath}` : pkg.containerPath
  );

  writeFileSync(join(contextDir, CONTEXT_FILES.UV_LOCK), serializeToml(rewrittenLock), "utf-8");
  writeFileSync(join(contextDir, CONTEXT_FILES.PYPROJECT), serializeToml(rewrittenManifest), "utf-8");
  writeFileSync(join(contextDir, CONTEXT_FILES.UV_REMOTE_LOCK), serializeToml(remoteLock), "utf-8");
  writeFileSync(join(contextDir, CONTEXT_FILES.PYPROJECT_REMOTE), serializeToml(remoteManifest), "utf-8");
  writeLines(join(contextDir, CONTEXT_FILES.REQUIREMENTS_REMOTE), remoteRequirements);
  if (localInstallLines.length > 0) {
    writeLines(join(contextDir, CONTEXT_FILES.LOCAL_PACKAGES_LIST), localInstallLines);
  }

  return {
    localPackages,
    localInstallLines,
    remoteRequirements,
    remotePackageNames: packageTables(remoteLock).flatMap((table) =>
      typeof table["name"] === "string" ? [table["name"]] : []
    ),
    skippedPackageNames,
  };
}

export interface RemoveLocalPackagesOptions {
  lockPath: string;
  pyprojectPath: string;
  /** Defaults to uv_external.lock beside the lock file. */
  outputLockPath?: string;
  /** Defaults to pyproject_external.toml beside the pyproject. */
  outputPyprojectPath?: string;
}

/**
 * Write a remote-only copy of a uv.lock / pyproject.toml pair.
 *
 * @returns Paths of the two files written.
 */
export function removeLocalPackagesFromLockFiles(options: RemoveLocalPackagesOptions): {
  lockPath: string;
  pyprojectPath: string;
} {
  const lockPath = resolve(options.lockPath);
  const pyprojectPath = resolve(options.pyprojectPath);
  const lock = parseLockFile(readRequired(lockPath, "Lock file"), lockPath);
  const manifest = parseToml(readRequired(pyprojectPath, "pyproject.toml"), pyprojectPath);

  const dropped = new Set(
    lock.packages.filter((pkg) => isLocalSource(pkg.source)).map((pkg) => normalizePackageName(pkg.name))
  );

  const outputLockPath = resolve(options.outputLockPath ?? join(dirname(lockPath), EXTERNAL_LOCK_FILE));
  const outputPyprojectPath = resolve(
    options.outputPyprojectPath ?? join(dirname(pyprojectPath), EXTERNAL_PYPROJECT_FILE)
  );

  writeFileSync(outputLockPath, serializeToml(removePackagesFromLock(lock.document, dropped)), "utf-8");
  writeFileSync(outputPyprojectPath, serializeToml(removePackagesFromManifest(manifest, dropped)), "utf-8");
  log.debug(`Removed ${dropped.size} local package(s): ${outputLockPath}, ${outputPyprojectPath}`);

  return { lockPath: outputLockPath, pyprojectPath: outputPyprojectPath };
}
