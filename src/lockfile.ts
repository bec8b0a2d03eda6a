/**
 * uv lock file and pyproject.toml document model.
 *
 * Documents are parsed into plain TOML trees with smol-toml and kept as
 * trees: path rewriting and local-package removal operate on keys, never on
 * raw text, and the result is re-serialized.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: builders, engine, cli
 */

import { parse, stringify } from "smol-toml";

import { DependencyError } from "./errors.js";

export type TomlTable = { [key: string]: unknown };

/** Source table of a locked package, classified by its single key. */
export type PackageSource =
  | { kind: "registry"; url: string }
  | { kind: "directory"; path: string }
  | { kind: "editable"; path: string }
  | { kind: "path"; path: string }
  | { kind: "virtual"; path: string }
  | { kind: "git"; url: string }
  | { kind: "url"; url: string }
  | { kind: "unspecified" };

export type LocalSource = Extract<PackageSource, { kind: "directory" | "editable" | "path" }>;

export interface LockedPackage {
  name: string;
  version?: string;
  source: PackageSource;
}

export interface LockFile {
  document: TomlTable;
  packages: LockedPackage[];
}

/** Keys whose string values are filesystem references. */
export const PATH_KEYS: readonly string[] = ["directory", "editable", "path"];

export function isTable(value: unknown): value is TomlTable {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Local sources are copied into the image; virtual and remote ones are not. */
export function isLocalSource(source: PackageSource): source is LocalSource {
  return source.kind === "directory" || source.kind === "editable" || source.kind === "path";
}

/** PEP 503 name normalization: lowercase, runs of [-_.] become "-". */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

/** Distribution name at the start of a PEP 508 requirement string. */
export function requirementName(requirement: string): string | undefined {
  const match = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/.exec(requirement);
  return match?.[1];
}

export function classifySource(source: unknown): PackageSource {
  if (!isTable(source)) {
    return { kind: "unspecified" };
  }
  const table: TomlTable = source;
  const str = (key: string): string | undefined => {
    const value = table[key];
    return typeof value === "string" ? value : undefined;
  };

  const directory = str("directory");
  if (directory !== undefined) {
    return { kind: "directory", path: directory };
  }
  const editable = str("editable");
  if (editable !== undefined) {
    return { kind: "editable", path: editable };
  }
  const path = str("path");
  if (path !== undefined) {
    return { kind: "path", path };
  }
  const virtual = str("virtual");
  if (virtual !== undefined) {
    return { kind: "virtual", path: virtual };
  }
  const git = str("git");
  if (git !== undefined) {
    return { kind: "git", url: git };
  }
  const url = str("url");
  if (url !== undefined) {
    return { kind: "url", url };
  }
  const registry = str("registry");
  if (registry !== undefined) {
    return { kind: "registry", url: registry };
  }
  return { kind: "unspecified" };
}

/**
 * Parse TOML text into a table.
 *
 * @param origin - File name used in error messages.
 * @throws DependencyError if the text is not valid TOML.
 */
export function parseToml(text: string, origin: string): TomlTable {
  let data: unknown;
  try {
    data = parse(text);
  } catch (e: unknown) {
    throw new DependencyError(`Failed to parse ${origin}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isTable(data)) {
    throw new DependencyError(`Failed to parse ${origin}: top level is not a table`);
  }
  return data;
}

export function serializeToml(document: TomlTable): string {
  const text = stringify(document);
  return text.endsWith("\n") ? text : `${text}\n`;
}

/** Package tables of a lock document, in lock order. */
export function packageTables(document: TomlTable): TomlTable[] {
  const packages = document["package"];
  return Array.isArray(packages) ? packages.filter(isTable) : [];
}

export function readLockedPackage(table: TomlTable): LockedPackage | undefined {
  const name = table["name"];
  if (typeof name !== "string") {
    return undefined;
  }
  const version = table["version"];
  return {
    name,
    version: typeof version === "string" ? version : undefined,
    source: classifySource(table["source"]),
  };
}

/** @throws DependencyError on invalid TOML or a package without a name. */
export function parseLockFile(text: string, origin = "uv.lock"): LockFile {
  const document = parseToml(text, origin);
  const packages: LockedPackage[] = [];
  for (const table of packageTables(document)) {
    const pkg = readLockedPackage(table);
    if (!pkg) {
      throw new DependencyError(`Invalid ${origin}: [[package]] entry without a name`);
    }
    packages.push(pkg);
  }
  return { document, packages };
}

/**
 * Deep-map every string stored under a path key.
 *
 * Returns a new tree; `replace` receives the original string and returns
 * the value to store.
 */
export function mapPathReferences(value: unknown, replace: (path: string) => string, key?: string): unknown {
  if (typeof value === "string") {
    return key !== undefined && PATH_KEYS.includes(key) ? replace(value) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => mapPathReferences(item, replace, key));
  }
  if (isTable(value)) {
    const mapped: TomlTable = {};
    for (const [childKey, child] of Object.entries(value)) {
      mapped[childKey] = mapPathReferences(child, replace, childKey);
    }
    return mapped;
  }
  return value;
}

/** Apply mapPathReferences to a whole document. */
export function rewriteDocumentPaths(document: TomlTable, replace: (path: string) => string): TomlTable {
  const mapped: TomlTable = {};
  for (const [key, value] of Object.entries(document)) {
    mapped[key] = mapPathReferences(value, replace, key);
  }
  return mapped;
}
