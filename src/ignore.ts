/**
 * Ignore-rule engine.
 *
 * Decides which files under a directory are eligible for a build context by
 * composing matchers from several ignore-file dialects. A path is excluded
 * when any matcher excludes it; each matcher applies its own dialect
 * (last matching pattern wins, `!` re-includes).
 *
 * Dependency direction:
 *   This module imports from: logger.ts, paths.ts
 *   It should NOT import from: builders, engine, cli
 */

import { copyFileSync, existsSync, lstatSync, mkdirSync, readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { minimatch } from "minimatch";

import { log } from "./logger.js";
import { findRepositoryRoot, posixRelative } from "./paths.js";

export type IgnoreDialect = "git" | "docker" | "standard";

export const ALL_DIALECTS: readonly IgnoreDialect[] = ["git", "docker", "standard"];

/** Fixed exclusions applied to every build context. */
export const STANDARD_IGNORE_PATTERNS: readonly string[] = [".git/", "__pycache__/", "*.pyc", ".cache/", ".venv/"];

export interface IgnoreRule {
  pattern: string;
  negate: boolean;
  /** Only matches directories (trailing slash in gitignore). */
  directoryOnly: boolean;
  /** Matched against the full relative path rather than any basename. */
  anchored: boolean;
}

export interface IgnoreMatcher {
  readonly dialect: IgnoreDialect;
  /**
   * @param relativePath - POSIX path relative to the walked root.
   */
  isIgnored(relativePath: string, isDirectory: boolean): boolean;
}

const MATCH_OPTIONS = { dot: true, nocomment: true, nonegate: true } as const;

/**
 * Parse ignore-file content into rules.
 *
 * gitignore: a pattern containing a slash before its last character is
 * anchored to the root; otherwise it matches at any depth.
 * dockerignore: every pattern is anchored to the context root.
 */
export function parseIgnorePatterns(content: string, dialect: "git" | "docker"): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    let line = dialect === "git" ? rawLine.replace(/(?<!\\)\s+$/, "") : rawLine.trim();
    if (line === "" || line.startsWith("#")) {
      continue;
    }

    let negate = false;
    if (line.startsWith("!")) {
      negate = true;
      line = line.slice(1);
    } else if (line.startsWith("\\!") || line.startsWith("\\#")) {
      line = line.slice(1);
    }

    let directoryOnly = false;
    if (line.endsWith("/")) {
      directoryOnly = dialect === "git";
      line = line.replace(/\/+$/, "");
    }

    const anchored = dialect === "docker" || line.includes("/");
    line = line.replace(/^\/+/, "");
    if (line === "") {
      continue;
    }

    rules.push({ pattern: line, negate, directoryOnly, anchored });
  }

  return rules;
}

function ruleMatches(rule: IgnoreRule, relativePath: string, isDirectory: boolean): boolean {
  if (rule.directoryOnly && !isDirectory) {
    return false;
  }
  const pattern = rule.anchored ? rule.pattern : `**/${rule.pattern}`;
  return minimatch(relativePath, pattern, MATCH_OPTIONS);
}

/** Whether the last matching rule excludes the path; undefined when no rule matches. */
function lastMatch(rules: readonly IgnoreRule[], path: string, isDirectory: boolean): boolean | undefined {
  let decision: boolean | undefined;
  for (const rule of rules) {
    if (ruleMatches(rule, path, isDirectory)) {
      decision = !rule.negate;
    }
  }
  return decision;
}

/** Matcher backed by an ordered rule list (last match wins). */
export class PatternIgnore implements IgnoreMatcher {
  constructor(
    readonly dialect: IgnoreDialect,
    readonly rules: readonly IgnoreRule[]
  ) {}

  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    // An excluded directory excludes everything beneath it.
    const segments = relativePath.split("/").filter((s) => s !== "");
    for (let i = 1; i < segments.length; i++) {
      if (this.matchEntry(segments.slice(0, i).join("/"), true)) {
        return true;
      }
    }
    return this.matchEntry(segments.join("/"), isDirectory);
  }

  private matchEntry(path: string, isDirectory: boolean): boolean {
    return lastMatch(this.rules, path, isDirectory) ?? false;
  }
}

function readIfExists(path: string): string {
  return existsSync(path) ? readFileSync(path, "utf-8") : "";
}

/**
 * Git rules for a directory inside a repository.
 *
 * Reads `.git/info/exclude` and every `.gitignore` from the repository root
 * down to each walked path. Paths are matched relative to the directory of
 * the `.gitignore` holding the rule; a deeper file overrides a shallower one.
 * Without an enclosing repository the walked root is treated as the top.
 */
export class GitIgnore implements IgnoreMatcher {
  readonly dialect = "git";
  private readonly repoRoot: string;
  /** POSIX path of the walked root relative to the repository root. */
  private readonly prefix: string;
  private readonly rulesByDirectory = new Map<string, readonly IgnoreRule[]>();

  constructor(root: string) {
    const absolute = resolve(root);
    this.repoRoot = findRepositoryRoot(absolute) ?? absolute;
    this.prefix = posixRelative(this.repoRoot, absolute);
  }

  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    const segments = relativePath.split("/").filter((s) => s !== "");
    for (let i = 1; i < segments.length; i++) {
      if (this.decide(this.fromRepoRoot(segments.slice(0, i)), true)) {
        return true;
      }
    }
    return this.decide(this.fromRepoRoot(segments), isDirectory);
  }

  private fromRepoRoot(segments: readonly string[]): string[] {
    return [...this.prefix.split("/").filter((s) => s !== ""), ...segments];
  }

  private decide(segments: readonly string[], isDirectory: boolean): boolean {
    let ignored = false;
    for (let depth = 0; depth < segments.length; depth++) {
      const directory = segments.slice(0, depth).join("/");
      const decision = lastMatch(this.rulesIn(directory), segments.slice(depth).join("/"), isDirectory);
      if (decision !== undefined) {
        ignored = decision;
      }
    }
    return ignored;
  }

  private rulesIn(directory: string): readonly IgnoreRule[] {
    const cached = this.rulesByDirectory.get(directory);
    if (cached) {
      return cached;
    }
    const absolute = join(this.repoRoot, directory);
    const sources = [readIfExists(join(absolute, ".gitignore"))];
    if (directory === "") {
      sources.unshift(readIfExists(join(absolute, ".git", "info", "exclude")));
    }
    const rules = parseIgnorePatterns(sources.join("\n"), "git");
    this.rulesByDirectory.set(directory, rules);
    return rules;
  }
}

export function gitIgnore(root: string): IgnoreMatcher {
  return new GitIgnore(root);
}

export function dockerIgnore(root: string): IgnoreMatcher {
  return new PatternIgnore("docker", parseIgnorePatterns(readIfExists(join(root, ".dockerignore")), "docker"));
}

export function standardIgnore(): IgnoreMatcher {
  return new PatternIgnore("standard", parseIgnorePatterns(STANDARD_IGNORE_PATTERNS.join("\n"), "git"));
}

/** Ordered composition of matchers; excluded if any matcher excludes. */
export class IgnoreRuleSet {
  constructor(readonly matchers: readonly IgnoreMatcher[]) {}

  /** Build the matchers for `root` from the given dialects. */
  static forDirectory(root: string, dialects: readonly IgnoreDialect[] = ALL_DIALECTS): IgnoreRuleSet {
    const matchers = dialects.map((dialect): IgnoreMatcher => {
      switch (dialect) {
        case "git":
          return gitIgnore(root);
        case "docker":
          return dockerIgnore(root);
        case "standard":
          return standardIgnore();
      }
    });
    return new IgnoreRuleSet(matchers);
  }

  with(matcher: IgnoreMatcher): IgnoreRuleSet {
    return new IgnoreRuleSet([...this.matchers, matcher]);
  }

  isIgnored(relativePath: string, isDirectory: boolean): boolean {
    return this.matchers.some((matcher) => matcher.isIgnored(relativePath, isDirectory));
  }
}

/**
 * List files under `root` that survive the rule set, as POSIX paths in
 * depth-first name order.
 *
 * Entries whose metadata cannot be read are warned about and left out.
 * Symlinks to files are included; symlinked directories are not followed.
 */
export function listIncludedFiles(root: string, rules: IgnoreRuleSet): string[] {
  const files: string[] = [];

  const walk = (dir: string, prefix: string): void => {
    const names = readdirSync(dir).sort();
    for (const name of names) {
      const absolute = join(dir, name);
      const relative = prefix === "" ? name : `${prefix}/${name}`;

      let isDirectory: boolean;
      try {
        const stats = lstatSync(absolute);
        if (stats.isSymbolicLink()) {
          if (statSync(absolute).isDirectory()) {
            log.debug(`Not following symlinked directory: ${relative}`);
            continue;
          }
          isDirectory = false;
        } else {
          isDirectory = stats.isDirectory();
        }
      } catch (e: unknown) {
        log.warn(`Skipping ${absolute}: cannot read file metadata (${e instanceof Error ? e.message : String(e)})`);
        continue;
      }

      if (rules.isIgnored(relative, isDirectory)) {
        continue;
      }
      if (isDirectory) {
        walk(absolute, relative);
      } else {
        files.push(relative);
      }
    }
  };

  walk(root, "");
  return files;
}

/**
 * Copy every included file from `root` into `destination`, preserving layout.
 *
 * @returns The copied relative paths.
 */
export function copyIncludedFiles(root: string, destination: string, rules: IgnoreRuleSet): string[] {
  const files = listIncludedFiles(root, rules);
  for (const file of files) {
    const target = join(destination, file);
    mkdirSync(dirname(target), { recursive: true });
    copyFileSync(join(root, file), target);
  }
  return files;
}
