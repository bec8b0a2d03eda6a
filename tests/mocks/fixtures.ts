/**
 * Temporary directory fixtures for filesystem tests.
 *
 * A `.git` directory marks the repository root the lock rewriter looks for.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** Create files (parents included) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, "utf-8");
  }
}

/** Tracks temp directories created by a test file and removes them. */
export class TempDirs {
  private readonly dirs: string[] = [];

  create(files: Record<string, string> = {}): string {
    const dir = mkdtempSync(join(tmpdir(), "imgspec-test-"));
    this.dirs.push(dir);
    writeTree(dir, files);
    return dir;
  }

  /** Temp directory containing a `.git` marker plus `files`. */
  repository(files: Record<string, string> = {}): string {
    const dir = this.create(files);
    mkdirSync(join(dir, ".git"));
    return dir;
  }

  cleanup(): void {
    for (const dir of this.dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
