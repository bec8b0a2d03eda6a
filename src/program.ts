/**
 * Commander program for the imgspec CLI.
 *
 * Kept apart from the executable entry so tests can drive commands with an
 * injected registry and checker.
 */

import { dirname, resolve } from "node:path";

import { Command } from "commander";

import { withBuildContext } from "./build-context.js";
import { pushEnabledFromEnv } from "./build.js";
import { type BuilderRegistry, createDefaultBuilderRegistry } from "./builder-registry.js";
import { GLOBAL_CONFIG_PATH, type ImgspecConfig, loadImgspecConfig } from "./config-file.js";
import { CONTEXT_FILES, IMGSPEC_ENV, VERSION } from "./constants.js";
import { ImageBuildEngine } from "./engine.js";
import { imageName, type ImageSpec } from "./image-spec.js";
import { removeLocalPackagesFromLockFiles } from "./lock-rewriter.js";
import { enableQuietMode, log, LogLevel, parseLogLevel, setLogLevel } from "./logger.js";
import { RegistryChecker } from "./registry-check.js";
import { validateFilePath } from "./paths.js";
import { loadImageSpecFile } from "./spec-file.js";

export interface ProgramDeps {
  registry?: BuilderRegistry;
  checker?: RegistryChecker;
  /** Global config location (default ~/.imgspec/config.yaml). */
  globalConfigPath?: string;
}

interface LoadedSpec {
  spec: ImageSpec;
  config: ImgspecConfig;
  /** Directory of the spec file; copy paths resolve against it. */
  cwd: string;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const registry = deps.registry ?? createDefaultBuilderRegistry();
  const checker = deps.checker ?? new RegistryChecker();

  function loadSpec(specPath: string): LoadedSpec {
    const config = loadImgspecConfig(process.cwd(), deps.globalConfigPath ?? GLOBAL_CONFIG_PATH);
    const spec = loadImageSpecFile(specPath, config);
    return { spec, config, cwd: dirname(resolve(specPath)) };
  }

  const program = new Command();

  program
    .name("imgspec")
    .description("Build content-addressed container images from declarative specs")
    .version(VERSION)
    .option("-q, --quiet", "Suppress all output (exit code only)")
    .option("--debug", "Show debug output")
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts();
      const envLevel = parseLogLevel(process.env[IMGSPEC_ENV.LOG_LEVEL]);
      if (envLevel !== undefined) {
        setLogLevel(envLevel);
      }
      if (opts.debug === true) {
        setLogLevel(LogLevel.DEBUG);
      }
      // Apply quiet mode last; it wins over every level
      if (opts.quiet === true) {
        enableQuietMode();
      }
    });

  program
    .command("build")
    .description("Build (and push) the image described by a spec file, unless it already exists")
    .argument("<spec>", "ImageSpec JSON file")
    .option("-f, --force", "Build even if the image already exists")
    .option("--push", "Push the image after building")
    .option("--no-push", "Do not push the image")
    .action(async (specPath: string, options: { force?: boolean; push?: boolean }) => {
      const { spec, config, cwd } = loadSpec(specPath);
      const engine = new ImageBuildEngine(registry, checker);
      const name = await engine.build(spec, {
        force: options.force === true,
        push: options.push ?? config.push ?? pushEnabledFromEnv(),
        cwd,
      });
      log.raw(name);
    });

  program
    .command("exists")
    .description("Report whether the image of a spec file is already built")
    .argument("<spec>", "ImageSpec JSON file")
    .action(async (specPath: string) => {
      const { spec, cwd } = loadSpec(specPath);
      const found = await checker.imageExists(spec, cwd);
      log.raw(`${imageName(spec, cwd)} ${found ? "exists" : "does not exist"}`);
    });

  program
    .command("dockerfile")
    .description("Print the Dockerfile the selected builder would use")
    .argument("<spec>", "ImageSpec JSON file")
    .action(async (specPath: string) => {
      const { spec, cwd } = loadSpec(specPath);
      const builder = registry.select(spec);
      builder.validate(spec);
      const dockerfile = await withBuildContext(async (dir) => builder.prepareContext(spec, dir, cwd).dockerfile);
      log.raw(dockerfile.trimEnd());
    });

  program
    .command("strip-local")
    .description("Write copies of uv.lock and pyproject.toml without local path packages")
    .argument("<lock>", "uv.lock file")
    .option("--pyproject <path>", "pyproject.toml (default: next to the lock file)")
    .option("--out-lock <path>", "Output lock file")
    .option("--out-pyproject <path>", "Output pyproject file")
    .action((lockPath: string, options: { pyproject?: string; outLock?: string; outPyproject?: string }) => {
      const lock = validateFilePath(lockPath);
      const result = removeLocalPackagesFromLockFiles({
        lockPath: lock,
        pyprojectPath: options.pyproject ?? resolve(dirname(lock), CONTEXT_FILES.PYPROJECT),
        outputLockPath: options.outLock,
        outputPyprojectPath: options.outPyproject,
      });
      log.success(`Wrote ${result.lockPath}`);
      log.success(`Wrote ${result.pyprojectPath}`);
    });

  return program;
}
