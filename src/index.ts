/**
 * imgspec - declarative, content-addressed container image builds.
 *
 * This is the main entry point for the imgspec npm package.
 */

// Re-export main types and functions
export { VERSION } from "./constants.js";
export { log, LogLevel, setLogLevel, enableQuietMode, disableQuietMode, setPrefix } from "./logger.js";
export {
  ImgspecError,
  ValidationError,
  ConfigError,
  PathError,
  DependencyError,
  ResolutionError,
  ToolNotFoundError,
  DockerNotRunningError,
  ImageBuildError,
  ExistenceCheckError,
  BuilderNotFoundError,
} from "./errors.js";
export {
  type ImageSpec,
  type ImageSpecOptions,
  type RequirementSource,
  type SourceCopyMode,
  createImageSpec,
  imageName,
  imageTag,
  withAptPackages,
  withCommands,
  withCopy,
  withEnv,
  withPackages,
} from "./image-spec.js";
export { IgnoreRuleSet, listIncludedFiles, copyIncludedFiles, type IgnoreDialect } from "./ignore.js";
export { parseLockFile, type LockFile, type LockedPackage, type PackageSource } from "./lockfile.js";
export {
  rewriteLocalPackages,
  removeLocalPackagesFromLockFiles,
  type LocalPackage,
  type LockRewriteResult,
} from "./lock-rewriter.js";
export { renderDockerfile, renderUvDockerfile, type DockerfilePlan } from "./dockerfile-gen.js";
export { prepareBuildContext, withBuildContext, type PreparedContext } from "./build-context.js";
export { BuildDriver, buildCommand, pushEnabledFromEnv, type BuildRequest } from "./build.js";
export { RegistryChecker, isEcrRegistry } from "./registry-check.js";
export { type ImageBuilder, type BuildImageOptions } from "./interfaces/image-builder.js";
export { BaseImageBuilder } from "./builders/base-builder.js";
export { DefaultImageBuilder } from "./builders/default-builder.js";
export { UvImageBuilder } from "./builders/uv-builder.js";
export { BuilderRegistry, createDefaultBuilderRegistry, type BuilderRegistration } from "./builder-registry.js";
export { ImageBuildEngine, type EngineBuildOptions } from "./engine.js";
export { loadImgspecConfig, type ImgspecConfig } from "./config-file.js";
export { loadImageSpecFile } from "./spec-file.js";
export { type CommandRunner, type CommandResult, ExecaCommandRunner } from "./exec.js";
