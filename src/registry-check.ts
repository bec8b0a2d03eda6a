/**
 * Registry existence checks.
 *
 * Answers "does this exact tag already exist?" so a build can be skipped.
 * ECR registries get an aws-cli fast path; everything else (and an
 * inconclusive fast path) goes through `docker manifest inspect`. When no
 * mechanism gives a definite answer the check fails loudly instead of
 * reporting "does not exist".
 */

import { REGISTRY_CHECK_TIMEOUT, TOOL_CHECK_TIMEOUT } from "./constants.js";
import { ExistenceCheckError, ToolNotFoundError } from "./errors.js";
import { type CommandResult, type CommandRunner, ExecaCommandRunner } from "./exec.js";
import { imageName, imageTag, type ImageSpec } from "./image-spec.js";
import { log } from "./logger.js";

/** `<12-digit account>.dkr.ecr.<region>.amazonaws.com[.cn]` */
export const ECR_REGISTRY_PATTERN = /^\d{12}\.dkr\.ecr\.[a-z0-9-]+\.amazonaws\.com(\.cn)?$/;

const ECR_NOT_FOUND_ERRORS = ["ImageNotFoundException", "RepositoryNotFoundException"];
const MANIFEST_NOT_FOUND = /manifest unknown|not found|no such manifest/i;

/** Pure classification of a registry host. */
export function isEcrRegistry(host: string): boolean {
  return ECR_REGISTRY_PATTERN.test(host);
}

export interface ImageTarget {
  /** First segment of the registry. */
  host: string;
  /** Remaining registry segments plus the image name. */
  repository: string;
  tag: string;
  /** Full reference. */
  image: string;
}

/** Split a spec's registry into host and repository; undefined without a registry. */
export function imageTarget(spec: ImageSpec, cwd?: string): ImageTarget | undefined {
  if (!spec.registry) {
    return undefined;
  }
  const [host = "", ...rest] = spec.registry.split("/");
  return {
    host,
    repository: [...rest, spec.name].join("/"),
    tag: imageTag(spec, cwd),
    image: imageName(spec, cwd),
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class RegistryChecker {
  constructor(private readonly runner: CommandRunner = new ExecaCommandRunner()) {}

  private async tryRun(command: string, args: readonly string[], timeout: number): Promise<CommandResult | null> {
    try {
      return await this.runner.run(command, args, { timeout });
    } catch (error: unknown) {
      if (error instanceof ToolNotFoundError) {
        log.debug(`${command} not available: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  /** aws CLI installed, then credentials valid; each step short-circuits. */
  async checkAwsCliAndCreds(): Promise<boolean> {
    const version = await this.tryRun("aws", ["--version"], TOOL_CHECK_TIMEOUT);
    if (version === null || version.exitCode !== 0) {
      log.debug("aws CLI not found; skipping ECR fast path");
      return false;
    }
    const identity = await this.tryRun("aws", ["sts", "get-caller-identity"], TOOL_CHECK_TIMEOUT);
    if (identity === null || identity.exitCode !== 0) {
      log.debug("aws credentials not configured; skipping ECR fast path");
      return false;
    }
    return true;
  }

  /**
   * Look a tag up with `aws ecr describe-images`.
   *
   * @returns true if found, false on ImageNotFound/RepositoryNotFound,
   *   null when the answer is unknown (including non-ECR hosts).
   */
  async checkEcrImageExists(host: string, repository: string, tag: string): Promise<boolean | null> {
    if (!isEcrRegistry(host)) {
      return null;
    }
    const [registryId = "", , , region = ""] = host.split(".");

    const result = await this.tryRun(
      "aws",
      [
        "ecr",
        "describe-images",
        "--registry-id",
        registryId,
        "--region",
        region,
        "--repository-name",
        repository,
        "--image-ids",
        `imageTag=${tag}`,
        "--output",
        "json",
      ],
      REGISTRY_CHECK_TIMEOUT
    );
    if (result === null) {
      return null;
    }

    if (result.exitCode !== 0) {
      if (ECR_NOT_FOUND_ERRORS.some((name) => result.stderr.includes(name))) {
        return false;
      }
      log.debug(`ECR check failed: ${result.stderr.trim()}`);
      return null;
    }

    const data = parseJson(result.stdout);
    if (typeof data === "object" && data !== null && "imageDetails" in data && Array.isArray(data.imageDetails)) {
      return data.imageDetails.length > 0;
    }
    return null;
  }

  /**
   * Protocol-level lookup with `docker manifest inspect`.
   *
   * @returns true / false (manifest unknown), or null when unknown.
   */
  async checkManifestExists(image: string): Promise<boolean | null> {
    const result = await this.tryRun("docker", ["manifest", "inspect", image], REGISTRY_CHECK_TIMEOUT);
    if (result === null || result.timedOut) {
      return null;
    }
    if (result.exitCode === 0) {
      return true;
    }
    if (MANIFEST_NOT_FOUND.test(result.stderr)) {
      return false;
    }
    log.debug(`Manifest check failed: ${result.stderr.trim()}`);
    return null;
  }

  /** Local daemon lookup used when the spec has no registry. */
  async localImageExists(image: string): Promise<boolean> {
    const result = await this.tryRun("docker", ["image", "inspect", image], TOOL_CHECK_TIMEOUT);
    if (result === null) {
      throw new ExistenceCheckError(`Couldn't check if image ${image} exists locally: docker is not installed.`);
    }
    return result.exitCode === 0;
  }

  /**
   * Whether the spec's image tag already exists. `cwd` resolves relative
   * requirement paths the same way the build does.
   *
   * @throws ExistenceCheckError when every mechanism was unavailable or inconclusive.
   */
  async imageExists(spec: ImageSpec, cwd?: string): Promise<boolean> {
    const target = imageTarget(spec, cwd);
    if (!target) {
      return this.localImageExists(imageName(spec, cwd));
    }

    if (isEcrRegistry(target.host) && (await this.checkAwsCliAndCreds())) {
      const found = await this.checkEcrImageExists(target.host, target.repository, target.tag);
      if (found !== null) {
        log.debug(`ECR reports ${target.image} ${found ? "exists" : "does not exist"}`);
        return found;
      }
    }

    const found = await this.checkManifestExists(target.image);
    if (found !== null) {
      return found;
    }

    throw new ExistenceCheckError(
      `Couldn't check if image ${target.image} exists. ` +
        "If the registry is ECR, make sure aws is properly logged in (aws sts get-caller-identity); " +
        "otherwise make sure docker is installed and logged in to the registry (docker login)."
    );
  }
}
