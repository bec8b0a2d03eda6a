/**
 * Build driver for imgspec.
 *
 * Invokes the external build tool against a materialized context:
 * `docker image build`, `docker buildx build` with registry cache, or
 * `depot build`. Failures are fatal and never retried; callers avoid
 * redundant builds by checking the registry first.
 */

import { IMGSPEC_ENV, TOOL_CHECK_TIMEOUT } from "./constants.js";
import { DockerNotRunningError, ImageBuildError, ToolNotFoundError } from "./errors.js";
import { type CommandRunner, ExecaCommandRunner } from "./exec.js";
import { log } from "./logger.js";
import { parseBooleanFlag } from "./validation.js";

export type BuildBackend = "docker" | "depot";

/** Install hints shown when a build tool is missing. */
export const INSTALL_HINTS: Record<BuildBackend, string> = {
  docker:
    "Docker is not installed or not in PATH. Please install Docker (https://docs.docker.com/get-docker/) " +
    "or use depot by setting useDepot=true",
  depot:
    "Depot is not installed or not in PATH. Please install depot (https://depot.dev/docs/installation) " +
    "or use Docker instead by setting useDepot=false",
};

export interface BuildRequest {
  contextDir: string;
  /** Full image reference passed to --tag. */
  imageName: string;
  platform: string;
  /** Registry the image belongs to; --push is never added without one. */
  registry?: string;
  /** Push toggle; combined with `registry`. */
  push: boolean;
  useDepot: boolean;
  /** Use `docker buildx build` with this registry cache ref. */
  cacheRef?: string;
}

export interface BuildCommand {
  command: string;
  args: string[];
}

/**
 * Global push toggle: IMGSPEC_PUSH_IMAGE, enabled unless set to something
 * other than "true" / "1".
 */
export function pushEnabledFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[IMGSPEC_ENV.PUSH_IMAGE];
  if (value === undefined || value.trim() === "") {
    return true;
  }
  return parseBooleanFlag(value, false);
}

export function backendFor(useDepot: boolean): BuildBackend {
  return useDepot ? "depot" : "docker";
}

/** Argument list for a build request; pure. */
export function buildCommand(request: BuildRequest): BuildCommand {
  const push = request.push && Boolean(request.registry);
  const common = ["--tag", request.imageName, "--platform", request.platform];

  if (request.useDepot) {
    return {
      command: "depot",
      args: ["build", ...common, ...(push ? ["--push"] : []), request.contextDir],
    };
  }

  if (request.cacheRef) {
    return {
      command: "docker",
      args: [
        "buildx",
        "build",
        ...common,
        "--cache-from",
        `type=registry,ref=${request.cacheRef}`,
        "--cache-to",
        `type=registry,ref=${request.cacheRef},mode=max`,
        push ? "--push" : "--load",
        request.contextDir,
      ],
    };
  }

  return {
    command: "docker",
    args: ["image", "build", ...common, ...(push ? ["--push"] : []), request.contextDir],
  };
}

export class BuildDriver {
  constructor(private readonly runner: CommandRunner = new ExecaCommandRunner()) {}

  /**
   * Verify the build tool is on PATH and, for docker, that the daemon answers.
   *
   * @throws ToolNotFoundError with an install URL and the flag to flip.
   * @throws DockerNotRunningError with the daemon's stderr.
   */
  async preflight(useDepot: boolean): Promise<void> {
    const backend = backendFor(useDepot);
    if ((await this.runner.which(backend)) === null) {
      throw new ToolNotFoundError(backend, INSTALL_HINTS[backend]);
    }
    if (backend === "depot") {
      return;
    }

    const info = await this.runner.run("docker", ["info"], { timeout: TOOL_CHECK_TIMEOUT });
    if (info.exitCode !== 0) {
      throw new DockerNotRunningError(
        `Docker daemon is not running or not accessible. Error: ${info.stderr.trim()}\n` +
          "Please start the Docker daemon or use depot by setting useDepot=true"
      );
    }
  }

  /**
   * Run the build. Output streams to the terminal and is also captured.
   *
   * @returns The built image name.
   * @throws ImageBuildError on a non-zero exit, carrying the captured stderr.
   */
  async build(request: BuildRequest): Promise<string> {
    const { command, args } = buildCommand(request);
    log.blue(`Run command: ${command} ${args.join(" ")}`);

    const result = await this.runner.run(command, args, { stream: true, env: { ...process.env, DOCKER_BUILDKIT: "1" } });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new ImageBuildError(
        `Failed to build ${request.imageName}: ${command} exited with code ${result.exitCode}` +
          (stderr ? `\n${stderr}` : ""),
        result.exitCode
      );
    }

    log.success(`Built ${request.imageName}`);
    return request.imageName;
  }
}
