/**
 * Image build engine: the entry point that turns a spec into an image.
 *
 * select builder → skip if the tag already exists → build a nested base
 * spec first → build and optionally push.
 */

import { pushEnabledFromEnv } from "./build.js";
import type { BuilderRegistry } from "./builder-registry.js";
import { imageName, type ImageSpec } from "./image-spec.js";
import { log } from "./logger.js";
import { RegistryChecker } from "./registry-check.js";

export interface EngineBuildOptions {
  /** Build even when the tag already exists. */
  force?: boolean;
  /** Push toggle; defaults to IMGSPEC_PUSH_IMAGE. */
  push?: boolean;
  /** Directory relative spec paths resolve against. */
  cwd?: string;
}

export class ImageBuildEngine {
  constructor(
    private readonly registry: BuilderRegistry,
    private readonly checker: RegistryChecker = new RegistryChecker()
  ) {}

  /**
   * Build `spec` unless its image already exists.
   *
   * @returns The fully qualified image name.
   */
  async build(spec: ImageSpec, options: EngineBuildOptions = {}): Promise<string> {
    const builder = this.registry.select(spec);
    const name = imageName(spec, options.cwd);

    if (options.force) {
      log.debug(`Forced build of ${name}`);
    } else if (spec.useDepot && !spec.registry) {
      // Depot builds without a registry never reach the local daemon.
      log.debug(`No registry for depot build of ${name}; skipping existence check`);
    } else if (await this.checker.imageExists(spec, options.cwd)) {
      log.info(`Image ${name} found. Skip building.`);
      return name;
    }

    if (typeof spec.baseImage === "object") {
      log.debug(`Building base image ${imageName(spec.baseImage, options.cwd)} first`);
      await this.build(spec.baseImage, options);
    }

    log.info(`Building ${name} with the ${builder.name} builder`);
    return builder.buildImage(spec, { push: options.push ?? pushEnabledFromEnv(), cwd: options.cwd });
  }
}
