/**
 * Shared build flow for Dockerfile-based builders.
 *
 * validate → warn about ignored fields → tool preflight → stage a scratch
 * context → run the build driver. The scratch directory is removed on every
 * exit path.
 */

import { prepareBuildContext, type DockerfileRenderer, type PreparedContext, withBuildContext } from "../build-context.js";
import { BuildDriver } from "../build.js";
import { imageName, type ImageSpec, type ImageSpecOptions, toImageSpecOptions } from "../image-spec.js";
import type { BuildImageOptions, ImageBuilder } from "../interfaces/image-builder.js";
import { log } from "../logger.js";

export type SpecField = keyof ImageSpecOptions;

export const ALL_SPEC_FIELDS: readonly SpecField[] = [
  "name",
  "registry",
  "baseImage",
  "pythonVersion",
  "pythonExec",
  "packages",
  "requirements",
  "condaPackages",
  "condaChannels",
  "aptPackages",
  "env",
  "sourceRoot",
  "sourceCopyMode",
  "copy",
  "commands",
  "entrypoint",
  "platform",
  "builder",
  "useDepot",
  "installProject",
  "pipIndex",
  "pipExtraIndexUrl",
  "pipExtraArgs",
  "cuda",
  "cudnn",
];

export abstract class BaseImageBuilder implements ImageBuilder {
  abstract readonly name: string;
  protected abstract readonly supportedFields: ReadonlySet<SpecField>;
  protected abstract readonly render: DockerfileRenderer;
  protected abstract readonly defaultBaseImage: string;

  constructor(protected readonly driver: BuildDriver = new BuildDriver()) {}

  abstract supports(spec: ImageSpec): boolean;

  abstract validate(spec: ImageSpec): void;

  /** Set fields this builder ignores. A flag left `false` counts as unset. */
  unsupportedFields(spec: ImageSpec): SpecField[] {
    const options = toImageSpecOptions(spec);
    return ALL_SPEC_FIELDS.filter(
      (field) => options[field] !== undefined && options[field] !== false && !this.supportedFields.has(field)
    );
  }

  /** Registry cache ref for buildx; undefined for a plain build. */
  protected cacheRef(_spec: ImageSpec): string | undefined {
    return undefined;
  }

  prepareContext(spec: ImageSpec, dir: string, cwd?: string): PreparedContext {
    return prepareBuildContext(spec, dir, { render: this.render, defaultBaseImage: this.defaultBaseImage, cwd });
  }

  async buildImage(spec: ImageSpec, options: BuildImageOptions): Promise<string> {
    this.validate(spec);

    const ignored = this.unsupportedFields(spec);
    if (ignored.length > 0) {
      log.warn(`The following parameters are unsupported by the ${this.name} builder and ignored: ${ignored.join(", ")}`);
    }

    await this.driver.preflight(spec.useDepot);

    return withBuildContext(async (dir) => {
      this.prepareContext(spec, dir, options.cwd);
      return this.driver.build({
        contextDir: dir,
        imageName: imageName(spec, options.cwd),
        platform: spec.platform,
        registry: spec.registry,
        push: options.push,
        useDepot: spec.useDepot,
        cacheRef: this.cacheRef(spec),
      });
    });
  }
}
