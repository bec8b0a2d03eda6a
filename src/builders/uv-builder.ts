/**
 * Lock-specialized builder for uv.lock projects.
 *
 * Uses the base image's own interpreter, splits remote and local dependency
 * layers and builds with buildx so the remote layer is shared through a
 * registry cache.
 */

import type { DockerfileRenderer } from "../build-context.js";
import { DEFAULT_UV_BASE_IMAGE } from "../constants.js";
import { assertRenderable, renderUvDockerfile } from "../dockerfile-gen.js";
import { ValidationError } from "../errors.js";
import type { ImageSpec } from "../image-spec.js";
import { BaseImageBuilder, type SpecField } from "./base-builder.js";

const SUPPORTED_FIELDS: readonly SpecField[] = [
  "name",
  "registry",
  "baseImage",
  "requirements",
  "env",
  "sourceRoot",
  "sourceCopyMode",
  "copy",
  "commands",
  "entrypoint",
  "platform",
  "builder",
  "installProject",
  "pipIndex",
  "pipExtraIndexUrl",
  "pipExtraArgs",
];

function isSet(value: readonly string[] | string | boolean | undefined): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  return value !== undefined && value.length > 0;
}

/** Fields that make a spec unbuildable with this builder. */
export function rejectedFields(spec: ImageSpec): SpecField[] {
  const checks: ReadonlyArray<[SpecField, readonly string[] | string | boolean | undefined]> = [
    ["packages", spec.packages],
    ["aptPackages", spec.aptPackages],
    ["condaPackages", spec.condaPackages],
    ["condaChannels", spec.condaChannels],
    ["pythonExec", spec.pythonExec],
    ["cuda", spec.cuda],
    ["cudnn", spec.cudnn],
    ["useDepot", spec.useDepot],
  ];
  return checks.filter(([, value]) => isSet(value)).map(([field]) => field);
}

export class UvImageBuilder extends BaseImageBuilder {
  readonly name = "uv";
  protected readonly supportedFields: ReadonlySet<SpecField> = new Set(SUPPORTED_FIELDS);
  protected readonly render: DockerfileRenderer = renderUvDockerfile;
  protected readonly defaultBaseImage = DEFAULT_UV_BASE_IMAGE;

  supports(spec: ImageSpec): boolean {
    return spec.requirementSource.kind === "uv-lock" && rejectedFields(spec).length === 0;
  }

  validate(spec: ImageSpec): void {
    if (spec.requirementSource.kind !== "uv-lock") {
      throw new ValidationError(
        `The uv builder only supports uv.lock requirements, got '${spec.requirements ?? spec.requirementSource.kind}'`
      );
    }
    const rejected = rejectedFields(spec);
    if (rejected.length > 0) {
      throw new ValidationError(`The uv builder does not support: ${rejected.join(", ")}`);
    }
    assertRenderable(spec);
  }

  protected override cacheRef(spec: ImageSpec): string | undefined {
    return spec.registry ? `${spec.registry}/${spec.name}:buildcache` : undefined;
  }
}
