/**
 * General-purpose builder: accepts every requirement source and renders the
 * full multi-stage recipe (micromamba Python, apt packages, conda, pip).
 */

import type { DockerfileRenderer } from "../build-context.js";
import { DEFAULT_BASE_IMAGE } from "../constants.js";
import { assertRenderable, renderDockerfile } from "../dockerfile-gen.js";
import type { ImageSpec } from "../image-spec.js";
import { log } from "../logger.js";
import { ALL_SPEC_FIELDS, BaseImageBuilder, type SpecField } from "./base-builder.js";

export class DefaultImageBuilder extends BaseImageBuilder {
  readonly name = "default";
  protected readonly supportedFields: ReadonlySet<SpecField> = new Set(ALL_SPEC_FIELDS);
  protected readonly render: DockerfileRenderer = renderDockerfile;
  protected readonly defaultBaseImage = DEFAULT_BASE_IMAGE;

  supports(_spec: ImageSpec): boolean {
    return true;
  }

  validate(spec: ImageSpec): void {
    assertRenderable(spec);
    if (spec.requirementSource.kind === "poetry-lock") {
      log.warn("poetry.lock support is experimental");
    }
  }
}
