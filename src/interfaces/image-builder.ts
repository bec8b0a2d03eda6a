/**
 * Image builder interface for imgspec.
 *
 * Defines the contract between the builder registry / build engine and the
 * concrete builders. Enables dependency injection and testability.
 */

import type { PreparedContext } from "../build-context.js";
import type { ImageSpec } from "../image-spec.js";

/** Options for a single image build. */
export interface BuildImageOptions {
  /** Push toggle; --push is only added when the spec also has a registry. */
  push: boolean;
  /** Directory relative spec paths resolve against (default: process.cwd()). */
  cwd?: string;
}

/**
 * Interface for turning an ImageSpec into an image.
 * Implementations are registered by name in a BuilderRegistry.
 */
export interface ImageBuilder {
  readonly name: string;
  /** Capability predicate used for automatic selection. */
  supports(spec: ImageSpec): boolean;
  /** Throw ValidationError for parameters this builder cannot honour. */
  validate(spec: ImageSpec): void;
  /** Stage the build context (and Dockerfile) into `dir` without building. */
  prepareContext(spec: ImageSpec, dir: string, cwd?: string): PreparedContext;
  /** Build (and optionally push) the image; resolves to the image name. */
  buildImage(spec: ImageSpec, options: BuildImageOptions): Promise<string>;
}
