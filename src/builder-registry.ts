/**
 * Builder registry for imgspec.
 *
 * Maps builder names to implementations with a priority. Selection honours an
 * explicit `spec.builder`; otherwise the highest-priority builder whose
 * capability predicate accepts the spec wins, ties going to the one
 * registered first.
 *
 * Registries are plain objects passed to the engine. There is no global
 * instance; createDefaultBuilderRegistry builds the standard one.
 */

import { BuildDriver } from "./build.js";
import { DefaultImageBuilder } from "./builders/default-builder.js";
import { UvImageBuilder } from "./builders/uv-builder.js";
import { PRIORITY } from "./constants.js";
import { BuilderNotFoundError, ValidationError } from "./errors.js";
import type { ImageSpec } from "./image-spec.js";
import type { ImageBuilder } from "./interfaces/image-builder.js";
import { log } from "./logger.js";

export interface BuilderRegistration {
  name: string;
  builder: ImageBuilder;
  /** Higher wins during automatic selection. */
  priority: number;
  /** Position of the first registration under this name. */
  order: number;
}

export class BuilderRegistry {
  private readonly registrations = new Map<string, BuilderRegistration>();
  private nextOrder = 0;

  /** Register or replace a builder; a replacement keeps its original order. */
  register(name: string, builder: ImageBuilder, priority: number): void {
    const existing = this.registrations.get(name);
    if (existing) {
      log.debug(`Replacing builder '${name}'`);
    }
    this.registrations.set(name, {
      name,
      builder,
      priority,
      order: existing?.order ?? this.nextOrder++,
    });
  }

  /** @returns whether a builder was removed. */
  unregister(name: string): boolean {
    return this.registrations.delete(name);
  }

  get(name: string): ImageBuilder | undefined {
    return this.registrations.get(name)?.builder;
  }

  /** Registrations in registration order. */
  list(): BuilderRegistration[] {
    return [...this.registrations.values()].sort((a, b) => a.order - b.order);
  }

  /**
   * Pick the builder for a spec.
   *
   * @throws BuilderNotFoundError if `spec.builder` names an unknown builder.
   * @throws ValidationError if no registered builder supports the spec.
   */
  select(spec: ImageSpec): ImageBuilder {
    if (spec.builder) {
      const builder = this.get(spec.builder);
      if (!builder) {
        const known = this.list().map((registration) => registration.name);
        throw new BuilderNotFoundError(
          `Builder '${spec.builder}' is not registered. Available builders: ${known.join(", ") || "(none)"}`
        );
      }
      return builder;
    }

    let best: BuilderRegistration | undefined;
    for (const registration of this.list()) {
      if (!registration.builder.supports(spec)) {
        continue;
      }
      if (!best || registration.priority > best.priority) {
        best = registration;
      }
    }

    if (!best) {
      throw new ValidationError(`No registered builder supports image spec '${spec.name}'`);
    }
    log.debug(`Selected builder '${best.name}' for ${spec.name}`);
    return best.builder;
  }
}

/** Registry holding the default (priority 1) and uv (priority 2) builders. */
export function createDefaultBuilderRegistry(driver: BuildDriver = new BuildDriver()): BuilderRegistry {
  const registry = new BuilderRegistry();
  registry.register("default", new DefaultImageBuilder(driver), PRIORITY.DEFAULT);
  registry.register("uv", new UvImageBuilder(driver), PRIORITY.LOCK_SPECIALIZED);
  return registry;
}
