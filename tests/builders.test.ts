import { existsSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { BuildDriver } from "../src/build.js";
import { DefaultImageBuilder } from "../src/builders/default-builder.js";
import { rejectedFields, UvImageBuilder } from "../src/builders/uv-builder.js";
import { ToolNotFoundError, ValidationError } from "../src/errors.js";
import { createImageSpec, imageName } from "../src/image-spec.js";
import { log } from "../src/logger.js";
import { FakeCommandRunner } from "./mocks/fake-runner.js";
import { TempDirs } from "./mocks/fixtures.js";

const temp = new TempDirs();
afterEach(() => {
  temp.cleanup();
  vi.restoreAllMocks();
});

const REMOTE_LOCK = `version = 1

[[package]]
name = "requests"
version = "2.32.3"
source = { registry = "https://pypi.org/simple" }
`;

function uvProject(): string {
  const repo = temp.repository({ "uv.lock": REMOTE_LOCK, "pyproject.toml": "[project]\nname = \"app\"\n" });
  return join(repo, "uv.lock");
}

describe("UvImageBuilder", () => {
  const builder = new UvImageBuilder(new BuildDriver(new FakeCommandRunner()));

  it("supports plain uv.lock specs only", () => {
    expect(builder.supports(createImageSpec({ name: "app", requirements: "uv.lock" }))).toBe(true);
    expect(builder.supports(createImageSpec({ name: "app", packages: ["numpy"] }))).toBe(false);
    expect(builder.supports(createImageSpec({ name: "app", requirements: "uv.lock", aptPackages: ["git"] }))).toBe(
      false
    );
  });

  it("rejects other requirement sources", () => {
    expect(() => builder.validate(createImageSpec({ name: "app", requirements: "requirements.txt" }))).toThrow(
      "The uv builder only supports uv.lock requirements, got 'requirements.txt'"
    );
  });

  it("names every rejected field", () => {
    const spec = createImageSpec({ name: "app", requirements: "uv.lock", condaPackages: ["numpy"], useDepot: true });
    expect(rejectedFields(spec)).toEqual(["condaPackages", "useDepot"]);
    expect(() => builder.validate(spec)).toThrow(ValidationError);
    expect(() => builder.validate(spec)).toThrow("The uv builder does not support: condaPackages, useDepot");
  });

  it("rejects useDepot instead of listing it as supported", () => {
    const spec = createImageSpec({ name: "app", requirements: "uv.lock", useDepot: true });
    expect(builder.supports(spec)).toBe(false);
    expect(builder.unsupportedFields(spec)).toEqual(["useDepot"]);
    expect(builder.unsupportedFields(createImageSpec({ name: "app", requirements: "uv.lock", useDepot: false }))).toEqual([]);
  });

  it("reports pythonVersion as ignored", () => {
    const spec = createImageSpec({ name: "app", requirements: "uv.lock", pythonVersion: "3.11" });
    expect(builder.unsupportedFields(spec)).toEqual(["pythonVersion"]);
  });

  it("builds with buildx and a registry cache", async () => {
    const runner = new FakeCommandRunner();
    const spec = createImageSpec({ name: "app", registry: "ghcr.io/org", requirements: uvProject() });

    const name = await new UvImageBuilder(new BuildDriver(runner)).buildImage(spec, { push: true });

    expect(name).toBe(imageName(spec));
    const lines = runner.lines();
    expect(lines[0]).toBe("docker info");
    expect(lines[1]).toMatch(
      new RegExp(
        `^docker buildx build --tag ${imageName(spec)} --platform linux/amd64 ` +
          "--cache-from type=registry,ref=ghcr.io/org/app:buildcache " +
          "--cache-to type=registry,ref=ghcr.io/org/app:buildcache,mode=max --push \\S+$"
      )
    );
  });

  it("warns about ignored fields before building", async () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);
    const spec = createImageSpec({ name: "app", requirements: uvProject(), pythonVersion: "3.11" });

    await new UvImageBuilder(new BuildDriver(new FakeCommandRunner())).buildImage(spec, { push: false });

    expect(warn).toHaveBeenCalledWith("The following parameters are unsupported by the uv builder and ignored: pythonVersion");
  });
});

describe("DefaultImageBuilder", () => {
  it("supports every spec and ignores nothing", () => {
    const builder = new DefaultImageBuilder(new BuildDriver(new FakeCommandRunner()));
    const spec = createImageSpec({ name: "app", aptPackages: ["git"], pythonVersion: "3.11", condaPackages: ["numpy"] });
    expect(builder.supports(spec)).toBe(true);
    expect(builder.unsupportedFields(spec)).toEqual([]);
  });

  it("warns that poetry support is experimental", () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);
    new DefaultImageBuilder(new BuildDriver(new FakeCommandRunner())).validate(
      createImageSpec({ name: "app", requirements: "poetry.lock" })
    );
    expect(warn).toHaveBeenCalledWith("poetry.lock support is experimental");
  });

  it("builds in a scratch context that is removed afterwards", async () => {
    const runner = new FakeCommandRunner();
    const spec = createImageSpec({ name: "app", packages: ["numpy"] });

    await new DefaultImageBuilder(new BuildDriver(runner)).buildImage(spec, { push: true });

    const build = runner.calls[1];
    expect(build?.command).toBe("docker");
    expect(build?.args.slice(0, 6)).toEqual(["image", "build", "--tag", `app:${spec.id}`, "--platform", "linux/amd64"]);
    const contextDir = build?.args.at(-1) ?? "";
    expect(contextDir).not.toBe("");
    expect(existsSync(contextDir)).toBe(false);
  });

  it("stops before any build when the build tool is missing", async () => {
    const runner = new FakeCommandRunner().withoutTool("docker");
    const spec = createImageSpec({ name: "app", packages: ["numpy"] });

    await expect(new DefaultImageBuilder(new BuildDriver(runner)).buildImage(spec, { push: true })).rejects.toThrow(
      ToolNotFoundError
    );
    expect(runner.calls).toEqual([]);
  });

  it("validates before touching any tool", async () => {
    const runner = new FakeCommandRunner();
    const spec = createImageSpec({ name: "app", cuda: "12.1" });

    await expect(new DefaultImageBuilder(new BuildDriver(runner)).buildImage(spec, { push: true })).rejects.toThrow(
      ValidationError
    );
    expect(runner.calls).toEqual([]);
  });
});
