import { describe, expect, it } from "vitest";

import {
  CUDA_GUIDANCE,
  type DockerfilePlan,
  pipInstallArgs,
  renderDockerfile,
  renderUvDockerfile,
} from "../src/dockerfile-gen.js";
import { ValidationError } from "../src/errors.js";
import { createImageSpec, type ImageSpecOptions } from "../src/image-spec.js";

function plan(overrides: Partial<DockerfilePlan> = {}): DockerfilePlan {
  return { baseImage: "debian:bookworm-slim", localInstallLines: [], hasSourceTree: false, copies: [], ...overrides };
}

function render(options: ImageSpecOptions, overrides: Partial<DockerfilePlan> = {}): string {
  return renderDockerfile(createImageSpec({ name: "app", ...options }), plan(overrides));
}

const REMOTE_SYNC = "uv venv && uv pip sync requirements_remote.txt";
const LOCAL_COPY = "COPY --chown=imgspec local_packages /root/local_packages";
const LOCAL_INSTALL = "uv pip install --requirement local_packages.txt";

describe("renderDockerfile", () => {
  it("is deterministic", () => {
    const options: ImageSpecOptions = { packages: ["numpy"], env: { A: "1" } };
    expect(render(options)).toBe(render(options));
  });

  it("starts from the planned base image and ends with one newline", () => {
    const text = render({});
    expect(text).toContain("\nFROM debian:bookworm-slim\n");
    expect(text.endsWith("echo \"export PATH=$PATH\" >> $HOME/.profile\n")).toBe(true);
  });

  it("installs inline packages from requirements_uv.txt with index flags", () => {
    const text = render({
      packages: ["numpy"],
      pipIndex: "https://pypi.example.com/simple",
      pipExtraIndexUrl: ["https://extra.example.com/simple"],
    });
    expect(text).toContain(
      "uv pip install --index-url https://pypi.example.com/simple " +
        "--extra-index-url https://extra.example.com/simple --requirement requirements_uv.txt"
    );
  });

  it("emits no install layer without requirements", () => {
    expect(render({})).not.toContain("requirements_uv.txt");
  });

  it("installs remote dependencies before copying local packages", () => {
    const text = render({ requirements: "uv.lock" }, { localInstallLines: ["/root/local_packages/lib"] });
    const remote = text.indexOf(REMOTE_SYNC);
    const copy = text.indexOf(LOCAL_COPY);
    const install = text.indexOf(LOCAL_INSTALL);

    expect(remote).toBeGreaterThan(-1);
    expect(copy).toBeGreaterThan(remote);
    expect(install).toBeGreaterThan(copy);
  });

  it("skips the local layers when nothing local was staged", () => {
    const text = render({ requirements: "uv.lock" });
    expect(text).toContain(REMOTE_SYNC);
    expect(text).not.toContain(LOCAL_COPY);
    expect(text).not.toContain("local_packages.txt");
  });

  it("installs poetry projects without the root package", () => {
    expect(render({ requirements: "poetry.lock" })).toContain("poetry install --no-root");
  });

  it("creates a micromamba environment with conda channels and packages", () => {
    const text = render({ pythonVersion: "3.11", condaChannels: ["nvidia"], condaPackages: ["cudatoolkit"] });
    expect(text).toContain("-c conda-forge -c nvidia");
    expect(text).toContain("python=3.11 cudatoolkit");
    expect(text).toContain("UV_PYTHON=/opt/micromamba/envs/runtime/bin/python");
  });

  it("defaults the conda python version", () => {
    expect(render({})).toContain("python=3.12");
  });

  it("uses a provided interpreter without micromamba", () => {
    const text = render({ pythonExec: "/usr/bin/python3" });
    expect(text).toContain("UV_PYTHON=/usr/bin/python3");
    expect(text).not.toContain("micromamba create");
  });

  it("rejects pythonExec combined with conda fields", () => {
    expect(() => render({ pythonExec: "/usr/bin/python3", condaPackages: ["numpy"] })).toThrow(
      "condaPackages is not supported with pythonExec ('/usr/bin/python3')"
    );
    expect(() => render({ pythonExec: "/usr/bin/python3", condaChannels: ["bioconda"] })).toThrow(
      "condaChannels is not supported with pythonExec ('/usr/bin/python3')"
    );
  });

  it("rejects cuda and cudnn with guidance", () => {
    expect(() => render({ cuda: "12.1" })).toThrow(CUDA_GUIDANCE);
    expect(() => render({ cudnn: "8" })).toThrow(ValidationError);
  });

  it("bakes the spec id and sanitized env into the image", () => {
    const spec = createImageSpec({ name: "app", env: { FOO: "bar\nbaz" } });
    const text = renderDockerfile(spec, plan());
    expect(text).toContain("PYTHONPATH=/root");
    expect(text).toContain(`_IMGSPEC_IMAGE_ID=${spec.id}`);
    expect(text).toContain("FOO=barbaz");
  });

  it("installs apt packages", () => {
    expect(render({ aptPackages: ["git", "curl"] })).toContain("apt-get install -y --no-install-recommends \\\n    git curl");
  });

  it("copies the source tree and extra paths", () => {
    const text = render(
      {},
      {
        hasSourceTree: true,
        copies: [
          { path: "configs", isDirectory: true },
          { path: "scripts/run.sh", isDirectory: false },
          { path: "setup.cfg", isDirectory: false },
        ],
      }
    );
    expect(text).toContain("COPY --chown=imgspec ./src /root\n");
    expect(text).toContain(
      "COPY --chown=imgspec configs /root/configs/\n" +
        "COPY --chown=imgspec scripts/run.sh /root/scripts/\n" +
        "COPY --chown=imgspec setup.cfg /root/"
    );
  });

  it("renders entrypoint and commands verbatim", () => {
    const text = render({ entrypoint: ["python", "-m", "app"], commands: ["echo a", "echo b"] });
    expect(text).toContain('ENTRYPOINT ["python","-m","app"]');
    expect(text).toContain("echo a && echo b");
  });
});

describe("renderUvDockerfile", () => {
  it("only accepts uv.lock specs", () => {
    const spec = createImageSpec({ name: "app", packages: ["numpy"] });
    expect(() => renderUvDockerfile(spec, plan())).toThrow(ValidationError);
  });

  it("layers remote before local dependencies without micromamba", () => {
    const spec = createImageSpec({ name: "app", requirements: "uv.lock" });
    const text = renderUvDockerfile(spec, plan({ baseImage: "python:3.12-slim-bookworm", localInstallLines: ["x"] }));

    expect(text).toContain("FROM python:3.12-slim-bookworm");
    expect(text).not.toContain("micromamba");
    expect(text.indexOf(REMOTE_SYNC)).toBeLessThan(text.indexOf(LOCAL_COPY));
    expect(text.indexOf(LOCAL_COPY)).toBeLessThan(text.indexOf(LOCAL_INSTALL));
  });
});

describe("pipInstallArgs", () => {
  it("orders index, extra indexes and extra args", () => {
    const spec = createImageSpec({
      pipIndex: "https://a.example.com",
      pipExtraIndexUrl: ["https://b.example.com", "https://c.example.com"],
      pipExtraArgs: "--no-deps",
    });
    expect(pipInstallArgs(spec)).toEqual([
      "--index-url https://a.example.com",
      "--extra-index-url https://b.example.com",
      "--extra-index-url https://c.example.com",
      "--no-deps",
    ]);
  });
});
