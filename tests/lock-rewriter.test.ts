import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "smol-toml";
import { afterEach, describe, expect, it } from "vitest";

import { DependencyError, ResolutionError, ValidationError } from "../src/errors.js";
import { createImageSpec } from "../src/image-spec.js";
import {
  exportRequirements,
  isPathLikeRequirement,
  removeLocalPackagesFromLockFiles,
  removePackagesFromManifest,
  rewriteLocalPackages,
} from "../src/lock-rewriter.js";
import { isTable, packageTables, parseLockFile, parseToml, type TomlTable } from "../src/lockfile.js";
import { TempDirs } from "./mocks/fixtures.js";

const temp = new TempDirs();
afterEach(() => temp.cleanup());

const LOCAL_LOCK = `version = 1
requires-python = ">=3.12"

[[package]]
name = "app"
version = "0.1.0"
source = { editable = "." }
dependencies = [
    { name = "local-package" },
    { name = "requests" },
]

[package.metadata]
requires-dist = [
    { name = "local-package", directory = "local-package" },
    { name = "requests", specifier = ">=2.31" },
]

[[package]]
name = "local-package"
version = "0.1.0"
source = { directory = "./local-package" }

[[package]]
name = "requests"
version = "2.32.3"
source = { registry = "https://pypi.org/simple" }
`;

const LOCAL_PYPROJECT = `[project]
name = "app"
version = "0.1.0"
dependencies = ["requests>=2.31", "local-package"]

[tool.uv.sources]
local-package = { path = "local-package" }
`;

const REMOTE_ONLY_LOCK = `version = 1

[[package]]
name = "app"
version = "0.1.0"
source = { virtual = "." }
dependencies = [{ name = "requests" }]

[[package]]
name = "requests"
version = "2.32.3"
source = { registry = "https://pypi.org/simple" }
`;

const CONTAINER_PATH = "/root/local_packages/app/local-package";

/** Repository with the project under app/ and a directory package beside it. */
function localProject(lock = LOCAL_LOCK): string {
  const repo = temp.repository({
    "app/uv.lock": lock,
    "app/pyproject.toml": LOCAL_PYPROJECT,
    "app/local-package/pyproject.toml": "[project]\nname = \"local-package\"\n",
    "app/local-package/src/local_package/__init__.py": "VALUE = 1\n",
    "app/local-package/src/local_package/__pycache__/x.pyc": "",
  });
  return join(repo, "app");
}

function readToml(path: string): TomlTable {
  return parseToml(readFileSync(path, "utf-8"), path);
}

function packageNames(document: TomlTable): string[] {
  return packageTables(document).flatMap((table) => (typeof table["name"] === "string" ? [table["name"]] : []));
}

function table(value: unknown): TomlTable {
  if (!isTable(value)) {
    throw new Error(`expected a table, got ${JSON.stringify(value)}`);
  }
  return value;
}

describe("rewriteLocalPackages", () => {
  it("splits a lock into remote packages and staged local packages", () => {
    const project = localProject();
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock"), installProject: false });

    const result = rewriteLocalPackages(spec, context);

    expect(result.remotePackageNames).toEqual(["requests"]);
    expect(result.skippedPackageNames).toEqual(["app"]);
    expect(result.localPackages.map((pkg) => pkg.containerPath)).toEqual([CONTAINER_PATH]);
    expect(result.localInstallLines).toEqual([CONTAINER_PATH]);
    expect(result.remoteRequirements).toEqual(["requests==2.32.3"]);

    expect(readFileSync(join(context, "requirements_remote.txt"), "utf-8")).toBe("requests==2.32.3\n");
    expect(readFileSync(join(context, "local_packages.txt"), "utf-8")).toBe(`${CONTAINER_PATH}\n`);
    expect(
      existsSync(join(context, "local_packages", "app", "local-package", "src", "local_package", "__init__.py"))
    ).toBe(true);
    expect(existsSync(join(context, "local_packages", "app", "local-package", "src", "local_package", "__pycache__"))).toBe(
      false
    );
  });

  it("rewrites every path reference to the in-container location", () => {
    const project = localProject();
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock"), installProject: false });

    rewriteLocalPackages(spec, context);

    const [app, localPackage] = packageTables(readToml(join(context, "uv.lock")));
    expect(table(localPackage?.["source"])["directory"]).toBe(CONTAINER_PATH);
    const requiresDist = table(app?.["metadata"])["requires-dist"];
    expect(Array.isArray(requiresDist) ? requiresDist.map((edge) => table(edge)["directory"]) : []).toEqual([
      CONTAINER_PATH,
      undefined,
    ]);
    // The skipped project root keeps its original path
    expect(table(app?.["source"])["editable"]).toBe(".");

    const manifest = readToml(join(context, "pyproject.toml"));
    const sources = table(table(table(manifest["tool"])["uv"])["sources"]);
    expect(table(sources["local-package"])["path"]).toBe(CONTAINER_PATH);
  });

  it("writes remote-only documents without local packages or edges to them", () => {
    const project = localProject();
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock"), installProject: false });

    rewriteLocalPackages(spec, context);

    const remoteLock = readToml(join(context, "uv_remote.lock"));
    expect(packageNames(remoteLock)).toEqual(["requests"]);

    const remoteManifest = readToml(join(context, "pyproject_remote.toml"));
    expect(table(remoteManifest["project"])["dependencies"]).toEqual(["requests>=2.31"]);
    expect(table(table(table(remoteManifest["tool"])["uv"])["sources"])).toEqual({});
  });

  it("accounts for every package exactly once", () => {
    const project = localProject();
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock"), installProject: false });

    const result = rewriteLocalPackages(spec, temp.create());

    const accounted = [
      ...result.remotePackageNames,
      ...result.localPackages.map((pkg) => pkg.name),
      ...result.skippedPackageNames,
    ].sort();
    const original = parseLockFile(LOCAL_LOCK).packages.map((pkg) => pkg.name).sort();
    expect(accounted).toEqual(original);
  });

  it("installs the project itself as editable when installProject is set", () => {
    const project = localProject();
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock") });

    const result = rewriteLocalPackages(spec, context);

    expect(result.skippedPackageNames).toEqual([]);
    expect(result.localInstallLines).toEqual(["-e /root/local_packages/app", CONTAINER_PATH]);
    expect(existsSync(join(context, "local_packages", "app", "pyproject.toml"))).toBe(true);
  });

  it("passes a lock without local packages through unchanged", () => {
    const repo = temp.repository({ "uv.lock": REMOTE_ONLY_LOCK, "pyproject.toml": "[project]\nname = \"app\"\n" });
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(repo, "uv.lock") });

    const result = rewriteLocalPackages(spec, context);

    expect(result.localPackages).toEqual([]);
    expect(result.remotePackageNames).toEqual(["app", "requests"]);
    expect(packageNames(readToml(join(context, "uv_remote.lock")))).toEqual(["app", "requests"]);
    expect(readFileSync(join(context, "requirements_remote.txt"), "utf-8")).toBe("requests==2.32.3\n");
    expect(existsSync(join(context, "local_packages"))).toBe(false);
    expect(existsSync(join(context, "local_packages.txt"))).toBe(false);
  });

  it("keeps platform markers in requirements_remote.txt", () => {
    const repo = temp.repository({
      "uv.lock": `version = 1

[[package]]
name = "app"
version = "0.1.0"
source = { virtual = "." }
dependencies = [
    { name = "pywin32", marker = "sys_platform == 'win32'" },
    { name = "requests" },
]

[[package]]
name = "pywin32"
version = "306"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "requests"
version = "2.32.3"
source = { registry = "https://pypi.org/simple" }
`,
      "pyproject.toml": "[project]\nname = \"app\"\n",
    });
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(repo, "uv.lock") });

    const result = rewriteLocalPackages(spec, context);

    expect(result.remoteRequirements).toEqual(["pywin32==306 ; sys_platform == 'win32'", "requests==2.32.3"]);
    expect(readFileSync(join(context, "requirements_remote.txt"), "utf-8")).toBe(
      "pywin32==306 ; sys_platform == 'win32'\nrequests==2.32.3\n"
    );
  });

  it("applies the repository's ignore rules to local packages in subdirectories", () => {
    const repo = temp.repository({
      ".gitignore": "build/\n*.log\n",
      "uv.lock": `version = 1

[[package]]
name = "app"
version = "0.1.0"
source = { virtual = "." }
dependencies = [{ name = "lp" }]

[[package]]
name = "lp"
version = "0.1.0"
source = { directory = "libs/lp" }
`,
      "pyproject.toml": "[project]\nname = \"app\"\n",
      "libs/lp/pyproject.toml": "[project]\nname = \"lp\"\n",
      "libs/lp/build/big.bin": "",
      "libs/lp/debug.log": "",
    });
    const context = temp.create();
    const spec = createImageSpec({ name: "app", requirements: join(repo, "uv.lock") });

    rewriteLocalPackages(spec, context);

    const staged = join(context, "local_packages", "libs", "lp");
    expect(existsSync(join(staged, "pyproject.toml"))).toBe(true);
    expect(existsSync(join(staged, "build", "big.bin"))).toBe(false);
    expect(existsSync(join(staged, "debug.log"))).toBe(false);
  });

  it("exports the dependencies of local packages", () => {
    const lock = LOCAL_LOCK.replace(
      'source = { directory = "./local-package" }',
      'source = { directory = "./local-package" }\ndependencies = [{ name = "numpy", marker = "python_version >= \'3.12\'" }]'
    ).concat(`
[[package]]
name = "numpy"
version = "2.1.1"
source = { registry = "https://pypi.org/simple" }
`);
    const project = localProject(lock);
    const spec = createImageSpec({ name: "app", requirements: join(project, "uv.lock"), installProject: false });

    const result = rewriteLocalPackages(spec, temp.create());

    expect(result.remoteRequirements).toEqual(["requests==2.32.3", "numpy==2.1.1 ; python_version >= '3.12'"]);
  });

  it("resolves a relative lock path against the given cwd", () => {
    const project = localProject();
    const spec = createImageSpec({ name: "app", requirements: "uv.lock", installProject: false });

    const result = rewriteLocalPackages(spec, temp.create(), { cwd: project });

    expect(result.remotePackageNames).toEqual(["requests"]);
  });

  it("requires pyproject.toml next to the lock", () => {
    const repo = temp.repository({ "uv.lock": REMOTE_ONLY_LOCK });
    const spec = createImageSpec({ name: "app", requirements: join(repo, "uv.lock") });

    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(DependencyError);
    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(
      /pyproject.toml must exist in the same directory as uv.lock/
    );
  });

  it("fails when a local package path is missing", () => {
    const repo = temp.repository({ "uv.lock": LOCAL_LOCK, "pyproject.toml": LOCAL_PYPROJECT });
    const spec = createImageSpec({ name: "app", requirements: join(repo, "uv.lock"), installProject: false });

    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(ResolutionError);
    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(/Local package path does not exist/);
  });

  it("fails when no repository root encloses a local package", () => {
    const dir = temp.create({
      "uv.lock": LOCAL_LOCK,
      "pyproject.toml": LOCAL_PYPROJECT,
      "local-package/pyproject.toml": "[project]\nname = \"local-package\"\n",
    });
    const spec = createImageSpec({ name: "app", requirements: join(dir, "uv.lock"), installProject: false });

    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(/Could not find a repository root/);
  });

  it("rejects specs without a uv.lock", () => {
    const spec = createImageSpec({ name: "app", packages: ["numpy"] });
    expect(() => rewriteLocalPackages(spec, temp.create())).toThrow(ValidationError);
  });
});

describe("exportRequirements", () => {
  it("exports registry, git and url packages", () => {
    const lock = parseToml(
      `[[package]]
name = "mylib"
version = "1.0.0"
source = { git = "https://github.com/example/mylib?rev=v1.0#abc123" }

[[package]]
name = "tools"
version = "0.2.0"
source = { git = "https://github.com/example/mono?subdirectory=pkgs/tools#def456" }

[[package]]
name = "archive"
version = "1.0"
source = { url = "https://files.example.com/archive-1.0.tar.gz" }

[[package]]
name = "numpy"
version = "1.26.4"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "root"
version = "0.1.0"
source = { virtual = "." }
dependencies = [{ name = "mylib" }, { name = "tools" }, { name = "archive" }, { name = "numpy" }]
`,
      "uv.lock"
    );

    expect(exportRequirements(lock)).toEqual([
      "mylib @ git+https://github.com/example/mylib@abc123",
      "tools @ git+https://github.com/example/mono@def456#subdirectory=pkgs/tools",
      "archive @ https://files.example.com/archive-1.0.tar.gz",
      "numpy==1.26.4",
    ]);
  });

  it("carries the markers of the edges that reach a package", () => {
    const lock = parseToml(
      `[[package]]
name = "app"
version = "0.1.0"
source = { virtual = "." }
dependencies = [
    { name = "colorama", marker = "sys_platform == 'win32'" },
    { name = "httpx", extra = ["http2"] },
    { name = "click" },
]

[package.dev-dependencies]
dev = [{ name = "pytest" }]
test = [{ name = "hypothesis" }]

[[package]]
name = "click"
version = "8.1.7"
source = { registry = "https://pypi.org/simple" }
dependencies = [{ name = "colorama", marker = "platform_system == 'Windows'" }]

[[package]]
name = "colorama"
version = "0.4.6"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "h2"
version = "4.1.0"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "httpx"
version = "0.27.0"
source = { registry = "https://pypi.org/simple" }

[package.optional-dependencies]
http2 = [{ name = "h2" }]
socks = [{ name = "socksio" }]

[[package]]
name = "hypothesis"
version = "6.112.0"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "pytest"
version = "8.3.3"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "socksio"
version = "1.0.0"
source = { registry = "https://pypi.org/simple" }

[[package]]
name = "tqdm"
version = "4.66.5"
source = { registry = "https://pypi.org/simple" }
`,
      "uv.lock"
    );

    expect(exportRequirements(lock)).toEqual([
      "click==8.1.7",
      "colorama==0.4.6 ; (platform_system == 'Windows') or (sys_platform == 'win32')",
      "h2==4.1.0",
      "httpx==0.27.0",
      "pytest==8.3.3",
    ]);
  });

  it("combines markers along a chain and keeps the weaker one across a cycle", () => {
    const lock = parseToml(
      `[[package]]
name = "app"
version = "0.1.0"
source = { virtual = "." }
dependencies = [{ name = "tomli", marker = "python_version < '3.11'" }]

[[package]]
name = "tomli"
version = "2.0.1"
source = { registry = "https://pypi.org/simple" }
dependencies = [{ name = "typing-extensions", marker = "sys_platform == 'linux'" }]

[[package]]
name = "typing-extensions"
version = "4.12.2"
source = { registry = "https://pypi.org/simple" }
dependencies = [{ name = "tomli" }]
`,
      "uv.lock"
    );

    expect(exportRequirements(lock)).toEqual([
      "tomli==2.0.1 ; python_version < '3.11'",
      "typing-extensions==4.12.2 ; (python_version < '3.11') and (sys_platform == 'linux')",
    ]);
  });

  it("keeps the first entry of a repeated name", () => {
    const lock = parseToml(
      `[[package]]
name = "numpy"
version = "1.26.4"

[[package]]
name = "NumPy"
version = "2.0.0"
`,
      "uv.lock"
    );
    expect(exportRequirements(lock)).toEqual(["numpy==1.26.4"]);
  });
});

describe("isPathLikeRequirement", () => {
  it("recognizes local references", () => {
    expect(isPathLikeRequirement("-e ./pkg")).toBe(true);
    expect(isPathLikeRequirement("./pkg")).toBe(true);
    expect(isPathLikeRequirement("../pkg")).toBe(true);
    expect(isPathLikeRequirement("/abs/pkg")).toBe(true);
    expect(isPathLikeRequirement("pkg @ file:///abs/pkg")).toBe(true);
    expect(isPathLikeRequirement("requests==2.32.3")).toBe(false);
  });
});

describe("removePackagesFromManifest", () => {
  it("filters dependency groups and dev dependencies", () => {
    const manifest = parseToml(
      `[project]
name = "app"
dependencies = ["local_package>=0.1", "httpx"]

[project.optional-dependencies]
extra = ["local-package", "rich"]

[dependency-groups]
dev = ["pytest", "local-package"]

[tool.uv]
dev-dependencies = ["Local.Package", "ruff"]

[tool.uv.sources]
httpx = { git = "https://github.com/example/httpx" }
`,
      "pyproject.toml"
    );

    const result = removePackagesFromManifest(manifest, new Set(["local-package"]));

    const project = table(result["project"]);
    expect(project["dependencies"]).toEqual(["httpx"]);
    expect(project["optional-dependencies"]).toEqual({ extra: ["rich"] });
    expect(result["dependency-groups"]).toEqual({ dev: ["pytest"] });
    const uv = table(table(result["tool"])["uv"]);
    expect(uv["dev-dependencies"]).toEqual(["ruff"]);
    expect(uv["sources"]).toEqual({ httpx: { git: "https://github.com/example/httpx" } });
  });
});

describe("removeLocalPackagesFromLockFiles", () => {
  it("writes remote-only copies beside the inputs", () => {
    const project = localProject();

    const result = removeLocalPackagesFromLockFiles({
      lockPath: join(project, "uv.lock"),
      pyprojectPath: join(project, "pyproject.toml"),
    });

    expect(result).toEqual({
      lockPath: join(project, "uv_external.lock"),
      pyprojectPath: join(project, "pyproject_external.toml"),
    });
    const lock = parse(readFileSync(result.lockPath, "utf-8"));
    expect(packageNames(table(lock))).toEqual(["requests"]);
    expect(table(readToml(result.pyprojectPath)["project"])["dependencies"]).toEqual(["requests>=2.31"]);
  });

  it("honours explicit output paths", () => {
    const project = localProject();
    const out = temp.create();

    const result = removeLocalPackagesFromLockFiles({
      lockPath: join(project, "uv.lock"),
      pyprojectPath: join(project, "pyproject.toml"),
      outputLockPath: join(out, "remote.lock"),
      outputPyprojectPath: join(out, "remote.toml"),
    });

    expect(result.lockPath).toBe(join(out, "remote.lock"));
    expect(existsSync(join(out, "remote.toml"))).toBe(true);
  });
});
