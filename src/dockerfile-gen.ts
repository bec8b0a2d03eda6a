/**
 * Dockerfile generation for imgspec.
 *
 * Renders the build recipe for an ImageSpec from the side outputs of context
 * preparation (staged local packages, source tree, extra copies).
 * Rendering is pure: equal specs and plans give byte-identical text.
 *
 * Layer ordering: stable layers first, frequently changing last. For uv.lock
 * specs the remote dependency layer comes before local_packages is copied, so
 * editing local code never invalidates the remote layer.
 */

import { posix } from "node:path";

import {
  CONTAINER_HOME,
  CONTAINER_LOCAL_PACKAGES_DIR,
  CONTAINER_USER,
  CONTAINER_VENV,
  CONTEXT_FILES,
  DEFAULT_PYTHON_VERSION,
  IMAGE_ID_ENV,
  MICROMAMBA_ENV_BIN,
  MICROMAMBA_IMAGE,
  UV_IMAGE,
} from "./constants.js";
import { ValidationError } from "./errors.js";
import type { ImageSpec } from "./image-spec.js";
import { sanitizeEnvValue } from "./validation.js";

/** An entry of the spec's copy list, staged at the same relative path. */
export interface CopyEntry {
  /** POSIX path relative to the context root. */
  path: string;
  isDirectory: boolean;
}

/** Facts about the staged build context the recipe depends on. */
export interface DockerfilePlan {
  /** FROM reference. */
  baseImage: string;
  /** Lines of local_packages.txt; empty when nothing was staged. */
  localInstallLines: readonly string[];
  /** True when ./src holds the filtered source tree. */
  hasSourceTree: boolean;
  copies: readonly CopyEntry[];
}

export const CUDA_GUIDANCE =
  "cuda and cudnn do not need to be specified. GPU accelerated libraries on PyPI usually install " +
  "cuda from PyPI. With conda, add `nvidia` to condaChannels and packages from " +
  "https://anaconda.org/nvidia to condaPackages. If you require cuda for non-python dependencies, " +
  "set a baseImage with cuda preinstalled.";

const UV_CACHE_MOUNT = "--mount=type=cache,sharing=locked,mode=0777,target=/root/.cache/uv,id=uv";
const UV_BINARY_MOUNT = "--mount=from=uv,source=/uv,target=/usr/bin/uv";

function bindMount(file: string, target: string = file): string {
  return `--mount=type=bind,target=${target},src=${file}`;
}

/** uv/pip flags derived from the index settings of a spec. */
export function pipInstallArgs(spec: ImageSpec): string[] {
  const args: string[] = [];
  if (spec.pipIndex) {
    args.push(`--index-url ${spec.pipIndex}`);
  }
  for (const url of spec.pipExtraIndexUrl ?? []) {
    args.push(`--extra-index-url ${url}`);
  }
  if (spec.pipExtraArgs) {
    args.push(spec.pipExtraArgs);
  }
  return args;
}

function withArgs(command: string, args: readonly string[], tail: string): string {
  return [command, ...args, tail].filter((part) => part !== "").join(" ");
}

function rejectCuda(spec: ImageSpec): void {
  if (spec.cuda !== undefined || spec.cudnn !== undefined) {
    throw new ValidationError(CUDA_GUIDANCE);
  }
}

// === Python provisioning ===

interface PythonProvisioning {
  pythonExec: string;
  /** RUN block creating the interpreter; empty for a user-supplied one. */
  install: string;
  /** Directory prepended to PATH; empty for a user-supplied interpreter. */
  extraPath: string;
}

function pythonProvisioning(spec: ImageSpec): PythonProvisioning {
  if (spec.pythonExec) {
    if (spec.condaChannels && spec.condaChannels.length > 0) {
      throw new ValidationError(`condaChannels is not supported with pythonExec ('${spec.pythonExec}')`);
    }
    if (spec.condaPackages && spec.condaPackages.length > 0) {
      throw new ValidationError(`condaPackages is not supported with pythonExec ('${spec.pythonExec}')`);
    }
    return { pythonExec: spec.pythonExec, install: "", extraPath: "" };
  }

  const channels = (spec.condaChannels ?? []).map((channel) => ` -c ${channel}`).join("");
  const packages = (spec.condaPackages ?? []).map((pkg) => ` ${pkg}`).join("");
  const version = spec.pythonVersion ?? DEFAULT_PYTHON_VERSION;

  const install = `RUN --mount=type=cache,sharing=locked,mode=0777,target=/opt/micromamba/pkgs,id=micromamba \\
    --mount=from=micromamba,source=/usr/bin/micromamba,target=/usr/bin/micromamba \\
    micromamba config set use_lockfiles False && \\
    micromamba create -n runtime --root-prefix /opt/micromamba \\
    -c conda-forge${channels} \\
    python=${version}${packages}`;

  return { pythonExec: `${MICROMAMBA_ENV_BIN}/python`, install, extraPath: MICROMAMBA_ENV_BIN };
}

/**
 * Reject field combinations no template can render, before any staging work.
 *
 * @throws ValidationError for cuda/cudnn, or pythonExec combined with conda fields.
 */
export function assertRenderable(spec: ImageSpec): void {
  rejectCuda(spec);
  pythonProvisioning(spec);
}

// === Shared blocks ===

function aptBlock(spec: ImageSpec): string {
  const packages = spec.aptPackages ?? [];
  if (packages.length === 0) {
    return "";
  }
  return `RUN --mount=type=cache,sharing=locked,mode=0777,target=/var/cache/apt,id=apt \\
    apt-get update && apt-get install -y --no-install-recommends \\
    ${packages.join(" ")}`;
}

function userBlock(): string {
  return `RUN id -u ${CONTAINER_USER} || useradd --create-home --shell /bin/bash ${CONTAINER_USER}
RUN chown -R ${CONTAINER_USER} /root && chown -R ${CONTAINER_USER} /home`;
}

/** KEY=VALUE pairs baked into every image, user env last. */
function envPairs(spec: ImageSpec): string[] {
  const env: Record<string, string> = { PYTHONPATH: CONTAINER_HOME, [IMAGE_ID_ENV]: spec.id };
  for (const [key, value] of Object.entries(spec.env ?? {})) {
    env[key] = sanitizeEnvValue(value);
  }
  return Object.entries(env).map(([key, value]) => `${key}=${value}`);
}

function envBlock(lines: readonly string[]): string {
  return `ENV ${lines.join(" \\\n    ")}`;
}

const VENV_ENV = envBlock([`PATH="${CONTAINER_VENV}/bin:$PATH"`, `UV_PYTHON=${CONTAINER_VENV}/bin/python`]);

function remoteLayer(spec: ImageSpec): string {
  return `WORKDIR ${CONTAINER_HOME}
RUN ${UV_CACHE_MOUNT} \\
    ${UV_BINARY_MOUNT} \\
    ${bindMount(CONTEXT_FILES.REQUIREMENTS_REMOTE)} \\
    uv venv && ${withArgs("uv pip sync", pipInstallArgs(spec), CONTEXT_FILES.REQUIREMENTS_REMOTE)}

${VENV_ENV}`;
}

function localCopyBlock(plan: DockerfilePlan): string {
  if (plan.localInstallLines.length === 0) {
    return "";
  }
  return `COPY --chown=${CONTAINER_USER} ${CONTEXT_FILES.LOCAL_PACKAGES_DIR} ${CONTAINER_LOCAL_PACKAGES_DIR}`;
}

function localInstallLayer(spec: ImageSpec, plan: DockerfilePlan): string {
  if (plan.localInstallLines.length === 0) {
    return "";
  }
  return `RUN ${UV_CACHE_MOUNT} \\
    ${UV_BINARY_MOUNT} \\
    ${bindMount(CONTEXT_FILES.LOCAL_PACKAGES_LIST)} \\
    ${withArgs("uv pip install", pipInstallArgs(spec), `--requirement ${CONTEXT_FILES.LOCAL_PACKAGES_LIST}`)}`;
}

function requirementsLayer(spec: ImageSpec): string {
  return `RUN ${UV_CACHE_MOUNT} \\
    ${UV_BINARY_MOUNT} \\
    ${bindMount(CONTEXT_FILES.REQUIREMENTS_UV)} \\
    ${withArgs("uv pip install", pipInstallArgs(spec), `--requirement ${CONTEXT_FILES.REQUIREMENTS_UV}`)}`;
}

function poetryLayer(spec: ImageSpec): string {
  return `RUN ${UV_CACHE_MOUNT} \\
    ${UV_BINARY_MOUNT} \\
    uv pip install poetry

ENV POETRY_CACHE_DIR=/tmp/poetry_cache \\
    POETRY_VIRTUALENVS_IN_PROJECT=true

# poetry install does not work in /, the venv is created in /root
WORKDIR ${CONTAINER_HOME}

RUN --mount=type=cache,sharing=locked,mode=0777,target=/tmp/poetry_cache,id=poetry \\
    ${bindMount(CONTEXT_FILES.POETRY_LOCK)} \\
    ${bindMount(CONTEXT_FILES.PYPROJECT)} \\
    ${withArgs("poetry install", pipInstallArgs(spec), "--no-root")}

WORKDIR /

${VENV_ENV}`;
}

/** Copy instructions for the source tree and the extra copy list. */
function copyBlocks(plan: DockerfilePlan): string[] {
  const blocks: string[] = [];
  if (plan.hasSourceTree) {
    blocks.push(`COPY --chown=${CONTAINER_USER} ./${CONTEXT_FILES.SOURCE_DIR} ${CONTAINER_HOME}`);
  }
  const copies = plan.copies.map((entry) => {
    if (entry.isDirectory) {
      return `COPY --chown=${CONTAINER_USER} ${entry.path} ${CONTAINER_HOME}/${entry.path}/`;
    }
    const parent = posix.dirname(entry.path);
    const destination = parent === "." ? `${CONTAINER_HOME}/` : `${CONTAINER_HOME}/${parent}/`;
    return `COPY --chown=${CONTAINER_USER} ${entry.path} ${destination}`;
  });
  if (copies.length > 0) {
    blocks.push(copies.join("\n"));
  }
  return blocks;
}

function entrypointBlock(spec: ImageSpec): string {
  return spec.entrypoint ? `ENTRYPOINT ${JSON.stringify(spec.entrypoint)}` : "";
}

function commandsBlock(spec: ImageSpec): string {
  const commands = spec.commands ?? [];
  if (commands.length === 0) {
    return "";
  }
  return `RUN ${UV_CACHE_MOUNT} \\
    ${UV_BINARY_MOUNT} ${commands.join(" && ")}`;
}

const USER_SPACE_TAIL = `WORKDIR ${CONTAINER_HOME}
SHELL ["/bin/bash", "-c"]

USER ${CONTAINER_USER}
RUN mkdir -p $HOME && \\
    echo "export PATH=$PATH" >> $HOME/.profile`;

function assemble(blocks: readonly string[]): string {
  return `${blocks.filter((block) => block !== "").join("\n\n")}\n`;
}

// === Templates ===

/**
 * Render the full multi-stage recipe used by the default builder.
 *
 * @throws ValidationError for cuda/cudnn, or pythonExec combined with conda fields.
 */
export function renderDockerfile(spec: ImageSpec, plan: DockerfilePlan): string {
  rejectCuda(spec);
  const python = pythonProvisioning(spec);
  const source = spec.requirementSource;

  const userEnv = [
    ...(python.extraPath ? [`PATH="${python.extraPath}:$PATH"`] : []),
    `UV_PYTHON=${python.pythonExec}`,
    "UV_LINK_MODE=copy",
    "UV_COMPILE_BYTECODE=1",
    "SSL_CERT_DIR=/etc/ssl/certs",
    ...envPairs(spec),
  ];

  let requirementBlocks: string[];
  switch (source.kind) {
    case "none":
      requirementBlocks = [];
      break;
    case "packages":
    case "requirements-file":
      requirementBlocks = [requirementsLayer(spec)];
      break;
    case "uv-lock":
      requirementBlocks = [remoteLayer(spec), localCopyBlock(plan), localInstallLayer(spec, plan)];
      break;
    case "poetry-lock":
      requirementBlocks = [poetryLayer(spec)];
      break;
  }

  return assemble([
    `#syntax=docker/dockerfile:1.5
FROM ${UV_IMAGE} AS uv
FROM ${MICROMAMBA_IMAGE} AS micromamba

FROM ${plan.baseImage}

USER root`,
    aptBlock(spec),
    `RUN --mount=from=micromamba,source=/etc/ssl/certs/ca-certificates.crt,target=/tmp/ca-certificates.crt \\
    [ -f /etc/ssl/certs/ca-certificates.crt ] || \\
    mkdir -p /etc/ssl/certs/ && cp /tmp/ca-certificates.crt /etc/ssl/certs/ca-certificates.crt`,
    userBlock(),
    python.install,
    `# Configure user space\n${envBlock(userEnv)}`,
    ...requirementBlocks,
    `WORKDIR /

# Adds nvidia just in case it exists
ENV PATH="$PATH:/usr/local/nvidia/bin:/usr/local/cuda/bin" \\
    LD_LIBRARY_PATH="/usr/local/nvidia/lib64:$LD_LIBRARY_PATH"`,
    entrypointBlock(spec),
    ...copyBlocks(plan),
    commandsBlock(spec),
    USER_SPACE_TAIL,
  ]);
}

/**
 * Render the slim recipe used by the uv builder: the base image's own
 * interpreter, no micromamba or apt layers.
 *
 * @throws ValidationError unless the spec uses a uv.lock.
 */
export function renderUvDockerfile(spec: ImageSpec, plan: DockerfilePlan): string {
  rejectCuda(spec);
  if (spec.requirementSource.kind !== "uv-lock") {
    throw new ValidationError(`The uv template only supports uv.lock requirements, got '${spec.requirementSource.kind}'`);
  }

  return assemble([
    `#syntax=docker/dockerfile:1.5
FROM ${UV_IMAGE} AS uv

FROM ${plan.baseImage}

USER root`,
    userBlock(),
    envBlock(["UV_LINK_MODE=copy", "UV_COMPILE_BYTECODE=1", ...envPairs(spec)]),
    `# Remote dependencies: cached independently of local sources\n${remoteLayer(spec)}`,
    localCopyBlock(plan),
    localInstallLayer(spec, plan),
    "WORKDIR /",
    entrypointBlock(spec),
    ...copyBlocks(plan),
    commandsBlock(spec),
    USER_SPACE_TAIL,
  ]);
}
