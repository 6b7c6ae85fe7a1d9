/**
 * Dockerfile for the derived server image.
 *
 * Each module gets its own section, opened by a marker step whose output
 * lets the build follower attribute failures to a module. Worker mode adds
 * the services the workers run beside and the staged worker entry point.
 */

import { posix } from "node:path";
import type { ModuleDeclaration, SuiteConfig } from "../config/types.js";
import {
  GUEST_MODULES_DIR,
  MODULE_MARKER,
  WORKERS_CONF_DIR,
  WORKERS_SCRIPT,
  WORKER_PACKAGES,
  WORKER_VOLUMES,
} from "./types.js";

/** Unprivileged account created inside the image. */
export const IMAGE_USER = "mx-testbed";
export const EXPOSED_PORTS = ["8008/tcp", "8009/tcp", "8448/tcp"];

export function renderDockerfile(config: SuiteConfig, uid?: number): string {
  const uidFlag = uid === undefined || uid === 0 ? "" : ` --uid ${uid}`;
  const lines = [`FROM ${config.synapseImage}`, ""];
  if (config.workers.enabled) {
    lines.push(`VOLUME ${JSON.stringify(WORKER_VOLUMES)}`, "");
  }
  lines.push(
    "# Account mapped to the operator so files in /data stay writable on the host.",
    `RUN useradd ${IMAGE_USER}${uidFlag} --groups sudo,tty`,
    `RUN echo "${IMAGE_USER}:password" | chpasswd`,
    "",
    "# Fail early if the base image does not ship the server.",
    "RUN pip show matrix-synapse",
    `RUN mkdir ${GUEST_MODULES_DIR}`,
  );

  if (config.workers.enabled) {
    lines.push("", ...workersSection());
  }

  for (const module of config.modules) {
    lines.push("", ...moduleSection(module));
  }

  lines.push("", "ENTRYPOINT []", "", `EXPOSE ${EXPOSED_PORTS.join(" ")}`, "");
  return lines.join("\n");
}

function workersSection(): string[] {
  const script = posix.join("/", WORKERS_SCRIPT);
  return [
    "# Worker mode: database, cache, load balancer and supervisor run in the same container.",
    `RUN apt-get update && apt-get install -y ${WORKER_PACKAGES.join(" ")}`,
    `COPY ${WORKERS_SCRIPT} ${script}`,
    `COPY ${WORKERS_CONF_DIR}/* /conf/`,
    `RUN chmod ugo+rx ${script} && chown ${IMAGE_USER} ${script}`,
  ];
}

function moduleSection(module: ModuleDeclaration): string[] {
  const guestDir = posix.join(GUEST_MODULES_DIR, module.name);
  const lines = [`# Module ${module.name}`, `RUN echo "${MODULE_MARKER} ${module.name}"`];
  for (const step of module.install) {
    lines.push(`RUN ${step}`);
  }
  for (const [key, value] of Object.entries(module.env)) {
    lines.push(`ENV ${key}=${JSON.stringify(value)}`);
  }
  lines.push(`COPY ${module.name} ${guestDir}`);
  for (const [dest, source] of Object.entries(module.copy)) {
    lines.push(`COPY ${source} ${posix.join(guestDir, dest)}`);
  }
  lines.push(`RUN /usr/local/bin/python -m pip install ${guestDir}`);
  return lines;
}

/** Module named by a marker line of the build output, if any. */
export function moduleFromMarker(line: string): string | undefined {
  const index = line.indexOf(MODULE_MARKER);
  if (index === -1) return undefined;
  const match = /^\s*([a-zA-Z0-9][a-zA-Z0-9_.-]*)/.exec(line.slice(index + MODULE_MARKER.length));
  return match?.[1];
}
