import { join } from "node:path";
import type { SuiteConfig } from "./config/types.js";

/**
 * On-disk layout of a suite, all below `<directories.root>/<name>`.
 *
 *   synapse/           staging dir: module sources, Dockerfile, overlay (build context)
 *   synapse/data/      bound to /data in the containers
 *   synapse/workers/   worker configuration (worker mode), bound to /conf/workers
 *   etc/nginx/         load balancer configuration (worker mode)
 *   etc/supervisor/    process supervisor configuration (worker mode)
 *   logs/docker/       build and container output
 *   logs/nginx/        load balancer logs (worker mode)
 *   logs/workers/      worker logs (worker mode)
 *   logs/scripts/      operator script output
 *   scripts/           script scratch space, never cleared
 */

export function testRoot(config: SuiteConfig): string {
  return join(config.directories.root, config.name);
}

export function synapseRoot(config: SuiteConfig): string {
  return join(testRoot(config), "synapse");
}

export function synapseDataDir(config: SuiteConfig): string {
  return join(synapseRoot(config), "data");
}

export function moduleDir(config: SuiteConfig, moduleName: string): string {
  return join(synapseRoot(config), moduleName);
}

export function overlayPath(config: SuiteConfig): string {
  return join(synapseRoot(config), OVERLAY_FILE);
}

export function generatedConfigPath(config: SuiteConfig): string {
  return join(synapseDataDir(config), "homeserver.yaml");
}

export function workersConfigDir(config: SuiteConfig): string {
  return join(synapseRoot(config), "workers");
}

export function workersSharedConfigPath(config: SuiteConfig): string {
  return join(workersConfigDir(config), "shared.yaml");
}

export function etcDir(config: SuiteConfig): string {
  return join(testRoot(config), "etc");
}

export function logsDir(config: SuiteConfig): string {
  return join(testRoot(config), "logs");
}

export function dockerLogsDir(config: SuiteConfig): string {
  return join(logsDir(config), "docker");
}

export function nginxLogsDir(config: SuiteConfig): string {
  return join(logsDir(config), "nginx");
}

export function workerLogsDir(config: SuiteConfig): string {
  return join(logsDir(config), "workers");
}

export function scriptLogsDir(config: SuiteConfig): string {
  return join(logsDir(config), "scripts");
}

export function scriptTmpDir(config: SuiteConfig): string {
  return join(testRoot(config), "scripts");
}

export const OVERLAY_FILE = "homeserver.overlay.yaml";
