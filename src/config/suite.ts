/**
 * Names and environment derived from a suite configuration.
 *
 * Everything is a pure function of the configuration so that a bare
 * `down` in a fresh process finds the resources an earlier `up` created.
 */

import { mkdirSync } from "node:fs";
import { moduleDir, scriptTmpDir, synapseRoot } from "../paths.js";
import type { SuiteConfig } from "./types.js";

/** Tag of the derived server image. */
export function imageTag(config: SuiteConfig): string {
  const base = config.synapseImage.toLowerCase().replace(/[^a-z0-9_.-]+/g, "-");
  return `mx-testbed-synapse-${base}-${config.name.toLowerCase()}${workersSuffix(config)}`;
}

/** One network per image tag, so suites on different server versions never share one. */
export function networkName(config: SuiteConfig): string {
  return `net-${imageTag(config)}`;
}

/** Container that runs `generate` to produce homeserver.yaml. */
export function setupContainerName(config: SuiteConfig): string {
  return `mx-testbed-synapse-setup-${config.name}${workersSuffix(config)}`;
}

/** Container that serves during up, run and down. */
export function runContainerName(config: SuiteConfig): string {
  return `mx-testbed-synapse-run-${config.name}${workersSuffix(config)}`;
}

function workersSuffix(config: SuiteConfig): string {
  return config.workers.enabled ? "-workers" : "";
}

export const ENV_MODULE_DIR = "MX_TEST_MODULE_DIR";
export const ENV_SYNAPSE_DIR = "MX_TEST_SYNAPSE_DIR";
export const ENV_SCRIPT_TMPDIR = "MX_TEST_SCRIPT_TMPDIR";
export const ENV_CWD = "MX_TEST_CWD";
export const ENV_WORKERS_ENABLED = "MX_TEST_WORKERS_ENABLED";
export const ENV_NETWORK_NAME = "MX_TEST_NETWORK_NAME";
export const ENV_SETUP_CONTAINER_NAME = "MX_TEST_SETUP_CONTAINER_NAME";
export const ENV_RUN_CONTAINER_NAME = "MX_TEST_UP_RUN_DOWN_CONTAINER_NAME";

export type ExecutionEnvironment = Readonly<Record<string, string>>;

export interface EnvironmentOptions {
  /** Set while building a module; other phases see the staging root. */
  module?: string;
  /** The operator's working directory. Defaults to process.cwd(). */
  cwd?: string;
}

/**
 * Build the variables handed to every operator script.
 * Creates the scratch directory if it does not exist yet.
 */
export function scriptEnvironment(config: SuiteConfig, options: EnvironmentOptions = {}): ExecutionEnvironment {
  const tmp = scriptTmpDir(config);
  mkdirSync(tmp, { recursive: true });

  const env: Record<string, string> = {
    [ENV_MODULE_DIR]: options.module ? moduleDir(config, options.module) : synapseRoot(config),
    [ENV_SYNAPSE_DIR]: synapseRoot(config),
    [ENV_SCRIPT_TMPDIR]: tmp,
    [ENV_CWD]: options.cwd ?? process.cwd(),
    [ENV_NETWORK_NAME]: networkName(config),
    [ENV_SETUP_CONTAINER_NAME]: setupContainerName(config),
    [ENV_RUN_CONTAINER_NAME]: runContainerName(config),
  };
  if (config.workers.enabled) {
    env[ENV_WORKERS_ENABLED] = "true";
  }
  return Object.freeze(env);
}
