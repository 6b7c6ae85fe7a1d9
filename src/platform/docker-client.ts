/**
 * Dockerode wrapper with error handling.
 *
 * Thin layer around the dockerode client that standardises error messages
 * and tells "already gone" apart from real failures on teardown paths.
 */

import Docker from "dockerode";
import { ContainerEngineError, errorMessage, type Phase } from "../errors.js";
import { logger } from "../logger.js";

let _docker: Docker | undefined;

/** Return a singleton Dockerode client. */
export function getDocker(): Docker {
  if (!_docker) {
    _docker = new Docker();
  }
  return _docker;
}

/** Replace the singleton, e.g. with a mock in tests. */
export function setDocker(docker: Docker): void {
  _docker = docker;
}

/**
 * True for engine answers meaning the resource is already in the requested
 * state: 404 (no such container/network/image) and 304 (already stopped).
 */
export function isAbsentError(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("statusCode" in err)) return false;
  return err.statusCode === 404 || err.statusCode === 304;
}

/**
 * Wrap a docker API call with a human-readable error context.
 */
export async function dockerCall<T>(label: string, phase: Phase, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    if (err instanceof ContainerEngineError) throw err;
    throw new ContainerEngineError(label, errorMessage(err), phase, { cause: err });
  }
}

/**
 * Run a removal-style call, treating an absent resource as success.
 * Resolves to false when there was nothing to act on.
 */
export async function ignoreAbsent(label: string, phase: Phase, fn: () => Promise<unknown>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err: unknown) {
    if (isAbsentError(err)) {
      logger.debug(`[docker] ${label}: nothing to do (${errorMessage(err)})`);
      return false;
    }
    throw new ContainerEngineError(label, errorMessage(err), phase, { cause: err });
  }
}
