/**
 * Container lifecycle types.
 */

/** Runtime view of the server started by `up`. Never persisted. */
export interface ServerHandle {
  networkName: string;
  containerName: string;
  containerId?: string;
  hostPort: number;
  /** Base URL of the client-server API as seen from the host. */
  baseUrl: string;
  reachable: boolean;
}

export interface BuildProgressEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
}

/** Alias under which containers reach the host. */
export const HOST_ALIAS = "host.docker.internal";
/** The server container restarts on failure at most this many times. */
export const MAX_RESTART_COUNT = 20;
/** Memory reserved for the server container. */
export const MEMORY_RESERVATION_BYTES = 4 * 1024 * 1024 * 1024;
/** Prefix of the marker step that opens each module's section of the Dockerfile. */
export const MODULE_MARKER = "mx-testbed-module:";
/** Directory of the image holding module sources. */
export const GUEST_MODULES_DIR = "/mx-testbed";
/** Worker-mode entry point, staged next to the Dockerfile and copied to the image root. */
export const WORKERS_SCRIPT = "workers_start.py";
/** Staged directory of templates the worker entry point renders, copied to /conf. */
export const WORKERS_CONF_DIR = "conf";
/** Guest directories bound to the host in worker mode. */
export const WORKER_VOLUMES = ["/data", "/conf/workers", "/etc/nginx/conf.d", "/etc/supervisor/conf.d", "/var/log/workers"];
/** Packages the worker entry point expects next to the server. */
export const WORKER_PACKAGES = ["postgresql", "postgresql-client-13", "supervisor", "redis", "nginx", "sudo", "lsof"];
