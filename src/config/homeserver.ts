/**
 * Server configuration overlay.
 *
 * `buildOverlay` computes, at build time, every homeserver.yaml key the
 * suite controls. `mergeOverlay` applies it to the file the server
 * generates on first start. In worker mode, `patchWorkersShared` gives
 * every worker the modules and the shared database.
 */

import type { ConfigMap, ConfigValue, SuiteConfig } from "./types.js";

/** HTTP port of the server (or of the load balancer in worker mode) inside the container. */
export const GUEST_HTTP_PORT = 8008;
/** In worker mode, the main process listens here instead. */
export const MAIN_PROCESS_HTTP_PORT = 8080;
export const REPLICATION_PORT = 9093;

/** Overlay value meaning "drop the key, let the server use its own default". */
export const SERVER_DEFAULT = "synapse-default";

const LARGE_RATE_LIMIT: ConfigMap = { per_second: 1_000_000_000, burst_count: 1_000_000_000 };

function defaultRateLimits(): ConfigMap {
  return {
    rc_message: { ...LARGE_RATE_LIMIT },
    rc_registration: { ...LARGE_RATE_LIMIT },
    rc_admin_redaction: { ...LARGE_RATE_LIMIT },
    rc_login: {
      address: { ...LARGE_RATE_LIMIT },
      account: { ...LARGE_RATE_LIMIT },
      failed_attempts: { ...LARGE_RATE_LIMIT },
    },
    rc_invites: {
      per_room: { ...LARGE_RATE_LIMIT },
      per_user: { ...LARGE_RATE_LIMIT },
      per_sender: { ...LARGE_RATE_LIMIT },
    },
  };
}

function workerDatabase(): ConfigMap {
  return {
    name: "psycopg2",
    txn_limit: 10_000,
    args: {
      user: "synapse",
      password: "password",
      host: "localhost",
      port: 5432,
      cp_min: 5,
      cp_max: 10,
    },
  };
}

function listeners(workers: boolean): ConfigValue[] {
  const http: ConfigMap = {
    port: workers ? MAIN_PROCESS_HTTP_PORT : GUEST_HTTP_PORT,
    tls: false,
    type: "http",
    bind_addresses: ["::"],
    x_forwarded: false,
    resources: [
      { names: ["client"], compress: true },
      { names: ["federation"], compress: false },
    ],
  };
  if (!workers) return [http];
  return [
    http,
    {
      port: REPLICATION_PORT,
      bind_address: "127.0.0.1",
      type: "http",
      resources: [{ names: ["replication"] }],
    },
  ];
}

export function buildOverlay(config: SuiteConfig): ConfigMap {
  const { homeserver } = config;
  const overlay: ConfigMap = {
    public_baseurl: homeserver.publicBaseurl,
    server_name: homeserver.serverName,
    registration_shared_secret: homeserver.registrationSharedSecret,
    enable_registration_without_verification: true,
  };

  for (const [key, value] of Object.entries(homeserver.extra)) {
    overlay[key] = value;
  }

  for (const [key, limit] of Object.entries(defaultRateLimits())) {
    if (!(key in overlay)) {
      overlay[key] = limit;
    } else if (overlay[key] === SERVER_DEFAULT) {
      delete overlay[key];
    }
  }

  overlay.listeners = listeners(config.workers.enabled);

  const extraModules = homeserver.extra.modules;
  overlay.modules = [...(Array.isArray(extraModules) ? extraModules : []), ...config.modules.map((m) => m.config)];

  if (config.workers.enabled) {
    Object.assign(overlay, {
      redis: { enabled: true },
      database: workerDatabase(),
      notify_appservices: false,
      send_federation: false,
      update_user_directory: false,
      start_pushers: false,
      url_preview_enabled: false,
      url_preview_ip_range_blacklist: ["255.255.255.255/32"],
      suppress_key_server_warning: true,
    } satisfies ConfigMap);
  }

  return overlay;
}

/**
 * Apply an overlay to a generated configuration. Top-level keys are
 * replaced; `modules` is appended to whatever the server generated.
 */
export function mergeOverlay(generated: ConfigMap, overlay: ConfigMap): ConfigMap {
  const merged: ConfigMap = { ...generated };
  for (const [key, value] of Object.entries(overlay)) {
    if (key === "modules") continue;
    merged[key] = value;
  }

  const existing = generated.modules;
  if (existing !== undefined && existing !== null && !Array.isArray(existing)) {
    throw new Error("In homeserver.yaml, expected a sequence for key `modules`");
  }
  const added = Array.isArray(overlay.modules) ? overlay.modules : [];
  merged.modules = [...(existing ?? []), ...added];
  return merged;
}

/** Patch the `shared.yaml` the worker entry point writes on `generate`. */
export function patchWorkersShared(shared: ConfigMap, config: SuiteConfig): ConfigMap {
  const existing = shared.modules;
  if (existing !== undefined && existing !== null && !Array.isArray(existing)) {
    throw new Error("In shared.yaml, expected a sequence for key `modules`");
  }
  return {
    ...shared,
    modules: [...(existing ?? []), ...config.modules.map((m) => m.config)],
    url_preview_enabled: false,
    url_preview_ip_range_blacklist: ["255.255.255.255/32"],
    database: workerDatabase(),
  };
}

export function isConfigMap(value: unknown): value is ConfigMap {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
