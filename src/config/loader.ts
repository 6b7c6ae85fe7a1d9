/**
 * Suite configuration loader.
 *
 * Reads mx-testbed.yml, validates it against the zod schema, applies
 * command-line overrides and the cross-field checks (duplicate users and
 * aliases, foreign alias servers, unknown room members). Every problem is reported at once as a
 * ConfigurationError before anything touches Docker or the filesystem.
 */

import { readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import {
  DEFAULT_HOST_PORT,
  DEFAULT_REGISTRATION_SHARED_SECRET,
  PROVISIONER_ADMIN,
  type SuiteFile,
  suiteFileSchema,
} from "./schema.js";
import type {
  ConfigOverrides,
  ModuleDeclaration,
  RoomDeclaration,
  ScriptLists,
  SuiteConfig,
  UserDeclaration,
} from "./types.js";

export const DEFAULT_CONFIG_FILE = "mx-testbed.yml";

const SAFE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/** Load and validate a configuration file. */
export function loadConfig(path: string, overrides: ConfigOverrides = {}): SuiteConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError([`Could not read ${path}: ${errorMessage(err)}`]);
  }
  return parseConfig(text, overrides);
}

/** Validate a configuration document given as YAML text. */
export function parseConfig(text: string, overrides: ConfigOverrides = {}): SuiteConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    throw new ConfigurationError([`Invalid YAML: ${errorMessage(err)}`]);
  }

  const parsed = suiteFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }

  const config = toSuiteConfig(parsed.data, overrides);
  const issues = validateSuite(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return deepFreeze(config);
}

function toSuiteConfig(file: SuiteFile, overrides: ConfigOverrides): SuiteConfig {
  const {
    host_port: hostPortSetting,
    server_name: serverNameSetting,
    public_baseurl: publicBaseurlSetting,
    registration_shared_secret: secretSetting,
    ...extra
  } = file.homeserver;
  const hostPort = hostPortSetting ?? DEFAULT_HOST_PORT;

  return {
    name: file.name,
    scripts: toScriptLists(file),
    modules: file.modules.map(
      (m): ModuleDeclaration => ({
        name: m.name,
        build: m.build,
        install: m.install ?? [],
        env: m.env,
        copy: m.copy,
        config: m.config,
      }),
    ),
    homeserver: {
      hostPort,
      serverName: serverNameSetting ?? `localhost:${hostPort}`,
      publicBaseurl: publicBaseurlSetting ?? `http://localhost:${hostPort}`,
      registrationSharedSecret: secretSetting ?? DEFAULT_REGISTRATION_SHARED_SECRET,
      extra,
    },
    users: file.users.map(
      (u): UserDeclaration => ({
        localname: u.localname,
        admin: u.admin,
        password: u.password,
        rateLimit: u.rate_limit,
        rooms: u.rooms.map(
          (r): RoomDeclaration => ({
            public: r.public,
            name: r.name,
            alias: r.alias === undefined ? undefined : aliasLocalpart(r.alias),
            aliasServer: r.alias === undefined ? undefined : aliasServerPart(r.alias),
            topic: r.topic,
            members: r.members,
          }),
        ),
      }),
    ),
    synapseImage: overrides.synapseTag ? `matrixdotorg/synapse:${overrides.synapseTag}` : file.synapse.docker,
    docker: {
      hostname: file.docker.hostname,
      portMapping: file.docker.port_mapping,
    },
    credentials: {
      username: overrides.username ?? file.credentials.username,
      password: overrides.password ?? file.credentials.password,
      serveraddress: overrides.serveraddress ?? file.credentials.serveraddress,
    },
    workers: {
      enabled: overrides.workers ?? file.workers.enabled,
      resources: resolveOptional(overrides.workersResources ?? file.workers.resources),
    },
    directories: { root: resolve(overrides.root ?? file.directories.root ?? join(tmpdir(), "mx-testbed")) },
    autocleanOnError: overrides.autocleanOnError ?? file.autoclean_on_error,
  };
}

function resolveOptional(path: string | undefined): string | undefined {
  return path === undefined ? undefined : resolve(path);
}

function toScriptLists(file: SuiteFile): ScriptLists {
  let upBefore: string[] = [];
  let upAfter: string[] = [];
  if (Array.isArray(file.up)) {
    upBefore = file.up;
  } else if (file.up) {
    upBefore = file.up.before ?? [];
    upAfter = file.up.after ?? [];
  }

  const flat = { success: file.success, failure: file.failure, finally: file.finally };
  const usesFlatDown = Object.values(flat).some((v) => v !== undefined);
  if (usesFlatDown) {
    logger.warn("[config] Top-level success/failure/finally are deprecated, move them under `down`");
  }
  const down = file.down ?? {};

  return {
    "up.before": upBefore,
    "up.after": upAfter,
    run: file.run ?? [],
    "down.success": down.success ?? flat.success ?? [],
    "down.failure": down.failure ?? flat.failure ?? [],
    "down.finally": down.finally ?? flat.finally ?? [],
  };
}

/** `#lobby:example.org`, `#lobby` and `lobby` all have the local part `lobby`. */
export function aliasLocalpart(alias: string): string {
  const withoutSigil = alias.startsWith("#") ? alias.slice(1) : alias;
  const colon = withoutSigil.indexOf(":");
  return colon === -1 ? withoutSigil : withoutSigil.slice(0, colon);
}

/** `example.org` for `#lobby:example.org`, undefined when the alias names no server. */
export function aliasServerPart(alias: string): string | undefined {
  const colon = alias.indexOf(":");
  return colon === -1 ? undefined : alias.slice(colon + 1);
}

/** Cross-field checks the schema cannot express. Returns one message per problem. */
export function validateSuite(config: SuiteConfig): string[] {
  const issues: string[] = [];

  if (!SAFE_NAME.test(config.name)) {
    issues.push(`name: "${config.name}" must be alphanumeric with '-', '_' or '.' and not start with a symbol`);
  }

  const moduleNames = new Set<string>();
  for (const module of config.modules) {
    if (!SAFE_NAME.test(module.name)) {
      issues.push(`modules: "${module.name}" is not a valid directory name`);
    }
    if (moduleNames.has(module.name)) {
      issues.push(`modules: duplicate module name "${module.name}"`);
    }
    moduleNames.add(module.name);
  }

  if (config.workers.enabled && config.workers.resources === undefined) {
    issues.push("workers.resources: worker mode needs the directory holding workers_start.py and conf/");
  }

  const overlayModules = config.homeserver.extra.modules;
  if (overlayModules !== undefined && overlayModules !== null && !Array.isArray(overlayModules)) {
    issues.push("homeserver.modules: expected a list");
  }

  const localnames = new Set<string>();
  for (const user of config.users) {
    if (user.localname === PROVISIONER_ADMIN) {
      issues.push(`users: "${PROVISIONER_ADMIN}" is reserved for the provisioner's own admin account`);
    }
    if (localnames.has(user.localname)) {
      issues.push(`users: duplicate localname "${user.localname}"`);
    }
    localnames.add(user.localname);
  }

  const aliases = new Map<string, string>();
  for (const user of config.users) {
    for (const room of user.rooms) {
      for (const member of room.members) {
        if (!localnames.has(member)) {
          issues.push(`users.${user.localname}.rooms: member "${member}" is not a declared user`);
        }
      }
      if (room.alias === undefined) continue;
      if (room.alias.length === 0) {
        issues.push(`users.${user.localname}.rooms: empty alias`);
        continue;
      }
      if (room.aliasServer !== undefined && room.aliasServer !== config.homeserver.serverName) {
        issues.push(
          `users.${user.localname}.rooms: alias "#${room.alias}:${room.aliasServer}" is not on server "${config.homeserver.serverName}"`,
        );
      }
      const owner = aliases.get(room.alias);
      if (owner !== undefined) {
        issues.push(`users.${user.localname}.rooms: alias "#${room.alias}" already declared by user "${owner}"`);
      } else {
        aliases.set(room.alias, user.localname);
      }
    }
  }

  return issues;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
