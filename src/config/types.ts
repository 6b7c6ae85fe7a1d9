/**
 * In-memory suite configuration, as produced by `loadConfig`.
 *
 * Everything here is frozen once loaded; the orchestrator owns it for the
 * duration of a run.
 */

/** Arbitrary YAML-compatible value, used for the server configuration overlay. */
export type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

export type ConfigMap = { [key: string]: ConfigValue };

/** Script lists, keyed by the transition they run at. */
export type ScriptStage = "up.before" | "up.after" | "run" | "down.success" | "down.failure" | "down.finally";

export type ScriptLists = Record<ScriptStage, readonly string[]>;

export interface ModuleDeclaration {
  name: string;
  /** Runs on the host; must populate MX_TEST_MODULE_DIR. */
  build: readonly string[];
  /** Runs inside the image, one `RUN` per line. */
  install: readonly string[];
  env: Readonly<Record<string, string>>;
  /** Guest path (relative to the module directory) to source path (relative to the staging directory). */
  copy: Readonly<Record<string, string>>;
  /** Appended to the server's `modules` list. */
  config: ConfigValue;
}

export type RateLimit = "unlimited" | "inherited";

export interface RoomDeclaration {
  public: boolean;
  name?: string;
  /** Local part of the alias, without `#` or server name. */
  alias?: string;
  /** Server part the alias was declared with, if any. Must match the server name. */
  aliasServer?: string;
  topic?: string;
  /** Local names of the users that must be joined. */
  members: readonly string[];
}

export interface UserDeclaration {
  localname: string;
  admin: boolean;
  password: string;
  rateLimit: RateLimit;
  rooms: readonly RoomDeclaration[];
}

export interface HomeserverSettings {
  hostPort: number;
  serverName: string;
  publicBaseurl: string;
  registrationSharedSecret: string;
  /** Every other `homeserver.*` key, merged verbatim into the server configuration. */
  extra: Readonly<ConfigMap>;
}

export interface PortMapping {
  host: number;
  guest: number;
}

export interface DockerSettings {
  hostname: string;
  portMapping: readonly PortMapping[];
}

export interface RegistryCredentials {
  username?: string;
  password?: string;
  serveraddress?: string;
}

export interface SuiteConfig {
  name: string;
  scripts: ScriptLists;
  modules: readonly ModuleDeclaration[];
  homeserver: HomeserverSettings;
  users: readonly UserDeclaration[];
  /** Base image the derived server image is built from. */
  synapseImage: string;
  docker: DockerSettings;
  credentials: RegistryCredentials;
  workers: {
    enabled: boolean;
    /** Absolute path of the directory holding `workers_start.py` and `conf/`. */
    resources?: string;
  };
  directories: { root: string };
  autocleanOnError: boolean;
}

/** Command-line values that take precedence over the file. */
export interface ConfigOverrides {
  username?: string;
  password?: string;
  serveraddress?: string;
  root?: string;
  workers?: boolean;
  workersResources?: string;
  synapseTag?: string;
  autocleanOnError?: boolean;
}
