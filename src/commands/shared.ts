/**
 * Shared utilities for CLI commands.
 */
import { DEFAULT_CONFIG_FILE } from "../config/loader.js";
import type { ConfigOverrides } from "../config/types.js";
import { ConfigurationError } from "../errors.js";
import { VERB_ORDER, type Verb } from "../orchestrator/orchestrator.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID = 2;

export const DEFAULT_VERBS: readonly Verb[] = ["up", "run", "down"];

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(["workers", "no-autoclean-on-error", "help"]);
const SHORT_FLAGS: Record<string, string> = { c: "config", u: "username", p: "password", h: "help" };

/** Parse flags and positional args from argv slice */
export function parseFlags(args: string[]): { flags: Record<string, string | boolean>; positional: string[] } {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let key: string | undefined;
    if (arg.startsWith("--")) {
      key = arg.slice(2);
    } else if (arg.startsWith("-") && arg.length === 2) {
      key = SHORT_FLAGS[arg.slice(1)] ?? arg.slice(1);
    }
    if (key === undefined) {
      positional.push(arg);
      continue;
    }

    const eq = key.indexOf("=");
    if (eq !== -1) {
      flags[key.slice(0, eq)] = key.slice(eq + 1);
    } else if (!BOOLEAN_FLAGS.has(key) && i + 1 < args.length && !args[i + 1].startsWith("-")) {
      flags[key] = args[++i];
    } else {
      flags[key] = true;
    }
  }

  return { flags, positional };
}

export interface CliOptions {
  verbs: Verb[];
  configPath: string;
  overrides: ConfigOverrides;
  help: boolean;
}

function isVerb(value: string): value is Verb {
  return VERB_ORDER.some((verb) => verb === value);
}

/** Turn argv into verbs, config path and overrides. Unknown input is a ConfigurationError. */
export function parseArgs(args: string[]): CliOptions {
  const { flags, positional } = parseFlags(args);
  const issues: string[] = [];

  const verbs: Verb[] = [];
  for (const word of positional) {
    if (isVerb(word)) verbs.push(word);
    else issues.push(`unknown command "${word}", expected one of ${VERB_ORDER.join(", ")}`);
  }

  const text = (name: string): string | undefined => {
    const value = flags[name];
    if (value === undefined) return undefined;
    if (typeof value === "string") return value;
    issues.push(`--${name} expects a value`);
    return undefined;
  };

  const known = new Set([
    "config",
    "username",
    "password",
    "server",
    "root",
    "synapse-tag",
    "workers-resources",
    ...BOOLEAN_FLAGS,
  ]);
  for (const name of Object.keys(flags)) {
    if (!known.has(name)) issues.push(`unknown option --${name}`);
  }

  const overrides: ConfigOverrides = {
    username: text("username"),
    password: text("password"),
    serveraddress: text("server"),
    root: text("root"),
    synapseTag: text("synapse-tag"),
    workersResources: text("workers-resources"),
  };
  if (flags.workers === true) overrides.workers = true;
  if (flags["no-autoclean-on-error"] === true) overrides.autocleanOnError = false;
  const configPath = text("config") ?? DEFAULT_CONFIG_FILE;

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return {
    verbs: verbs.length > 0 ? verbs : [...DEFAULT_VERBS],
    configPath,
    overrides,
    help: flags.help === true,
  };
}
