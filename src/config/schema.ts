import { z } from "zod";
import type { ConfigValue } from "./types.js";

/**
 * Zod schema for mx-testbed.yml.
 *
 * Mirrors the file layout (snake_case keys). `loadConfig` turns the parsed
 * document into a `SuiteConfig`.
 */

export const DEFAULT_SYNAPSE_IMAGE = "matrixdotorg/synapse:latest";
export const DEFAULT_HOST_PORT = 9999;
export const DEFAULT_REGISTRATION_SHARED_SECRET = "MX_TESTER_REGISTRATION_DEFAULT";
export const DEFAULT_PASSWORD = "password";
export const DEFAULT_HOSTNAME = "synapse";
/** Account the provisioner uses for admin-only calls (rate-limit overrides, alias removal). */
export const PROVISIONER_ADMIN = "mx-testbed-admin";

export const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(configValueSchema), z.record(configValueSchema)]),
);

/** A script is a list of shell lines; a single string is accepted as a one-line script. */
const scriptSchema = z.union([z.string().transform((line) => [line]), z.array(z.string())]);

const upSchema = z.union([
  scriptSchema,
  z.object({
    before: scriptSchema.optional(),
    after: scriptSchema.optional(),
  }),
]);

const downSchema = z.object({
  success: scriptSchema.optional(),
  failure: scriptSchema.optional(),
  finally: scriptSchema.optional(),
});

const roomSchema = z.object({
  public: z.boolean().default(false),
  name: z.string().optional(),
  alias: z.string().min(1).optional(),
  topic: z.string().optional(),
  members: z.array(z.string().min(1)).default([]),
});

const userSchema = z.object({
  localname: z.string().min(1),
  admin: z.boolean().default(false),
  password: z.string().default(DEFAULT_PASSWORD),
  rate_limit: z.enum(["unlimited", "inherited"]).default("inherited"),
  rooms: z.array(roomSchema).default([]),
});

const moduleSchema = z.object({
  name: z.string().min(1),
  build: scriptSchema,
  install: scriptSchema.optional(),
  env: z.record(z.string()).default({}),
  copy: z.record(z.string()).default({}),
  config: configValueSchema,
});

const homeserverSchema = z
  .object({
    host_port: z.number().int().min(1).max(65_535).optional(),
    server_name: z.string().min(1).optional(),
    public_baseurl: z.string().url().optional(),
    registration_shared_secret: z.string().min(1).optional(),
  })
  .catchall(configValueSchema);

const synapseSchema = z.object({
  docker: z
    .union([z.string().min(1), z.object({ tag: z.string().min(1) }).transform((v) => v.tag)])
    .default(DEFAULT_SYNAPSE_IMAGE),
});

const portMappingSchema = z.object({
  host: z.number().int().min(1).max(65_535),
  guest: z.number().int().min(1).max(65_535),
});

const dockerSchema = z.object({
  hostname: z.string().min(1).default(DEFAULT_HOSTNAME),
  port_mapping: z.array(portMappingSchema).default([]),
});

const credentialsSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
  serveraddress: z.string().optional(),
});

export const suiteFileSchema = z.object({
  name: z.string().min(1),
  up: upSchema.optional(),
  run: scriptSchema.optional(),
  down: downSchema.optional(),
  // Deprecated flat form of `down`.
  success: scriptSchema.optional(),
  failure: scriptSchema.optional(),
  finally: scriptSchema.optional(),
  modules: z.array(moduleSchema).default([]),
  homeserver: homeserverSchema.default(() => ({})),
  users: z.array(userSchema).default([]),
  synapse: synapseSchema.default(() => ({ docker: DEFAULT_SYNAPSE_IMAGE })),
  docker: dockerSchema.default(() => ({ hostname: DEFAULT_HOSTNAME, port_mapping: [] })),
  credentials: credentialsSchema.default(() => ({})),
  workers: z
    .object({ enabled: z.boolean().default(false), resources: z.string().min(1).optional() })
    .default(() => ({ enabled: false })),
  directories: z.object({ root: z.string().min(1).optional() }).default(() => ({})),
  autoclean_on_error: z.boolean().default(true),
});

export type SuiteFile = z.infer<typeof suiteFileSchema>;
