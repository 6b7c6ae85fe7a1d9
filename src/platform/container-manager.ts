/**
 * ContainerManager: image build, network, setup and server containers for
 * one suite, via the Docker Engine API.
 *
 * Every teardown call treats an already-absent resource as success, so a
 * bare `down` after a crash (or after an earlier `down`) does not fail.
 */

import { cpSync, existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type Docker from "dockerode";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import {
  GUEST_HTTP_PORT,
  MAIN_PROCESS_HTTP_PORT,
  buildOverlay,
  isConfigMap,
  mergeOverlay,
  patchWorkersShared,
} from "../config/homeserver.js";
import { imageTag, networkName, runContainerName, scriptEnvironment, setupContainerName } from "../config/suite.js";
import type { ConfigMap, RegistryCredentials, SuiteConfig } from "../config/types.js";
import { ContainerEngineError, type Phase, errorMessage } from "../errors.js";
import type { ScriptExecutor } from "../exec/script-runner.js";
import { logger } from "../logger.js";
import {
  dockerLogsDir,
  etcDir,
  generatedConfigPath,
  logsDir,
  moduleDir,
  nginxLogsDir,
  overlayPath,
  synapseDataDir,
  synapseRoot,
  workerLogsDir,
  workersConfigDir,
  workersSharedConfigPath,
} from "../paths.js";
import { dockerCall, getDocker, ignoreAbsent } from "./docker-client.js";
import { moduleFromMarker, renderDockerfile } from "./dockerfile.js";
import { followLogs } from "./log-follower.js";
import type { BuildProgressEvent, ServerHandle } from "./types.js";
import {
  HOST_ALIAS,
  MAX_RESTART_COUNT,
  MEMORY_RESERVATION_BYTES,
  WORKERS_CONF_DIR,
  WORKERS_SCRIPT,
  WORKER_VOLUMES,
} from "./types.js";

const DOCKER_HUB = "https://index.docker.io/v1/";

/** Database and role the worker entry point creates, unless the resources bring their own. */
const POSTGRES_SQL = new URL("../../resources/workers/postgres.sql", import.meta.url);

const WORKER_TYPES = [
  "event_persister",
  "event_persister",
  "background_worker",
  "frontend_proxy",
  "event_creator",
  "user_dir",
  "media_repository",
  "federation_inbound",
  "federation_reader",
  "federation_sender",
  "synchrotron",
  "appservice",
  "pusher",
];

const progressEventSchema = z.object({
  stream: z.string().optional(),
  status: z.string().optional(),
  error: z.string().optional(),
  errorDetail: z.object({ message: z.string().optional() }).optional(),
});
const waitResultSchema = z.object({ StatusCode: z.number() });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function authConfig(
  credentials: RegistryCredentials,
): { username: string; password: string; serveraddress: string } | undefined {
  if (!credentials.username || !credentials.password) return undefined;
  return {
    username: credentials.username,
    password: credentials.password,
    serveraddress: credentials.serveraddress ?? DOCKER_HUB,
  };
}

function containerUser(): string | undefined {
  const uid = process.getuid?.();
  return uid === undefined ? undefined : String(uid);
}

function serverEnv(config: SuiteConfig): string[] {
  const env = [
    `SYNAPSE_SERVER_NAME=${config.homeserver.serverName}`,
    "SYNAPSE_REPORT_STATS=no",
    "SYNAPSE_CONFIG_DIR=/data",
    `SYNAPSE_HTTP_PORT=${config.workers.enabled ? MAIN_PROCESS_HTTP_PORT : GUEST_HTTP_PORT}`,
  ];
  if (config.workers.enabled) {
    env.push(`SYNAPSE_WORKER_TYPES=${WORKER_TYPES.join(", ")}`);
    env.push("SYNAPSE_WORKERS_WRITE_LOGS_TO_DISK=1");
  }
  return env;
}

/** Host directories bound into both the setup and the server container. */
function serverBinds(config: SuiteConfig): string[] {
  const binds = [`${synapseDataDir(config)}:/data:rw`];
  if (config.workers.enabled) {
    binds.push(
      `${workersConfigDir(config)}:/conf/workers:rw`,
      `${join(etcDir(config), "nginx")}:/etc/nginx/conf.d:rw`,
      `${join(etcDir(config), "supervisor")}:/etc/supervisor/conf.d:rw`,
      `${nginxLogsDir(config)}:/var/log/nginx:rw`,
      `${workerLogsDir(config)}:/var/log/workers:rw`,
    );
  }
  return binds;
}

/** Mount points declared on worker-mode containers. */
function serverVolumes(config: SuiteConfig): Pick<Docker.ContainerCreateOptions, "Volumes"> {
  if (!config.workers.enabled) return {};
  return { Volumes: Object.fromEntries(WORKER_VOLUMES.map((path): [string, Record<string, never>] => [path, {}])) };
}

function ensureWorkerDirs(config: SuiteConfig): void {
  if (!config.workers.enabled) return;
  for (const dir of [
    workersConfigDir(config),
    join(etcDir(config), "nginx"),
    join(etcDir(config), "supervisor"),
    nginxLogsDir(config),
    workerLogsDir(config),
  ]) {
    mkdirSync(dir, { recursive: true });
  }
}

function emptyDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
  mkdirSync(path, { recursive: true });
}

// ---------------------------------------------------------------------------
// ContainerManager
// ---------------------------------------------------------------------------

export class ContainerManager {
  private readonly docker: Docker;
  /** Log followers of running containers, drained on stop. */
  private readonly followers = new Map<string, Promise<void>>();

  constructor(
    private readonly scripts: ScriptExecutor,
    docker?: Docker,
  ) {
    this.docker = docker ?? getDocker();
  }

  // ------- build -------

  /**
   * Stage every module, render the Dockerfile and the configuration overlay,
   * then build the derived image. Resolves to the image tag.
   */
  async buildImage(config: SuiteConfig): Promise<string> {
    const tag = imageTag(config);
    await this.removeContainer(setupContainerName(config), "build");
    await this.removeContainer(runContainerName(config), "build");
    await ignoreAbsent(`remove image ${tag}`, "build", () => this.docker.getImage(tag).remove({ force: true }));

    const staging = synapseRoot(config);
    emptyDir(staging);
    emptyDir(logsDir(config));
    mkdirSync(dockerLogsDir(config), { recursive: true });

    for (const module of config.modules) {
      const dir = moduleDir(config, module.name);
      mkdirSync(dir, { recursive: true });
      logger.info(`[build] Building module ${module.name} in ${dir}`);
      await this.scripts.run({
        phase: "build",
        stage: "build",
        lines: module.build,
        env: scriptEnvironment(config, { module: module.name }),
        module: module.name,
      });
      if (readdirSync(dir).length === 0) {
        throw new ContainerEngineError("stage module", `build script left ${dir} empty`, "build", {
          module: module.name,
        });
      }
    }

    if (config.workers.enabled) {
      stageWorkerResources(config);
    }

    writeFileSync(overlayPath(config), stringifyYaml(buildOverlay(config)));
    writeFileSync(join(staging, "Dockerfile"), renderDockerfile(config, process.getuid?.()));
    mkdirSync(synapseDataDir(config), { recursive: true });
    ensureWorkerDirs(config);

    await this.pullBaseImage(config);

    const auth = authConfig(config.credentials);
    const registryconfig = auth
      ? { [auth.serveraddress]: { username: auth.username, password: auth.password } }
      : undefined;
    logger.info(`[build] Building image ${tag} from ${staging}`);
    const stream = await dockerCall("build image", "build", () =>
      this.docker.buildImage(
        { context: staging, src: readdirSync(staging) },
        { t: tag, nocache: true, rm: true, registryconfig },
      ),
    );

    const buildLog = join(dockerLogsDir(config), "build.log");
    const output: string[] = [];
    let currentModule: string | undefined;
    let failure: string | undefined;
    await this.followProgress(stream, "build", (event) => {
      if (event.stream) {
        output.push(event.stream);
        currentModule = moduleFromMarker(event.stream) ?? currentModule;
        const line = event.stream.trimEnd();
        if (line) logger.debug(`[build] ${line}`);
      }
      if (event.error) {
        failure = event.errorDetail?.message ?? event.error;
        output.push(`${failure}\n`);
      }
    });
    writeFileSync(buildLog, output.join(""));

    if (failure !== undefined) {
      throw new ContainerEngineError("build image", failure, "build", { module: currentModule });
    }
    logger.info(`[build] Image ${tag} ready, log in ${buildLog}`);
    return tag;
  }

  private async pullBaseImage(config: SuiteConfig): Promise<void> {
    const auth = authConfig(config.credentials);
    logger.info(`[build] Pulling ${config.synapseImage}`);
    const stream = await dockerCall(`pull ${config.synapseImage}`, "build", () =>
      this.docker.pull(config.synapseImage, auth ? { authconfig: auth } : {}),
    );
    await this.followProgress(stream, "build", (event) => {
      if (event.error) {
        throw new ContainerEngineError(`pull ${config.synapseImage}`, event.error, "build");
      }
    });
  }

  private followProgress(
    stream: NodeJS.ReadableStream,
    phase: Phase,
    onEvent: (event: BuildProgressEvent) => void,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let eventError: unknown;
      this.docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) reject(new ContainerEngineError("follow progress", err.message, phase, { cause: err }));
          else if (eventError !== undefined) reject(eventError);
          else resolve();
        },
        (obj: unknown) => {
          const parsed = progressEventSchema.safeParse(obj);
          if (!parsed.success || eventError !== undefined) return;
          try {
            onEvent(parsed.data);
          } catch (err) {
            eventError = err;
          }
        },
      );
    });
  }

  // ------- network -------

  async ensureNetwork(name: string): Promise<void> {
    try {
      await this.docker.getNetwork(name).inspect();
      logger.debug(`[docker] Network ${name} already exists`);
    } catch {
      logger.info(`[docker] Creating network ${name}`);
      await dockerCall(`create network ${name}`, "up", () =>
        this.docker.createNetwork({ Name: name, Driver: "bridge", Attachable: true }),
      );
    }
  }

  async removeNetwork(name: string): Promise<void> {
    if (await ignoreAbsent(`remove network ${name}`, "down", () => this.docker.getNetwork(name).remove())) {
      logger.info(`[docker] Removed network ${name}`);
    }
  }

  // ------- setup container -------

  /**
   * Run the image's `generate` step in a throwaway container, then merge the
   * overlay staged at build time into the generated homeserver.yaml.
   */
  async generateConfig(config: SuiteConfig): Promise<void> {
    const name = setupContainerName(config);
    const target = generatedConfigPath(config);
    mkdirSync(synapseDataDir(config), { recursive: true });
    mkdirSync(dockerLogsDir(config), { recursive: true });
    ensureWorkerDirs(config);
    // A config left by an earlier `up` would already contain the merged modules.
    rmSync(target, { force: true });
    if (config.workers.enabled) rmSync(workersSharedConfigPath(config), { force: true });

    await this.removeContainer(name, "up");
    const container = await dockerCall(`create ${name}`, "up", () =>
      this.docker.createContainer({
        name,
        Image: imageTag(config),
        Cmd: config.workers.enabled ? ["/workers_start.py", "generate"] : ["/start.py", "generate"],
        Env: serverEnv(config),
        User: containerUser(),
        ...serverVolumes(config),
        HostConfig: {
          Binds: serverBinds(config),
          NetworkMode: networkName(config),
        },
      }),
    );

    logger.info(`[up] Generating homeserver.yaml in ${name}`);
    await dockerCall(`start ${name}`, "up", () => container.start());
    const logStream = await dockerCall(`logs ${name}`, "up", () =>
      container.logs({ follow: true, stdout: true, stderr: true }),
    );
    const drained = followLogs(logStream, join(dockerLogsDir(config), "setup.log")).catch((err: unknown) => {
      logger.warn(`[docker] Log follower for ${name} failed: ${errorMessage(err)}`);
    });
    let waited: unknown;
    try {
      waited = await dockerCall(`wait ${name}`, "up", () => container.wait());
    } catch (err) {
      // Removal ends the log stream; the follower settles on its own.
      await this.removeContainer(name, "up").catch((removeErr: unknown) => {
        logger.warn(`[docker] Could not remove ${name}: ${errorMessage(removeErr)}`);
      });
      throw err;
    }
    const { StatusCode } = waitResultSchema.parse(waited);
    await drained;
    await this.removeContainer(name, "up");

    if (StatusCode !== 0) {
      throw new ContainerEngineError(`generate in ${name}`, `exited with code ${StatusCode}`, "up");
    }

    let generated: unknown;
    let overlay: unknown;
    try {
      generated = parseYaml(readFileSync(target, "utf-8"));
      overlay = parseYaml(readFileSync(overlayPath(config), "utf-8"));
    } catch (err) {
      throw new ContainerEngineError("read homeserver.yaml", errorMessage(err), "up", { cause: err });
    }
    if (!isConfigMap(generated) || !isConfigMap(overlay)) {
      throw new ContainerEngineError("read homeserver.yaml", "expected a mapping at the top level", "up");
    }
    writeFileSync(target, stringifyYaml(mergeOverlay(generated, overlay)));
    logger.debug(`[up] Merged overlay into ${target}`);

    if (config.workers.enabled) {
      patchWorkersConfig(config);
    }
  }

  // ------- server container -------

  async startContainer(config: SuiteConfig): Promise<ServerHandle> {
    const name = runContainerName(config);
    const network = networkName(config);
    const { hostPort } = config.homeserver;

    const exposedPorts: Record<string, Record<string, never>> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    const bind = (guest: number, host: number) => {
      const key = `${guest}/tcp`;
      exposedPorts[key] = {};
      portBindings[key] = [...(portBindings[key] ?? []), { HostPort: String(host) }];
    };
    for (const mapping of config.docker.portMapping) {
      bind(mapping.guest, mapping.host);
    }
    bind(GUEST_HTTP_PORT, hostPort);

    const hostConfig: Docker.HostConfig = {
      Binds: serverBinds(config),
      PortBindings: portBindings,
      NetworkMode: network,
      ExtraHosts: [`${HOST_ALIAS}:host-gateway`],
      RestartPolicy: { Name: "on-failure", MaximumRetryCount: MAX_RESTART_COUNT },
      MemoryReservation: MEMORY_RESERVATION_BYTES,
      MemorySwap: -1,
      LogConfig: { Type: "json-file", Config: {} },
    };

    await this.removeContainer(name, "up");
    mkdirSync(dockerLogsDir(config), { recursive: true });
    ensureWorkerDirs(config);
    if (!existsSync(generatedConfigPath(config))) {
      throw new ContainerEngineError(`create ${name}`, "homeserver.yaml has not been generated", "up");
    }
    const container = await dockerCall(`create ${name}`, "up", () =>
      this.docker.createContainer({
        name,
        Image: imageTag(config),
        Hostname: config.docker.hostname,
        Cmd: config.workers.enabled ? ["/workers_start.py", "start"] : ["/start.py"],
        Env: serverEnv(config),
        User: containerUser(),
        ...serverVolumes(config),
        ExposedPorts: exposedPorts,
        HostConfig: hostConfig,
      }),
    );
    await dockerCall(`start ${name}`, "up", () => container.start());
    logger.info(`[up] Started ${name} (${container.id.slice(0, 12)}) on port ${hostPort}`);

    const logStream = await dockerCall(`logs ${name}`, "up", () =>
      container.logs({ follow: true, stdout: true, stderr: true }),
    );
    this.followers.set(
      name,
      followLogs(logStream, join(dockerLogsDir(config), "up-run-down.log")).catch((err: unknown) => {
        logger.warn(`[docker] Log follower for ${name} failed: ${errorMessage(err)}`);
      }),
    );

    return {
      networkName: network,
      containerName: name,
      containerId: container.id,
      hostPort,
      baseUrl: `http://localhost:${hostPort}`,
      reachable: false,
    };
  }

  async stopContainer(name: string): Promise<void> {
    const stopped = await ignoreAbsent(`stop ${name}`, "down", () => this.docker.getContainer(name).stop());
    const follower = this.followers.get(name);
    if (follower) {
      this.followers.delete(name);
      await follower;
    }
    if (stopped) logger.info(`[docker] Stopped ${name}`);
  }

  async removeContainer(name: string, phase: Phase = "down"): Promise<void> {
    if (await ignoreAbsent(`remove ${name}`, phase, () => this.docker.getContainer(name).remove({ force: true }))) {
      logger.info(`[docker] Removed ${name}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Worker mode
// ---------------------------------------------------------------------------

/**
 * Copy the worker entry point and its templates into the build context.
 * The bundled postgres.sql is used when the resources ship none.
 */
function stageWorkerResources(config: SuiteConfig): void {
  const source = config.workers.resources;
  if (source === undefined) {
    throw new ContainerEngineError("stage worker resources", "workers.resources is not set", "build");
  }
  const script = join(source, WORKERS_SCRIPT);
  const conf = join(source, WORKERS_CONF_DIR);
  for (const path of [script, conf]) {
    if (!existsSync(path)) {
      throw new ContainerEngineError("stage worker resources", `${path} does not exist`, "build");
    }
  }

  const staging = synapseRoot(config);
  cpSync(script, join(staging, WORKERS_SCRIPT));
  cpSync(conf, join(staging, WORKERS_CONF_DIR), { recursive: true });
  const sql = join(staging, WORKERS_CONF_DIR, "postgres.sql");
  if (!existsSync(sql)) writeFileSync(sql, readFileSync(POSTGRES_SQL));
  logger.debug(`[build] Staged worker resources from ${source}`);
}

/** Give every worker the modules and the shared database. */
function patchWorkersConfig(config: SuiteConfig): void {
  const path = workersSharedConfigPath(config);
  let shared: unknown;
  try {
    shared = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ContainerEngineError("read shared.yaml", errorMessage(err), "up", { cause: err });
  }
  if (!isConfigMap(shared)) {
    throw new ContainerEngineError("read shared.yaml", "expected a mapping at the top level", "up");
  }
  let patched: ConfigMap;
  try {
    patched = patchWorkersShared(shared, config);
  } catch (err) {
    throw new ContainerEngineError("patch shared.yaml", errorMessage(err), "up", { cause: err });
  }
  writeFileSync(path, stringifyYaml(patched));
  logger.debug(`[up] Patched worker configuration ${path}`);
}
