/**
 * ContainerManager Tests
 *
 * All dockerode calls are mocked, no Docker daemon required.
 */
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import type Docker from "dockerode";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { ContainerManager } = await import("../../src/platform/container-manager.js");
const { ContainerEngineError } = await import("../../src/errors.js");
const { logger } = await import("../../src/logger.js");
const { buildOverlay } = await import("../../src/config/homeserver.js");
const { imageTag, networkName } = await import("../../src/config/suite.js");
const paths = await import("../../src/paths.js");
const { RecordingExecutor, makeConfig, workerResources } = await import("../mocks/index.js");

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

function engineError(statusCode: number, message: string): Error {
  return Object.assign(new Error(message), { statusCode });
}

function endedStream(): PassThrough {
  const stream = new PassThrough();
  stream.end();
  return stream;
}

function createMockDocker() {
  const buildEvents: unknown[] = [];

  const container = {
    id: "c0ffee1234567890",
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    remove: vi.fn().mockResolvedValue(undefined),
    wait: vi.fn().mockResolvedValue({ StatusCode: 0 }),
    logs: vi.fn(async () => endedStream()),
  };
  const network = {
    inspect: vi.fn().mockResolvedValue({ Name: "net" }),
    remove: vi.fn().mockResolvedValue(undefined),
  };
  const image = { remove: vi.fn().mockResolvedValue(undefined) };

  const docker = {
    getContainer: vi.fn(() => container),
    createContainer: vi.fn().mockResolvedValue(container),
    getNetwork: vi.fn(() => network),
    createNetwork: vi.fn().mockResolvedValue(network),
    getImage: vi.fn(() => image),
    pull: vi.fn().mockResolvedValue("pull-stream"),
    buildImage: vi.fn().mockResolvedValue("build-stream"),
    modem: {
      followProgress: vi.fn(
        (
          stream: unknown,
          onFinished: (err: Error | null, output: unknown[]) => void,
          onProgress?: (event: unknown) => void,
        ) => {
          const events = stream === "build-stream" ? buildEvents : [{ status: "Pulling from matrixdotorg/synapse" }];
          for (const event of events) onProgress?.(event);
          onFinished(null, events);
        },
      ),
    },
  };

  return { docker, container, network, image, buildEvents };
}

/** Build script stand-in that drops a file into the module directory. */
class StagingExecutor extends RecordingExecutor {
  async run(invocation: Parameters<InstanceType<typeof RecordingExecutor>["run"]>[0]): Promise<void> {
    await super.run(invocation);
    const dir = invocation.env.MX_TEST_MODULE_DIR;
    if (invocation.module && dir) writeFileSync(join(dir, "setup.py"), "");
  }
}

const MODULE_SUITE = [
  "name: smoke",
  "modules:",
  "  - name: antispam",
  "    build: [make]",
  "    config:",
  "      module: antispam.Module",
  "credentials:",
  "  username: ci",
  "  password: test-secret",
].join("\n");

function workerSuite(base = MODULE_SUITE, resources = workerResources()): string {
  return `${base}\nworkers:\n  enabled: true\n  resources: ${resources}\n`;
}

let mock: ReturnType<typeof createMockDocker>;

beforeEach(() => {
  mock = createMockDocker();
});

function manager(scripts = new StagingExecutor()) {
  return new ContainerManager(scripts, mock.docker as unknown as Docker);
}

// ---------------------------------------------------------------------------
// build
// ---------------------------------------------------------------------------

describe("buildImage", () => {
  it("stages modules and builds the derived image", async () => {
    const config = makeConfig(MODULE_SUITE);
    const staging = paths.synapseRoot(config);
    mock.buildEvents.push({ stream: "Step 1/12 : FROM matrixdotorg/synapse:latest\n" }, { stream: "Successfully built\n" });

    const tag = await manager().buildImage(config);

    expect(tag).toBe(imageTag(config));
    expect(mock.docker.pull).toHaveBeenCalledWith("matrixdotorg/synapse:latest", {
      authconfig: { username: "ci", password: "test-secret", serveraddress: "https://index.docker.io/v1/" },
    });
    expect(mock.docker.buildImage).toHaveBeenCalledWith(
      { context: staging, src: expect.arrayContaining(["Dockerfile", "antispam", "homeserver.overlay.yaml"]) },
      {
        t: tag,
        nocache: true,
        rm: true,
        registryconfig: { "https://index.docker.io/v1/": { username: "ci", password: "test-secret" } },
      },
    );
    expect(existsSync(join(staging, "antispam", "setup.py"))).toBe(true);
    expect(readFileSync(join(paths.dockerLogsDir(config), "build.log"), "utf-8")).toBe(
      "Step 1/12 : FROM matrixdotorg/synapse:latest\nSuccessfully built\n",
    );
  });

  it("runs each module's build script with its own module directory", async () => {
    const config = makeConfig(MODULE_SUITE);
    const scripts = new StagingExecutor();

    await manager(scripts).buildImage(config);

    expect(scripts.invocations).toHaveLength(1);
    expect(scripts.invocations[0]).toMatchObject({ phase: "build", stage: "build", lines: ["make"], module: "antispam" });
    expect(scripts.invocations[0].env.MX_TEST_MODULE_DIR).toBe(paths.moduleDir(config, "antispam"));
  });

  it("writes the overlay computed from the suite", async () => {
    const config = makeConfig(MODULE_SUITE);

    await manager().buildImage(config);

    expect(parseYaml(readFileSync(paths.overlayPath(config), "utf-8"))).toEqual(buildOverlay(config));
  });

  it("removes leftovers of an earlier build, ignoring missing ones", async () => {
    const config = makeConfig(MODULE_SUITE);
    mock.image.remove.mockRejectedValue(engineError(404, "No such image"));
    mock.container.remove.mockRejectedValue(engineError(404, "No such container"));

    await expect(manager().buildImage(config)).resolves.toBe(imageTag(config));
    expect(mock.docker.getContainer).toHaveBeenCalledWith("mx-testbed-synapse-setup-smoke");
    expect(mock.docker.getContainer).toHaveBeenCalledWith("mx-testbed-synapse-run-smoke");
    expect(mock.docker.getImage).toHaveBeenCalledWith(imageTag(config));
  });

  it("pulls anonymously without credentials", async () => {
    await manager().buildImage(makeConfig("name: smoke\n"));

    expect(mock.docker.pull).toHaveBeenCalledWith("matrixdotorg/synapse:latest", {});
    expect(mock.docker.buildImage.mock.calls[0][1]).toMatchObject({ registryconfig: undefined });
  });

  it("attributes a failing build step to the module being installed", async () => {
    const config = makeConfig(MODULE_SUITE);
    mock.buildEvents.push(
      { stream: 'Step 7/12 : RUN echo "mx-testbed-module: antispam"\n' },
      { stream: "mx-testbed-module: antispam\n" },
      { stream: "Step 8/12 : RUN /usr/local/bin/python -m pip install /mx-testbed/antispam\n" },
      {
        error: "The command returned a non-zero code: 1",
        errorDetail: { message: "The command returned a non-zero code: 1" },
      },
    );

    const err = await manager()
      .buildImage(config)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ContainerEngineError);
    expect(err).toMatchObject({
      phase: "build",
      module: "antispam",
      message: "[docker] build image: The command returned a non-zero code: 1",
    });
  });

  it("fails when a build script leaves the module directory empty", async () => {
    const config = makeConfig(MODULE_SUITE);

    const err = await manager(new RecordingExecutor())
      .buildImage(config)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ContainerEngineError);
    expect(err).toMatchObject({ operation: "stage module", module: "antispam" });
    expect(mock.docker.buildImage).not.toHaveBeenCalled();
  });

  it("stages the worker entry point and its templates in worker mode", async () => {
    const resources = workerResources();
    const config = makeConfig(workerSuite(MODULE_SUITE, resources));
    const staging = paths.synapseRoot(config);

    await manager().buildImage(config);

    expect(readFileSync(join(staging, "workers_start.py"), "utf-8")).toBe("#!/usr/bin/env python\n");
    expect(readFileSync(join(staging, "conf", "shared.yaml.j2"), "utf-8")).toBe("{{ shared_worker_config }}\n");
    expect(readFileSync(join(staging, "conf", "postgres.sql"), "utf-8")).toContain("CREATE USER synapse PASSWORD 'password';");
    expect(readFileSync(join(staging, "Dockerfile"), "utf-8")).toContain("COPY workers_start.py /workers_start.py\n");
    expect(mock.docker.buildImage.mock.calls[0][0]).toEqual({
      context: staging,
      src: expect.arrayContaining(["Dockerfile", "workers_start.py", "conf"]),
    });
    expect(existsSync(paths.workersConfigDir(config))).toBe(true);
    expect(existsSync(paths.workerLogsDir(config))).toBe(true);
  });

  it("keeps a postgres.sql shipped with the worker resources", async () => {
    const resources = workerResources();
    writeFileSync(join(resources, "conf", "postgres.sql"), "-- custom\n");
    const config = makeConfig(workerSuite(MODULE_SUITE, resources));

    await manager().buildImage(config);

    expect(readFileSync(join(paths.synapseRoot(config), "conf", "postgres.sql"), "utf-8")).toBe("-- custom\n");
  });

  it("fails before building when the worker entry point is missing", async () => {
    const resources = workerResources();
    rmSync(join(resources, "workers_start.py"));
    const config = makeConfig(workerSuite(MODULE_SUITE, resources));

    const err = await manager()
      .buildImage(config)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ContainerEngineError);
    expect(err).toMatchObject({
      operation: "stage worker resources",
      message: `[docker] stage worker resources: ${join(resources, "workers_start.py")} does not exist`,
    });
    expect(mock.docker.buildImage).not.toHaveBeenCalled();
  });

  it("stops at a failing build script", async () => {
    const scripts = new StagingExecutor();
    scripts.failing.add("make");

    await expect(manager(scripts).buildImage(makeConfig(MODULE_SUITE))).rejects.toMatchObject({
      name: "ScriptFailure",
      module: "antispam",
    });
    expect(mock.docker.pull).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// network
// ---------------------------------------------------------------------------

describe("ensureNetwork", () => {
  it("keeps an existing network", async () => {
    await manager().ensureNetwork("net-x");
    expect(mock.docker.createNetwork).not.toHaveBeenCalled();
  });

  it("creates a missing network", async () => {
    mock.network.inspect.mockRejectedValue(engineError(404, "network net-x not found"));

    await manager().ensureNetwork("net-x");

    expect(mock.docker.createNetwork).toHaveBeenCalledWith({ Name: "net-x", Driver: "bridge", Attachable: true });
  });
});

// ---------------------------------------------------------------------------
// setup container
// ---------------------------------------------------------------------------

describe("generateConfig", () => {
  function prepare(yaml = "name: smoke\n") {
    const config = makeConfig(yaml);
    mkdirSync(paths.synapseRoot(config), { recursive: true });
    writeFileSync(paths.overlayPath(config), stringifyYaml(buildOverlay(config)));
    mock.container.wait.mockImplementation(async () => {
      writeFileSync(
        paths.generatedConfigPath(config),
        stringifyYaml({ server_name: "generated", report_stats: false, modules: [{ module: "a" }] }),
      );
      if (config.workers.enabled) {
        writeFileSync(paths.workersSharedConfigPath(config), stringifyYaml({ redis: { enabled: true } }));
      }
      return { StatusCode: 0 };
    });
    return config;
  }

  it("runs generate in a throwaway container", async () => {
    const config = prepare();

    await manager().generateConfig(config);

    expect(mock.docker.createContainer).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "mx-testbed-synapse-setup-smoke",
        Image: imageTag(config),
        Cmd: ["/start.py", "generate"],
        Env: [
          "SYNAPSE_SERVER_NAME=localhost:9999",
          "SYNAPSE_REPORT_STATS=no",
          "SYNAPSE_CONFIG_DIR=/data",
          "SYNAPSE_HTTP_PORT=8008",
        ],
        HostConfig: { Binds: [`${paths.synapseDataDir(config)}:/data:rw`], NetworkMode: networkName(config) },
      }),
    );
    expect(mock.container.start).toHaveBeenCalled();
    expect(mock.container.remove).toHaveBeenCalledWith({ force: true });
  });

  it("merges the overlay into the generated configuration", async () => {
    const config = prepare();

    await manager().generateConfig(config);

    const merged: unknown = parseYaml(readFileSync(paths.generatedConfigPath(config), "utf-8"));
    expect(merged).toMatchObject({
      server_name: "localhost:9999",
      report_stats: false,
      enable_registration_without_verification: true,
      modules: [{ module: "a" }],
    });
  });

  it("uses the worker entry point in worker mode", async () => {
    const config = prepare(workerSuite("name: smoke"));
    const root = paths.testRoot(config);

    await manager().generateConfig(config);

    expect(mock.docker.createContainer).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "mx-testbed-synapse-setup-smoke-workers",
        Cmd: ["/workers_start.py", "generate"],
        Volumes: {
          "/data": {},
          "/conf/workers": {},
          "/etc/nginx/conf.d": {},
          "/etc/supervisor/conf.d": {},
          "/var/log/workers": {},
        },
        HostConfig: {
          Binds: [
            `${paths.synapseDataDir(config)}:/data:rw`,
            `${join(root, "synapse", "workers")}:/conf/workers:rw`,
            `${join(root, "etc", "nginx")}:/etc/nginx/conf.d:rw`,
            `${join(root, "etc", "supervisor")}:/etc/supervisor/conf.d:rw`,
            `${join(root, "logs", "nginx")}:/var/log/nginx:rw`,
            `${join(root, "logs", "workers")}:/var/log/workers:rw`,
          ],
          NetworkMode: networkName(config),
        },
      }),
    );
    const env = mock.docker.createContainer.mock.calls[0][0].Env;
    expect(env).toContain("SYNAPSE_HTTP_PORT=8080");
    expect(env).toContain(
      "SYNAPSE_WORKER_TYPES=event_persister, event_persister, background_worker, frontend_proxy, event_creator, " +
        "user_dir, media_repository, federation_inbound, federation_reader, federation_sender, synchrotron, " +
        "appservice, pusher",
    );
  });

  it("patches the shared worker configuration after generate", async () => {
    const config = prepare(workerSuite());

    await manager().generateConfig(config);

    const shared: unknown = parseYaml(readFileSync(paths.workersSharedConfigPath(config), "utf-8"));
    expect(shared).toMatchObject({
      redis: { enabled: true },
      modules: [{ module: "antispam.Module" }],
      url_preview_enabled: false,
      database: { name: "psycopg2" },
    });
  });

  it("removes the setup container when waiting for it fails", async () => {
    const config = prepare();
    const logs = new PassThrough();
    mock.container.logs.mockResolvedValue(logs);
    mock.container.wait.mockImplementation(async () => {
      logs.destroy(new Error("connection reset"));
      throw engineError(500, "wait interrupted");
    });

    const err = await manager()
      .generateConfig(config)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ContainerEngineError);
    expect(err).toMatchObject({
      operation: "wait mx-testbed-synapse-setup-smoke",
      message: "[docker] wait mx-testbed-synapse-setup-smoke: wait interrupted",
    });
    // Once before creating it, once after the failed wait.
    expect(mock.container.remove).toHaveBeenCalledTimes(2);
    await vi.waitFor(() =>
      expect(logger.warn).toHaveBeenCalledWith(
        "[docker] Log follower for mx-testbed-synapse-setup-smoke failed: connection reset",
      ),
    );
  });

  it("fails when generate exits non-zero", async () => {
    const config = prepare();
    mock.container.wait.mockResolvedValue({ StatusCode: 1 });

    await expect(manager().generateConfig(config)).rejects.toThrow(
      "[docker] generate in mx-testbed-synapse-setup-smoke: exited with code 1",
    );
  });
});

// ---------------------------------------------------------------------------
// server container
// ---------------------------------------------------------------------------

describe("startContainer", () => {
  const SUITE = ["name: smoke", "docker:", "  port_mapping:", "    - host: 9001", "      guest: 9000"].join("\n");

  function prepare(yaml = SUITE) {
    const config = makeConfig(yaml);
    mkdirSync(paths.synapseDataDir(config), { recursive: true });
    writeFileSync(paths.generatedConfigPath(config), "server_name: localhost:9999\n");
    return config;
  }

  it("creates and starts the server container", async () => {
    const config = prepare();

    const handle = await manager().startContainer(config);

    expect(mock.docker.createContainer).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "mx-testbed-synapse-run-smoke",
        Image: imageTag(config),
        Hostname: "synapse",
        Cmd: ["/start.py"],
        ExposedPorts: { "9000/tcp": {}, "8008/tcp": {} },
        HostConfig: expect.objectContaining({
          Binds: [`${paths.synapseDataDir(config)}:/data:rw`],
          PortBindings: { "9000/tcp": [{ HostPort: "9001" }], "8008/tcp": [{ HostPort: "9999" }] },
          NetworkMode: networkName(config),
          ExtraHosts: ["host.docker.internal:host-gateway"],
          RestartPolicy: { Name: "on-failure", MaximumRetryCount: 20 },
        }),
      }),
    );
    expect(handle).toEqual({
      networkName: networkName(config),
      containerName: "mx-testbed-synapse-run-smoke",
      containerId: "c0ffee1234567890",
      hostPort: 9999,
      baseUrl: "http://localhost:9999",
      reachable: false,
    });
  });

  it("starts workers in worker mode", async () => {
    const config = prepare(workerSuite(SUITE));

    await manager().startContainer(config);

    const options = mock.docker.createContainer.mock.calls[0][0];
    expect(options).toMatchObject({ Cmd: ["/workers_start.py", "start"] });
    expect(options.Env).toContain("SYNAPSE_WORKERS_WRITE_LOGS_TO_DISK=1");
    expect(options.HostConfig.Binds).toContain(`${paths.workersConfigDir(config)}:/conf/workers:rw`);
    expect(options.HostConfig.PortBindings).toMatchObject({ "8008/tcp": [{ HostPort: "9999" }] });
    expect(existsSync(paths.nginxLogsDir(config))).toBe(true);
  });

  it("refuses to start without a generated configuration", async () => {
    const config = makeConfig(SUITE);

    await expect(manager().startContainer(config)).rejects.toBeInstanceOf(ContainerEngineError);
    expect(mock.docker.createContainer).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// teardown
// ---------------------------------------------------------------------------

describe("teardown", () => {
  it("treats absent resources as already removed", async () => {
    mock.container.stop.mockRejectedValue(engineError(304, "container already stopped"));
    mock.container.remove.mockRejectedValue(engineError(404, "No such container"));
    mock.network.remove.mockRejectedValue(engineError(404, "network not found"));
    const m = manager();

    await expect(m.stopContainer("c")).resolves.toBeUndefined();
    await expect(m.removeContainer("c")).resolves.toBeUndefined();
    await expect(m.removeNetwork("n")).resolves.toBeUndefined();
  });

  it("reports other engine failures", async () => {
    mock.container.stop.mockRejectedValue(engineError(500, "driver failed"));

    await expect(manager().stopContainer("c")).rejects.toMatchObject({
      phase: "down",
      message: "[docker] stop c: driver failed",
    });
  });

  it("waits for the log follower when stopping", async () => {
    const config = makeConfig("name: smoke\n");
    mkdirSync(paths.synapseDataDir(config), { recursive: true });
    writeFileSync(paths.generatedConfigPath(config), "server_name: localhost:9999\n");
    const logs = new PassThrough();
    mock.container.logs.mockResolvedValue(logs);
    const m = manager();
    await m.startContainer(config);

    logs.write(Buffer.concat([Buffer.from([1, 0, 0, 0, 0, 0, 0, 6]), Buffer.from("ready\n")]));
    mock.container.stop.mockImplementation(async () => {
      logs.end();
    });
    await m.stopContainer("mx-testbed-synapse-run-smoke");

    expect(readFileSync(join(paths.dockerLogsDir(config), "up-run-down.log"), "utf-8")).toBe("ready\n");
  });
});
