/**
 * Orchestrator: drives build, up, run and down for one suite.
 *
 * Phases run strictly in sequence. The server handle created by `up` is
 * threaded into `down`; a bare `down` in a fresh process derives the same
 * names from the configuration.
 */

import { networkName, runContainerName, scriptEnvironment, setupContainerName } from "../config/suite.js";
import type { ScriptStage, SuiteConfig } from "../config/types.js";
import {
  ContainerEngineError,
  type Phase,
  ScriptFailure,
  ServerUnreachable,
  TeardownError,
  TestbedError,
  errorMessage,
} from "../errors.js";
import { ScriptRunner, type ScriptExecutor } from "../exec/script-runner.js";
import { logger } from "../logger.js";
import { type AdminApi, HomeserverClient } from "../matrix/homeserver-client.js";
import { type BackoffOptions, waitUntilReachable } from "../matrix/retry.js";
import { scriptLogsDir } from "../paths.js";
import { ContainerManager } from "../platform/container-manager.js";
import type { ServerHandle } from "../platform/types.js";
import { FixtureProvisioner, type ProvisioningReport } from "../provisioning/provisioner.js";
import { type TeardownStep, runAll } from "./cleanup.js";

export type Verb = "build" | "up" | "run" | "down";

/** Verbs always execute in this order, whatever order they were given in. */
export const VERB_ORDER: readonly Verb[] = ["build", "up", "run", "down"];

export type OrchestratorState = "idle" | "built" | "up" | "ran" | "down";

export type PhaseResult = { status: "success" } | { status: "failure"; reason: ScriptFailure };

export interface DownReport {
  /** Teardown script failures. Resources were still released. */
  warnings: Error[];
}

export type CommandOutcome =
  | { verb: Verb; status: "success"; warnings: readonly Error[] }
  | { verb: Verb; status: "failure"; error: TestbedError; warnings: readonly Error[] }
  | { verb: Verb; status: "skipped" };

export interface ExecutionSummary {
  ok: boolean;
  outcomes: CommandOutcome[];
}

/** The container operations a run depends on. */
export type ContainerLifecycle = Pick<
  ContainerManager,
  | "buildImage"
  | "ensureNetwork"
  | "generateConfig"
  | "startContainer"
  | "stopContainer"
  | "removeContainer"
  | "removeNetwork"
>;

export interface OrchestratorDeps {
  containers: ContainerLifecycle;
  scripts: ScriptExecutor;
  /** Client for the server listening at `baseUrl`. */
  adminApi: (baseUrl: string) => AdminApi;
  backoff?: BackoffOptions;
  /** Exposed to scripts as MX_TEST_CWD. */
  cwd?: string;
}

export class Orchestrator {
  private current: OrchestratorState = "idle";
  private handle: ServerHandle | undefined;
  private result: PhaseResult | undefined;
  private provisioning: ProvisioningReport | undefined;

  constructor(
    private readonly config: SuiteConfig,
    private readonly deps: OrchestratorDeps,
  ) {}

  get state(): OrchestratorState {
    return this.current;
  }

  get server(): ServerHandle | undefined {
    return this.handle;
  }

  get lastResult(): PhaseResult | undefined {
    return this.result;
  }

  get fixtures(): ProvisioningReport | undefined {
    return this.provisioning;
  }

  // ------- build -------

  async build(): Promise<string> {
    logger.info(`[build] Building suite ${this.config.name}`);
    const tag = await this.deps.containers.buildImage(this.config);
    this.current = "built";
    return tag;
  }

  // ------- up -------

  /**
   * Bring the server up and provision fixtures. An `up.after` failure is
   * thrown after the server is marked up; nothing is undone.
   */
  async up(): Promise<ServerHandle> {
    const { config, deps } = this;
    let ready: ServerHandle;
    try {
      await deps.containers.ensureNetwork(networkName(config));
      await this.runScripts("up", "up.before");
      await deps.containers.generateConfig(config);
      const handle = await deps.containers.startContainer(config);
      this.handle = handle;

      const api = deps.adminApi(handle.baseUrl);
      await waitUntilReachable(handle.baseUrl, (signal) => api.isAlive(signal), deps.backoff);
      ready = { ...handle, reachable: true };
      this.handle = ready;

      this.provisioning = await new FixtureProvisioner(api, config).provision();
    } catch (err) {
      if (config.autocleanOnError && (err instanceof ContainerEngineError || err instanceof ServerUnreachable)) {
        logger.warn(`[up] ${errorMessage(err)}, removing containers`);
        const errors = await runAll(this.resourceSteps());
        this.handle = undefined;
        if (errors.length > 0) {
          logger.warn(`[up] Cleanup left ${errors.length} resource(s) behind`);
        }
      }
      throw err;
    }

    this.current = "up";
    await this.runScripts("up", "up.after");
    logger.info(`[up] Homeserver ready at ${ready.baseUrl}`);
    return ready;
  }

  // ------- run -------

  /** Run the test scripts. A script failure is the result, not an exception. */
  async run(): Promise<PhaseResult> {
    let result: PhaseResult;
    try {
      await this.runScripts("run", "run");
      result = { status: "success" };
    } catch (err) {
      if (!(err instanceof ScriptFailure)) throw err;
      result = { status: "failure", reason: err };
    }
    this.result = result;
    this.current = "ran";
    logger.info(`[run] ${result.status === "success" ? "Tests passed" : result.reason.message}`);
    return result;
  }

  // ------- down -------

  /**
   * Tear down. Every step runs; script failures come back as warnings,
   * a resource left behind fails the whole `down`.
   */
  async down(): Promise<DownReport> {
    const warnings: Error[] = [];
    const scriptStep = (stage: ScriptStage): TeardownStep => ({
      label: stage,
      action: () => this.runScripts("down", stage),
    });

    const scripts: TeardownStep[] = [];
    if (this.result === undefined) {
      logger.info("[down] No run in this process, skipping success/failure scripts");
    } else {
      scripts.push(scriptStep(this.result.status === "success" ? "down.success" : "down.failure"));
    }
    scripts.push(scriptStep("down.finally"));
    warnings.push(...(await runAll(scripts)));

    const errors = await runAll(this.resourceSteps());
    this.handle = undefined;
    this.current = "down";

    if (errors.length > 0) {
      throw new TeardownError([...warnings, ...errors]);
    }
    logger.info(`[down] Teardown complete${warnings.length > 0 ? ` with ${warnings.length} warning(s)` : ""}`);
    return { warnings };
  }

  /** Best-effort release of the container and network. Safe to call at any time. */
  async abort(): Promise<Error[]> {
    logger.warn("[down] Aborting, removing containers and network");
    const errors = await runAll(this.resourceSteps());
    this.handle = undefined;
    return errors;
  }

  // ------- composition -------

  async execute(verbs: readonly Verb[]): Promise<ExecutionSummary> {
    const outcomes: CommandOutcome[] = [];
    let halted = false;

    for (const verb of VERB_ORDER.filter((v) => verbs.includes(v))) {
      // A failed build or up skips the verbs after it, but never `down`.
      if (halted && verb !== "down") {
        outcomes.push({ verb, status: "skipped" });
        continue;
      }
      try {
        outcomes.push(await this.executeVerb(verb));
      } catch (err) {
        outcomes.push({ verb, status: "failure", error: asTestbedError(err, verb), warnings: [] });
        if (verb === "build" || verb === "up") halted = true;
      }
    }

    return { ok: outcomes.every((o) => o.status === "success"), outcomes };
  }

  private async executeVerb(verb: Verb): Promise<CommandOutcome> {
    switch (verb) {
      case "build":
        await this.build();
        return { verb, status: "success", warnings: [] };
      case "up":
        await this.up();
        return { verb, status: "success", warnings: [] };
      case "run": {
        const result = await this.run();
        return result.status === "success"
          ? { verb, status: "success", warnings: [] }
          : { verb, status: "failure", error: result.reason, warnings: [] };
      }
      case "down": {
        const report = await this.down();
        return { verb, status: "success", warnings: report.warnings };
      }
    }
  }

  // ------- helpers -------

  private runScripts(phase: Phase, stage: ScriptStage): Promise<void> {
    return this.deps.scripts.run({
      phase,
      stage,
      lines: this.config.scripts[stage],
      env: scriptEnvironment(this.config, { cwd: this.deps.cwd }),
    });
  }

  private resourceSteps(): TeardownStep[] {
    const { containers } = this.deps;
    const container = this.handle?.containerName ?? runContainerName(this.config);
    const network = this.handle?.networkName ?? networkName(this.config);
    const setup = setupContainerName(this.config);
    return [
      { label: `stop ${container}`, action: () => containers.stopContainer(container) },
      { label: `remove ${container}`, action: () => containers.removeContainer(container) },
      { label: `remove ${setup}`, action: () => containers.removeContainer(setup) },
      { label: `remove network ${network}`, action: () => containers.removeNetwork(network) },
    ];
  }
}

function asTestbedError(err: unknown, phase: Phase): TestbedError {
  return err instanceof TestbedError ? err : new TestbedError(errorMessage(err), phase, { cause: err });
}

/** Wire an orchestrator to Docker, /bin/sh and the server's HTTP API. */
export function createOrchestrator(config: SuiteConfig, options: { backoff?: BackoffOptions } = {}): Orchestrator {
  const scripts = new ScriptRunner({ logDir: scriptLogsDir(config) });
  return new Orchestrator(config, {
    containers: new ContainerManager(scripts),
    scripts,
    adminApi: (baseUrl) =>
      new HomeserverClient({ baseUrl, registrationSharedSecret: config.homeserver.registrationSharedSecret }),
    backoff: options.backoff,
  });
}
