export { DEFAULT_CONFIG_FILE, loadConfig, parseConfig, validateSuite } from "./config/loader.js";
export { buildOverlay, mergeOverlay, patchWorkersShared } from "./config/homeserver.js";
export {
  imageTag,
  networkName,
  runContainerName,
  scriptEnvironment,
  setupContainerName,
  type ExecutionEnvironment,
} from "./config/suite.js";
export type * from "./config/types.js";
export * from "./errors.js";
export { ScriptRunner, type ScriptExecutor, type ScriptInvocation } from "./exec/script-runner.js";
export { HomeserverClient, MatrixApiError, type AdminApi, type Session } from "./matrix/homeserver-client.js";
export { waitUntilReachable, type BackoffOptions } from "./matrix/retry.js";
export {
  Orchestrator,
  createOrchestrator,
  type CommandOutcome,
  type DownReport,
  type ExecutionSummary,
  type PhaseResult,
  type Verb,
} from "./orchestrator/orchestrator.js";
export { ContainerManager } from "./platform/container-manager.js";
export { getDocker, setDocker } from "./platform/docker-client.js";
export type { ServerHandle } from "./platform/types.js";
export { FixtureProvisioner, type ProvisioningReport } from "./provisioning/provisioner.js";
