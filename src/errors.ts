/**
 * Error kinds surfaced by the phase orchestrator.
 *
 * Every error carries the phase it was raised in so the CLI can attribute
 * a failure without parsing messages.
 */

export type Phase = "config" | "build" | "up" | "run" | "down";

export class TestbedError extends Error {
  readonly phase: Phase;

  constructor(message: string, phase: Phase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TestbedError";
    this.phase = phase;
  }
}

/** Invalid suite configuration. Raised before any side effect. */
export class ConfigurationError extends TestbedError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`, "config");
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export interface ScriptFailureDetails {
  phase: Phase;
  /** Label of the script list, e.g. `up.before` or `down.finally`. */
  stage: string;
  index: number;
  command: string;
  exitCode: number;
  module?: string;
}

/** An operator script exited with a non-zero status. */
export class ScriptFailure extends TestbedError {
  readonly stage: string;
  readonly index: number;
  readonly command: string;
  readonly exitCode: number;
  readonly module?: string;

  constructor(details: ScriptFailureDetails) {
    const where = details.module ? `${details.stage} (module ${details.module})` : details.stage;
    super(`Script ${where}[${details.index}] \`${details.command}\` exited with code ${details.exitCode}`, details.phase);
    this.name = "ScriptFailure";
    this.stage = details.stage;
    this.index = details.index;
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.module = details.module;
  }
}

export class ContainerEngineError extends TestbedError {
  readonly operation: string;
  readonly module?: string;

  constructor(operation: string, message: string, phase: Phase, options?: { cause?: unknown; module?: string }) {
    super(`[docker] ${operation}: ${message}`, phase, options);
    this.name = "ContainerEngineError";
    this.operation = operation;
    this.module = options?.module;
  }
}

/** The homeserver never answered its liveness check. */
export class ServerUnreachable extends TestbedError {
  readonly attempts: number;

  constructor(url: string, attempts: number, cause?: unknown) {
    super(`Homeserver at ${url} unreachable after ${attempts} attempts`, "up", { cause });
    this.name = "ServerUnreachable";
    this.attempts = attempts;
  }
}

export type FixtureKind = "user" | "room";

export class ProvisioningError extends TestbedError {
  readonly fixture: FixtureKind;
  readonly fixtureName: string;

  constructor(fixture: FixtureKind, fixtureName: string, cause: unknown) {
    super(`Could not provision ${fixture} "${fixtureName}": ${errorMessage(cause)}`, "up", { cause });
    this.name = "ProvisioningError";
    this.fixture = fixture;
    this.fixtureName = fixtureName;
  }
}

/** Teardown left resources behind. Carries every collected failure. */
export class TeardownError extends TestbedError {
  readonly errors: Error[];

  constructor(errors: Error[]) {
    super(`Teardown failed:\n  - ${errors.map((e) => e.message).join("\n  - ")}`, "down");
    this.name = "TeardownError";
    this.errors = errors;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
