/**
 * Script execution engine.
 *
 * Runs an ordered list of shell lines with the suite environment, one at a
 * time, streaming output to the logger and to per-stage log files. Stops at
 * the first non-zero exit.
 */

import { spawn } from "node:child_process";
import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { constants } from "node:os";
import type { Readable } from "node:stream";
import type { ExecutionEnvironment } from "../config/suite.js";
import { type Phase, ScriptFailure } from "../errors.js";
import { logger } from "../logger.js";
import { expandCommand } from "./expand.js";

export interface ScriptRunnerOptions {
  /** Directory receiving `<stage>.out` (stdout) and `<stage>.log` (stderr). */
  logDir: string;
  /** Shell used as `<shell> -c <line>`. */
  shell?: string;
}

export interface ScriptInvocation {
  phase: Phase;
  /** Log label, e.g. `up.before` or `build`. */
  stage: string;
  lines: readonly string[];
  env: ExecutionEnvironment;
  /** Set when the lines belong to a module build. */
  module?: string;
}

/** Minimal contract the orchestrator and container manager depend on. */
export interface ScriptExecutor {
  run(invocation: ScriptInvocation): Promise<void>;
}

/** Map a child's exit to a shell-style status: signal deaths become 128 + N. */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const number = constants.signals[signal];
    return 128 + (number ?? 0);
  }
  return 1;
}

export class ScriptRunner implements ScriptExecutor {
  private readonly logDir: string;
  private readonly shell: string;

  constructor(options: ScriptRunnerOptions) {
    this.logDir = options.logDir;
    this.shell = options.shell ?? "/bin/sh";
  }

  async run(invocation: ScriptInvocation): Promise<void> {
    const { stage, lines } = invocation;
    if (lines.length === 0) {
      logger.debug(`[script] ${stage}: nothing to run`);
      return;
    }

    const logName = invocation.module ? `${stage}-${invocation.module}` : stage;
    mkdirSync(this.logDir, { recursive: true });
    logger.info(`[script] Running ${logName}, output in ${join(this.logDir, logName)}.{out,log}`);

    const stdoutFile = createWriteStream(join(this.logDir, `${logName}.out`), { flags: "w" });
    const stderrFile = createWriteStream(join(this.logDir, `${logName}.log`), { flags: "w" });
    try {
      for (const [index, line] of lines.entries()) {
        const command = expandCommand(line, invocation.env);
        logger.info(`[script] ${logName}[${index}] ${line}`);
        const exitCode = await this.spawnLine(command, invocation.env, logName, stdoutFile, stderrFile);
        if (exitCode !== 0) {
          throw new ScriptFailure({
            phase: invocation.phase,
            stage,
            index,
            command: line,
            exitCode,
            module: invocation.module,
          });
        }
      }
    } finally {
      await Promise.all([closeStream(stdoutFile), closeStream(stderrFile)]);
    }
    logger.info(`[script] ${logName} succeeded`);
  }

  private spawnLine(
    command: string,
    env: ExecutionEnvironment,
    label: string,
    stdoutFile: WriteStream,
    stderrFile: WriteStream,
  ): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.shell, ["-c", command], {
        env: { ...process.env, ...env },
        stdio: ["ignore", "pipe", "pipe"],
      });

      forwardLines(child.stdout, stdoutFile, (text) => logger.info(`[${label}] ${text}`));
      forwardLines(child.stderr, stderrFile, (text) => logger.warn(`[${label}] ${text}`));

      child.on("error", reject);
      // "close" fires once both pipes are drained.
      child.on("close", (code, signal) => {
        if (code === null && signal !== null) {
          logger.warn(`[script] ${label} killed by ${signal}`);
        }
        resolve(exitStatus(code, signal));
      });
    });
  }
}

function forwardLines(stream: Readable, file: WriteStream, log: (line: string) => void): void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on("line", (line) => {
    log(line);
    file.write(`${line}\n`);
  });
}

function closeStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.once("error", reject);
    stream.end(() => resolve());
  });
}
