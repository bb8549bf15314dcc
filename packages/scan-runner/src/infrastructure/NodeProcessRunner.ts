import { spawn, type ChildProcessByStdio } from "node:child_process";
import { constants } from "node:os";
import type { Readable } from "node:stream";
import { Ok, Err, createLogger, type Result, type Logger } from "@scanwarden/core";
import { SpawnError } from "../core/errors.js";
import { LineChannel, type EndOfStream } from "../core/LineChannel.js";
import { DEFAULT_GRACE_PERIOD } from "../core/model.js";
import type { ProcessHandle, ProcessRunner, TerminationOutcome } from "../core/ports/index.js";

type ScannerProcess = ChildProcessByStdio<null, Readable, Readable>;

/** Stderr lines kept for failure reports. */
const DIAGNOSTIC_LINES = 20;

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals).filter(
    (entry): entry is [string, number] => typeof entry[1] === "number"
  )
);

/** Time allowed after exit for leftover output before the pipes are dropped. */
export const DEFAULT_DRAIN_TIMEOUT = 1000;

export interface NodeProcessRunnerOptions {
  /** SIGTERM → SIGKILL delay. Default: 5000 */
  gracePeriodMs?: number;
  /** Output drain window after the scanner exits. Default: 1000 */
  drainTimeoutMs?: number;
  /** Extra environment variables, merged over process.env. */
  env?: Record<string, string>;
  logger?: Logger;
}

/**
 * The scanner runs in its own process group. Signals go to the whole group,
 * and the exit status is taken from `exit`: processes the scanner leaves
 * behind may hold the pipes open long after it is gone, so output ends on
 * `close` or once the drain window after `exit` runs out.
 */
class NodeProcessHandle implements ProcessHandle {
  private readonly stdout = new LineChannel();
  private readonly stderrTail: string[] = [];
  private stderrPartial = "";
  private exitCode: number | null = null;
  private released = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private termination: Promise<TerminationOutcome> | null = null;
  private readonly exitedPromise: Promise<void>;

  constructor(
    private readonly proc: ScannerProcess,
    private readonly gracePeriodMs: number,
    private readonly drainTimeoutMs: number,
    private readonly logger: Logger
  ) {
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (chunk: string) => {
      this.stdout.push(chunk);
    });

    proc.stderr.on("data", (chunk: string) => {
      this.appendStderr(chunk);
    });

    proc.on("error", (error) => {
      this.logger.warn("Process error", { pid: proc.pid, error: error.message });
    });

    this.exitedPromise = new Promise((resolve) => {
      proc.once("exit", (code, signal) => {
        this.recordExit(code, signal);
        resolve();
      });
    });

    proc.once("close", () => {
      this.release("closed");
    });
  }

  get pid(): number | undefined {
    return this.proc.pid;
  }

  readNextChunk(): Promise<string[] | EndOfStream> {
    return this.stdout.next();
  }

  exitStatus(): number | null {
    return this.exitCode;
  }

  diagnostics(): string[] {
    const lines = this.stderrPartial === "" ? this.stderrTail : [...this.stderrTail, this.stderrPartial];
    return lines.slice(-DIAGNOSTIC_LINES);
  }

  terminate(): Promise<TerminationOutcome> {
    if (!this.termination) {
      this.termination = this.exited() ? Promise.resolve("already-exited") : this.killGracefully();
    }
    return this.termination;
  }

  private exited(): boolean {
    return this.exitCode !== null || this.proc.exitCode !== null || this.proc.signalCode !== null;
  }

  private async killGracefully(): Promise<TerminationOutcome> {
    let forced = false;
    this.signalGroup("SIGTERM");

    const timer = setTimeout(() => {
      forced = true;
      this.logger.warn("Process ignored SIGTERM, killing", { pid: this.proc.pid });
      this.signalGroup("SIGKILL");
    }, this.gracePeriodMs);

    try {
      await this.exitedPromise;
    } finally {
      clearTimeout(timer);
    }
    return forced ? "forced" : "graceful";
  }

  /** Signal the scanner's process group, or the scanner alone if the group is gone. */
  private signalGroup(signal: NodeJS.Signals): void {
    const pid = this.proc.pid;
    if (pid === undefined) {
      this.proc.kill(signal);
      return;
    }
    try {
      process.kill(-pid, signal);
    } catch (error) {
      this.logger.debug("Process group not signalled", {
        pid,
        signal,
        error: error instanceof Error ? error.message : String(error),
      });
      this.proc.kill(signal);
    }
  }

  private appendStderr(chunk: string): void {
    const parts = (this.stderrPartial + chunk).split("\n");
    this.stderrPartial = parts.pop() ?? "";
    for (const part of parts) {
      this.stderrTail.push(part.endsWith("\r") ? part.slice(0, -1) : part);
    }
    if (this.stderrTail.length > DIAGNOSTIC_LINES) {
      this.stderrTail.splice(0, this.stderrTail.length - DIAGNOSTIC_LINES);
    }
  }

  private recordExit(code: number | null, signal: NodeJS.Signals | null): void {
    this.exitCode = code ?? (signal ? 128 + (SIGNAL_NUMBERS.get(signal) ?? 0) : 1);
    this.logger.debug("Process exited", { pid: this.proc.pid, exitCode: this.exitCode, signal });

    if (!this.released) {
      this.drainTimer = setTimeout(() => this.release("drain-timeout"), this.drainTimeoutMs);
    }
  }

  /**
   * Runs once, on close or when the drain window ends: end the output stream.
   */
  private release(reason: "closed" | "drain-timeout"): void {
    if (this.released) return;
    this.released = true;

    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    if (reason === "drain-timeout") {
      this.logger.warn("Output still held open after exit, dropping it", { pid: this.proc.pid });
      this.proc.stdout.destroy();
      this.proc.stderr.destroy();
    }
    this.stdout.end();
  }
}

/**
 * Runs the scanner as a child process with piped output.
 * No shell is involved: arguments are passed as-is.
 */
export class NodeProcessRunner implements ProcessRunner {
  private readonly gracePeriodMs: number;
  private readonly drainTimeoutMs: number;
  private readonly env: Record<string, string> | undefined;
  private readonly logger: Logger;

  constructor(options: NodeProcessRunnerOptions = {}) {
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT;
    this.env = options.env;
    this.logger = options.logger ?? createLogger("process-runner");
  }

  async start(
    executable: string,
    args: readonly string[],
    cwd: string
  ): Promise<Result<ProcessHandle, SpawnError>> {
    let proc: ScannerProcess;
    try {
      proc = spawn(executable, [...args], {
        cwd,
        env: this.env ? { ...process.env, ...this.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });
    } catch (error) {
      return Err(spawnError(executable, error));
    }

    const failure = await new Promise<Error | null>((resolve) => {
      proc.once("spawn", () => resolve(null));
      proc.once("error", (error) => resolve(error));
    });

    if (failure) {
      this.logger.debug("Spawn failed", { executable, cwd, error: failure.message });
      return Err(spawnError(executable, failure));
    }

    this.logger.debug("Process spawned", { executable, pid: proc.pid });
    return Ok(new NodeProcessHandle(proc, this.gracePeriodMs, this.drainTimeoutMs, this.logger));
  }
}

function spawnError(executable: string, cause: unknown): SpawnError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new SpawnError(`Failed to start ${executable}: ${message}`, { cause });
}
