/**
 * ScanTask - one scanner run and its lifecycle.
 *
 * pending → running → completed | failed | stopped
 *
 * The read loop owns the running phase: it pulls output from the process
 * handle, feeds the accumulator and decides the terminal state once the
 * stream ends. stop() only asks the handle to terminate and waits for the
 * loop to observe the end of the stream.
 */

import { Ok, Err, type Result, type Logger } from "@scanwarden/core";
import { failureDetail } from "../cleanOutput.js";
import { InvalidStateError, RuntimeExitError } from "./errors.js";
import { END_OF_STREAM } from "./LineChannel.js";
import { isTerminal } from "./model.js";
import type { ResultRecord, TaskDefinition, TaskEvent, TaskSnapshot, TaskState } from "./model.js";
import type { ProcessHandle, ProcessRunner } from "./ports/index.js";
import type { ResultAccumulator, ResultSink } from "./ResultAccumulator.js";
import { buildScanArguments } from "./scanArguments.js";

export interface ScanTaskDeps {
  runner: ProcessRunner;
  accumulator: ResultAccumulator;
  logger: Logger;
  now?: () => Date;
  /** Called on every state change and after each consumed output batch. */
  onEvent?: (event: TaskEvent) => void;
}

export class ScanTask implements ResultSink {
  readonly id: string;
  readonly name: string;

  private readonly runner: ProcessRunner;
  private readonly accumulator: ResultAccumulator;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly onEvent: (event: TaskEvent) => void;

  private state: TaskState = "pending";
  private readonly records: ResultRecord[] = [];
  private linesProcessed = 0;
  private malformedLines = 0;
  private readonly createdAt: Date;
  private startedAt: Date | null = null;
  private endedAt: Date | null = null;
  private exitCode: number | null = null;
  private lastError: string | null = null;

  private handle: ProcessHandle | null = null;
  private launching = false;
  private stopRequested = false;
  private stopping: Promise<TaskSnapshot> | null = null;
  private loop: Promise<void> | null = null;

  private resolveDone: (snapshot: TaskSnapshot) => void = () => {};

  /** Resolves with the terminal snapshot. */
  readonly done: Promise<TaskSnapshot>;

  constructor(
    readonly definition: TaskDefinition,
    deps: ScanTaskDeps
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.runner = deps.runner;
    this.accumulator = deps.accumulator;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
    this.onEvent = deps.onEvent ?? (() => {});
    this.createdAt = this.now();
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  /**
   * Spawn the scanner. Resolves once the process is running or the task
   * has failed to start; never waits for the scan itself.
   */
  async submit(): Promise<Result<TaskSnapshot, InvalidStateError>> {
    if (this.state !== "pending" || this.launching) {
      return Err(new InvalidStateError(`Task ${this.id} is ${this.state}, it can only be submitted once`));
    }

    this.launching = true;
    const args = buildScanArguments(this.definition);
    this.logger.debug("Spawning scanner", {
      executable: this.definition.executable,
      args: args.join(" "),
    });

    const started = await this.runner.start(this.definition.executable, args, this.definition.cwd);
    this.launching = false;

    if (!started.ok) {
      if (this.state === "pending") {
        this.lastError = started.error.message;
        this.logger.error("Scanner failed to start", { error: started.error.message });
        this.finish("failed");
      }
      return Ok(this.snapshot());
    }

    const handle = started.value;

    // Stopped while the process was being created
    if (this.state !== "pending") {
      const outcome = await handle.terminate();
      this.logger.info("Terminated scanner started after stop", { pid: handle.pid, outcome });
      return Ok(this.snapshot());
    }

    this.handle = handle;
    this.startedAt = this.now();
    this.transition("running");
    this.logger.info("Scanner started", { pid: handle.pid });
    this.loop = this.readLoop(handle);

    return Ok(this.snapshot());
  }

  /**
   * Cancel the task. Safe to call any number of times, from any state.
   */
  async stop(): Promise<TaskSnapshot> {
    if (isTerminal(this.state)) {
      return this.snapshot();
    }
    if (this.stopping) {
      return this.stopping;
    }

    if (this.state === "pending") {
      this.stopRequested = true;
      this.finish("stopped");
      return this.snapshot();
    }

    this.stopping = this.stopRunning();
    return this.stopping;
  }

  snapshot(): TaskSnapshot {
    const startedAt = this.startedAt;
    const elapsedMs = startedAt ? (this.endedAt ?? this.now()).getTime() - startedAt.getTime() : 0;

    return Object.freeze({
      id: this.id,
      name: this.name,
      state: this.state,
      targetCount: this.definition.targets.length,
      templateCount: this.definition.templates.length,
      resultCount: this.records.length,
      linesProcessed: this.linesProcessed,
      malformedLines: this.malformedLines,
      elapsedMs,
      createdAt: this.createdAt.toISOString(),
      startedAt: startedAt ? startedAt.toISOString() : null,
      endedAt: this.endedAt ? this.endedAt.toISOString() : null,
      exitCode: this.exitCode,
      lastError: this.lastError,
    });
  }

  /** Records found so far, oldest first. */
  results(): ResultRecord[] {
    return [...this.records];
  }

  get isFinished(): boolean {
    return isTerminal(this.state);
  }

  // ResultSink

  appendResult(record: ResultRecord): void {
    this.records.push(record);
  }

  countMalformed(): void {
    this.malformedLines++;
  }

  // Internals

  private async stopRunning(): Promise<TaskSnapshot> {
    const handle = this.handle;

    // An exited scanner keeps its own outcome; the loop only has output left to drain.
    if (handle && handle.exitStatus() === null) {
      this.stopRequested = true;
      const outcome = await handle.terminate();
      this.logger.info("Scanner terminated", { outcome });
    }
    await this.loop;
    return this.snapshot();
  }

  private async readLoop(handle: ProcessHandle): Promise<void> {
    try {
      for (;;) {
        const chunk = await handle.readNextChunk();
        if (chunk === END_OF_STREAM) break;

        for (const line of chunk) {
          this.linesProcessed++;
          this.accumulator.feed(this, line);
        }
        this.emit("progress");
      }
    } catch (error) {
      this.lastError = `Failed to read scanner output: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error("Output read failed", { error: this.lastError });
      await handle.terminate();
      this.exitCode = handle.exitStatus();
      this.finish(this.stopRequested ? "stopped" : "failed");
      return;
    }

    this.exitCode = handle.exitStatus();

    if (this.stopRequested) {
      this.finish("stopped");
    } else if (this.exitCode === 0) {
      this.finish("completed");
    } else {
      const exitCode = this.exitCode ?? -1;
      const error = new RuntimeExitError(exitCode, failureDetail(handle.diagnostics()) ?? undefined);
      this.lastError = error.message;
      this.logger.warn("Scanner exited with error", { exitCode });
      this.finish("failed");
    }
  }

  private transition(state: TaskState): void {
    this.state = state;
    this.emit("state");
  }

  /**
   * Enter a terminal state. Later calls are ignored.
   */
  private finish(state: TaskState): void {
    if (isTerminal(this.state)) return;

    this.endedAt = this.now();
    this.transition(state);
    this.logger.info("Task finished", {
      state,
      results: this.records.length,
      lines: this.linesProcessed,
      malformed: this.malformedLines,
    });
    this.resolveDone(this.snapshot());
  }

  private emit(kind: TaskEvent["kind"]): void {
    this.onEvent({ kind, snapshot: this.snapshot() });
  }
}
