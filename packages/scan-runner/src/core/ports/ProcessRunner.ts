import type { Result } from "@scanwarden/core";
import type { SpawnError } from "../errors.js";
import type { EndOfStream } from "../LineChannel.js";

/**
 * How a terminate() request ended.
 *
 * - graceful: the process exited after SIGTERM
 * - forced: the grace period ran out and the process was killed
 * - already-exited: nothing to do
 */
export type TerminationOutcome = "graceful" | "forced" | "already-exited";

/**
 * A live scanner process and its output cursor.
 * Owned by exactly one task.
 */
export interface ProcessHandle {
  readonly pid: number | undefined;

  /**
   * Wait for the next complete stdout lines.
   * Resolves END_OF_STREAM once the process exited and its output closed
   * (or the drain window after exit ran out), and on every call after that.
   */
  readNextChunk(): Promise<string[] | EndOfStream>;

  /** Exit status, null until the process has exited. Signals map to 128 + signal number. */
  exitStatus(): number | null;

  /** Most recent stderr lines, oldest first. */
  diagnostics(): string[];

  /** SIGTERM, then SIGKILL after the grace period, to the scanner and its children. Repeated calls share one outcome. */
  terminate(): Promise<TerminationOutcome>;
}

export interface ProcessRunner {
  start(executable: string, args: readonly string[], cwd: string): Promise<Result<ProcessHandle, SpawnError>>;
}
