/**
 * Error taxonomy for scan-runner.
 *
 * Errors are returned inside Result values; `code` is what tool responses expose.
 */

export type ScanErrorCode =
  | "VALIDATION"
  | "SPAWN"
  | "RUNTIME_EXIT"
  | "NOT_FOUND"
  | "INVALID_STATE";

export abstract class ScanError extends Error {
  abstract readonly code: ScanErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad task-creation input. Nothing was registered or spawned. */
export class ValidationError extends ScanError {
  readonly code = "VALIDATION";

  constructor(
    message: string,
    readonly issues: readonly string[] = [message],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** The scanner process could not be created. */
export class SpawnError extends ScanError {
  readonly code = "SPAWN";
}

/** The scanner exited with a non-zero status. */
export class RuntimeExitError extends ScanError {
  readonly code = "RUNTIME_EXIT";

  constructor(
    readonly exitCode: number,
    detail?: string
  ) {
    super(detail ? `Scanner exited with code ${exitCode}: ${detail}` : `Scanner exited with code ${exitCode}`);
  }
}

export class NotFoundError extends ScanError {
  readonly code = "NOT_FOUND";
}

/** Operation not allowed in the task's current state. */
export class InvalidStateError extends ScanError {
  readonly code = "INVALID_STATE";
}
