/**
 * @scanwarden/scan-runner - Scan task scheduling and execution tracking.
 */

export { TaskScheduler, resolveOptions, defaultProxy } from "./core/TaskScheduler.js";
export type { TaskSchedulerDeps } from "./core/TaskScheduler.js";
export { ScanTask } from "./core/ScanTask.js";
export type { ScanTaskDeps } from "./core/ScanTask.js";
export { ResultAccumulator } from "./core/ResultAccumulator.js";
export type { ResultSink, ResultAccumulatorOptions } from "./core/ResultAccumulator.js";
export { LineChannel, END_OF_STREAM } from "./core/LineChannel.js";
export type { EndOfStream } from "./core/LineChannel.js";
export { buildScanArguments, BASE_FLAGS } from "./core/scanArguments.js";
export { summarizeBySeverity } from "./core/summary.js";
export { validateCreateRequest, normalizeList, isProxyUrl } from "./core/validation.js";
export {
  ScanError,
  ValidationError,
  SpawnError,
  RuntimeExitError,
  NotFoundError,
  InvalidStateError,
} from "./core/errors.js";
export type { ScanErrorCode } from "./core/errors.js";
export * from "./core/model.js";
export type { ProcessRunner, ProcessHandle, TerminationOutcome, TemplateStore } from "./core/ports/index.js";

export { NodeProcessRunner } from "./infrastructure/NodeProcessRunner.js";
export type { NodeProcessRunnerOptions } from "./infrastructure/NodeProcessRunner.js";
export { FileTemplateStore } from "./infrastructure/FileTemplateStore.js";

export { loadConfig, defaultConfig, defaultConfigDir } from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { cleanLine, cleanOutput, failureDetail } from "./cleanOutput.js";
export { registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
