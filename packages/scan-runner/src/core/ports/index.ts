export type { ProcessRunner, ProcessHandle, TerminationOutcome } from "./ProcessRunner.js";
export type { TemplateStore } from "./TemplateStore.js";
