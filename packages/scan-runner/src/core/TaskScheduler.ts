/**
 * TaskScheduler - registry of scan tasks.
 *
 * Validates requests, resolves templates, snapshots configuration defaults
 * and hands each task its process runner. Owns registry membership only;
 * task state belongs to the tasks themselves.
 */

import { nanoid } from "nanoid";
import { Ok, Err, createLogger, type Result, type Logger } from "@scanwarden/core";
import { InvalidStateError, NotFoundError, ValidationError } from "./errors.js";
import { DEFAULT_WAIT_TIMEOUT } from "./model.js";
import type {
  ProxySettings,
  ResolvedScanOptions,
  ResultRecord,
  ScanConfig,
  ScanOptions,
  TaskDefinition,
  TaskEvent,
  TaskListener,
  TaskSnapshot,
} from "./model.js";
import type { ProcessRunner, TemplateStore } from "./ports/index.js";
import { ResultAccumulator } from "./ResultAccumulator.js";
import { ScanTask } from "./ScanTask.js";
import { summarizeBySeverity } from "./summary.js";
import { validateCreateRequest } from "./validation.js";

export interface TaskSchedulerDeps {
  runner: ProcessRunner;
  templates: TemplateStore;
  /** Read once per createTask; later changes never reach existing tasks. */
  config: () => ScanConfig;
  logger?: Logger;
  accumulator?: ResultAccumulator;
  idGenerator?: () => string;
  now?: () => Date;
}

export class TaskScheduler {
  private readonly tasks = new Map<string, ScanTask>();
  private readonly listeners = new Set<TaskListener>();
  private readonly runner: ProcessRunner;
  private readonly templates: TemplateStore;
  private readonly config: () => ScanConfig;
  private readonly logger: Logger;
  private readonly accumulator: ResultAccumulator;
  private readonly idGenerator: () => string;
  private readonly now: () => Date;
  private created = 0;

  constructor(deps: TaskSchedulerDeps) {
    this.runner = deps.runner;
    this.templates = deps.templates;
    this.config = deps.config;
    this.logger = deps.logger ?? createLogger("scan-runner");
    this.now = deps.now ?? (() => new Date());
    this.accumulator = deps.accumulator ?? new ResultAccumulator({ now: this.now });
    this.idGenerator = deps.idGenerator ?? (() => nanoid(12));
  }

  /**
   * Validate, register and launch a task. Returns its id.
   * Validation failures leave the registry untouched and spawn nothing.
   */
  async createTask(input: unknown): Promise<Result<string, ValidationError | InvalidStateError>> {
    const validated = validateCreateRequest(input);
    if (!validated.ok) {
      this.logger.warn("Rejected scan request", { error: validated.error.message });
      return validated;
    }
    const request = validated.value;

    const config = this.config();
    const resolved = await Promise.all(request.templates.map((id) => this.templates.resolve(id)));
    const missing = request.templates.filter((_, i) => !resolved[i].ok);
    if (missing.length > 0) {
      const issues = missing.map((id) => `templates: Unknown template "${id}"`);
      this.logger.warn("Rejected scan request", { missing: missing.join(",") });
      return Err(new ValidationError(`Unknown template(s): ${missing.join(", ")}`, issues));
    }
    const templatePaths = resolved.flatMap((result) => (result.ok ? [result.value] : []));

    const id = this.idGenerator();
    this.created++;

    const definition: TaskDefinition = Object.freeze({
      id,
      name: request.name ?? `Scan-${this.created}`,
      targets: Object.freeze(request.targets),
      templates: Object.freeze(request.templates),
      templatePaths: Object.freeze(templatePaths),
      options: resolveOptions(request.options, config),
      executable: config.scannerPath,
      cwd: config.workDir,
    });

    const task = new ScanTask(definition, {
      runner: this.runner,
      accumulator: this.accumulator,
      logger: this.logger.child(id),
      now: this.now,
      onEvent: (event) => this.dispatch(event),
    });
    this.tasks.set(id, task);
    this.logger.info("Task created", {
      id,
      name: definition.name,
      targets: definition.targets.length,
      templates: definition.templates.length,
    });

    const submitted = await task.submit();
    if (!submitted.ok) {
      return submitted;
    }
    return Ok(id);
  }

  get(id: string): Result<TaskSnapshot, NotFoundError> {
    const task = this.tasks.get(id);
    return task ? Ok(task.snapshot()) : Err(notFound(id));
  }

  results(id: string): Result<ResultRecord[], NotFoundError> {
    const task = this.tasks.get(id);
    return task ? Ok(task.results()) : Err(notFound(id));
  }

  /**
   * Result counts per severity, most severe first.
   */
  summarize(id: string): Result<Record<string, number>, NotFoundError> {
    const task = this.tasks.get(id);
    return task ? Ok(summarizeBySeverity(task.results())) : Err(notFound(id));
  }

  async stop(id: string): Promise<Result<TaskSnapshot, NotFoundError>> {
    const task = this.tasks.get(id);
    if (!task) {
      return Err(notFound(id));
    }
    return Ok(await task.stop());
  }

  /**
   * Wait until the task is terminal, or the timeout passes.
   * On timeout the current snapshot is returned; check its state.
   */
  async wait(id: string, timeoutMs: number = DEFAULT_WAIT_TIMEOUT): Promise<Result<TaskSnapshot, NotFoundError>> {
    const task = this.tasks.get(id);
    if (!task) {
      return Err(notFound(id));
    }
    if (task.isFinished) {
      return Ok(task.snapshot());
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<TaskSnapshot>((resolve) => {
      timer = setTimeout(() => resolve(task.snapshot()), timeoutMs);
    });

    try {
      return Ok(await Promise.race([task.done, timedOut]));
    } finally {
      clearTimeout(timer);
    }
  }

  /** Snapshots in creation order. */
  list(): TaskSnapshot[] {
    return [...this.tasks.values()].map((task) => task.snapshot());
  }

  /**
   * Forget a finished task.
   */
  remove(id: string): Result<TaskSnapshot, NotFoundError | InvalidStateError> {
    const task = this.tasks.get(id);
    if (!task) {
      return Err(notFound(id));
    }

    const snapshot = task.snapshot();
    if (!task.isFinished) {
      return Err(new InvalidStateError(`Task ${id} is ${snapshot.state}; stop it before removing`));
    }

    this.tasks.delete(id);
    this.logger.debug("Task removed", { id });
    return Ok(snapshot);
  }

  /**
   * Remove every finished task. Returns how many were removed.
   */
  clearFinished(): number {
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (task.isFinished) {
        this.tasks.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info("Cleared finished tasks", { removed });
    }
    return removed;
  }

  /**
   * Receive state and progress events of every task.
   * Returns the unsubscribe function.
   */
  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop every live task. Returns how many were stopped.
   */
  async stopAll(): Promise<number> {
    const live = [...this.tasks.values()].filter((task) => !task.isFinished);
    await Promise.all(live.map((task) => task.stop()));
    return live.length;
  }

  private dispatch(event: TaskEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("Task listener failed", {
          id: event.snapshot.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/**
 * Apply configuration defaults to the caller's options.
 */
export function resolveOptions(options: ScanOptions, config: ScanConfig): ResolvedScanOptions {
  const dnsCallback = options.dnsCallback ?? config.dnsCallback.trim();

  return Object.freeze({
    rateLimit: options.rateLimit ?? (config.rateLimit > 0 ? config.rateLimit : null),
    concurrency: options.concurrency ?? config.concurrency,
    proxy: options.proxy ?? defaultProxy(config.proxy),
    dnsCallback: dnsCallback === "" ? null : dnsCallback,
    severity: options.severity ? Object.freeze([...new Set(options.severity)]) : null,
    outputPath: options.outputPath ?? null,
  });
}

/**
 * First configured proxy, in http, https, socks5 order.
 */
export function defaultProxy(proxy: ProxySettings): string | null {
  for (const value of [proxy.http, proxy.https, proxy.socks5]) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return null;
}

function notFound(id: string): NotFoundError {
  return new NotFoundError(`Task not found: ${id}`);
}
