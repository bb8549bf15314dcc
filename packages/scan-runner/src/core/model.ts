/**
 * Core domain model for scan-runner.
 *
 * Design principles:
 * - One task = one scanner process, never reused
 * - The task's read loop is the only writer of its results and terminal state
 * - Snapshots are frozen copies, safe to hand to any caller
 */

/**
 * Task lifecycle state.
 *
 * - pending: Registered, process not spawned yet
 * - running: Process spawned, output being consumed
 * - completed: Process exited with code 0
 * - failed: Spawn failed, process exited non-zero, or output could not be read
 * - stopped: Cancelled by request
 */
export type TaskState = "pending" | "running" | "completed" | "failed" | "stopped";

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set(["completed", "failed", "stopped"]);

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Severity levels as reported by the scanner. */
export const SEVERITIES = ["info", "low", "medium", "high", "critical", "unknown"] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Advanced scanner options, as accepted from callers.
 * Every field is optional; unset fields fall back to configuration defaults.
 */
export interface ScanOptions {
  /** Max requests per second. */
  rateLimit?: number;

  /** Number of templates executed in parallel. */
  concurrency?: number;

  /** Proxy URL (http, https or socks5). */
  proxy?: string;

  /** Out-of-band interaction (DNS callback) server. */
  dnsCallback?: string;

  /** Only run templates of these severities. */
  severity?: Severity[];

  /** File the scanner also writes its findings to, relative to the working directory. */
  outputPath?: string;
}

/**
 * Options after defaults were applied. Fixed for the lifetime of a task.
 */
export interface ResolvedScanOptions {
  readonly rateLimit: number | null;
  readonly concurrency: number;
  readonly proxy: string | null;
  readonly dnsCallback: string | null;
  readonly severity: readonly Severity[] | null;
  readonly outputPath: string | null;
}

/**
 * Request to create a task.
 */
export interface CreateTaskRequest {
  /** Human-readable label. Default: "Scan-<n>" */
  name?: string;

  /** Target URLs or hosts. Trimmed and deduplicated. */
  targets: string[];

  /** Template identifiers, resolved through the template store. */
  templates: string[];

  options?: ScanOptions;
}

/**
 * Everything a task needs to launch its process.
 */
export interface TaskDefinition {
  readonly id: string;
  readonly name: string;
  readonly targets: readonly string[];
  readonly templates: readonly string[];
  /** Filesystem paths of the templates, same order as `templates`. */
  readonly templatePaths: readonly string[];
  readonly options: ResolvedScanOptions;
  /** Scanner executable. */
  readonly executable: string;
  /** Working directory for the scanner process. */
  readonly cwd: string;
}

/**
 * One finding parsed from scanner output.
 * Frozen on creation.
 */
export interface ResultRecord {
  /** Where the template matched (matched-at, else host). */
  readonly target: string;
  readonly templateId: string;
  readonly templateName: string;
  readonly severity: string;
  /** The output line exactly as received. */
  readonly raw: string;
  /** Arrival time (ISO string). */
  readonly receivedAt: string;
}

/**
 * Point-in-time view of a task. Frozen; never updated in place.
 */
export interface TaskSnapshot {
  readonly id: string;
  readonly name: string;
  readonly state: TaskState;
  readonly targetCount: number;
  readonly templateCount: number;
  readonly resultCount: number;
  /** Output lines consumed so far. */
  readonly linesProcessed: number;
  /** Lines that were neither blank nor a result. */
  readonly malformedLines: number;
  /** Time since the process started, 0 before that. */
  readonly elapsedMs: number;
  readonly createdAt: string;
  readonly startedAt: string | null;
  readonly endedAt: string | null;
  readonly exitCode: number | null;
  readonly lastError: string | null;
}

/**
 * Change notification for subscribers.
 *
 * - state: the task moved to a new lifecycle state
 * - progress: output was consumed while running
 */
export interface TaskEvent {
  readonly kind: "state" | "progress";
  readonly snapshot: TaskSnapshot;
}

export type TaskListener = (event: TaskEvent) => void;

/**
 * Configuration read at task-creation time.
 * Later changes never affect tasks already created.
 */
export interface ScanConfig {
  /** Scanner executable (path or name on PATH). Default: "nuclei" */
  readonly scannerPath: string;

  /** Directory searched by the file template store. */
  readonly templatesDir: string;

  /** Working directory for scanner processes. */
  readonly workDir: string;

  /** Default requests per second, 0 for no limit. Default: 50 */
  readonly rateLimit: number;

  /** Default template concurrency. Default: 25 */
  readonly concurrency: number;

  /** Default DNS callback server, empty for none. */
  readonly dnsCallback: string;

  /** Proxy defaults per scheme; the first non-blank one is used. */
  readonly proxy: ProxySettings;

  /** SIGTERM → SIGKILL grace period (ms). Default: 5000 */
  readonly gracePeriodMs: number;
}

export interface ProxySettings {
  readonly http?: string;
  readonly https?: string;
  readonly socks5?: string;
}

/** Default wait used by scheduler.wait() */
export const DEFAULT_WAIT_TIMEOUT = 30_000; // 30 seconds

/** Default SIGTERM → SIGKILL grace period */
export const DEFAULT_GRACE_PERIOD = 5_000; // 5 seconds
