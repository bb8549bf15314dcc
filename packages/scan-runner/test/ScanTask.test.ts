import { describe, it, expect, beforeEach } from "vitest";
import { ScanTask } from "../src/core/ScanTask.js";
import { ResultAccumulator } from "../src/core/ResultAccumulator.js";
import type { TaskDefinition, TaskEvent } from "../src/core/model.js";
import { ScriptedProcessRunner, flush, recordingLogger, resultLine } from "./fakes/ScriptedProcessRunner.js";

function definition(overrides: Partial<TaskDefinition> = {}): TaskDefinition {
  return {
    id: "task-1",
    name: "Scan-1",
    targets: ["http://a", "http://b"],
    templates: ["tmpl1"],
    templatePaths: ["/templates/tmpl1.yaml"],
    options: { rateLimit: null, concurrency: 10, proxy: null, dnsCallback: null, severity: null, outputPath: null },
    executable: "nuclei",
    cwd: "/work",
    ...overrides,
  };
}

describe("ScanTask", () => {
  let runner: ScriptedProcessRunner;
  let events: TaskEvent[];
  let clock: number;

  const createTask = (overrides: Partial<TaskDefinition> = {}): ScanTask =>
    new ScanTask(definition(overrides), {
      runner,
      accumulator: new ResultAccumulator({ now: () => new Date(clock) }),
      logger: recordingLogger(),
      now: () => new Date(clock),
      onEvent: (event) => events.push(event),
    });

  beforeEach(() => {
    runner = new ScriptedProcessRunner();
    events = [];
    clock = Date.parse("2026-01-01T00:00:00.000Z");
  });

  describe("submit", () => {
    it("spawns the scanner with the task's arguments and enters running", async () => {
      const task = createTask();

      const submitted = await task.submit();

      expect(submitted.ok).toBe(true);
      expect(task.snapshot().state).toBe("running");
      expect(runner.calls).toEqual([
        {
          executable: "nuclei",
          args: ["-jsonl", "-silent", "-c", "10", "-t", "/templates/tmpl1.yaml", "-target", "http://a", "-target", "http://b"],
          cwd: "/work",
        },
      ]);
    });

    it("fails the task when the scanner cannot be spawned", async () => {
      runner.failNextSpawn("Failed to start nuclei: spawn nuclei ENOENT");
      const task = createTask();

      await task.submit();
      const final = await task.done;

      expect(final.state).toBe("failed");
      expect(final.lastError).toBe("Failed to start nuclei: spawn nuclei ENOENT");
      expect(final.startedAt).toBeNull();
    });

    it("can only be submitted once", async () => {
      const task = createTask();
      await task.submit();

      const again = await task.submit();

      expect(again.ok).toBe(false);
      if (again.ok) return;
      expect(again.error.code).toBe("INVALID_STATE");
      expect(runner.calls).toHaveLength(1);
    });
  });

  describe("read loop", () => {
    it("completes with one record per result line", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      proc.emit(resultLine("tmpl1", "http://a"), resultLine("tmpl1", "http://b"));
      proc.exit(0);
      const final = await task.done;

      expect(final.state).toBe("completed");
      expect(final.resultCount).toBe(2);
      expect(final.linesProcessed).toBe(2);
      expect(final.exitCode).toBe(0);
      expect(task.results().map((r) => r.target)).toEqual(["http://a", "http://b"]);
    });

    it("counts malformed lines without failing or adding results", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      proc.emit("[INF] Using templates", "not json", resultLine("tmpl1", "http://a"), "", '{"foo":1}');
      proc.exit(0);
      const final = await task.done;

      expect(final.state).toBe("completed");
      expect(final.resultCount).toBe(1);
      expect(final.malformedLines).toBe(3);
      expect(final.linesProcessed).toBe(5);
    });

    it("fails on a non-zero exit and keeps the results received so far", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      proc.emit(resultLine("tmpl1", "http://a"));
      proc.writeStderr("[INF] Loading templates", "[FTL] Could not read targets");
      proc.exit(2);
      const final = await task.done;

      expect(final.state).toBe("failed");
      expect(final.exitCode).toBe(2);
      expect(final.lastError).toBe("Scanner exited with code 2: [FTL] Could not read targets");
      expect(final.resultCount).toBe(1);
      expect(task.results()[0].templateId).toBe("tmpl1");
    });

    it("reports the bare exit code when stderr is empty", async () => {
      const task = createTask();
      await task.submit();

      runner.last().exit(1);
      const final = await task.done;

      expect(final.lastError).toBe("Scanner exited with code 1");
    });

    it("fails and terminates the process when output cannot be read", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      proc.breakOutput(new Error("pipe broke"));
      const final = await task.done;

      expect(final.state).toBe("failed");
      expect(final.lastError).toBe("Failed to read scanner output: pipe broke");
      expect(proc.terminateCalls).toBe(1);
      expect(final.exitCode).toBe(143);
    });

    it("emits state and progress events", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      proc.emit(resultLine("tmpl1", "http://a"));
      proc.exit(0);
      await task.done;

      expect(events.map((e) => e.kind)).toEqual(["state", "progress", "state"]);
      expect(events.map((e) => e.snapshot.state)).toEqual(["running", "running", "completed"]);
      expect(events[1].snapshot.resultCount).toBe(1);
    });
  });

  describe("stop", () => {
    it("stops a pending task without spawning", async () => {
      const task = createTask();

      const stopped = await task.stop();

      expect(stopped.state).toBe("stopped");
      expect(runner.calls).toHaveLength(0);
      expect((await task.submit()).ok).toBe(false);
    });

    it("terminates a running process and ends stopped", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      const stopped = await task.stop();

      expect(stopped.state).toBe("stopped");
      expect(stopped.exitCode).toBe(143);
      expect(proc.terminateCalls).toBe(1);
    });

    it("is idempotent and enters stopped exactly once", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();

      const [first, second] = await Promise.all([task.stop(), task.stop()]);
      const third = await task.stop();

      expect([first.state, second.state, third.state]).toEqual(["stopped", "stopped", "stopped"]);
      expect(proc.terminateCalls).toBe(1);
      expect(events.filter((e) => e.kind === "state" && e.snapshot.state === "stopped")).toHaveLength(1);
    });

    it("force-kills a process that ignores SIGTERM and still ends stopped", async () => {
      runner.behavior = { ignoreTerm: true, gracePeriodMs: 50 };
      const task = createTask();
      await task.submit();

      const stopped = await task.stop();

      expect(stopped.state).toBe("stopped");
      expect(stopped.exitCode).toBe(137);
    });

    it("keeps results received before the stop", async () => {
      const task = createTask();
      await task.submit();
      runner.last().emit(resultLine("tmpl1", "http://a", "critical"));
      await flush();

      const stopped = await task.stop();

      expect(stopped.resultCount).toBe(1);
      expect(task.results()[0].severity).toBe("critical");
    });

    it("does nothing on a finished task", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();
      proc.exit(0);
      await task.done;

      const stopped = await task.stop();

      expect(stopped.state).toBe("completed");
      expect(proc.terminateCalls).toBe(0);
    });

    it("keeps the completed outcome of a scanner that exited before the stop", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();
      proc.emit(resultLine("tmpl1", "http://a"));
      proc.exit(0);

      const stopped = await task.stop();

      expect(stopped.state).toBe("completed");
      expect(stopped.exitCode).toBe(0);
      expect(stopped.resultCount).toBe(1);
      expect(proc.terminateCalls).toBe(0);
    });

    it("keeps the exit failure of a scanner that exited before the stop", async () => {
      const task = createTask();
      await task.submit();
      const proc = runner.last();
      proc.writeStderr("[FTL] Could not read targets");
      proc.exit(2);

      const stopped = await task.stop();

      expect(stopped.state).toBe("failed");
      expect(stopped.lastError).toBe("Scanner exited with code 2: [FTL] Could not read targets");
      expect(proc.terminateCalls).toBe(0);
    });

    it("terminates a process whose spawn finished after the stop", async () => {
      const release = runner.holdSpawns();
      const task = createTask();

      const submitting = task.submit();
      const stopped = await task.stop();
      release();
      await submitting;

      expect(stopped.state).toBe("stopped");
      expect(task.snapshot().state).toBe("stopped");
      expect(runner.last().terminateCalls).toBe(1);
      expect(runner.last().exited).toBe(true);
    });

    it("stays stopped when a spawn in flight then fails", async () => {
      const release = runner.holdSpawns();
      runner.failNextSpawn("Failed to start nuclei: spawn nuclei EACCES");
      const task = createTask();

      const submitting = task.submit();
      await task.stop();
      release();
      await submitting;

      expect(task.snapshot().state).toBe("stopped");
      expect(task.snapshot().lastError).toBeNull();
    });
  });

  describe("snapshot", () => {
    it("is frozen and reports counts", async () => {
      const task = createTask();
      const snapshot = task.snapshot();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot).toMatchObject({
        id: "task-1",
        name: "Scan-1",
        state: "pending",
        targetCount: 2,
        templateCount: 1,
        resultCount: 0,
        elapsedMs: 0,
        createdAt: "2026-01-01T00:00:00.000Z",
        startedAt: null,
        endedAt: null,
      });
    });

    it("measures elapsed time from start until the end", async () => {
      const task = createTask();
      await task.submit();

      clock += 1500;
      expect(task.snapshot().elapsedMs).toBe(1500);

      runner.last().exit(0);
      await task.done;
      clock += 5000;

      expect(task.snapshot().elapsedMs).toBe(1500);
      expect(task.snapshot().endedAt).toBe("2026-01-01T00:00:01.500Z");
    });

    it("hands out copies of the results", async () => {
      const task = createTask();
      await task.submit();
      runner.last().emit(resultLine("tmpl1", "http://a"));
      runner.last().exit(0);
      await task.done;

      const results = task.results();
      results.pop();

      expect(task.results()).toHaveLength(1);
    });
  });
});
