/**
 * Parallel Task Scheduler
 *
 * Runs a batch of GenerationTasks on a bounded pool of workers. Tasks queue in
 * submission order; a task with dependencies waits until every dependency is
 * terminal and is skipped when any of them failed or was skipped.
 */

import { BackendUnavailableError, InvalidBatchError } from "./errors";
import { composeSynthesisInput } from "./promptTemplates";
import type { BatchReport, GenerationTask, TaskOutcome } from "./types";
import type { UsageLog } from "./usageLog";

export type TaskRunner = (task: GenerationTask) => Promise<TaskOutcome>;

// ═══════════════════════════════════════════════════════════════════════════════
// BATCH VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

/** Throws InvalidBatchError for duplicate ids, unknown dependencies or cycles. */
export function validateBatch(tasks: readonly GenerationTask[]): void {
  const byId = new Map<string, GenerationTask>();
  for (const task of tasks) {
    if (byId.has(task.taskId)) {
      throw new InvalidBatchError(`Duplicate task id '${task.taskId}'`);
    }
    byId.set(task.taskId, task);
  }

  for (const task of tasks) {
    for (const dep of task.dependsOn ?? []) {
      if (!byId.has(dep)) {
        throw new InvalidBatchError(`Task '${task.taskId}' depends on unknown task '${dep}'`);
      }
    }
  }

  const visiting = new Set<string>();
  const done = new Set<string>();
  const visit = (taskId: string, trail: string[]): void => {
    if (done.has(taskId)) return;
    if (visiting.has(taskId)) {
      throw new InvalidBatchError(`Dependency cycle: ${[...trail, taskId].join(" -> ")}`);
    }
    visiting.add(taskId);
    for (const dep of byId.get(taskId)?.dependsOn ?? []) {
      visit(dep, [...trail, taskId]);
    }
    visiting.delete(taskId);
    done.add(taskId);
  };
  for (const task of tasks) {
    visit(task.taskId, []);
  }
}

function isBlocking(outcome: TaskOutcome): boolean {
  return outcome.status === "failed" || outcome.status === "skipped";
}

function summarize(batchId: string, startedAt: number, outcomes: TaskOutcome[]): BatchReport {
  const completedAt = Date.now();
  const count = (status: TaskOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  return {
    batchId,
    startedAt: new Date(startedAt).toISOString(),
    completedAt: new Date(completedAt).toISOString(),
    durationMs: completedAt - startedAt,
    outcomes,
    counts: {
      total: outcomes.length,
      accepted: count("accepted"),
      exhausted: count("exhausted"),
      failed: count("failed"),
      skipped: count("skipped"),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEDULER
// ═══════════════════════════════════════════════════════════════════════════════

export class TaskScheduler {
  constructor(
    private readonly workerCount: number,
    private readonly runTask: TaskRunner,
    private readonly usageLog?: UsageLog,
  ) {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new InvalidBatchError(`workerCount must be a positive integer (got ${workerCount})`);
    }
  }

  /**
   * Run every task to a terminal outcome. A BackendUnavailableError (or any
   * other error a runner throws) stops dispatching; in-flight tasks finish and
   * the first error is rethrown.
   */
  async run(tasks: readonly GenerationTask[], batchId: string): Promise<BatchReport> {
    validateBatch(tasks);

    const startedAt = Date.now();
    const outcomes = new Map<string, TaskOutcome>();
    const inFlight = new Map<string, Promise<void>>();
    let pending = [...tasks];
    let fatal: unknown = null;

    console.log(`[Scheduler] Batch ${batchId}: ${tasks.length} task(s) on ${this.workerCount} worker(s)`);

    while (pending.length > 0 || inFlight.size > 0) {
      if (fatal === null) {
        pending = this.dispatch(pending, outcomes, inFlight, (error) => {
          fatal ??= error;
        });
      }
      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
    }

    if (fatal !== null) {
      const reason = fatal instanceof BackendUnavailableError ? "backend unavailable" : "runner error";
      console.error(`[Scheduler] Batch ${batchId} aborted (${reason}); ${pending.length} task(s) not dispatched`);
      throw fatal;
    }

    const report = summarize(
      batchId,
      startedAt,
      tasks.flatMap((task) => {
        const outcome = outcomes.get(task.taskId);
        return outcome ? [outcome] : [];
      }),
    );
    const { counts } = report;
    console.log(
      `[Scheduler] Batch ${batchId} complete in ${report.durationMs}ms: ${counts.accepted} accepted, ${counts.exhausted} exhausted, ${counts.failed} failed, ${counts.skipped} skipped`,
    );
    return report;
  }

  /**
   * Skip what is blocked, start what is ready while workers are free, and
   * return the tasks still waiting.
   */
  private dispatch(
    pending: GenerationTask[],
    outcomes: Map<string, TaskOutcome>,
    inFlight: Map<string, Promise<void>>,
    onFatal: (error: unknown) => void,
  ): GenerationTask[] {
    let waiting = pending;
    let skipped = true;

    // Skips cascade, so repeat until a pass skips nothing
    while (skipped) {
      skipped = false;
      waiting = waiting.filter((task) => {
        const blockedBy = (task.dependsOn ?? []).filter((dep) => {
          const outcome = outcomes.get(dep);
          return outcome !== undefined && isBlocking(outcome);
        });
        if (blockedBy.length === 0) return true;

        outcomes.set(task.taskId, { status: "skipped", taskId: task.taskId, domainKey: task.domainKey, blockedBy });
        this.usageLog?.recordTransition(task.taskId, "PENDING", "SKIPPED");
        console.warn(`[Scheduler] Skipping ${task.taskId}: dependency ${blockedBy.join(", ")} did not produce a narrative`);
        skipped = true;
        return false;
      });
    }

    return waiting.filter((task) => {
      if (inFlight.size >= this.workerCount) return true;
      const deps = task.dependsOn ?? [];
      if (!deps.every((dep) => outcomes.has(dep))) return true;

      const prepared = this.withDependencyText(task, outcomes);
      const running = this.runTask(prepared).then(
        (outcome) => {
          outcomes.set(task.taskId, outcome);
          inFlight.delete(task.taskId);
        },
        (error: unknown) => {
          onFatal(error);
          inFlight.delete(task.taskId);
        },
      );
      inFlight.set(task.taskId, running);
      return false;
    });
  }

  /** Synthesis tasks see their dependencies' narratives appended to their own input. */
  private withDependencyText(task: GenerationTask, outcomes: Map<string, TaskOutcome>): GenerationTask {
    const deps = task.dependsOn ?? [];
    if (deps.length === 0) return task;

    const sections: Array<{ domainKey: string; text: string }> = [];
    for (const dep of deps) {
      const outcome = outcomes.get(dep);
      if (outcome && (outcome.status === "accepted" || outcome.status === "exhausted")) {
        sections.push({ domainKey: outcome.domainKey, text: outcome.result.text });
      }
    }
    return { ...task, inputText: composeSynthesisInput(task.inputText, sections) };
  }
}
