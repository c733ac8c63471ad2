import { performance } from "perf_hooks";
import { DisposalOrchestratorImpl } from "../core/disposal/disposal-orchestrator";
import { OrphanDetector } from "../core/disposal/orphan-detector";
import type { ResourceTracker } from "../core/disposal/resource-tracker";
import { createGuidWithoutDashes } from "../core/guid";
import { Logger } from "../core/logger";
import { ServiceInitializable } from "../core/service-initializable";
import { createUspError, shutdownError, wrapError } from "../helpers/error/envelope";
import type { ScopedDisposable } from "../types/disposal";
import { ErrorCode } from "../types/error/error-taxonomy";
import type {
  ExecuteOptions,
  ScheduledTask,
  SubmitOptions,
  TaskContext,
  TaskFn,
  TaskHandle,
  TaskOutcome,
  ThreadServiceState,
  ThreadServiceStats,
  ThreadServiceTermReport,
} from "../types/thread-service";

export interface ThreadServiceOptions {
  /** Number of tasks that may run at once across all queues. */
  concurrency?: number;
  logger?: Logger;
  /** Defaults to {@link ThreadService.orphans}. */
  tracker?: ResourceTracker;
  orphanDetector?: OrphanDetector;
}

const DEFAULT_CONCURRENCY = 16;
const DEFAULT_TERM_TIMEOUT_MS = 5000;
const DEFAULT_QUEUE = "default";

interface QueuedTask {
  readonly id: string;
  readonly queue: string;
  readonly controller: AbortController;
  /** Runs the task body and settles the handle with its value. */
  invoke(context: TaskContext): Promise<void>;
  fail(status: "failed" | "cancelled", error: Error): void;
  release(): void;
}

/**
 * Task executor with per-queue FIFO ordering over a shared pool of execution slots.
 *
 * @remarks
 * A queue never holds more than one slot, so a queue whose task stalls cannot
 * starve the others. Queues with pending work are served round-robin.
 */
export class ThreadService implements ServiceInitializable {
  private state: ThreadServiceState = "created";
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly tracker: ResourceTracker;
  readonly orphans: OrphanDetector;
  private readonly disposal: DisposalOrchestratorImpl;

  private readonly queues = new Map<string, QueuedTask[]>();
  private readonly readyQueues: string[] = [];
  private readonly busyQueues = new Set<string>();
  private readonly running = new Map<string, QueuedTask>();
  private readonly timers = new Map<string, { handle: NodeJS.Timeout; release(): void }>();
  private idleWaiters: Array<() => void> = [];
  private terminating: Promise<ThreadServiceTermReport> | undefined;

  constructor(options: ThreadServiceOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.logger = options.logger ?? new Logger("ThreadService");
    this.orphans = options.orphanDetector ?? new OrphanDetector();
    this.tracker = options.tracker ?? this.orphans;
    this.disposal = new DisposalOrchestratorImpl(this.logger, this.orphans);
  }

  async initialize(): Promise<void> {
    if (this.state !== "created") {
      return;
    }
    this.state = "running";
    this.logger.debug("Thread service initialized", { concurrency: this.concurrency });
  }

  isInitialized(): boolean {
    return this.state === "running";
  }

  isTerminated(): boolean {
    return this.state === "terminated";
  }

  async dispose(): Promise<void> {
    await this.term();
  }

  /**
   * Registers a resource that {@link term} disposes before draining queues.
   */
  register(scope: ScopedDisposable): void {
    this.disposal.register(scope);
  }

  unregister(id: string): void {
    this.disposal.unregister(id);
  }

  /**
   * Queues a task without waiting for it. Submissions after termination
   * complete immediately with a shutdown error.
   */
  executeAsync<T>(task: TaskFn<T>, options: SubmitOptions = {}): TaskHandle<T> {
    const queue = options.queue ?? DEFAULT_QUEUE;
    const id = createGuidWithoutDashes();

    if (!this.acceptsWork()) {
      const rejected: TaskOutcome<T> = {
        status: "cancelled",
        error: shutdownError(`Thread service is ${this.state}; task rejected`),
      };
      return {
        id,
        queue,
        completion: Promise.resolve(rejected),
        cancel: () => false,
      };
    }

    let settle: (outcome: TaskOutcome<T>) => void = () => undefined;
    const completion = new Promise<TaskOutcome<T>>((resolve) => {
      let settled = false;
      settle = (outcome) => {
        if (!settled) {
          settled = true;
          resolve(outcome);
        }
      };
    });

    const queued: QueuedTask = {
      id,
      queue,
      controller: new AbortController(),
      invoke: async (context) => {
        const value = await task(context);
        settle({ status: "completed", value });
      },
      fail: (status, error) => settle({ status, error }),
      release: this.tracker.trackTask(id),
    };
    this.enqueue(queued);

    return {
      id,
      queue,
      completion,
      cancel: () => this.cancelPending(queued),
    };
  }

  /**
   * Queues a task and waits for its result.
   *
   * @throws {@link UspError} with kind `shutdown` when the service stops before the
   * task completes, with code `TaskTimeout` when `timeoutMs` elapses, or the
   * wrapped task failure.
   */
  async execute<T>(task: TaskFn<T>, options: ExecuteOptions = {}): Promise<T> {
    const handle = this.executeAsync(task, options);
    const outcome =
      options.timeoutMs === undefined
        ? await handle.completion
        : await this.withTimeout(handle, options.timeoutMs);
    if (outcome.status === "completed") {
      return outcome.value;
    }
    throw outcome.error;
  }

  /**
   * Runs `task` on `queue` after `delayMs`. The timer is cleared on termination.
   */
  schedule<T>(task: TaskFn<T>, delayMs: number, options: SubmitOptions = {}): ScheduledTask {
    const id = createGuidWithoutDashes();
    if (!this.acceptsWork()) {
      return { id, cancel: () => undefined };
    }
    const release = this.tracker.trackTimer(id);
    const handle = setTimeout(() => {
      this.clearTimer(id);
      const scheduled = this.executeAsync(task, options);
      void scheduled.completion.then((outcome) => {
        if (outcome.status === "failed") {
          this.logger.warn("Scheduled task failed", { taskId: id, error: outcome.error.message });
        }
      });
    }, Math.max(0, delayMs));
    this.timers.set(id, { handle, release });
    return { id, cancel: () => this.clearTimer(id) };
  }

  stats(): ThreadServiceStats {
    let pending = 0;
    for (const tasks of this.queues.values()) {
      pending += tasks.length;
    }
    return {
      state: this.state,
      queues: this.queues.size,
      pendingTasks: pending,
      runningTasks: this.running.size,
      timers: this.timers.size,
      registeredScopes: this.disposal.size,
    };
  }

  /**
   * Disposes registered scopes, drains queued work up to `timeoutMs`, then
   * aborts what is still running and cancels what never started. Idempotent.
   */
  term(timeoutMs = DEFAULT_TERM_TIMEOUT_MS): Promise<ThreadServiceTermReport> {
    if (!this.terminating) {
      this.terminating = this.performTerm(timeoutMs);
    }
    return this.terminating;
  }

  private async performTerm(timeoutMs: number): Promise<ThreadServiceTermReport> {
    const startedAt = performance.now();
    const previous = this.state;
    this.state = "terminating";
    this.logger.debug("Thread service terminating", { previous, timeoutMs });

    const disposal = await this.disposal.disposeAll("service-term", {
      gracePeriodMs: timeoutMs,
    });
    const remaining = Math.max(0, timeoutMs - (performance.now() - startedAt));
    const drained = await this.waitForIdle(remaining);

    this.state = "terminated";

    let clearedTimers = 0;
    for (const id of Array.from(this.timers.keys())) {
      this.clearTimer(id);
      clearedTimers += 1;
    }

    let cancelledTasks = 0;
    for (const tasks of this.queues.values()) {
      for (const task of tasks) {
        task.fail("cancelled", shutdownError("Task cancelled by thread service termination"));
        task.release();
        cancelledTasks += 1;
      }
    }
    this.queues.clear();
    this.readyQueues.length = 0;

    let abortedTasks = 0;
    for (const task of this.running.values()) {
      task.controller.abort();
      task.fail("cancelled", shutdownError("Task abandoned by thread service termination"));
      task.release();
      abortedTasks += 1;
    }
    this.running.clear();
    this.busyQueues.clear();
    this.resolveIdleWaiters();

    const report: ThreadServiceTermReport = {
      drained,
      cancelledTasks,
      abortedTasks,
      clearedTimers,
      durationMs: Math.round(performance.now() - startedAt),
      disposal,
    };

    if (!drained) {
      this.logger.warn("Thread service terminated before queues drained", {
        cancelledTasks,
        abortedTasks,
        timeoutMs,
      });
    } else {
      this.logger.debug("Thread service terminated", { durationMs: report.durationMs });
    }
    return report;
  }

  private acceptsWork(): boolean {
    return this.state === "running" || this.state === "terminating";
  }

  private enqueue(task: QueuedTask): void {
    const tasks = this.queues.get(task.queue);
    if (tasks) {
      tasks.push(task);
    } else {
      this.queues.set(task.queue, [task]);
    }
    if (!this.busyQueues.has(task.queue) && !this.readyQueues.includes(task.queue)) {
      this.readyQueues.push(task.queue);
    }
    this.pump();
  }

  private pump(): void {
    while (this.running.size < this.concurrency && this.readyQueues.length > 0) {
      const queue = this.readyQueues.shift();
      if (queue === undefined) {
        return;
      }
      const next = this.queues.get(queue)?.shift();
      if (!next) {
        this.queues.delete(queue);
        continue;
      }
      this.busyQueues.add(queue);
      this.running.set(next.id, next);
      void this.runTask(next);
    }
  }

  private async runTask(task: QueuedTask): Promise<void> {
    const context: TaskContext = {
      taskId: task.id,
      queue: task.queue,
      signal: task.controller.signal,
    };
    try {
      // Task bodies never run on the submitter's stack.
      await Promise.resolve();
      await task.invoke(context);
    } catch (error: unknown) {
      if (task.controller.signal.aborted) {
        task.fail("cancelled", shutdownError("Task aborted by thread service termination"));
      } else {
        const wrapped = wrapError({
          kind: "shutdown",
          code: ErrorCode.RuntimeError,
          severity: "error",
          error,
        });
        this.logger.warn("Task failed", { taskId: task.id, queue: task.queue, error: wrapped.message });
        task.fail("failed", wrapped);
      }
    } finally {
      this.finishTask(task);
    }
  }

  private finishTask(task: QueuedTask): void {
    task.release();
    if (!this.running.delete(task.id)) {
      // Already abandoned by termination.
      return;
    }
    this.busyQueues.delete(task.queue);
    const remaining = this.queues.get(task.queue);
    if (remaining && remaining.length > 0) {
      this.readyQueues.push(task.queue);
    } else {
      this.queues.delete(task.queue);
    }
    this.pump();
    if (this.isIdle()) {
      this.resolveIdleWaiters();
    }
  }

  private cancelPending(task: QueuedTask): boolean {
    const tasks = this.queues.get(task.queue);
    const index = tasks ? tasks.indexOf(task) : -1;
    if (!tasks || index < 0) {
      return false;
    }
    tasks.splice(index, 1);
    if (tasks.length === 0) {
      this.queues.delete(task.queue);
      const readyIndex = this.readyQueues.indexOf(task.queue);
      if (readyIndex >= 0) {
        this.readyQueues.splice(readyIndex, 1);
      }
    }
    task.fail("cancelled", shutdownError("Task cancelled before it started"));
    task.release();
    if (this.isIdle()) {
      this.resolveIdleWaiters();
    }
    return true;
  }

  private async withTimeout<T>(handle: TaskHandle<T>, timeoutMs: number): Promise<TaskOutcome<T>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<TaskOutcome<T>>((resolve) => {
      timer = setTimeout(() => {
        handle.cancel();
        resolve({
          status: "failed",
          error: createUspError({
            kind: "shutdown",
            code: ErrorCode.TaskTimeout,
            severity: "error",
            message: `Task ${handle.id} did not complete within ${timeoutMs}ms`,
          }),
        });
      }, timeoutMs);
    });
    try {
      return await Promise.race([handle.completion, timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private clearTimer(id: string): void {
    const entry = this.timers.get(id);
    if (!entry) {
      return;
    }
    clearTimeout(entry.handle);
    entry.release();
    this.timers.delete(id);
  }

  private isIdle(): boolean {
    return this.running.size === 0 && this.queues.size === 0;
  }

  private waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const onIdle = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter((waiter) => waiter !== onIdle);
        resolve(this.isIdle());
      }, timeoutMs);
      this.idleWaiters.push(onIdle);
    });
  }

  private resolveIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
