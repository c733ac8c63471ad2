import type { DisposalReport } from "./disposal";

/**
 * Per-task context handed to every task body.
 */
export interface TaskContext {
  readonly taskId: string;
  readonly queue: string;
  /** Fires when the service abandons the task during termination. */
  readonly signal: AbortSignal;
}

export type TaskFn<T> = (context: TaskContext) => Promise<T> | T;

export type TaskStatus = "completed" | "failed" | "cancelled";

export type TaskOutcome<T> =
  | { readonly status: "completed"; readonly value: T }
  | { readonly status: "failed" | "cancelled"; readonly error: Error };

/**
 * Handle returned by fire-and-forget submission. `completion` never rejects.
 */
export interface TaskHandle<T> {
  readonly id: string;
  readonly queue: string;
  readonly completion: Promise<TaskOutcome<T>>;
  /** Removes the task if it has not started. Returns whether it was removed. */
  cancel(): boolean;
}

export interface SubmitOptions {
  /** Tasks sharing a queue run one at a time, in submission order. */
  queue?: string;
}

export interface ExecuteOptions extends SubmitOptions {
  timeoutMs?: number;
}

export interface ScheduledTask {
  readonly id: string;
  cancel(): void;
}

export type ThreadServiceState = "created" | "running" | "terminating" | "terminated";

export interface ThreadServiceTermReport {
  readonly drained: boolean;
  readonly cancelledTasks: number;
  readonly abortedTasks: number;
  readonly clearedTimers: number;
  readonly durationMs: number;
  readonly disposal: DisposalReport;
}

export interface ThreadServiceStats {
  readonly state: ThreadServiceState;
  readonly queues: number;
  readonly pendingTasks: number;
  readonly runningTasks: number;
  readonly timers: number;
  readonly registeredScopes: number;
}
