export interface Disposable {
  dispose(): void;
}

export interface DisposalStepResult {
  name: string;
  durationMs: number;
  success: boolean;
  error?: Error;
  skipped?: boolean;
}

/**
 * Count of live resources per category at the moment of capture.
 */
export interface OrphanSnapshot {
  timers: number;
  transports: number;
  tasks: number;
  connections: number;
}

export interface DisposalOptions {
  gracePeriodMs?: number;
}

export type DisposalReason =
  | "connection-close"
  | "service-term"
  | "fatal-error";

export interface ScopedDisposable {
  id: string;
  priority: number;
  dispose(reason: DisposalReason): Promise<void> | void;
  isDisposed(): boolean;
}

export interface DisposalReport {
  reason: DisposalReason;
  startedAt: number;
  completedAt: number;
  steps: DisposalStepResult[];
  orphanSnapshot: OrphanSnapshot;
  aggregatedError?: AggregateError;
  timedOut: boolean;
}

export interface DisposalOrchestrator {
  register(resource: ScopedDisposable): void;
  unregister(id: string): void;
  disposeAll(reason: DisposalReason, options?: DisposalOptions): Promise<DisposalReport>;
}
