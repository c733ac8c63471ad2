import { performance } from "perf_hooks";
import {
  DisposalOptions,
  DisposalOrchestrator,
  DisposalReason,
  DisposalReport,
  DisposalStepResult,
  ScopedDisposable,
} from "../../types/disposal";
import { Logger } from "../logger";
import { hasZeroOrphans, OrphanDetector } from "./orphan-detector";

const DEFAULT_GRACE_PERIOD_MS = 2000;

class DisposalTimeoutError extends Error {
  constructor(scopeId: string, gracePeriodMs: number) {
    super(`Disposal of ${scopeId} did not finish within ${gracePeriodMs}ms`);
    this.name = "DisposalTimeoutError";
  }
}

/**
 * Disposes registered scopes in ascending priority order. Scopes sharing a
 * priority are disposed together; the whole run is bounded by the grace period.
 */
export class DisposalOrchestratorImpl implements DisposalOrchestrator {
  private readonly registry = new Map<string, ScopedDisposable>();

  constructor(
    private readonly logger: Logger,
    private readonly orphanDetector: OrphanDetector,
  ) {}

  get size(): number {
    return this.registry.size;
  }

  register(scope: ScopedDisposable): void {
    if (!scope.id) {
      throw new Error("ScopedDisposable must provide a non-empty id");
    }
    this.registry.set(scope.id, scope);
  }

  unregister(id: string): void {
    this.registry.delete(id);
  }

  async disposeAll(
    reason: DisposalReason,
    options: DisposalOptions = {},
  ): Promise<DisposalReport> {
    const startedAt = performance.now();
    const gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    const deadline = startedAt + gracePeriodMs;
    const groups = this.groupByPriority(Array.from(this.registry.values()));
    this.registry.clear();

    const steps: DisposalStepResult[] = [];
    const errors: Error[] = [];
    let timedOut = false;

    for (const group of groups) {
      const results = await Promise.all(
        group.map((scope) =>
          this.disposeScope(scope, reason, Math.max(0, deadline - performance.now())),
        ),
      );
      for (const result of results) {
        steps.push(result);
        if (result.error) {
          errors.push(result.error);
          timedOut = timedOut || result.error instanceof DisposalTimeoutError;
        }
      }
    }

    const completedAt = performance.now();
    const orphanSnapshot = this.orphanDetector.captureSnapshot();

    if (timedOut) {
      this.logger.warn("Disposal exceeded grace period", {
        reason,
        durationMs: Math.round(completedAt - startedAt),
        gracePeriodMs,
      });
    }

    const report: DisposalReport = {
      reason,
      startedAt,
      completedAt,
      steps,
      orphanSnapshot,
      timedOut,
    };

    if (errors.length > 0) {
      report.aggregatedError = new AggregateError(errors, "One or more disposal steps failed");
    }

    if (!hasZeroOrphans(orphanSnapshot)) {
      this.logger.debug("Resources still live after disposal", {
        reason,
        orphanSnapshot,
      });
    }

    return report;
  }

  private async disposeScope(
    scope: ScopedDisposable,
    reason: DisposalReason,
    budgetMs: number,
  ): Promise<DisposalStepResult> {
    if (scope.isDisposed()) {
      return { name: scope.id, durationMs: 0, success: true, skipped: true };
    }

    const stepStart = performance.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      this.logger.debug(`Disposing ${scope.id}`, { reason });
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new DisposalTimeoutError(scope.id, budgetMs)), budgetMs);
      });
      await Promise.race([Promise.resolve().then(() => scope.dispose(reason)), timeout]);
      return {
        name: scope.id,
        durationMs: Math.round(performance.now() - stepStart),
        success: scope.isDisposed(),
        skipped: false,
      };
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error ?? ""));
      this.logger.error("Disposal step failed", {
        scopeId: scope.id,
        reason,
        error: err.message,
      });
      return {
        name: scope.id,
        durationMs: Math.round(performance.now() - stepStart),
        success: false,
        error: err,
        skipped: false,
      };
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private groupByPriority(scopes: ScopedDisposable[]): ScopedDisposable[][] {
    const byPriority = new Map<number, ScopedDisposable[]>();
    for (const scope of scopes) {
      const bucket = byPriority.get(scope.priority) ?? [];
      bucket.push(scope);
      byPriority.set(scope.priority, bucket);
    }
    return Array.from(byPriority.entries())
      .sort(([left], [right]) => left - right)
      .map(([, bucket]) => bucket);
  }
}
