import { DisposalReason, ScopedDisposable } from "../../types/disposal";

type DisposeHandler = (reason: DisposalReason) => Promise<void> | void;
type IsDisposedHandler = () => boolean;

export interface DisposableScopeOptions {
  id: string;
  priority: number;
  dispose: DisposeHandler;
  isDisposed: IsDisposedHandler;
}

export class DisposableScope implements ScopedDisposable {
  private disposing: Promise<void> | undefined;

  constructor(private readonly options: DisposableScopeOptions) {}

  get id(): string {
    return this.options.id;
  }

  get priority(): number {
    return this.options.priority;
  }

  /**
   * Runs the dispose handler once; concurrent and repeated calls share the first run.
   */
  dispose(reason: DisposalReason): Promise<void> {
    if (!this.disposing) {
      this.disposing = Promise.resolve().then(() => this.options.dispose(reason));
    }
    return this.disposing;
  }

  isDisposed(): boolean {
    return this.options.isDisposed();
  }
}

/**
 * Wraps anything with an async `close()` and a closed flag into a {@link DisposableScope}.
 */
export function createCloseableScope(
  id: string,
  priority: number,
  resource: {
    close(): Promise<unknown>;
    isClosed(): boolean;
  },
): DisposableScope {
  return new DisposableScope({
    id,
    priority,
    dispose: async () => {
      await resource.close();
    },
    isDisposed: () => resource.isClosed(),
  });
}
