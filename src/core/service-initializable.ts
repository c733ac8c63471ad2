/**
 * Lifecycle contract for long-lived services that must be initialized before
 * use and released on every exit path.
 */
export interface ServiceInitializable {
  initialize(): Promise<void>;
  dispose(): Promise<void> | void;
  isInitialized(): boolean;
}
