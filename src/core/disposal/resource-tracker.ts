/**
 * Registration hooks handed to components that own timers, sockets or queued work.
 * Each `track*` call returns the release function for that resource.
 */
export interface ResourceTracker {
  trackTimer(id: string): () => void;
  trackTask(id: string): () => void;
}

export interface ConnectionResourceTracker extends ResourceTracker {
  trackTransport(id: string): () => void;
  trackConnection(id: string): () => void;
}
