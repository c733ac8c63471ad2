import { OrphanSnapshot } from "../../types/disposal";

type ResourceCategory = "timer" | "transport" | "task" | "connection";

/**
 * Counts live resources per category so teardown paths can prove nothing leaked.
 */
export class OrphanDetector {
  private readonly timers = new Set<string>();
  private readonly transports = new Set<string>();
  private readonly tasks = new Set<string>();
  private readonly connections = new Set<string>();

  trackTimer(id: string): () => void {
    return this.track("timer", id);
  }

  trackTransport(id: string): () => void {
    return this.track("transport", id);
  }

  trackTask(id: string): () => void {
    return this.track("task", id);
  }

  trackConnection(id: string): () => void {
    return this.track("connection", id);
  }

  captureSnapshot(): OrphanSnapshot {
    return {
      timers: this.timers.size,
      transports: this.transports.size,
      tasks: this.tasks.size,
      connections: this.connections.size,
    };
  }

  reset(): void {
    this.timers.clear();
    this.transports.clear();
    this.tasks.clear();
    this.connections.clear();
  }

  private track(category: ResourceCategory, id: string): () => void {
    const collection = this.resolveCollection(category);
    collection.add(id);
    return () => {
      collection.delete(id);
    };
  }

  private resolveCollection(category: ResourceCategory): Set<string> {
    switch (category) {
      case "timer":
        return this.timers;
      case "transport":
        return this.transports;
      case "task":
        return this.tasks;
      case "connection":
      default:
        return this.connections;
    }
  }
}

export function hasZeroOrphans(snapshot: OrphanSnapshot): boolean {
  return (
    snapshot.timers === 0 &&
    snapshot.transports === 0 &&
    snapshot.tasks === 0 &&
    snapshot.connections === 0
  );
}
