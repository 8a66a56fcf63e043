/**
 * @fileoverview Per-server request and connection accounting awaiting a status write
 */

export interface ActivitySnapshot {
  /** Requests recorded since the last commit */
  readonly requests: number;
  readonly lastActivityAt?: string;
  /** Open sessions right now */
  readonly connections: number;
}

interface PendingActivity {
  requests: number;
  lastActivityAt?: string;
}

const EMPTY: ActivitySnapshot = { requests: 0, connections: 0 };

export class ActivityTracker {
  private readonly pending = new Map<string, PendingActivity>();
  private readonly connections = new Map<string, number>();

  recordRequest(name: string, at: Date): void {
    const entry = this.entry(name);
    entry.requests += 1;
    entry.lastActivityAt = at.toISOString();
  }

  /**
   * A new session counts as activity
   */
  connect(name: string, at: Date): void {
    this.connections.set(name, (this.connections.get(name) ?? 0) + 1);
    this.entry(name).lastActivityAt = at.toISOString();
  }

  disconnect(name: string): void {
    const count = (this.connections.get(name) ?? 0) - 1;
    if (count > 0) {
      this.connections.set(name, count);
    } else {
      this.connections.delete(name);
    }
  }

  snapshot(name: string): ActivitySnapshot {
    const entry = this.pending.get(name);
    const connections = this.connections.get(name) ?? 0;
    if (!entry) {
      return connections === 0 ? EMPTY : { requests: 0, connections };
    }
    return entry.lastActivityAt === undefined
      ? { requests: entry.requests, connections }
      : { requests: entry.requests, lastActivityAt: entry.lastActivityAt, connections };
  }

  /**
   * Drop what `snapshot` reported once it has been persisted. Activity recorded
   * after the snapshot stays pending.
   */
  commit(name: string, snapshot: ActivitySnapshot): void {
    const entry = this.pending.get(name);
    if (!entry) return;

    entry.requests = Math.max(0, entry.requests - snapshot.requests);
    if (entry.lastActivityAt === snapshot.lastActivityAt) {
      entry.lastActivityAt = undefined;
    }
    if (entry.requests === 0 && entry.lastActivityAt === undefined) {
      this.pending.delete(name);
    }
  }

  forget(name: string): void {
    this.pending.delete(name);
    this.connections.delete(name);
  }

  private entry(name: string): PendingActivity {
    let entry = this.pending.get(name);
    if (!entry) {
      entry = { requests: 0 };
      this.pending.set(name, entry);
    }
    return entry;
  }
}
