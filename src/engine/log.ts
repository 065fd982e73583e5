export type LogEventKind =
  | "ready"
  | "started"
  | "resumed"
  | "work"
  | "paused"
  | "finished"
  | "absent"
  | "available"
  | "component_ready";

export type LogEntry = Readonly<{
  time: number;
  kind: LogEventKind;
  taskId: string | null;
  resourceId: string | null;
  componentId?: string;
  amount?: number;
}>;

/**
 * Append-only, time-ordered record of every state transition and
 * assignment in one trial. Entries are frozen on append.
 */
export class ExecutionLog {
  private readonly entries: LogEntry[] = [];

  static from(entries: readonly LogEntry[]): ExecutionLog {
    const log = new ExecutionLog();
    for (const entry of entries) log.append(entry);
    return log;
  }

  append(entry: LogEntry): LogEntry {
    const last = this.entries[this.entries.length - 1];
    if (last !== undefined && entry.time < last.time) {
      throw new RangeError(
        `Log entry at time ${entry.time} appended after time ${last.time}`
      );
    }

    const record: LogEntry = Object.freeze({
      time: entry.time,
      kind: entry.kind,
      taskId: entry.taskId,
      resourceId: entry.resourceId,
      ...(entry.componentId !== undefined ? { componentId: entry.componentId } : {}),
      ...(entry.amount !== undefined ? { amount: entry.amount } : {}),
    });
    this.entries.push(record);
    return record;
  }

  get size(): number {
    return this.entries.length;
  }

  all(): readonly LogEntry[] {
    return this.entries;
  }

  // inclusive on both ends
  entriesBetween(t0: number, t1: number): LogEntry[] {
    if (t1 < t0) return [];
    const start = this.lowerBound(t0);
    const out: LogEntry[] = [];
    for (let i = start; i < this.entries.length; i++) {
      const entry = this.entries[i];
      if (entry.time > t1) break;
      out.push(entry);
    }
    return out;
  }

  entriesForTask(taskId: string): LogEntry[] {
    return this.entries.filter((e) => e.taskId === taskId);
  }

  entriesForResource(resourceId: string): LogEntry[] {
    return this.entries.filter((e) => e.resourceId === resourceId);
  }

  toJSON(): LogEntry[] {
    return [...this.entries];
  }

  private lowerBound(time: number): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.entries[mid].time < time) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
