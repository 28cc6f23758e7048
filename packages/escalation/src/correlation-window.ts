interface Group {
  observations: Array<{ confidence: number; at: number }>;
  /** Highest level acted on per subject key. */
  executed: Map<string, number>;
}

export interface Correlation {
  /** Highest confidence seen for the id inside the window, this one included. */
  effective: number;
  /** Highest level already acted on for this subject under the id inside the window; 0 if none. */
  executedLevel: number;
}

/**
 * Groups signals that share a correlation id within a sliding time
 * window. Confidence is pooled across the whole group; executed levels
 * are tracked per subject, so one subject's action never stands in for
 * another's. A group whose observations all age out is forgotten.
 */
export class CorrelationWindow {
  private groups = new Map<string, Group>();
  private windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  observe(correlationId: string, subject: string, confidence: number, now: number): Correlation {
    this.prune(now);
    const group = this.groups.get(correlationId) ?? { observations: [], executed: new Map<string, number>() };
    group.observations.push({ confidence, at: now });
    this.groups.set(correlationId, group);
    const effective = group.observations.reduce((max, o) => Math.max(max, o.confidence), 0);
    return { effective, executedLevel: group.executed.get(subject) ?? 0 };
  }

  markExecuted(correlationId: string, subject: string, level: number): void {
    const group = this.groups.get(correlationId);
    if (!group) return;
    if (level > (group.executed.get(subject) ?? 0)) group.executed.set(subject, level);
  }

  prune(now: number): void {
    for (const [id, group] of this.groups) {
      group.observations = group.observations.filter((o) => now - o.at < this.windowMs);
      if (group.observations.length === 0) this.groups.delete(id);
    }
  }

  get size(): number {
    return this.groups.size;
  }
}
