// Recent run responses, kept for GET /v1/runs/:id
// Expiry is checked on access and pruned on insert; no timers are left running

import type { OrchestrationResponse } from './orchestrator/types.js';

interface HistoryEntry {
  response: OrchestrationResponse;
  expiresAt: number;
}

export interface RunHistoryOptions {
  ttlMs?: number;
  maxEntries?: number;
  now?: () => number;
}

export class RunHistory {
  private runs = new Map<string, HistoryEntry>();
  private ttlMs: number;
  private maxEntries: number;
  private now: () => number;

  constructor(options: RunHistoryOptions = {}) {
    this.ttlMs = options.ttlMs ?? 15 * 60 * 1000; // 15 minutes default
    this.maxEntries = options.maxEntries ?? 500;
    this.now = options.now ?? Date.now;
  }

  record(response: OrchestrationResponse): void {
    this.prune();
    this.runs.set(response.run_id, { response, expiresAt: this.now() + this.ttlMs });

    // Map iteration order is insertion order: the first key is the oldest run
    while (this.runs.size > this.maxEntries) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
  }

  get(runId: string): OrchestrationResponse | undefined {
    const entry = this.runs.get(runId);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.runs.delete(runId);
      return undefined;
    }

    return entry.response;
  }

  /** Most recent first. */
  recent(limit: number = 20): OrchestrationResponse[] {
    this.prune();
    return Array.from(this.runs.values())
      .map(entry => entry.response)
      .reverse()
      .slice(0, limit);
  }

  get size(): number {
    return this.runs.size;
  }

  clear(): void {
    this.runs.clear();
  }

  private prune(): void {
    const now = this.now();
    for (const [runId, entry] of this.runs.entries()) {
      if (entry.expiresAt <= now) {
        this.runs.delete(runId);
      }
    }
  }
}
