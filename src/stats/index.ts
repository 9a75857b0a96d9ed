export const MAX_RECENT_ERRORS = 50;
export const MAX_ERROR_CHARS = 500;
export const DEGRADED_ERROR_THRESHOLD = 10;
export const DEGRADED_WINDOW_MS = 5 * 60 * 1000;

export type ErrorSource = "triage" | "gateway" | "api" | "worker";

export interface RecordedError {
  timestamp: string;
  source: ErrorSource;
  error: string;
}

export interface RequestCounts {
  total: number;
  triage: number;
  classified: number;
  fallback: number;
}

export type HealthStatus = "healthy" | "degraded";

/**
 * In-process counters and a bounded ring of recent errors. Mutated
 * synchronously, so it is safe to share across concurrent requests.
 */
export class TriageStats {
  readonly startedAt: Date;

  private counts: RequestCounts = { total: 0, triage: 0, classified: 0, fallback: 0 };
  private errors: Array<{ at: number; entry: RecordedError }> = [];

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.startedAt = clock();
  }

  recordRequest(kind: "triage" | "other" = "other"): void {
    this.counts.total += 1;
    if (kind === "triage") this.counts.triage += 1;
  }

  recordOutcome(outcome: "classified" | "fallback"): void {
    this.counts[outcome] += 1;
  }

  recordError(source: ErrorSource, error: unknown): void {
    const now = this.clock();
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.errors.push({
      at: now.getTime(),
      entry: { timestamp: now.toISOString(), source, error: message.slice(0, MAX_ERROR_CHARS) },
    });
    if (this.errors.length > MAX_RECENT_ERRORS) {
      this.errors.splice(0, this.errors.length - MAX_RECENT_ERRORS);
    }
  }

  requestCounts(): RequestCounts {
    return { ...this.counts };
  }

  recentErrors(limit = MAX_RECENT_ERRORS): RecordedError[] {
    return this.errors.slice(-limit).map((e) => ({ ...e.entry }));
  }

  healthStatus(now: Date = this.clock()): HealthStatus {
    const since = now.getTime() - DEGRADED_WINDOW_MS;
    const recent = this.errors.filter((e) => e.at >= since).length;
    return recent >= DEGRADED_ERROR_THRESHOLD ? "degraded" : "healthy";
  }

  uptimeSeconds(now: Date = this.clock()): number {
    return Math.max(0, Math.floor((now.getTime() - this.startedAt.getTime()) / 1000));
  }
}
