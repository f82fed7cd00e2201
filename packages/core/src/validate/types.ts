export type CheckStatus = "pass" | "warn" | "fail";

export type ReportStatus = "ok" | "warn" | "blocked";

export interface CheckResult {
  name: string;
  status: CheckStatus;
  /** Severity of the check: a failing fatal check blocks shard planning. */
  fatal: boolean;
  observed: number;
  expected: number;
  /** Tolerance applied, or null for checks that take none. */
  tolerance: number | null;
  offendingPaths: string[];
  message: string;
  /** Grouping key for expected-count results, e.g. "subject:01". */
  group?: string;
}

export interface ValidationReport {
  status: ReportStatus;
  checks: CheckResult[];
  recordCount: number;
  generatedAt: string;
}
