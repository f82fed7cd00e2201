import { stat } from "node:fs/promises";
import type { ExpectedCounts, FeatureSchema } from "../dataset/types.js";
import { ValidationBlockedError } from "../errors/catalog.js";
import { buildEntityDir, parseFileName } from "../scan/entities.js";
import type { EntityRecord } from "../scan/types.js";
import { countGroup, parseGroupingKey } from "./grouping.js";
import { resolveTolerance, type TolerancePolicy } from "./tolerance.js";
import type { CheckResult, ReportStatus, ValidationReport } from "./types.js";

const STAT_CHUNK_SIZE = 64;

export interface ValidateOptions {
  /** When given, path-shape also checks modality, suffix and extension. */
  schema?: FeatureSchema;
  /** Re-stat every record path (default true). */
  checkExistence?: boolean;
  now?: () => Date;
}

function checkZeroByte(records: readonly EntityRecord[]): CheckResult {
  const offendingPaths = records
    .filter((r) => r.sizeBytes === 0)
    .map((r) => r.relativePath);
  return {
    name: "zero-byte",
    status: offendingPaths.length === 0 ? "pass" : "fail",
    fatal: true,
    observed: offendingPaths.length,
    expected: 0,
    tolerance: null,
    offendingPaths,
    message:
      offendingPaths.length === 0
        ? "No zero-byte files"
        : `${offendingPaths.length} zero-byte file(s) found`,
  };
}

function checkExpectedCounts(
  records: readonly EntityRecord[],
  expectedCounts: ExpectedCounts,
  policy: TolerancePolicy,
): CheckResult[] {
  return Object.entries(expectedCounts).map(([group, expected]): CheckResult => {
    const observed = countGroup(records, parseGroupingKey(group));
    const floor = policy.floor(expected);
    const base = {
      name: "expected-count",
      group,
      fatal: true,
      observed,
      expected,
      tolerance: policy.value,
      offendingPaths: [],
    };
    if (observed >= expected) {
      return { ...base, status: "pass", message: `${group}: ${observed} of ${expected}` };
    }
    if (observed >= floor) {
      return {
        ...base,
        status: "warn",
        message: `${group}: ${observed} of ${expected}, partial dataset within tolerance (${policy.describe()})`,
      };
    }
    return {
      ...base,
      status: "fail",
      message: `${group}: ${observed} of ${expected}, below the minimum of ${floor} (${policy.describe()})`,
    };
  });
}

/** Why a record's path does not match its declared entities, or null. */
function pathShapeProblem(record: EntityRecord, schema?: FeatureSchema): string | null {
  const dir = buildEntityDir(record.subject, record.session, record.datatype);
  if (!record.relativePath.startsWith(dir)) return `not under ${dir}`;
  const fileName = record.relativePath.slice(dir.length);
  if (fileName.includes("/")) return `nested below ${dir}`;

  const parsed = parseFileName(fileName);
  if (!parsed) return "not a BIDS file name";
  const [first, second] = parsed.entities;
  if (first?.[0] !== "sub" || first[1] !== record.subject) {
    return `does not start with sub-${record.subject}`;
  }
  if (record.session !== null) {
    if (second?.[0] !== "ses" || second[1] !== record.session) {
      return `missing ses-${record.session} after the subject`;
    }
  } else if (parsed.entities.some(([key]) => key === "ses")) {
    return "has a session entity but no session directory";
  }

  if (schema) {
    const modality = schema.modalities.find((m) => m.label === record.modality);
    if (!modality) return `unknown modality ${record.modality}`;
    if (modality.datatype !== record.datatype) {
      return `modality ${modality.label} belongs under ${modality.datatype}`;
    }
    if (parsed.suffix !== modality.suffix) return `suffix ${parsed.suffix} is not ${modality.suffix}`;
    if (!modality.extensions.includes(parsed.extension)) {
      return `extension ${parsed.extension || "(none)"} is not allowed for ${modality.label}`;
    }
  }
  return null;
}

function checkPathShape(records: readonly EntityRecord[], schema?: FeatureSchema): CheckResult {
  const problems = records.flatMap((r) => {
    const problem = pathShapeProblem(r, schema);
    return problem === null ? [] : [{ path: r.relativePath, problem }];
  });
  return {
    name: "path-shape",
    status: problems.length === 0 ? "pass" : "fail",
    fatal: true,
    observed: problems.length,
    expected: 0,
    tolerance: null,
    offendingPaths: problems.map((p) => p.path),
    message:
      problems.length === 0
        ? "All paths match the naming convention"
        : `${problems.length} path(s) break the naming convention; first: ${problems[0]?.path} ${problems[0]?.problem}`,
  };
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function checkExistence(records: readonly EntityRecord[]): Promise<CheckResult> {
  const offendingPaths: string[] = [];
  for (let i = 0; i < records.length; i += STAT_CHUNK_SIZE) {
    const chunk = records.slice(i, i + STAT_CHUNK_SIZE);
    const present = await Promise.all(chunk.map((r) => isRegularFile(r.path)));
    chunk.forEach((r, j) => {
      if (!present[j]) offendingPaths.push(r.relativePath);
    });
  }
  return {
    name: "existence",
    status: offendingPaths.length === 0 ? "pass" : "fail",
    fatal: true,
    observed: records.length - offendingPaths.length,
    expected: records.length,
    tolerance: null,
    offendingPaths,
    message:
      offendingPaths.length === 0
        ? "All files present"
        : `${offendingPaths.length} file(s) missing or unreadable`,
  };
}

function overallStatus(checks: readonly CheckResult[]): ReportStatus {
  if (checks.some((c) => c.fatal && c.status === "fail")) return "blocked";
  if (checks.some((c) => c.status !== "pass")) return "warn";
  return "ok";
}

/**
 * Run every structural check over the record table. No check short-circuits
 * another, so one report lists all findings. Only metadata is inspected.
 */
export async function validate(
  records: readonly EntityRecord[],
  expectedCounts: ExpectedCounts,
  tolerance: number | TolerancePolicy,
  options?: ValidateOptions,
): Promise<ValidationReport> {
  const policy = resolveTolerance(tolerance);
  const now = options?.now ?? (() => new Date());

  const checks: CheckResult[] = [
    checkZeroByte(records),
    ...checkExpectedCounts(records, expectedCounts, policy),
    checkPathShape(records, options?.schema),
  ];
  if (options?.checkExistence ?? true) {
    checks.push(await checkExistence(records));
  }

  return {
    status: overallStatus(checks),
    checks,
    recordCount: records.length,
    generatedAt: now().toISOString(),
  };
}

/** Gate before shard planning: throws when the report is blocked. */
export function assertValidationPassed(report: ValidationReport): void {
  if (report.status === "blocked") {
    throw new ValidationBlockedError(report);
  }
}
