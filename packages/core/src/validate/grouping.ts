import type { EntityRecord } from "../scan/types.js";

export type GroupingKey =
  | { kind: "records" }
  | { kind: "subjects" }
  | { kind: "sessions" }
  | { kind: "subject"; label: string }
  | { kind: "modality"; label: string };

/** Parse "records", "subjects", "sessions", "subject:<label>" or "modality:<label>". */
export function parseGroupingKey(key: string): GroupingKey {
  if (key === "records" || key === "subjects" || key === "sessions") {
    return { kind: key };
  }
  const colon = key.indexOf(":");
  const prefix = colon === -1 ? key : key.slice(0, colon);
  const label = colon === -1 ? "" : key.slice(colon + 1);
  if ((prefix === "subject" || prefix === "modality") && label !== "") {
    return { kind: prefix, label };
  }
  throw new Error(`Unknown grouping key: ${key}`);
}

/**
 * Observed count for a grouping key:
 * - records: every record
 * - subjects: distinct subject labels
 * - sessions: distinct (subject, session) visits; a session-less subject is one visit
 * - subject:<label>: records of that subject
 * - modality:<label>: records of that modality
 */
export function countGroup(records: readonly EntityRecord[], key: GroupingKey): number {
  switch (key.kind) {
    case "records":
      return records.length;
    case "subjects":
      return new Set(records.map((r) => r.subject)).size;
    case "sessions":
      return new Set(records.map((r) => `${r.subject}\u0000${r.session ?? ""}`)).size;
    case "subject":
      return records.filter((r) => r.subject === key.label).length;
    case "modality":
      return records.filter((r) => r.modality === key.label).length;
  }
}
