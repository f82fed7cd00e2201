/**
 * Capabilities a dataset kind provides to the pipeline. The pipeline only
 * calls these; cohort-specific implementations live outside the core.
 */

/** One imaging modality as it appears on disk. */
export interface ModalitySpec {
  /** Label written to records and the `modality` column, e.g. "T1w". */
  label: string;
  /** BIDS datatype directory, e.g. "anat", "func", "dwi". */
  datatype: string;
  /** BIDS suffix, the last `_`-separated token of the file stem. */
  suffix: string;
  /** Accepted extensions including the leading dot, e.g. ".nii.gz". */
  extensions: readonly string[];
}

/** Entity record fields that can be written as metadata columns. */
export type RecordField =
  | "subject"
  | "session"
  | "modality"
  | "datatype"
  | "relativePath"
  | "sizeBytes";

export interface ColumnSpec {
  name: string;
  source: RecordField;
}

/** Column layout of the encoded shards. */
export interface FeatureSchema {
  modalities: readonly ModalitySpec[];
  columns: readonly ColumnSpec[];
  /** Binary column holding the raw file payload. */
  blobColumn: string;
}

/**
 * Grouping key → expected entity count. Keys:
 * `records`, `subjects`, `sessions`, `subject:<label>`, `modality:<label>`.
 */
export type ExpectedCounts = Readonly<Record<string, number>>;

export interface DatasetProfile {
  kind: string;
  description: string;
  expectedCounts(): ExpectedCounts;
  featureSchema(): FeatureSchema;
}

export const DEFAULT_METADATA_COLUMNS: readonly ColumnSpec[] = [
  { name: "subject_id", source: "subject" },
  { name: "session_id", source: "session" },
  { name: "modality", source: "modality" },
  { name: "relative_path", source: "relativePath" },
  { name: "size_bytes", source: "sizeBytes" },
];
