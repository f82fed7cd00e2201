/** One discoverable file unit in the dataset tree. */
export interface EntityRecord {
  /** Subject label without the `sub-` prefix. */
  readonly subject: string;
  /** Session label without the `ses-` prefix; null for session-less layouts. */
  readonly session: string | null;
  readonly modality: string;
  readonly datatype: string;
  /** Absolute path on disk. */
  readonly path: string;
  /** POSIX path relative to the dataset root. */
  readonly relativePath: string;
  /** Size reported by stat at discovery time. */
  readonly sizeBytes: number;
  readonly discoveredAt: string; // ISO 8601
}
