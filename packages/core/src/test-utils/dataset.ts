/**
 * Test helpers for building small BIDS trees and record tables.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { vi } from "vitest";
import type { Logger } from "pino";
import {
  DEFAULT_METADATA_COLUMNS,
  type FeatureSchema,
} from "../dataset/types.js";
import type { EntityRecord } from "../scan/types.js";
import { buildEntityDir } from "../scan/entities.js";

export const TEST_SCHEMA: FeatureSchema = {
  modalities: [
    { label: "T1w", datatype: "anat", suffix: "T1w", extensions: [".nii.gz", ".nii"] },
    { label: "FLAIR", datatype: "anat", suffix: "FLAIR", extensions: [".nii.gz"] },
    { label: "bold", datatype: "func", suffix: "bold", extensions: [".nii.gz"] },
  ],
  columns: DEFAULT_METADATA_COLUMNS,
  blobColumn: "nifti",
};

export async function withTempDir(
  prefix: string,
  fn: (dir: string) => Promise<void>,
): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Write files under `root`. A number writes that many bytes of a repeating
 * pattern; a string or Uint8Array is written as-is.
 */
export async function writeTree(
  root: string,
  files: Record<string, number | string | Uint8Array>,
): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    const data =
      typeof content === "number"
        ? Uint8Array.from({ length: content }, (_, i) => i % 251)
        : content;
    await writeFile(path, data);
  }
}

/**
 * `subjects` × `sessions` T1w files, each `size` bytes:
 * sub-01/ses-1/anat/sub-01_ses-1_T1w.nii.gz, ...
 */
export function sessionTree(
  subjects: string[],
  sessions: string[],
  size = 16,
): Record<string, number> {
  const files: Record<string, number> = {};
  for (const subject of subjects) {
    for (const session of sessions) {
      files[
        `${buildEntityDir(subject, session, "anat")}sub-${subject}_ses-${session}_T1w.nii.gz`
      ] = size;
    }
  }
  return files;
}

export function makeRecord(overrides?: Partial<EntityRecord>): EntityRecord {
  const subject = overrides?.subject ?? "01";
  const session = overrides?.session === undefined ? "1" : overrides.session;
  const datatype = overrides?.datatype ?? "anat";
  const modality = overrides?.modality ?? "T1w";
  const sesPart = session === null ? "" : `_ses-${session}`;
  const relativePath =
    overrides?.relativePath ??
    `${buildEntityDir(subject, session, datatype)}sub-${subject}${sesPart}_${modality}.nii.gz`;
  return {
    subject,
    session,
    modality,
    datatype,
    path: overrides?.path ?? `/data/ds/${relativePath}`,
    relativePath,
    sizeBytes: overrides?.sizeBytes ?? 100,
    discoveredAt: overrides?.discoveredAt ?? "2026-01-21T10:00:00.000Z",
  };
}

export function makeMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}
