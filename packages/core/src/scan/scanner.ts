import { access, readdir, stat } from "node:fs/promises";
import { constants, type Dirent, type Stats } from "node:fs";
import { join, resolve } from "node:path";
import type { FeatureSchema } from "../dataset/types.js";
import { ScanError } from "../errors/catalog.js";
import type { EntityRecord } from "./types.js";
import {
  buildEntityDir,
  classifyFile,
  parseSessionDir,
  parseSubjectDir,
} from "./entities.js";

export interface ScanOptions {
  /** Clock used for `discoveredAt` (default: current time) */
  now?: () => Date;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

async function assertReadableRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (err) {
    const reason =
      errorCode(err) === "ENOENT" ? "root does not exist" : "root cannot be inspected";
    throw new ScanError(root, reason, err);
  }
  if (!isDirectory) {
    throw new ScanError(root, "root is not a directory");
  }
  try {
    await access(root, constants.R_OK | constants.X_OK);
  } catch (err) {
    throw new ScanError(root, "root is not readable", err);
  }
}

/** Directory entries sorted by name; a directory that vanished reads as empty. */
async function listEntries(root: string, dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    if (errorCode(err) === "ENOENT") return [];
    throw new ScanError(root, `cannot list ${dir}`, err);
  }
}

/**
 * Walk `sub-<label>/[ses-<label>/]<datatype>/` under `root` and yield one
 * record per file the feature schema recognises. Only directory listings
 * and stat are used; file contents are never opened. Re-running the scan
 * over an unchanged tree yields the same records in the same order.
 */
export async function* scanDataset(
  root: string,
  schema: FeatureSchema,
  options?: ScanOptions,
): AsyncGenerator<EntityRecord> {
  const rootPath = resolve(root);
  const now = options?.now ?? (() => new Date());
  const datatypes = new Set(schema.modalities.map((m) => m.datatype));

  await assertReadableRoot(rootPath);

  async function* scanDatatypeDirs(
    subject: string,
    session: string | null,
    dir: string,
  ): AsyncGenerator<EntityRecord> {
    for (const entry of await listEntries(rootPath, dir)) {
      if (!entry.isDirectory() || !datatypes.has(entry.name)) continue;
      const datatype = entry.name;
      const datatypeDir = join(dir, datatype);

      for (const file of await listEntries(rootPath, datatypeDir)) {
        if (file.name.startsWith(".")) continue;
        const modality = classifyFile(schema, datatype, file.name);
        if (!modality) continue;

        const path = join(datatypeDir, file.name);
        let stats: Stats;
        try {
          stats = await stat(path);
        } catch (err) {
          if (errorCode(err) === "ENOENT") continue;
          throw new ScanError(rootPath, `cannot stat ${path}`, err);
        }
        if (!stats.isFile()) continue;

        yield Object.freeze({
          subject,
          session,
          modality: modality.label,
          datatype,
          path,
          relativePath: buildEntityDir(subject, session, datatype) + file.name,
          sizeBytes: stats.size,
          discoveredAt: now().toISOString(),
        });
      }
    }
  }

  for (const entry of await listEntries(rootPath, rootPath)) {
    const subject = entry.isDirectory() ? parseSubjectDir(entry.name) : null;
    if (subject === null) continue;
    const subjectDir = join(rootPath, entry.name);

    // Session-less layouts keep datatype directories directly under the subject.
    yield* scanDatatypeDirs(subject, null, subjectDir);

    for (const child of await listEntries(rootPath, subjectDir)) {
      const session = child.isDirectory() ? parseSessionDir(child.name) : null;
      if (session === null) continue;
      yield* scanDatatypeDirs(subject, session, join(subjectDir, child.name));
    }
  }
}

/** Materialise a scan into the flat record table. */
export async function collectRecords(
  records: AsyncIterable<EntityRecord>,
): Promise<EntityRecord[]> {
  const table: EntityRecord[] = [];
  for await (const record of records) {
    table.push(record);
  }
  return table;
}
