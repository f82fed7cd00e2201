import type { FeatureSchema, ModalitySpec } from "../dataset/types.js";

const LABEL = "[A-Za-z0-9]+";
const SUBJECT_DIR = new RegExp(`^sub-(${LABEL})$`);
const SESSION_DIR = new RegExp(`^ses-(${LABEL})$`);
const ENTITY_PAIR = new RegExp(`^[a-z]+-${LABEL}$`);

/** "sub-M2001" → "M2001"; null for anything else */
export function parseSubjectDir(name: string): string | null {
  return SUBJECT_DIR.exec(name)?.[1] ?? null;
}

/** "ses-1" → "1"; null for anything else */
export function parseSessionDir(name: string): string | null {
  return SESSION_DIR.exec(name)?.[1] ?? null;
}

/** "sub-01_T1w.nii.gz" → { stem: "sub-01_T1w", extension: ".nii.gz" } */
export function splitExtension(fileName: string): {
  stem: string;
  extension: string;
} {
  const dot = fileName.indexOf(".");
  if (dot <= 0) return { stem: fileName, extension: "" };
  return { stem: fileName.slice(0, dot), extension: fileName.slice(dot) };
}

export interface ParsedFileName {
  /** key → label pairs in file order, e.g. [["sub","01"],["ses","1"]] */
  entities: Array<[string, string]>;
  suffix: string;
  extension: string;
}

/**
 * Split a BIDS file name into its entity pairs, suffix and extension.
 * Returns null when the stem has no suffix or an entity is malformed.
 */
export function parseFileName(fileName: string): ParsedFileName | null {
  const { stem, extension } = splitExtension(fileName);
  const parts = stem.split("_");
  const suffix = parts.pop();
  if (suffix === undefined || suffix === "" || suffix.includes("-")) return null;

  const entities: Array<[string, string]> = [];
  for (const part of parts) {
    if (!ENTITY_PAIR.test(part)) return null;
    const dash = part.indexOf("-");
    entities.push([part.slice(0, dash), part.slice(dash + 1)]);
  }
  return { entities, suffix, extension };
}

/** Find the modality a file belongs to, by datatype directory, suffix and extension. */
export function classifyFile(
  schema: FeatureSchema,
  datatype: string,
  fileName: string,
): ModalitySpec | undefined {
  const { stem, extension } = splitExtension(fileName);
  const suffix = stem.slice(stem.lastIndexOf("_") + 1);
  return schema.modalities.find(
    (m) =>
      m.datatype === datatype &&
      m.suffix === suffix &&
      m.extensions.includes(extension),
  );
}

/** Expected relative path prefix: "sub-01/ses-1/anat/" or "sub-01/anat/" */
export function buildEntityDir(
  subject: string,
  session: string | null,
  datatype: string,
): string {
  return session === null
    ? `sub-${subject}/${datatype}/`
    : `sub-${subject}/ses-${session}/${datatype}/`;
}
