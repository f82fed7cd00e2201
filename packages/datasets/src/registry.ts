import type { DatasetProfile } from "@neuroshard/core/dataset";
import { arcProfile } from "./arc.js";
import { isles24Profile } from "./isles24.js";

export const DATASET_PROFILES: Readonly<Record<string, DatasetProfile>> = {
  [arcProfile.kind]: arcProfile,
  [isles24Profile.kind]: isles24Profile,
};

export function listDatasetKinds(): string[] {
  return Object.keys(DATASET_PROFILES).sort();
}

export function getDatasetProfile(kind: string): DatasetProfile {
  const profile = Object.hasOwn(DATASET_PROFILES, kind) ? DATASET_PROFILES[kind] : undefined;
  if (!profile) {
    throw new Error(
      `Unknown dataset kind "${kind}". Known kinds: ${listDatasetKinds().join(", ")}`,
    );
  }
  return profile;
}
