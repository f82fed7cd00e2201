import {
  DEFAULT_METADATA_COLUMNS,
  type DatasetProfile,
  type FeatureSchema,
} from "@neuroshard/core/dataset";

/**
 * Aphasia Recovery Cohort: longitudinal MRI of chronic stroke survivors.
 * 230 participants scanned across 902 sessions.
 */
const ARC_SCHEMA: FeatureSchema = {
  modalities: [
    { label: "T1w", datatype: "anat", suffix: "T1w", extensions: [".nii.gz"] },
    { label: "T2w", datatype: "anat", suffix: "T2w", extensions: [".nii.gz"] },
    { label: "FLAIR", datatype: "anat", suffix: "FLAIR", extensions: [".nii.gz"] },
    { label: "bold", datatype: "func", suffix: "bold", extensions: [".nii.gz"] },
    { label: "dwi", datatype: "dwi", suffix: "dwi", extensions: [".nii.gz"] },
  ],
  columns: DEFAULT_METADATA_COLUMNS,
  blobColumn: "nifti",
};

export const arcProfile: DatasetProfile = {
  kind: "arc",
  description: "Aphasia Recovery Cohort (structural, functional and diffusion MRI)",
  expectedCounts: () => ({ subjects: 230, sessions: 902 }),
  featureSchema: () => ARC_SCHEMA,
};
