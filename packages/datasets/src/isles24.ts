import {
  DEFAULT_METADATA_COLUMNS,
  type DatasetProfile,
  type FeatureSchema,
} from "@neuroshard/core/dataset";

// Acute CT on admission plus follow-up diffusion MRI, two sessions each.
const ISLES24_SCHEMA: FeatureSchema = {
  modalities: [
    { label: "ncct", datatype: "anat", suffix: "ncct", extensions: [".nii.gz"] },
    { label: "cta", datatype: "anat", suffix: "cta", extensions: [".nii.gz"] },
    { label: "ctp", datatype: "perf", suffix: "ctp", extensions: [".nii.gz"] },
    { label: "dwi", datatype: "dwi", suffix: "dwi", extensions: [".nii.gz"] },
    { label: "adc", datatype: "dwi", suffix: "adc", extensions: [".nii.gz"] },
  ],
  columns: [...DEFAULT_METADATA_COLUMNS, { name: "datatype", source: "datatype" }],
  blobColumn: "nifti",
};

export const isles24Profile: DatasetProfile = {
  kind: "isles24",
  description: "ISLES'24 ischemic stroke lesion segmentation challenge (CT and MRI)",
  expectedCounts: () => ({ subjects: 149, sessions: 298 }),
  featureSchema: () => ISLES24_SCHEMA,
};
