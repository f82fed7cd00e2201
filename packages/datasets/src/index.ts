export { arcProfile } from "./arc.js";
export { isles24Profile } from "./isles24.js";
export { DATASET_PROFILES, getDatasetProfile, listDatasetKinds } from "./registry.js";
