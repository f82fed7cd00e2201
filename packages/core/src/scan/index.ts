export type { EntityRecord } from "./types.js";
export { scanDataset, collectRecords, type ScanOptions } from "./scanner.js";
export {
  parseSubjectDir,
  parseSessionDir,
  splitExtension,
  parseFileName,
  classifyFile,
  buildEntityDir,
  type ParsedFileName,
} from "./entities.js";
