export {
  TEST_SCHEMA,
  withTempDir,
  writeTree,
  sessionTree,
  makeRecord,
  makeMockLogger,
} from "./dataset.js";
