export { runUpload, type RunUploadOptions, type UploadRunResult } from "./run-upload.js";
export {
  createPipelineContext,
  type PipelineContext,
  type UploadRequest,
  type CreatePipelineContextOptions,
} from "./context.js";
