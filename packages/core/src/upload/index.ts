export {
  ShardStateMachine,
  type ShardState,
  type ShardTransitionEvent,
  type ShardTransitionListener,
} from "./state-machine.js";
export {
  backoffDelay,
  isRetryable,
  retryAfterHint,
  retryWithBackoff,
  sleep,
  type RetryOptions,
  type RetryPolicy,
  type Sleeper,
} from "./retry.js";
export { uploadShard, type ShardOutcome, type ShardUploaderDeps } from "./uploader.js";
export {
  uploadShards,
  type FailedShard,
  type UploadShardsOptions,
  type UploadShardsResult,
} from "./pool.js";
