export type { ShardDescriptor, ShardPlan, PlanOptions } from "./types.js";
export { planShards, compareRecords, shardFileName } from "./planner.js";
