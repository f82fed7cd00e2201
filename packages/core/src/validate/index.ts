export type { CheckResult, CheckStatus, ReportStatus, ValidationReport } from "./types.js";
export {
  validate,
  assertValidationPassed,
  type ValidateOptions,
} from "./validator.js";
export {
  fractionTolerance,
  absoluteTolerance,
  toleranceFromConfig,
  resolveTolerance,
  type TolerancePolicy,
} from "./tolerance.js";
export { parseGroupingKey, countGroup, type GroupingKey } from "./grouping.js";
