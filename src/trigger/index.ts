export type { SelectionResult, TriggerDecision, TriggerReason } from "./types.js";
export { describeReason, evaluateTrigger } from "./evaluator.js";
export { filterMonitored } from "./selection.js";
