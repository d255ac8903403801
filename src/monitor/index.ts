export { MonitoringScheduler } from "./scheduler.js";
export type { MonitoringSchedulerDeps } from "./scheduler.js";
export type {
	CycleReport,
	CycleStatus,
	LiquidationOutcome,
	SchedulerStats,
	TriggeredPosition,
} from "./types.js";
