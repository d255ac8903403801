export type {
	BotEvent,
	BotEventOf,
	BotEventType,
	BotStarted,
	CycleCompleted,
	CycleErrored,
	ExecutionErrored,
	LiquidationExecuted,
	TriggerFired,
} from "./bot-events.js";
export { isBotEventOf } from "./bot-events.js";

export { BotEventBus } from "./event-bus.js";
export type { HandlerErrorCallback } from "./event-bus.js";
