/**
 * BotEventBus: typed pub/sub for bot events.
 *
 * Synchronous dispatch in registration order. A throwing subscriber is
 * reported to the error callback and never reaches the emitter, so the
 * monitor loop is immune to a bad notifier.
 */

import { TypedEmitter } from "../lib/events/index.js";
import { type BotEvent, type BotEventOf, type BotEventType, isBotEventOf } from "./bot-events.js";

/** Optional callback invoked when a handler throws during dispatch. */
export type HandlerErrorCallback = (error: unknown, event: BotEvent) => void;

type BusEvents = {
	event: (event: BotEvent) => void;
};

export class BotEventBus {
	private readonly emitter = new TypedEmitter<BusEvents>();
	private readonly onHandlerError: HandlerErrorCallback | null;

	constructor(onHandlerError?: HandlerErrorCallback) {
		this.onHandlerError = onHandlerError ?? null;
	}

	/** Subscribe to one event type. Returns an unsubscribe function. */
	on<T extends BotEventType>(type: T, handler: (event: BotEventOf<T>) => void): () => void {
		return this.register((event) => {
			if (isBotEventOf(event, type)) handler(event);
		});
	}

	/** Subscribe to every event. Returns an unsubscribe function. */
	onAny(handler: (event: BotEvent) => void): () => void {
		return this.register(handler);
	}

	emit(event: BotEvent): void {
		this.emitter.emit("event", event);
	}

	get subscriberCount(): number {
		return this.emitter.listenerCount("event");
	}

	/** Remove all handlers */
	clear(): void {
		this.emitter.removeAllListeners();
	}

	private register(handler: (event: BotEvent) => void): () => void {
		const isolated = (event: BotEvent): void => {
			try {
				handler(event);
			} catch (error: unknown) {
				this.reportHandlerError(error, event);
			}
		};
		this.emitter.on("event", isolated);
		return () => {
			this.emitter.off("event", isolated);
		};
	}

	private reportHandlerError(error: unknown, event: BotEvent): void {
		try {
			this.onHandlerError?.(error, event);
		} catch {
			// The error callback threw; remaining handlers still run.
		}
	}
}
