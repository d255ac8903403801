import EventEmitter from "eventemitter3";

/**
 * Typed event map: keys are event names, values are handler signatures.
 * Example: { event: (e: BotEvent) => void; subscriberError: (err: Error) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

type Listener = (...args: unknown[]) => void;

/**
 * Type-safe event emitter over eventemitter3. Emission is synchronous and a
 * throwing handler propagates to the emitter; callers that must survive a bad
 * handler wrap it first (see BotEventBus).
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	/** @returns true when at least one handler was registered */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
