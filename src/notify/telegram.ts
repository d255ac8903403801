/**
 * TelegramNotifier: pushes trigger, execution and failure alerts to a
 * Telegram chat through the grammy Bot API client.
 *
 * Sends are fire-and-forget: the bus handler starts the request and
 * returns. A failed or timed-out send is logged at debug level and dropped.
 */

import { Api } from "grammy";
import type { BotEvent } from "../events/bot-events.js";
import type { BotEventBus } from "../events/event-bus.js";
import type { Logger } from "../lib/logger/index.js";

/** The one Bot API call the notifier needs; grammy's `Api` satisfies it. */
export interface MessageSender {
	sendMessage(
		chatId: string,
		text: string,
		options: { parse_mode: "HTML" },
		signal: AbortSignal,
	): Promise<unknown>;
}

export const DEFAULT_SEND_TIMEOUT_MS = 10_000;

export interface TelegramNotifierConfig {
	readonly sender: MessageSender;
	readonly chatId: string;
	readonly logger: Logger;
	/** Per-message cap; also bounds `flush()`. */
	readonly sendTimeoutMs?: number;
}

export function escapeHtml(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function money(value: number): string {
	return value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`;
}

/** HTML message for an event, or null for events that are not pushed. */
export function renderTelegramMessage(event: BotEvent): string | null {
	switch (event.type) {
		case "bot_started": {
			const selection =
				event.selectionMode === "selected"
					? `selected (${event.selectedCount} positions)`
					: event.selectionMode;
			return [
				"🚀 <b>BOT STARTED</b>",
				`<b>Stop loss:</b> ${event.stopLossPercentage}%`,
				`<b>Stop price:</b> ${event.stopLossPrice === null ? "not set" : event.stopLossPrice.toFixed(3)}`,
				`<b>Interval:</b> ${event.checkIntervalSeconds}s`,
				`<b>Monitoring:</b> ${selection}`,
				`<b>Dry run:</b> ${event.dryRun ? "yes" : "no"}`,
			].join("\n");
		}
		case "trigger_fired": {
			const p = event.position;
			return [
				"🚨 <b>STOP LOSS TRIGGERED</b>",
				`<b>Market:</b> ${escapeHtml(p.market)} (${escapeHtml(p.outcome)})`,
				`<b>Size:</b> ${p.size.toFixed(2)} @ $${p.price.toFixed(4)}`,
				`<b>P&amp;L:</b> ${money(p.pnl)} (${p.pnlPct.toFixed(2)}%)`,
				`<b>Reason:</b> ${escapeHtml(event.reasons.join(" | "))}`,
			].join("\n");
		}
		case "liquidation_executed": {
			const r = event.result;
			const heading = r.dryRun ? "STOP LOSS EXECUTED (DRY RUN)" : "STOP LOSS EXECUTED";
			return [
				`${r.success ? "✅" : "⚠️"} <b>${heading}</b>`,
				`<b>Market:</b> ${escapeHtml(event.position.market)} (${escapeHtml(event.position.outcome)})`,
				`<b>Orders:</b> ${r.ordersPlaced}`,
				`<b>Ordered:</b> ${r.totalSizeOrdered} of ${r.originalSize}`,
				`<b>Remaining:</b> ${r.remainingSize}`,
				`<b>Status:</b> ${r.status}`,
			].join("\n");
		}
		case "execution_error":
			return [
				"❌ <b>EXECUTION ERROR</b>",
				`<b>Market:</b> ${escapeHtml(event.position.market)} (${escapeHtml(event.position.outcome)})`,
				`<b>Error:</b> ${escapeHtml(event.error)}`,
			].join("\n");
		case "cycle_error":
			return [
				"⚠️ <b>MONITORING ERROR</b>",
				`<b>Error:</b> ${escapeHtml(event.error)}`,
				`<b>Consecutive failures:</b> ${event.consecutiveErrors}`,
			].join("\n");
		case "cycle_completed":
			return null;
	}
}

export class TelegramNotifier {
	private readonly sender: MessageSender;
	private readonly chatId: string;
	private readonly logger: Logger;
	private readonly sendTimeoutMs: number;
	private readonly pending = new Set<Promise<void>>();

	constructor(config: TelegramNotifierConfig) {
		this.sender = config.sender;
		this.chatId = config.chatId;
		this.logger = config.logger.child({ module: "telegram" });
		this.sendTimeoutMs = config.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
	}

	/** Null when either the bot token or the chat id is missing. */
	static fromSettings(
		botToken: string | null,
		chatId: string | null,
		logger: Logger,
	): TelegramNotifier | null {
		if (!botToken || !chatId) return null;
		return new TelegramNotifier({ sender: new Api(botToken), chatId, logger });
	}

	attach(bus: BotEventBus): () => void {
		return bus.onAny((event) => this.notify(event));
	}

	notify(event: BotEvent): void {
		const text = renderTelegramMessage(event);
		if (text === null) return;
		const send = this.sender
			.sendMessage(
				this.chatId,
				text,
				{ parse_mode: "HTML" },
				AbortSignal.timeout(this.sendTimeoutMs),
			)
			.then(
				() => undefined,
				(error: unknown) => {
					this.logger.debug(
						{ event: event.type, error: error instanceof Error ? error.message : String(error) },
						"Telegram send failed",
					);
				},
			)
			.finally(() => {
				this.pending.delete(send);
			});
		this.pending.add(send);
	}

	/** Waits for in-flight sends, e.g. before the process exits. */
	async flush(): Promise<void> {
		await Promise.all([...this.pending]);
	}
}
