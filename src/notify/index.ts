export { attachLogSubscriber, logBotEvent } from "./log-subscriber.js";
export {
	DEFAULT_SEND_TIMEOUT_MS,
	TelegramNotifier,
	escapeHtml,
	renderTelegramMessage,
} from "./telegram.js";
export type { MessageSender, TelegramNotifierConfig } from "./telegram.js";
