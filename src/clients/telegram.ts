import axios from "axios";
import { config } from "../config";
import { logger } from "../utils/logger";

export type Notifier = (text: string) => Promise<void>;

export async function sendTelegramMessage(text: string): Promise<void> {
	if (!config.telegram.botToken || !config.telegram.chatId) {
		logger.debug("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/sendMessage`;

	await axios.post(url, {
		chat_id: config.telegram.chatId,
		text,
	});
}

/** Notifications are informational; a failed send is logged and dropped. */
export function safeNotifier(send: Notifier): (text: string) => void {
	return (text) => {
		send(text).catch((error) => {
			logger.error({ error }, "Failed to send notification");
		});
	};
}
