import axios from "axios";
import { logger } from "../utils/logger";

export type TelegramOptions = {
	botToken: string;
	chatId: string;
};

export async function sendTelegramMessage(
	options: TelegramOptions,
	text: string,
): Promise<void> {
	if (!options.botToken || !options.chatId) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${options.botToken}/sendMessage`;

	await axios.post(url, {
		chat_id: options.chatId,
		text,
		parse_mode: "Markdown",
	});
}
