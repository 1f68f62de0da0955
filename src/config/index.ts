import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "true").toLowerCase() === "true";
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");

export const config = {
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
		testnet: useTestnet,
		quoteAsset: process.env.QUOTE_ASSET || "USDT",
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	admin: {
		host: process.env.ADMIN_HOST || "127.0.0.1",
		port: Number(process.env.ADMIN_PORT || "8080"),
	},
	loop: {
		cycleIntervalMs: Number(process.env.CYCLE_INTERVAL_MS || "1000"),
		idleIntervalMs: Number(process.env.IDLE_INTERVAL_MS || "5000"),
		backoffMs: Number(process.env.BACKOFF_MS || "5000"),
		candleLimit: 100,
	},
	logging: {
		level: process.env.LOG_LEVEL || "info",
		file: process.env.LOG_FILE || "",
	},
	paths: {
		settings:
			process.env.SETTINGS_PATH ||
			path.join(process.cwd(), "data/bot-settings.json"),
	},
};
