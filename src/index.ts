import { createBinanceExchange } from "./clients/binance";
import { safeNotifier, sendTelegramMessage } from "./clients/telegram";
import { config } from "./config";
import { createAdminApp } from "./server/adminServer";
import { SettingsStore } from "./services/settingsStore";
import { runTradingLoop } from "./services/tradingLoop";
import { logger } from "./utils/logger";
import { sleep } from "./utils/time";

async function bootstrap() {
	logger.info("Starting Supertrend futures bot");

	const exchange = createBinanceExchange();
	const store = new SettingsStore(config.paths.settings);
	const controller = new AbortController();

	const server = createAdminApp({ store, exchange }).listen(
		config.admin.port,
		config.admin.host,
		() => {
			logger.info(
				{ host: config.admin.host, port: config.admin.port },
				"Admin API listening",
			);
		},
	);

	const shutdown = (reason: string) => {
		logger.info({ reason }, "Shutting down after the current cycle");
		controller.abort();
		server.close();
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	await runTradingLoop(
		{
			exchange,
			settings: store,
			notify: safeNotifier(sendTelegramMessage),
			sleep,
			now: () => new Date(),
			timing: config.loop,
			candleLimit: config.loop.candleLimit,
		},
		controller.signal,
	);
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
