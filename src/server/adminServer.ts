import express, {
	type NextFunction,
	type Request,
	type Response,
} from "express";
import type { ExchangePort } from "../clients/exchangePort";
import { cancelAllOpenOrders } from "../services/orderReconciler";
import { sessionWindowAt } from "../services/sessionGate";
import { isRecord, type SettingsStore } from "../services/settingsStore";
import { InvalidConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";

export type AdminDeps = {
	store: SettingsStore;
	exchange: ExchangePort;
	now?: () => Date;
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
	return (req: Request, res: Response, next: NextFunction) => {
		handler(req, res).catch(next);
	};
}

export function createAdminApp({
	store,
	exchange,
	now = () => new Date(),
}: AdminDeps): express.Express {
	const app = express();
	app.use(express.json());

	app.get(
		"/api/settings",
		route(async (_req, res) => {
			res.json(await store.load());
		}),
	);

	app.put(
		"/api/settings",
		route(async (req, res) => {
			const body: unknown = req.body;
			if (!isRecord(body)) {
				res.status(400).json({ error: "Expected a JSON object" });
				return;
			}
			res.json(await store.update(body));
		}),
	);

	app.post(
		"/api/bot/start",
		route(async (_req, res) => {
			const { settings, changed } = await store.setRunning(true);
			res.json({
				running: settings.running,
				changed,
				message: changed ? "Bot started." : "Bot is already running.",
			});
		}),
	);

	app.post(
		"/api/bot/stop",
		route(async (_req, res) => {
			const { settings, changed } = await store.setRunning(false);
			res.json({
				running: settings.running,
				changed,
				message: changed ? "Bot stopped." : "Bot is not running.",
			});
		}),
	);

	app.get(
		"/api/status",
		route(async (_req, res) => {
			const settings = await store.load();
			const window = sessionWindowAt(now(), settings.sessionStart);
			res.json({
				running: settings.running,
				inSession: window !== null,
				session: window && {
					start: window.start.toISOString(),
					end: window.end.toISOString(),
				},
				settings,
			});
		}),
	);

	app.get(
		"/api/symbols",
		route(async (_req, res) => {
			const symbols = await exchange.listTradableSymbols();
			if (!symbols.ok) {
				res.status(502).json({
					error: "Error fetching symbols from the exchange. Please try again later.",
				});
				return;
			}
			res.json({ symbols: symbols.value });
		}),
	);

	app.post(
		"/api/position/close",
		route(async (_req, res) => {
			const { symbol } = await store.load();
			const result = await exchange.closePositionMarket(symbol);
			if (!result.ok) {
				res.status(502).json({ error: result.error.message });
				return;
			}
			logger.info({ symbol, outcome: result.value }, "Manual position close");
			res.json({ symbol, outcome: result.value });
		}),
	);

	app.post(
		"/api/orders/cancel-all",
		route(async (_req, res) => {
			const { symbol } = await store.load();
			const report = await cancelAllOpenOrders(exchange, symbol);
			res.status(report.failures.length ? 502 : 200).json({
				symbol,
				cancelled: report.cancelled,
				failures: report.failures,
			});
		}),
	);

	app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
		if (err instanceof InvalidConfigurationError) {
			res.status(400).json({ error: err.message, issues: err.issues });
			return;
		}
		// body-parser tags unreadable JSON bodies with status 400
		if (isRecord(err) && err.status === 400) {
			res.status(400).json({ error: "Malformed JSON body" });
			return;
		}
		logger.error({ err }, "Admin request failed");
		res.status(500).json({ error: "Internal error" });
	});

	return app;
}
