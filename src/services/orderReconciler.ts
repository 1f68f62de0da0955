import type { ExchangePort } from "../clients/exchangePort";
import type {
	BotSettings,
	IndicatorFrame,
	Order,
	OrderSide,
	TradeSignal,
} from "../types";
import { logger } from "../utils/logger";

export type ReconcileReport = {
	signal: TradeSignal;
	cancelled: string[];
	placed: Order | null;
	failures: string[];
};

export type ReconcileInput = {
	exchange: ExchangePort;
	settings: BotSettings;
	signal: TradeSignal;
	/** latest closed candle */
	latest: IndicatorFrame;
	/** snapshot queried at the start of the cycle */
	openOrders: Order[];
};

const PRICE_EPSILON = 1e-9;

export function samePrice(a: number, b: number): boolean {
	return Math.abs(a - b) < PRICE_EPSILON;
}

export function isEntryOrder(order: Order): boolean {
	return order.kind === "STOP" && !order.reduceOnly;
}

export function entryLevels(
	side: OrderSide,
	latest: IndicatorFrame,
	priceBuffer: number,
): { triggerPrice: number; limitPrice: number } {
	return side === "BUY"
		? { triggerPrice: latest.high, limitPrice: latest.high + priceBuffer }
		: { triggerPrice: latest.low, limitPrice: latest.low - priceBuffer };
}

async function cancelEntry(
	exchange: ExchangePort,
	symbol: string,
	order: Order,
	report: ReconcileReport,
): Promise<boolean> {
	const result = await exchange.cancelOrder(symbol, order.id);
	if (!result.ok) {
		report.failures.push(`cancel ${order.id}: ${result.error.message}`);
		return false;
	}
	report.cancelled.push(order.id);
	return true;
}

/**
 * Keeps exactly one resting conditional entry order in line with the signal.
 * Works only from the supplied snapshot, so a repeat call against an
 * unchanged signal and order book makes no exchange calls.
 */
export async function reconcileEntryOrders(
	input: ReconcileInput,
): Promise<ReconcileReport> {
	const { exchange, settings, signal, latest, openOrders } = input;
	const { symbol } = settings;
	const report: ReconcileReport = {
		signal,
		cancelled: [],
		placed: null,
		failures: [],
	};
	const entries = openOrders.filter(isEntryOrder);

	if (signal === "NONE") {
		for (const order of entries) {
			await cancelEntry(exchange, symbol, order, report);
		}
		if (report.cancelled.length) {
			logger.info(
				{ symbol, cancelled: report.cancelled },
				"No signal; cancelled resting entry orders",
			);
		}
		return report;
	}

	const { triggerPrice, limitPrice } = entryLevels(
		signal,
		latest,
		settings.priceBuffer,
	);

	for (const order of entries.filter((o) => o.side !== signal)) {
		await cancelEntry(exchange, symbol, order, report);
	}

	const [existing, ...duplicates] = entries.filter((o) => o.side === signal);
	for (const order of duplicates) {
		await cancelEntry(exchange, symbol, order, report);
	}

	if (existing && samePrice(existing.triggerPrice, triggerPrice)) {
		return report;
	}

	if (existing) {
		const cancelled = await cancelEntry(exchange, symbol, existing, report);
		if (!cancelled) {
			logger.warn(
				{ symbol, orderId: existing.id, triggerPrice },
				"Could not replace stale entry order; retrying next cycle",
			);
			return report;
		}
	}

	const placed = await exchange.placeConditionalStop({
		symbol,
		side: signal,
		triggerPrice,
		limitPrice,
		quantity: settings.tradeQuantity,
		reduceOnly: false,
	});
	if (!placed.ok) {
		report.failures.push(`place ${signal}: ${placed.error.message}`);
		return report;
	}

	report.placed = placed.value;
	logger.info(
		{
			symbol,
			side: signal,
			triggerPrice,
			limitPrice,
			replaced: existing?.id,
		},
		"Entry order placed",
	);
	return report;
}

/** Manual intervention: cancels every open order on the symbol. */
export async function cancelAllOpenOrders(
	exchange: ExchangePort,
	symbol: string,
): Promise<ReconcileReport> {
	const report: ReconcileReport = {
		signal: "NONE",
		cancelled: [],
		placed: null,
		failures: [],
	};
	const orders = await exchange.getOpenOrders(symbol);
	if (!orders.ok) {
		report.failures.push(`getOpenOrders: ${orders.error.message}`);
		return report;
	}
	for (const order of orders.value) {
		await cancelEntry(exchange, symbol, order, report);
	}
	logger.info({ symbol, cancelled: report.cancelled }, "Cancelled all orders");
	return report;
}
