import { USDMClient } from "binance";
import { config } from "../config";
import type {
	Candle,
	Order,
	OrderSide,
	Position,
	StopOrderRequest,
	SymbolMeta,
} from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { applyStepSize, applyTickSize } from "../utils/precision";
import { isKlineInterval } from "../utils/timeframes";
import {
	type CancelOutcome,
	type CloseOutcome,
	type ExchangePort,
	failed,
	ok,
	type PortResult,
} from "./exchangePort";

/** Binance rejects cancels of filled, cancelled or unknown orders with -2011. */
const UNKNOWN_ORDER_CODE = -2011;

type RawOrder = {
	orderId: unknown;
	side: unknown;
	type: unknown;
	stopPrice?: unknown;
	price?: unknown;
	origQty?: unknown;
	reduceOnly?: unknown;
};

type RawPosition = {
	positionAmt: unknown;
	entryPrice: unknown;
};

export function errorCode(error: unknown): number | undefined {
	if (error && typeof error === "object" && "code" in error) {
		const code = Number(error.code);
		return Number.isFinite(code) ? code : undefined;
	}
	return undefined;
}

export function toOrder(raw: RawOrder): Order {
	return {
		id: String(raw.orderId),
		side: raw.side === "SELL" ? "SELL" : "BUY",
		kind: raw.type === "STOP" ? "STOP" : "OTHER",
		triggerPrice: Number(raw.stopPrice ?? 0),
		limitPrice: Number(raw.price ?? 0),
		quantity: Number(raw.origQty ?? 0),
		reduceOnly: raw.reduceOnly === true || raw.reduceOnly === "true",
	};
}

export function toPosition(raws: RawPosition[]): Position | null {
	for (const raw of raws) {
		const amount = Number(raw.positionAmt);
		if (!Number.isFinite(amount) || amount === 0) continue;
		return {
			side: amount > 0 ? "LONG" : "SHORT",
			entryPrice: Number(raw.entryPrice),
			quantity: Math.abs(amount),
		};
	}
	return null;
}

export class BinanceExchange implements ExchangePort {
	private cachedSymbols: SymbolMeta[] | null = null;

	constructor(private readonly client: USDMClient) {}

	private async call<T>(
		operation: string,
		context: Record<string, unknown>,
		fn: () => Promise<T>,
	): Promise<PortResult<T>> {
		try {
			return ok(await fn());
		} catch (error) {
			const code = errorCode(error);
			const message = errorMessage(error);
			logger.error({ ...context, operation, code, message }, "Binance call failed");
			return failed(operation, message, code);
		}
	}

	private async symbols(): Promise<SymbolMeta[]> {
		if (!this.cachedSymbols) {
			const info = await this.client.getExchangeInfo();
			this.cachedSymbols = info.symbols as unknown as SymbolMeta[];
		}
		return this.cachedSymbols;
	}

	private async symbolMeta(symbol: string): Promise<SymbolMeta> {
		const meta = (await this.symbols()).find((s) => s.symbol === symbol);
		if (!meta) {
			throw new Error(`Symbol metadata not found for ${symbol}`);
		}
		return meta;
	}

	getCandles(
		symbol: string,
		timeframe: string,
		limit: number,
	): Promise<PortResult<Candle[]>> {
		return this.call("getCandles", { symbol, timeframe }, async () => {
			if (!isKlineInterval(timeframe)) {
				throw new Error(`Unsupported timeframe ${timeframe}`);
			}
			const data = await this.client.getKlines({
				symbol,
				interval: timeframe,
				limit,
			});

			return data.map((kline) => ({
				openTime: Number(kline[0]),
				open: Number(kline[1]),
				high: Number(kline[2]),
				low: Number(kline[3]),
				close: Number(kline[4]),
				volume: Number(kline[5]),
				closeTime: Number(kline[6]),
			}));
		});
	}

	getOpenOrders(symbol: string): Promise<PortResult<Order[]>> {
		return this.call("getOpenOrders", { symbol }, async () => {
			const orders = await this.client.getAllOpenOrders({ symbol });
			return orders.map((o) => toOrder(o));
		});
	}

	placeConditionalStop(request: StopOrderRequest): Promise<PortResult<Order>> {
		return this.call("placeConditionalStop", { ...request }, async () => {
			const meta = await this.symbolMeta(request.symbol);
			const order = await this.client.submitNewOrder({
				symbol: request.symbol,
				side: request.side,
				type: "STOP",
				quantity: applyStepSize(request.quantity, meta),
				price: applyTickSize(request.limitPrice, meta),
				stopPrice: applyTickSize(request.triggerPrice, meta),
				timeInForce: "GTC",
				reduceOnly: request.reduceOnly ? "true" : "false",
			});

			logger.info(
				{
					symbol: request.symbol,
					side: request.side,
					orderId: order.orderId,
					stopPrice: order.stopPrice,
					price: order.price,
				},
				"Placed stop-limit order",
			);
			return toOrder(order);
		});
	}

	async cancelOrder(
		symbol: string,
		orderId: string,
	): Promise<PortResult<CancelOutcome>> {
		try {
			await this.client.cancelOrder({ symbol, orderId: Number(orderId) });
			logger.info({ symbol, orderId }, "Cancelled order");
			return ok("cancelled");
		} catch (error) {
			const code = errorCode(error);
			if (code === UNKNOWN_ORDER_CODE) {
				logger.info({ symbol, orderId }, "Order already gone");
				return ok("not_found");
			}
			const message = errorMessage(error);
			logger.error(
				{ symbol, orderId, operation: "cancelOrder", code, message },
				"Binance call failed",
			);
			return failed("cancelOrder", message, code);
		}
	}

	getPosition(symbol: string): Promise<PortResult<Position | null>> {
		return this.call("getPosition", { symbol }, async () => {
			const positions = await this.client.getPositions({ symbol });
			return toPosition(positions);
		});
	}

	getMarkPrice(symbol: string): Promise<PortResult<number>> {
		return this.call("getMarkPrice", { symbol }, async () => {
			const result = await this.client.getMarkPrice({ symbol });
			const entry = Array.isArray(result)
				? result.find((r) => r.symbol === symbol)
				: result;
			if (!entry) throw new Error(`No mark price returned for ${symbol}`);
			return Number(entry.markPrice);
		});
	}

	closePositionMarket(symbol: string): Promise<PortResult<CloseOutcome>> {
		return this.call("closePositionMarket", { symbol }, async () => {
			const position = toPosition(await this.client.getPositions({ symbol }));
			if (!position) return "flat";

			const side: OrderSide = position.side === "LONG" ? "SELL" : "BUY";
			await this.client.submitNewOrder({
				symbol,
				side,
				type: "MARKET",
				quantity: position.quantity,
				reduceOnly: "true",
			});
			logger.info(
				{ symbol, side, quantity: position.quantity },
				"Closed position with market order",
			);
			return "closed";
		});
	}

	listTradableSymbols(): Promise<PortResult<string[]>> {
		return this.call("listTradableSymbols", {}, async () => {
			const symbols = await this.symbols();
			return symbols
				.filter(
					(s) =>
						s.status === "TRADING" &&
						s.contractType === "PERPETUAL" &&
						s.quoteAsset === config.binance.quoteAsset,
				)
				.map((s) => s.symbol)
				.sort();
		});
	}
}

export function createBinanceExchange(): BinanceExchange {
	const restClient = new USDMClient({
		api_key: config.binance.apiKey,
		api_secret: config.binance.apiSecret,
		baseUrl: config.binance.baseUrl,
		beautifyResponses: true,
		useTestnet: config.binance.testnet,
	});
	return new BinanceExchange(restClient);
}
