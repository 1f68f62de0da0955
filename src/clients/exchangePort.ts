import type { Candle, Order, Position, StopOrderRequest } from "../types";

export type ExchangeFailure = {
	kind: "transient";
	operation: string;
	message: string;
	code?: number;
};

export type PortResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: ExchangeFailure };

export type CancelOutcome = "cancelled" | "not_found";

export type CloseOutcome = "closed" | "flat";

/**
 * Everything the strategy needs from the exchange. Implementations never
 * throw: every failure comes back as `{ ok: false }` so each call site decides
 * whether to skip or carry on.
 */
export interface ExchangePort {
	getCandles(
		symbol: string,
		timeframe: string,
		limit: number,
	): Promise<PortResult<Candle[]>>;
	getOpenOrders(symbol: string): Promise<PortResult<Order[]>>;
	placeConditionalStop(request: StopOrderRequest): Promise<PortResult<Order>>;
	cancelOrder(symbol: string, orderId: string): Promise<PortResult<CancelOutcome>>;
	getPosition(symbol: string): Promise<PortResult<Position | null>>;
	getMarkPrice(symbol: string): Promise<PortResult<number>>;
	/** Manual intervention only; the trading loop never calls it. */
	closePositionMarket(symbol: string): Promise<PortResult<CloseOutcome>>;
	listTradableSymbols(): Promise<PortResult<string[]>>;
}

export function ok<T>(value: T): PortResult<T> {
	return { ok: true, value };
}

export function failed<T>(
	operation: string,
	message: string,
	code?: number,
): PortResult<T> {
	return { ok: false, error: { kind: "transient", operation, message, code } };
}
