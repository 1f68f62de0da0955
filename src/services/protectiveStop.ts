import type { ExchangePort } from "../clients/exchangePort";
import type {
	BotSettings,
	Order,
	OrderSide,
	Position,
	PositionSide,
} from "../types";
import { logger } from "../utils/logger";
import { samePrice } from "./orderReconciler";

export type StopPhase = "initial_stop_set" | "break_even_set" | "trailing";

export type TrackedStop = {
	phase: StopPhase;
	positionSide: PositionSide;
	entryPrice: number;
	stopPrice: number;
	/** null while no stop order is known to be live */
	orderId: string | null;
};

export type ProtectiveStopState = { phase: "no_position" } | TrackedStop;

export type StopEvent =
	| { type: "initial_placed"; stopPrice: number }
	| { type: "adopted"; phase: StopPhase; stopPrice: number }
	| { type: "repaired"; stopPrice: number }
	| { type: "break_even"; stopPrice: number }
	| { type: "trailed"; from: number; stopPrice: number }
	| { type: "released"; orderId: string | null };

export type ProtectiveStopContext = {
	exchange: ExchangePort;
	settings: BotSettings;
	onEvent?: (event: StopEvent) => void;
};

export type PositionSnapshot = {
	position: Position;
	markPrice: number;
	openOrders: Order[];
};

export const NO_POSITION: ProtectiveStopState = { phase: "no_position" };

export function closingSide(side: PositionSide): OrderSide {
	return side === "LONG" ? "SELL" : "BUY";
}

/** Positive when the price is in the position's favour. */
export function unrealizedProfit(
	side: PositionSide,
	entryPrice: number,
	markPrice: number,
): number {
	return side === "LONG" ? markPrice - entryPrice : entryPrice - markPrice;
}

/** Limit price sits beyond the trigger in the losing direction. */
export function stopLimitPrice(
	side: PositionSide,
	stopPrice: number,
	buffer: number,
): number {
	return side === "LONG" ? stopPrice - buffer : stopPrice + buffer;
}

export function initialStopPrice(
	side: PositionSide,
	entryPrice: number,
	stopLossAmount: number,
): number {
	return side === "LONG"
		? entryPrice - stopLossAmount
		: entryPrice + stopLossAmount;
}

/**
 * Phase implied by a live stop's level relative to entry: behind entry is the
 * initial stop, at entry is break-even, beyond entry has already trailed.
 */
export function phaseForStop(
	side: PositionSide,
	entryPrice: number,
	stopPrice: number,
): StopPhase {
	if (samePrice(stopPrice, entryPrice)) return "break_even_set";
	const locked = side === "LONG" ? stopPrice > entryPrice : stopPrice < entryPrice;
	return locked ? "trailing" : "initial_stop_set";
}

export function isReduceOnlyStop(order: Order): boolean {
	return order.kind === "STOP" && order.reduceOnly;
}

function isProtectiveStop(order: Order, side: PositionSide): boolean {
	return isReduceOnlyStop(order) && order.side === closingSide(side);
}

/**
 * A live stop can only be taken over when it covers the whole position and
 * sits no further from entry than a fresh initial stop would.
 */
function fitsPosition(order: Order, position: Position, initialStop: number): boolean {
	if (!samePrice(order.quantity, position.quantity)) return false;
	if (samePrice(order.triggerPrice, initialStop)) return true;
	return position.side === "LONG"
		? order.triggerPrice > initialStop
		: order.triggerPrice < initialStop;
}

function belongsTo(state: TrackedStop, position: Position): boolean {
	return (
		state.positionSide === position.side &&
		samePrice(state.entryPrice, position.entryPrice)
	);
}

async function placeStop(
	ctx: ProtectiveStopContext,
	position: Position,
	stopPrice: number,
): Promise<Order | null> {
	const { exchange, settings } = ctx;
	const result = await exchange.placeConditionalStop({
		symbol: settings.symbol,
		side: closingSide(position.side),
		triggerPrice: stopPrice,
		limitPrice: stopLimitPrice(position.side, stopPrice, settings.priceBuffer),
		quantity: position.quantity,
		reduceOnly: true,
	});
	if (!result.ok) {
		logger.error(
			{ symbol: settings.symbol, stopPrice, error: result.error },
			"Failed to place protective stop",
		);
		return null;
	}
	return result.value;
}

async function establish(
	ctx: ProtectiveStopContext,
	snapshot: PositionSnapshot,
): Promise<ProtectiveStopState> {
	const { position, openOrders } = snapshot;
	const stopPrice = initialStopPrice(
		position.side,
		position.entryPrice,
		ctx.settings.stopLossAmount,
	);
	const candidates = openOrders.filter((o) => isProtectiveStop(o, position.side));
	const live = candidates.find((o) => fitsPosition(o, position, stopPrice));
	await cancelStrayStops(ctx, candidates.filter((o) => o !== live));

	if (live) {
		const phase = phaseForStop(position.side, position.entryPrice, live.triggerPrice);
		logger.info(
			{
				symbol: ctx.settings.symbol,
				orderId: live.id,
				stopPrice: live.triggerPrice,
				entryPrice: position.entryPrice,
				phase,
			},
			"Re-derived protective stop from live order",
		);
		ctx.onEvent?.({ type: "adopted", phase, stopPrice: live.triggerPrice });
		return {
			phase,
			positionSide: position.side,
			entryPrice: position.entryPrice,
			stopPrice: live.triggerPrice,
			orderId: live.id,
		};
	}

	const order = await placeStop(ctx, position, stopPrice);
	if (!order) return NO_POSITION;

	logger.info(
		{
			symbol: ctx.settings.symbol,
			side: position.side,
			entryPrice: position.entryPrice,
			stopPrice: order.triggerPrice,
		},
		"Initial stop loss set",
	);
	ctx.onEvent?.({ type: "initial_placed", stopPrice: order.triggerPrice });
	return {
		phase: "initial_stop_set",
		positionSide: position.side,
		entryPrice: position.entryPrice,
		stopPrice: order.triggerPrice,
		orderId: order.id,
	};
}

/**
 * Cancel-then-place. A failed cancel leaves the state untouched; a failed
 * place after a good cancel leaves the old level tracked with no live order.
 */
async function moveStop(
	ctx: ProtectiveStopContext,
	state: TrackedStop,
	position: Position,
	nextPhase: StopPhase,
	nextStopPrice: number,
): Promise<TrackedStop> {
	const { exchange, settings } = ctx;

	if (state.orderId) {
		const cancelled = await exchange.cancelOrder(settings.symbol, state.orderId);
		if (!cancelled.ok) {
			logger.error(
				{ symbol: settings.symbol, orderId: state.orderId, error: cancelled.error },
				"Failed to cancel protective stop; keeping current stop",
			);
			return state;
		}
	}

	const order = await placeStop(ctx, position, nextStopPrice);
	if (!order) return { ...state, orderId: null };

	return {
		...state,
		phase: nextPhase,
		stopPrice: order.triggerPrice,
		orderId: order.id,
	};
}

/**
 * One step of the stop lifecycle for an open position. Break-even fires once
 * per position; after that each qualifying cycle advances the stop by exactly
 * one trailing step from its current level, never backwards.
 *
 * Trailing also requires the mark to sit at least `stopLossAmount +
 * trailingStep` beyond the current stop. Profit against entry alone would let
 * the stop step forward every cycle until it reached the mark.
 */
export async function manageProtectiveStop(
	ctx: ProtectiveStopContext,
	state: ProtectiveStopState,
	snapshot: PositionSnapshot,
): Promise<ProtectiveStopState> {
	const { position, markPrice, openOrders } = snapshot;
	const { settings } = ctx;

	if (state.phase === "no_position") return establish(ctx, snapshot);

	if (!belongsTo(state, position)) {
		logger.warn(
			{ symbol: settings.symbol, tracked: state, position },
			"Position changed under tracked stop; starting over",
		);
		const staleOrderId = state.orderId;
		await releaseProtectiveStop(ctx, state);
		return establish(ctx, {
			...snapshot,
			openOrders: openOrders.filter((o) => o.id !== staleOrderId),
		});
	}

	let current = state;
	if (current.orderId && !openOrders.some((o) => o.id === current.orderId)) {
		logger.warn(
			{ symbol: settings.symbol, orderId: current.orderId },
			"Protective stop no longer live",
		);
		current = { ...current, orderId: null };
	}

	if (!current.orderId) {
		const order = await placeStop(ctx, position, current.stopPrice);
		if (!order) return current;
		logger.info(
			{ symbol: settings.symbol, stopPrice: order.triggerPrice },
			"Protective stop restored",
		);
		ctx.onEvent?.({ type: "repaired", stopPrice: order.triggerPrice });
		return { ...current, stopPrice: order.triggerPrice, orderId: order.id };
	}

	const threshold = settings.stopLossAmount + settings.trailingStep;
	const profit = unrealizedProfit(position.side, position.entryPrice, markPrice);
	if (profit < threshold) return current;

	if (current.phase === "initial_stop_set") {
		const next = await moveStop(
			ctx,
			current,
			position,
			"break_even_set",
			position.entryPrice,
		);
		if (next.phase === "break_even_set") {
			logger.info(
				{ symbol: settings.symbol, stopPrice: next.stopPrice, profit },
				"Moved stop loss to break-even",
			);
			ctx.onEvent?.({ type: "break_even", stopPrice: next.stopPrice });
		}
		return next;
	}

	// the stop never trails closer to the mark than the break-even trigger
	const cushion = unrealizedProfit(position.side, current.stopPrice, markPrice);
	if (cushion < threshold) return current;

	const direction = position.side === "LONG" ? 1 : -1;
	const target = current.stopPrice + direction * settings.trailingStep;
	const next = await moveStop(ctx, current, position, "trailing", target);
	if (next.orderId && next.orderId !== current.orderId) {
		logger.info(
			{
				symbol: settings.symbol,
				from: current.stopPrice,
				stopPrice: next.stopPrice,
				step: settings.trailingStep,
			},
			"Trailed stop loss",
		);
		ctx.onEvent?.({
			type: "trailed",
			from: current.stopPrice,
			stopPrice: next.stopPrice,
		});
	}
	return next;
}

/**
 * Cancels reduce-only stops nothing tracks, such as one left behind by a
 * failed cancel. Failures are logged and retried on a later cycle.
 */
export async function cancelStrayStops(
	ctx: ProtectiveStopContext,
	orders: Order[],
): Promise<void> {
	for (const order of orders) {
		const result = await ctx.exchange.cancelOrder(ctx.settings.symbol, order.id);
		if (!result.ok) {
			logger.warn(
				{ symbol: ctx.settings.symbol, orderId: order.id, error: result.error },
				"Could not cancel stray stop",
			);
			continue;
		}
		logger.info(
			{ symbol: ctx.settings.symbol, orderId: order.id, stopPrice: order.triggerPrice },
			"Cancelled stray stop",
		);
	}
}

/**
 * Called once the exchange reports no position. Any stop still tracked is
 * cancelled and forgotten whatever the outcome.
 */
export async function releaseProtectiveStop(
	ctx: ProtectiveStopContext,
	state: ProtectiveStopState,
): Promise<ProtectiveStopState> {
	if (state.phase === "no_position") return state;

	if (state.orderId) {
		const result = await ctx.exchange.cancelOrder(ctx.settings.symbol, state.orderId);
		if (!result.ok) {
			logger.warn(
				{ symbol: ctx.settings.symbol, orderId: state.orderId, error: result.error },
				"Could not cancel lingering protective stop",
			);
		}
	}

	logger.info(
		{ symbol: ctx.settings.symbol, lastStop: state.stopPrice, phase: state.phase },
		"Position closed; protective stop released",
	);
	ctx.onEvent?.({ type: "released", orderId: state.orderId });
	return NO_POSITION;
}
