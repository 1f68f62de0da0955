import type { ExchangeFailure, ExchangePort } from "../clients/exchangePort";
import {
	computeIndicators,
	DEFAULT_INDICATOR_OPTIONS,
	type IndicatorOptions,
} from "../indicators";
import type { BotSettings, Candle } from "../types";
import { InsufficientDataError } from "../utils/errors";
import { logger } from "../utils/logger";
import { reconcileEntryOrders, type ReconcileReport } from "./orderReconciler";
import {
	cancelStrayStops,
	isReduceOnlyStop,
	manageProtectiveStop,
	NO_POSITION,
	type ProtectiveStopContext,
	type ProtectiveStopState,
	releaseProtectiveStop,
	type StopEvent,
} from "./protectiveStop";
import { sessionWindowAt } from "./sessionGate";
import type { SettingsSource } from "./settingsStore";
import {
	type ClosedPair,
	evaluateSignal,
	lastClosedPair,
} from "./signalEvaluator";

export type LoopTiming = {
	cycleIntervalMs: number;
	idleIntervalMs: number;
	backoffMs: number;
};

export type TradingLoopDeps = {
	exchange: ExchangePort;
	settings: SettingsSource;
	notify: (text: string) => void;
	sleep: (ms: number) => Promise<void>;
	now: () => Date;
	timing: LoopTiming;
	candleLimit: number;
	indicators?: IndicatorOptions;
};

export type CycleOutcome =
	| { kind: "out_of_session"; state: ProtectiveStopState }
	| { kind: "exchange_failure"; state: ProtectiveStopState; error: ExchangeFailure }
	| { kind: "insufficient_data"; state: ProtectiveStopState }
	| { kind: "entry_reconciled"; state: ProtectiveStopState; report: ReconcileReport }
	| { kind: "stop_managed"; state: ProtectiveStopState };

export function describeStopEvent(symbol: string, event: StopEvent): string {
	switch (event.type) {
		case "initial_placed":
			return `${symbol}: initial stop loss set at ${event.stopPrice}`;
		case "adopted":
			return `${symbol}: tracking existing stop at ${event.stopPrice} (${event.phase})`;
		case "repaired":
			return `${symbol}: protective stop restored at ${event.stopPrice}`;
		case "break_even":
			return `${symbol}: stop loss moved to break-even at ${event.stopPrice}`;
		case "trailed":
			return `${symbol}: stop loss trailed from ${event.from} to ${event.stopPrice}`;
		case "released":
			return `${symbol}: position closed`;
	}
}

function closedPairOf(
	candles: Candle[],
	options: IndicatorOptions,
	symbol: string,
): ClosedPair | null {
	try {
		return lastClosedPair(computeIndicators(candles, options));
	} catch (error) {
		if (!(error instanceof InsufficientDataError)) throw error;
		logger.warn(
			{ symbol, required: error.required, received: error.received },
			"Not enough candles; skipping signal evaluation",
		);
		return null;
	}
}

/**
 * One pass of the strategy for a running bot. Exchange failures end the
 * cycle with the stop state unchanged; the next cycle re-reads everything.
 */
export async function runCycle(
	deps: TradingLoopDeps,
	settings: BotSettings,
	state: ProtectiveStopState,
	now: Date,
): Promise<CycleOutcome> {
	const { exchange } = deps;
	const { symbol } = settings;

	if (!sessionWindowAt(now, settings.sessionStart)) {
		logger.debug({ symbol, sessionStart: settings.sessionStart }, "Outside trading session");
		return { kind: "out_of_session", state };
	}

	const position = await exchange.getPosition(symbol);
	if (!position.ok) return { kind: "exchange_failure", state, error: position.error };

	const openOrders = await exchange.getOpenOrders(symbol);
	if (!openOrders.ok) return { kind: "exchange_failure", state, error: openOrders.error };

	const stopContext: ProtectiveStopContext = {
		exchange,
		settings,
		onEvent: (event) => deps.notify(describeStopEvent(symbol, event)),
	};

	if (position.value) {
		const markPrice = await exchange.getMarkPrice(symbol);
		if (!markPrice.ok) return { kind: "exchange_failure", state, error: markPrice.error };

		const next = await manageProtectiveStop(stopContext, state, {
			position: position.value,
			markPrice: markPrice.value,
			openOrders: openOrders.value,
		});
		return { kind: "stop_managed", state: next };
	}

	const releasedId = state.phase === "no_position" ? null : state.orderId;
	const flatState = await releaseProtectiveStop(stopContext, state);
	await cancelStrayStops(
		stopContext,
		openOrders.value.filter((o) => isReduceOnlyStop(o) && o.id !== releasedId),
	);

	const candles = await exchange.getCandles(symbol, settings.timeframe, deps.candleLimit);
	if (!candles.ok) {
		return { kind: "exchange_failure", state: flatState, error: candles.error };
	}

	const pair = closedPairOf(
		candles.value,
		deps.indicators ?? DEFAULT_INDICATOR_OPTIONS,
		symbol,
	);
	if (!pair) return { kind: "insufficient_data", state: flatState };

	const signal = evaluateSignal(pair);
	const report = await reconcileEntryOrders({
		exchange,
		settings,
		signal,
		latest: pair[1],
		openOrders: openOrders.value,
	});

	if (report.placed) {
		deps.notify(
			`${symbol}: ${report.placed.side} entry stop at ${report.placed.triggerPrice} (limit ${report.placed.limitPrice})`,
		);
	}
	if (report.failures.length) {
		logger.warn({ symbol, signal, failures: report.failures }, "Entry reconciliation incomplete");
	}

	return { kind: "entry_reconciled", state: flatState, report };
}

/**
 * Sequential control loop. The settings record is re-read every iteration, a
 * stopped bot idles, and an unexpected error backs off before the next try.
 * The abort signal is checked between cycles only.
 */
export async function runTradingLoop(
	deps: TradingLoopDeps,
	signal?: AbortSignal,
): Promise<void> {
	let state: ProtectiveStopState = NO_POSITION;

	logger.info(deps.timing, "Trading loop started");

	while (!signal?.aborted) {
		let delay = deps.timing.cycleIntervalMs;
		try {
			const settings = await deps.settings.load();
			if (!settings.running) {
				await deps.sleep(deps.timing.idleIntervalMs);
				continue;
			}

			const outcome = await runCycle(deps, settings, state, deps.now());
			state = outcome.state;
			if (outcome.kind === "exchange_failure") {
				logger.warn(
					{ symbol: settings.symbol, error: outcome.error },
					"Exchange unavailable; retrying next cycle",
				);
			}
		} catch (error) {
			logger.error({ error }, "Unexpected error in trading cycle");
			delay = deps.timing.backoffMs;
		}
		await deps.sleep(delay);
	}

	logger.info("Trading loop stopped");
}
