import type { IndicatorFrame, TradeSignal } from "../types";

export type ClosedPair = [previous: IndicatorFrame, latest: IndicatorFrame];

/** The last candle of a fetched window may still be open, so it is skipped. */
export function lastClosedPair(frames: IndicatorFrame[]): ClosedPair | null {
	if (frames.length < 3) return null;
	return [frames[frames.length - 3], frames[frames.length - 2]];
}

export function evaluateSignal(pair: ClosedPair): TradeSignal {
	if (pair.every((f) => f.close > f.vwap && f.uptrend)) return "BUY";
	if (pair.every((f) => f.close < f.vwap && !f.uptrend)) return "SELL";
	return "NONE";
}
