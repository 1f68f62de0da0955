import type { Candle, IndicatorFrame } from "../types";
import { InsufficientDataError } from "../utils/errors";
import { rollingAtr } from "./atr";
import { supertrend } from "./supertrend";
import { rollingVwap } from "./vwap";

export type IndicatorOptions = {
	vwapPeriod: number;
	atrPeriod: number;
	supertrendMultiplier: number;
};

export const DEFAULT_INDICATOR_OPTIONS: IndicatorOptions = {
	vwapPeriod: 14,
	atrPeriod: 7,
	supertrendMultiplier: 2,
};

/** The longest window plus the candle that may still be open. */
export function minimumCandles(options: IndicatorOptions): number {
	return Math.max(options.vwapPeriod, options.atrPeriod) + 1;
}

export function computeIndicators(
	candles: Candle[],
	options: IndicatorOptions = DEFAULT_INDICATOR_OPTIONS,
): IndicatorFrame[] {
	const required = minimumCandles(options);
	if (candles.length < required) {
		throw new InsufficientDataError(required, candles.length);
	}

	const vwap = rollingVwap(candles, options.vwapPeriod);
	const atr = rollingAtr(candles, options.atrPeriod);
	const trend = supertrend(candles, atr, options.supertrendMultiplier);

	return candles.map((candle, i) => ({
		...candle,
		vwap: vwap[i],
		atr: atr[i],
		...trend[i],
	}));
}
