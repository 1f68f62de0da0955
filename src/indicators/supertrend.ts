import type { Candle } from "../types";

export type SupertrendPoint = {
	basicUpperBand: number;
	basicLowerBand: number;
	finalUpperBand: number;
	finalLowerBand: number;
	uptrend: boolean;
};

/**
 * Single forward pass over the candles. Index 0 seeds the recursion with both
 * final bands at zero and an uptrend.
 */
export function supertrend(
	candles: Candle[],
	atr: number[],
	multiplier: number,
): SupertrendPoint[] {
	const points: SupertrendPoint[] = [];

	for (let i = 0; i < candles.length; i++) {
		const candle = candles[i];
		const mid = (candle.high + candle.low) / 2;
		const basicUpperBand = mid + multiplier * atr[i];
		const basicLowerBand = mid - multiplier * atr[i];

		if (i === 0) {
			points.push({
				basicUpperBand,
				basicLowerBand,
				finalUpperBand: 0,
				finalLowerBand: 0,
				uptrend: true,
			});
			continue;
		}

		const prev = points[i - 1];
		const prevClose = candles[i - 1].close;

		const finalUpperBand =
			basicUpperBand < prev.finalUpperBand || prevClose > prev.finalUpperBand
				? basicUpperBand
				: prev.finalUpperBand;
		const finalLowerBand =
			basicLowerBand > prev.finalLowerBand || prevClose < prev.finalLowerBand
				? basicLowerBand
				: prev.finalLowerBand;

		let uptrend = prev.uptrend;
		if (candle.close > finalUpperBand) uptrend = true;
		else if (candle.close < finalLowerBand) uptrend = false;

		points.push({
			basicUpperBand,
			basicLowerBand,
			finalUpperBand,
			finalLowerBand,
			uptrend,
		});
	}

	return points;
}
