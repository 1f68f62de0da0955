import type { Candle } from "../types";

export function trueRanges(candles: Candle[]): number[] {
	return candles.map((curr, i) => {
		if (i === 0) return curr.high - curr.low;
		const prev = candles[i - 1];
		return Math.max(
			curr.high - curr.low,
			Math.abs(curr.high - prev.close),
			Math.abs(curr.low - prev.close),
		);
	});
}

/**
 * Rolling mean of the true range. Until `period` values exist the mean runs
 * over the values seen so far.
 */
export function rollingAtr(candles: Candle[], period: number): number[] {
	const ranges = trueRanges(candles);
	const result: number[] = [];
	let windowSum = 0;

	for (let i = 0; i < ranges.length; i++) {
		windowSum += ranges[i];
		if (i >= period) windowSum -= ranges[i - period];
		result.push(windowSum / Math.min(i + 1, period));
	}

	return result;
}
