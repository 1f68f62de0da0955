import type { Candle } from "../types";

function typicalPrice(candle: Candle): number {
	return (candle.high + candle.low + candle.close) / 3;
}

/** Sums each window directly, so a window without volume totals exactly 0. */
export function rollingVwap(candles: Candle[], period: number): number[] {
	return candles.map((candle, i) => {
		let priceVolume = 0;
		let volume = 0;
		for (const c of candles.slice(Math.max(0, i - period + 1), i + 1)) {
			priceVolume += typicalPrice(c) * c.volume;
			volume += c.volume;
		}

		// a window with no traded volume has no weighting to apply
		return volume > 0 ? priceVolume / volume : typicalPrice(candle);
	});
}
