import type { SymbolMeta } from "../types";

function filterValue(
	meta: SymbolMeta,
	filterType: string,
	key: string,
): number | undefined {
	const filter = meta.filters.find((f) => f.filterType === filterType);
	const value = filter?.[key];
	if (value === undefined) return undefined;
	const parsed = Number(value);
	return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function decimalsOf(step: number): number {
	return Math.max(0, Math.ceil(-Math.log10(step) - 1e-9));
}

export function applyTickSize(price: number, meta: SymbolMeta): number {
	const tickSize = filterValue(meta, "PRICE_FILTER", "tickSize");
	if (!tickSize) return price;

	const adjusted = Math.round(price / tickSize) * tickSize;
	return Number(adjusted.toFixed(decimalsOf(tickSize)));
}

export function applyStepSize(quantity: number, meta: SymbolMeta): number {
	const step = filterValue(meta, "LOT_SIZE", "stepSize");
	if (!step) return quantity;

	// rounding error can leave 0.3 / 0.1 at 2.9999999999999996
	const adjusted = Math.floor(quantity / step + 1e-9) * step;
	return Number(adjusted.toFixed(decimalsOf(step)));
}
