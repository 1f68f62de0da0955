export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type IndicatorFrame = Candle & {
	vwap: number;
	atr: number;
	basicUpperBand: number;
	basicLowerBand: number;
	finalUpperBand: number;
	finalLowerBand: number;
	/** true while the Supertrend points up */
	uptrend: boolean;
};

export type OrderSide = "BUY" | "SELL";

export type OrderKind = "STOP" | "OTHER";

export type Order = {
	id: string;
	side: OrderSide;
	kind: OrderKind;
	triggerPrice: number;
	limitPrice: number;
	quantity: number;
	reduceOnly: boolean;
};

export type StopOrderRequest = {
	symbol: string;
	side: OrderSide;
	triggerPrice: number;
	limitPrice: number;
	quantity: number;
	reduceOnly: boolean;
};

export type PositionSide = "LONG" | "SHORT";

export type Position = {
	side: PositionSide;
	entryPrice: number;
	quantity: number;
};

export type TradeSignal = "BUY" | "SELL" | "NONE";

export type BotSettings = {
	symbol: string;
	timeframe: string;
	/** UTC time of day the 21 hour session opens, HH:MM or HH:MM:SS */
	sessionStart: string;
	stopLossAmount: number;
	trailingStep: number;
	tradeQuantity: number;
	/** distance between trigger and limit price on every stop order */
	priceBuffer: number;
	running: boolean;
};

export type SymbolMeta = {
	symbol: string;
	pair: string;
	contractType: string;
	quoteAsset: string;
	status: string;
	filters: Array<{ filterType: string; [key: string]: string | number }>;
};
