import { beforeEach, describe, expect, it } from "vitest";
import { FakeExchange } from "../testing/fakeExchange";
import type { BotSettings, Position } from "../types";
import {
	manageProtectiveStop,
	NO_POSITION,
	phaseForStop,
	type ProtectiveStopContext,
	type ProtectiveStopState,
	releaseProtectiveStop,
	type StopEvent,
} from "./protectiveStop";
import { DEFAULT_SETTINGS } from "./settingsStore";

const settings: BotSettings = {
	...DEFAULT_SETTINGS,
	symbol: "ETHUSDT",
	stopLossAmount: 25,
	trailingStep: 10,
	priceBuffer: 0.5,
	running: true,
};

const long: Position = { side: "LONG", entryPrice: 100, quantity: 1 };
const short: Position = { side: "SHORT", entryPrice: 200, quantity: 3 };

describe("manageProtectiveStop", () => {
	let exchange: FakeExchange;
	let events: StopEvent[];
	let ctx: ProtectiveStopContext;

	beforeEach(() => {
		exchange = new FakeExchange();
		events = [];
		ctx = { exchange, settings, onEvent: (event) => events.push(event) };
	});

	async function step(
		state: ProtectiveStopState,
		markPrice: number,
		position: Position = long,
	): Promise<ProtectiveStopState> {
		exchange.position = position;
		return manageProtectiveStop(ctx, state, {
			position,
			markPrice,
			openOrders: exchange.orders.map((o) => ({ ...o })),
		});
	}

	function stopOf(state: ProtectiveStopState): number | undefined {
		return state.phase === "no_position" ? undefined : state.stopPrice;
	}

	it("places the initial stop below a long entry with the buffer beneath it", async () => {
		const state = await step(NO_POSITION, 100);

		expect(exchange.callsOf("placeConditionalStop").map((c) => c.request)).toEqual([
			{
				symbol: "ETHUSDT",
				side: "SELL",
				triggerPrice: 75,
				limitPrice: 74.5,
				quantity: 1,
				reduceOnly: true,
			},
		]);
		expect(state).toEqual({
			phase: "initial_stop_set",
			positionSide: "LONG",
			entryPrice: 100,
			stopPrice: 75,
			orderId: "1",
		});
	});

	it("moves to break-even, then trails one step from the current stop", async () => {
		let state = await step(NO_POSITION, 100);

		state = await step(state, 136);
		expect(state.phase).toBe("break_even_set");
		expect(stopOf(state)).toBe(100);

		state = await step(state, 147);
		expect(state.phase).toBe("trailing");
		expect(stopOf(state)).toBe(110);

		expect(exchange.orders).toHaveLength(1);
		expect(exchange.orders[0]).toMatchObject({
			side: "SELL",
			triggerPrice: 110,
			limitPrice: 109.5,
			reduceOnly: true,
		});
		expect(exchange.callsOf("cancelOrder").map((c) => c.orderId)).toEqual([
			"1",
			"2",
		]);
	});

	it("mirrors the levels for a short position", async () => {
		let state = await step(NO_POSITION, 200, short);
		expect(exchange.orders[0]).toMatchObject({
			side: "BUY",
			triggerPrice: 225,
			limitPrice: 225.5,
			quantity: 3,
		});

		state = await step(state, 164, short);
		expect(stopOf(state)).toBe(200);
		expect(exchange.orders[0].limitPrice).toBe(200.5);

		state = await step(state, 150, short);
		expect(stopOf(state)).toBe(190);
	});

	it("applies break-even only once while profit oscillates", async () => {
		let state = await step(NO_POSITION, 100);
		for (const mark of [136, 120, 136, 110, 136]) {
			state = await step(state, mark);
		}

		expect(events.filter((e) => e.type === "break_even")).toHaveLength(1);
		expect(
			exchange.callsOf("placeConditionalStop").filter(
				(c) => c.request.triggerPrice === 100,
			),
		).toHaveLength(1);
	});

	it("never lets a long stop retreat", async () => {
		let state = await step(NO_POSITION, 100);
		const stops: Array<number | undefined> = [];
		for (const mark of [136, 147, 147, 147, 140, 160, 150, 175]) {
			state = await step(state, mark);
			stops.push(stopOf(state));
		}

		expect(stops).toEqual([100, 110, 120, 120, 120, 130, 130, 140]);
	});

	it("keeps the current stop when the cancel fails", async () => {
		const initial = await step(NO_POSITION, 100);
		exchange.failNext("cancelOrder");

		const state = await step(initial, 136);

		expect(state).toEqual(initial);
		expect(exchange.orders.map((o) => o.triggerPrice)).toEqual([75]);
	});

	it("records a missing stop when the place fails after a cancel, then restores it", async () => {
		const initial = await step(NO_POSITION, 100);
		exchange.failNext("placeConditionalStop");

		let state = await step(initial, 136);
		expect(state).toEqual({ ...initial, orderId: null });
		expect(exchange.orders).toEqual([]);

		state = await step(state, 136);
		expect(state.phase).toBe("initial_stop_set");
		expect(exchange.orders.map((o) => o.triggerPrice)).toEqual([75]);
		expect(events.map((e) => e.type)).toEqual(["initial_placed", "repaired"]);

		state = await step(state, 136);
		expect(state.phase).toBe("break_even_set");
	});

	it("re-places a stop that disappeared from the exchange", async () => {
		let state = await step(NO_POSITION, 100);
		state = await step(state, 136);
		exchange.orders = [];

		state = await step(state, 120);

		expect(state).toMatchObject({ phase: "break_even_set", stopPrice: 100 });
		expect(exchange.orders.map((o) => o.triggerPrice)).toEqual([100]);
	});

	it("stays without a stop when the initial placement fails", async () => {
		exchange.failNext("placeConditionalStop");

		const state = await step(NO_POSITION, 100);

		expect(state).toEqual(NO_POSITION);
		expect(exchange.orders).toEqual([]);
	});

	it("adopts a live stop after a restart instead of re-applying break-even", async () => {
		exchange.addOrder({
			side: "SELL",
			kind: "STOP",
			triggerPrice: 110,
			limitPrice: 109.5,
			quantity: 1,
			reduceOnly: true,
		});

		let state = await step(NO_POSITION, 120);
		expect(state).toEqual({
			phase: "trailing",
			positionSide: "LONG",
			entryPrice: 100,
			stopPrice: 110,
			orderId: "1",
		});
		expect(exchange.mutatingCalls()).toEqual([]);

		state = await step(state, 147);
		expect(stopOf(state)).toBe(120);
	});

	it("ignores resting entry orders when re-deriving", async () => {
		exchange.addOrder({
			side: "SELL",
			kind: "STOP",
			triggerPrice: 95,
			limitPrice: 94.5,
			quantity: 1,
			reduceOnly: false,
		});

		const state = await step(NO_POSITION, 100);

		expect(state).toMatchObject({ phase: "initial_stop_set", stopPrice: 75 });
	});

	it("replaces a stop left over from a closed position instead of adopting it", async () => {
		const previous = await step(NO_POSITION, 100);
		exchange.failNext("cancelOrder");
		const released = await releaseProtectiveStop(ctx, previous);
		expect(exchange.orders.map((o) => o.id)).toEqual(["1"]);

		const state = await step(released, 200, {
			side: "LONG",
			entryPrice: 200,
			quantity: 3,
		});

		expect(state).toEqual({
			phase: "initial_stop_set",
			positionSide: "LONG",
			entryPrice: 200,
			stopPrice: 175,
			orderId: "2",
		});
		expect(exchange.orders).toEqual([
			{
				id: "2",
				side: "SELL",
				kind: "STOP",
				triggerPrice: 175,
				limitPrice: 174.5,
				quantity: 3,
				reduceOnly: true,
			},
		]);
		expect(exchange.callsOf("cancelOrder").map((c) => c.orderId)).toEqual([
			"1",
			"1",
		]);
	});

	it("does not adopt a stop looser than the initial stop", async () => {
		exchange.addOrder({
			side: "SELL",
			kind: "STOP",
			triggerPrice: 75,
			limitPrice: 74.5,
			quantity: 1,
			reduceOnly: true,
		});

		const state = await step(NO_POSITION, 200, {
			side: "LONG",
			entryPrice: 200,
			quantity: 1,
		});

		expect(state).toMatchObject({ phase: "initial_stop_set", stopPrice: 175 });
		expect(exchange.orders.map((o) => o.triggerPrice)).toEqual([175]);
	});

	it("starts over when a different position replaces the tracked one", async () => {
		const tracked = await step(NO_POSITION, 100);

		const state = await step(tracked, 200, short);

		expect(state).toMatchObject({
			phase: "initial_stop_set",
			positionSide: "SHORT",
			stopPrice: 225,
		});
		expect(exchange.orders.map((o) => o.side)).toEqual(["BUY"]);
	});
});

describe("phaseForStop", () => {
	it("derives the phase from the stop level relative to entry", () => {
		expect(phaseForStop("LONG", 100, 75)).toBe("initial_stop_set");
		expect(phaseForStop("LONG", 100, 100)).toBe("break_even_set");
		expect(phaseForStop("LONG", 100, 110)).toBe("trailing");
		expect(phaseForStop("SHORT", 200, 225)).toBe("initial_stop_set");
		expect(phaseForStop("SHORT", 200, 190)).toBe("trailing");
	});
});

describe("releaseProtectiveStop", () => {
	it("cancels the lingering stop and forgets it", async () => {
		const exchange = new FakeExchange();
		const order = exchange.addOrder({
			side: "SELL",
			kind: "STOP",
			triggerPrice: 75,
			limitPrice: 74.5,
			quantity: 1,
			reduceOnly: true,
		});
		const events: StopEvent[] = [];

		const state = await releaseProtectiveStop(
			{ exchange, settings, onEvent: (e) => events.push(e) },
			{
				phase: "initial_stop_set",
				positionSide: "LONG",
				entryPrice: 100,
				stopPrice: 75,
				orderId: order.id,
			},
		);

		expect(state).toEqual(NO_POSITION);
		expect(exchange.orders).toEqual([]);
		expect(events).toEqual([{ type: "released", orderId: order.id }]);
	});

	it("clears the reference even when the cancel fails", async () => {
		const exchange = new FakeExchange();
		exchange.failNext("cancelOrder");

		const state = await releaseProtectiveStop(
			{ exchange, settings },
			{
				phase: "trailing",
				positionSide: "LONG",
				entryPrice: 100,
				stopPrice: 110,
				orderId: "7",
			},
		);

		expect(state).toEqual(NO_POSITION);
	});
});
