import fs from "node:fs/promises";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SettingsStore } from "../services/settingsStore";
import { FakeExchange } from "../testing/fakeExchange";
import { createAdminApp } from "./adminServer";

describe("admin API", () => {
	let dir: string;
	let server: Server;
	let baseUrl: string;
	let exchange: FakeExchange;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "bot-admin-"));
		exchange = new FakeExchange();
		const store = new SettingsStore(path.join(dir, "bot-settings.json"));
		const app = createAdminApp({
			store,
			exchange,
			now: () => new Date("2024-03-10T12:00:00Z"),
		});
		server = await new Promise<Server>((resolve) => {
			const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
		});
		const address = server.address();
		if (!address || typeof address === "string") {
			throw new Error("admin server has no TCP address");
		}
		baseUrl = `http://127.0.0.1:${address.port}`;
	});

	afterEach(async () => {
		server.closeAllConnections();
		await new Promise<void>((resolve, reject) =>
			server.close((err) => (err ? reject(err) : resolve())),
		);
		await fs.rm(dir, { recursive: true, force: true });
	});

	function send(method: string, route: string, body?: unknown) {
		return fetch(`${baseUrl}${route}`, {
			method,
			headers: { "content-type": "application/json" },
			body: body === undefined ? undefined : JSON.stringify(body),
		});
	}

	it("serves and updates the settings", async () => {
		const updated = await send("PUT", "/api/settings", {
			symbol: "solusdt",
			trailingStep: "2.5",
		});
		expect(updated.status).toBe(200);

		const current = await (await send("GET", "/api/settings")).json();
		expect(current).toMatchObject({ symbol: "SOLUSDT", trailingStep: 2.5 });
	});

	it("answers invalid settings with the validation issues", async () => {
		const res = await send("PUT", "/api/settings", { sessionStart: "8 o'clock" });

		expect(res.status).toBe(400);
		expect(await res.json()).toMatchObject({
			issues: ["sessionStart must use HH:MM (24-hour)"],
		});
		const current = await (await send("GET", "/api/settings")).json();
		expect(current).toMatchObject({ sessionStart: "08:00" });
	});

	it("rejects a malformed JSON body", async () => {
		const res = await fetch(`${baseUrl}/api/settings`, {
			method: "PUT",
			headers: { "content-type": "application/json" },
			body: "{\"symbol\":",
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ error: "Malformed JSON body" });
	});

	it("starts and stops the bot", async () => {
		const started = await (await send("POST", "/api/bot/start")).json();
		expect(started).toEqual({
			running: true,
			changed: true,
			message: "Bot started.",
		});

		const again = await (await send("POST", "/api/bot/start")).json();
		expect(again).toMatchObject({ message: "Bot is already running." });

		const stopped = await (await send("POST", "/api/bot/stop")).json();
		expect(stopped).toEqual({
			running: false,
			changed: true,
			message: "Bot stopped.",
		});
	});

	it("reports the current session window", async () => {
		const status = await (await send("GET", "/api/status")).json();

		expect(status).toMatchObject({
			running: false,
			inSession: true,
			session: {
				start: "2024-03-10T08:00:00.000Z",
				end: "2024-03-11T05:00:00.000Z",
			},
		});
	});

	it("lists tradable symbols and surfaces exchange errors", async () => {
		const listed = await (await send("GET", "/api/symbols")).json();
		expect(listed).toEqual({ symbols: ["BTCUSDT", "ETHUSDT"] });

		exchange.failNext("listTradableSymbols");
		const failed = await send("GET", "/api/symbols");
		expect(failed.status).toBe(502);
	});

	it("closes the position on request", async () => {
		exchange.position = { side: "LONG", entryPrice: 100, quantity: 1 };

		const res = await (await send("POST", "/api/position/close")).json();

		expect(res).toEqual({ symbol: "ETHUSDT", outcome: "closed" });
		expect(exchange.position).toBeNull();
	});

	it("cancels every open order", async () => {
		exchange.addOrder({
			side: "BUY",
			kind: "STOP",
			triggerPrice: 105,
			limitPrice: 105.5,
			quantity: 1,
			reduceOnly: false,
		});

		const res = await (await send("POST", "/api/orders/cancel-all")).json();

		expect(res).toEqual({ symbol: "ETHUSDT", cancelled: ["1"], failures: [] });
	});
});
