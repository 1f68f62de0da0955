import type { BotSettings } from "../types";
import { InvalidConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { readJson, replaceJson } from "../utils/storage";
import { parseTimeOfDay } from "../utils/time";
import { isKlineInterval } from "../utils/timeframes";

export const DEFAULT_SETTINGS: BotSettings = {
	symbol: "ETHUSDT",
	timeframe: "1m",
	sessionStart: "08:00",
	stopLossAmount: 25,
	trailingStep: 10,
	tradeQuantity: 1,
	priceBuffer: 0.5,
	running: false,
};

export type SettingsPatch = Record<string, unknown>;

/** Read side consumed by the trading loop. */
export interface SettingsSource {
	load(): Promise<BotSettings>;
}

const SYMBOL_PATTERN = /^[A-Z0-9]{2,20}$/;

function numberField(
	raw: unknown,
	name: string,
	issues: string[],
	allowZero = false,
): number {
	const value =
		typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		issues.push(`${name} must be numeric`);
		return Number.NaN;
	}
	if (value < 0 || (!allowZero && value === 0)) {
		issues.push(`${name} must be ${allowZero ? "zero or more" : "positive"}`);
	}
	return value;
}

function booleanField(raw: unknown, issues: string[]): boolean {
	if (typeof raw === "boolean") return raw;
	if (raw === "true" || raw === "false") return raw === "true";
	issues.push("running must be a boolean");
	return false;
}

/**
 * Normalises a record coming from disk or from the admin surface. Symbols are
 * upper-cased and numeric strings accepted, the way the old settings form
 * posted them.
 */
export function parseSettings(raw: SettingsPatch): BotSettings {
	const issues: string[] = [];

	const symbol =
		typeof raw.symbol === "string" ? raw.symbol.trim().toUpperCase() : "";
	if (!SYMBOL_PATTERN.test(symbol)) {
		issues.push("symbol must be 2-20 letters or digits");
	}

	const timeframe = typeof raw.timeframe === "string" ? raw.timeframe : "";
	if (!isKlineInterval(timeframe)) {
		issues.push(`timeframe "${timeframe}" is not a supported interval`);
	}

	const sessionStart =
		typeof raw.sessionStart === "string" ? raw.sessionStart.trim() : "";
	if (!parseTimeOfDay(sessionStart)) {
		issues.push("sessionStart must use HH:MM (24-hour)");
	}

	const settings: BotSettings = {
		symbol,
		timeframe,
		sessionStart,
		stopLossAmount: numberField(raw.stopLossAmount, "stopLossAmount", issues),
		trailingStep: numberField(raw.trailingStep, "trailingStep", issues),
		tradeQuantity: numberField(raw.tradeQuantity, "tradeQuantity", issues),
		priceBuffer: numberField(raw.priceBuffer, "priceBuffer", issues, true),
		running: booleanField(raw.running, issues),
	};

	if (issues.length) throw new InvalidConfigurationError(issues);
	return settings;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SettingsStore implements SettingsSource {
	constructor(private readonly filePath: string) {}

	async load(): Promise<BotSettings> {
		const stored = await readJson(this.filePath);
		if (stored === undefined) return { ...DEFAULT_SETTINGS };
		if (!isRecord(stored)) {
			throw new InvalidConfigurationError([
				`${this.filePath} does not hold a settings object`,
			]);
		}
		return parseSettings({ ...DEFAULT_SETTINGS, ...stored });
	}

	/**
	 * Validates the merged record before writing. An invalid patch throws
	 * InvalidConfigurationError and the stored record stays as it was.
	 */
	async update(patch: SettingsPatch): Promise<BotSettings> {
		const current = await this.load();
		// the run flag only changes through setRunning
		const next = parseSettings({
			...current,
			...patch,
			running: current.running,
		});
		await replaceJson(this.filePath, next);
		logger.info({ settings: next }, "Settings updated");
		return next;
	}

	async setRunning(
		running: boolean,
	): Promise<{ settings: BotSettings; changed: boolean }> {
		const current = await this.load();
		if (current.running === running) {
			return { settings: current, changed: false };
		}
		const next = { ...current, running };
		await replaceJson(this.filePath, next);
		logger.info({ running }, running ? "Bot started" : "Bot stopped");
		return { settings: next, changed: true };
	}
}
