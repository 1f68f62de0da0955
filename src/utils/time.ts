export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export type TimeOfDay = {
	hours: number;
	minutes: number;
	seconds: number;
};

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export function parseTimeOfDay(value: string): TimeOfDay | null {
	const match = TIME_OF_DAY.exec(value.trim());
	if (!match) return null;
	return {
		hours: Number(match[1]),
		minutes: Number(match[2]),
		seconds: match[3] === undefined ? 0 : Number(match[3]),
	};
}

export function utcDayStart(timestamp: number): number {
	const date = new Date(timestamp);
	return Date.UTC(
		date.getUTCFullYear(),
		date.getUTCMonth(),
		date.getUTCDate(),
		0,
		0,
		0,
		0,
	);
}

export async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
