import { DAY_MS, HOUR_MS, parseTimeOfDay, utcDayStart } from "../utils/time";
import { InvalidConfigurationError } from "../utils/errors";

export const SESSION_LENGTH_HOURS = 21;

export type SessionWindow = {
	start: Date;
	end: Date;
};

function sessionStartOn(dayStart: number, sessionStart: string): number {
	const time = parseTimeOfDay(sessionStart);
	if (!time) {
		throw new InvalidConfigurationError([
			`sessionStart must be HH:MM, got "${sessionStart}"`,
		]);
	}
	return (
		dayStart +
		time.hours * HOUR_MS +
		time.minutes * 60_000 +
		time.seconds * 1000
	);
}

/**
 * Returns the session containing `now`, if any. A session that opened
 * yesterday may still be running today, so both candidates are checked as
 * absolute [start, end) intervals.
 */
export function sessionWindowAt(
	now: Date,
	sessionStart: string,
): SessionWindow | null {
	const today = utcDayStart(now.getTime());
	const instant = now.getTime();

	for (const dayStart of [today, today - DAY_MS]) {
		const start = sessionStartOn(dayStart, sessionStart);
		const end = start + SESSION_LENGTH_HOURS * HOUR_MS;
		if (instant >= start && instant < end) {
			return { start: new Date(start), end: new Date(end) };
		}
	}

	return null;
}

export function isWithinSession(now: Date, sessionStart: string): boolean {
	return sessionWindowAt(now, sessionStart) !== null;
}
