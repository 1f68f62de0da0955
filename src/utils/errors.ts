export class InsufficientDataError extends Error {
	constructor(
		readonly required: number,
		readonly received: number,
	) {
		super(`Need at least ${required} candles, received ${received}`);
		this.name = "InsufficientDataError";
	}
}

export class InvalidConfigurationError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "InvalidConfigurationError";
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (error && typeof error === "object" && "message" in error) {
		return String(error.message);
	}
	return String(error);
}
