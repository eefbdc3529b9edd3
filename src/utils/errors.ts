export type ErrorCode =
	| "MISSING_API_KEY"
	| "VALIDATION_FAILED"
	| "CORRUPTED"
	| "INVALID_API_KEY"
	| "RATE_LIMIT_EXCEEDED"
	| "HTTP_ERROR"
	| "UPLOAD_FAILED"
	| "SUBMIT_FAILED"
	| "JOB_FAILED"
	| "JOB_NOT_FOUND"
	| "EMPTY_OUTPUT"
	| "NO_AUDIO"
	| "ALL_STRATEGIES_FAILED"
	| "UNKNOWN_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.context = context;
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export class ProviderError extends AppError {
	public readonly provider: string;

	constructor(
		provider: string,
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(code, message, { ...context, provider });
		this.provider = provider;
		this.name = "ProviderError";
		Object.setPrototypeOf(this, ProviderError.prototype);
	}
}

/**
 * Reads an HTTP status off an SDK error, or off a "401 Unauthorized" style message.
 */
export const statusOf = (error: unknown): number | undefined => {
	if (typeof error !== "object" || error === null) return undefined;
	if ("status" in error && typeof error.status === "number") {
		return error.status;
	}
	if ("message" in error && typeof error.message === "string") {
		const match = /\b(401|403|404|429)\b/.exec(error.message);
		if (match?.[1]) return Number(match[1]);
	}
	return undefined;
};

export const messageOf = (error: unknown): string => {
	if (error instanceof Error) return error.message;
	if (
		typeof error === "object" &&
		error !== null &&
		"message" in error &&
		typeof error.message === "string"
	) {
		return error.message;
	}
	return String(error ?? "Unknown error");
};

/**
 * Normalizes any failure from a vendor call into a ProviderError.
 * Existing ProviderErrors pass through untouched.
 */
export const toProviderError = (
	provider: string,
	error: unknown,
	fallback: ErrorCode = "UNKNOWN_ERROR",
): ProviderError => {
	if (error instanceof ProviderError) return error;

	const status = statusOf(error);
	const cause = messageOf(error);
	if (status === 401 || status === 403) {
		return new ProviderError(
			provider,
			"INVALID_API_KEY",
			`${provider}: Invalid API Key`,
			{ status, cause },
		);
	}
	if (status === 429) {
		return new ProviderError(
			provider,
			"RATE_LIMIT_EXCEEDED",
			`${provider}: Rate limit exceeded`,
			{ status, cause },
		);
	}
	return new ProviderError(provider, fallback, `${provider}: ${cause}`, {
		status,
		cause,
	});
};
