import type { ProgressReporter } from "../shared/types";
import { type ErrorCode, ProviderError, toProviderError } from "../utils/errors";
import { logError } from "../utils/logger";

export interface TransportStrategy<T> {
	readonly name: string;
	run(): Promise<T>;
}

// The job already ran to a terminal state; trying another transport would submit it twice.
const FINAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
	"JOB_FAILED",
	"EMPTY_OUTPUT",
]);

/**
 * Tries each transport in order and returns the first result.
 * Every failure is normalized to a ProviderError and logged before moving on.
 * @throws {ProviderError} ALL_STRATEGIES_FAILED listing each transport's cause
 */
export async function runStrategies<T>(
	provider: string,
	strategies: readonly TransportStrategy<T>[],
	progress?: ProgressReporter,
): Promise<T> {
	const failures: { transport: string; code: ErrorCode; message: string }[] =
		[];

	for (const [index, strategy] of strategies.entries()) {
		try {
			return await strategy.run();
		} catch (error) {
			const failure = toProviderError(provider, error);
			if (FINAL_CODES.has(failure.code)) throw failure;

			failures.push({
				transport: strategy.name,
				code: failure.code,
				message: failure.message,
			});
			logError(`${provider} ${strategy.name} transport failed`, failure, {
				provider,
				transport: strategy.name,
				code: failure.code,
			});

			const next = strategies[index + 1];
			if (next) {
				progress?.(
					`${strategy.name} transport failed (${failure.message}), trying ${next.name}...`,
				);
			}
		}
	}

	const summary =
		failures.length > 0
			? failures.map((f) => `${f.transport}: ${f.message}`).join("; ")
			: "no transports configured";
	throw new ProviderError(
		provider,
		"ALL_STRATEGIES_FAILED",
		`${provider}: all transports failed (${summary})`,
		{ failures },
	);
}
