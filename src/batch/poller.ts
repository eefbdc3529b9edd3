import { ErrorTemplates } from "../utils/error-templates";
import { ProviderError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
	isTerminal,
	type JobState,
	type ProgressReporter,
	type Sleep,
	sleep as defaultSleep,
} from "../shared/types";

export interface PollOptions<S> {
	provider: string;
	jobId: string;
	fetchStatus: () => Promise<S>;
	stateOf: (status: S) => JobState;
	intervalMs: number;
	/** Report "still processing" every N polls. */
	progressEvery?: number;
	progress?: ProgressReporter;
	sleep?: Sleep;
	now?: () => number;
}

/**
 * Queries the job at a fixed interval until it reaches a terminal state.
 * There is no backoff, attempt cap or cancellation: a job that never resolves
 * keeps this loop alive until the process exits.
 *
 * Resolves with the last status when the job succeeded; any other terminal
 * state rejects with a JOB_FAILED ProviderError. Once terminal, the job is
 * never queried again.
 */
export async function pollUntilTerminal<S>(options: PollOptions<S>): Promise<S> {
	const {
		provider,
		jobId,
		fetchStatus,
		stateOf,
		intervalMs,
		progressEvery = 3,
		progress,
	} = options;
	const wait = options.sleep ?? defaultSleep;
	const now = options.now ?? Date.now;
	const startedAt = now();
	let polls = 0;

	while (true) {
		const status = await fetchStatus();
		const state = stateOf(status);
		polls++;

		if (isTerminal(state)) {
			logger.info({ provider, jobId, state, polls }, "Batch job reached terminal state");
			if (state === "succeeded") return status;
			throw new ProviderError(
				provider,
				"JOB_FAILED",
				ErrorTemplates.API.JOB_FAILED(provider, state).message,
				{ jobId, state },
			);
		}

		if (polls % progressEvery === 0) {
			const elapsedSeconds = Math.round((now() - startedAt) / 1000);
			logger.debug({ provider, jobId, state, polls, elapsedSeconds }, "Batch job pending");
			progress?.(`Still processing... ${elapsedSeconds}s elapsed (status: ${state})`);
		}

		await wait(intervalMs);
	}
}
