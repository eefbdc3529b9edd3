import type {
	JobResult,
	ProgressReporter,
	RacePipeline,
	TestItem,
} from "../shared/types";
import { messageOf } from "../utils/errors";
import { logError, logger } from "../utils/logger";

export interface ProviderRun<T> {
	provider: string;
	label: string;
	success: boolean;
	elapsedSeconds: number;
	costPerUnit: number;
	results: JobResult<T>;
	/** Up to SAMPLE_LIMIT rendered results, "id: payload". */
	samples: string[];
	error?: string;
}

export const SAMPLE_LIMIT = 2;

export interface SpeedComparison {
	winner: string;
	loser: string;
	/** Seconds between the two finishing times. */
	difference: number;
	/** slower / faster; 1 when the faster run took no time. */
	ratio: number;
}

export type CostComparison =
	| { equal: true; cost: number }
	| { equal: false; cheaper: string; pricier: string; ratio: number };

export interface RaceSummary<A, B> {
	first: ProviderRun<A>;
	second: ProviderRun<B>;
	totalSeconds: number;
	/** Present only when both runs succeeded. */
	speed?: SpeedComparison;
	/** Present only when both runs succeeded. */
	cost?: CostComparison;
}

export interface RaceOptions {
	now?: () => number;
	/** Where each pipeline's completion line goes, by provider name. */
	progressFor?: (provider: string) => ProgressReporter | undefined;
}

export const compareSpeed = (
	a: { provider: string; elapsedSeconds: number },
	b: { provider: string; elapsedSeconds: number },
): SpeedComparison => {
	// Ties go to the first runner.
	const [faster, slower] =
		b.elapsedSeconds < a.elapsedSeconds ? [b, a] : [a, b];
	return {
		winner: faster.provider,
		loser: slower.provider,
		difference: slower.elapsedSeconds - faster.elapsedSeconds,
		ratio:
			faster.elapsedSeconds === 0
				? 1
				: slower.elapsedSeconds / faster.elapsedSeconds,
	};
};

export const compareCost = (
	a: { provider: string; costPerUnit: number },
	b: { provider: string; costPerUnit: number },
): CostComparison => {
	if (a.costPerUnit === b.costPerUnit) {
		return { equal: true, cost: a.costPerUnit };
	}
	const [cheaper, pricier] = a.costPerUnit < b.costPerUnit ? [a, b] : [b, a];
	return {
		equal: false,
		cheaper: cheaper.provider,
		pricier: pricier.provider,
		ratio:
			cheaper.costPerUnit === 0
				? Number.POSITIVE_INFINITY
				: pricier.costPerUnit / cheaper.costPerUnit,
	};
};

async function timedRun<T>(
	pipeline: RacePipeline<T>,
	items: readonly TestItem[],
	now: () => number,
	progress?: ProgressReporter,
): Promise<ProviderRun<T>> {
	const start = now();
	const base = {
		provider: pipeline.provider,
		label: pipeline.label,
		costPerUnit: pipeline.costPerUnit,
	};
	try {
		const results = await pipeline.run(items);
		const elapsedSeconds = (now() - start) / 1000;
		logger.info(
			{ provider: pipeline.provider, elapsedSeconds, results: results.size },
			"Pipeline finished",
		);
		progress?.(`✅ Completed in ${elapsedSeconds.toFixed(2)}s`);
		const samples = [...results]
			.slice(0, SAMPLE_LIMIT)
			.map(([id, result]) => `${id}: ${pipeline.describe(result)}`);
		return { ...base, success: true, elapsedSeconds, results, samples };
	} catch (error) {
		const elapsedSeconds = (now() - start) / 1000;
		progress?.(`❌ Failed: ${messageOf(error)}`);
		logError(`${pipeline.provider} pipeline failed`, error, {
			provider: pipeline.provider,
			elapsedSeconds,
		});
		return {
			...base,
			success: false,
			elapsedSeconds,
			results: new Map(),
			samples: [],
			error: messageOf(error),
		};
	}
}

/**
 * Runs both pipelines concurrently and waits for both. A failing pipeline never
 * rejects the race; its failure is recorded on its ProviderRun instead.
 */
export async function runRace<A, B>(
	first: RacePipeline<A>,
	second: RacePipeline<B>,
	items: readonly TestItem[],
	options: RaceOptions = {},
): Promise<RaceSummary<A, B>> {
	const now = options.now ?? Date.now;
	const start = now();

	const [firstRun, secondRun] = await Promise.all([
		timedRun(first, items, now, options.progressFor?.(first.provider)),
		timedRun(second, items, now, options.progressFor?.(second.provider)),
	]);

	const summary: RaceSummary<A, B> = {
		first: firstRun,
		second: secondRun,
		totalSeconds: (now() - start) / 1000,
	};
	if (firstRun.success && secondRun.success) {
		summary.speed = compareSpeed(firstRun, secondRun);
		summary.cost = compareCost(firstRun, secondRun);
	}
	return summary;
}
