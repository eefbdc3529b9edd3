export interface TestItem {
	readonly id: string;
	readonly text: string;
}

/**
 * Parsed payload per test-item id. Ids are always a subset of the input ids.
 */
export type JobResult<T> = ReadonlyMap<string, T>;

export type JobState =
	| "pending"
	| "running"
	| "succeeded"
	| "failed"
	| "cancelled"
	| "expired";

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>([
	"succeeded",
	"failed",
	"cancelled",
	"expired",
]);

export const isTerminal = (state: JobState): boolean =>
	TERMINAL_STATES.has(state);

/**
 * One vendor side of a race. Each instance is run once per race.
 */
export interface RacePipeline<T> {
	readonly provider: string;
	/** Shown in the cost table, e.g. "OpenAI Batch (gpt-4o-mini)". */
	readonly label: string;
	readonly costPerUnit: number;
	run(items: readonly TestItem[]): Promise<JobResult<T>>;
	describe(result: T): string;
}

export type ProgressReporter = (message: string) => void;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
	new Promise((resolve) => setTimeout(resolve, ms));

export interface PipelineOptions {
	progress?: ProgressReporter;
	sleep?: Sleep;
	now?: () => number;
}

/**
 * Output of a result parser: the parsed payloads plus how many records were dropped.
 */
export interface ParsedOutput<T> {
	results: Map<string, T>;
	skipped: number;
}
