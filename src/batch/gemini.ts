import { GoogleGenAI } from "@google/genai";
import { z } from "zod";
import { requireApiKey } from "../config/loader";
import type { Config, GeminiTransport } from "../config/schema";
import type {
	JobResult,
	JobState,
	ParsedOutput,
	PipelineOptions,
	RacePipeline,
	TestItem,
} from "../shared/types";
import {
	type ErrorCode,
	ProviderError,
	messageOf,
	statusOf,
	toProviderError,
} from "../utils/errors";
import { logError, logger } from "../utils/logger";
import {
	createExtractionPrompt,
	decodeContact,
	describeContact,
	type ExtractedContact,
} from "./extraction";
import { pollUntilTerminal } from "./poller";
import { runStrategies, type TransportStrategy } from "./strategies";

const PROVIDER = "Gemini";
export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

export interface GeminiInlineRequest {
	contents: { role: "user"; parts: { text: string }[] }[];
	config: { temperature: number; responseMimeType: "application/json" };
}

/**
 * Maps both the REST (`BATCH_STATE_*`) and SDK (`JOB_STATE_*`) spellings.
 */
export const geminiStateOf = (state: string | undefined): JobState => {
	const bare = (state ?? "").replace(/^(BATCH|JOB)_STATE_/, "");
	switch (bare) {
		case "SUCCEEDED":
			return "succeeded";
		case "FAILED":
			return "failed";
		case "CANCELLED":
			return "cancelled";
		case "EXPIRED":
			return "expired";
		case "RUNNING":
		case "CANCELLING":
		case "PAUSED":
		case "UPDATING":
			return "running";
		default:
			// PENDING, QUEUED, UNSPECIFIED
			return "pending";
	}
};

const InlinedResponseSchema = z.object({
	response: z
		.object({
			candidates: z
				.array(
					z.object({
						content: z.object({
							parts: z.array(z.object({ text: z.string().optional() })),
						}),
					}),
				)
				.min(1),
		})
		.optional(),
	error: z
		.object({ message: z.string().optional() })
		.passthrough()
		.optional(),
	metadata: z.object({ key: z.string().optional() }).passthrough().optional(),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Inlined responses arrive either as a bare list or wrapped as `{ inlinedResponses: [...] }`.
 */
const unwrapResponses = (value: unknown): unknown[] | undefined => {
	if (Array.isArray(value)) return value;
	if (isRecord(value)) return unwrapResponses(value.inlinedResponses);
	return undefined;
};

/**
 * Parses inlined responses. Each one is matched to its item through
 * `metadata.key` when present, otherwise by position in `items`.
 */
export const parseGeminiResponses = (
	responses: readonly unknown[],
	items: readonly TestItem[],
): ParsedOutput<ExtractedContact> => {
	const knownIds = new Set(items.map((item) => item.id));
	const results = new Map<string, ExtractedContact>();
	let skipped = 0;

	responses.forEach((raw, index) => {
		try {
			const entry = InlinedResponseSchema.parse(raw);
			const id = entry.metadata?.key ?? items[index]?.id;
			if (!id || !knownIds.has(id)) {
				throw new Error(`no input item for response ${index}`);
			}
			if (entry.error) {
				throw new Error(entry.error.message ?? "request failed");
			}
			const candidate = entry.response?.candidates[0];
			if (!candidate) throw new Error("no candidates");
			const text = candidate.content.parts.map((part) => part.text ?? "").join("");
			if (results.has(id)) throw new Error(`duplicate id ${id}`);
			results.set(id, decodeContact(text));
		} catch (error) {
			skipped++;
			logger.warn(
				{ provider: PROVIDER, index, reason: messageOf(error) },
				"Skipping malformed batch output record",
			);
		}
	});

	return { results, skipped };
};

const RestOperationSchema = z.object({ name: z.string() }).passthrough();

const RestBatchSchema = z
	.object({
		metadata: z
			.object({
				state: z.string().optional(),
				output: z.unknown().optional(),
			})
			.passthrough()
			.optional(),
		response: z.unknown().optional(),
	})
	.passthrough();

type RestBatch = z.infer<typeof RestBatchSchema>;

const SdkBatchSchema = z
	.object({
		name: z.string(),
		state: z.string().optional(),
		dest: z
			.object({ inlinedResponses: z.unknown().optional() })
			.passthrough()
			.optional(),
	})
	.passthrough();

type SdkBatch = z.infer<typeof SdkBatchSchema>;

export class GeminiBatchPipeline implements RacePipeline<ExtractedContact> {
	readonly provider = PROVIDER;
	readonly label: string;
	readonly costPerUnit: number;

	private apiKey: string;
	private model: string;
	private transports: GeminiTransport[];
	private pollIntervalMs: number;
	private progressEvery: number;
	private options: PipelineOptions;

	constructor(config: Config, options: PipelineOptions = {}) {
		this.apiKey = requireApiKey(config, "gemini");
		this.model = config.batch.gemini.model;
		this.transports = config.batch.gemini.transports;
		this.costPerUnit = config.batch.gemini.costPer1M;
		this.label = `Gemini Batch (${this.model})`;
		this.pollIntervalMs = config.batch.pollIntervalSeconds * 1000;
		this.progressEvery = config.batch.progressEvery;
		this.options = options;
	}

	buildInlineRequest(item: TestItem): GeminiInlineRequest {
		return {
			contents: [
				{ role: "user", parts: [{ text: createExtractionPrompt(item.text) }] },
			],
			config: { temperature: 0.1, responseMimeType: "application/json" },
		};
	}

	private displayName(): string {
		const now = this.options.now ?? Date.now;
		return `entity-extraction-${Math.floor(now() / 1000)}`;
	}

	private modelPath(): string {
		return this.model.startsWith("models/") ? this.model : `models/${this.model}`;
	}

	private poll<S>(
		jobId: string,
		fetchStatus: () => Promise<S>,
		stateOf: (status: S) => JobState,
	): Promise<S> {
		return pollUntilTerminal({
			provider: PROVIDER,
			jobId,
			fetchStatus,
			stateOf,
			intervalMs: this.pollIntervalMs,
			progressEvery: this.progressEvery,
			progress: this.options.progress,
			sleep: this.options.sleep,
			now: this.options.now,
		});
	}

	private async restCall(
		url: string,
		init: RequestInit = {},
		notFound: ErrorCode = "HTTP_ERROR",
	): Promise<unknown> {
		const response = await fetch(url, {
			...init,
			headers: {
				"x-goog-api-key": this.apiKey,
				"Content-Type": "application/json",
			},
		});
		if (!response.ok) {
			const body = await response.text();
			throw toProviderError(
				PROVIDER,
				{ status: response.status, message: `HTTP ${response.status}: ${body}` },
				response.status === 404 ? notFound : "HTTP_ERROR",
			);
		}
		return response.json();
	}

	/**
	 * Lists models over REST as a cheap authenticated call, for the health check.
	 */
	async checkConnection(): Promise<boolean> {
		try {
			await this.restCall(`${GEMINI_API_BASE}/models?pageSize=1`);
			return true;
		} catch (error) {
			const failure = toProviderError(PROVIDER, error);
			logError("Gemini connectivity check failed", failure, {
				operation: "checkConnection",
			});
			throw failure;
		}
	}

	/**
	 * Submits through `models/{model}:batchGenerateContent` and polls `GET /{name}`.
	 */
	async runRest(items: readonly TestItem[]): Promise<JobResult<ExtractedContact>> {
		const progress = this.options.progress;
		progress?.("Creating batch job (REST)...");
		const requests = items.map((item) => {
			const { contents, config } = this.buildInlineRequest(item);
			return {
				request: { contents, generationConfig: config },
				metadata: { key: item.id },
			};
		});

		let name: string;
		try {
			const operation = RestOperationSchema.parse(
				await this.restCall(
					`${GEMINI_API_BASE}/${this.modelPath()}:batchGenerateContent`,
					{
						method: "POST",
						body: JSON.stringify({
							batch: {
								displayName: this.displayName(),
								inputConfig: { requests: { requests } },
							},
						}),
					},
				),
			);
			name = operation.name;
		} catch (error) {
			throw toProviderError(PROVIDER, error, "SUBMIT_FAILED");
		}
		logger.info({ provider: PROVIDER, transport: "rest", name }, "Batch job created");
		progress?.(`Batch name: ${name}`);
		progress?.("Waiting for completion...");

		const batch = await this.poll<RestBatch>(
			name,
			async () => {
				try {
					return RestBatchSchema.parse(
						await this.restCall(`${GEMINI_API_BASE}/${name}`, {}, "JOB_NOT_FOUND"),
					);
				} catch (error) {
					throw toProviderError(PROVIDER, error);
				}
			},
			(status) => geminiStateOf(status.metadata?.state),
		);

		progress?.("Retrieving results...");
		const responses =
			unwrapResponses(batch.response) ??
			unwrapResponses(batch.metadata?.output);
		return this.collect(name, responses, items);
	}

	/**
	 * Same job through the @google/genai client library.
	 */
	async runSdk(items: readonly TestItem[]): Promise<JobResult<ExtractedContact>> {
		const progress = this.options.progress;
		const client = new GoogleGenAI({ apiKey: this.apiKey });
		progress?.("Creating batch job (client library)...");

		const src = items.map((item) => ({
			...this.buildInlineRequest(item),
			metadata: { key: item.id },
		}));
		let name: string;
		try {
			const job = SdkBatchSchema.parse(
				await client.batches.create({
					model: this.model,
					src,
					config: { displayName: this.displayName() },
				}),
			);
			name = job.name;
		} catch (error) {
			throw toProviderError(PROVIDER, error, "SUBMIT_FAILED");
		}
		logger.info({ provider: PROVIDER, transport: "sdk", name }, "Batch job created");
		progress?.(`Batch name: ${name}`);
		progress?.("Waiting for completion...");

		const job = await this.poll<SdkBatch>(
			name,
			async () => {
				try {
					return SdkBatchSchema.parse(await client.batches.get({ name }));
				} catch (error) {
					if (statusOf(error) === 404) {
						throw new ProviderError(
							PROVIDER,
							"JOB_NOT_FOUND",
							`${PROVIDER}: batch job not found: ${name}`,
						);
					}
					throw toProviderError(PROVIDER, error);
				}
			},
			(status) => geminiStateOf(status.state),
		);

		progress?.("Retrieving results...");
		return this.collect(name, unwrapResponses(job.dest?.inlinedResponses), items);
	}

	private collect(
		name: string,
		responses: unknown[] | undefined,
		items: readonly TestItem[],
	): JobResult<ExtractedContact> {
		if (!responses || responses.length === 0) {
			throw new ProviderError(
				PROVIDER,
				"EMPTY_OUTPUT",
				`${PROVIDER}: batch ${name} succeeded without inline responses`,
			);
		}
		const { results, skipped } = parseGeminiResponses(responses, items);
		this.options.progress?.(
			`Retrieved ${results.size} results${skipped > 0 ? ` (${skipped} skipped)` : ""}`,
		);
		return results;
	}

	private strategyFor(
		transport: GeminiTransport,
		items: readonly TestItem[],
	): TransportStrategy<JobResult<ExtractedContact>> {
		switch (transport) {
			case "rest":
				return { name: "REST API", run: () => this.runRest(items) };
			case "sdk":
				return { name: "client library", run: () => this.runSdk(items) };
		}
	}

	run(items: readonly TestItem[]): Promise<JobResult<ExtractedContact>> {
		return runStrategies(
			PROVIDER,
			this.transports.map((transport) => this.strategyFor(transport, items)),
			this.options.progress,
		);
	}

	describe(result: ExtractedContact): string {
		return describeContact(result);
	}
}
