import { createReadStream, rmSync, writeFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";
import OpenAI from "openai";
import { z } from "zod";
import { requireApiKey } from "../config/loader";
import type { Config } from "../config/schema";
import type {
	JobResult,
	JobState,
	ParsedOutput,
	PipelineOptions,
	RacePipeline,
	TestItem,
} from "../shared/types";
import { ProviderError, messageOf, toProviderError } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import {
	createExtractionPrompt,
	decodeContact,
	describeContact,
	type ExtractedContact,
} from "./extraction";
import { pollUntilTerminal } from "./poller";

const PROVIDER = "OpenAI";
const ENDPOINT = "/v1/chat/completions";

export interface OpenAIBatchRequest {
	custom_id: string;
	method: "POST";
	url: typeof ENDPOINT;
	body: {
		model: string;
		messages: { role: "user"; content: string }[];
		temperature: number;
		max_tokens: number;
		response_format: { type: "json_object" };
	};
}

export const openaiStateOf = (status: string): JobState => {
	switch (status) {
		case "validating":
			return "pending";
		case "completed":
			return "succeeded";
		case "failed":
			return "failed";
		case "expired":
			return "expired";
		case "cancelled":
			return "cancelled";
		default:
			// in_progress, finalizing, cancelling
			return "running";
	}
};

const OutputLineSchema = z.object({
	custom_id: z.string(),
	response: z
		.object({
			status_code: z.number(),
			body: z.unknown(),
		})
		.nullable()
		.optional(),
	error: z
		.object({ message: z.string().optional() })
		.passthrough()
		.nullable()
		.optional(),
});

const ChatBodySchema = z.object({
	choices: z
		.array(z.object({ message: z.object({ content: z.string() }) }))
		.min(1),
});

/**
 * Parses the batch output file. One JSON object per line; lines that cannot be
 * decoded, carry an error, or name an id outside `items` are skipped.
 */
export const parseOpenAIOutput = (
	text: string,
	items: readonly TestItem[],
): ParsedOutput<ExtractedContact> => {
	const knownIds = new Set(items.map((item) => item.id));
	const results = new Map<string, ExtractedContact>();
	let skipped = 0;

	const lines = text.split("\n").filter((line) => line.trim() !== "");
	lines.forEach((line, index) => {
		try {
			const record = OutputLineSchema.parse(JSON.parse(line));
			if (record.error) {
				throw new Error(record.error.message ?? "request failed");
			}
			if (!record.response || record.response.status_code !== 200) {
				throw new Error(`status ${record.response?.status_code ?? "missing"}`);
			}
			if (!knownIds.has(record.custom_id)) {
				throw new Error(`unknown custom_id ${record.custom_id}`);
			}
			if (results.has(record.custom_id)) {
				throw new Error(`duplicate custom_id ${record.custom_id}`);
			}
			const body = ChatBodySchema.parse(record.response.body);
			const [choice] = body.choices;
			if (!choice) throw new Error("no choices");
			results.set(record.custom_id, decodeContact(choice.message.content));
		} catch (error) {
			skipped++;
			logger.warn(
				{ provider: PROVIDER, line: index + 1, reason: messageOf(error) },
				"Skipping malformed batch output record",
			);
		}
	});

	return { results, skipped };
};

export class OpenAIBatchPipeline implements RacePipeline<ExtractedContact> {
	readonly provider = PROVIDER;
	readonly label: string;
	readonly costPerUnit: number;

	private client: OpenAI;
	private model: string;
	private pollIntervalMs: number;
	private progressEvery: number;
	private options: PipelineOptions;

	constructor(config: Config, options: PipelineOptions = {}) {
		this.client = new OpenAI({ apiKey: requireApiKey(config, "openai") });
		this.model = config.batch.openai.model;
		this.costPerUnit = config.batch.openai.costPer1M;
		this.label = `OpenAI Batch (${this.model})`;
		this.pollIntervalMs = config.batch.pollIntervalSeconds * 1000;
		this.progressEvery = config.batch.progressEvery;
		this.options = options;
	}

	/**
	 * Lists models as a cheap authenticated call, for the health check.
	 */
	async checkConnection(): Promise<boolean> {
		try {
			const models = await this.client.models.list();
			return models.data.length > 0;
		} catch (error) {
			const failure = toProviderError(PROVIDER, error);
			logError("OpenAI connectivity check failed", failure, {
				operation: "checkConnection",
			});
			throw failure;
		}
	}

	buildRequests(items: readonly TestItem[]): OpenAIBatchRequest[] {
		return items.map((item) => ({
			custom_id: item.id,
			method: "POST",
			url: ENDPOINT,
			body: {
				model: this.model,
				messages: [{ role: "user", content: createExtractionPrompt(item.text) }],
				temperature: 0.1,
				max_tokens: 500,
				response_format: { type: "json_object" },
			},
		}));
	}

	/**
	 * Writes the requests as JSONL to a temp file and uploads it with purpose "batch".
	 * The temp file is removed whether or not the upload succeeds.
	 */
	async uploadRequests(requests: OpenAIBatchRequest[]): Promise<string> {
		const tempFile = join(tmpdir(), `batch-race-${randomUUID()}.jsonl`);
		try {
			writeFileSync(
				tempFile,
				requests.map((request) => JSON.stringify(request)).join("\n") + "\n",
			);
			const file = await this.client.files.create({
				file: createReadStream(tempFile),
				purpose: "batch",
			});
			logger.info({ provider: PROVIDER, fileId: file.id, requests: requests.length }, "Batch input uploaded");
			return file.id;
		} catch (error) {
			throw toProviderError(PROVIDER, error, "UPLOAD_FAILED");
		} finally {
			rmSync(tempFile, { force: true });
		}
	}

	async createJob(fileId: string): Promise<string> {
		try {
			const batch = await this.client.batches.create({
				input_file_id: fileId,
				endpoint: ENDPOINT,
				completion_window: "24h",
			});
			logger.info({ provider: PROVIDER, batchId: batch.id, status: batch.status }, "Batch job created");
			return batch.id;
		} catch (error) {
			throw toProviderError(PROVIDER, error, "SUBMIT_FAILED");
		}
	}

	async waitForCompletion(batchId: string): Promise<OpenAI.Batch> {
		return pollUntilTerminal({
			provider: PROVIDER,
			jobId: batchId,
			fetchStatus: async () => {
				try {
					return await this.client.batches.retrieve(batchId);
				} catch (error) {
					throw toProviderError(PROVIDER, error);
				}
			},
			stateOf: (batch) => openaiStateOf(batch.status),
			intervalMs: this.pollIntervalMs,
			progressEvery: this.progressEvery,
			progress: this.options.progress,
			sleep: this.options.sleep,
			now: this.options.now,
		});
	}

	async fetchResults(
		batch: OpenAI.Batch,
		items: readonly TestItem[],
	): Promise<JobResult<ExtractedContact>> {
		if (!batch.output_file_id) {
			throw new ProviderError(
				PROVIDER,
				"EMPTY_OUTPUT",
				`${PROVIDER}: batch ${batch.id} completed without an output file`,
				{ errorFileId: batch.error_file_id },
			);
		}
		let text: string;
		try {
			const response = await this.client.files.content(batch.output_file_id);
			text = await response.text();
		} catch (error) {
			throw toProviderError(PROVIDER, error);
		}

		const { results, skipped } = parseOpenAIOutput(text, items);
		this.options.progress?.(
			`Retrieved ${results.size} results${skipped > 0 ? ` (${skipped} skipped)` : ""}`,
		);
		return results;
	}

	async run(items: readonly TestItem[]): Promise<JobResult<ExtractedContact>> {
		const progress = this.options.progress;
		progress?.("Uploading batch requests...");
		const fileId = await this.uploadRequests(this.buildRequests(items));

		progress?.("Creating batch job...");
		const batchId = await this.createJob(fileId);
		progress?.(`Batch ID: ${batchId}`);

		progress?.("Waiting for completion...");
		const batch = await this.waitForCompletion(batchId);

		progress?.("Retrieving results...");
		return this.fetchResults(batch, items);
	}

	describe(result: ExtractedContact): string {
		return describeContact(result);
	}
}
