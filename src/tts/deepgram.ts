import { createClient, type DeepgramClient } from "@deepgram/sdk";
import { requireApiKey } from "../config/loader";
import type { Config } from "../config/schema";
import type {
	JobResult,
	PipelineOptions,
	RacePipeline,
	TestItem,
} from "../shared/types";
import { ProviderError, toProviderError } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { describeStats, type SynthesisStats, synthesizeAll } from "./audio";

const PROVIDER = "Deepgram";

export class DeepgramSynthesizer implements RacePipeline<SynthesisStats> {
	readonly provider = PROVIDER;
	readonly label: string;
	readonly costPerUnit: number;

	private client: DeepgramClient;
	private model: string;
	private sampleRate: number;
	private options: PipelineOptions;

	constructor(config: Config, options: PipelineOptions = {}) {
		this.client = createClient(requireApiKey(config, "deepgram"));
		this.model = config.tts.deepgram.model;
		this.sampleRate = config.tts.deepgram.sampleRate;
		this.costPerUnit = config.tts.deepgram.costPer1K;
		this.label = `Deepgram Aura (${this.model})`;
		this.options = options;
	}

	/**
	 * Checks connectivity to the Deepgram API by fetching projects.
	 */
	public async checkConnection(): Promise<boolean> {
		try {
			const { result, error } = await this.client.manage.getProjects();
			if (error) throw error;
			return !!result?.projects;
		} catch (error) {
			const failure = toProviderError(PROVIDER, error);
			logError("Deepgram connectivity check failed", failure, {
				operation: "checkConnection",
			});
			throw failure;
		}
	}

	public async synthesize(text: string): Promise<ReadableStream<Uint8Array>> {
		let stream: ReadableStream<Uint8Array> | null;
		try {
			const response = await this.client.speak.request(
				{ text },
				{
					model: this.model,
					encoding: "linear16",
					container: "none",
					sample_rate: this.sampleRate,
				},
			);
			stream = await response.getStream();
		} catch (error) {
			throw toProviderError(PROVIDER, error, "HTTP_ERROR");
		}

		if (!stream) {
			throw new ProviderError(PROVIDER, "NO_AUDIO", `${PROVIDER}: empty audio stream`);
		}
		return stream;
	}

	public async run(items: readonly TestItem[]): Promise<JobResult<SynthesisStats>> {
		logger.info({ provider: PROVIDER, model: this.model }, "Starting synthesis");
		this.options.progress?.(
			`Synthesizing ${items.length} phrases (model ${this.model})...`,
		);
		return synthesizeAll(PROVIDER, items, (text) => this.synthesize(text));
	}

	public describe(result: SynthesisStats): string {
		return describeStats(result);
	}
}
