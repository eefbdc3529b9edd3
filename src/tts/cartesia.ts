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

const PROVIDER = "Cartesia";
export const CARTESIA_API_BASE = "https://api.cartesia.ai";

export interface CartesiaRequest {
	model_id: string;
	transcript: string;
	voice: {
		mode: "id";
		id: string;
		__experimental_controls: { speed: number; emotion: string[] };
	};
	language: string;
	output_format: {
		container: "raw";
		encoding: "pcm_s16le";
		sample_rate: number;
	};
}

type CartesiaSettings = Config["tts"]["cartesia"];

export class CartesiaSynthesizer implements RacePipeline<SynthesisStats> {
	readonly provider = PROVIDER;
	readonly label: string;
	readonly costPerUnit: number;

	private apiKey: string;
	private settings: CartesiaSettings;
	private options: PipelineOptions;

	constructor(config: Config, options: PipelineOptions = {}) {
		this.apiKey = requireApiKey(config, "cartesia");
		this.settings = config.tts.cartesia;
		this.costPerUnit = this.settings.costPer1K;
		this.label = `Cartesia (${this.settings.model})`;
		this.options = options;
	}

	private headers(): Record<string, string> {
		return {
			"X-API-Key": this.apiKey,
			"Cartesia-Version": this.settings.version,
			"Content-Type": "application/json",
		};
	}

	buildRequest(text: string): CartesiaRequest {
		return {
			model_id: this.settings.model,
			transcript: text,
			voice: {
				mode: "id",
				id: this.settings.voiceId,
				__experimental_controls: {
					speed: this.settings.speed,
					emotion: this.settings.emotions,
				},
			},
			language: this.settings.language,
			output_format: {
				container: "raw",
				encoding: "pcm_s16le",
				sample_rate: this.settings.sampleRate,
			},
		};
	}

	async synthesize(text: string): Promise<ReadableStream<Uint8Array>> {
		let response: Response;
		try {
			response = await fetch(`${CARTESIA_API_BASE}/tts/bytes`, {
				method: "POST",
				headers: this.headers(),
				body: JSON.stringify(this.buildRequest(text)),
			});
		} catch (error) {
			throw toProviderError(PROVIDER, error, "HTTP_ERROR");
		}

		if (!response.ok) {
			const body = await response.text();
			throw toProviderError(
				PROVIDER,
				{ status: response.status, message: `HTTP ${response.status}: ${body}` },
				"HTTP_ERROR",
			);
		}
		if (!response.body) {
			throw new ProviderError(PROVIDER, "NO_AUDIO", `${PROVIDER}: empty response body`);
		}
		return response.body;
	}

	/**
	 * Lists voices as a cheap authenticated call.
	 */
	async checkConnection(): Promise<boolean> {
		let failure: ProviderError;
		try {
			const response = await fetch(`${CARTESIA_API_BASE}/voices`, {
				headers: this.headers(),
			});
			if (response.ok) return true;
			failure = toProviderError(
				PROVIDER,
				{ status: response.status, message: `HTTP ${response.status}` },
				"HTTP_ERROR",
			);
		} catch (error) {
			failure = toProviderError(PROVIDER, error, "HTTP_ERROR");
		}
		logError("Cartesia connectivity check failed", failure, {
			operation: "checkConnection",
		});
		throw failure;
	}

	async run(items: readonly TestItem[]): Promise<JobResult<SynthesisStats>> {
		const { model, voiceId, language, speed } = this.settings;
		logger.info({ provider: PROVIDER, model, voiceId, language, speed }, "Starting synthesis");
		this.options.progress?.(
			`Synthesizing ${items.length} phrases (model ${model}, language ${language}, speed ${speed})...`,
		);
		return synthesizeAll(PROVIDER, items, (text) => this.synthesize(text));
	}

	describe(result: SynthesisStats): string {
		return describeStats(result);
	}
}
