import { z } from "zod";

export const PROVIDERS = ["openai", "gemini", "cartesia", "deepgram"] as const;
export type Provider = (typeof PROVIDERS)[number];

export const GEMINI_TRANSPORTS = ["rest", "sdk"] as const;
export type GeminiTransport = (typeof GEMINI_TRANSPORTS)[number];

const defaultTransports: GeminiTransport[] = ["rest", "sdk"];

const defaultBatch = {
	pollIntervalSeconds: 10,
	progressEvery: 3,
	openai: {
		model: "gpt-4o-mini",
		costPer1M: 0.075,
	},
	gemini: {
		model: "gemini-2.5-flash",
		costPer1M: 0.0375,
		transports: defaultTransports,
	},
};

const defaultTts = {
	cartesia: {
		model: "sonic-3-2025-10-27",
		voiceId: "b9de4a89-2257-424b-94c2-db18ba68c81a",
		language: "de",
		speed: 0.2,
		emotions: ["positivity:highest", "curiosity:highest"],
		version: "2024-11-13",
		sampleRate: 24000,
		costPer1K: 0.038,
	},
	deepgram: {
		model: "aura-2-arcas-en",
		sampleRate: 24000,
		costPer1K: 0.03,
	},
};

// Keys are optional and unchecked here: each command checks the ones it calls,
// so a malformed key for another vendor never blocks it.
export const ApiKeysSchema = z.object({
	openai: z.string().optional(),
	gemini: z.string().optional(),
	cartesia: z.string().optional(),
	deepgram: z.string().optional(),
});

export const API_KEY_FORMATS: Record<Provider, z.ZodString> = {
	openai: z
		.string()
		.startsWith("sk-", { message: "OpenAI API key must start with 'sk-'" }),
	gemini: z.string().min(10, { message: "Gemini API key is too short" }),
	cartesia: z.string().min(10, { message: "Cartesia API key is too short" }),
	deepgram: z
		.string()
		.min(32, { message: "Deepgram API key is too short" })
		.max(40, { message: "Deepgram API key is too long" }),
};

export const BatchSchema = z.object({
	pollIntervalSeconds: z
		.number()
		.positive()
		.default(defaultBatch.pollIntervalSeconds),
	progressEvery: z.number().int().min(1).default(defaultBatch.progressEvery),
	openai: z
		.object({
			model: z.string().default(defaultBatch.openai.model),
			costPer1M: z.number().positive().default(defaultBatch.openai.costPer1M),
		})
		.default(defaultBatch.openai),
	gemini: z
		.object({
			model: z.string().default(defaultBatch.gemini.model),
			costPer1M: z.number().positive().default(defaultBatch.gemini.costPer1M),
			transports: z
				.array(z.enum(GEMINI_TRANSPORTS))
				.min(1, { message: "At least one Gemini transport is required" })
				.default(defaultBatch.gemini.transports),
		})
		.default(defaultBatch.gemini),
});

export const TtsSchema = z.object({
	cartesia: z
		.object({
			model: z.string().default(defaultTts.cartesia.model),
			voiceId: z.string().default(defaultTts.cartesia.voiceId),
			language: z.string().default(defaultTts.cartesia.language),
			speed: z.number().min(-1).max(1).default(defaultTts.cartesia.speed),
			emotions: z.array(z.string()).default(defaultTts.cartesia.emotions),
			version: z.string().default(defaultTts.cartesia.version),
			sampleRate: z.number().int().positive().default(defaultTts.cartesia.sampleRate),
			costPer1K: z.number().positive().default(defaultTts.cartesia.costPer1K),
		})
		.default(defaultTts.cartesia),
	deepgram: z
		.object({
			model: z.string().default(defaultTts.deepgram.model),
			sampleRate: z.number().int().positive().default(defaultTts.deepgram.sampleRate),
			costPer1K: z.number().positive().default(defaultTts.deepgram.costPer1K),
		})
		.default(defaultTts.deepgram),
});

export const ConfigSchema = z.object({
	apiKeys: ApiKeysSchema.default({}),
	batch: BatchSchema.default(defaultBatch),
	tts: TtsSchema.default(defaultTts),
});

export type Config = z.infer<typeof ConfigSchema>;
