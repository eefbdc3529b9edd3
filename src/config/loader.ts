import { existsSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import {
	API_KEY_FORMATS,
	type Config,
	ConfigSchema,
	PROVIDERS,
	type Provider,
} from "./schema";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "batch-race");
export const DEFAULT_CONFIG_FILE = join(DEFAULT_CONFIG_DIR, "config.json");

const ENV_KEYS: Record<Provider, string> = {
	openai: "OPENAI_API_KEY",
	gemini: "GOOGLE_AI_API_KEY",
	cartesia: "CARTESIA_API_KEY",
	deepgram: "DEEPGRAM_API_KEY",
};

/**
 * Resolves the path with ~ expansion.
 */
export const resolvePath = (path: string): string => {
	if (path.startsWith("~")) {
		return join(homedir(), path.slice(1));
	}
	return resolve(path);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

// Empty strings count as unset, matching `export FOO=` in a shell profile.
const envValue = (name: string): string | undefined => {
	const value = process.env[name]?.trim();
	return value ? value : undefined;
};

/**
 * Loads and validates the configuration.
 * Config file values win over environment variables; a missing file is not an error.
 * @throws {AppError} if the file is not valid JSON or validation fails
 */
export const loadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
): Config => {
	configPath = resolvePath(configPath);
	let fileConfig: Record<string, unknown> = {};

	if (existsSync(configPath)) {
		const mode = statSync(configPath).mode & 0o777;
		if (mode & 0o077) {
			console.warn(
				`WARNING: Config file permissions are ${mode.toString(8)}. ` +
					`It is recommended to set them to 600 (chmod 600 ${configPath}).`,
			);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(configPath, "utf-8"));
		} catch (_error) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED(configPath)),
			);
		}
		if (!isRecord(parsed)) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED(configPath)),
			);
		}
		fileConfig = parsed;
	}

	const fileKeys = isRecord(fileConfig.apiKeys) ? fileConfig.apiKeys : {};
	const apiKeys: Record<string, unknown> = {};
	for (const provider of PROVIDERS) {
		apiKeys[provider] = fileKeys[provider] ?? envValue(ENV_KEYS[provider]);
	}

	const result = ConfigSchema.safeParse({ ...fileConfig, apiKeys });

	if (!result.success) {
		const errorMessages = result.error.issues.map(
			(e) => `${e.path.join(".")}: ${e.message}`,
		);
		throw validationError(errorMessages);
	}

	return result.data;
};

const validationError = (issues: string[]): AppError =>
	new AppError(
		"VALIDATION_FAILED",
		`Config validation failed:\n${issues.join("\n")}\n\nAction: ${ErrorTemplates.CONFIG.VALIDATION_FAILED.action}`,
	);

/**
 * Format problems of one configured key; empty when it is absent or well formed.
 */
export const apiKeyIssues = (config: Config, provider: Provider): string[] => {
	const key = config.apiKeys[provider];
	if (!key) return [];
	const result = API_KEY_FORMATS[provider].safeParse(key);
	return result.success ? [] : result.error.issues.map((e) => e.message);
};

/**
 * Checks that every key the command needs is present and well formed before
 * any network call. Keys of other vendors are not looked at.
 * @throws {AppError} MISSING_API_KEY naming every absent variable, or
 * VALIDATION_FAILED for a malformed key
 */
export const assertApiKeys = (
	config: Config,
	providers: readonly Provider[],
): void => {
	const missing = providers
		.filter((provider) => !config.apiKeys[provider])
		.map((provider) => ENV_KEYS[provider]);

	if (missing.length > 0) {
		throw new AppError(
			"MISSING_API_KEY",
			formatUserError(ErrorTemplates.CONFIG.MISSING_API_KEY(missing)),
			{ missing },
		);
	}

	const issues = providers.flatMap((provider) =>
		apiKeyIssues(config, provider).map((issue) => `apiKeys.${provider}: ${issue}`),
	);
	if (issues.length > 0) throw validationError(issues);
};

export const requireApiKey = (config: Config, provider: Provider): string => {
	assertApiKeys(config, [provider]);
	return config.apiKeys[provider] ?? "";
};

export const envVarFor = (provider: Provider): string => ENV_KEYS[provider];
