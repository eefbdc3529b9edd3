import { statSync } from "node:fs";
import { Command } from "commander";
import * as colors from "yoctocolors";
import { GeminiBatchPipeline } from "../batch/gemini";
import { OpenAIBatchPipeline } from "../batch/openai";
import {
	DEFAULT_CONFIG_FILE,
	apiKeyIssues,
	envVarFor,
	loadConfig,
	resolvePath,
} from "../config/loader";
import { type Config, PROVIDERS, type Provider } from "../config/schema";
import { CartesiaSynthesizer } from "../tts/cartesia";
import { DeepgramSynthesizer } from "../tts/deepgram";
import { actionFor } from "../utils/error-templates";
import { messageOf, toProviderError } from "../utils/errors";

interface ConnectionCheck {
	checkConnection(): Promise<boolean>;
}

const NAMES: Record<Provider, string> = {
	openai: "OpenAI",
	gemini: "Gemini",
	cartesia: "Cartesia",
	deepgram: "Deepgram",
};

const clientFor = (config: Config, provider: Provider): ConnectionCheck => {
	switch (provider) {
		case "openai":
			return new OpenAIBatchPipeline(config);
		case "gemini":
			return new GeminiBatchPipeline(config);
		case "cartesia":
			return new CartesiaSynthesizer(config);
		case "deepgram":
			return new DeepgramSynthesizer(config);
	}
};

/**
 * Prints the health report and returns the exit code: 1 when any check failed.
 */
export async function runHealthCheck(configPath: string): Promise<number> {
	console.log(`\n${colors.bold(colors.cyan("🔍 batch-race Health Check"))}`);
	console.log(`${colors.cyan("==========================")}\n`);

	let allOk = true;
	let config: Config | undefined;

	// 1. Configuration
	console.log(colors.bold("--- Configuration ---"));
	const resolved = resolvePath(configPath);
	try {
		config = loadConfig(resolved);
		console.log(`${colors.green("✅")} Config loaded (${colors.dim(resolved)})`);
		try {
			const mode = statSync(resolved).mode & 0o777;
			if (mode === 0o600) {
				console.log(`${colors.green("✅")} Config file permissions are 600`);
			} else {
				console.log(
					`${colors.yellow("⚠️  Config file permissions are")} ${colors.bold(mode.toString(8))} ${colors.yellow("(recommended: 600)")}`,
				);
			}
		} catch (_e) {
			console.log(`${colors.blue("ℹ️")}  No config file, using defaults and environment`);
		}
	} catch (e) {
		console.log(`${colors.red("❌")} Config Error:`, colors.red(messageOf(e)));
		allOk = false;
	}

	if (!config) {
		console.log(`\n${colors.bold(colors.red("❌ Health check failed."))}\n`);
		return 1;
	}

	// 2. API keys
	console.log(`\n${colors.bold("--- API Keys ---")}`);
	for (const provider of PROVIDERS) {
		const issues = apiKeyIssues(config, provider);
		if (issues.length > 0) {
			console.log(
				`${colors.red("❌")} ${envVarFor(provider)} is malformed:`,
				colors.red(issues.join("; ")),
			);
			allOk = false;
		} else if (config.apiKeys[provider]) {
			console.log(`${colors.green("✅")} ${envVarFor(provider)} is set`);
		} else {
			console.log(`${colors.red("❌")} ${envVarFor(provider)} is not set`);
			allOk = false;
		}
	}

	// 3. Connectivity
	console.log(`\n${colors.bold("--- API Connectivity ---")}`);
	for (const provider of PROVIDERS) {
		const name = NAMES[provider];
		if (!config.apiKeys[provider]) {
			console.log(`${colors.dim("⏭️")}  ${name} API: skipped (no key)`);
			continue;
		}
		if (apiKeyIssues(config, provider).length > 0) {
			console.log(`${colors.dim("⏭️")}  ${name} API: skipped (malformed key)`);
			continue;
		}
		try {
			const connected = await clientFor(config, provider).checkConnection();
			if (connected) {
				console.log(`${colors.green("✅")} ${name} API: ${colors.green("Connected")}`);
			} else {
				console.log(`${colors.yellow("⚠️")}  ${name} API: connected but returned no data`);
			}
		} catch (e) {
			const failure = toProviderError(name, e);
			console.log(`${colors.red("❌")} ${name} API Error:`, colors.red(failure.message));
			const action = actionFor(failure, envVarFor(provider));
			if (action) console.log(colors.dim(`   ${action}`));
			allOk = false;
		}
	}

	console.log(`\n${colors.cyan("--------------------------")}`);
	if (allOk) {
		console.log(`${colors.bold(colors.green("✅ Health check passed!"))}`);
	} else {
		console.log(
			`${colors.bold(colors.red("❌ Health check failed. Please check the issues above."))}`,
		);
	}
	console.log(`${colors.cyan("--------------------------")}\n`);
	return allOk ? 0 : 1;
}

export const healthCommand = new Command("health")
	.description("Check configuration, API keys and vendor connectivity")
	.option("-c, --config <path>", "Path to the config file", DEFAULT_CONFIG_FILE)
	.action(async (options: { config: string }) => {
		process.exitCode = await runHealthCheck(options.config);
	});
