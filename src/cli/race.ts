import { Command } from "commander";
import * as colors from "yoctocolors";
import { GeminiBatchPipeline } from "../batch/gemini";
import { OpenAIBatchPipeline } from "../batch/openai";
import { TEST_CALLS } from "../batch/test-calls";
import { DEFAULT_CONFIG_FILE, assertApiKeys, loadConfig } from "../config/loader";
import type { Config } from "../config/schema";
import { runRace } from "../race/driver";
import { exitCodeFor, formatBanner, formatRaceReport } from "../race/report";
import { logger } from "../utils/logger";
import { printLines, progressFor, reportFatal } from "./progress";

/**
 * Runs the batch race and returns the process exit code.
 */
export async function runBatchRace(configPath: string): Promise<number> {
	let config: Config;
	try {
		config = loadConfig(configPath);
		assertApiKeys(config, ["openai", "gemini"]);
	} catch (error) {
		reportFatal(error);
		return 1;
	}

	const reporters = {
		OpenAI: progressFor("OpenAI", colors.blue),
		Gemini: progressFor("Gemini", colors.green),
	};
	const openai = new OpenAIBatchPipeline(config, { progress: reporters.OpenAI });
	const gemini = new GeminiBatchPipeline(config, { progress: reporters.Gemini });

	printLines(
		formatBanner("🏁 BATCH API RACE: OpenAI vs Gemini", [
			`📊 Processing ${TEST_CALLS.length} calls`,
			"⏱️  Both using async Batch APIs",
			`🔁 Polling every ${config.batch.pollIntervalSeconds}s`,
		]),
	);
	printLines([
		"",
		"📚 Batch API Pricing (50% off):",
		...[openai, gemini].map(
			(pipeline) => `   ${pipeline.label}: $${pipeline.costPerUnit}/M tokens`,
		),
	]);
	logger.info(
		{ items: TEST_CALLS.length, openai: openai.label, gemini: gemini.label },
		"Batch race started",
	);

	const summary = await runRace(openai, gemini, TEST_CALLS, {
		progressFor: (provider) =>
			provider === "OpenAI" || provider === "Gemini" ? reporters[provider] : undefined,
	});
	printLines(formatRaceReport(summary, { costUnit: "per 1M tokens" }));
	return exitCodeFor(summary, 1);
}

export const raceCommand = new Command("race")
	.description("Race the OpenAI and Gemini batch APIs on sample call transcripts")
	.option("-c, --config <path>", "Path to the config file", DEFAULT_CONFIG_FILE)
	.action(async (options: { config: string }) => {
		process.exitCode = await runBatchRace(options.config);
	});
