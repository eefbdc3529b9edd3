import { Command } from "commander";
import * as colors from "yoctocolors";
import { DEFAULT_CONFIG_FILE, assertApiKeys, loadConfig } from "../config/loader";
import type { Config } from "../config/schema";
import { runRace } from "../race/driver";
import { exitCodeFor, formatBanner, formatRaceReport } from "../race/report";
import { CartesiaSynthesizer } from "../tts/cartesia";
import { DeepgramSynthesizer } from "../tts/deepgram";
import { TTS_PHRASES } from "../tts/phrases";
import { logger } from "../utils/logger";
import { printLines, progressFor, reportFatal } from "./progress";

/**
 * Runs the speech synthesis race. Succeeds only when both vendors produced audio.
 */
export async function runTtsRace(configPath: string): Promise<number> {
	let config: Config;
	try {
		config = loadConfig(configPath);
		assertApiKeys(config, ["cartesia", "deepgram"]);
	} catch (error) {
		reportFatal(error);
		return 1;
	}

	const reporters = {
		Cartesia: progressFor("Cartesia", colors.magenta),
		Deepgram: progressFor("Deepgram", colors.cyan),
	};
	const cartesia = new CartesiaSynthesizer(config, { progress: reporters.Cartesia });
	const deepgram = new DeepgramSynthesizer(config, { progress: reporters.Deepgram });

	printLines(
		formatBanner("🔊 TTS RACE: Cartesia vs Deepgram", [
			`📊 Synthesizing ${TTS_PHRASES.length} German phrases`,
		]),
	);
	logger.info(
		{ items: TTS_PHRASES.length, cartesia: cartesia.label, deepgram: deepgram.label },
		"TTS race started",
	);

	const summary = await runRace(cartesia, deepgram, TTS_PHRASES, {
		progressFor: (provider) =>
			provider === "Cartesia" || provider === "Deepgram" ? reporters[provider] : undefined,
	});
	printLines(formatRaceReport(summary, { costUnit: "per 1K characters" }));

	const code = exitCodeFor(summary, 2);
	console.log(
		code === 0
			? colors.bold(colors.green("✅ All synthesis tests passed"))
			: colors.bold(colors.red("❌ Some synthesis tests failed")),
	);
	return code;
}

export const ttsCommand = new Command("tts")
	.description("Compare Cartesia and Deepgram speech synthesis on German phrases")
	.option("-c, --config <path>", "Path to the config file", DEFAULT_CONFIG_FILE)
	.action(async (options: { config: string }) => {
		process.exitCode = await runTtsRace(options.config);
	});
