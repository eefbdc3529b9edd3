import * as colors from "yoctocolors";
import type { ProgressReporter } from "../shared/types";
import { messageOf } from "../utils/errors";
import { logError } from "../utils/logger";

/**
 * Console progress lines for one vendor. Both vendors print concurrently, so
 * every line carries the vendor tag.
 */
export const progressFor =
	(provider: string, paint: (text: string) => string): ProgressReporter =>
	(message) => {
		console.log(`  ${paint(`[${provider}]`)} ${message}`);
	};

export const printLines = (lines: readonly string[]): void => {
	for (const line of lines) console.log(line);
};

/**
 * Prints a failure that stops a command before any vendor work starts.
 */
export const reportFatal = (error: unknown): void => {
	logError("Command aborted", error);
	console.error(`${colors.red("❌ Error:")} ${messageOf(error)}`);
};
