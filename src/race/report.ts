import * as colors from "yoctocolors";
import type { ProviderRun, RaceSummary } from "./driver";

const RULE = "=".repeat(70);

export interface ReportOptions {
	/** Volume the cost figures refer to, e.g. "per 1M tokens". */
	costUnit: string;
}

const section = (title: string): string[] => ["", RULE, title, RULE];

export const formatBanner = (title: string, details: string[]): string[] => [
	"",
	RULE,
	colors.bold(title),
	RULE,
	...details,
	RULE,
];

const statusRow = (run: ProviderRun<unknown>): string[] => {
	const status = run.success
		? colors.green("✅ Success".padEnd(12))
		: colors.red("❌ Failed".padEnd(12));
	const time = `${run.elapsedSeconds.toFixed(1).padStart(7)}s`;
	const row = `  ${run.provider.padEnd(10)} ${status} ${time}`;
	return run.error ? [row, colors.dim(`     ${run.error}`)] : [row];
};

const formatRatio = (ratio: number): string =>
	Number.isFinite(ratio) ? `${ratio.toFixed(1)}x` : "infinitely";

/**
 * Renders the comparison as console lines. Timing verdict, cost and samples
 * cover successful runs only; with no success only the status table is left.
 */
export function formatRaceReport<A, B>(
	summary: RaceSummary<A, B>,
	options: ReportOptions,
): string[] {
	const runs: ProviderRun<unknown>[] = [summary.first, summary.second];
	const survivors = runs.filter((run) => run.success);
	const lines: string[] = [...section(colors.bold("📊 RACE RESULTS"))];

	lines.push("", "⏱️  Processing Time:");
	lines.push(`  ${"Provider".padEnd(10)} ${"Status".padEnd(12)} Time`);
	lines.push(`  ${"-".repeat(32)}`);
	for (const run of runs) lines.push(...statusRow(run));

	const { speed, cost } = summary;
	if (speed) {
		lines.push("", `🏆 Winner: ${colors.bold(speed.winner)}`);
		lines.push(`⏱️  Time difference: ${speed.difference.toFixed(1)}s`);
		if (speed.ratio > 1) {
			lines.push(`⚡ ${speed.winner} is ${speed.ratio.toFixed(1)}x faster`);
		}
	}

	if (survivors.length > 0) {
		lines.push(...section(`💰 Cost Comparison (${options.costUnit})`));
		for (const run of survivors) {
			lines.push(`  ${run.label}: $${run.costPerUnit.toFixed(4)}`);
		}
		if (cost) {
			lines.push(
				"",
				cost.equal
					? "→ Same cost"
					: colors.green(`→ ${cost.cheaper} is ${formatRatio(cost.ratio)} cheaper!`),
			);
		}
	}

	for (const run of survivors) {
		if (run.samples.length === 0) continue;
		lines.push(...section(`📝 Sample Results (${run.provider})`));
		for (const sample of run.samples) lines.push(`  ${sample}`);
	}

	lines.push(...section(`⏱️  Total race time: ${summary.totalSeconds.toFixed(1)}s`));
	return lines;
}

/**
 * Race exit status: 0 when at least `required` runs succeeded.
 */
export const exitCodeFor = (
	summary: RaceSummary<unknown, unknown>,
	required: 1 | 2,
): number => {
	const succeeded = [summary.first, summary.second].filter(
		(run) => run.success,
	).length;
	return succeeded >= required ? 0 : 1;
};
