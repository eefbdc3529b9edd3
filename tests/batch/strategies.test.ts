import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

import { runStrategies } from "../../src/batch/strategies";
import { ProviderError } from "../../src/utils/errors";

describe("runStrategies", () => {
	it("should return the first successful result without trying the rest", async () => {
		const second = vi.fn(async () => "second");

		const result = await runStrategies("Gemini", [
			{ name: "one", run: async () => "first" },
			{ name: "two", run: second },
		]);

		expect(result).toBe("first");
		expect(second).not.toHaveBeenCalled();
	});

	it("should move on after a failure and report it", async () => {
		const progress = vi.fn();

		const result = await runStrategies(
			"Gemini",
			[
				{
					name: "one",
					run: async () => {
						throw new Error("timeout");
					},
				},
				{ name: "two", run: async () => 42 },
			],
			progress,
		);

		expect(result).toBe(42);
		expect(progress).toHaveBeenCalledWith("one transport failed (Gemini: timeout), trying two...");
	});

	it("should stop at a terminal job failure", async () => {
		const second = vi.fn(async () => "second");

		await expect(
			runStrategies("Gemini", [
				{
					name: "one",
					run: async () => {
						throw new ProviderError("Gemini", "EMPTY_OUTPUT", "nothing came back");
					},
				},
				{ name: "two", run: second },
			]),
		).rejects.toMatchObject({ code: "EMPTY_OUTPUT", message: "nothing came back" });
		expect(second).not.toHaveBeenCalled();
	});

	it("should say so when no transports are configured", async () => {
		await expect(runStrategies("Gemini", [])).rejects.toMatchObject({
			code: "ALL_STRATEGIES_FAILED",
			message: "Gemini: all transports failed (no transports configured)",
		});
	});
});
