import { describe, expect, it } from "vitest";
import { logStreams } from "../../src/utils/logger";

describe("logger streams", () => {
	it("should write every level to the log file", () => {
		expect(logStreams[0]?.level).toBe("trace");
	});

	it("should keep logged errors off stderr", () => {
		expect(logStreams.map((entry) => entry.level)).toEqual(["trace", "fatal"]);
	});
});
