import { existsSync, readFileSync } from "node:fs";
import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
	filesCreate: vi.fn(),
	filesContent: vi.fn(),
	batchesCreate: vi.fn(),
	batchesRetrieve: vi.fn(),
	modelsList: vi.fn(),
	warn: vi.fn(),
}));

vi.mock("openai", () => ({
	default: class MockOpenAI {
		files = { create: mocks.filesCreate, content: mocks.filesContent };
		batches = { create: mocks.batchesCreate, retrieve: mocks.batchesRetrieve };
		models = { list: mocks.modelsList };
	},
}));

vi.mock("node:fs", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs")>();
	return {
		...actual,
		createReadStream: vi.fn((path: string) => ({ path })),
	};
});

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: mocks.warn, error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

import {
	OpenAIBatchPipeline,
	openaiStateOf,
	parseOpenAIOutput,
} from "../../src/batch/openai";
import { ConfigSchema } from "../../src/config/schema";
import type { TestItem } from "../../src/shared/types";

const ITEMS: TestItem[] = [
	{ id: "call-1", text: "Customer: John Doe, john@example.com, 555-1234" },
	{ id: "call-2", text: "Customer: Jane Smith, jane@test.com, 555-5678" },
];

const JOHN = { customer_name: "John Doe", email: "john@example.com", phone: "555-1234" };
const JANE = { customer_name: "Jane Smith", email: "jane@test.com", phone: "555-5678" };

const outputLine = (id: string, contact: object): string =>
	JSON.stringify({
		custom_id: id,
		response: {
			status_code: 200,
			body: { choices: [{ message: { content: JSON.stringify(contact) } }] },
		},
		error: null,
	});

const config = ConfigSchema.parse({
	apiKeys: { openai: "sk-test-secret" },
	batch: { pollIntervalSeconds: 1 },
});

describe("openaiStateOf", () => {
	it("should normalize batch statuses", () => {
		expect(openaiStateOf("validating")).toBe("pending");
		expect(openaiStateOf("in_progress")).toBe("running");
		expect(openaiStateOf("finalizing")).toBe("running");
		expect(openaiStateOf("completed")).toBe("succeeded");
		expect(openaiStateOf("failed")).toBe("failed");
		expect(openaiStateOf("expired")).toBe("expired");
		expect(openaiStateOf("cancelled")).toBe("cancelled");
	});
});

describe("parseOpenAIOutput", () => {
	beforeEach(() => {
		mocks.warn.mockClear();
	});

	it("should map every valid line by custom_id", () => {
		const text = `${outputLine("call-2", JANE)}\n${outputLine("call-1", JOHN)}\n`;

		const { results, skipped } = parseOpenAIOutput(text, ITEMS);

		expect(skipped).toBe(0);
		expect(results.get("call-1")).toEqual(JOHN);
		expect(results.get("call-2")).toEqual(JANE);
	});

	it("should skip a malformed line and keep the rest", () => {
		const text = [outputLine("call-1", JOHN), "{not json", outputLine("call-2", JANE)].join("\n");

		const { results, skipped } = parseOpenAIOutput(text, ITEMS);

		expect(skipped).toBe(1);
		expect([...results.keys()]).toEqual(["call-1", "call-2"]);
		expect(mocks.warn).toHaveBeenCalledTimes(1);
		expect(mocks.warn.mock.calls[0]?.[0]).toMatchObject({ provider: "OpenAI", line: 2 });
	});

	it("should skip error records, failed responses and undecodable content", () => {
		const text = [
			JSON.stringify({ custom_id: "call-1", response: null, error: { message: "boom" } }),
			JSON.stringify({ custom_id: "call-2", response: { status_code: 500, body: {} } }),
			JSON.stringify({
				custom_id: "call-2",
				response: {
					status_code: 200,
					body: { choices: [{ message: { content: "not a contact" } }] },
				},
			}),
		].join("\n");

		const { results, skipped } = parseOpenAIOutput(text, ITEMS);

		expect(results.size).toBe(0);
		expect(skipped).toBe(3);
	});

	it("should never return ids outside the input list", () => {
		const text = [outputLine("call-9", JOHN), outputLine("call-1", JOHN), outputLine("call-1", JANE)].join("\n");

		const { results, skipped } = parseOpenAIOutput(text, ITEMS);

		expect([...results.keys()]).toEqual(["call-1"]);
		expect(results.get("call-1")).toEqual(JOHN);
		expect(skipped).toBe(2);
	});
});

describe("OpenAIBatchPipeline", () => {
	let uploadedPath: string | undefined;
	let uploadedText: string | undefined;

	beforeEach(() => {
		vi.clearAllMocks();
		uploadedPath = undefined;
		uploadedText = undefined;

		mocks.filesCreate.mockImplementation(async (args: { file: { path: string } }) => {
			uploadedPath = args.file.path;
			uploadedText = readFileSync(args.file.path, "utf-8");
			return { id: "file-123" };
		});
		mocks.batchesCreate.mockResolvedValue({ id: "batch_123", status: "validating" });
		mocks.batchesRetrieve.mockResolvedValue({
			id: "batch_123",
			status: "completed",
			output_file_id: "file-out",
			error_file_id: null,
		});
		mocks.filesContent.mockResolvedValue({
			text: async () => `${outputLine("call-1", JOHN)}\n${outputLine("call-2", JANE)}\n`,
		});
		mocks.modelsList.mockResolvedValue({ data: [{ id: "gpt-4o-mini" }] });
	});

	it("should describe itself from config", () => {
		const pipeline = new OpenAIBatchPipeline(config);
		expect(pipeline.provider).toBe("OpenAI");
		expect(pipeline.label).toBe("OpenAI Batch (gpt-4o-mini)");
		expect(pipeline.costPerUnit).toBe(0.075);
	});

	it("should build chat completion requests", () => {
		const [request] = new OpenAIBatchPipeline(config).buildRequests(ITEMS);

		expect(request).toMatchObject({
			custom_id: "call-1",
			method: "POST",
			url: "/v1/chat/completions",
			body: {
				model: "gpt-4o-mini",
				temperature: 0.1,
				max_tokens: 500,
				response_format: { type: "json_object" },
			},
		});
		expect(request?.body.messages[0]?.content).toContain(
			"Transcript: Customer: John Doe, john@example.com, 555-1234",
		);
	});

	it("should upload, submit, poll and parse", async () => {
		const progress = vi.fn();
		const pipeline = new OpenAIBatchPipeline(config, { progress, sleep: vi.fn(async () => {}) });

		const results = await pipeline.run(ITEMS);

		expect(results.get("call-1")).toEqual(JOHN);
		expect(results.get("call-2")).toEqual(JANE);
		expect(uploadedText?.trim().split("\n")).toHaveLength(2);
		expect(mocks.filesCreate.mock.calls[0]?.[0]).toMatchObject({ purpose: "batch" });
		expect(mocks.batchesCreate).toHaveBeenCalledWith({
			input_file_id: "file-123",
			endpoint: "/v1/chat/completions",
			completion_window: "24h",
		});
		expect(mocks.filesContent).toHaveBeenCalledWith("file-out");
		expect(progress.mock.calls.map(([message]) => message)).toEqual([
			"Uploading batch requests...",
			"Creating batch job...",
			"Batch ID: batch_123",
			"Waiting for completion...",
			"Retrieving results...",
			"Retrieved 2 results",
		]);
	});

	it("should remove the temp file after a successful upload", async () => {
		await new OpenAIBatchPipeline(config).uploadRequests(
			new OpenAIBatchPipeline(config).buildRequests(ITEMS),
		);

		expect(uploadedPath).toBeDefined();
		expect(existsSync(uploadedPath ?? "")).toBe(false);
	});

	it("should remove the temp file when the upload fails", async () => {
		mocks.filesCreate.mockImplementation(async (args: { file: { path: string } }) => {
			uploadedPath = args.file.path;
			throw new Error("network down");
		});

		const pipeline = new OpenAIBatchPipeline(config);
		await expect(pipeline.run(ITEMS)).rejects.toMatchObject({
			code: "UPLOAD_FAILED",
			message: "OpenAI: network down",
		});
		expect(uploadedPath).toBeDefined();
		expect(existsSync(uploadedPath ?? "")).toBe(false);
		expect(mocks.batchesCreate).not.toHaveBeenCalled();
	});

	it("should map a rejected key on submit to INVALID_API_KEY", async () => {
		mocks.batchesCreate.mockRejectedValue(
			Object.assign(new Error("Incorrect API key provided"), { status: 401 }),
		);

		await expect(new OpenAIBatchPipeline(config).run(ITEMS)).rejects.toMatchObject({
			code: "INVALID_API_KEY",
		});
	});

	it("should fail with JOB_FAILED when the batch expires", async () => {
		mocks.batchesRetrieve.mockResolvedValue({ id: "batch_123", status: "expired" });

		await expect(new OpenAIBatchPipeline(config).run(ITEMS)).rejects.toMatchObject({
			code: "JOB_FAILED",
			message: "OpenAI batch job ended with status: expired.",
		});
		expect(mocks.filesContent).not.toHaveBeenCalled();
	});

	it("should fail with EMPTY_OUTPUT when no output file was produced", async () => {
		mocks.batchesRetrieve.mockResolvedValue({
			id: "batch_123",
			status: "completed",
			output_file_id: null,
			error_file_id: "file-err",
		});

		await expect(new OpenAIBatchPipeline(config).run(ITEMS)).rejects.toMatchObject({
			code: "EMPTY_OUTPUT",
		});
	});

	it("should poll until the batch completes", async () => {
		mocks.batchesRetrieve
			.mockResolvedValueOnce({ id: "batch_123", status: "validating" })
			.mockResolvedValueOnce({ id: "batch_123", status: "in_progress" });
		const sleep = vi.fn(async () => {});

		await new OpenAIBatchPipeline(config, { sleep }).run(ITEMS);

		expect(mocks.batchesRetrieve).toHaveBeenCalledTimes(3);
		expect(sleep).toHaveBeenCalledTimes(2);
		expect(sleep).toHaveBeenCalledWith(1000);
	});

	it("should check connectivity by listing models", async () => {
		await expect(new OpenAIBatchPipeline(config).checkConnection()).resolves.toBe(true);

		mocks.modelsList.mockRejectedValue({ status: 401, message: "bad key" });
		await expect(new OpenAIBatchPipeline(config).checkConnection()).rejects.toMatchObject({
			code: "INVALID_API_KEY",
		});
	});
});
