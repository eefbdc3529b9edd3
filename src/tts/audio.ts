import type { JobResult, TestItem } from "../shared/types";
import { ProviderError } from "../utils/errors";
import { logger } from "../utils/logger";

export interface SynthesisStats {
	frames: number;
	bytes: number;
}

/**
 * Drains an audio stream; every non-empty chunk counts as one frame.
 */
export async function countFrames(
	stream: ReadableStream<Uint8Array>,
): Promise<SynthesisStats> {
	const reader = stream.getReader();
	let frames = 0;
	let bytes = 0;
	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			if (value && value.byteLength > 0) {
				frames++;
				bytes += value.byteLength;
			}
		}
	} finally {
		reader.releaseLock();
	}
	return { frames, bytes };
}

/**
 * Synthesizes the items one after another. Any item that fails, or yields no
 * audio, fails the whole pipeline.
 */
export async function synthesizeAll(
	provider: string,
	items: readonly TestItem[],
	synthesize: (text: string) => Promise<ReadableStream<Uint8Array>>,
): Promise<JobResult<SynthesisStats>> {
	const results = new Map<string, SynthesisStats>();
	for (const item of items) {
		const stats = await countFrames(await synthesize(item.text));
		if (stats.frames === 0) {
			throw new ProviderError(
				provider,
				"NO_AUDIO",
				`${provider}: no audio frames were generated for ${item.id}`,
				{ id: item.id },
			);
		}
		logger.debug({ provider, id: item.id, ...stats }, "Synthesis finished");
		results.set(item.id, stats);
	}
	return results;
}

export const describeStats = (stats: SynthesisStats): string =>
	`${stats.frames} audio frames (${stats.bytes} bytes)`;
