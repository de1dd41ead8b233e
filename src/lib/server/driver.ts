import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ChunkTranscriptionError, errorMessage, isAbortError } from '$lib/errors';
import type { AudioChunk, ChunkFragments, ChunkStatus, TranscriptGap, Transcriber } from '$lib/types';
import { formatTime } from '$lib/utils/audio';
import { mimeTypeForPath } from '$lib/utils/mime';
import type { RateLimiter } from './rate-limiter';

const rawFragmentSchema = z
	.object({
		start: z.number().finite().nonnegative(),
		end: z.number().finite().nonnegative(),
		text: z.string()
	})
	.refine((fragment) => fragment.end >= fragment.start, { message: 'Fragment ends before it starts' });

const transcriptionResultSchema = z.object({
	fragments: z.array(rawFragmentSchema)
});

export interface DriverOptions {
	transcriber: Transcriber;
	limiter: RateLimiter;
	signal?: AbortSignal;
	/** Record failed chunks as gaps instead of aborting the whole transcript. */
	allowPartial?: boolean;
	readChunk?: (filePath: string) => Promise<Uint8Array>;
}

export interface DriverResult {
	chunks: ChunkFragments[];
	gaps: TranscriptGap[];
	statuses: ChunkStatus[];
}

/**
 * Transcribes chunks one after another, in `chunkIndex` order, waiting on the shared
 * limiter before every call. By default the first failing chunk aborts the rest.
 */
export async function transcribeChunks(chunks: AudioChunk[], options: DriverOptions): Promise<DriverResult> {
	const {
		transcriber,
		limiter,
		signal,
		allowPartial = false,
		readChunk = (filePath: string) => readFile(filePath)
	} = options;
	const ordered = [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);
	const statuses: ChunkStatus[] = ordered.map(() => 'pending');
	const accumulated: ChunkFragments[] = [];
	const gaps: TranscriptGap[] = [];
	let firstFailure: unknown;

	for (const [position, chunk] of ordered.entries()) {
		const range = `${formatTime(chunk.startTime)} - ${formatTime(chunk.startTime + chunk.duration)}`;

		try {
			signal?.throwIfAborted();
			const audio = await readChunk(chunk.sourcePath);
			await limiter.acquire(signal);
			signal?.throwIfAborted();

			statuses[position] = 'calling';
			console.log(`[driver] Transcribing chunk ${chunk.chunkIndex + 1}/${ordered.length} (${range})`);
			const response = await transcriber.transcribe(audio, {
				wantTimestamps: true,
				mimeType: mimeTypeForPath(chunk.sourcePath),
				signal
			});
			const { fragments } = transcriptionResultSchema.parse(response);

			statuses[position] = 'succeeded';
			accumulated.push({ chunkIndex: chunk.chunkIndex, startTime: chunk.startTime, fragments });
			console.log(`[driver] Chunk ${chunk.chunkIndex} returned ${fragments.length} fragment(s)`);
		} catch (error) {
			statuses[position] = 'failed';
			if (isAbortError(error) || signal?.aborted) throw error;

			console.error(`[driver] Chunk ${chunk.chunkIndex} (${range}) failed:`, errorMessage(error));
			if (!allowPartial) throw new ChunkTranscriptionError(chunk.chunkIndex, error);

			firstFailure ??= new ChunkTranscriptionError(chunk.chunkIndex, error);
			gaps.push({
				chunkIndex: chunk.chunkIndex,
				start: chunk.startTime,
				end: chunk.startTime + chunk.duration,
				reason: errorMessage(error)
			});
		}
	}

	if (accumulated.length === 0 && firstFailure) {
		throw firstFailure;
	}

	return { chunks: accumulated, gaps, statuses };
}
