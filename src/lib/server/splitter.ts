import { rm } from 'fs/promises';
import { join } from 'path';
import { SplitError, errorMessage } from '$lib/errors';
import type { AudioChunk } from '$lib/types';
import { formatTime } from '$lib/utils/audio';
import type { MediaToolkit } from './ffmpeg';

export interface ChunkBoundary {
	chunkIndex: number;
	startTime: number;
	duration: number;
}

/**
 * Splits `[0, totalDuration)` into the fewest equal pieces no longer than
 * `targetDuration`. Each piece starts where the previous one ended and the last piece
 * absorbs whatever floating point drift is left.
 */
export function planChunkBoundaries(totalDuration: number, targetDuration: number): ChunkBoundary[] {
	if (!(totalDuration > 0) || !(targetDuration > 0)) {
		throw new SplitError(`Cannot split ${totalDuration}s of audio into ${targetDuration}s chunks`);
	}

	const count = Math.max(1, Math.ceil(totalDuration / targetDuration));
	const chunkDuration = totalDuration / count;
	const boundaries: ChunkBoundary[] = [];
	let startTime = 0;

	for (let chunkIndex = 0; chunkIndex < count; chunkIndex++) {
		const duration = chunkIndex === count - 1 ? totalDuration - startTime : chunkDuration;
		boundaries.push({ chunkIndex, startTime, duration });
		startTime += duration;
	}

	return boundaries;
}

export function chunkFileName(chunkIndex: number): string {
	return `chunk_${chunkIndex.toString().padStart(4, '0')}.flac`;
}

/**
 * Cuts `inputPath` into sequential chunk files under `outputDir`. Either every chunk is
 * written or none is left behind.
 */
export async function splitAudio(
	inputPath: string,
	totalDuration: number,
	targetDuration: number,
	outputDir: string,
	media: Pick<MediaToolkit, 'extract'>,
	signal?: AbortSignal
): Promise<AudioChunk[]> {
	const chunks: AudioChunk[] = [];
	const written: string[] = [];

	try {
		for (const boundary of planChunkBoundaries(totalDuration, targetDuration)) {
			const sourcePath = join(outputDir, chunkFileName(boundary.chunkIndex));
			written.push(sourcePath);
			await media.extract(inputPath, sourcePath, boundary.startTime, boundary.duration, signal);
			chunks.push({ sourcePath, ...boundary });
			console.log(
				`[split] Created chunk ${boundary.chunkIndex}: ${formatTime(boundary.startTime)} - ${formatTime(boundary.startTime + boundary.duration)}`
			);
		}
	} catch (error) {
		await Promise.all(written.map((path) => rm(path, { force: true })));
		if (error instanceof SplitError) throw error;
		throw new SplitError(`Failed to split ${inputPath} after ${chunks.length} chunk(s): ${errorMessage(error)}`, error);
	}

	return chunks;
}
