import { InvalidAudioError } from '../errors';
import type { ProcessingPlan } from '../types';

const MIB = 1024 * 1024;

export const MAX_REQUEST_BYTES = 25 * MIB; // recognition service upload ceiling
export const TARGET_CHUNK_BYTES = 20 * MIB;
export const CHUNK_SAFETY_FACTOR = 0.9;
export const MIN_CHUNK_SECONDS = 60;
export const MAX_CHUNK_SECONDS = 300;

export interface ChunkLimits {
	maxRequestBytes: number;
	targetChunkBytes: number;
}

export const DEFAULT_CHUNK_LIMITS: ChunkLimits = {
	maxRequestBytes: MAX_REQUEST_BYTES,
	targetChunkBytes: TARGET_CHUNK_BYTES
};

export interface AudioMeasurements {
	sizeBytes: number;
	durationSeconds: number;
	/** Size of the re-encoded audio, once it exists. */
	compressedSizeBytes?: number;
}

/**
 * Target chunk length for audio observed at `bytesPerSecond`, kept inside
 * [MIN_CHUNK_SECONDS, MAX_CHUNK_SECONDS] whatever the bitrate.
 */
export function estimateChunkDuration(bytesPerSecond: number, targetChunkBytes: number): number {
	const duration = (targetChunkBytes / bytesPerSecond) * CHUNK_SAFETY_FACTOR;
	return Math.max(MIN_CHUNK_SECONDS, Math.min(duration, MAX_CHUNK_SECONDS));
}

export function planProcessing(
	{ sizeBytes, durationSeconds, compressedSizeBytes }: AudioMeasurements,
	limits: ChunkLimits = DEFAULT_CHUNK_LIMITS
): ProcessingPlan {
	if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
		throw new InvalidAudioError(`Audio has no measurable duration (${durationSeconds}s)`);
	}

	if (sizeBytes <= limits.maxRequestBytes) {
		return { needsCompression: false, needsSplitting: false };
	}

	// Until the compressed file exists, assume compression does not shrink anything.
	const compressedSize = compressedSizeBytes ?? sizeBytes;
	if (compressedSize <= limits.maxRequestBytes) {
		return { needsCompression: true, needsSplitting: false };
	}

	return {
		needsCompression: true,
		needsSplitting: true,
		chunkDurationSeconds: estimateChunkDuration(compressedSize / durationSeconds, limits.targetChunkBytes)
	};
}
