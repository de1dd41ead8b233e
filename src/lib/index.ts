export * from './errors';
export type * from './types';
export {
	DEFAULT_SEGMENT_DURATION,
	assertSegmentInvariants,
	formatTime,
	mergeIntoSegments,
	offsetFragments,
	parseTimeToSeconds
} from './utils/audio';
export { hashAudio } from './utils/hash';
export { extensionForMimeType, mimeTypeForPath } from './utils/mime';
export {
	DEFAULT_CHUNK_LIMITS,
	MAX_CHUNK_SECONDS,
	MIN_CHUNK_SECONDS,
	estimateChunkDuration,
	planProcessing
} from './utils/plan';
export type { AudioMeasurements, ChunkLimits } from './utils/plan';
export { loadConfig } from './server/config';
export type { AppConfig } from './server/config';
export { transcribeChunks } from './server/driver';
export type { DriverOptions, DriverResult } from './server/driver';
export { ffmpegToolkit, probeAudio, compressAudio } from './server/ffmpeg';
export type { MediaToolkit } from './server/ffmpeg';
export { GeminiTranscriber } from './server/gemini';
export { ingestAudio, ingestOnce } from './server/ingest';
export type { IngestOnceResult, IngestOptions, TranscriptStore } from './server/ingest';
export { SlidingWindowRateLimiter } from './server/rate-limiter';
export type { RateLimiter } from './server/rate-limiter';
export { planChunkBoundaries, splitAudio } from './server/splitter';
