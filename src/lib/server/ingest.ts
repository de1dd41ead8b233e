import { stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { dir as tempDir } from 'tmp-promise';
import type { DirectoryResult } from 'tmp-promise';
import {
	CompressionError,
	DeadlineExceededError,
	IngestError,
	InvalidAudioError,
	ProbeError,
	SplitError,
	errorMessage
} from '$lib/errors';
import type { AudioChunk, IngestResult, Segment, Transcriber } from '$lib/types';
import {
	DEFAULT_SEGMENT_DURATION,
	assertSegmentInvariants,
	formatTime,
	mergeIntoSegments,
	offsetFragments
} from '$lib/utils/audio';
import { hashAudio } from '$lib/utils/hash';
import { DEFAULT_CHUNK_LIMITS, planProcessing } from '$lib/utils/plan';
import type { ChunkLimits } from '$lib/utils/plan';
import { transcribeChunks } from './driver';
import { ffmpegToolkit } from './ffmpeg';
import type { MediaToolkit } from './ffmpeg';
import type { RateLimiter } from './rate-limiter';
import { splitAudio } from './splitter';

export interface IngestOptions {
	transcriber: Transcriber;
	/** Shared by every ingestion in the process. */
	limiter: RateLimiter;
	media?: MediaToolkit;
	limits?: ChunkLimits;
	segmentDurationSeconds?: number;
	deadlineMs?: number;
	signal?: AbortSignal;
	allowPartial?: boolean;
	/** Extension of the uploaded file, e.g. `.mp3`. */
	extension?: string;
}

const toMegabytes = (bytes: number) => (bytes / 1024 / 1024).toFixed(2);

async function runPhase<T>(
	signal: AbortSignal,
	wrap: (error: unknown) => IngestError,
	work: () => Promise<T>
): Promise<T> {
	signal.throwIfAborted();
	try {
		return await work();
	} catch (error) {
		if (error instanceof IngestError || signal.aborted) throw error;
		throw wrap(error);
	}
}

/**
 * Turns an uploaded recording into a list of transcript segments.
 *
 * Everything written to disk lives in one temporary directory that is removed before
 * this function settles, whatever the outcome.
 */
export async function ingestAudio(bytes: Uint8Array, options: IngestOptions): Promise<IngestResult> {
	if (bytes.byteLength === 0) {
		throw new InvalidAudioError('Empty audio upload');
	}

	const {
		transcriber,
		limiter,
		media = ffmpegToolkit,
		limits = DEFAULT_CHUNK_LIMITS,
		segmentDurationSeconds = DEFAULT_SEGMENT_DURATION,
		deadlineMs,
		allowPartial = false,
		extension = '.wav'
	} = options;
	const audioId = hashAudio(bytes);
	const tag = `[ingest ${audioId.slice(0, 12)}]`;

	const controller = new AbortController();
	const { signal } = controller;
	const forwardAbort = () => controller.abort(options.signal?.reason);
	if (options.signal?.aborted) forwardAbort();
	options.signal?.addEventListener('abort', forwardAbort, { once: true });
	const deadline =
		deadlineMs === undefined
			? undefined
			: setTimeout(() => {
					controller.abort(new DeadlineExceededError(`Ingestion exceeded its ${deadlineMs}ms deadline`));
				}, deadlineMs);

	let workDir: DirectoryResult | undefined;

	try {
		workDir = await tempDir({ prefix: `audio_processing_${audioId.slice(0, 12)}_`, unsafeCleanup: true });
		const workPath = workDir.path;
		const originalPath = join(workPath, `original${extension}`);

		const info = await runPhase(
			signal,
			(error) => new ProbeError(`Could not inspect upload: ${errorMessage(error)}`, error),
			async () => {
				await writeFile(originalPath, bytes);
				return media.probe(originalPath);
			}
		);
		console.log(
			`${tag} ${toMegabytes(info.sizeBytes)} MB, duration=${formatTime(info.duration)}, codec=${info.codec}, sample_rate=${info.sampleRate}, channels=${info.channels}`
		);

		let plan = planProcessing({ sizeBytes: info.sizeBytes, durationSeconds: info.duration }, limits);
		let chunks: AudioChunk[] = [{ sourcePath: originalPath, chunkIndex: 0, startTime: 0, duration: info.duration }];

		if (plan.needsCompression) {
			const compressedPath = join(workPath, 'compressed.flac');
			const compressedSizeBytes = await runPhase(
				signal,
				(error) => new CompressionError(`Compression failed: ${errorMessage(error)}`, error),
				async () => {
					await media.compress(originalPath, compressedPath, signal);
					return (await stat(compressedPath)).size;
				}
			);
			console.log(
				`${tag} Compressed to ${toMegabytes(compressedSizeBytes)} MB (reduction: ${((1 - compressedSizeBytes / info.sizeBytes) * 100).toFixed(1)}%)`
			);

			plan = planProcessing(
				{ sizeBytes: info.sizeBytes, durationSeconds: info.duration, compressedSizeBytes },
				limits
			);
			chunks = [{ sourcePath: compressedPath, chunkIndex: 0, startTime: 0, duration: info.duration }];

			if (plan.needsSplitting) {
				const chunkDuration = plan.chunkDurationSeconds;
				console.log(`${tag} Splitting into ~${chunkDuration.toFixed(0)}s chunks`);
				chunks = await runPhase(
					signal,
					(error) => new SplitError(`Splitting failed: ${errorMessage(error)}`, error),
					() => splitAudio(compressedPath, info.duration, chunkDuration, workPath, media, signal)
				);
			}
		}

		console.log(`${tag} ${chunks.length} chunk(s) to transcribe`);
		signal.throwIfAborted();
		const transcript = await transcribeChunks(chunks, { transcriber, limiter, signal, allowPartial });

		const segments = mergeIntoSegments(offsetFragments(transcript.chunks), segmentDurationSeconds);
		assertSegmentInvariants(segments);
		console.log(`${tag} Transcription complete: ${segments.length} segment(s), ${transcript.gaps.length} gap(s)`);

		return { audioId, segments, plan, chunkCount: chunks.length, gaps: transcript.gaps };
	} catch (error) {
		if (!signal.aborted) throw error;
		if (signal.reason instanceof DeadlineExceededError) throw signal.reason;
		throw new DeadlineExceededError(`Ingestion was cancelled: ${errorMessage(signal.reason)}`, error);
	} finally {
		if (deadline) clearTimeout(deadline);
		options.signal?.removeEventListener('abort', forwardAbort);
		if (workDir) {
			await workDir.cleanup();
		}
	}
}

export interface TranscriptStore {
	get(audioId: string): Promise<Segment[] | null>;
	set(audioId: string, segments: Segment[]): Promise<void>;
}

export type IngestOnceResult =
	| { cached: true; audioId: string; segments: Segment[] }
	| (IngestResult & { cached: false });

/**
 * Skips the pipeline when byte-identical audio was already transcribed. Transcripts
 * with gaps are returned but not stored, so a later upload can fill them in.
 */
export async function ingestOnce(
	bytes: Uint8Array,
	store: TranscriptStore,
	options: IngestOptions
): Promise<IngestOnceResult> {
	const audioId = hashAudio(bytes);
	const existing = await store.get(audioId);
	if (existing) {
		console.log(`[ingest ${audioId.slice(0, 12)}] Already processed, returning stored segments`);
		return { cached: true, audioId, segments: existing };
	}

	const result = await ingestAudio(bytes, options);
	if (result.gaps.length === 0) {
		await store.set(audioId, result.segments);
	}
	return { ...result, cached: false };
}
