import ffmpeg from 'fluent-ffmpeg';
import type { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg';
import { stat } from 'fs/promises';
import { CompressionError, ProbeError, errorMessage } from '$lib/errors';
import type { AudioInfo } from '$lib/types';

// 16 kHz mono FLAC
const TARGET_SAMPLE_RATE = 16000;
const TARGET_CHANNELS = 1;
const TARGET_CODEC = 'flac';

export interface MediaToolkit {
	probe(filePath: string): Promise<AudioInfo>;
	compress(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
	extract(
		inputPath: string,
		outputPath: string,
		startTime: number,
		duration: number,
		signal?: AbortSignal
	): Promise<void>;
}

/** Runs `command`, killing ffmpeg and rejecting with the abort reason when `signal` fires. */
function runCommand(
	command: FfmpegCommand,
	signal: AbortSignal | undefined,
	onError: (err: Error) => Error
): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}

		const onAbort = () => {
			reject(signal?.reason);
			command.kill('SIGKILL');
		};
		signal?.addEventListener('abort', onAbort, { once: true });

		command
			.on('end', () => {
				signal?.removeEventListener('abort', onAbort);
				resolve();
			})
			.on('error', (err: Error) => {
				signal?.removeEventListener('abort', onAbort);
				reject(onError(err));
			})
			.run();
	});
}

function ffprobe(filePath: string): Promise<FfprobeData> {
	return new Promise((resolve, reject) => {
		ffmpeg.ffprobe(filePath, (err, metadata) => {
			if (err) reject(err);
			else resolve(metadata);
		});
	});
}

export async function probeAudio(filePath: string): Promise<AudioInfo> {
	let metadata: FfprobeData;
	try {
		metadata = await ffprobe(filePath);
	} catch (error) {
		throw new ProbeError(`ffprobe could not read ${filePath}: ${errorMessage(error)}`, error);
	}

	const stream = metadata.streams.find((candidate) => candidate.codec_type === 'audio');
	if (!stream) {
		throw new ProbeError(`No audio stream found in ${filePath}`);
	}

	const sizeBytes = metadata.format.size ?? (await stat(filePath)).size;
	if (sizeBytes <= 0) {
		throw new ProbeError(`${filePath} is empty`);
	}

	return {
		duration: Number(metadata.format.duration ?? 0),
		sizeBytes,
		codec: stream.codec_name ?? 'unknown',
		sampleRate: Number(stream.sample_rate ?? 0),
		channels: stream.channels ?? 0
	};
}

export async function compressAudio(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
	console.log(`[compress] Re-encoding ${inputPath} to ${TARGET_SAMPLE_RATE} Hz mono ${TARGET_CODEC}`);
	const command = ffmpeg(inputPath)
		.audioFrequency(TARGET_SAMPLE_RATE)
		.audioChannels(TARGET_CHANNELS)
		.audioCodec(TARGET_CODEC)
		.output(outputPath);

	await runCommand(command, signal, (err) => {
		console.error(`[compress] FFmpeg error for ${inputPath}:`, err);
		return new CompressionError(`ffmpeg compression failed: ${err.message}`, err);
	});
}

export async function extractAudioSegment(
	inputPath: string,
	outputPath: string,
	startTime: number,
	duration: number,
	signal?: AbortSignal
): Promise<void> {
	const command = ffmpeg(inputPath)
		.setStartTime(startTime)
		.setDuration(duration)
		.audioFrequency(TARGET_SAMPLE_RATE)
		.audioChannels(TARGET_CHANNELS)
		.audioCodec(TARGET_CODEC)
		.output(outputPath);

	await runCommand(command, signal, (err) => err);
}

export const ffmpegToolkit: MediaToolkit = {
	probe: probeAudio,
	compress: compressAudio,
	extract: extractAudioSegment
};
