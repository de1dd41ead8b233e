import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ChunkTranscriptionError } from '$lib/errors';
import type { AudioChunk, TranscribeOptions, TranscriptionResult } from '$lib/types';
import { transcribeChunks } from './driver';

const makeChunks = (count: number): AudioChunk[] =>
	Array.from({ length: count }, (_, chunkIndex) => ({
		sourcePath: `/tmp/chunk_${chunkIndex.toString().padStart(4, '0')}.flac`,
		chunkIndex,
		startTime: chunkIndex * 240,
		duration: 240
	}));

describe('transcribeChunks', () => {
	const events: string[] = [];
	const limiter = {
		acquire: vi.fn(async () => {
			events.push('acquire');
		})
	};
	const readChunk = vi.fn(async (filePath: string) => Buffer.from(filePath));
	const transcribe = vi.fn<(audio: Uint8Array, options: TranscribeOptions) => Promise<TranscriptionResult>>();
	const transcriber = { transcribe };

	beforeEach(() => {
		vi.clearAllMocks();
		events.length = 0;
		transcribe.mockImplementation(async (audio) => {
			events.push(`transcribe ${Buffer.from(audio).toString()}`);
			return { fragments: [{ start: 0, end: 10, text: 'Test' }] };
		});
	});

	it('tags each chunk result with its index and start time', async () => {
		transcribe
			.mockResolvedValueOnce({
				fragments: [
					{ start: 0, end: 10, text: 'Chunk 0 segment 1' },
					{ start: 10, end: 20, text: 'Chunk 0 segment 2' }
				]
			})
			.mockResolvedValueOnce({ fragments: [{ start: 0, end: 15, text: 'Chunk 1 segment 1' }] });

		const result = await transcribeChunks(makeChunks(2), { transcriber, limiter, readChunk });

		expect(result.chunks).toEqual([
			{
				chunkIndex: 0,
				startTime: 0,
				fragments: [
					{ start: 0, end: 10, text: 'Chunk 0 segment 1' },
					{ start: 10, end: 20, text: 'Chunk 0 segment 2' }
				]
			},
			{ chunkIndex: 1, startTime: 240, fragments: [{ start: 0, end: 15, text: 'Chunk 1 segment 1' }] }
		]);
		expect(result.gaps).toEqual([]);
		expect(result.statuses).toEqual(['succeeded', 'succeeded']);
		expect(transcribe).toHaveBeenCalledWith(expect.any(Buffer), {
			wantTimestamps: true,
			mimeType: 'audio/flac',
			signal: undefined
		});
	});

	it('acquires the limiter before every call and keeps chunk order', async () => {
		const [first, second, third] = makeChunks(3);

		await transcribeChunks([third, first, second], { transcriber, limiter, readChunk });

		expect(events).toEqual([
			'acquire',
			'transcribe /tmp/chunk_0000.flac',
			'acquire',
			'transcribe /tmp/chunk_0001.flac',
			'acquire',
			'transcribe /tmp/chunk_0002.flac'
		]);
	});

	it('stops submitting chunks after the first failure', async () => {
		transcribe
			.mockResolvedValueOnce({ fragments: [] })
			.mockRejectedValueOnce(new Error('429 Too Many Requests'));

		const error = await transcribeChunks(makeChunks(5), { transcriber, limiter, readChunk }).catch(
			(caught: unknown) => caught
		);

		expect(error).toBeInstanceOf(ChunkTranscriptionError);
		expect(error).toMatchObject({ kind: 'chunk-transcription', chunkIndex: 1 });
		expect(transcribe).toHaveBeenCalledTimes(2);
		expect(limiter.acquire).toHaveBeenCalledTimes(2);
	});

	it('treats malformed recognizer output as a chunk failure', async () => {
		transcribe.mockResolvedValueOnce({ fragments: [{ start: 10, end: 5, text: 'backwards' }] });

		await expect(transcribeChunks(makeChunks(1), { transcriber, limiter, readChunk })).rejects.toMatchObject({
			kind: 'chunk-transcription',
			chunkIndex: 0
		});
	});

	it('treats an unreadable chunk file as a chunk failure without spending quota', async () => {
		readChunk.mockRejectedValueOnce(new Error('ENOENT: no such file'));

		await expect(transcribeChunks(makeChunks(1), { transcriber, limiter, readChunk })).rejects.toThrow(
			'Transcription failed for chunk 0: ENOENT: no such file'
		);
		expect(limiter.acquire).not.toHaveBeenCalled();
	});

	it('records gaps and carries on when partial transcripts are allowed', async () => {
		transcribe
			.mockResolvedValueOnce({ fragments: [{ start: 0, end: 5, text: 'Content' }] })
			.mockRejectedValueOnce(new Error('boom'));

		const result = await transcribeChunks(makeChunks(3), { transcriber, limiter, readChunk, allowPartial: true });

		expect(result.gaps).toEqual([{ chunkIndex: 1, start: 240, end: 480, reason: 'boom' }]);
		expect(result.chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 2]);
		expect(result.statuses).toEqual(['succeeded', 'failed', 'succeeded']);
	});

	it('still fails when every chunk fails under partial acceptance', async () => {
		transcribe.mockRejectedValue(new Error('down'));

		await expect(
			transcribeChunks(makeChunks(2), { transcriber, limiter, readChunk, allowPartial: true })
		).rejects.toMatchObject({ kind: 'chunk-transcription', chunkIndex: 0 });
		expect(transcribe).toHaveBeenCalledTimes(2);
	});

	it('gives up immediately once the signal is aborted', async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(
			transcribeChunks(makeChunks(2), { transcriber, limiter, readChunk, signal: controller.signal })
		).rejects.toMatchObject({ name: 'AbortError' });
		expect(transcribe).not.toHaveBeenCalled();
	});

	it('returns an empty transcript for an empty chunk list', async () => {
		await expect(transcribeChunks([], { transcriber, limiter, readChunk })).resolves.toEqual({
			chunks: [],
			gaps: [],
			statuses: []
		});
	});
});
