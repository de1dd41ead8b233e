import { readdir, writeFile } from 'fs/promises';
import { dir as tempDir } from 'tmp-promise';
import { describe, expect, it, vi } from 'vitest';
import { SplitError } from '$lib/errors';
import { chunkFileName, planChunkBoundaries, splitAudio } from './splitter';

describe('planChunkBoundaries', () => {
	it('splits 720s at a 300s target into three 240s chunks', () => {
		expect(planChunkBoundaries(720, 300)).toEqual([
			{ chunkIndex: 0, startTime: 0, duration: 240 },
			{ chunkIndex: 1, startTime: 240, duration: 240 },
			{ chunkIndex: 2, startTime: 480, duration: 240 }
		]);
	});

	it('returns one chunk when the audio is shorter than the target', () => {
		expect(planChunkBoundaries(45, 300)).toEqual([{ chunkIndex: 0, startTime: 0, duration: 45 }]);
	});

	it('covers the whole duration without gaps or overlap', () => {
		for (const [total, target] of [
			[100.5, 30],
			[3601.37, 287.4],
			[600, 300],
			[61, 60]
		]) {
			const boundaries = planChunkBoundaries(total, target);
			const covered = boundaries.reduce((sum, boundary) => sum + boundary.duration, 0);

			expect(covered).toBeCloseTo(total, 9);
			expect(boundaries[0].startTime).toBe(0);
			boundaries.forEach((boundary, index) => {
				expect(boundary.chunkIndex).toBe(index);
				expect(boundary.duration).toBeLessThanOrEqual(target + 1e-9);
				if (index > 0) {
					const previous = boundaries[index - 1];
					expect(boundary.startTime).toBe(previous.startTime + previous.duration);
				}
			});
		}
	});

	it('rejects non-positive durations', () => {
		expect(() => planChunkBoundaries(0, 300)).toThrow(SplitError);
		expect(() => planChunkBoundaries(720, 0)).toThrow(SplitError);
	});
});

describe('splitAudio', () => {
	it('cuts every boundary in order and names chunks by index', async () => {
		const extract = vi.fn(async () => {});

		const chunks = await splitAudio('/work/compressed.flac', 720, 300, '/work', { extract });

		expect(chunks).toEqual([
			{ sourcePath: '/work/chunk_0000.flac', chunkIndex: 0, startTime: 0, duration: 240 },
			{ sourcePath: '/work/chunk_0001.flac', chunkIndex: 1, startTime: 240, duration: 240 },
			{ sourcePath: '/work/chunk_0002.flac', chunkIndex: 2, startTime: 480, duration: 240 }
		]);
		expect(extract).toHaveBeenNthCalledWith(2, '/work/compressed.flac', '/work/chunk_0001.flac', 240, 240, undefined);
	});

	it('hands the abort signal to every cut', async () => {
		const extract = vi.fn(async () => {});
		const { signal } = new AbortController();

		await splitAudio('/work/compressed.flac', 120, 60, '/work', { extract }, signal);

		expect(extract).toHaveBeenCalledTimes(2);
		expect(extract).toHaveBeenLastCalledWith('/work/compressed.flac', '/work/chunk_0001.flac', 60, 60, signal);
	});

	it('removes already written chunks when a cut fails', async () => {
		const workDir = await tempDir({ unsafeCleanup: true });
		const extract = vi.fn(async (_input: string, output: string) => {
			await writeFile(output, 'chunk');
			if (output.endsWith(chunkFileName(2))) {
				throw new Error('ffmpeg exited with code 1');
			}
		});

		try {
			await expect(splitAudio('/in.flac', 720, 300, workDir.path, { extract })).rejects.toThrow(
				'Failed to split /in.flac after 2 chunk(s): ffmpeg exited with code 1'
			);
			expect(await readdir(workDir.path)).toEqual([]);
		} finally {
			await workDir.cleanup();
		}
	});
});
