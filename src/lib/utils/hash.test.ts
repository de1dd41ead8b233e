import { describe, expect, it } from 'vitest';
import { hashAudio } from './hash';

describe('hashAudio', () => {
	it('returns the hex SHA-256 of the bytes', () => {
		expect(hashAudio(Buffer.from('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
	});

	it('is stable for identical bytes and differs otherwise', () => {
		const first = hashAudio(new Uint8Array([1, 2, 3]));
		expect(hashAudio(new Uint8Array([1, 2, 3]))).toBe(first);
		expect(hashAudio(new Uint8Array([1, 2, 4]))).not.toBe(first);
	});
});
