import { createHash } from 'node:crypto';

/** SHA-256 of the uploaded bytes, hex encoded. Used as the recording's idempotency key. */
export function hashAudio(bytes: Uint8Array): string {
	return createHash('sha256').update(bytes).digest('hex');
}
