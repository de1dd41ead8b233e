export type IngestErrorKind =
	| 'invalid-audio'
	| 'probe'
	| 'compression'
	| 'split'
	| 'chunk-transcription'
	| 'stitch'
	| 'deadline';

interface IngestErrorOptions {
	chunkIndex?: number;
	cause?: unknown;
}

/**
 * Base class for every failure surfaced by an ingestion. `kind` names the phase that
 * failed; `chunkIndex` is set when a single chunk is to blame.
 */
export class IngestError extends Error {
	readonly kind: IngestErrorKind;
	readonly chunkIndex?: number;

	constructor(kind: IngestErrorKind, message: string, options: IngestErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = 'IngestError';
		this.kind = kind;
		this.chunkIndex = options.chunkIndex;
	}
}

export class InvalidAudioError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('invalid-audio', message, { cause });
		this.name = 'InvalidAudioError';
	}
}

export class ProbeError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('probe', message, { cause });
		this.name = 'ProbeError';
	}
}

export class CompressionError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('compression', message, { cause });
		this.name = 'CompressionError';
	}
}

export class SplitError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('split', message, { cause });
		this.name = 'SplitError';
	}
}

export class ChunkTranscriptionError extends IngestError {
	declare readonly chunkIndex: number;

	constructor(chunkIndex: number, cause?: unknown) {
		const detail = cause === undefined ? '' : `: ${errorMessage(cause)}`;
		super('chunk-transcription', `Transcription failed for chunk ${chunkIndex}${detail}`, { chunkIndex, cause });
		this.name = 'ChunkTranscriptionError';
	}
}

/** Raised when merged segments break ordering; upstream bugs only. */
export class StitchInvariantViolation extends IngestError {
	constructor(message: string) {
		super('stitch', message);
		this.name = 'StitchInvariantViolation';
	}
}

export class DeadlineExceededError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('deadline', message, { cause });
		this.name = 'DeadlineExceededError';
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
