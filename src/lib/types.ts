export interface AudioInfo {
	duration: number;
	sizeBytes: number;
	codec: string;
	sampleRate: number;
	channels: number;
}

export interface AudioChunk {
	sourcePath: string;
	chunkIndex: number;
	startTime: number;
	duration: number;
}

/** Timestamps are relative to the start of the chunk the fragment came from. */
export interface RawFragment {
	start: number;
	end: number;
	text: string;
}

/** Same shape as a raw fragment, placed on the timeline of the whole recording. */
export type GlobalFragment = RawFragment;

export interface ChunkFragments {
	chunkIndex: number;
	startTime: number;
	fragments: RawFragment[];
}

export interface Segment {
	start: number;
	end: number;
	text: string;
}

export type ProcessingPlan =
	| { needsCompression: false; needsSplitting: false }
	| { needsCompression: true; needsSplitting: false }
	| { needsCompression: true; needsSplitting: true; chunkDurationSeconds: number };

export type ChunkStatus = 'pending' | 'calling' | 'succeeded' | 'failed';

export interface TranscriptGap {
	chunkIndex: number;
	start: number;
	end: number;
	reason: string;
}

export interface TranscribeOptions {
	wantTimestamps: boolean;
	mimeType: string;
	signal?: AbortSignal;
}

export interface TranscriptionResult {
	fragments: RawFragment[];
}

export interface Transcriber {
	transcribe(audio: Uint8Array, options: TranscribeOptions): Promise<TranscriptionResult>;
}

export interface IngestResult {
	audioId: string;
	segments: Segment[];
	plan: ProcessingPlan;
	chunkCount: number;
	gaps: TranscriptGap[];
}
