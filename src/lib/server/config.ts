import { z } from 'zod';
import { DEFAULT_SEGMENT_DURATION } from '$lib/utils/audio';
import { MAX_REQUEST_BYTES, TARGET_CHUNK_BYTES } from '$lib/utils/plan';
import { DEFAULT_GEMINI_MODEL } from './gemini';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const envSchema = z
	.object({
		GOOGLE_API_KEY: z.string().trim().min(1, 'GOOGLE_API_KEY must be set'),
		GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_GEMINI_MODEL),
		MAX_REQUEST_BYTES: positiveInt(MAX_REQUEST_BYTES),
		TARGET_CHUNK_BYTES: positiveInt(TARGET_CHUNK_BYTES),
		RATE_LIMIT_REQUESTS: positiveInt(3),
		RATE_LIMIT_PERIOD_SECONDS: positiveNumber(60),
		SEGMENT_DURATION_SECONDS: positiveNumber(DEFAULT_SEGMENT_DURATION),
		INGEST_DEADLINE_SECONDS: positiveNumber(30 * 60)
	})
	.refine((env) => env.TARGET_CHUNK_BYTES <= env.MAX_REQUEST_BYTES, {
		message: 'TARGET_CHUNK_BYTES must not exceed MAX_REQUEST_BYTES',
		path: ['TARGET_CHUNK_BYTES']
	});

export interface AppConfig {
	googleApiKey: string;
	geminiModel: string;
	maxRequestBytes: number;
	targetChunkBytes: number;
	rateLimitRequests: number;
	rateLimitPeriodMs: number;
	segmentDurationSeconds: number;
	ingestDeadlineMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
	}

	const parsed = result.data;
	return {
		googleApiKey: parsed.GOOGLE_API_KEY,
		geminiModel: parsed.GEMINI_MODEL,
		maxRequestBytes: parsed.MAX_REQUEST_BYTES,
		targetChunkBytes: parsed.TARGET_CHUNK_BYTES,
		rateLimitRequests: parsed.RATE_LIMIT_REQUESTS,
		rateLimitPeriodMs: parsed.RATE_LIMIT_PERIOD_SECONDS * 1000,
		segmentDurationSeconds: parsed.SEGMENT_DURATION_SECONDS,
		ingestDeadlineMs: parsed.INGEST_DEADLINE_SECONDS * 1000
	};
}
