import 'dotenv/config';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { IngestError } from '$lib/errors';
import { loadConfig } from '$lib/server/config';
import { GeminiTranscriber } from '$lib/server/gemini';
import { ingestAudio } from '$lib/server/ingest';
import { SlidingWindowRateLimiter } from '$lib/server/rate-limiter';

async function main() {
	const input = process.argv[2];
	if (!input) {
		console.error('Usage: npm run transcribe -- <audio-file>');
		process.exitCode = 1;
		return;
	}

	const config = loadConfig();
	const limiter = new SlidingWindowRateLimiter({
		maxRequests: config.rateLimitRequests,
		periodMs: config.rateLimitPeriodMs
	});
	const transcriber = new GeminiTranscriber({ apiKey: config.googleApiKey, model: config.geminiModel });

	const result = await ingestAudio(await readFile(input), {
		transcriber,
		limiter,
		limits: { maxRequestBytes: config.maxRequestBytes, targetChunkBytes: config.targetChunkBytes },
		segmentDurationSeconds: config.segmentDurationSeconds,
		deadlineMs: config.ingestDeadlineMs,
		extension: extname(input) || '.wav'
	});

	process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

main().catch((error) => {
	if (error instanceof IngestError) {
		const where = error.chunkIndex === undefined ? '' : ` (chunk ${error.chunkIndex})`;
		console.error(`Ingestion failed in ${error.kind}${where}: ${error.message}`);
	} else {
		console.error('Error in CLI:', error);
	}
	process.exit(1);
});
