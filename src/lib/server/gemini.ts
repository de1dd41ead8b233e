import {
	GoogleGenerativeAI,
	HarmBlockThreshold,
	HarmCategory,
	SchemaType,
	type GenerativeModel
} from '@google/generative-ai';
import { FileState, GoogleAIFileManager } from '@google/generative-ai/server';
import { writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';
import { file as tempFile } from 'tmp-promise';
import type { FileResult } from 'tmp-promise';
import { z } from 'zod';
import { errorMessage } from '$lib/errors';
import type { RawFragment, TranscribeOptions, TranscriptionResult, Transcriber } from '$lib/types';
import { parseTimeToSeconds } from '$lib/utils/audio';
import { extensionForMimeType } from '$lib/utils/mime';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_POLL_INTERVAL_MS = 5000;

export const safetySettings = [
	{ category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
	{ category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_NONE }
];

const TIMESTAMPED_PROMPT = `Transcribe this audio verbatim. Split the transcript into consecutive phrases of a few seconds each.
For every phrase give its start and end time in seconds from the beginning of this audio file and the spoken text.
Respond with a JSON array in the form [{"start": 0.0, "end": 4.2, "text": "Today I will be talking about the importance of AI."}].
Return an empty array if nothing is spoken.`;

const PLAIN_PROMPT = `Transcribe this audio verbatim.
Respond with a JSON array holding a single entry whose start is 0, whose end is the length of the audio in seconds and whose text is the whole transcript, for example [{"start": 0, "end": 31.5, "text": "..."}].
Return an empty array if nothing is spoken.`;

const timeValue = z
	.union([z.number(), z.string().transform(parseTimeToSeconds)])
	.pipe(z.number().finite().nonnegative());

const geminiTranscriptSchema = z.array(
	z.object({
		start: timeValue,
		end: timeValue,
		text: z.string()
	})
);

/** Parses the model's JSON answer. Timestamps may be seconds or `mm:ss` strings. */
export function parseGeminiTranscript(raw: string): RawFragment[] {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		throw new Error(`Gemini returned malformed JSON: ${errorMessage(error)}`, { cause: error });
	}

	return geminiTranscriptSchema.parse(json).map(({ start, end, text }) => ({
		start,
		end: Math.max(start, end),
		text: text.trim()
	}));
}

export interface GeminiTranscriberOptions {
	apiKey: string;
	model?: string;
	pollIntervalMs?: number;
}

export class GeminiTranscriber implements Transcriber {
	private readonly fileManager: GoogleAIFileManager;
	private readonly model: GenerativeModel;
	private readonly pollIntervalMs: number;

	constructor({ apiKey, model = DEFAULT_GEMINI_MODEL, pollIntervalMs = DEFAULT_POLL_INTERVAL_MS }: GeminiTranscriberOptions) {
		this.fileManager = new GoogleAIFileManager(apiKey);
		this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
			model,
			safetySettings,
			generationConfig: {
				responseMimeType: 'application/json',
				responseSchema: {
					type: SchemaType.ARRAY,
					items: {
						type: SchemaType.OBJECT,
						properties: {
							start: { type: SchemaType.NUMBER },
							end: { type: SchemaType.NUMBER },
							text: { type: SchemaType.STRING }
						},
						required: ['start', 'end', 'text']
					}
				}
			}
		});
		this.pollIntervalMs = pollIntervalMs;
	}

	async transcribe(audio: Uint8Array, { wantTimestamps, mimeType, signal }: TranscribeOptions): Promise<TranscriptionResult> {
		let audioFile: FileResult | undefined;
		let uploadedName: string | undefined;

		try {
			audioFile = await tempFile({ postfix: extensionForMimeType(mimeType) });
			await writeFile(audioFile.path, audio);

			console.log(`[gemini] Uploading ${audio.byteLength} bytes (${mimeType})`);
			const uploadResult = await this.fileManager.uploadFile(audioFile.path, { mimeType });
			uploadedName = uploadResult.file.name;
			let uploadedFile = await this.fileManager.getFile(uploadedName);

			while (uploadedFile.state === FileState.PROCESSING) {
				console.log(`[gemini] ${uploadedName} is processing`);
				await sleep(this.pollIntervalMs, undefined, { signal });
				uploadedFile = await this.fileManager.getFile(uploadedName);
			}

			if (uploadedFile.state === FileState.FAILED) {
				throw new Error(`Gemini failed to process uploaded file ${uploadedName}`);
			}

			const result = await this.model.generateContent(
				[
					{ fileData: { mimeType, fileUri: uploadResult.file.uri } },
					{ text: wantTimestamps ? TIMESTAMPED_PROMPT : PLAIN_PROMPT }
				],
				{ signal }
			);

			return { fragments: parseGeminiTranscript(result.response.text()) };
		} finally {
			if (uploadedName) {
				await this.fileManager.deleteFile(uploadedName).catch((error: unknown) => {
					console.warn(`[gemini] Could not delete uploaded file ${uploadedName}:`, errorMessage(error));
				});
			}
			if (audioFile) {
				await audioFile.cleanup();
			}
		}
	}
}
