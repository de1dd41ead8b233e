import { extname } from 'path';

const MIME_TYPES: Record<string, string> = {
	'.flac': 'audio/flac',
	'.wav': 'audio/wav',
	'.mp3': 'audio/mpeg',
	'.m4a': 'audio/mp4',
	'.aac': 'audio/aac',
	'.ogg': 'audio/ogg',
	'.webm': 'audio/webm'
};

export function mimeTypeForPath(filePath: string): string {
	return MIME_TYPES[extname(filePath).toLowerCase()] ?? 'audio/wav';
}

/** File extension (with the dot) for an audio MIME type; `.wav` when unknown. */
export function extensionForMimeType(mimeType: string): string {
	const normalized = mimeType.split(';')[0].trim().toLowerCase();
	const match = Object.entries(MIME_TYPES).find(([, type]) => type === normalized);
	return match ? match[0] : '.wav';
}
