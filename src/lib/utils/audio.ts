import { StitchInvariantViolation } from '../errors';
import type { ChunkFragments, GlobalFragment, Segment } from '../types';

export const DEFAULT_SEGMENT_DURATION = 15; // seconds of speech per analysis segment
const TIME_RESOLUTION = 0.01; // matches roundTime

export function formatTime(seconds: number): string {
    const minutes = Math.floor(seconds / 60);
    const remainingSeconds = Math.floor(seconds % 60);
    return `${minutes.toString().padStart(2, '0')}:${remainingSeconds.toString().padStart(2, '0')}`;
}

/** Accepts `ss`, `mm:ss` or `hh:mm:ss` (fractional seconds allowed). Returns NaN when unparseable. */
export function parseTimeToSeconds(timestamp: string): number {
    const trimmed = timestamp.trim();
    if (!trimmed) return Number.NaN;

    const parts = trimmed.split(':').map(Number);
    if (parts.length > 3 || parts.some((part) => !Number.isFinite(part) || part < 0)) {
        return Number.NaN;
    }
    return parts.reduce((total, part) => total * 60 + part, 0);
}

export function roundTime(seconds: number): number {
    return Math.round(seconds * 100) / 100;
}

/**
 * Moves every chunk-local fragment onto the recording's timeline by adding the start
 * time of the chunk it came from. Chunks are emitted in `chunkIndex` order.
 */
export function offsetFragments(chunks: ChunkFragments[]): GlobalFragment[] {
    return [...chunks]
        .sort((a, b) => a.chunkIndex - b.chunkIndex)
        .flatMap(({ startTime, fragments }) =>
            fragments.map((fragment) => ({
                start: fragment.start + startTime,
                end: fragment.end + startTime,
                text: fragment.text
            }))
        );
}

/**
 * Re-buckets recognizer fragments into segments of roughly `segmentDuration` seconds.
 *
 * A fragment joins the open segment while the segment would still span at most
 * `segmentDuration`, or when it ends inside the open segment. Otherwise the open segment
 * is closed and the fragment starts the next one. A new segment never starts before the
 * previous one ended, so recognizer overlap at chunk seams cannot produce overlapping
 * segments. Boundaries are rounded to hundredths of a second before bucketing; a
 * fragment that opens a segment with no length left is given one hundredth.
 */
export function mergeIntoSegments(
    fragments: GlobalFragment[],
    segmentDuration: number = DEFAULT_SEGMENT_DURATION
): Segment[] {
    if (!(segmentDuration > 0)) {
        throw new RangeError(`Segment duration must be positive, got ${segmentDuration}`);
    }

    const segments: Segment[] = [];
    let current: Segment | null = null;

    for (const fragment of fragments) {
        const text = fragment.text.trim();
        if (!text) continue;

        const fragmentStart = roundTime(fragment.start);
        const fragmentEnd = roundTime(fragment.end);

        if (current && (fragmentEnd - current.start <= segmentDuration || fragmentEnd <= current.end)) {
            current.text = `${current.text} ${text}`;
            current.end = Math.max(current.end, fragmentEnd);
            continue;
        }

        if (current) segments.push(current);
        const start: number = Math.max(fragmentStart, current?.end ?? 0);
        current = { start, end: Math.max(fragmentEnd, roundTime(start + TIME_RESOLUTION)), text };
    }

    if (current) segments.push(current);

    return segments;
}

export function assertSegmentInvariants(segments: Segment[]): void {
    segments.forEach((segment, index) => {
        if (!(segment.end > segment.start)) {
            throw new StitchInvariantViolation(
                `Segment ${index} ends at ${segment.end}s, not after its start ${segment.start}s`
            );
        }
        if (segment.text !== segment.text.trim()) {
            throw new StitchInvariantViolation(`Segment ${index} has untrimmed text`);
        }

        const previous = segments[index - 1];
        if (previous && (segment.start <= previous.start || segment.start < previous.end)) {
            throw new StitchInvariantViolation(
                `Segment ${index} starting at ${segment.start}s overlaps or precedes segment ${index - 1} (${previous.start}s-${previous.end}s)`
            );
        }
    });
}
