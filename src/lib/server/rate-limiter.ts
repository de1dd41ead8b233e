import { setTimeout as sleepFor } from 'timers/promises';

export interface RateLimiter {
	acquire(signal?: AbortSignal): Promise<void>;
}

export interface SlidingWindowOptions {
	maxRequests: number;
	periodMs: number;
	now?: () => number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
	await sleepFor(ms, undefined, { signal });
};

/** Settles with `promise`, or rejects with the abort reason as soon as `signal` fires. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	if (signal.aborted) return Promise.reject(signal.reason);

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		signal.addEventListener('abort', onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			}
		);
	});
}

/**
 * Allows at most `maxRequests` acquisitions in any trailing `periodMs` window.
 *
 * One instance is meant to be shared by every ingestion in the process: the quota it
 * guards belongs to the API key, not to a recording. Callers are served one at a time,
 * in the order they called `acquire`.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
	private readonly maxRequests: number;
	private readonly periodMs: number;
	private readonly now: () => number;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private readonly recent: number[] = [];
	private tail: Promise<void> = Promise.resolve();

	constructor(options: SlidingWindowOptions) {
		if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
			throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
		}
		if (!(options.periodMs > 0)) {
			throw new RangeError(`periodMs must be positive, got ${options.periodMs}`);
		}
		this.maxRequests = options.maxRequests;
		this.periodMs = options.periodMs;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? defaultSleep;
	}

	acquire(signal?: AbortSignal): Promise<void> {
		const turn = this.tail.then(() => this.reserve(signal));
		// The caller receives the failure through `turn`; the queue itself keeps moving.
		// An aborted caller still holds its place until its turn, where `reserve` skips it.
		this.tail = turn.catch(() => undefined);
		return signal ? untilAborted(turn, signal) : turn;
	}

	/** Calls recorded inside the current window. */
	get callsInWindow(): number {
		this.prune(this.now());
		return this.recent.length;
	}

	private prune(now: number): void {
		while (this.recent.length > 0 && now - this.recent[0] >= this.periodMs) {
			this.recent.shift();
		}
	}

	private async reserve(signal?: AbortSignal): Promise<void> {
		for (;;) {
			signal?.throwIfAborted();
			const now = this.now();
			this.prune(now);

			if (this.recent.length < this.maxRequests) {
				this.recent.push(now);
				return;
			}

			const waitMs = this.recent[0] + this.periodMs - now;
			console.log(
				`[rateLimiter] ${this.maxRequests} calls in the last ${this.periodMs / 1000}s, waiting ${(waitMs / 1000).toFixed(1)}s`
			);
			await this.sleep(waitMs, signal);
		}
	}
}
