/**
 * Single-value cache with an explicit get-or-fetch / invalidate contract.
 *
 * Concurrent callers that miss the cache share one in-flight fetch. The slot
 * only ever holds a complete value: it is replaced as a whole once a fetch
 * resolves, and a fetch that was started before an `invalidate()` does not
 * write its result back.
 */
export class AsyncSlot<T> {
	private value: T | undefined;
	private inFlight: Promise<T> | undefined;
	private generation = 0;

	constructor(private readonly fetcher: () => Promise<T>) {}

	peek(): T | undefined {
		return this.value;
	}

	async get(): Promise<T> {
		if (this.value !== undefined) return this.value;
		return this.fetch();
	}

	/** Drops the cached value and fetches a replacement. */
	async refresh(): Promise<T> {
		this.invalidate();
		return this.fetch();
	}

	invalidate(): void {
		this.value = undefined;
		this.inFlight = undefined;
		this.generation += 1;
	}

	private fetch(): Promise<T> {
		if (this.inFlight) return this.inFlight;

		const generation = this.generation;
		const pending = this.fetcher().then(
			(value) => {
				if (this.generation === generation) {
					this.value = value;
					this.inFlight = undefined;
				}
				return value;
			},
			(err: unknown) => {
				if (this.generation === generation) this.inFlight = undefined;
				throw err;
			}
		);
		this.inFlight = pending;
		return pending;
	}
}
