export type PutOutcome = "queued" | "duplicate" | "full";

/**
 * Bounded FIFO of distinct keys. A key already waiting is not queued twice,
 * so a burst of uploads for one machine costs one scoring pass.
 */
export class DedupQueue<K> {
	private readonly pending = new Set<K>();

	constructor(private readonly maxSize: number = 10000) {}

	put(key: K): PutOutcome {
		if (this.pending.has(key)) return "duplicate";
		if (this.pending.size >= this.maxSize) return "full";
		this.pending.add(key);
		return "queued";
	}

	/** Removes and returns up to `count` keys, oldest first. */
	take(count: number): K[] {
		const batch: K[] = [];
		for (const key of this.pending) {
			if (batch.length >= count) break;
			batch.push(key);
		}
		for (const key of batch) {
			this.pending.delete(key);
		}
		return batch;
	}

	get size(): number {
		return this.pending.size;
	}

	get isEmpty(): boolean {
		return this.pending.size === 0;
	}
}
