/**
 * Runs async tasks one at a time in submission order.
 * A failed task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	run<T>(task: () => Promise<T> | T): Promise<T> {
		this.pending += 1;
		const result = this.tail.then(() => task());
		this.tail = result.then(
			() => {
				this.pending -= 1;
			},
			() => {
				this.pending -= 1;
			},
		);
		return result;
	}

	/** Tasks submitted and not yet settled, including the running one. */
	get size(): number {
		return this.pending;
	}
}
