export type EventHandler<T> = (payload: T) => void;

export type HandlerErrorReporter = (
	busName: string,
	error: unknown,
) => void;

const reportToConsole: HandlerErrorReporter = (busName, error) => {
	console.error(`[events] Handler for "${busName}" failed:`, error);
};

/**
 * Ordered, synchronous publish/subscribe.
 * Handlers run in subscription order; one failing handler does not stop
 * the rest. Nothing is buffered for late subscribers.
 */
export class EventBus<T> {
	private handlers: EventHandler<T>[] = [];

	constructor(
		readonly name: string,
		private readonly reportError: HandlerErrorReporter = reportToConsole,
	) {}

	/** Register a handler. Returns a function that removes it again. */
	subscribe(handler: EventHandler<T>): () => void {
		if (!this.handlers.includes(handler)) {
			this.handlers.push(handler);
		}
		return () => {
			this.unsubscribe(handler);
		};
	}

	unsubscribe(handler: EventHandler<T>): boolean {
		const index = this.handlers.indexOf(handler);
		if (index === -1) {
			return false;
		}
		this.handlers = [
			...this.handlers.slice(0, index),
			...this.handlers.slice(index + 1),
		];
		return true;
	}

	/** Deliver to every current subscriber. Returns the number of handlers that threw. */
	publish(payload: T): number {
		// Snapshot: (un)subscribing during delivery affects the next publish only.
		const targets = this.handlers;
		let failures = 0;
		for (const handler of targets) {
			try {
				handler(payload);
			} catch (error) {
				failures += 1;
				this.reportError(this.name, error);
			}
		}
		return failures;
	}

	get subscriberCount(): number {
		return this.handlers.length;
	}
}
