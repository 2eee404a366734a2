import { describe, expect, it, vi } from "vitest";
import { EventBus } from "../../server/events/event-bus";

describe("EventBus", () => {
	it("delivers to handlers in subscription order", () => {
		const bus = new EventBus<string>("test");
		const received: string[] = [];

		bus.subscribe((payload) => received.push(`first:${payload}`));
		bus.subscribe((payload) => received.push(`second:${payload}`));
		bus.publish("a.png");

		expect(received).toEqual(["first:a.png", "second:a.png"]);
	});

	it("keeps delivering when a handler throws and reports the failure", () => {
		const reportError = vi.fn();
		const bus = new EventBus<number>("test", reportError);
		const failure = new Error("render failed");
		const after = vi.fn();

		bus.subscribe(() => {
			throw failure;
		});
		bus.subscribe(after);
		const failures = bus.publish(7);

		expect(failures).toBe(1);
		expect(after).toHaveBeenCalledWith(7);
		expect(reportError).toHaveBeenCalledWith("test", failure);
	});

	it("unsubscribes by handler and by returned function", () => {
		const bus = new EventBus<string>("test");
		const first = vi.fn();
		const second = vi.fn();

		bus.subscribe(first);
		const removeSecond = bus.subscribe(second);
		expect(bus.unsubscribe(first)).toBe(true);
		removeSecond();
		bus.publish("x");

		expect(first).not.toHaveBeenCalled();
		expect(second).not.toHaveBeenCalled();
		expect(bus.subscriberCount).toBe(0);
		expect(bus.unsubscribe(first)).toBe(false);
	});

	it("registers the same handler once", () => {
		const bus = new EventBus<string>("test");
		const handler = vi.fn();

		bus.subscribe(handler);
		bus.subscribe(handler);
		bus.publish("x");

		expect(handler).toHaveBeenCalledTimes(1);
		expect(bus.subscriberCount).toBe(1);
	});

	it("does not replay events to late subscribers", () => {
		const bus = new EventBus<string>("test");
		bus.publish("missed");

		const late = vi.fn();
		bus.subscribe(late);

		expect(late).not.toHaveBeenCalled();
	});

	it("applies unsubscription during delivery from the next publish", () => {
		const bus = new EventBus<string>("test");
		const second = vi.fn();
		bus.subscribe(() => {
			bus.unsubscribe(second);
		});
		bus.subscribe(second);

		bus.publish("one");
		bus.publish("two");

		expect(second).toHaveBeenCalledTimes(1);
		expect(second).toHaveBeenCalledWith("one");
	});
});
