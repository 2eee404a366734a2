import { describe, expect, it, vi } from "vitest";
import { RemoteInput } from "../../server/input/remote-input";

describe("RemoteInput", () => {
	it("dispatches keys to registered listeners until removed", () => {
		const input = new RemoteInput();
		const listener = vi.fn();

		input.addKeyListener(listener);
		input.addKeyListener(listener);
		input.dispatchKey("f7");
		input.removeKeyListener(listener);
		input.dispatchKey("escape");

		expect(listener.mock.calls).toEqual([["f7"]]);
		expect(input.listenerCount).toBe(0);
	});

	it("reports the last pointer position", async () => {
		const input = new RemoteInput();
		expect(await input.getCursorPosition()).toEqual({ x: 0, y: 0 });

		input.updatePointer(640, 360);

		expect(await input.getCursorPosition()).toEqual({ x: 640, y: 360 });
	});
});
