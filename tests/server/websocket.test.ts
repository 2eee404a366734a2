import { beforeEach, describe, expect, it, vi } from "vitest";
import { type Editor, createEditor } from "../../server/editor";
import { createEditorEvents } from "../../server/events/editor-events";
import { handleWebSocket } from "../../server/websocket";
import type { ServerMessage } from "../../shared/types";
import { FakeKeys, FakePointer, FakeScreen } from "../helpers/capture-fakes";
import { FakeFileSystem } from "../helpers/fake-file-system";

type MessageListener = (payload: Buffer | string) => void;
type CloseListener = () => void;
type ErrorListener = (error: Error) => void;

class MockSocket {
	private messageListeners: MessageListener[] = [];
	private closeListeners: CloseListener[] = [];
	private errorListeners: ErrorListener[] = [];
	readonly sentPayloads: string[] = [];

	send(payload: string): void {
		this.sentPayloads.push(payload);
	}

	on(event: "message", listener: MessageListener): void;
	on(event: "close", listener: CloseListener): void;
	on(event: "error", listener: ErrorListener): void;
	on(
		event: "message" | "close" | "error",
		listener: MessageListener | CloseListener | ErrorListener,
	): void {
		if (event === "message") {
			this.messageListeners.push(listener as MessageListener);
		} else if (event === "close") {
			this.closeListeners.push(listener as CloseListener);
		} else {
			this.errorListeners.push(listener as ErrorListener);
		}
	}

	receive(message: unknown): void {
		const raw = typeof message === "string" ? message : JSON.stringify(message);
		for (const listener of this.messageListeners) {
			listener(raw);
		}
	}

	close(): void {
		for (const listener of this.closeListeners) {
			listener();
		}
	}

	sent(): ServerMessage[] {
		return this.sentPayloads.map((payload) => JSON.parse(payload) as ServerMessage);
	}
}

describe("handleWebSocket", () => {
	let socket: MockSocket;
	let editor: Editor;
	let input: {
		dispatchKey: ReturnType<typeof vi.fn<(key: string) => void>>;
		updatePointer: ReturnType<typeof vi.fn<(x: number, y: number) => void>>;
	};

	beforeEach(() => {
		socket = new MockSocket();
		editor = createEditor({
			fileSystem: new FakeFileSystem(),
			screen: new FakeScreen(),
			pointer: new FakePointer(),
			keys: new FakeKeys(),
			events: createEditorEvents(vi.fn()),
		});
		input = {
			dispatchKey: vi.fn<(key: string) => void>(),
			updatePointer: vi.fn<(x: number, y: number) => void>(),
		};
		handleWebSocket(socket, { editor, input });
	});

	it("forwards editor events to the client", async () => {
		await editor.controller.createProject("/tmp/p");
		editor.events.slideAdded.publish({
			projectDir: "/tmp/p",
			imagePath: "s1.png",
			index: 0,
		});

		expect(socket.sent()).toEqual([
			{
				type: "project:changed",
				projectDir: "/tmp/p",
				status: "created",
				slidePaths: [],
			},
			{ type: "slide:added", projectDir: "/tmp/p", imagePath: "s1.png", index: 0 },
		]);
	});

	it("relays key and pointer input", () => {
		socket.receive({ type: "input:pointer", x: 40, y: 50 });
		socket.receive({ type: "input:key", key: "F7" });

		expect(input.updatePointer).toHaveBeenCalledWith(40, 50);
		expect(input.dispatchKey).toHaveBeenCalledWith("F7");
	});

	it("selects slides and reports editor errors with their code", async () => {
		socket.receive({ type: "slide:select", imagePath: "a.png", requestId: "r-1" });

		expect(socket.sent()).toEqual([
			{
				type: "error",
				requestId: "r-1",
				code: "NO_ACTIVE_PROJECT",
				message: "No project is open",
			},
		]);
	});

	it("rejects malformed messages", () => {
		socket.receive("not json");
		socket.receive({ type: "input:key", requestId: "r-2" });

		expect(socket.sent()).toEqual([
			{ type: "error", message: "Invalid JSON" },
			{ type: "error", requestId: "r-2", message: "Invalid message format" },
		]);
	});

	it("stops forwarding events after the socket closes", () => {
		socket.close();
		editor.events.captureMode.publish({ armed: true });

		expect(socket.sent()).toEqual([]);
		expect(editor.events.captureMode.subscriberCount).toBe(0);
	});
});
