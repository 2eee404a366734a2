import { z } from "zod";
import type { ClientMessage, ServerMessage } from "../shared/types";
import type { Editor } from "./editor";
import { isAppError, toErrorMessage } from "./errors";
import type { RemoteInput } from "./input/remote-input";

type WebSocketLike = {
	send: (payload: string) => void;
	on: {
		(event: "message", listener: (raw: Buffer | string) => void): void;
		(event: "close", listener: () => void): void;
		(event: "error", listener: (error: Error) => void): void;
	};
};

export interface WebSocketDeps {
	editor: Pick<Editor, "controller" | "events">;
	input: Pick<RemoteInput, "dispatchKey" | "updatePointer">;
}

const clientMessageSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("input:key"),
		key: z.string().min(1),
		requestId: z.string().optional(),
	}),
	z.object({
		type: z.literal("input:pointer"),
		x: z.number().int(),
		y: z.number().int(),
		requestId: z.string().optional(),
	}),
	z.object({
		type: z.literal("slide:select"),
		imagePath: z.string().min(1),
		requestId: z.string().optional(),
	}),
]);

function sendEnvelope(socket: WebSocketLike, message: ServerMessage): void {
	socket.send(JSON.stringify(message));
}

function extractRequestId(value: unknown): string | undefined {
	if (typeof value !== "object" || value === null || !("requestId" in value)) {
		return undefined;
	}
	return typeof value.requestId === "string" ? value.requestId : undefined;
}

/**
 * WebSocket connection handler.
 * Forwards editor events to the client and relays its key/pointer input
 * and slide selection into the editor.
 */
export function handleWebSocket(
	socket: WebSocketLike,
	deps: WebSocketDeps,
): void {
	console.log("[ws] Client connected");
	const { events } = deps.editor;

	const unsubscribers = [
		events.slideAdded.subscribe((payload) => {
			sendEnvelope(socket, { type: "slide:added", ...payload });
		}),
		events.selectionChanged.subscribe((payload) => {
			sendEnvelope(socket, { type: "slide:selected", ...payload });
		}),
		events.projectChanged.subscribe((payload) => {
			sendEnvelope(socket, { type: "project:changed", ...payload });
		}),
		events.captureMode.subscribe((payload) => {
			sendEnvelope(socket, { type: "capture:mode", ...payload });
		}),
		events.captureFailed.subscribe((payload) => {
			sendEnvelope(socket, { type: "capture:failed", ...payload });
		}),
	];

	socket.on("message", (raw: Buffer | string) => {
		handleIncomingMessage(socket, raw, deps);
	});

	socket.on("close", () => {
		for (const unsubscribe of unsubscribers) {
			unsubscribe();
		}
		console.log("[ws] Client disconnected");
	});

	socket.on("error", (err: Error) => {
		console.error("[ws] Socket error:", err.message);
	});
}

function handleIncomingMessage(
	socket: WebSocketLike,
	raw: Buffer | string,
	deps: WebSocketDeps,
): void {
	let parsed: unknown;
	try {
		parsed = JSON.parse(typeof raw === "string" ? raw : raw.toString("utf-8"));
	} catch {
		sendEnvelope(socket, { type: "error", message: "Invalid JSON" });
		return;
	}

	const result = clientMessageSchema.safeParse(parsed);
	if (!result.success) {
		sendEnvelope(socket, {
			type: "error",
			requestId: extractRequestId(parsed),
			message: "Invalid message format",
		});
		return;
	}

	try {
		routeMessage(result.data, deps);
	} catch (error) {
		console.error("[ws] Failed to handle message:", error);
		sendEnvelope(socket, {
			type: "error",
			requestId: result.data.requestId,
			code: isAppError(error) ? error.code : undefined,
			message: toErrorMessage(error),
		});
	}
}

function routeMessage(message: ClientMessage, deps: WebSocketDeps): void {
	switch (message.type) {
		case "input:key":
			deps.input.dispatchKey(message.key);
			return;
		case "input:pointer":
			deps.input.updatePointer(message.x, message.y);
			return;
		case "slide:select":
			deps.editor.controller.selectSlide(message.imagePath);
			return;
	}
}
