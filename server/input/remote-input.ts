import type {
	CursorPosition,
	KeyListener,
	KeySource,
	PointerInput,
} from "../capture/capture-types";

/**
 * Key and pointer input relayed by the presentation client over the
 * WebSocket. Holds the last reported cursor position.
 */
export class RemoteInput implements KeySource, PointerInput {
	private listeners: KeyListener[] = [];
	private position: CursorPosition = { x: 0, y: 0 };

	addKeyListener(listener: KeyListener): void {
		if (!this.listeners.includes(listener)) {
			this.listeners.push(listener);
		}
	}

	removeKeyListener(listener: KeyListener): void {
		this.listeners = this.listeners.filter((l) => l !== listener);
	}

	dispatchKey(key: string): void {
		for (const listener of this.listeners) {
			listener(key);
		}
	}

	updatePointer(x: number, y: number): void {
		this.position = { x, y };
	}

	async getCursorPosition(): Promise<CursorPosition> {
		return { ...this.position };
	}

	get listenerCount(): number {
		return this.listeners.length;
	}
}
