export interface CursorPosition {
	x: number;
	y: number;
}

/** Produces a screen image inside `targetDir` and returns its path. */
export interface ScreenCapture {
	takeScreen(targetDir: string): Promise<string>;
}

export interface PointerInput {
	getCursorPosition(): Promise<CursorPosition>;
}

export type KeyListener = (key: string) => void;

/** Delivers discrete key events to registered listeners. */
export interface KeySource {
	addKeyListener(listener: KeyListener): void;
	removeKeyListener(listener: KeyListener): void;
}

/** Key names mapped to the two capture-mode triggers. */
export interface TriggerKeys {
	capture: string;
	exit: string;
}

export type CaptureState = "disarmed" | "armed";
