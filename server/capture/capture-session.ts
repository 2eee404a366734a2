import { AppError, isAppError, toErrorMessage } from "../errors";
import type { EditorEvents } from "../events/editor-events";
import type { ProjectController } from "../projects/project-controller";
import type { Slide } from "../slides/slide-types";
import type {
	CaptureState,
	CursorPosition,
	KeyListener,
	KeySource,
	PointerInput,
	ScreenCapture,
	TriggerKeys,
} from "./capture-types";

export const DEFAULT_TRIGGER_KEYS: TriggerKeys = {
	capture: "f7",
	exit: "escape",
};

type CaptureHost = Pick<
	ProjectController,
	"getActiveProject" | "appendSlide" | "runExclusive"
>;

export interface CaptureSessionDeps {
	host: CaptureHost;
	screen: ScreenCapture;
	pointer: PointerInput;
	keys: KeySource;
	events: EditorEvents;
	triggerKeys?: TriggerKeys;
}

/**
 * Capture mode: while armed, the capture key records a new slide into the
 * active project and the exit key disarms.
 */
export class CaptureSession {
	private armed = false;
	private readonly host: CaptureHost;
	private readonly screen: ScreenCapture;
	private readonly pointer: PointerInput;
	private readonly keys: KeySource;
	private readonly events: EditorEvents;
	private readonly captureKey: string;
	private readonly exitKey: string;

	// One stable listener, so add/remove always pair up.
	private readonly onKey: KeyListener = (key) => {
		void this.handleKey(key);
	};

	constructor(deps: CaptureSessionDeps) {
		this.host = deps.host;
		this.screen = deps.screen;
		this.pointer = deps.pointer;
		this.keys = deps.keys;
		this.events = deps.events;
		const triggerKeys = deps.triggerKeys ?? DEFAULT_TRIGGER_KEYS;
		this.captureKey = triggerKeys.capture.toLowerCase();
		this.exitKey = triggerKeys.exit.toLowerCase();
	}

	get state(): CaptureState {
		return this.armed ? "armed" : "disarmed";
	}

	isArmed(): boolean {
		return this.armed;
	}

	/** Arm capture mode. No-op when already armed. */
	enter(): void {
		if (this.armed) {
			return;
		}
		if (!this.host.getActiveProject()) {
			throw new AppError(
				"NO_ACTIVE_PROJECT",
				"Open or create a project before entering capture mode",
				{ operation: "enterCaptureMode" },
			);
		}
		this.keys.addKeyListener(this.onKey);
		this.armed = true;
		console.log("[capture] Capture mode on");
		this.events.captureMode.publish({ armed: true });
	}

	/** Disarm capture mode. No-op when already disarmed. */
	exit(): void {
		if (!this.armed) {
			return;
		}
		this.keys.removeKeyListener(this.onKey);
		this.armed = false;
		console.log("[capture] Capture mode off");
		this.events.captureMode.publish({ armed: false });
	}

	/**
	 * Record one slide: screen image plus cursor position, appended to the
	 * active project. Resolves null when capture mode is off. A capture
	 * requested while armed still completes if capture mode is left before
	 * it runs.
	 */
	capture(): Promise<Slide | null> {
		if (!this.armed) {
			return Promise.resolve(null);
		}
		return this.host.runExclusive(async () => {
			const project = this.host.getActiveProject();
			if (!project) {
				throw new AppError("NO_ACTIVE_PROJECT", "No project is open", {
					operation: "capture",
				});
			}
			const context = {
				operation: "capture",
				projectDir: project.projectDir,
			};

			let imagePath: string;
			let position: CursorPosition;
			try {
				imagePath = await this.screen.takeScreen(project.projectDir);
				position = await this.pointer.getCursorPosition();
			} catch (error) {
				if (isAppError(error) && error.code === "CAPTURE_FAILED") {
					throw error.withContext(context);
				}
				throw new AppError(
					"CAPTURE_FAILED",
					`Screen capture failed: ${toErrorMessage(error)}`,
					context,
					error,
				);
			}

			const { slide, index } = this.host.appendSlide(
				imagePath,
				position.x,
				position.y,
			);
			this.events.slideAdded.publish({
				projectDir: project.projectDir,
				imagePath: slide.imagePath,
				index,
			});
			return slide;
		});
	}

	private async handleKey(key: string): Promise<void> {
		if (!this.armed) {
			return;
		}
		const normalized = key.toLowerCase();
		try {
			if (normalized === this.captureKey) {
				await this.capture();
			} else if (normalized === this.exitKey) {
				// Queued so captures already triggered land before disarming.
				await this.host.runExclusive(() => {
					this.exit();
				});
			}
		} catch (error) {
			this.reportFailure(error);
		}
	}

	private reportFailure(error: unknown): void {
		console.error("[capture] Capture trigger failed:", error);
		if (isAppError(error)) {
			this.events.captureFailed.publish({
				code: error.code,
				message: error.message,
				projectDir: error.context.projectDir,
			});
			return;
		}
		this.events.captureFailed.publish({
			code: "CAPTURE_FAILED",
			message: toErrorMessage(error),
		});
	}
}
