import { CaptureSession } from "./capture/capture-session";
import type {
	KeySource,
	PointerInput,
	ScreenCapture,
	TriggerKeys,
} from "./capture/capture-types";
import { type EditorEvents, createEditorEvents } from "./events/editor-events";
import { ProjectController } from "./projects/project-controller";
import type { FileSystem } from "./store/store-types";

export interface EditorDeps {
	fileSystem: FileSystem;
	screen: ScreenCapture;
	pointer: PointerInput;
	keys: KeySource;
	events?: EditorEvents;
	documentName?: string;
	triggerKeys?: TriggerKeys;
}

export interface Editor {
	controller: ProjectController;
	capture: CaptureSession;
	events: EditorEvents;
}

/** Wire a ProjectController and its CaptureSession around shared event buses. */
export function createEditor(deps: EditorDeps): Editor {
	const events = deps.events ?? createEditorEvents();
	let capture: CaptureSession | null = null;
	const controller = new ProjectController({
		fileSystem: deps.fileSystem,
		events,
		documentName: deps.documentName,
		isCapturing: () => capture?.isArmed() ?? false,
	});
	capture = new CaptureSession({
		host: controller,
		screen: deps.screen,
		pointer: deps.pointer,
		keys: deps.keys,
		events,
		triggerKeys: deps.triggerKeys,
	});
	return { controller, capture, events };
}
