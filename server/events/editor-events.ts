import type { AppErrorCode } from "../errors";
import type { ProjectStatus } from "../projects/project-types";
import { EventBus, type HandlerErrorReporter } from "./event-bus";

export interface SlideAddedEvent {
	projectDir: string;
	imagePath: string;
	index: number;
}

export interface SelectionChangedEvent {
	projectDir: string;
	imagePath: string;
}

/** Published when create/open installs a new active project. */
export interface ProjectChangedEvent {
	projectDir: string;
	status: ProjectStatus;
	slidePaths: string[];
}

export interface CaptureModeEvent {
	armed: boolean;
}

export interface CaptureFailedEvent {
	code: AppErrorCode;
	message: string;
	projectDir?: string;
}

/** The buses the editor publishes on; the presentation layer subscribes. */
export interface EditorEvents {
	slideAdded: EventBus<SlideAddedEvent>;
	selectionChanged: EventBus<SelectionChangedEvent>;
	projectChanged: EventBus<ProjectChangedEvent>;
	captureMode: EventBus<CaptureModeEvent>;
	captureFailed: EventBus<CaptureFailedEvent>;
}

export function createEditorEvents(
	reportError?: HandlerErrorReporter,
): EditorEvents {
	return {
		slideAdded: new EventBus<SlideAddedEvent>("slide:added", reportError),
		selectionChanged: new EventBus<SelectionChangedEvent>("slide:selected", reportError),
		projectChanged: new EventBus<ProjectChangedEvent>("project:changed", reportError),
		captureMode: new EventBus<CaptureModeEvent>("capture:mode", reportError),
		captureFailed: new EventBus<CaptureFailedEvent>("capture:failed", reportError),
	};
}
