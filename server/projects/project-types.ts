import type { SlideModel } from "../slides/slide-model";
import type { Slide, SlideEntry, SlideList } from "../slides/slide-types";

export type ProjectStatus = "created" | "opened";

/**
 * The active project: a directory, its slide list and the unsaved-changes
 * flag. Owned by ProjectController.
 */
export interface Project {
	/** Directory holding the project document and captured images */
	readonly projectDir: string;
	readonly model: SlideModel;
	readonly status: ProjectStatus;
	/** True when the model diverges from the last persisted document */
	hasUnsavedChanges: boolean;
}

/** What callers outside the controller see of the active project. */
export interface ProjectView {
	readonly projectDir: string;
	readonly status: ProjectStatus;
	readonly hasUnsavedChanges: boolean;
	readonly model: SlideList;
}

export interface AppendedSlide {
	slide: Slide;
	/** Position of the new slide in the sequence */
	index: number;
}

/** Serializable view of the active project for the presentation layer. */
export interface ProjectSnapshot {
	projectDir: string;
	status: ProjectStatus;
	hasUnsavedChanges: boolean;
	selectedSlide: string | null;
	slides: SlideEntry[];
}

export interface CloseCheck {
	requiresConfirmation: boolean;
	message: string;
}
