import { AppError, type AppErrorCode, isAppError } from "../errors";
import type { EditorEvents } from "../events/editor-events";
import { SlideModel } from "../slides/slide-model";
import type { Slide } from "../slides/slide-types";
import type { FileSystem } from "../store/store-types";
import type {
	AppendedSlide,
	CloseCheck,
	Project,
	ProjectSnapshot,
	ProjectStatus,
	ProjectView,
} from "./project-types";
import { SerialQueue } from "./serial-queue";

export const DEFAULT_DOCUMENT_NAME = "presentation.dahu";

export interface ProjectControllerDeps {
	fileSystem: FileSystem;
	events: EditorEvents;
	/** File name of the project document inside the project directory */
	documentName?: string;
	/** Reports whether capture mode is on; create/open/save are refused then. */
	isCapturing?: () => boolean;
}

/**
 * Owns the single active project and its unsaved-changes flag.
 * Create, open and save run through one serial queue, shared with capture
 * triggers, so no two mutations of the project interleave.
 */
export class ProjectController {
	private project: Project | null = null;
	private selectedSlide: string | null = null;
	private readonly queue = new SerialQueue();
	private readonly fileSystem: FileSystem;
	private readonly events: EditorEvents;
	private readonly documentName: string;
	private readonly isCapturing: () => boolean;

	constructor(deps: ProjectControllerDeps) {
		this.fileSystem = deps.fileSystem;
		this.events = deps.events;
		this.documentName = deps.documentName ?? DEFAULT_DOCUMENT_NAME;
		this.isCapturing = deps.isCapturing ?? (() => false);
	}

	/** Start a new, empty project in `dir`, creating the directory if needed. */
	createProject(dir: string): Promise<ProjectSnapshot> {
		return this.queue.run(async () => {
			const context = { operation: "createProject", projectDir: dir };
			this.assertNotCapturing("create a new project", context);

			const exists = await this.callFileSystem(
				"DIRECTORY_UNAVAILABLE",
				context,
				() => this.fileSystem.exists(dir),
			);
			if (!exists) {
				const created = await this.callFileSystem(
					"DIRECTORY_UNAVAILABLE",
					context,
					() => this.fileSystem.createDirectory(dir),
				);
				if (!created) {
					throw new AppError(
						"DIRECTORY_UNAVAILABLE",
						`Unable to create directory: ${dir}`,
						context,
					);
				}
			}
			const writable = await this.callFileSystem(
				"DIRECTORY_UNAVAILABLE",
				context,
				() => this.fileSystem.isWritableDirectory(dir),
			);
			if (!writable) {
				throw new AppError(
					"DIRECTORY_UNAVAILABLE",
					`Directory is not writable: ${dir}`,
					context,
				);
			}

			// Capture mode may have been entered while the directory checks ran.
			this.assertNotCapturing("create a new project", context);
			this.install(dir, SlideModel.createEmpty(), "created");
			console.log(`[project] Project created in ${dir}`);
			return this.requireSnapshot();
		});
	}

	/** Load `dir`'s project document. The active project is kept on any failure. */
	openProject(dir: string): Promise<ProjectSnapshot> {
		return this.queue.run(async () => {
			const context = { operation: "openProject", projectDir: dir };
			this.assertNotCapturing("open a project", context);

			const documentPath = this.documentPath(dir);
			const exists = await this.callFileSystem(
				"PROJECT_NOT_FOUND",
				context,
				() => this.fileSystem.exists(documentPath),
			);
			if (!exists) {
				throw new AppError(
					"PROJECT_NOT_FOUND",
					`No project document at ${documentPath}`,
					context,
				);
			}
			const text = await this.callFileSystem("PROJECT_NOT_FOUND", context, () =>
				this.fileSystem.readText(documentPath),
			);
			if (text === null) {
				throw new AppError(
					"PROJECT_NOT_FOUND",
					`Unable to read project document ${documentPath}`,
					context,
				);
			}

			const model = SlideModel.createEmpty();
			try {
				model.fromDocument(text);
			} catch (error) {
				if (isAppError(error)) {
					throw error.withContext(context);
				}
				throw error;
			}

			this.assertNotCapturing("open a project", context);
			this.install(dir, model, "opened");
			console.log(`[project] Project opened from ${dir} (${model.size} slides)`);
			return this.requireSnapshot();
		});
	}

	/** Persist the active project's document. Clears the dirty flag on success. */
	saveProject(): Promise<{ documentPath: string }> {
		return this.queue.run(async () => {
			const project = this.project;
			if (!project) {
				console.warn("[project] Can't save as there is no project selected");
				throw new AppError("NO_ACTIVE_PROJECT", "No project is open", {
					operation: "saveProject",
				});
			}
			const context = {
				operation: "saveProject",
				projectDir: project.projectDir,
			};
			if (this.isCapturing()) {
				console.warn("[project] Can't save a project while capture mode is on");
				throw new AppError(
					"SAVE_WHILE_CAPTURING",
					"Cannot save while capture mode is on",
					context,
				);
			}

			const documentPath = this.documentPath(project.projectDir);
			const content = JSON.stringify(project.model.toDocument(), null, 2);
			const written = await this.callFileSystem(
				"PERSISTENCE_FAILED",
				context,
				() => this.fileSystem.writeText(documentPath, content),
			);
			if (!written) {
				console.error(
					`[project] Failed to save project in ${project.projectDir}`,
				);
				throw new AppError(
					"PERSISTENCE_FAILED",
					`Unable to write ${documentPath}`,
					context,
				);
			}

			project.hasUnsavedChanges = false;
			console.log(`[project] Project saved in ${project.projectDir}`);
			return { documentPath };
		});
	}

	/** Queue a task behind any in-flight create/open/save/capture. */
	runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
		return this.queue.run(task);
	}

	/** Read-only view of the active project, as of this call for the dirty flag. */
	getActiveProject(): ProjectView | null {
		const project = this.project;
		if (!project) {
			return null;
		}
		return Object.freeze({
			projectDir: project.projectDir,
			status: project.status,
			hasUnsavedChanges: project.hasUnsavedChanges,
			model: project.model.asReadOnly(),
		});
	}

	/** Append a slide to the active project and mark it dirty. */
	appendSlide(imagePath: string, x: number, y: number): AppendedSlide {
		const project = this.project;
		if (!project) {
			throw new AppError("NO_ACTIVE_PROJECT", "No project is open", {
				operation: "appendSlide",
			});
		}
		let slide: Slide;
		try {
			slide = project.model.addSlide(imagePath, x, y);
		} catch (error) {
			if (isAppError(error)) {
				throw error.withContext({
					operation: "appendSlide",
					projectDir: project.projectDir,
				});
			}
			throw error;
		}
		project.hasUnsavedChanges = true;
		return { slide, index: project.model.size - 1 };
	}

	markDirty(): void {
		if (!this.project) {
			throw new AppError("NO_ACTIVE_PROJECT", "No project is open", {
				operation: "markDirty",
			});
		}
		this.project.hasUnsavedChanges = true;
	}

	isDirty(): boolean {
		return this.project?.hasUnsavedChanges ?? false;
	}

	/** Make `imagePath` the current slide. Returns false when it already was. */
	selectSlide(imagePath: string): boolean {
		const project = this.project;
		if (!project) {
			throw new AppError("NO_ACTIVE_PROJECT", "No project is open", {
				operation: "selectSlide",
			});
		}
		if (!project.model.hasSlide(imagePath)) {
			throw new AppError("SLIDE_NOT_FOUND", `Unknown slide: ${imagePath}`, {
				operation: "selectSlide",
				projectDir: project.projectDir,
			});
		}
		if (this.selectedSlide === imagePath) {
			return false;
		}
		this.selectedSlide = imagePath;
		this.events.selectionChanged.publish({
			projectDir: project.projectDir,
			imagePath,
		});
		return true;
	}

	getSelectedSlide(): string | null {
		return this.selectedSlide;
	}

	/** The caller decides whether to quit; this only says if work would be lost. */
	requestClose(): CloseCheck {
		if (this.isDirty()) {
			return {
				requiresConfirmation: true,
				message: "Quit without saving any changes?",
			};
		}
		return {
			requiresConfirmation: false,
			message: "Are you sure you want to quit?",
		};
	}

	getSnapshot(): ProjectSnapshot | null {
		const project = this.project;
		if (!project) {
			return null;
		}
		return {
			projectDir: project.projectDir,
			status: project.status,
			hasUnsavedChanges: project.hasUnsavedChanges,
			selectedSlide: this.selectedSlide,
			slides: project.model.toDocument().slides,
		};
	}

	documentPath(dir: string): string {
		const separator = this.fileSystem.separator;
		const base = dir.endsWith(separator) ? dir.slice(0, -separator.length) : dir;
		return `${base}${separator}${this.documentName}`;
	}

	private install(dir: string, model: SlideModel, status: ProjectStatus): void {
		this.project = {
			projectDir: dir,
			model,
			status,
			hasUnsavedChanges: false,
		};
		this.selectedSlide = null;
		this.events.projectChanged.publish({
			projectDir: dir,
			status,
			slidePaths: [...model.slidePaths()],
		});
	}

	private requireSnapshot(): ProjectSnapshot {
		const snapshot = this.getSnapshot();
		if (!snapshot) {
			throw new AppError("NO_ACTIVE_PROJECT", "No project is open");
		}
		return snapshot;
	}

	private assertNotCapturing(
		action: string,
		context: { operation: string; projectDir: string },
	): void {
		if (this.isCapturing()) {
			console.warn(`[project] Can't ${action} while capture mode is on`);
			throw new AppError(
				"CAPTURE_MODE_ACTIVE",
				`Cannot ${action} while capture mode is on`,
				context,
			);
		}
	}

	/** Collaborators that throw instead of reporting failure are mapped to `code`. */
	private async callFileSystem<T>(
		code: AppErrorCode,
		context: { operation: string; projectDir: string },
		call: () => Promise<T>,
	): Promise<T> {
		try {
			return await call();
		} catch (error) {
			console.error(`[project] Filesystem fault during ${context.operation}:`, error);
			throw new AppError(
				code,
				`Filesystem failure during ${context.operation}`,
				context,
				error,
			);
		}
	}
}
