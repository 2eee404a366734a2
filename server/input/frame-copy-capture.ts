import { extname } from "node:path";
import type { ScreenCapture } from "../capture/capture-types";
import { AppError } from "../errors";
import type { FileSystem } from "../store/store-types";

export interface FrameCopyCaptureOptions {
	/** Frame file kept up to date by an external screenshot tool */
	sourcePath?: string;
	now?: () => number;
}

const MAX_NAME_ATTEMPTS = 100;

/**
 * ScreenCapture that copies the latest frame written by an external tool
 * into the project directory. Returns the new file name relative to the
 * project directory.
 */
export class FrameCopyCapture implements ScreenCapture {
	private counter = 0;
	private readonly sourcePath?: string;
	private readonly now: () => number;

	constructor(
		private readonly fileSystem: FileSystem,
		options: FrameCopyCaptureOptions = {},
	) {
		this.sourcePath = options.sourcePath;
		this.now = options.now ?? Date.now;
	}

	async takeScreen(targetDir: string): Promise<string> {
		const source = this.sourcePath;
		if (!source) {
			throw new AppError(
				"CAPTURE_FAILED",
				"No capture source configured (set CAPTURE_SOURCE)",
				{ operation: "takeScreen", projectDir: targetDir },
			);
		}
		if (!(await this.fileSystem.exists(source))) {
			throw new AppError(
				"CAPTURE_FAILED",
				`Capture source not found: ${source}`,
				{ operation: "takeScreen", projectDir: targetDir },
			);
		}

		const extension = extname(source) || ".png";
		const stamp = this.now();
		for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
			this.counter += 1;
			const name = `screen-${stamp}-${this.counter}${extension}`;
			const destination = `${targetDir}${this.fileSystem.separator}${name}`;
			if (await this.fileSystem.exists(destination)) {
				continue;
			}
			if (!(await this.fileSystem.copy(source, destination))) {
				throw new AppError(
					"CAPTURE_FAILED",
					`Unable to copy capture into ${targetDir}`,
					{ operation: "takeScreen", projectDir: targetDir },
				);
			}
			return name;
		}
		throw new AppError(
			"CAPTURE_FAILED",
			`No free image name in ${targetDir}`,
			{ operation: "takeScreen", projectDir: targetDir },
		);
	}
}
