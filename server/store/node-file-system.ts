import { constants } from "node:fs";
import {
	access,
	copyFile,
	mkdir,
	readFile,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises";
import { dirname, sep } from "node:path";
import type { FileSystem } from "./store-types";

function errorCode(err: unknown): string | undefined {
	return typeof err === "object" && err !== null && "code" in err
		? String(err.code)
		: undefined;
}

/** FileSystem backed by node:fs. Failures are logged and reported as false/null. */
export class NodeFileSystem implements FileSystem {
	readonly separator = sep;

	async exists(path: string): Promise<boolean> {
		try {
			await access(path, constants.F_OK);
			return true;
		} catch {
			return false;
		}
	}

	async createDirectory(path: string): Promise<boolean> {
		try {
			await mkdir(path, { recursive: true });
			return true;
		} catch (err: unknown) {
			console.warn(
				`[fs] Unable to create directory ${path} (${errorCode(err) ?? "unknown"})`,
			);
			return false;
		}
	}

	async isWritableDirectory(path: string): Promise<boolean> {
		try {
			const info = await stat(path);
			if (!info.isDirectory()) {
				return false;
			}
			await access(path, constants.W_OK);
			return true;
		} catch {
			return false;
		}
	}

	async readText(path: string): Promise<string | null> {
		try {
			return await readFile(path, "utf-8");
		} catch (err: unknown) {
			if (errorCode(err) !== "ENOENT") {
				console.warn(`[fs] Unable to read content from ${path}`);
			}
			return null;
		}
	}

	/** Atomic write: temp file, then rename over the target. */
	async writeText(path: string, content: string): Promise<boolean> {
		const tmpPath = `${path}.tmp`;
		try {
			await mkdir(dirname(path), { recursive: true });
			await writeFile(tmpPath, content, "utf-8");
			await rename(tmpPath, path);
			return true;
		} catch (err: unknown) {
			console.error(
				`[fs] Unable to write content to ${path} (${errorCode(err) ?? "unknown"})`,
			);
			await this.removeQuietly(tmpPath);
			return false;
		}
	}

	private async removeQuietly(path: string): Promise<void> {
		try {
			await rm(path, { force: true });
		} catch (err: unknown) {
			console.warn(
				`[fs] Unable to remove ${path} (${errorCode(err) ?? "unknown"})`,
			);
		}
	}

	async copy(source: string, destination: string): Promise<boolean> {
		try {
			await mkdir(dirname(destination), { recursive: true });
			await copyFile(source, destination);
			return true;
		} catch (err: unknown) {
			console.warn(
				`[fs] Unable to copy ${source} to ${destination} (${errorCode(err) ?? "unknown"})`,
			);
			return false;
		}
	}
}
