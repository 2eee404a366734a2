import type { FileSystem } from "../../server/store/store-types";

/** In-memory FileSystem with "/" separators and switchable failures. */
export class FakeFileSystem implements FileSystem {
	readonly separator = "/";
	readonly files = new Map<string, string>();
	readonly directories = new Set<string>();
	readonly readOnlyDirectories = new Set<string>();
	failCreateDirectory = false;
	failWrites = false;

	async exists(path: string): Promise<boolean> {
		return this.files.has(path) || this.directories.has(path);
	}

	async createDirectory(path: string): Promise<boolean> {
		if (this.failCreateDirectory) {
			return false;
		}
		this.directories.add(path);
		return true;
	}

	async isWritableDirectory(path: string): Promise<boolean> {
		return this.directories.has(path) && !this.readOnlyDirectories.has(path);
	}

	async readText(path: string): Promise<string | null> {
		return this.files.get(path) ?? null;
	}

	async writeText(path: string, content: string): Promise<boolean> {
		if (this.failWrites) {
			return false;
		}
		this.files.set(path, content);
		return true;
	}

	async copy(source: string, destination: string): Promise<boolean> {
		const content = this.files.get(source);
		if (content === undefined) {
			return false;
		}
		this.files.set(destination, content);
		return true;
	}
}
