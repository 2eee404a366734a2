/**
 * Filesystem collaborator. Every operation reports failure explicitly
 * (false / null) instead of throwing.
 */
export interface FileSystem {
	/** Path separator used when joining project paths */
	readonly separator: string;
	exists(path: string): Promise<boolean>;
	/** Create a directory and any missing parents. */
	createDirectory(path: string): Promise<boolean>;
	isWritableDirectory(path: string): Promise<boolean>;
	/** UTF-8 content, or null when the file cannot be read. */
	readText(path: string): Promise<string | null>;
	writeText(path: string, content: string): Promise<boolean>;
	copy(source: string, destination: string): Promise<boolean>;
}
