import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, sep } from "node:path";
import { NodeFileSystem } from "../../server/store/node-file-system";

describe("NodeFileSystem", () => {
	let tempDir: string;
	let fileSystem: NodeFileSystem;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "slide-capture-test-"));
		fileSystem = new NodeFileSystem();
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	it("uses the platform separator", () => {
		expect(fileSystem.separator).toBe(sep);
	});

	it("creates nested directories that are then writable", async () => {
		const dir = join(tempDir, "projects", "demo");

		expect(await fileSystem.exists(dir)).toBe(false);
		expect(await fileSystem.createDirectory(dir)).toBe(true);
		expect(await fileSystem.exists(dir)).toBe(true);
		expect(await fileSystem.isWritableDirectory(dir)).toBe(true);
	});

	it("does not treat a file as a writable directory", async () => {
		const file = join(tempDir, "notes.txt");
		writeFileSync(file, "x", "utf-8");

		expect(await fileSystem.isWritableDirectory(file)).toBe(false);
	});

	it("writes text atomically and reads it back", async () => {
		const file = join(tempDir, "demo", "presentation.dahu");

		expect(await fileSystem.writeText(file, '{"slides":[]}')).toBe(true);

		expect(readFileSync(file, "utf-8")).toBe('{"slides":[]}');
		expect(existsSync(`${file}.tmp`)).toBe(false);
		expect(await fileSystem.readText(file)).toBe('{"slides":[]}');
	});

	it("removes the temp file when the write cannot be completed", async () => {
		const file = join(tempDir, "presentation.dahu");
		mkdirSync(join(file, "occupied"), { recursive: true });

		expect(await fileSystem.writeText(file, '{"slides":[]}')).toBe(false);

		expect(existsSync(`${file}.tmp`)).toBe(false);
	});

	it("returns null when reading a missing file", async () => {
		expect(await fileSystem.readText(join(tempDir, "missing.dahu"))).toBeNull();
	});

	it("copies files and reports a missing source", async () => {
		const source = join(tempDir, "frame.png");
		const destination = join(tempDir, "project", "screen-1.png");
		writeFileSync(source, "frame-bytes", "utf-8");

		expect(await fileSystem.copy(source, destination)).toBe(true);
		expect(readFileSync(destination, "utf-8")).toBe("frame-bytes");
		expect(await fileSystem.copy(join(tempDir, "nope.png"), destination)).toBe(
			false,
		);
	});
});
