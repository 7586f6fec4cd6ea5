import { describe, expect, test } from "vitest";
import { PureWindowsPath, WindowsPath } from "../src/index.js";

const raw = String.raw;

describe("WindowsPath.parse", () => {
	test("cleans while building", () => {
		const tail = raw`Program Files \..\.\.\.\file.txt.. .. \.`;
		expect(WindowsPath.parse(`C:\\${tail}`).toString()).toBe(
			raw`C:\file.txt`,
		);
		expect(WindowsPath.parse(`\\\\server\\share\\${tail}`).toString()).toBe(
			raw`\\server\share\file.txt`,
		);
		expect(WindowsPath.parse(`pipe\\${tail}`).toString()).toBe(
			raw`pipe\file.txt`,
		);
		expect(
			WindowsPath.parse(raw`C:/Program Files /file.txt.. .. \.`).toString(),
		).toBe(raw`C:\Program Files\file.txt`);
	});

	test("trims the final file name", () => {
		expect(WindowsPath.parse("C:\\dir\\file. . ").toString()).toBe(
			raw`C:\dir\file`,
		);
		expect(WindowsPath.parse(raw`C:\a.\b`).toString()).toBe(raw`C:\a\b`);
		expect(WindowsPath.parse(raw`C:\a..\b`).toString()).toBe(raw`C:\a\b`);
	});

	test("normalizes the prefix", () => {
		expect(WindowsPath.parse("c:/dir").prefix).toBe("c:\\");
		expect(WindowsPath.parse("//server/share/dir").prefix).toBe(
			"\\\\server\\share\\",
		);
		expect(WindowsPath.parse(raw`\\server`).prefix).toBe("\\\\server\\");
		expect(WindowsPath.parse("C:dir").prefix).toBe("C:");
		expect(WindowsPath.parse("dir").prefix).toBe("");
	});

	test("exposes kind and subpath", () => {
		const relative = WindowsPath.parse("C:dir");
		expect(relative.kind).toEqual({ type: "DriveRelative", drive: 67 });
		expect(relative.isAbsolute()).toBe(false);

		const absolute = WindowsPath.parse(raw`C:\a\b`);
		expect(absolute.isAbsolute()).toBe(true);
		expect(absolute.subpath).toBeInstanceOf(PureWindowsPath);
		expect(absolute.subpath.toString()).toBe(raw`a\b`);
	});

	test("relative paths keep unresolved parents", () => {
		expect(WindowsPath.parse(raw`a\..\..\b`).toString()).toBe(raw`..\b`);
		expect(WindowsPath.parse(raw`..\..`).toString()).toBe(raw`..\..`);
	});

	test("parents stop at absolute and root relative prefixes", () => {
		expect(WindowsPath.parse(raw`C:\..\b`).toString()).toBe(raw`C:\b`);
		expect(WindowsPath.parse(raw`\..\b`).toString()).toBe(raw`\b`);
	});

	test("empty input", () => {
		expect(WindowsPath.parse("").toString()).toBe("");
	});

	test("verbatim paths are kept as given", () => {
		const path = WindowsPath.parse(raw`\\?\C:\path\..\file.`);
		expect(path.prefix).toBe("\\\\?\\");
		expect(path.toString()).toBe(raw`\\?\C:\path\..\file.`);
	});
});

describe("WindowsPath.push", () => {
	test("trims pushed components and reports it", () => {
		const path = WindowsPath.parse(raw`C:\dir`);
		expect(path.push("file. ")).toBe(true);
		expect(path.toString()).toBe(raw`C:\dir\file`);
		expect(path.push("a/b")).toBe(false);
		expect(path.toString()).toBe(raw`C:\dir\file\a\b`);
	});

	test("dot and dot-dot", () => {
		const path = WindowsPath.parse(raw`C:\a\b`);
		path.push("..");
		expect(path.toString()).toBe(raw`C:\a`);
		path.push("");
		expect(path.toString()).toBe("C:\\a\\");
		path.push(".");
		expect(path.toString()).toBe(raw`C:\a`);
	});

	test("verbatim pushes are literal", () => {
		const path = WindowsPath.parse(raw`\\?\C:\dir`);
		expect(path.push("sub/y.")).toBe(false);
		expect(path.toString()).toBe(raw`\\?\C:\dir\sub/y.`);
	});
});

describe("WindowsPath.pop and clear", () => {
	test("never remove the prefix", () => {
		const path = WindowsPath.parse(raw`C:\a\b`);
		expect(path.pop()).toBe(true);
		expect(path.toString()).toBe(raw`C:\a`);
		expect(path.pop()).toBe(true);
		expect(path.toString()).toBe("C:\\");
		expect(path.pop()).toBe(false);

		const other = WindowsPath.parse(raw`\\server\share\a\b`);
		other.clear();
		expect(other.toString()).toBe("\\\\server\\share\\");
		expect(JSON.stringify(other)).toBe('"\\\\\\\\server\\\\share\\\\"');
	});
});
