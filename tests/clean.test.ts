import { describe, expect, test } from "vitest";
import {
	clean,
	isComponentWin32Safe,
	isWin32Safe,
	stripTrailingDot,
	toWin32Path,
	trimFilename,
	trimFullPath,
} from "../src/clean.js";
import { kindOf } from "../src/kind.js";

const raw = String.raw;

describe("trimFilename", () => {
	test("removes every trailing dot and space", () => {
		expect(trimFilename("file.txt. . ")).toBe("file.txt");
		expect(trimFilename("file.txt")).toBe("file.txt");
		expect(trimFilename("...")).toBe("");
	});
});

describe("stripTrailingDot", () => {
	test("strips one dot but leaves double dots", () => {
		expect(stripTrailingDot("to.")).toBe("to");
		expect(stripTrailingDot("to..")).toBe("to..");
		expect(stripTrailingDot("to")).toBe("to");
		expect(stripTrailingDot(".")).toBe(".");
	});
});

describe("trimFullPath", () => {
	test("trims the final name", () => {
		expect(trimFullPath(raw`C:\path\file. `)).toBe(raw`C:\path\file`);
		expect(trimFullPath("file..")).toBe("file");
	});

	test("keeps dot components after a separator", () => {
		expect(trimFullPath(raw`C:\path\.`)).toBe(raw`C:\path\.`);
		expect(trimFullPath(raw`C:\path\..`)).toBe(raw`C:\path\..`);
	});

	test("keeps dot components right after the anchor", () => {
		expect(trimFullPath("C:..", 2)).toBe("C:..");
		expect(trimFullPath("C:..")).toBe("C:");
	});

	test("paths of only dots and spaces are unchanged", () => {
		expect(trimFullPath("...")).toBe("...");
		expect(trimFullPath(". .")).toBe(". .");
	});
});

describe("clean", () => {
	const cases: [string, string][] = [
		["C:/path/to/file/", "C:\\path\\to\\file\\"],
		[raw`C:\path\to\file.. ...`, raw`C:\path\to\file`],
		[raw`C:\path\to\file\...`, "C:\\path\\to\\file\\"],
		[raw`C:\path\to.\file`, raw`C:\path\to\file`],
		[raw`C:\path\to..\file`, raw`C:\path\to..\file`],
		[raw`C:\path\to\file\.`, raw`C:\path\to\file`],
		[raw`C:\path\to\file\..`, raw`C:\path\to`],
		[raw`C:\a\file...`, raw`C:\a\file`],
		[raw`C:\a\..\file`, raw`C:\file`],
		[raw`C:\path\to\file\..\..\..\..`, "C:\\"],
		[raw`C:\path\\\to///file`, raw`C:\path\to\file`],
		["C:/path/./from/../to\\\\file..  ...", raw`C:\path\to\file`],
		[raw`path\to\file\..\..`, "path"],
		[raw`path\to\file\..\..\..`, ""],
		[raw`path\to\file\..\..\..\..`, ".."],
		[raw`path\to\file\..\..\..\..\..`, raw`..\..`],
		[raw`path\..\..\to\file`, raw`..\to\file`],
		[raw`\..\file`, raw`\file`],
		["C:..", "C:.."],
		["//server/share", raw`\\server\share`],
		["\\\\server\\share\\", "\\\\server\\share\\"],
		[raw`\\server`, raw`\\server`],
		[raw`\\server\\share`, raw`\\server\share`],
		[raw`\\server\share\path\..\file`, raw`\\server\share\file`],
		[raw`\\server\share.`, raw`\\server\share`],
		[raw`\\server\share..`, raw`\\server\share`],
		[raw`\\server\share. `, raw`\\server\share`],
		[raw`\\server.`, raw`\\server`],
		[raw`\\server\share\.`, "\\\\server\\share\\"],
		["//./pipe/name", raw`\\.\pipe\name`],
		[raw`//?/C:\path\to\file.. ...`, raw`\\?\C:\path\to\file`],
		[raw`\\?\C:\path\..\file.`, raw`\\?\C:\path\..\file.`],
		["", ""],
	];

	for (const [input, expected] of cases) {
		test(`clean(${JSON.stringify(input)})`, () => {
			expect(clean(input)).toBe(expected);
		});
	}

	test("cleaning is idempotent", () => {
		for (const [input] of cases) {
			const once = clean(input);
			expect(clean(once)).toBe(once);
		}
	});

	test("forward and back slashes are interchangeable", () => {
		expect(clean("C:/path\\to/file")).toBe(clean(raw`C:\path\to\file`));
		expect(clean("a/b/../c")).toBe(clean(raw`a\b\..\c`));
	});

	test("parent components never climb above an absolute prefix", () => {
		expect(clean(raw`C:\..\..\file`)).toBe(raw`C:\file`);
		expect(clean(raw`\\.\pipe\..\..\name`)).toBe(raw`\\.\name`);
	});
});

// mulberry32
function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function generatePaths(count: number, maxLength: number): string[] {
	const alphabet = ["\\", "/", ".", " ", "a", ":", "?", "C", "é"];
	const random = seededRandom(0x5eed);
	const paths: string[] = [];
	for (let n = 0; n < count; n += 1) {
		const length = Math.floor(random() * (maxLength + 1));
		let path = "";
		for (let i = 0; i < length; i += 1) {
			path += alphabet[Math.floor(random() * alphabet.length)] ?? "";
		}
		paths.push(path);
	}
	return paths;
}

function leadingParents(path: string): number {
	let count = 0;
	for (const part of path.split("\\")) {
		if (part !== "..") break;
		count += 1;
	}
	return count;
}

describe("clean over generated paths", () => {
	const paths = generatePaths(20_000, 8);
	const stableKinds = new Set([
		"Drive",
		"Unc",
		"Device",
		"Verbatim",
		"RootRelative",
	]);

	test("is idempotent", () => {
		const unstable = paths.filter((path) => {
			const once = clean(path);
			return clean(once) !== once;
		});
		expect(unstable).toEqual([]);
	});

	test("keeps prefixed kinds", () => {
		const changed = paths.filter((path) => {
			const before = kindOf(path).type;
			if (!stableKinds.has(before)) return false;
			// `//?/` is a device path that cleans to its `\\?\` spelling.
			const expected =
				before === "Device" && path.charAt(2) === "?" ? "Verbatim" : before;
			return kindOf(clean(path)).type !== expected;
		});
		expect(changed).toEqual([]);
	});

	test("one more parent adds one leading parent", () => {
		const miscounted = paths.filter((path) => {
			const cleaned = clean(path);
			if (kindOf(cleaned).type !== "CurrentDirectoryRelative") return false;
			const parented = clean(`..\\${cleaned}`);
			return leadingParents(parented) !== leadingParents(cleaned) + 1;
		});
		expect(miscounted).toEqual([]);
	});

	test("one more parent on known paths", () => {
		expect(clean(`..\\${clean("a")}`)).toBe(raw`..\a`);
		expect(clean(`..\\${clean(raw`..\a`)}`)).toBe(raw`..\..\a`);
		expect(clean(`..\\${clean(raw`a\..\..`)}`)).toBe(raw`..\..`);
		expect(clean(`..\\${clean("..")}`)).toBe(raw`..\..`);
	});
});

describe("isWin32Safe", () => {
	test("single components", () => {
		expect(isComponentWin32Safe("file.txt")).toBe(true);
		expect(isComponentWin32Safe("")).toBe(false);
		expect(isComponentWin32Safe("file.")).toBe(false);
		expect(isComponentWin32Safe("file ")).toBe(false);
		expect(isComponentWin32Safe("a/b")).toBe(false);
		expect(isComponentWin32Safe("a\0b")).toBe(false);
	});

	test("whole paths", () => {
		expect(isWin32Safe(raw`path\to\file.txt`)).toBe(true);
		expect(isWin32Safe("path\\to\\")).toBe(true);
		expect(isWin32Safe(raw`path\\to`)).toBe(false);
		expect(isWin32Safe(raw`path\to \file`)).toBe(false);
		expect(isWin32Safe("")).toBe(false);
	});
});

describe("toWin32Path", () => {
	test("drive paths", () => {
		expect(toWin32Path(raw`\\?\C:\path\to\file.txt`)).toBe(
			raw`C:\path\to\file.txt`,
		);
		expect(toWin32Path("\\\\?\\C:\\")).toBe("C:\\");
	});

	test("UNC paths", () => {
		expect(toWin32Path(raw`\\?\UNC\server\share\file`)).toBe(
			raw`\\server\share\file`,
		);
	});

	test("other verbatim paths become device paths", () => {
		expect(toWin32Path(raw`\\?\pipe\name`)).toBe(raw`\\.\pipe\name`);
	});

	test("lossy conversions are refused", () => {
		const lossy = [
			raw`\\?\C:\path\to\file.`,
			raw`\\?\C:\path\..\file`,
			raw`\\?\C:`,
			raw`\\?\a/b`,
		];
		for (const path of lossy) expect(toWin32Path(path)).toBe(path);
	});

	test("non-verbatim paths are returned as is", () => {
		expect(toWin32Path(raw`C:\file.`)).toBe(raw`C:\file.`);
	});
});
