import {
	isAbsoluteKind,
	kindOf,
	ParsedWinPath,
	splitVerbatim,
	type Win32Absolute,
} from "./kind.js";

const SEPARATORS = /[\\/]/;

function isSeparatorChar(char: string): boolean {
	return char === "\\" || char === "/";
}

function isTrimmableChar(char: string): boolean {
	return char === "." || char === " ";
}

/**
 * Remove every trailing `.` and ` ` from a single component.
 */
export function trimFilename(component: string): string {
	let end = component.length;
	while (end > 0 && isTrimmableChar(component.charAt(end - 1))) end -= 1;
	return component.slice(0, end);
}

/**
 * Strip a single trailing dot, but not two or more. A lone `.` is kept.
 */
export function stripTrailingDot(component: string): string {
	return component !== "." &&
		component.endsWith(".") &&
		!component.endsWith("..")
		? component.slice(0, -1)
		: component;
}

/**
 * Strip trailing `.` and ` ` from a full path.
 *
 * @remarks
 *
 * A trailing `.` or `..` component is preserved: it names the current or parent directory rather than being
 * filename noise. That holds when it directly follows a separator or when it is all that remains after the
 * first `anchorLength` characters (the path prefix, e.g. the `C:` of `C:..`). A path made only of dots and
 * spaces is returned unchanged.
 *
 * @param path - Path to trim.
 * @param anchorLength - Length of the prefix that is not part of the trimmed name.
 */
export function trimFullPath(path: string, anchorLength = 0): string {
	let end = path.length;
	while (end > 0 && isTrimmableChar(path.charAt(end - 1))) end -= 1;
	if (end === 0) return path;
	const trimmed = path.slice(0, end);
	const rest = path.slice(end);
	if (
		(rest === "." || rest === "..") &&
		(trimmed.length <= anchorLength || isSeparatorChar(trimmed.charAt(end - 1)))
	) {
		return path;
	}
	return trimmed;
}

interface ReverseWalk {
	/** Surviving components, last component first. */
	components: string[];
	/** `..` components left over once every earlier component was consumed. */
	skip: number;
}

// `..` cancels the nearest component before it, so the subpath is read from
// the end and each `..` is carried left until a component absorbs it.
function walkBackwards(subpath: string): ReverseWalk {
	const components: string[] = [];
	let skip = 0;
	// Keep an empty final component so a trailing separator survives.
	if (isSeparatorChar(subpath.charAt(subpath.length - 1))) components.push("");
	const parts = subpath.split(SEPARATORS);
	for (let index = parts.length - 1; index >= 0; index -= 1) {
		const part = parts[index] ?? "";
		if (part === "" || part === ".") continue;
		if (part === "..") {
			skip += 1;
		} else if (skip > 0) {
			skip -= 1;
		} else {
			components.push(stripTrailingDot(part));
		}
	}
	return { components, skip };
}

// Rebuild `\\server\share\` from a UNC prefix. An empty share is dropped.
function uncPrefix(prefix: string, hasSubpath: boolean): string {
	const body = prefix.slice(2);
	const [server = "", share = ""] = body.split(SEPARATORS);
	let result = `\\\\${server}`;
	if (share) result += `\\${share}`;
	if (hasSubpath || isSeparatorChar(body.charAt(body.length - 1))) {
		result += "\\";
	}
	return result;
}

/**
 * Clean a Windows path without making it absolute or touching the filesystem.
 *
 * @remarks
 *
 * Reproduces the lexical cleaning Windows applies when a path is handed to its file APIs:
 *
 * - separators become `\` and repeated separators collapse;
 * - `.` components are removed and `..` removes the component before it;
 * - one trailing dot is stripped from each component, and trailing dots and spaces from the whole path;
 * - the prefix is normalised for its kind, broken UNC prefixes (missing or empty share) are repaired.
 *
 * `..` never climbs above an absolute or root relative prefix. On other relative paths unresolved `..`
 * components are kept at the start. Verbatim (`\\?\`) paths are returned untouched.
 *
 * A `//?/` prefix is not verbatim: it is a device path with a `?` marker, and is rebuilt as `\\?\`.
 *
 * @example
 * ```ts
 * clean("C:/path/./from/../to\\\\file..  ..."); // 'C:\\path\\to\\file'
 * clean("path\\..\\..\\to\\file"); // '..\\to\\file'
 * ```
 *
 * @returns The cleaned path. Never throws.
 */
export function clean(path: string): string {
	const parsed = new ParsedWinPath(path);
	const { kind } = parsed;
	if (kind.type === "Verbatim") return path;

	const { components, skip } = walkBackwards(parsed.subpath);
	components.reverse();
	if (skip > 0 && !isAbsoluteKind(kind) && kind.type !== "RootRelative") {
		components.unshift(...new Array<string>(skip).fill(".."));
	}

	const prefix =
		kind.type === "Unc"
			? uncPrefix(parsed.prefix, components.length > 0)
			: parsed.normalizedPrefix();
	// Only `C:` can sit directly before a bare `.` or `..`. A UNC prefix ends in
	// a server or share name, whose trailing dots are trimmed like any name.
	const anchor = kind.type === "DriveRelative" ? prefix.length : 0;
	return trimFullPath(prefix + components.join("\\"), anchor);
}

/**
 * Whether a single component survives a verbatim to Win32 to verbatim round trip unchanged.
 *
 * @remarks
 *
 * Assumes the component may be used as a file name. Empty names, names ending in `.` or a space, and names
 * containing `/` or NUL would be altered by Win32 parsing. DOS device names are not considered.
 */
export function isComponentWin32Safe(component: string): boolean {
	return !(
		component === "" ||
		component.endsWith(".") ||
		component.endsWith(" ") ||
		component.includes("/") ||
		component.includes("\0")
	);
}

/**
 * Whether every `\`-separated component of `path` is {@link isComponentWin32Safe}.
 *
 * @remarks
 *
 * One trailing `\` is ignored.
 */
export function isWin32Safe(path: string): boolean {
	const body = path.endsWith("\\") ? path.slice(0, -1) : path;
	return body.split("\\").every(isComponentWin32Safe);
}

function win32Candidate(kind: Win32Absolute, rest: string): [string, string] {
	switch (kind.type) {
		case "Drive":
			return [rest, rest];
		case "Unc":
			return [`\\${rest}`, rest.slice(1)];
		case "Device":
			return [`\\\\.\\${rest}`, rest];
	}
}

/**
 * Convert a verbatim path to the equivalent user-facing Win32 path, when that is lossless.
 *
 * @remarks
 *
 * `\\?\C:\x` becomes `C:\x`, `\\?\UNC\server\share\x` becomes `\\server\share\x` and any other verbatim path
 * becomes a `\\.\` device path. The conversion only happens when Win32 parsing would not change the path:
 * every component must be {@link isWin32Safe}, the kind must stay the same and {@link clean} must leave the
 * result unchanged. Otherwise, and for paths that are not verbatim, `path` is returned as is.
 *
 * @example
 * ```ts
 * toWin32Path("\\\\?\\C:\\path\\to\\file.txt"); // 'C:\\path\\to\\file.txt'
 * toWin32Path("\\\\?\\C:\\path\\to\\file."); // unchanged, the trailing dot would be trimmed
 * ```
 */
export function toWin32Path(path: string): string {
	const verbatim = splitVerbatim(path);
	if (!verbatim) return path;
	const [candidate, subpath] = win32Candidate(verbatim.kind, verbatim.rest);
	if (!isWin32Safe(subpath)) return path;
	if (kindOf(candidate).type !== verbatim.kind.type) return path;
	return clean(candidate) === candidate ? candidate : path;
}
