import {
	bmpUtf8ToUtf16,
	encodeUtf8Scalar,
	utf8ByteLength,
	utf8Length,
	utf8Width,
} from "./util.js";

const CHAR_FORWARD_SLASH = 47; /* / */
const CHAR_BACKWARD_SLASH = 92; /* \ */
const CHAR_DOT = 46; /* . */
const CHAR_COLON = 58; /* : */
const CHAR_QUESTION_MARK = 63; /* ? */

/**
 * Windows path type, decided by the first few characters of a path.
 *
 * @remarks
 *
 * Parsing the kind never fails, even for broken or invalid paths: every string has exactly one kind.
 * `drive` is the UTF-16 code unit of the drive letter, which may be any character of the Basic Multilingual
 * Plane, not only `A`-`Z`.
 *
 * - `Drive`: a traditional drive path such as `C:\`.
 * - `Unc`: a network path such as `\\server\share\`.
 * - `Device`: a device path such as `\\.\COM1`.
 * - `Verbatim`: starts with exactly `\\?\`; passed to the kernel without parsing.
 * - `DriveRelative`: a DOS drive relative path such as `C:file`.
 * - `RootRelative`: a DOS root relative path such as `\file`.
 * - `CurrentDirectoryRelative`: anything else.
 */
export type WinPathKind =
	| { readonly type: "Drive"; readonly drive: number }
	| { readonly type: "Unc" }
	| { readonly type: "Device" }
	| { readonly type: "Verbatim" }
	| { readonly type: "DriveRelative"; readonly drive: number }
	| { readonly type: "RootRelative" }
	| { readonly type: "CurrentDirectoryRelative" };

export const WinPathKind = {
	unc: { type: "Unc" },
	device: { type: "Device" },
	verbatim: { type: "Verbatim" },
	rootRelative: { type: "RootRelative" },
	currentDirectoryRelative: { type: "CurrentDirectoryRelative" },
	drive: (drive: number): WinPathKind => ({ type: "Drive", drive }),
	driveRelative: (drive: number): WinPathKind => ({
		type: "DriveRelative",
		drive,
	}),
} as const;

/**
 * The kind of a relative path, i.e. what it has to be joined to.
 */
export type Win32Relative =
	| { readonly type: "CurrentDirectory" }
	| { readonly type: "DriveRelative"; readonly drive: number }
	| { readonly type: "Root" };

/**
 * The kind of a non-verbatim absolute path.
 */
export type Win32Absolute =
	| { readonly type: "Drive"; readonly drive: number }
	| { readonly type: "Unc" }
	| { readonly type: "Device" };

/**
 * Result of {@link classify}.
 *
 * @remarks
 *
 * `prefixLength` counts UTF-16 code units and can be used to slice the string directly. `utf8PrefixLength`
 * is the same prefix measured in UTF-8 bytes, for consumers holding encoded buffers.
 */
export interface WinPathClassification {
	readonly kind: WinPathKind;
	readonly prefixLength: number;
	readonly utf8PrefixLength: number;
}

function isPathSeparator(code: number): boolean {
	return code === CHAR_FORWARD_SLASH || code === CHAR_BACKWARD_SLASH;
}

function isSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdfff;
}

/**
 * Whether `path` starts with exactly `\\?\`.
 *
 * @remarks
 *
 * This is an exact match: `//?/` is not a verbatim path.
 */
export function isVerbatim(path: string): boolean {
	return path.startsWith("\\\\?\\");
}

/**
 * Examine the path prefix to find the type of the path given.
 */
export function kindOf(path: string): WinPathKind {
	if (path.length === 0) return WinPathKind.currentDirectoryRelative;
	if (isVerbatim(path)) return WinPathKind.verbatim;

	const first = path.charCodeAt(0);
	if (first > 0x7f) return nonAsciiKind(path);

	// The order of these checks matters: each one assumes the previous failed.
	const second = path.charCodeAt(1);
	const third = path.charCodeAt(2);
	if (isPathSeparator(first) && isPathSeparator(second)) {
		if (
			(third === CHAR_DOT || third === CHAR_QUESTION_MARK) &&
			isPathSeparator(path.charCodeAt(3))
		) {
			return WinPathKind.device;
		}
		return WinPathKind.unc;
	}
	if (isPathSeparator(first)) return WinPathKind.rootRelative;
	if (second === CHAR_COLON) {
		return isPathSeparator(third)
			? WinPathKind.drive(first)
			: WinPathKind.driveRelative(first);
	}
	return WinPathKind.currentDirectoryRelative;
}

// A non-ASCII first scalar can only start a drive, a drive relative or a
// plain relative path.
function nonAsciiKind(path: string): WinPathKind {
	const codePoint = path.codePointAt(0) ?? 0;
	if (isSurrogate(codePoint)) return WinPathKind.currentDirectoryRelative;
	const bytes = encodeUtf8Scalar(codePoint);
	// Scalars needing a surrogate pair cannot match any prefix.
	if (utf8Length(bytes[0] ?? 0) > 3) {
		return WinPathKind.currentDirectoryRelative;
	}
	if (path.charCodeAt(1) !== CHAR_COLON) {
		return WinPathKind.currentDirectoryRelative;
	}
	const drive = bmpUtf8ToUtf16(bytes);
	return isPathSeparator(path.charCodeAt(2))
		? WinPathKind.drive(drive)
		: WinPathKind.driveRelative(drive);
}

/**
 * Number of UTF-16 code units in the fixed part of the kind's prefix.
 *
 * @remarks
 *
 * For `Unc` this is only the leading `\\`; {@link classify} adds the server and share.
 */
export function kindUtf16Length(kind: WinPathKind): number {
	switch (kind.type) {
		case "Drive":
			return 3;
		case "Unc":
			return 2;
		case "Device":
		case "Verbatim":
			return 4;
		case "DriveRelative":
			return 2;
		case "RootRelative":
			return 1;
		case "CurrentDirectoryRelative":
			return 0;
	}
}

/**
 * Number of UTF-8 bytes in the fixed part of the kind's prefix.
 */
export function kindUtf8Length(kind: WinPathKind): number {
	switch (kind.type) {
		case "Drive":
			return utf8Width(kind.drive) + 2;
		case "DriveRelative":
			return utf8Width(kind.drive) + 1;
		default:
			return kindUtf16Length(kind);
	}
}

/**
 * Is the path absolute, meaning it doesn't need to be joined to a base path (the current directory, or a
 * drive's current directory).
 */
export function isAbsoluteKind(kind: WinPathKind): boolean {
	switch (kind.type) {
		case "Drive":
		case "Unc":
		case "Device":
		case "Verbatim":
			return true;
		default:
			return false;
	}
}

/**
 * Is the path one of the weird relative forms inherited from DOS.
 *
 * @remarks
 *
 * These should probably be rejected when read from a configuration file, but may be worth supporting for
 * command line arguments that come from the command prompt or a batch file.
 */
export function isLegacyRelativeKind(kind: WinPathKind): boolean {
	return kind.type === "DriveRelative" || kind.type === "RootRelative";
}

/**
 * The relative kind, or `undefined` for absolute paths.
 */
export function toWin32Relative(kind: WinPathKind): Win32Relative | undefined {
	switch (kind.type) {
		case "CurrentDirectoryRelative":
			return { type: "CurrentDirectory" };
		case "DriveRelative":
			return { type: "DriveRelative", drive: kind.drive };
		case "RootRelative":
			return { type: "Root" };
		default:
			return undefined;
	}
}

/**
 * The absolute kind, or `undefined` for relative and verbatim paths.
 */
export function toWin32Absolute(kind: WinPathKind): Win32Absolute | undefined {
	switch (kind.type) {
		case "Drive":
			return { type: "Drive", drive: kind.drive };
		case "Unc":
			return { type: "Unc" };
		case "Device":
			return { type: "Device" };
		default:
			return undefined;
	}
}

/**
 * Length of the `server\share\` part of a UNC path, given the text after the leading `\\`.
 *
 * @remarks
 *
 * The trailing separator is included. A missing share or separator extends the prefix to the end of the text.
 */
function uncPrefixLength(path: string): number {
	const server = path.search(/[\\/]/);
	if (server === -1) return path.length;
	const share = path.slice(server + 1).search(/[\\/]/);
	if (share === -1) return path.length;
	return server + 1 + share + 1;
}

/**
 * Classify a path and measure its prefix.
 *
 * @remarks
 *
 * The prefix of a UNC path covers `\\server\share\`; for every other kind it is the fixed prefix of the kind
 * (for example `C:\` or `\\.\`). Classification is purely lexical and total.
 *
 * @example
 * ```ts
 * classify("\\\\server\\share\\x");
 * // { kind: { type: "Unc" }, prefixLength: 15, utf8PrefixLength: 15 }
 * classify("C:file");
 * // { kind: { type: "DriveRelative", drive: 67 }, prefixLength: 2, utf8PrefixLength: 2 }
 * ```
 */
export function classify(path: string): WinPathClassification {
	const kind = kindOf(path);
	let prefixLength = kindUtf16Length(kind);
	let utf8PrefixLength = kindUtf8Length(kind);
	if (kind.type === "Unc") {
		const server = path.slice(prefixLength);
		const extra = uncPrefixLength(server);
		utf8PrefixLength += utf8ByteLength(server.slice(0, extra));
		prefixLength += extra;
	}
	return { kind, prefixLength, utf8PrefixLength };
}

/**
 * Split the path into its kind and the rest of the path.
 *
 * @remarks
 *
 * Only the smallest part needed to identify the kind is split off: `\\server\share\file.txt` splits as
 * `Unc` and `server\share\file.txt`.
 */
export function splitKind(path: string): [WinPathKind, string] {
	const kind = kindOf(path);
	return [kind, path.slice(kindUtf16Length(kind))];
}

/**
 * What a verbatim path stands for once its `\\?\` is removed.
 */
export interface VerbatimParts {
	readonly kind: Win32Absolute;
	/** The path after `\\?\`, and after `UNC` for UNC paths. */
	readonly rest: string;
}

/**
 * Get the Win32 kind of a verbatim path.
 *
 * @remarks
 *
 * `\\?\UNC\server\share` is a UNC path, `\\?\C:\x` (or `\\?\C:`) a drive path and anything else is used as a
 * device path. `UNC` is matched in its canonical upper case only.
 *
 * @returns `undefined` when the path is not verbatim.
 */
export function splitVerbatim(path: string): VerbatimParts | undefined {
	if (!isVerbatim(path)) return undefined;
	const rest = path.slice(kindUtf16Length(WinPathKind.verbatim));
	if (rest === "UNC" || rest.startsWith("UNC\\")) {
		return { kind: { type: "Unc" }, rest: rest.slice("UNC".length) };
	}
	const drive = rest.charCodeAt(0);
	if (
		rest.charCodeAt(1) === CHAR_COLON &&
		(rest.length === 2 || rest.charCodeAt(2) === CHAR_BACKWARD_SLASH) &&
		!isSurrogate(drive)
	) {
		return { kind: { type: "Drive", drive }, rest };
	}
	return { kind: { type: "Device" }, rest };
}

/**
 * A path split at the end of its prefix.
 *
 * @remarks
 *
 * Holds the original string and the prefix offsets only; the prefix and subpath are sliced on demand and
 * `prefix + subpath` is always the original string.
 */
export class ParsedWinPath {
	readonly kind: WinPathKind;
	readonly prefixLength: number;
	readonly utf8PrefixLength: number;

	constructor(readonly path: string) {
		const { kind, prefixLength, utf8PrefixLength } = classify(path);
		this.kind = kind;
		this.prefixLength = prefixLength;
		this.utf8PrefixLength = utf8PrefixLength;
	}

	get prefix(): string {
		return this.path.slice(0, this.prefixLength);
	}

	get subpath(): string {
		return this.path.slice(this.prefixLength);
	}

	/** The `[prefix, subpath]` pair. */
	parts(): [string, string] {
		return [this.prefix, this.subpath];
	}

	/**
	 * The canonical spelling of the prefix for this kind.
	 *
	 * @remarks
	 *
	 * Separators become `\`. A device prefix keeps its `.` or `?` marker. UNC paths only get the leading `\\`
	 * because the server and share are rebuilt by the cleaner.
	 */
	normalizedPrefix(): string {
		switch (this.kind.type) {
			case "DriveRelative":
				return this.prefix;
			case "Drive":
				return `${this.prefix.slice(0, -1)}\\`;
			case "Verbatim":
				return "\\\\?\\";
			case "Device":
				return `\\\\${this.path.charAt(2)}\\`;
			case "CurrentDirectoryRelative":
				return "";
			case "RootRelative":
				return "\\";
			case "Unc":
				return "\\\\";
		}
	}
}
