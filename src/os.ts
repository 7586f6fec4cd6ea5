/**
 * Boundary between the lexical core and the operating system.
 *
 * Everything else in this package works on text alone. The helpers here make paths absolute, which needs
 * state only the OS holds: the working directory and, on Windows, the per-drive current directories.
 *
 * NOTE ABOUT OMISSIONS
 * ---------------------
 * Win32's `GetFullPathNameW` is not reachable from Node without native bindings, so the Windows helpers
 * take a {@link FullPathResolver}: a function from a NUL-terminated UTF-16 buffer to another. The default
 * delegates to `node:path`'s `win32.resolve`, which consults the process working directory (and the
 * per-drive `=C:` environment variables on Windows hosts). Callers needing the exact kernel behaviour
 * can inject their own resolver.
 *
 * Every synchronous helper has an async counterpart without the `Sync` suffix. Errors are never swallowed:
 * invalid input is rejected with an {@link ErrnoError} (`EINVAL`) before any OS state is consulted, and
 * resolver failures propagate unchanged.
 */

import nodepath from "node:path";
import { invalidInput } from "./errors.js";
import { isVerbatim, type Win32Relative } from "./kind.js";
import { Component, POSIX_SEPARATOR, PurePosixPathBuf } from "./purepath.js";
import { toPromise } from "./util.js";

export { ErrnoError } from "./errors.js";

/**
 * Resolves a non-verbatim Windows path against the OS's current directory state.
 *
 * @remarks
 *
 * Receives and returns UTF-16 buffers terminated by a NUL unit, the shape Win32 file APIs use. It may throw;
 * the error reaches the caller as is.
 */
export type FullPathResolver = (widePath: Uint16Array) => Uint16Array;

export type WindowsAbsoluteOptions = {
	/** Replaces the default resolver built on `node:path`. */
	resolver?: FullPathResolver;
};

export type PosixAbsoluteOptions = {
	/** Absolute working directory to resolve against; defaults to `process.cwd()`. */
	cwd?: string;
};

const CHUNK = 0x2000;

/**
 * Encode a path as a NUL-terminated UTF-16 buffer.
 *
 * @throws {@link ErrnoError} (`EINVAL`) If the path contains a NUL character.
 */
export function toWide(path: string): Uint16Array {
	const wide = new Uint16Array(path.length + 1);
	for (let index = 0; index < path.length; index += 1) {
		const unit = path.charCodeAt(index);
		if (unit === 0) throw invalidInput("paths must not contain nulls", path);
		wide[index] = unit;
	}
	return wide;
}

/**
 * Decode a UTF-16 buffer up to its first NUL unit (or its end).
 */
export function fromWide(wide: Uint16Array): string {
	const terminator = wide.indexOf(0);
	const units = terminator === -1 ? wide : wide.subarray(0, terminator);
	let text = "";
	for (let start = 0; start < units.length; start += CHUNK) {
		text += String.fromCharCode(...units.subarray(start, start + CHUNK));
	}
	return text;
}

/**
 * Resolver used when none is supplied, backed by `node:path`'s `win32.resolve`.
 */
export const nodeFullPathResolver: FullPathResolver = (widePath) =>
	toWide(nodepath.win32.resolve(fromWide(widePath)));

/**
 * Make a Windows path absolute without resolving symlinks.
 *
 * @remarks
 *
 * Unlike canonicalisation the path does not need to exist. An empty path stays empty and verbatim paths are
 * returned unchanged; verbatim output is never produced from other input.
 *
 * @throws {@link ErrnoError} (`EINVAL`) If the path contains a NUL character.
 */
export function winAbsoluteSync(
	path: string,
	options?: WindowsAbsoluteOptions,
): string {
	if (path === "") return "";
	if (isVerbatim(path)) return path;
	const resolver = options?.resolver ?? nodeFullPathResolver;
	return fromWide(resolver(toWide(path)));
}

/**
 * Async variant of {@link winAbsoluteSync}.
 */
export function winAbsolute(
	path: string,
	options?: WindowsAbsoluteOptions,
): Promise<string> {
	return toPromise(() => winAbsoluteSync(path, options));
}

/**
 * Turn a relative Windows prefix into the absolute path it stands for.
 *
 * @remarks
 *
 * `CurrentDirectory` resolves `.\`, `Root` resolves `\` (the root of the current drive) and
 * `DriveRelative` resolves `X:`, the current directory of drive `X`.
 */
export function resolvePrefixSync(
	prefix: Win32Relative,
	options?: WindowsAbsoluteOptions,
): string {
	switch (prefix.type) {
		case "CurrentDirectory":
			return winAbsoluteSync(".\\", options);
		case "Root":
			return winAbsoluteSync("\\", options);
		case "DriveRelative":
			return winAbsoluteSync(`${String.fromCharCode(prefix.drive)}:`, options);
	}
}

/**
 * Async variant of {@link resolvePrefixSync}.
 */
export function resolvePrefix(
	prefix: Win32Relative,
	options?: WindowsAbsoluteOptions,
): Promise<string> {
	return toPromise(() => resolvePrefixSync(prefix, options));
}

// "If a pathname begins with two successive <slash> characters, the first
// component following the leading <slash> characters may be interpreted in an
// implementation-defined manner, although more than two leading <slash>
// characters shall be treated as a single <slash> character."
// IEEE Std 1003.1-2017, 4.13 Pathname Resolution.
function posixRoot(path: string): string {
	return path.startsWith("//") && !path.startsWith("///") ? "//" : "/";
}

function posixComponents(path: string): string[] {
	return path
		.split(POSIX_SEPARATOR)
		.filter((component) => component !== "" && component !== ".");
}

function posixAbsoluteInner(
	path: string,
	options: PosixAbsoluteOptions | undefined,
	lexical: boolean,
): string {
	if (options?.cwd !== undefined && !options.cwd.startsWith(POSIX_SEPARATOR)) {
		throw invalidInput("working directory must be absolute", options.cwd);
	}
	if (path.includes("\0")) {
		throw invalidInput("paths must not contain nulls", path);
	}

	const buffer = new PurePosixPathBuf();
	const push = (name: string) =>
		buffer.push(Component.unchecked(POSIX_SEPARATOR, name));
	let root: string;
	if (path.startsWith(POSIX_SEPARATOR)) {
		root = posixRoot(path);
	} else {
		const cwd = options?.cwd ?? process.cwd();
		root = posixRoot(cwd);
		for (const name of posixComponents(cwd)) push(name);
	}

	for (const name of posixComponents(path)) {
		if (lexical && name === "..") {
			buffer.pop();
		} else {
			push(name);
		}
	}

	// A trailing slash is meaningful when the path names a symlink or a
	// directory, so it is kept.
	if (path.endsWith(POSIX_SEPARATOR)) push("");
	return root + buffer.toString();
}

/**
 * Make a POSIX path absolute without changing its meaning.
 *
 * @remarks
 *
 * Relative paths are joined to the working directory. Repeated slashes and `.` components are removed, but
 * `..` is kept because symlinks make it impossible to resolve lexically. Exactly two leading slashes and a
 * trailing slash are preserved.
 *
 * @example
 * ```ts
 * posixAbsoluteSync("path/to/..//./file", { cwd: "/home/user" });
 * // '/home/user/path/to/../file'
 * ```
 *
 * @throws {@link ErrnoError} (`EINVAL`) If `options.cwd` is not absolute or the path contains a NUL.
 */
export function posixAbsoluteSync(
	path: string,
	options?: PosixAbsoluteOptions,
): string {
	return posixAbsoluteInner(path, options, false);
}

/**
 * Async variant of {@link posixAbsoluteSync}.
 */
export function posixAbsolute(
	path: string,
	options?: PosixAbsoluteOptions,
): Promise<string> {
	return toPromise(() => posixAbsoluteSync(path, options));
}

/**
 * Make a POSIX path lexically absolute.
 *
 * @remarks
 *
 * Like {@link posixAbsoluteSync} but `..` removes the component before it (and stops at the root). This may
 * name a different file than the OS would resolve when symlinks are involved, so it is usually not the
 * preferred behaviour.
 *
 * @throws {@link ErrnoError} (`EINVAL`) If `options.cwd` is not absolute or the path contains a NUL.
 */
export function posixLexicallyAbsoluteSync(
	path: string,
	options?: PosixAbsoluteOptions,
): string {
	return posixAbsoluteInner(path, options, true);
}

/**
 * Async variant of {@link posixLexicallyAbsoluteSync}.
 */
export function posixLexicallyAbsolute(
	path: string,
	options?: PosixAbsoluteOptions,
): Promise<string> {
	return toPromise(() => posixLexicallyAbsoluteSync(path, options));
}
