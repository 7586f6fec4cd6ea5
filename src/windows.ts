import { stripTrailingDot, trimFilename } from "./clean.js";
import {
	isAbsoluteKind,
	ParsedWinPath,
	type WinPathKind,
} from "./kind.js";
import {
	Component,
	PureWindowsPath,
	PureWindowsPathBuf,
	WINDOWS_SEPARATOR,
} from "./purepath.js";

const SEPARATORS = /[\\/]/;

function normalizePrefix(parsed: ParsedWinPath): string {
	const prefix = parsed.prefix.replace(/\//g, WINDOWS_SEPARATOR);
	if (isAbsoluteKind(parsed.kind) && !prefix.endsWith(WINDOWS_SEPARATOR)) {
		return `${prefix}${WINDOWS_SEPARATOR}`;
	}
	return prefix;
}

function finalNameStart(subpath: string): number {
	return Math.max(subpath.lastIndexOf("\\"), subpath.lastIndexOf("/")) + 1;
}

/**
 * A Windows path held as a normalised prefix plus a {@link PureWindowsPathBuf} subpath.
 *
 * @remarks
 *
 * {@link WindowsPath.parse} cleans the subpath while building it, the same way Windows would: `.` and `..` are
 * applied as they are met and trailing dots and spaces are trimmed from each component. Later calls to
 * {@link WindowsPath.push} only apply that shallow handling to the pushed component; nothing already in the
 * buffer is cleaned again.
 *
 * The prefix uses `\` separators and ends with `\` whenever the path is absolute. Verbatim (`\\?\`) paths are
 * kept as given: their subpath is never trimmed and pushes are appended literally.
 *
 * @example
 * ```ts
 * const p = WindowsPath.parse("C:/Program Files \\..\\.\\file.txt.. .. \\.");
 * console.log(p.toString()); // 'C:\\file.txt'
 * p.push("notes.md");
 * console.log(p.toString()); // 'C:\\file.txt\\notes.md'
 * ```
 */
export class WindowsPath {
	private constructor(
		readonly prefix: string,
		readonly kind: WinPathKind,
		private readonly buffer: PureWindowsPathBuf,
	) {}

	/**
	 * Parse a full path into a builder.
	 *
	 * @remarks
	 *
	 * The final file name loses its trailing dots and spaces unless it is `.` or `..`. Every component then
	 * loses one trailing dot (names ending in `..` are left alone) and is fed through {@link WindowsPath.push}.
	 */
	static parse(text: string): WindowsPath {
		const parsed = new ParsedWinPath(text);
		const prefix = normalizePrefix(parsed);
		if (parsed.kind.type === "Verbatim") {
			return new WindowsPath(
				prefix,
				parsed.kind,
				new PureWindowsPathBuf(parsed.subpath),
			);
		}

		const path = new WindowsPath(prefix, parsed.kind, new PureWindowsPathBuf());
		let subpath = parsed.subpath;
		const nameStart = finalNameStart(subpath);
		const name = subpath.slice(nameStart);
		if (name !== "." && name !== "..") {
			subpath = subpath.slice(0, nameStart) + trimFilename(name);
		}
		for (const part of subpath.split(SEPARATORS)) {
			path.pushComponent(stripTrailingDot(part));
		}
		return path;
	}

	/**
	 * The subpath after the prefix, as a snapshot.
	 */
	get subpath(): PureWindowsPath {
		return new PureWindowsPath(this.buffer.toString());
	}

	isAbsolute(): boolean {
		return isAbsoluteKind(this.kind);
	}

	/**
	 * Push a component onto the subpath.
	 *
	 * @remarks
	 *
	 * - `.` removes a trailing empty file name (a trailing separator).
	 * - `..` does the same, then removes the last component. On a path that is neither absolute nor root
	 *   relative, a `..` with nothing left to remove is kept.
	 * - Anything else is appended once its trailing dots and spaces are trimmed. An empty string leaves a
	 *   trailing separator.
	 *
	 * Text containing `\` or `/` is pushed one component at a time. On verbatim paths only `\` separates and
	 * components are appended literally.
	 *
	 * @returns Whether trailing dots or spaces were trimmed from the pushed text.
	 */
	push(component: string): boolean {
		let trimmed = false;
		const parts =
			this.kind.type === "Verbatim"
				? component.split(WINDOWS_SEPARATOR)
				: component.split(SEPARATORS);
		for (const part of parts) {
			if (this.pushComponent(part)) trimmed = true;
		}
		return trimmed;
	}

	/**
	 * Remove the last component of the subpath.
	 *
	 * @returns `false` when the subpath was already empty. The prefix is never removed.
	 */
	pop(): boolean {
		return this.buffer.pop();
	}

	/**
	 * Empty the subpath, keeping the prefix.
	 */
	clear(): void {
		this.buffer.clear();
	}

	toString(): string {
		return this.prefix + this.buffer.toString();
	}

	toJSON(): string {
		return this.toString();
	}

	private pushComponent(component: string): boolean {
		if (this.kind.type === "Verbatim") {
			this.buffer.push(Component.unchecked(WINDOWS_SEPARATOR, component));
			return false;
		}
		if (component === ".") {
			this.dropEmptyFileName();
			return false;
		}
		if (component === "..") {
			this.dropEmptyFileName();
			this.popParent();
			return false;
		}
		const trimmed = trimFilename(component);
		this.buffer.push(Component.unchecked(WINDOWS_SEPARATOR, trimmed));
		return trimmed !== component;
	}

	private dropEmptyFileName(): void {
		if (this.buffer.toString().endsWith(WINDOWS_SEPARATOR)) this.buffer.pop();
	}

	private popParent(): void {
		const last = this.buffer.last();
		if (last !== undefined && last.name !== "..") {
			this.buffer.pop();
			return;
		}
		// Relative paths cannot climb past their unknown start.
		if (!this.isAbsolute() && this.kind.type !== "RootRelative") {
			this.buffer.push(Component.unchecked(WINDOWS_SEPARATOR, ".."));
		}
	}
}
