import nodepath from "node:path";

/**
 * Path separators understood by the pure-path model.
 *
 * @remarks
 *
 * The same component logic serves POSIX (`/`) and Windows (`\`) paths. The separator travels with every path,
 * buffer and component both as a runtime value and as a type parameter, so a Windows component cannot be pushed
 * onto a POSIX buffer by accident.
 */
export type Separator = "/" | "\\";

export const POSIX_SEPARATOR = "/";
export const WINDOWS_SEPARATOR = "\\";

/**
 * Indicates whether the current runtime reports Windows-style path semantics.
 *
 * @remarks
 *
 * This is derived from {@link nodepath.sep} and computed once at module evaluation time.
 */
export const isWindows = nodepath.sep === "\\";

/**
 * Separator of the host platform, used when no flavour is requested explicitly.
 */
export const DEFAULT_SEPARATOR: Separator = isWindows
	? WINDOWS_SEPARATOR
	: POSIX_SEPARATOR;

/**
 * One step of an extension chain, e.g. the `gz` of `a.tar.gz`.
 *
 * @remarks
 *
 * Holds the file name and the offsets of the extension inside it (`start` is the position of the dot). Every
 * accessor slices the file name again, nothing is copied up front.
 */
export class Extension {
	constructor(
		private readonly fileName: string,
		readonly start: number,
		readonly end: number,
	) {}

	/** The extension at this step, without its dot. */
	extension(): string {
		return this.fileName.slice(this.start + 1, this.end);
	}

	/** The file name before this extension. */
	stem(): string {
		return this.fileName.slice(0, this.start);
	}

	/** Everything after the dot of this extension, e.g. `tar.gz` for the `tar` step of `a.tar.gz`. */
	fullExtension(): string {
		return this.fileName.slice(this.start + 1);
	}

	/** Split the file name at this extension's dot into `[stem, ".rest"]`. */
	splitOnce(): [string, string] {
		return [this.fileName.slice(0, this.start), this.fileName.slice(this.start)];
	}
}

/**
 * Innermost-first iterable over the extensions of a file name.
 *
 * @remarks
 *
 * A leading dot marks a hidden file on Unix, so it never starts an extension: `.bashrc` has no extension and
 * `.bashrc.bak` has the single extension `bak`. Iterating again starts from the end of the name.
 */
export class Extensions implements Iterable<Extension> {
	constructor(private readonly fileName: string) {}

	*[Symbol.iterator](): Iterator<Extension> {
		let end = this.fileName.length;
		while (end > 0) {
			const position = this.fileName.lastIndexOf(".", end - 1);
			if (position <= 0) return;
			yield new Extension(this.fileName, position, end);
			end = position;
		}
	}
}

/**
 * A single path component: the text between two adjacent separators.
 *
 * @remarks
 *
 * Only the final component of a path may be empty (the path ends with a separator). Use {@link Component.of}
 * to build one from untrusted text; it refuses text containing the separator.
 */
export class Component<S extends Separator = Separator> {
	private constructor(
		readonly separator: S,
		readonly name: string,
	) {}

	/**
	 * Build a component, or `undefined` when `name` contains `separator`.
	 */
	static of<S extends Separator>(
		separator: S,
		name: string,
	): Component<S> | undefined {
		return name.includes(separator) ? undefined : new Component(separator, name);
	}

	/**
	 * Build a component without checking for separators.
	 *
	 * @remarks
	 *
	 * Callers must guarantee that `name` does not contain `separator`.
	 */
	static unchecked<S extends Separator>(
		separator: S,
		name: string,
	): Component<S> {
		return new Component(separator, name);
	}

	isEmpty(): boolean {
		return this.name.length === 0;
	}

	/** The file name without its final extension, if any. */
	fileName(): string {
		for (const extension of this.extensions()) return extension.stem();
		return this.name;
	}

	/** The file name without any of its extensions. */
	stem(): string {
		let stem = this.name;
		for (const extension of this.extensions()) stem = extension.stem();
		return stem;
	}

	/** The final extension, or `undefined` when there is none. */
	extension(): string | undefined {
		for (const extension of this.extensions()) return extension.extension();
		return undefined;
	}

	extensions(): Extensions {
		return new Extensions(this.name);
	}

	/** Compare by name only; the separator flavour is ignored. */
	equals(other: Component<Separator>): boolean {
		return this.name === other.name;
	}

	toString(): string {
		return this.name;
	}
}

/**
 * A component met while iterating a path, together with its position.
 *
 * @remarks
 *
 * `index` is the offset of the component in the iterated text and `end` the offset just after it. The
 * parent and the rest of the path are recomputed from those offsets, which makes range operations such as
 * {@link PurePathBuf.replaceRange} possible.
 */
export class PathEntry<S extends Separator = Separator> {
	constructor(
		private readonly source: string,
		readonly separator: S,
		readonly index: number,
		readonly end: number,
	) {}

	get component(): Component<S> {
		return Component.unchecked(
			this.separator,
			this.source.slice(this.index, this.end),
		);
	}

	/** The path before this component, without the separator between them. */
	parent(): PurePath<S> {
		const end = this.index === 0 ? 0 : this.index - this.separator.length;
		return new PurePath(this.separator, this.source.slice(0, end));
	}

	/** The rest of the path, starting with this component. */
	rest(): PurePath<S> {
		return new PurePath(this.separator, this.source.slice(this.index));
	}

	splitOnce(): [PurePath<S>, PurePath<S>] {
		return [this.parent(), this.rest()];
	}

	toString(): string {
		return this.component.name;
	}
}

/**
 * Forward iterable over the components of a path.
 *
 * @remarks
 *
 * A path ending with the separator yields a trailing empty component, so joining the names with the separator
 * gives back the original text. An empty path yields nothing. Each iteration restarts from the beginning.
 */
export class Components<S extends Separator = Separator>
	implements Iterable<PathEntry<S>>
{
	constructor(
		private readonly source: string,
		private readonly separator: S,
	) {}

	*[Symbol.iterator](): Iterator<PathEntry<S>> {
		const { source, separator } = this;
		if (!source) return;
		let start = 0;
		while (true) {
			const position = source.indexOf(separator, start);
			if (position === -1) {
				yield new PathEntry(source, separator, start, source.length);
				return;
			}
			yield new PathEntry(source, separator, start, position);
			start = position + separator.length;
		}
	}
}

/**
 * Reverse iterable over the components of a path, last component first.
 *
 * @remarks
 *
 * Equivalent to calling {@link PurePath.parent} in a loop: each entry's {@link PathEntry.parent} is the path
 * left once that component is removed.
 */
export class Ancestors<S extends Separator = Separator>
	implements Iterable<PathEntry<S>>
{
	constructor(
		private readonly source: string,
		private readonly separator: S,
	) {}

	*[Symbol.iterator](): Iterator<PathEntry<S>> {
		const { source, separator } = this;
		if (!source) return;
		let end = source.length;
		while (true) {
			const position =
				end === 0 ? -1 : source.lastIndexOf(separator, end - separator.length);
			if (position === -1) {
				yield new PathEntry(source, separator, 0, end);
				return;
			}
			yield new PathEntry(source, separator, position + separator.length, end);
			end = position;
		}
	}
}

/**
 * Renders a path, optionally swapping its separator for another character.
 */
export class DisplayPath<S extends Separator = Separator> {
	constructor(
		private readonly path: PurePath<S>,
		readonly separator: string = path.separator,
	) {}

	/**
	 * Display the path with `separator` between components.
	 *
	 * @remarks
	 *
	 * The substitution would be ambiguous when the text already contains `separator`, in which case
	 * `undefined` is returned and the caller keeps the original display.
	 *
	 * @returns A new display object, or `undefined` when the separator cannot be used.
	 */
	withSeparator(separator: string): DisplayPath<S> | undefined {
		if (separator === this.path.separator) {
			return new DisplayPath(this.path, separator);
		}
		if (this.path.toString().includes(separator)) return undefined;
		return new DisplayPath(this.path, separator);
	}

	toString(): string {
		if (this.separator === this.path.separator) return this.path.toString();
		return Array.from(
			this.path.components(),
			(entry) => entry.component.name,
		).join(this.separator);
	}
}

/**
 * A path held as text and manipulated only as text.
 *
 * @remarks
 *
 * A pure path is a sequence of {@link Component}s joined by its separator. Nothing is normalised: `.` and `..`
 * are ordinary components here and repeated separators produce empty components. Policies for those live in
 * the callers (the Windows cleaner and builder). No method touches the filesystem.
 *
 * @example Walking the components of a path
 * ```ts
 * import { PureWindowsPath } from "pathlex";
 *
 * const p = new PureWindowsPath("docs\\guide\\intro.md");
 * console.log([...p.components()].map(String)); // ['docs', 'guide', 'intro.md']
 * console.log(p.last()?.extension()); // 'md'
 * console.log(p.display().withSeparator("/")?.toString()); // 'docs/guide/intro.md'
 * ```
 */
export class PurePath<S extends Separator = Separator> {
	protected text: string;

	constructor(
		readonly separator: S,
		text = "",
	) {
		this.text = text;
	}

	get length(): number {
		return this.text.length;
	}

	isEmpty(): boolean {
		return this.text.length === 0;
	}

	/**
	 * Whether the final component is empty, i.e. the path is empty or ends with the separator.
	 */
	isFileNameEmpty(): boolean {
		return this.isEmpty() || this.text.endsWith(this.separator);
	}

	/**
	 * The final component including its extension.
	 *
	 * @returns The last component (empty when the path ends with the separator), or `undefined` for an empty
	 * path.
	 */
	last(): Component<S> | undefined {
		for (const entry of this.ancestors()) return entry.component;
		return undefined;
	}

	/**
	 * The path without its final component, or `undefined` for an empty path.
	 */
	parent(): PurePath<S> | undefined {
		for (const entry of this.ancestors()) return entry.parent();
		return undefined;
	}

	components(): Components<S> {
		return new Components(this.text, this.separator);
	}

	ancestors(): Ancestors<S> {
		return new Ancestors(this.text, this.separator);
	}

	display(): DisplayPath<S> {
		return new DisplayPath(this);
	}

	/**
	 * Compare two paths component by component.
	 *
	 * @remarks
	 *
	 * Paths of different flavours compare equal when their component names match, so `a/b` as a POSIX path
	 * equals `a\b` as a Windows path.
	 */
	equals(other: PurePath<Separator>): boolean {
		const left = Array.from(this.ancestors(), (entry) => entry.component.name);
		const right = Array.from(
			other.ancestors(),
			(entry) => entry.component.name,
		);
		return (
			left.length === right.length &&
			left.every((name, index) => name === right[index])
		);
	}

	toString(): string {
		return this.text;
	}

	valueOf(): string {
		return this.text;
	}

	toJSON(): string {
		return this.text;
	}

	[Symbol.toPrimitive](): string {
		return this.text;
	}
}

/**
 * An owned, growable {@link PurePath}.
 *
 * @remarks
 *
 * {@link PurePathBuf.push} appends exactly what it is given. Whether `..` should pop or `.` should be dropped is
 * decided by the caller; see {@link WindowsPath} for a buffer that applies those rules.
 */
export class PurePathBuf<S extends Separator = Separator> extends PurePath<S> {
	/**
	 * Append a single component.
	 *
	 * @remarks
	 *
	 * A separator is written first unless the buffer is empty or already ends with one.
	 *
	 * @returns This buffer, for chaining.
	 */
	push(component: Component<S>): this {
		if (!this.isFileNameEmpty()) this.text += this.separator;
		this.text += component.name;
		return this;
	}

	/**
	 * Remove the last component.
	 *
	 * @remarks
	 *
	 * When the path ends with the separator only that separator is removed.
	 *
	 * @returns `false` when the buffer was already empty.
	 */
	pop(): boolean {
		const parent = this.parent();
		if (!parent) return false;
		this.text = this.text.slice(0, parent.length);
		return true;
	}

	clear(): void {
		this.text = "";
	}

	/**
	 * Replace the components starting inside `[start, end)` with `replacement`.
	 *
	 * @remarks
	 *
	 * Both bounds are text offsets taken from {@link PathEntry.index}; `end` may also be the length of the
	 * path. A separator is kept between the replacement and whatever follows it.
	 *
	 * @example
	 * ```ts
	 * const p = new PureWindowsPathBuf("test\\me\\simon\\to\\the\\file");
	 * const starts = [...p.components()].map((entry) => entry.index);
	 * p.replaceRange(starts[2], starts[4], new PureWindowsPath("look\\at\\me"));
	 * console.log(p.toString()); // 'test\\me\\look\\at\\me\\the\\file'
	 * ```
	 *
	 * @returns `false`, leaving the buffer untouched, when a bound is not a component boundary or `start`
	 * comes after `end`.
	 */
	replaceRange(start: number, end: number, replacement: PurePath<S>): boolean {
		const boundaries = new Set(
			Array.from(this.components(), (entry) => entry.index),
		);
		boundaries.add(this.text.length);
		if (start > end || !boundaries.has(start) || !boundaries.has(end)) {
			return false;
		}
		const inserted = replacement.toString();
		let head = this.text.slice(0, start);
		if (inserted && head && !head.endsWith(this.separator)) {
			head += this.separator;
		}
		const tail = this.text.slice(end);
		const joint = inserted && tail ? this.separator : "";
		this.text = head + inserted + joint + tail;
		return true;
	}
}

/**
 * Pure path using POSIX `/` separators.
 */
export class PurePosixPath extends PurePath<"/"> {
	constructor(text = "") {
		super(POSIX_SEPARATOR, text);
	}
}

/**
 * Pure path using Windows `\` separators.
 *
 * @remarks
 *
 * Only `\` separates components here; prefixes such as `C:` are plain text to this type. Use
 * {@link classify} and {@link WindowsPath} for prefix-aware handling.
 */
export class PureWindowsPath extends PurePath<"\\"> {
	constructor(text = "") {
		super(WINDOWS_SEPARATOR, text);
	}
}

export class PurePosixPathBuf extends PurePathBuf<"/"> {
	constructor(text = "") {
		super(POSIX_SEPARATOR, text);
	}
}

export class PureWindowsPathBuf extends PurePathBuf<"\\"> {
	constructor(text = "") {
		super(WINDOWS_SEPARATOR, text);
	}
}
