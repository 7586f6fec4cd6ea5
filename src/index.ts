/**
 * Lexical classification and cleaning of Windows and POSIX paths.
 *
 * @remarks
 *
 * Everything is done by inspecting text; nothing touches the filesystem. The primary entry points are:
 *
 * - {@link classify} to find the kind of a Windows path (drive, UNC, device, verbatim, or one of the relative
 *   forms) and the length of its prefix.
 * - {@link clean} to normalise a Windows path the way the Win32 file APIs would, without any system call.
 * - {@link PurePath} and {@link PurePathBuf}, a separator-parameterised component model shared by POSIX and
 *   Windows paths.
 * - {@link WindowsPath} to build a Windows path component by component.
 * - {@link toWin32Path} to turn a verbatim `\\?\` path back into a user-facing one when that is lossless.
 *
 * `src/os.ts` holds the few helpers that need OS state (making paths absolute). Their async variants return
 * a `Promise`; `Sync` suffixed counterparts are provided for synchronous access.
 */

import {
	clean,
	isComponentWin32Safe,
	isWin32Safe,
	toWin32Path,
	trimFilename,
	trimFullPath,
} from "./clean.js";
import { classify, kindOf, ParsedWinPath, splitVerbatim } from "./kind.js";
import {
	posixAbsolute,
	posixAbsoluteSync,
	posixLexicallyAbsolute,
	posixLexicallyAbsoluteSync,
	resolvePrefix,
	resolvePrefixSync,
	winAbsolute,
	winAbsoluteSync,
} from "./os.js";
import {
	Component,
	PurePath,
	PurePathBuf,
	PurePosixPath,
	PurePosixPathBuf,
	PureWindowsPath,
	PureWindowsPathBuf,
} from "./purepath.js";
import { WindowsPath } from "./windows.js";

export {
	clean,
	isComponentWin32Safe,
	isWin32Safe,
	stripTrailingDot,
	toWin32Path,
	trimFilename,
	trimFullPath,
} from "./clean.js";
export { ErrnoError } from "./errors.js";
export type {
	VerbatimParts,
	Win32Absolute,
	Win32Relative,
	WinPathClassification,
} from "./kind.js";
export {
	classify,
	isAbsoluteKind,
	isLegacyRelativeKind,
	isVerbatim,
	kindOf,
	kindUtf8Length,
	kindUtf16Length,
	ParsedWinPath,
	splitKind,
	splitVerbatim,
	toWin32Absolute,
	toWin32Relative,
	WinPathKind,
} from "./kind.js";
export type {
	FullPathResolver,
	PosixAbsoluteOptions,
	WindowsAbsoluteOptions,
} from "./os.js";
export {
	fromWide,
	nodeFullPathResolver,
	posixAbsolute,
	posixAbsoluteSync,
	posixLexicallyAbsolute,
	posixLexicallyAbsoluteSync,
	resolvePrefix,
	resolvePrefixSync,
	toWide,
	winAbsolute,
	winAbsoluteSync,
} from "./os.js";
export type { Separator } from "./purepath.js";
export {
	Ancestors,
	Component,
	Components,
	DEFAULT_SEPARATOR,
	DisplayPath,
	Extension,
	Extensions,
	isWindows,
	PathEntry,
	POSIX_SEPARATOR,
	PurePath,
	PurePathBuf,
	PurePosixPath,
	PurePosixPathBuf,
	PureWindowsPath,
	PureWindowsPathBuf,
	WINDOWS_SEPARATOR,
} from "./purepath.js";
export { WindowsPath } from "./windows.js";

export default {
	classify,
	kindOf,
	splitVerbatim,
	ParsedWinPath,
	clean,
	trimFilename,
	trimFullPath,
	isWin32Safe,
	isComponentWin32Safe,
	toWin32Path,
	Component,
	PurePath,
	PurePathBuf,
	PurePosixPath,
	PurePosixPathBuf,
	PureWindowsPath,
	PureWindowsPathBuf,
	WindowsPath,
	winAbsolute,
	winAbsoluteSync,
	resolvePrefix,
	resolvePrefixSync,
	posixAbsolute,
	posixAbsoluteSync,
	posixLexicallyAbsolute,
	posixLexicallyAbsoluteSync,
};
