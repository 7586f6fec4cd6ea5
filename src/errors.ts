import nodeos from "node:os";

/**
 * Small ErrnoError class that matches Node's ErrnoException shape.
 *
 * @remarks
 *
 * Only the OS boundary raises it: classification and cleaning are total and never throw. The `code` is one of
 * Node's errno names (for example `EINVAL`) and `errno` is looked up from `os.constants.errno` when the host
 * knows the name.
 */
export class ErrnoError extends Error implements NodeJS.ErrnoException {
	errno?: number;
	// NodeJS.ErrnoException declares `code?: string`, keep that shape for
	// compatibility while allowing callers to pass numbers into the
	// constructor which will be mapped to errno.
	code?: string;
	path?: string;

	constructor(
		message: string,
		code?: string | number,
		fields?: { path?: string },
	) {
		super(message);
		this.name = "ErrnoError";

		if (code !== undefined) {
			this.code = String(code);
			const n = mapCodeToErrno(code);
			if (n !== undefined) this.errno = n;
		}

		if (fields?.path !== undefined) this.path = fields.path;
	}
}

function mapCodeToErrno(code: string | number): number | undefined {
	if (typeof code === "number") return code;
	const value: unknown = Reflect.get(nodeos.constants.errno, code);
	return typeof value === "number" ? value : undefined;
}

/**
 * Build the error reported for caller input the OS boundary refuses to pass on.
 *
 * @param message - Human readable reason.
 * @param path - Offending path, echoed on the error.
 */
export function invalidInput(message: string, path: string): ErrnoError {
	return new ErrnoError(message, "EINVAL", { path });
}
