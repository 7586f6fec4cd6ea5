/**
 * Wrap a synchronous factory so it always yields a {@link Promise}.
 *
 * @remarks
 *
 * The OS-bound helpers in `src/os.ts` expose asynchronous variants that delegate to synchronous
 * implementations. This helper standardises the pattern while preserving thrown errors as rejected promises.
 *
 * @param factory - Synchronous function producing a value.
 * @returns A promise that resolves with the factory result or rejects with the thrown error.
 */
export function toPromise<T>(factory: () => T): Promise<T> {
	try {
		return Promise.resolve(factory());
	} catch (error) {
		return Promise.reject(error);
	}
}

const encoder = new TextEncoder();

/**
 * Number of bytes in a UTF-8 sequence, read from its leading byte.
 *
 * @remarks
 *
 * Counts the leading one bits of the byte. ASCII bytes (no leading ones) are a single byte. Continuation
 * bytes report `1` as well, so the result is only meaningful for a byte that starts a sequence.
 *
 * @param leadByte - First byte of an encoded scalar.
 */
export function utf8Length(leadByte: number): number {
	const ones = Math.clz32(~(leadByte << 24));
	return ones === 0 || ones > 4 ? 1 : ones;
}

/**
 * Number of UTF-8 bytes needed to encode a Unicode scalar value.
 */
export function utf8Width(codePoint: number): number {
	if (codePoint < 0x80) return 1;
	if (codePoint < 0x800) return 2;
	if (codePoint < 0x10000) return 3;
	return 4;
}

/**
 * Byte length of a string once encoded as UTF-8.
 *
 * @remarks
 *
 * Unpaired surrogates count as three bytes, the width of the replacement character an encoder writes for them.
 */
export function utf8ByteLength(text: string): number {
	let total = 0;
	for (const char of text) {
		total += utf8Width(char.codePointAt(0) ?? 0);
	}
	return total;
}

/**
 * Encode a single Unicode scalar value as UTF-8.
 */
export function encodeUtf8Scalar(codePoint: number): Uint8Array {
	return encoder.encode(String.fromCodePoint(codePoint));
}

/**
 * Convert one UTF-8 encoded scalar from the Basic Multilingual Plane to its UTF-16 code unit.
 *
 * @remarks
 *
 * Only the first one to three bytes are read. Passing arbitrary bytes or a four byte sequence is allowed but
 * the result is unspecified.
 *
 * @param bytes - Encoded scalar, starting at its leading byte.
 * @returns The UTF-16 code unit for that scalar.
 */
export function bmpUtf8ToUtf16(bytes: ArrayLike<number>): number {
	const lead = bytes[0] ?? 0;
	const second = bytes[1] ?? 0;
	switch (utf8Length(lead)) {
		case 1:
			return lead;
		case 2:
			return ((lead & 0b11111) << 6) | (second & 0b111111);
		default: {
			const third = bytes[2] ?? 0;
			return (
				((lead & 0b1111) << 12) | ((second & 0b111111) << 6) | (third & 0b111111)
			);
		}
	}
}
