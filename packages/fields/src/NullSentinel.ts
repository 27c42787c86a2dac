/**
 * Marker for "no value assigned" on any field whose type has no natural
 * empty value. Only ever equal to itself: not to `""`, `false`, `0` or `null`.
 */
export class NullSentinel {
	public static readonly value = new NullSentinel()

	private constructor() {}

	public equals(other: unknown): boolean {
		return other instanceof NullSentinel
	}

	public toString() {
		return ""
	}

	public toJSON() {
		return null
	}

	public get [Symbol.toStringTag]() {
		return "NullSentinel"
	}
}

export const nullSentinel = NullSentinel.value

export const isNullSentinel = (value: unknown): value is NullSentinel => value instanceof NullSentinel
