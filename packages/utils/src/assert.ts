export class AssertError extends Error {
	constructor(
		public readonly message: string,
		public readonly props?: Record<string, unknown>,
	) {
		super(message)
		this.name = "AssertError"
	}
}

export function assert(condition: unknown, message = "assertion failed", props?: Record<string, unknown>): asserts condition {
	if (!condition) {
		throw new AssertError(message, props)
	}
}
