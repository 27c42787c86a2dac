export function signalInvalidType(type: never): never {
	throw new TypeError(`internal error: invalid type ${String(type)}`)
}
