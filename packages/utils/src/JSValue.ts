export type JSValue = undefined | null | boolean | number | string | Uint8Array | JSArray | JSObject
export interface JSArray extends Array<JSValue> {}
export interface JSObject {
	[key: string]: JSValue
}

export const isArray = (value: JSValue): value is JSArray => Array.isArray(value)

export function isObject(value: JSValue): value is JSObject {
	if (typeof value !== "object" || value === null) {
		return false
	} else if (Array.isArray(value) || value instanceof Uint8Array) {
		return false
	} else {
		return true
	}
}
