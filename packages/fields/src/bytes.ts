import { utf8ToBytes } from "@noble/hashes/utils"

import type { StoredValue } from "./types.js"

const decoder = new TextDecoder()

export const toBytes = (value: StoredValue): Uint8Array => (typeof value === "string" ? utf8ToBytes(value) : value)

export const toText = (value: StoredValue): string => (typeof value === "string" ? value : decoder.decode(value))

export const isEmptyStored = (value: StoredValue) =>
	typeof value === "string" ? value.length === 0 : value.byteLength === 0

export function hasPrefix(value: Uint8Array, prefix: Uint8Array): boolean {
	if (value.byteLength < prefix.byteLength) {
		return false
	}

	return prefix.every((byte, i) => value[i] === byte)
}

/** Drop any Buffer subclassing so values compare as plain Uint8Arrays */
export const plainBytes = (value: Uint8Array): Uint8Array =>
	value.constructor === Uint8Array ? value : new Uint8Array(value.buffer, value.byteOffset, value.byteLength)
