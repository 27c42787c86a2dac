import type { NullSentinel } from "./NullSentinel.js"

/** Record ids are positive integers allocated per model by the store */
export type RecordId = number

/** What a store holds for a single field */
export type StoredValue = string | Uint8Array
export type StoredFields = Record<string, StoredValue>

export type PlainValue = null | boolean | number | string | Uint8Array | PlainArray | PlainObject
export interface PlainArray extends Array<PlainValue> {}
export interface PlainObject {
	[key: string]: PlainValue
}

export type FieldValue = PlainValue | NullSentinel

export type FieldTypeName =
	| "string"
	| "bytes"
	| "raw"
	| "integer"
	| "float"
	| "boolean"
	| "decimal"
	| "serialized"
	| "compressed"
	| "base64"

export type ReferenceTypeName = `@${string}`

export type FieldType = FieldTypeName | "chain" | "reference"

export interface BaseFieldSpec {
	hashIndex?: boolean
	default?: FieldValue
}

export type FieldSpec =
	| (BaseFieldSpec & { type: "string" | "bytes" | "raw" | "integer" | "float" | "boolean" | "serialized" | "base64" })
	| (BaseFieldSpec & { type: "decimal"; decimalPlaces?: number })
	| (BaseFieldSpec & { type: "compressed"; mode?: string })
	| (BaseFieldSpec & { type: "chain"; fields: FieldInit[] })
	| (BaseFieldSpec & { type: ReferenceTypeName })

export type FieldInit = FieldTypeName | ReferenceTypeName | FieldSpec

export function isPlainValue(value: unknown): value is PlainValue {
	if (value === null || typeof value === "boolean" || typeof value === "string" || value instanceof Uint8Array) {
		return true
	} else if (typeof value === "number") {
		return Number.isFinite(value)
	} else if (Array.isArray(value)) {
		return value.every(isPlainValue)
	} else if (typeof value === "object") {
		return Object.getPrototypeOf(value) === Object.prototype && Object.values(value).every(isPlainValue)
	} else {
		return false
	}
}
