import { bytesToHex } from "@noble/hashes/utils"

import { NullSentinel, isNullSentinel, nullSentinel } from "./NullSentinel.js"
import { ValueConversionError } from "./errors.js"
import { hashIndexValue } from "./hash.js"
import { isEmptyStored, plainBytes, toBytes, toText } from "./bytes.js"
import type { FieldType, FieldValue, PlainValue, StoredValue } from "./types.js"

export interface FieldOptions {
	hashIndex?: boolean
	defaultValue?: FieldValue
}

export const isNullish = (value: unknown): value is null | undefined | NullSentinel =>
	value === null || value === undefined || isNullSentinel(value)

export function describeValue(value: unknown): string {
	if (value instanceof Uint8Array) {
		return `Uint8Array(${value.byteLength})`
	} else if (typeof value === "string") {
		return JSON.stringify(value)
	} else {
		return `${typeof value}: ${String(value)}`
	}
}

/**
 * A field descriptor owns every conversion for one named field:
 * assignment (`fromInput`), persistence (`toStorage` / `fromStorage`)
 * and secondary indexing (`toIndex`).
 *
 * `toStorage(nullSentinel)` is always the empty string, and the empty
 * stored representation reads back as `nullValue()`, which is the
 * null sentinel unless a subclass has a natural empty value of its own.
 */
export abstract class Field {
	public abstract readonly type: FieldType

	constructor(
		public readonly name: string,
		protected readonly options: FieldOptions = {},
	) {}

	/** Whether this field may be declared in a model's indexes */
	public get canIndex(): boolean {
		return true
	}

	public get hashIndex(): boolean {
		return this.options.hashIndex ?? false
	}

	/** The value a new record gets when none is supplied */
	public get defaultValue(): FieldValue {
		return this.options.defaultValue === undefined ? this.nullValue() : this.options.defaultValue
	}

	public toStorage(value: FieldValue): StoredValue {
		if (isNullSentinel(value)) {
			return ""
		}

		return this.encode(value)
	}

	public fromStorage(raw: StoredValue): FieldValue {
		if (isEmptyStored(raw)) {
			return this.nullValue()
		}

		return this.decode(raw)
	}

	public toIndex(value: FieldValue): string {
		const stored = this.toStorage(value)
		if (this.hashIndex) {
			return hashIndexValue(stored)
		} else if (typeof stored === "string") {
			return stored
		} else {
			return bytesToHex(stored)
		}
	}

	public fromInput(value: unknown): FieldValue {
		if (value === null || value === undefined || isNullSentinel(value)) {
			return this.nullValue()
		}

		return this.parse(value)
	}

	public toString() {
		return `${this.type}:${this.name}`
	}

	/** The null-equivalent for this type */
	protected nullValue(): FieldValue {
		return nullSentinel
	}

	protected fail(message: string): never {
		throw new ValueConversionError(`field "${this.name}": ${message}`)
	}

	protected abstract encode(value: PlainValue): StoredValue
	protected abstract decode(raw: StoredValue): FieldValue
	protected abstract parse(value: {}): FieldValue
}

export class StringField extends Field {
	public readonly type = "string"

	protected override nullValue() {
		return ""
	}

	protected encode(value: PlainValue) {
		if (typeof value === "string") {
			return value
		} else if (typeof value === "number" || typeof value === "boolean") {
			return String(value)
		} else {
			this.fail(`expected a string, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return toText(raw)
	}

	protected parse(value: {}) {
		if (typeof value === "string") {
			return value
		} else if (typeof value === "number" || typeof value === "boolean") {
			return String(value)
		} else if (value instanceof Uint8Array) {
			return toText(value)
		} else {
			this.fail(`expected a string, received ${describeValue(value)}`)
		}
	}
}

export class BytesField extends Field {
	public readonly type = "bytes"

	public override get canIndex() {
		return false
	}

	protected override nullValue() {
		return new Uint8Array([])
	}

	protected encode(value: PlainValue) {
		if (value instanceof Uint8Array) {
			return value
		} else if (typeof value === "string") {
			return toBytes(value)
		} else {
			this.fail(`expected a Uint8Array, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return plainBytes(toBytes(raw))
	}

	protected parse(value: {}) {
		if (value instanceof Uint8Array) {
			return value
		} else if (typeof value === "string") {
			return toBytes(value)
		} else {
			this.fail(`expected a Uint8Array, received ${describeValue(value)}`)
		}
	}
}

/** Stores whatever it is given and hands the stored value back untouched */
export class RawField extends Field {
	public readonly type = "raw"

	public override get canIndex() {
		return false
	}

	protected override nullValue() {
		return ""
	}

	protected encode(value: PlainValue) {
		if (typeof value === "string" || value instanceof Uint8Array) {
			return value
		} else {
			this.fail(`expected a string or Uint8Array, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return raw
	}

	protected parse(value: {}) {
		if (typeof value === "string" || value instanceof Uint8Array) {
			return value
		} else {
			this.fail(`expected a string or Uint8Array, received ${describeValue(value)}`)
		}
	}
}

const integerPattern = /^[+-]?\d+$/

export class IntegerField extends Field {
	public readonly type = "integer"

	protected encode(value: PlainValue) {
		if (typeof value === "number" && Number.isSafeInteger(value)) {
			return value.toString()
		} else {
			this.fail(`expected a safe integer, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return this.parseText(toText(raw))
	}

	protected parse(value: {}) {
		if (typeof value === "number") {
			if (Number.isSafeInteger(value)) {
				return value
			}

			this.fail(`expected a safe integer, received ${describeValue(value)}`)
		} else if (typeof value === "string") {
			return value === "" ? nullSentinel : this.parseText(value)
		} else {
			this.fail(`expected an integer, received ${describeValue(value)}`)
		}
	}

	private parseText(text: string): number {
		const value = Number.parseInt(text, 10)
		if (!integerPattern.test(text) || !Number.isSafeInteger(value)) {
			this.fail(`invalid integer ${JSON.stringify(text)}`)
		}

		return value
	}
}

/**
 * Floats have no stable text form across platforms, so they can never be
 * indexed. Use a FixedPointField for indexable numbers.
 */
export class FloatField extends Field {
	public readonly type = "float"

	public override get canIndex() {
		return false
	}

	protected encode(value: PlainValue) {
		if (typeof value === "number" && !Number.isNaN(value)) {
			return value.toString()
		} else {
			this.fail(`expected a number, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return this.parseText(toText(raw))
	}

	protected parse(value: {}) {
		if (typeof value === "number" && !Number.isNaN(value)) {
			return value
		} else if (typeof value === "string") {
			return value === "" ? nullSentinel : this.parseText(value)
		} else {
			this.fail(`expected a number, received ${describeValue(value)}`)
		}
	}

	private parseText(text: string): number {
		const value = Number(text)
		if (text.trim() === "" || Number.isNaN(value)) {
			this.fail(`invalid number ${JSON.stringify(text)}`)
		}

		return value
	}
}

export class BooleanField extends Field {
	public readonly type = "boolean"

	protected encode(value: PlainValue) {
		if (typeof value === "boolean") {
			return value ? "true" : "false"
		} else {
			this.fail(`expected a boolean, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return this.parseText(toText(raw))
	}

	protected parse(value: {}) {
		if (typeof value === "boolean") {
			return value
		} else if (value === 1 || value === 0) {
			return value === 1
		} else if (typeof value === "string") {
			return value === "" ? nullSentinel : this.parseText(value)
		} else {
			this.fail(`expected a boolean, received ${describeValue(value)}`)
		}
	}

	private parseText(text: string): boolean {
		const lower = text.toLowerCase()
		if (lower === "true" || lower === "1") {
			return true
		} else if (lower === "false" || lower === "0") {
			return false
		} else {
			this.fail(`unexpected value for boolean: ${JSON.stringify(text)}`)
		}
	}
}
