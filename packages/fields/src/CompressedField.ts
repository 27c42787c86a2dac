import { unzlibSync, zlibSync } from "fflate"

import { Field, FieldOptions, describeValue } from "./Field.js"
import { SchemaError } from "./errors.js"
import { hasPrefix, toBytes } from "./bytes.js"
import type { PlainValue, StoredValue } from "./types.js"

export type CompressMode = "zlib"

const compressModeAliases: Record<string, CompressMode> = {
	zlib: "zlib",
	deflate: "zlib",
	gzip: "zlib",
	gz: "zlib",
}

// zlib stream header for deflate at compression level 9
const zlibHeader = new Uint8Array([0x78, 0xda])

export interface CompressedFieldOptions extends Omit<FieldOptions, "hashIndex"> {
	mode?: string
}

/**
 * Compresses on the way into the store and decompresses on the way out.
 *
 * Retrieval sniffs the zlib header: stored values that don't start with it
 * pass through untouched, and uncompressed data that happens to start with
 * `78 DA` will be misread as compressed.
 *
 * The index is always hashed, since compressed bytes aren't meaningfully
 * comparable as text.
 */
export class CompressedField extends Field {
	public readonly type = "compressed"
	public readonly mode: CompressMode

	constructor(name: string, { mode = "zlib", ...options }: CompressedFieldOptions = {}) {
		super(name, options)
		const compressMode = compressModeAliases[mode]
		if (compressMode === undefined) {
			throw new SchemaError(`invalid compression mode "${mode}" for field "${name}"`)
		}

		this.mode = compressMode
	}

	public override get hashIndex() {
		return true
	}

	protected override nullValue() {
		return ""
	}

	protected encode(value: PlainValue) {
		if (typeof value !== "string" && !(value instanceof Uint8Array)) {
			this.fail(`expected a string or Uint8Array, received ${describeValue(value)}`)
		} else if (value.length === 0) {
			return ""
		}

		const bytes = toBytes(value)
		if (hasPrefix(bytes, zlibHeader)) {
			return value
		}

		return zlibSync(bytes, { level: 9 })
	}

	protected decode(raw: StoredValue) {
		if (typeof raw === "string" || !hasPrefix(raw, zlibHeader)) {
			return raw
		}

		try {
			return unzlibSync(raw)
		} catch (err) {
			this.fail(`failed to decompress stored value: ${err instanceof Error ? err.message : String(err)}`)
		}
	}

	protected parse(value: {}) {
		if (typeof value === "string" || value instanceof Uint8Array) {
			return value
		} else {
			this.fail(`expected a string or Uint8Array, received ${describeValue(value)}`)
		}
	}
}
