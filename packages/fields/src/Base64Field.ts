import { fromString, toString } from "uint8arrays"

import { Field, describeValue } from "./Field.js"
import { plainBytes, toBytes, toText } from "./bytes.js"
import type { PlainValue, StoredValue } from "./types.js"

const base64Pattern = /^[A-Za-z0-9+/]*={0,2}$/

/** Bytes stored as padded base64 text. Often the last stage of a FieldChain. */
export class Base64Field extends Field {
	public readonly type = "base64"

	protected override nullValue() {
		return new Uint8Array([])
	}

	protected encode(value: PlainValue) {
		if (value instanceof Uint8Array || typeof value === "string") {
			return toString(toBytes(value), "base64pad")
		} else {
			this.fail(`expected a Uint8Array, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		const text = toText(raw)
		if (text.length % 4 !== 0 || !base64Pattern.test(text)) {
			this.fail(`invalid base64 ${JSON.stringify(text)}`)
		}

		return plainBytes(fromString(text, "base64pad"))
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
