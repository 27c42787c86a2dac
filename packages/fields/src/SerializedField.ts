import * as cbor from "@ipld/dag-cbor"
import { concatBytes } from "@noble/hashes/utils"

import { Field, describeValue } from "./Field.js"
import { hasPrefix } from "./bytes.js"
import { isPlainValue } from "./types.js"
import type { PlainValue, StoredValue } from "./types.js"

// the CBOR "self-describe" tag (55799) marks stored values as ours
const selfDescribePrefix = new Uint8Array([0xd9, 0xd9, 0xf7])

/**
 * Opaque values encoded with DAG-CBOR. Encodings of the same value may
 * differ between library versions, so these fields are never indexable.
 *
 * Stored values without the self-describe prefix are returned raw.
 */
export class SerializedField extends Field {
	public readonly type = "serialized"

	public override get canIndex() {
		return false
	}

	protected override nullValue() {
		return ""
	}

	protected encode(value: PlainValue) {
		if (value === "") {
			return ""
		}

		try {
			return concatBytes(selfDescribePrefix, cbor.encode(value))
		} catch (err) {
			this.fail(`cannot serialize ${describeValue(value)}: ${err instanceof Error ? err.message : String(err)}`)
		}
	}

	protected decode(raw: StoredValue) {
		if (typeof raw === "string" || !hasPrefix(raw, selfDescribePrefix)) {
			return raw
		}

		try {
			return cbor.decode<PlainValue>(raw.subarray(selfDescribePrefix.byteLength))
		} catch (err) {
			this.fail(`failed to deserialize stored value: ${err instanceof Error ? err.message : String(err)}`)
		}
	}

	protected parse(value: {}) {
		if (isPlainValue(value)) {
			return value
		} else {
			this.fail(`cannot serialize ${describeValue(value)}`)
		}
	}
}
