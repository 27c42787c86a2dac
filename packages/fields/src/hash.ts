import { sha256 } from "@noble/hashes/sha256"
import { bytesToHex } from "@noble/hashes/utils"

import { ValueConversionError } from "./errors.js"
import { toBytes } from "./bytes.js"
import type { StoredValue } from "./types.js"

const digestPattern = /^[0-9a-f]{64}$/

export const hashIndexValue = (value: StoredValue): string => bytesToHex(sha256(toBytes(value)))

/**
 * An index value that has already been hashed, for filtering on a
 * hash-indexed field without holding the original value.
 */
export class PreHashed {
	constructor(public readonly digest: string) {
		if (!digestPattern.test(digest)) {
			throw new ValueConversionError(`expected a lowercase hex sha-256 digest, received ${JSON.stringify(digest)}`)
		}
	}
}

export const preHashed = (digest: string) => new PreHashed(digest)
