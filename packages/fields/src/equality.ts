import { deepEqual } from "@linkdb/utils"

import { isNullSentinel } from "./NullSentinel.js"
import type { FieldValue } from "./types.js"

export function valuesEqual(a: FieldValue, b: FieldValue): boolean {
	if (isNullSentinel(a) || isNullSentinel(b)) {
		return isNullSentinel(a) && isNullSentinel(b)
	}

	return deepEqual(a, b)
}
