import { isRecordId } from "@linkdb/fields"
import { assert, signalInvalidType } from "@linkdb/utils"

import type { StoreEffect } from "./types.js"

export const namePattern = /^[a-zA-Z0-9$:_\-.]+$/

export function validateEffect(effect: StoreEffect) {
	assert(namePattern.test(effect.model), "invalid model name", { model: effect.model })
	assert(isRecordId(effect.id), "invalid record id", { model: effect.model, id: effect.id })

	if (effect.operation === "set") {
		for (const [name, value] of Object.entries(effect.fields)) {
			assert(namePattern.test(name), "invalid field name", { model: effect.model, field: name })
			assert(typeof value === "string" || value instanceof Uint8Array, "invalid stored value", {
				model: effect.model,
				field: name,
			})
		}
	} else if (effect.operation === "index") {
		assert(namePattern.test(effect.field), "invalid field name", { model: effect.model, field: effect.field })
	} else if (effect.operation === "delete") {
		return
	} else {
		signalInvalidType(effect)
	}
}
