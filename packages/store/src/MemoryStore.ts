import type { RecordId, StoredFields, StoredValue } from "@linkdb/fields"
import { signalInvalidType } from "@linkdb/utils"

import { AbstractStore } from "./AbstractStore.js"
import { validateEffect } from "./validate.js"
import type { StoreEffect } from "./types.js"

const copyValue = (value: StoredValue): StoredValue => (typeof value === "string" ? value : value.slice())

const copyFields = (fields: StoredFields): StoredFields =>
	Object.fromEntries(Object.entries(fields).map(([name, value]) => [name, copyValue(value)]))

/**
 * An in-process store. Every batch is validated in full before any of it
 * is applied, so a rejected batch leaves the store untouched.
 */
export class MemoryStore extends AbstractStore {
	readonly #records = new Map<string, Map<RecordId, StoredFields>>()
	readonly #indexes = new Map<string, Map<string, Set<RecordId>>>()
	readonly #counters = new Map<string, number>()

	public constructor() {
		super("linkdb:store:memory")
	}

	public getFields(model: string, id: RecordId): StoredFields | null {
		const fields = this.#records.get(model)?.get(id)
		return fields === undefined ? null : copyFields(fields)
	}

	public indexLookup(model: string, field: string, value: string): Set<RecordId> {
		return new Set(this.#indexes.get(model)?.get(MemoryStore.getIndexKey(field, value)))
	}

	public nextId(model: string): RecordId {
		const id = (this.#counters.get(model) ?? 0) + 1
		this.#counters.set(model, id)
		return id
	}

	public getIds(model: string): RecordId[] {
		const records = this.#records.get(model)
		return records === undefined ? [] : Array.from(records.keys()).sort((a, b) => a - b)
	}

	public apply(effects: StoreEffect[]) {
		effects.forEach(validateEffect)

		for (const effect of effects) {
			this.log.trace("applying %s effect to %s/%d", effect.operation, effect.model, effect.id)
			if (effect.operation === "set") {
				let records = this.#records.get(effect.model)
				if (records === undefined) {
					records = new Map()
					this.#records.set(effect.model, records)
				}

				records.set(effect.id, { ...records.get(effect.id), ...copyFields(effect.fields) })
			} else if (effect.operation === "index") {
				if (effect.oldValue === effect.newValue) {
					continue
				}

				let index = this.#indexes.get(effect.model)
				if (index === undefined) {
					index = new Map()
					this.#indexes.set(effect.model, index)
				}

				if (effect.oldValue !== null) {
					const key = MemoryStore.getIndexKey(effect.field, effect.oldValue)
					const ids = index.get(key)
					ids?.delete(effect.id)
					if (ids?.size === 0) {
						index.delete(key)
					}
				}

				if (effect.newValue !== null) {
					const key = MemoryStore.getIndexKey(effect.field, effect.newValue)
					const ids = index.get(key) ?? new Set()
					ids.add(effect.id)
					index.set(key, ids)
				}
			} else if (effect.operation === "delete") {
				this.#records.get(effect.model)?.delete(effect.id)
			} else {
				signalInvalidType(effect)
			}
		}
	}

	public clear(model: string) {
		this.log("clearing model %s", model)
		this.#records.delete(model)
		this.#indexes.delete(model)
		this.#counters.delete(model)
	}

	public close() {
		this.log("closing")
	}

	private static getIndexKey = (field: string, value: string) => JSON.stringify([field, value])
}
