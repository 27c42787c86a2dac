import {
	PreHashed,
	RecordId,
	ReferenceField,
	ReferentialIntegrityError,
	SchemaError,
} from "@linkdb/fields"

import { ModelRecord } from "./ModelRecord.js"
import { FetchContext } from "./cascade.js"
import type { ModelAPI } from "./ModelAPI.js"
import type { FetchOptions, WhereCondition } from "./types.js"

type IndexCondition = { field: string; value: string }

/**
 * An equality filter over indexed fields. Every condition narrows the
 * result; records are returned in ascending id order.
 */
export class Query {
	readonly #conditions: IndexCondition[]

	public constructor(
		public readonly api: ModelAPI,
		conditions: IndexCondition[] = [],
	) {
		this.#conditions = conditions
	}

	public filter(where: WhereCondition): Query {
		const conditions = Object.entries(where).map(([name, value]) => ({
			field: name,
			value: this.#getIndexValue(name, value),
		}))

		return new Query(this.api, [...this.#conditions, ...conditions])
	}

	public getIds(): RecordId[] {
		if (this.#conditions.length === 0) {
			return this.api.getIds()
		}

		let ids: Set<RecordId> | null = null
		for (const { field, value } of this.#conditions) {
			const entries = this.api.indexLookup(field, value)
			ids = ids === null ? entries : new Set(Array.from<RecordId>(ids).filter((id) => entries.has(id)))
			if (ids.size === 0) {
				break
			}
		}

		return Array.from(ids ?? []).sort((a, b) => a - b)
	}

	public all({ cascadeFetch = false }: FetchOptions = {}): ModelRecord[] {
		const context = cascadeFetch ? new FetchContext() : null
		const records: ModelRecord[] = []
		for (const id of this.getIds()) {
			const record = this.api.load(id, context)
			if (record !== null) {
				records.push(record)
			}
		}

		return records
	}

	public first({ cascadeFetch = false }: FetchOptions = {}): ModelRecord | null {
		const context = cascadeFetch ? new FetchContext() : null
		for (const id of this.getIds()) {
			const record = this.api.load(id, context)
			if (record !== null) {
				return record
			}
		}

		return null
	}

	public count(): number {
		return this.getIds().length
	}

	/** Delete every matching record, returning the number deleted */
	public delete(): number {
		let count = 0
		for (const record of this.all()) {
			if (record.delete()) {
				count++
			}
		}

		return count
	}

	#getIndexValue(name: string, value: unknown): string {
		const field = this.api.getField(name)
		if (!this.api.model.indexes.includes(name)) {
			throw new SchemaError(`cannot filter on ${this.api.name}.${name}: field is not indexed`)
		}

		if (value instanceof PreHashed) {
			if (!field.hashIndex) {
				throw new SchemaError(`cannot filter on ${this.api.name}.${name} by digest: field is not hash-indexed`)
			}

			return value.digest
		}

		if (field instanceof ReferenceField && value instanceof ModelRecord) {
			if (value.model !== field.target) {
				throw new ReferentialIntegrityError(
					`field "${name}" links to ${field.target} records, received a ${value.model} record`,
				)
			} else if (value.id === null) {
				throw new ReferentialIntegrityError(`cannot filter on ${this.api.name}.${name} by an unsaved record`)
			}

			return field.toIndex(value.id)
		}

		return field.toIndex(field.fromInput(value))
	}
}
