import type { RecordId, StoredFields } from "@linkdb/fields"

/** Merge `fields` into the stored record, creating it if necessary */
export type SetEffect = { operation: "set"; model: string; id: RecordId; fields: StoredFields }

/**
 * Move `id` from the `oldValue` entry to the `newValue` entry of an index.
 * A null value on either side means "no entry".
 */
export type IndexEffect = {
	operation: "index"
	model: string
	field: string
	id: RecordId
	oldValue: string | null
	newValue: string | null
}

/** Remove the record and all of its fields. Index entries are removed separately. */
export type DeleteEffect = { operation: "delete"; model: string; id: RecordId }

export type StoreEffect = SetEffect | IndexEffect | DeleteEffect

export interface KeyValueStore {
	getFields(model: string, id: RecordId): StoredFields | null
	setFields(model: string, id: RecordId, fields: StoredFields): void
	indexLookup(model: string, field: string, value: string): Set<RecordId>
	indexUpdate(model: string, field: string, oldValue: string | null, newValue: string | null, id: RecordId): void
	nextId(model: string): RecordId
	delete(model: string, id: RecordId): void

	/** Apply every effect, or none of them */
	apply(effects: StoreEffect[]): void

	/** Ids of every stored record of the model, ascending */
	getIds(model: string): RecordId[]

	/** Remove every record, index entry and id counter of the model */
	clear(model: string): void

	close(): void
}
