import { Logger, logger } from "@libp2p/logger"

import type { RecordId, StoredFields } from "@linkdb/fields"

import type { KeyValueStore, StoreEffect } from "./types.js"

export abstract class AbstractStore implements KeyValueStore {
	protected readonly log: Logger

	protected constructor(namespace = "linkdb:store") {
		this.log = logger(namespace)
	}

	public abstract getFields(model: string, id: RecordId): StoredFields | null
	public abstract indexLookup(model: string, field: string, value: string): Set<RecordId>
	public abstract nextId(model: string): RecordId
	public abstract getIds(model: string): RecordId[]
	public abstract clear(model: string): void
	public abstract close(): void

	// Batch effect API

	public abstract apply(effects: StoreEffect[]): void

	// Single-effect operations

	public setFields(model: string, id: RecordId, fields: StoredFields) {
		this.apply([{ operation: "set", model, id, fields }])
	}

	public indexUpdate(model: string, field: string, oldValue: string | null, newValue: string | null, id: RecordId) {
		this.apply([{ operation: "index", model, field, id, oldValue, newValue }])
	}

	public delete(model: string, id: RecordId) {
		this.apply([{ operation: "delete", model, id }])
	}
}
