import { Logger, logger } from "@libp2p/logger"

import { Field, RecordId, SchemaError, StoredFields } from "@linkdb/fields"

import { ModelRecord } from "./ModelRecord.js"
import { Query } from "./Query.js"
import { FetchContext } from "./cascade.js"
import { withStore } from "./utils.js"
import type { ModelDB } from "./ModelDB.js"
import type { FetchOptions, Model, SaveOptions, WhereCondition } from "./types.js"

export class ModelAPI {
	public readonly log: Logger

	readonly #fields = new Map<string, Field>()

	public constructor(
		public readonly db: ModelDB,
		public readonly model: Model,
	) {
		this.log = logger(`linkdb:orm:[${model.name}]`)
		for (const field of model.fields) {
			this.#fields.set(field.name, field)
		}
	}

	public get name(): string {
		return this.model.name
	}

	public getField(name: string): Field {
		const field = this.#fields.get(name)
		if (field === undefined) {
			throw new SchemaError(`field "${this.name}.${name}" does not exist`)
		}

		return field
	}

	/** Create a new, unsaved record */
	public create(values: Record<string, unknown> = {}): ModelRecord {
		return new ModelRecord(this, values)
	}

	public get(id: RecordId, { cascadeFetch = false }: FetchOptions = {}): ModelRecord | null {
		return this.load(id, cascadeFetch ? new FetchContext() : null)
	}

	public getMany(ids: RecordId[], { cascadeFetch = false }: FetchOptions = {}): (ModelRecord | null)[] {
		const context = cascadeFetch ? new FetchContext() : null
		return ids.map((id) => this.load(id, context))
	}

	public exists(id: RecordId): boolean {
		return this.getStoredFields(id) !== null
	}

	public count(): number {
		return this.getIds().length
	}

	public all(options: FetchOptions = {}): ModelRecord[] {
		return new Query(this).all(options)
	}

	public first(options: FetchOptions = {}): ModelRecord | null {
		return new Query(this).first(options)
	}

	public filter(where: WhereCondition): Query {
		return new Query(this).filter(where)
	}

	/** Save several records of this model in one batch */
	public save(records: ModelRecord[], options: SaveOptions = {}): RecordId[] {
		for (const record of records) {
			if (record.model !== this.name) {
				throw new SchemaError(`cannot save a ${record.model} record as ${this.name}`)
			}
		}

		return this.db.save(records, options)
	}

	/** Delete every record of this model, along with its indexes and id counter */
	public destroyModel() {
		this.log("destroying model")
		withStore(this.log, "clear", () => this.db.store.clear(this.name))
	}

	// Store access

	/** @internal */
	public load(id: RecordId, context: FetchContext | null): ModelRecord | null {
		const existing = context?.get(this.name, id)
		if (existing) {
			return existing
		}

		const stored = this.getStoredFields(id)
		if (stored === null) {
			return null
		}

		const record = ModelRecord.load(this, id, stored)
		if (context !== null) {
			context.add(record)
			record.cascadeFetch(context)
		}

		return record
	}

	/** @internal */
	public getStoredFields(id: RecordId): StoredFields | null {
		return withStore(this.log, "getFields", () => this.db.store.getFields(this.name, id))
	}

	/** @internal */
	public getIds(): RecordId[] {
		return withStore(this.log, "getIds", () => this.db.store.getIds(this.name))
	}

	/** @internal */
	public indexLookup(field: string, value: string): Set<RecordId> {
		return withStore(this.log, "indexLookup", () => this.db.store.indexLookup(this.name, field, value))
	}

	/** @internal */
	public nextId(): RecordId {
		return withStore(this.log, "nextId", () => this.db.store.nextId(this.name))
	}
}
