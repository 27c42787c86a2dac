import {
	Field,
	FieldValue,
	PlainValue,
	RecordId,
	ReferenceField,
	ReferentialIntegrityError,
	SchemaError,
	StorageRoundTripError,
	StoredFields,
	StoredValue,
	ValueConversionError,
	isNullSentinel,
	isRecordId,
	nullSentinel,
	valuesEqual,
} from "@linkdb/fields"
import type { StoreEffect } from "@linkdb/store"
import { assert } from "@linkdb/utils"

import { ForeignLink } from "./ForeignLink.js"
import { FetchContext } from "./cascade.js"
import type { SavePlan } from "./cascade.js"
import type { ModelAPI } from "./ModelAPI.js"
import type {
	EqualityOptions,
	FieldChanges,
	RecordValue,
	ReloadOptions,
	SaveOptions,
} from "./types.js"

function cloneValue(value: PlainValue): PlainValue
function cloneValue(value: FieldValue): FieldValue
function cloneValue(value: FieldValue): FieldValue {
	if (value === null || isNullSentinel(value) || typeof value !== "object") {
		return value
	} else if (value instanceof Uint8Array) {
		return value.slice()
	} else if (Array.isArray(value)) {
		return value.map((item) => cloneValue(item))
	} else {
		return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, cloneValue(item)]))
	}
}

/** Decode a value read from the store; values the field cannot parse are a storage failure */
function decodeStored(record: string, field: Field, raw: StoredValue): FieldValue {
	try {
		return field.fromStorage(raw)
	} catch (err) {
		if (err instanceof ValueConversionError) {
			throw new StorageRoundTripError(`malformed stored value for ${record}.${field.name}: ${err.message}`, {
				cause: err,
			})
		}

		throw err
	}
}

type VisitedPairs = Map<ModelRecord, Set<ModelRecord>>

/**
 * A single typed row. Scalar fields hold converted values, reference
 * fields hold a ForeignLink. The baseline is the state last read from or
 * written to the store, and `getUpdatedFields` diffs against it.
 */
export class ModelRecord {
	#id: RecordId | null = null

	readonly #values = new Map<string, FieldValue>()
	readonly #links = new Map<string, ForeignLink>()

	#baselineValues = new Map<string, FieldValue>()
	#baselineLinks = new Map<string, ForeignLink>()

	public static load(api: ModelAPI, id: RecordId, stored: StoredFields): ModelRecord {
		const record = new ModelRecord(api)
		record.#id = id
		for (const field of api.model.fields) {
			const value = decodeStored(`${api.name}/${id}`, field, stored[field.name] ?? "")
			if (field instanceof ReferenceField) {
				record.#getLink(field.name).set(value)
			} else {
				record.#values.set(field.name, value)
			}
		}

		record.#snapshot()
		return record
	}

	public constructor(
		public readonly api: ModelAPI,
		values: Record<string, unknown> = {},
	) {
		for (const name of Object.keys(values)) {
			api.getField(name)
		}

		for (const field of api.model.fields) {
			const value = values[field.name]
			if (field instanceof ReferenceField) {
				const target = api.db.getModel(field.target)
				this.#links.set(field.name, new ForeignLink(field, target, value === undefined ? field.defaultValue : value))
			} else {
				this.#values.set(field.name, value === undefined ? field.defaultValue : field.fromInput(value))
			}
		}

		this.#snapshot()
	}

	public get id(): RecordId | null {
		return this.#id
	}

	public get model(): string {
		return this.api.name
	}

	/** Read a field. Reading an unresolved link fetches the linked record. */
	public get(name: string): RecordValue {
		const field = this.api.getField(name)
		if (field instanceof ReferenceField) {
			return this.#getLink(name).get()
		} else {
			return this.#getValue(name)
		}
	}

	public set(name: string, value: unknown) {
		const field = this.api.getField(name)
		if (field instanceof ReferenceField) {
			this.#getLink(name).set(value)
		} else {
			this.#values.set(name, field.fromInput(value))
		}
	}

	/** The ForeignLink held by a reference field */
	public link(name: string): ForeignLink {
		const field = this.api.getField(name)
		if (!(field instanceof ReferenceField)) {
			throw new SchemaError(`field "${this.model}.${name}" is not a reference field`)
		}

		return this.#getLink(name)
	}

	/** Fields whose current value differs from the baseline. Never resolves links. */
	public getUpdatedFields(): FieldChanges {
		const changes: FieldChanges = {}
		for (const field of this.api.model.fields) {
			if (field instanceof ReferenceField) {
				const current = this.#getLink(field.name)
				const baseline = this.#getBaselineLink(field.name)
				if (
					current.id !== baseline.id ||
					(current.hasUnsavedRecord() && current.getRecord() !== baseline.getRecord())
				) {
					changes[field.name] = [baseline.clone(), current.clone()]
				}
			} else {
				const current = this.#getValue(field.name)
				const baseline = this.#getBaselineValue(field.name)
				if (!valuesEqual(baseline, current)) {
					changes[field.name] = [baseline, current]
				}
			}
		}

		return changes
	}

	public hasUnsavedChanges({ cascadeObjects = false }: ReloadOptions = {}): boolean {
		return this.#hasUnsavedChanges(cascadeObjects, new Set())
	}

	#hasUnsavedChanges(cascadeObjects: boolean, visited: Set<ModelRecord>): boolean {
		if (visited.has(this)) {
			return false
		}

		visited.add(this)
		if (this.#id === null || Object.keys(this.getUpdatedFields()).length > 0) {
			return true
		}

		if (cascadeObjects) {
			for (const link of this.#links.values()) {
				const record = link.getRecord()
				if (record !== null && record.#hasUnsavedChanges(cascadeObjects, visited)) {
					return true
				}
			}
		}

		return false
	}

	/** Storage-encoded values, with links as id text */
	public asDict(options: { forStorage: true }): StoredFields
	/** Typed values, with links as ids. Never resolves links. */
	public asDict(options?: { forStorage?: false }): Record<string, FieldValue>
	public asDict(options?: { forStorage?: boolean }): StoredFields | Record<string, FieldValue>
	public asDict({ forStorage = false }: { forStorage?: boolean } = {}): StoredFields | Record<string, FieldValue> {
		if (forStorage) {
			const fields: StoredFields = {}
			for (const field of this.api.model.fields) {
				fields[field.name] = field.toStorage(this.#getSlotValue(field))
			}

			return fields
		} else {
			const values: Record<string, FieldValue> = {}
			for (const field of this.api.model.fields) {
				values[field.name] = this.#getSlotValue(field)
			}

			return values
		}
	}

	/**
	 * Copy the record's values into a new record. Links are copied as-is, so
	 * a resolved link shares its target with the original. With `withId`
	 * the copy is another handle on the same stored record.
	 */
	public copy({ withId = false }: { withId?: boolean } = {}): ModelRecord {
		const record = new ModelRecord(this.api)
		for (const [name, value] of this.#values) {
			record.#values.set(name, cloneValue(value))
		}

		for (const [name, link] of this.#links) {
			record.#links.set(name, link.clone())
		}

		if (withId) {
			record.#id = this.#id
			record.#baselineValues = new Map(this.#baselineValues)
			record.#baselineLinks = new Map(Array.from(this.#baselineLinks, ([name, link]) => [name, link.clone()]))
		} else {
			record.#snapshot()
		}

		return record
	}

	public save(options: SaveOptions = {}): RecordId[] {
		return this.api.db.save([this], options)
	}

	/** Delete the record and its index entries. Returns false for unsaved records. */
	public delete(): boolean {
		if (this.#id === null) {
			return false
		}

		const effects: StoreEffect[] = []
		for (const name of this.api.model.indexes) {
			const field = this.api.getField(name)
			effects.push({
				operation: "index",
				model: this.model,
				field: name,
				id: this.#id,
				oldValue: field.toIndex(this.#getBaselineSlotValue(field)),
				newValue: null,
			})
		}

		effects.push({ operation: "delete", model: this.model, id: this.#id })
		this.api.db.apply(effects)

		this.api.log("deleted %s/%d", this.model, this.#id)
		this.#id = null
		this.#snapshot()
		return true
	}

	/** Resolve every link, following the link graph to any depth */
	public cascadeFetch(context: FetchContext = new FetchContext()) {
		context.schedule(this, () => this.#resolveLinks(context))
	}

	#resolveLinks(context: FetchContext) {
		for (const link of this.#links.values()) {
			let record = link.getRecord()
			if (record === null && link.id !== null && !link.isFetched()) {
				record = link.target.load(link.id, context)
				link.resolve(record)
			}

			record?.cascadeFetch(context)
		}
	}

	/**
	 * Re-read the record from the store, returning `[before, after]` for
	 * every field whose value changed. With `cascadeObjects`, linked records
	 * that are already resolved are reloaded as well.
	 */
	public reload({ cascadeObjects = false }: ReloadOptions = {}): FieldChanges {
		return this.#reload(cascadeObjects, new Set())
	}

	#reload(cascadeObjects: boolean, visited: Set<ModelRecord>): FieldChanges {
		assert(this.#id !== null, "cannot reload an unsaved record", { model: this.model })
		visited.add(this)

		const stored = this.api.getStoredFields(this.#id)
		if (stored === null) {
			throw new StorageRoundTripError(`record ${this} no longer exists`)
		}

		const changes: FieldChanges = {}
		for (const field of this.api.model.fields) {
			const value = decodeStored(this.toString(), field, stored[field.name] ?? "")
			if (field instanceof ReferenceField) {
				const link = this.#getLink(field.name)
				const storedId = isRecordId(value) ? value : null
				if (link.id !== storedId || link.hasUnsavedRecord()) {
					const before = link.clone()
					link.set(storedId)
					changes[field.name] = [before, link.clone()]
					continue
				}

				const record = link.getRecord()
				if (cascadeObjects && record !== null && record.id !== null && !visited.has(record)) {
					const snapshot = record.copy({ withId: true })
					const nested = record.#reload(cascadeObjects, visited)
					if (Object.keys(nested).length > 0) {
						changes[field.name] = [new ForeignLink(field, link.target, snapshot), link.clone()]
					}
				}
			} else {
				const before = this.#getValue(field.name)
				if (!valuesEqual(before, value)) {
					changes[field.name] = [before, value]
				}

				this.#values.set(field.name, value)
			}
		}

		this.#snapshot()
		if (Object.keys(changes).length > 0) {
			this.api.log("reloaded %s with changes to %o", this, Object.keys(changes))
		}

		return changes
	}

	/**
	 * Scalar fields must be equal and links must point at the same id.
	 * With `cascadeObject`, resolved linked records must also be equal by
	 * value; a resolved record compared with an unresolved link is equal
	 * only if it has no unsaved changes.
	 */
	public hasSameValues(other: ModelRecord, { cascadeObject = true }: EqualityOptions = {}): boolean {
		return this.#hasSameValues(other, cascadeObject, new Map())
	}

	#hasSameValues(other: ModelRecord, cascadeObject: boolean, visited: VisitedPairs): boolean {
		if (this === other) {
			return true
		} else if (this.model !== other.model) {
			return false
		}

		const pairs = visited.get(this) ?? new Set()
		if (pairs.has(other)) {
			return true
		}

		pairs.add(other)
		visited.set(this, pairs)

		for (const [name, value] of this.#values) {
			if (!valuesEqual(value, other.#getValue(name))) {
				return false
			}
		}

		for (const [name, link] of this.#links) {
			const otherLink = other.#getLink(name)
			const [a, b] = [link.getRecord(), otherLink.getRecord()]

			if (link.id !== null || otherLink.id !== null) {
				if (link.id !== otherLink.id) {
					return false
				}
			} else if (a === null || b === null) {
				if (a !== b) {
					return false
				}

				continue
			} else if (!a.#hasSameValues(b, cascadeObject, visited)) {
				return false
			}

			if (!cascadeObject) {
				continue
			} else if (a !== null && b !== null) {
				if (!a.#hasSameValues(b, cascadeObject, visited)) {
					return false
				}
			} else if (a !== null) {
				if (a.hasUnsavedChanges({ cascadeObjects: true })) {
					return false
				}
			} else if (b !== null) {
				if (b.hasUnsavedChanges({ cascadeObjects: true })) {
					return false
				}
			}
		}

		return true
	}

	public toJSON(): Record<string, FieldValue | RecordId | null> {
		return { id: this.#id, ...this.asDict() }
	}

	public toString() {
		return `${this.model}/${this.#id ?? "(unsaved)"}`
	}

	// Cascade save steps, driven by saveRecords

	/** @internal */
	public collect(plan: SavePlan) {
		if (!plan.add(this)) {
			return
		}

		if (plan.cascadeSave) {
			for (const link of this.#links.values()) {
				link.getRecord()?.collect(plan)
			}
		}
	}

	/** @internal */
	public checkLinks(plan: SavePlan) {
		for (const [name, link] of this.#links) {
			const record = link.getRecord()
			if (record !== null && record.id === null && !plan.has(record)) {
				throw new ReferentialIntegrityError(
					`cannot save ${this} without cascadeSave: field "${name}" links to an unsaved ${record.model} record`,
				)
			}
		}
	}

	/** @internal */
	public getSaveEffects(plan: SavePlan): StoreEffect[] {
		const id = plan.requireId(this)
		const isNew = this.#id === null
		const names = isNew ? this.api.model.fields.map((field) => field.name) : Object.keys(this.getUpdatedFields())
		if (names.length === 0 && !isNew) {
			return []
		}

		const fields: StoredFields = {}
		const effects: StoreEffect[] = [{ operation: "set", model: this.model, id, fields }]
		for (const name of names) {
			const field = this.api.getField(name)
			const value = this.#getPlannedValue(field, plan)
			fields[name] = field.toStorage(value)
			if (this.api.model.indexes.includes(name)) {
				effects.push({
					operation: "index",
					model: this.model,
					field: name,
					id,
					oldValue: isNew ? null : field.toIndex(this.#getBaselineSlotValue(field)),
					newValue: field.toIndex(value),
				})
			}
		}

		this.api.log.trace("planned %d effects for %s", effects.length, this)
		return effects
	}

	/** @internal */
	public commit(id: RecordId) {
		assert(this.#id === null || this.#id === id, "internal error - record id changed", { id: this.#id })
		this.#id = id
		this.#snapshot()
	}

	// Helpers

	#snapshot() {
		this.#baselineValues = new Map(Array.from(this.#values, ([name, value]) => [name, cloneValue(value)]))
		this.#baselineLinks = new Map(Array.from(this.#links, ([name, link]) => [name, link.clone()]))
	}

	#getValue(name: string): FieldValue {
		const value = this.#values.get(name)
		assert(value !== undefined, "internal error - missing value", { model: this.model, field: name })
		return value
	}

	#getLink(name: string): ForeignLink {
		const link = this.#links.get(name)
		assert(link !== undefined, "internal error - missing link", { model: this.model, field: name })
		return link
	}

	#getBaselineValue(name: string): FieldValue {
		const value = this.#baselineValues.get(name)
		assert(value !== undefined, "internal error - missing baseline value", { model: this.model, field: name })
		return value
	}

	#getBaselineLink(name: string): ForeignLink {
		const link = this.#baselineLinks.get(name)
		assert(link !== undefined, "internal error - missing baseline link", { model: this.model, field: name })
		return link
	}

	#getSlotValue(field: Field): FieldValue {
		if (field instanceof ReferenceField) {
			return this.#getLink(field.name).id ?? nullSentinel
		} else {
			return this.#getValue(field.name)
		}
	}

	#getBaselineSlotValue(field: Field): FieldValue {
		if (field instanceof ReferenceField) {
			return this.#getBaselineLink(field.name).id ?? nullSentinel
		} else {
			return this.#getBaselineValue(field.name)
		}
	}

	#getPlannedValue(field: Field, plan: SavePlan): FieldValue {
		if (field instanceof ReferenceField) {
			const link = this.#getLink(field.name)
			const record = link.getRecord()
			const id = record === null ? link.id : plan.getId(record)
			return id ?? nullSentinel
		} else {
			return this.#getValue(field.name)
		}
	}
}
