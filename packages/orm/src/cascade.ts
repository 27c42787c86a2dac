import type { RecordId } from "@linkdb/fields"
import type { StoreEffect } from "@linkdb/store"
import { assert } from "@linkdb/utils"

import type { ModelRecord } from "./ModelRecord.js"
import type { SaveOptions } from "./types.js"

/**
 * The set of records reachable from a save, with the ids reserved for the
 * unsaved ones. Records only receive their ids once the batch has been
 * applied.
 */
export class SavePlan {
	public readonly effects: StoreEffect[] = []
	public readonly records: ModelRecord[] = []

	readonly #members = new Set<ModelRecord>()
	readonly #reserved = new Map<ModelRecord, RecordId>()

	public constructor(public readonly cascadeSave: boolean) {}

	/** Returns false if the record is already part of the plan */
	public add(record: ModelRecord): boolean {
		if (this.#members.has(record)) {
			return false
		}

		this.#members.add(record)
		this.records.push(record)
		return true
	}

	public has(record: ModelRecord): boolean {
		return this.#members.has(record)
	}

	public reserve(record: ModelRecord, id: RecordId) {
		assert(record.id === null, "internal error - reserving an id for a saved record", { id: record.id })
		this.#reserved.set(record, id)
	}

	public getId(record: ModelRecord): RecordId | null {
		return record.id ?? this.#reserved.get(record) ?? null
	}

	public requireId(record: ModelRecord): RecordId {
		const id = this.getId(record)
		assert(id !== null, "internal error - no id reserved for record", { model: record.model })
		return id
	}
}

export function saveRecords(
	records: ModelRecord[],
	{ cascadeSave = true }: SaveOptions,
	apply: (effects: StoreEffect[]) => void,
): RecordId[] {
	const plan = new SavePlan(cascadeSave)
	for (const record of records) {
		record.collect(plan)
	}

	for (const record of plan.records) {
		record.checkLinks(plan)
	}

	for (const record of plan.records) {
		if (record.id === null) {
			plan.reserve(record, record.api.nextId())
		}
	}

	for (const record of plan.records) {
		plan.effects.push(...record.getSaveEffects(plan))
	}

	if (plan.effects.length > 0) {
		apply(plan.effects)
	}

	for (const record of plan.records) {
		record.commit(plan.requireId(record))
	}

	return records.map((record) => plan.requireId(record))
}

/**
 * Per-traversal state for cascade fetches: an identity map keyed by
 * `model/id`, so that a record reached twice is the same instance,
 * and a worklist of records whose links still have to be followed.
 * The worklist keeps the traversal iterative, so long link chains
 * don't grow the call stack.
 */
export class FetchContext {
	readonly #records = new Map<string, ModelRecord>()
	readonly #visited = new Set<ModelRecord>()
	readonly #queue: (() => void)[] = []
	#running = false

	public get(model: string, id: RecordId): ModelRecord | null {
		return this.#records.get(`${model}/${id}`) ?? null
	}

	public add(record: ModelRecord) {
		if (record.id !== null) {
			this.#records.set(`${record.model}/${record.id}`, record)
		}
	}

	/**
	 * Queue `step` for a record that hasn't been visited yet. Steps run in
	 * order; a call made while steps are running only queues.
	 */
	public schedule(record: ModelRecord, step: () => void) {
		if (this.#visited.has(record)) {
			return
		}

		this.#visited.add(record)
		this.add(record)
		this.#queue.push(step)
		if (this.#running) {
			return
		}

		this.#running = true
		try {
			for (let next = this.#queue.shift(); next !== undefined; next = this.#queue.shift()) {
				next()
			}
		} finally {
			this.#running = false
			this.#queue.length = 0
		}
	}
}
