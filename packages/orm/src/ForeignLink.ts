import {
	NullSentinel,
	RecordId,
	ReferenceField,
	ReferentialIntegrityError,
	isNullSentinel,
	isRecordId,
	nullSentinel,
} from "@linkdb/fields"

import { ModelRecord } from "./ModelRecord.js"
import type { ModelAPI } from "./ModelAPI.js"

/**
 * The value of a reference field. A link holds either a bare id or a
 * resolved record; reading an unresolved link fetches the target once
 * and caches it.
 */
export class ForeignLink {
	#id: RecordId | null = null
	#record: ModelRecord | null = null
	#fetched = false

	public constructor(
		public readonly field: ReferenceField,
		public readonly target: ModelAPI,
		value: unknown = null,
	) {
		this.set(value)
	}

	/** The target id, which is null for empty links and for unsaved targets */
	public get id(): RecordId | null {
		return this.#record === null ? this.#id : this.#record.id
	}

	public isFetched(): boolean {
		return this.#fetched
	}

	public isEmpty(): boolean {
		return this.#id === null && this.#record === null
	}

	/** The resolved record, without fetching */
	public getRecord(): ModelRecord | null {
		return this.#record
	}

	public hasUnsavedRecord(): boolean {
		return this.#record !== null && this.#record.id === null
	}

	public get(): ModelRecord | NullSentinel {
		if (this.#record !== null) {
			return this.#record
		} else if (this.#id === null || this.#fetched) {
			return nullSentinel
		}

		this.#record = this.target.get(this.#id)
		this.#fetched = true
		return this.#record ?? nullSentinel
	}

	public set(value: unknown) {
		if (value === null || value === undefined || value === "" || isNullSentinel(value)) {
			this.#id = null
			this.#record = null
			this.#fetched = false
		} else if (value instanceof ModelRecord) {
			if (value.model !== this.field.target) {
				throw new ReferentialIntegrityError(
					`field "${this.field.name}" links to ${this.field.target} records, received a ${value.model} record`,
				)
			}

			this.#id = value.id
			this.#record = value
			this.#fetched = true
		} else {
			const id = this.field.fromInput(value)
			this.#id = isRecordId(id) ? id : null
			this.#record = null
			this.#fetched = false
		}
	}

	/** Attach a record obtained elsewhere (a cascade fetch), or record that the target is missing */
	public resolve(record: ModelRecord | null) {
		this.#record = record
		this.#fetched = true
	}

	public clone(): ForeignLink {
		const link = new ForeignLink(this.field, this.target)
		link.#id = this.#id
		link.#record = this.#record
		link.#fetched = this.#fetched
		return link
	}

	public toJSON() {
		return this.id
	}

	public toString() {
		return this.id === null ? "" : `${this.field.target}/${this.id}`
	}
}
