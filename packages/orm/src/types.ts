import type { Field, FieldInit, FieldValue } from "@linkdb/fields"

import type { ForeignLink } from "./ForeignLink.js"
import type { ModelRecord } from "./ModelRecord.js"

export type ModelInit = { $indexes?: string[] } & { [field: string]: FieldInit | string[] | undefined }
export type ModelSchema = Record<string, ModelInit>

// The runtime form of a ModelInit, produced by Config.parse

export type Model = {
	name: string
	fields: Field[]
	indexes: string[]
}

/** What `ModelRecord.get` returns: link fields resolve to the target record */
export type RecordValue = FieldValue | ModelRecord

/** What a record holds for one field: link fields hold a ForeignLink */
export type SlotValue = FieldValue | ForeignLink

export type FieldChange = [before: SlotValue, after: SlotValue]
export type FieldChanges = Record<string, FieldChange>

/**
 * Field name to value. Link fields take an id or a record, hash-indexed
 * fields take a value or `preHashed(digest)`.
 */
export type WhereCondition = Record<string, unknown>

export interface SaveOptions {
	/** Save every resolved, unsaved-or-modified linked record as part of the same batch (default true) */
	cascadeSave?: boolean
}

export interface FetchOptions {
	/** Resolve every link of every result, to any depth (default false) */
	cascadeFetch?: boolean
}

export interface ReloadOptions {
	/** Also reload linked records that are already resolved (default false) */
	cascadeObjects?: boolean
}

export interface EqualityOptions {
	/** Compare resolved linked records by value, not just by id (default true) */
	cascadeObject?: boolean
}
