import Database, * as sqlite from "better-sqlite3"

import type { RecordId, StoredFields, StoredValue } from "@linkdb/fields"
import { AbstractStore, StoreEffect, validateEffect } from "@linkdb/store"
import { assert, signalInvalidType } from "@linkdb/utils"

import { Method, Query, SqlitePrimitiveValue } from "./utils.js"

export interface SqliteStoreInit {
	/** Path to the database file, or null for an in-memory database */
	path: string | null
	clear?: boolean
}

const encodeValue = (value: StoredValue): string | Buffer =>
	typeof value === "string" ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength)

function decodeValue(value: SqlitePrimitiveValue): StoredValue {
	if (typeof value === "string") {
		return value
	} else if (Buffer.isBuffer(value)) {
		return new Uint8Array(value)
	}

	throw new TypeError(`internal error: unexpected stored value ${String(value)}`)
}

export class SqliteStore extends AbstractStore {
	public readonly db: sqlite.Database

	// Methods
	readonly #insertRecord: Method<[model: string, id: number]>
	readonly #setField: Method<[model: string, id: number, name: string, value: string | Buffer]>
	readonly #deleteRecord: Method<[model: string, id: number]>
	readonly #deleteFields: Method<[model: string, id: number]>
	readonly #addIndexEntry: Method<[model: string, field: string, value: string, id: number]>
	readonly #removeIndexEntry: Method<[model: string, field: string, value: string, id: number]>
	readonly #clearRecords: Method<[model: string]>
	readonly #clearFields: Method<[model: string]>
	readonly #clearIndexes: Method<[model: string]>
	readonly #clearCounter: Method<[model: string]>

	// Queries
	readonly #selectRecord: Query<[model: string, id: number], { id: number }>
	readonly #selectFields: Query<[model: string, id: number], { name: string; value: SqlitePrimitiveValue }>
	readonly #selectIndexEntry: Query<[model: string, field: string, value: string], { id: number }>
	readonly #selectIds: Query<[model: string], { id: number }>
	readonly #nextId: Query<[model: string], { id: number }>

	readonly #transaction: sqlite.Transaction<(effects: StoreEffect[]) => void>

	public constructor({ path, clear = false }: SqliteStoreInit) {
		super("linkdb:store:sqlite")

		this.db = new Database(path ?? ":memory:")
		this.log("opened database at %s", path ?? ":memory:")

		this.db.exec(`CREATE TABLE IF NOT EXISTS "records" ("model" TEXT NOT NULL, "id" INTEGER NOT NULL, PRIMARY KEY ("model", "id"))`)
		this.db.exec(
			`CREATE TABLE IF NOT EXISTS "fields" ("model" TEXT NOT NULL, "id" INTEGER NOT NULL, "name" TEXT NOT NULL, "value" NOT NULL, PRIMARY KEY ("model", "id", "name"))`,
		)
		this.db.exec(
			`CREATE TABLE IF NOT EXISTS "indexes" ("model" TEXT NOT NULL, "field" TEXT NOT NULL, "value" TEXT NOT NULL, "id" INTEGER NOT NULL, PRIMARY KEY ("model", "field", "value", "id"))`,
		)
		this.db.exec(`CREATE TABLE IF NOT EXISTS "counters" ("model" TEXT PRIMARY KEY NOT NULL, "id" INTEGER NOT NULL)`)

		if (clear) {
			this.log("clearing database")
			for (const table of ["records", "fields", "indexes", "counters"]) {
				this.db.exec(`DELETE FROM "${table}"`)
			}
		}

		this.#insertRecord = new Method(this.db, `INSERT OR IGNORE INTO "records" ("model", "id") VALUES (?, ?)`)
		this.#setField = new Method(
			this.db,
			`INSERT INTO "fields" ("model", "id", "name", "value") VALUES (?, ?, ?, ?) ON CONFLICT ("model", "id", "name") DO UPDATE SET "value" = excluded."value"`,
		)
		this.#deleteRecord = new Method(this.db, `DELETE FROM "records" WHERE "model" = ? AND "id" = ?`)
		this.#deleteFields = new Method(this.db, `DELETE FROM "fields" WHERE "model" = ? AND "id" = ?`)
		this.#addIndexEntry = new Method(
			this.db,
			`INSERT OR IGNORE INTO "indexes" ("model", "field", "value", "id") VALUES (?, ?, ?, ?)`,
		)
		this.#removeIndexEntry = new Method(
			this.db,
			`DELETE FROM "indexes" WHERE "model" = ? AND "field" = ? AND "value" = ? AND "id" = ?`,
		)
		this.#clearRecords = new Method(this.db, `DELETE FROM "records" WHERE "model" = ?`)
		this.#clearFields = new Method(this.db, `DELETE FROM "fields" WHERE "model" = ?`)
		this.#clearIndexes = new Method(this.db, `DELETE FROM "indexes" WHERE "model" = ?`)
		this.#clearCounter = new Method(this.db, `DELETE FROM "counters" WHERE "model" = ?`)

		this.#selectRecord = new Query(this.db, `SELECT "id" FROM "records" WHERE "model" = ? AND "id" = ?`)
		this.#selectFields = new Query(this.db, `SELECT "name", "value" FROM "fields" WHERE "model" = ? AND "id" = ?`)
		this.#selectIndexEntry = new Query(
			this.db,
			`SELECT "id" FROM "indexes" WHERE "model" = ? AND "field" = ? AND "value" = ? ORDER BY "id" ASC`,
		)
		this.#selectIds = new Query(this.db, `SELECT "id" FROM "records" WHERE "model" = ? ORDER BY "id" ASC`)
		this.#nextId = new Query(
			this.db,
			`INSERT INTO "counters" ("model", "id") VALUES (?, 1) ON CONFLICT ("model") DO UPDATE SET "id" = "id" + 1 RETURNING "id"`,
		)

		this.#transaction = this.db.transaction((effects: StoreEffect[]) => {
			for (const effect of effects) {
				this.log.trace("applying %s effect to %s/%d", effect.operation, effect.model, effect.id)
				if (effect.operation === "set") {
					this.#insertRecord.run([effect.model, effect.id])
					for (const [name, value] of Object.entries(effect.fields)) {
						this.#setField.run([effect.model, effect.id, name, encodeValue(value)])
					}
				} else if (effect.operation === "index") {
					if (effect.oldValue === effect.newValue) {
						continue
					}

					if (effect.oldValue !== null) {
						this.#removeIndexEntry.run([effect.model, effect.field, effect.oldValue, effect.id])
					}

					if (effect.newValue !== null) {
						this.#addIndexEntry.run([effect.model, effect.field, effect.newValue, effect.id])
					}
				} else if (effect.operation === "delete") {
					this.#deleteFields.run([effect.model, effect.id])
					this.#deleteRecord.run([effect.model, effect.id])
				} else {
					signalInvalidType(effect)
				}
			}
		})
	}

	public getFields(model: string, id: RecordId): StoredFields | null {
		if (this.#selectRecord.get([model, id]) === null) {
			return null
		}

		const fields: StoredFields = {}
		for (const { name, value } of this.#selectFields.all([model, id])) {
			fields[name] = decodeValue(value)
		}

		return fields
	}

	public indexLookup(model: string, field: string, value: string): Set<RecordId> {
		return new Set(this.#selectIndexEntry.all([model, field, value]).map(({ id }) => id))
	}

	public nextId(model: string): RecordId {
		const result = this.#nextId.get([model])
		assert(result !== null, "internal error - failed to allocate id", { model })
		return result.id
	}

	public getIds(model: string): RecordId[] {
		return this.#selectIds.all([model]).map(({ id }) => id)
	}

	public apply(effects: StoreEffect[]) {
		effects.forEach(validateEffect)
		this.#transaction(effects)
	}

	public clear(model: string) {
		this.log("clearing model %s", model)
		this.db.transaction(() => {
			this.#clearFields.run([model])
			this.#clearRecords.run([model])
			this.#clearIndexes.run([model])
			this.#clearCounter.run([model])
		})()
	}

	public close() {
		this.log("closing")
		this.db.close()
	}
}
