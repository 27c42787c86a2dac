import test, { ExecutionContext } from "ava"

import { MemoryStore } from "@linkdb/store"
import { SqliteStore } from "@linkdb/store-sqlite"
import { ForeignLink, ModelDB, ModelRecord, ModelSchema, RecordValue, SlotValue } from "@linkdb/orm"

export const testPlatforms = (
	name: string,
	run: (t: ExecutionContext<unknown>, openDB: (t: ExecutionContext, models: ModelSchema) => ModelDB) => void,
) => {
	const macro = test.macro(run)

	test(`Memory - ${name}`, macro, (t, models) => {
		const db = new ModelDB({ store: new MemoryStore(), models })
		t.teardown(() => db.close())
		return db
	})

	test(`Sqlite - ${name}`, macro, (t, models) => {
		const db = new ModelDB({ store: new SqliteStore({ path: null }), models })
		t.teardown(() => db.close())
		return db
	})
}

export const linkModels: ModelSchema = {
	refed: { name: "string", strVal: "string", intVal: "integer", $indexes: ["name"] },
	main: { name: "string", value: "string", other: "@refed", $indexes: ["name"] },
	premain: { name: "string", value: "string", main: "@main", $indexes: ["name"] },
}

export const nodeModels: ModelSchema = {
	node: { name: "string", next: "@node", $indexes: ["name"] },
}

export function getRecord(value: RecordValue | null): ModelRecord {
	if (value instanceof ModelRecord) {
		return value
	}

	throw new Error(`expected a record, received ${String(value)}`)
}

/** The record behind a link reported by reload or getUpdatedFields */
export function getLinkedRecord(value: SlotValue | undefined): ModelRecord {
	if (value instanceof ForeignLink) {
		return getRecord(value.getRecord())
	}

	throw new Error(`expected a link, received ${String(value)}`)
}
