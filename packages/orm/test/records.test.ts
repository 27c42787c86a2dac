import test from "ava"
import { zlibSync } from "fflate"

import { SchemaError, StorageRoundTripError, ValueConversionError, nullSentinel } from "@linkdb/fields"
import { MemoryStore } from "@linkdb/store"
import type { StoreEffect } from "@linkdb/store"
import { ModelDB } from "@linkdb/orm"

import { getRecord, linkModels, testPlatforms } from "./utils.js"

testPlatforms("new records take default values", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone" })
	t.is(ref.id, null)
	t.is(ref.toString(), "refed/(unsaved)")
	t.deepEqual(ref.asDict(), { name: "rone", strVal: "", intVal: nullSentinel })
	t.deepEqual(ref.asDict({ forStorage: true }), { name: "rone", strVal: "", intVal: "" })
	t.true(ref.hasUnsavedChanges())

	t.deepEqual(ref.save(), [1])
	t.is(ref.toString(), "refed/1")
	t.is(JSON.stringify(ref), `{"id":1,"name":"rone","strVal":"","intVal":null}`)
	t.true(db.models.refed.exists(1))
	t.false(db.models.refed.exists(2))
})

testPlatforms("compressed fields store deflated bytes", (t, openDB) => {
	const db = openDB(t, { blobs: { value: { type: "compressed", mode: "deflate" }, $indexes: ["value"] } })

	const value = new Uint8Array([0x01, ...new TextEncoder().encode("Hello World"), 0x01])
	const blob = db.models.blobs.create({ value })
	t.deepEqual(blob.asDict({ forStorage: true }).value, zlibSync(value, { level: 9 }))
	t.deepEqual(blob.asDict({ forStorage: false }).value, value)

	blob.save()
	t.deepEqual(getRecord(db.models.blobs.get(1)).asDict().value, value)
	t.deepEqual(db.models.blobs.filter({ value }).getIds(), [1])
})

testPlatforms("track dirty fields", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	ref.save()
	t.deepEqual(ref.getUpdatedFields(), {})
	t.false(ref.hasUnsavedChanges())

	ref.set("intVal", "12")
	t.is(ref.get("intVal"), 12)
	t.deepEqual(ref.getUpdatedFields(), { intVal: [1, 12] })
	t.true(ref.hasUnsavedChanges())

	ref.set("intVal", 1)
	t.deepEqual(ref.getUpdatedFields(), {})

	ref.set("strVal", "world")
	t.deepEqual(ref.save(), [1])
	t.deepEqual(ref.getUpdatedFields(), {})
	t.is(getRecord(db.models.refed.get(1)).get("strVal"), "world")
})

testPlatforms("reject unknown fields and bad values", (t, openDB) => {
	const db = openDB(t, linkModels)

	t.throws(() => db.models.refed.create({ bogus: 1 }), {
		instanceOf: SchemaError,
		message: `field "refed.bogus" does not exist`,
	})

	const ref = db.models.refed.create({ name: "rone" })
	t.throws(() => ref.set("id", 3), { instanceOf: SchemaError, message: `field "refed.id" does not exist` })
	t.throws(() => ref.set("intVal", "abc"), {
		instanceOf: ValueConversionError,
		message: `field "intVal": invalid integer "abc"`,
	})
	t.throws(() => ref.link("name"), {
		instanceOf: SchemaError,
		message: `field "refed.name" is not a reference field`,
	})
	t.throws(() => db.getModel("ghost"), { instanceOf: SchemaError, message: `model "ghost" not found` })
	t.is(ref.get("intVal"), nullSentinel)
})

testPlatforms("malformed stored values are storage failures", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", intVal: 1 })
	ref.save()
	db.store.setFields("refed", 1, { intVal: "abc" })

	const message = `malformed stored value for refed/1.intVal: field "intVal": invalid integer "abc"`
	const error = t.throws(() => db.models.refed.get(1), { instanceOf: StorageRoundTripError, message })
	t.true(error?.cause instanceof ValueConversionError)
	t.throws(() => ref.reload(), { instanceOf: StorageRoundTripError, message })
})

testPlatforms("copy records", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", intVal: 1 })
	ref.save()

	const copy = ref.copy()
	t.is(copy.id, null)
	t.true(copy.hasUnsavedChanges())
	t.deepEqual(copy.save(), [2])

	ref.set("intVal", 2)
	const handle = ref.copy({ withId: true })
	t.is(handle.id, 1)
	t.deepEqual(handle.getUpdatedFields(), { intVal: [1, 2] })
})

testPlatforms("move index entries when a field changes", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone" })
	ref.save()
	t.deepEqual(db.models.refed.filter({ name: "rone" }).getIds(), [1])

	ref.set("name", "rtwo")
	ref.save()
	t.deepEqual(db.models.refed.filter({ name: "rone" }).getIds(), [])
	t.deepEqual(db.models.refed.filter({ name: "rtwo" }).getIds(), [1])
})

testPlatforms("delete records", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone" })
	ref.save()
	db.models.refed.create({ name: "rtwo" }).save()

	t.true(ref.delete())
	t.is(ref.id, null)
	t.false(ref.delete())
	t.false(db.models.refed.exists(1))
	t.is(db.models.refed.get(1), null)
	t.deepEqual(db.models.refed.filter({ name: "rone" }).getIds(), [])
	t.is(db.models.refed.count(), 1)

	t.deepEqual(ref.save(), [3])
	t.deepEqual(db.models.refed.filter({ name: "rone" }).getIds(), [3])
})

testPlatforms("get several records", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ids = db.models.refed.save([
		db.models.refed.create({ name: "rone" }),
		db.models.refed.create({ name: "rtwo" }),
	])
	t.deepEqual(ids, [1, 2])

	const records = db.models.refed.getMany([2, 5, 1])
	t.deepEqual(
		records.map((record) => record?.get("name") ?? null),
		["rtwo", null, "rone"],
	)

	t.deepEqual(
		db.models.refed.all().map((record) => record.id),
		[1, 2],
	)
	t.is(db.models.refed.first()?.get("name"), "rone")
	t.is(db.models.refed.count(), 2)
})

testPlatforms("destroy a model", (t, openDB) => {
	const db = openDB(t, linkModels)

	db.models.refed.save([db.models.refed.create({ name: "rone" }), db.models.refed.create({ name: "rtwo" })])
	db.models.main.create({ name: "one" }).save()

	db.models.refed.destroyModel()
	t.is(db.models.refed.count(), 0)
	t.deepEqual(db.models.refed.filter({ name: "rone" }).getIds(), [])
	t.is(db.models.main.count(), 1)

	t.deepEqual(db.models.refed.create({ name: "rthree" }).save(), [1])
})

testPlatforms("bulk saves are checked against the model", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one" })
	t.throws(() => db.models.refed.save([main]), {
		instanceOf: SchemaError,
		message: "cannot save a main record as refed",
	})
	t.is(main.id, null)
})

class FailingStore extends MemoryStore {
	public override apply(effects: StoreEffect[]) {
		if (effects.some((effect) => effect.operation === "set")) {
			throw new Error("disk full")
		}

		super.apply(effects)
	}
}

class CountingStore extends MemoryStore {
	public batches = 0

	public override apply(effects: StoreEffect[]) {
		this.batches++
		super.apply(effects)
	}
}

test("store failures leave records unsaved", (t) => {
	const db = new ModelDB({ store: new FailingStore(), models: linkModels })
	t.teardown(() => db.close())

	const ref = db.models.refed.create({ name: "rone" })
	const error = t.throws(() => ref.save(), {
		instanceOf: StorageRoundTripError,
		message: "apply failed: disk full",
	})

	t.true(error?.cause instanceof Error)
	t.is(ref.id, null)
	t.true(ref.hasUnsavedChanges())
	t.is(db.models.refed.count(), 0)
})

test("saving an unchanged record writes nothing", (t) => {
	const store = new CountingStore()
	const db = new ModelDB({ store, models: linkModels })
	t.teardown(() => db.close())

	const ref = db.models.refed.create({ name: "rone" })
	ref.save()
	t.is(store.batches, 1)

	t.deepEqual(ref.save(), [1])
	t.is(store.batches, 1)

	ref.set("intVal", 3)
	ref.save()
	t.is(store.batches, 2)
})
