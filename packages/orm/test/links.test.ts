import { ReferentialIntegrityError, ValueConversionError, isNullSentinel } from "@linkdb/fields"

import { getRecord, linkModels, testPlatforms } from "./utils.js"

testPlatforms("link a record by id", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const ids = ref.save({ cascadeSave: false })
	t.deepEqual(ids, [1])

	const main = db.models.main.create({ name: "one", value: "cheese", other: ids[0] })
	t.deepEqual(main.save({ cascadeSave: false }), [1])

	t.false(main.link("other").isFetched())
	t.is(getRecord(main.get("other")).get("name"), "rone")
	t.true(main.link("other").isFetched())
	t.is(main.link("other").id, 1)

	const fetched = getRecord(db.models.main.filter({ name: "one" }).first())
	t.false(fetched.link("other").isFetched())
	t.is(fetched.link("other").id, 1)
	t.is(getRecord(fetched.get("other")).get("strVal"), "hello")
})

testPlatforms("disconnect a link", (t, openDB) => {
	const db = openDB(t, linkModels)

	const [refId] = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 }).save()
	const main = db.models.main.create({ name: "one", value: "cheese", other: refId })
	main.save({ cascadeSave: false })

	main.set("other", null)
	t.true(isNullSentinel(main.get("other")))
	t.deepEqual(Object.keys(main.getUpdatedFields()), ["other"])
	t.deepEqual(main.save(), [1])

	const fetched = getRecord(db.models.main.filter({ name: "one" }).first())
	t.true(isNullSentinel(fetched.get("other")))
	t.true(fetched.link("other").isEmpty())
	t.is(fetched.asDict({ forStorage: true }).other, "")
})

testPlatforms("dangling ids read as the null sentinel", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one", other: 7 })
	t.true(isNullSentinel(main.get("other")))
	t.true(main.link("other").isFetched())
	t.is(main.link("other").id, 7)
})

testPlatforms("assign ids and records", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref1 = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const ref2 = db.models.refed.create({ name: "rtwo", strVal: "world", intVal: 2 })
	const [id1] = ref1.save({ cascadeSave: false })
	const [id2] = ref2.save({ cascadeSave: false })

	const main = db.models.main.create({ name: "one", value: "cheese", other: id1 })
	t.true(getRecord(main.get("other")).hasSameValues(ref1))

	main.set("other", id2)
	t.false(main.link("other").isFetched())
	t.true(getRecord(main.get("other")).hasSameValues(ref2))
	main.save({ cascadeSave: false })

	const fetched = getRecord(db.models.main.filter({ name: "one" }).first())
	t.is(fetched.link("other").id, id2)

	const firstRef = getRecord(db.models.refed.filter({ name: "rone" }).first())
	fetched.set("other", firstRef)
	t.true(fetched.link("other").isFetched())
	t.is(fetched.get("other"), firstRef)
	fetched.save({ cascadeSave: false })

	t.is(getRecord(db.models.main.filter({ name: "one" }).first()).link("other").id, id1)

	main.set("other", String(id1))
	t.is(main.link("other").id, id1)
})

testPlatforms("reject links to the wrong model or invalid ids", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one" })
	const other = db.models.main.create({ name: "two" })

	const error = t.throws(() => main.set("other", other), { instanceOf: ReferentialIntegrityError })
	t.is(error?.message, `field "other" links to refed records, received a main record`)

	t.throws(() => main.set("other", 0), { instanceOf: ValueConversionError })
	t.throws(() => main.set("other", "abc"), { instanceOf: ValueConversionError })
	t.true(main.link("other").isEmpty())
})

testPlatforms("filter on a link field", (t, openDB) => {
	const db = openDB(t, {
		...linkModels,
		main: { name: "string", value: "string", other: "@refed", $indexes: ["name", "other"] },
	})

	const ref1 = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const ref2 = db.models.refed.create({ name: "rtwo", strVal: "world", intVal: 2 })
	const [id1] = ref1.save({ cascadeSave: false })
	const [id2] = ref2.save({ cascadeSave: false })

	const main = db.models.main.create({ name: "one", value: "cheese", other: id1 })
	t.false(main.link("other").isFetched())
	t.true(getRecord(main.get("other")).hasSameValues(ref1))
	t.true(main.link("other").isFetched())

	main.set("other", id2)
	main.save({ cascadeSave: false })

	t.deepEqual(db.models.main.filter({ other: id2 }).getIds(), [1])
	t.deepEqual(db.models.main.filter({ other: ref2 }).getIds(), [1])
	t.deepEqual(db.models.main.filter({ other: id1 }).getIds(), [])
	t.deepEqual(db.models.main.filter({ other: ref1 }).getIds(), [])

	const unsaved = db.models.refed.create({ name: "rthree" })
	t.throws(() => db.models.main.filter({ other: unsaved }), { instanceOf: ReferentialIntegrityError })
})

testPlatforms("getUpdatedFields does not resolve links", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one", value: "cheese" })
	main.set("other", db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 }))
	main.save({ cascadeSave: true })

	const fetched = getRecord(db.models.main.first())
	t.false(fetched.link("other").isFetched())
	t.deepEqual(fetched.getUpdatedFields(), {})
	t.false(fetched.link("other").isFetched())

	t.deepEqual(fetched.asDict(), { name: "one", value: "cheese", other: 1 })
	t.deepEqual(fetched.asDict({ forStorage: true }), { name: "one", value: "cheese", other: "1" })
	t.deepEqual(fetched.toJSON(), { id: 1, name: "one", value: "cheese", other: 1 })
	t.false(fetched.link("other").isFetched())
})

testPlatforms("attaching an unsaved record counts as a change", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one" })
	main.save()
	t.deepEqual(main.getUpdatedFields(), {})

	const ref = db.models.refed.create({ name: "rone" })
	main.set("other", ref)
	t.deepEqual(Object.keys(main.getUpdatedFields()), ["other"])

	main.save()
	t.is(ref.id, 1)
	t.deepEqual(main.getUpdatedFields(), {})
	t.is(getRecord(db.models.main.get(1)).link("other").id, 1)
})

testPlatforms("a fresh record with an unsaved link has no updated fields", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main = db.models.main.create({ name: "one", other: db.models.refed.create({ name: "rtwo" }) })
	t.deepEqual(main.getUpdatedFields(), {})
	t.true(main.hasUnsavedChanges())
	t.true(main.link("other").hasUnsavedRecord())
})
