import { getRecord, linkModels, nodeModels, testPlatforms } from "./utils.js"

testPlatforms("compare scalar fields", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref1 = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const ref2 = db.models.refed.create({ name: "rone", strVal: "hello", intVal: "1" })
	t.true(ref1.hasSameValues(ref2))

	ref2.set("intVal", 2)
	t.false(ref1.hasSameValues(ref2))
	t.false(ref1.hasSameValues(db.models.main.create({ name: "rone" })))

	ref1.save()
	t.true(ref1.hasSameValues(ref1.copy()))
})

testPlatforms("compare links by id", (t, openDB) => {
	const db = openDB(t, linkModels)

	const main1 = db.models.main.create({ name: "one", other: 1 })
	const main2 = db.models.main.create({ name: "one", other: "1" })
	t.true(main1.hasSameValues(main2))

	main2.set("other", 2)
	t.false(main1.hasSameValues(main2))
	t.false(main1.hasSameValues(main2, { cascadeObject: false }))

	const ref = db.models.refed.create({ name: "rone" })
	ref.save()
	main1.set("other", ref)
	main2.set("other", ref.copy())
	t.false(main1.hasSameValues(main2, { cascadeObject: false }))
})

testPlatforms("compare unsaved targets by value", (t, openDB) => {
	const db = openDB(t, linkModels)

	const refA = db.models.refed.create({ name: "rone", intVal: 1 })
	const refB = db.models.refed.create({ name: "rone", intVal: 1 })
	const mainA = db.models.main.create({ name: "one", other: refA })
	const mainB = db.models.main.create({ name: "one", other: refB })
	t.true(mainA.hasSameValues(mainB))
	t.true(mainA.hasSameValues(mainB, { cascadeObject: false }))

	refB.set("intVal", 2)
	t.false(mainA.hasSameValues(mainB))
	t.false(mainA.hasSameValues(mainB, { cascadeObject: false }))

	mainB.set("other", null)
	t.false(mainA.hasSameValues(mainB))
})

testPlatforms("cascading comparison catches nested drift", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const main = db.models.main.create({ name: "one", value: "cheese", other: ref })
	main.save()

	const fetched = getRecord(db.models.main.first())
	getRecord(fetched.get("other")).set("intVal", 9)
	t.false(fetched.hasSameValues(main))
	t.true(fetched.hasSameValues(main, { cascadeObject: false }))
})

testPlatforms("resolved targets against unresolved links", (t, openDB) => {
	const db = openDB(t, linkModels)

	const ref = db.models.refed.create({ name: "rone", strVal: "hello", intVal: 1 })
	const main = db.models.main.create({ name: "one", value: "cheese", other: ref })
	main.save()

	const fetched = getRecord(db.models.main.first())
	t.true(main.hasSameValues(fetched))
	t.true(fetched.hasSameValues(main))

	ref.set("intVal", 7)
	t.false(main.hasSameValues(fetched))
	t.false(fetched.hasSameValues(main))
	t.true(main.hasSameValues(fetched, { cascadeObject: false }))
	t.false(fetched.link("other").isFetched())
})

testPlatforms("compare cyclic graphs", (t, openDB) => {
	const db = openDB(t, nodeModels)

	const a1 = db.models.node.create({ name: "a" })
	const b1 = db.models.node.create({ name: "b", next: a1 })
	a1.set("next", b1)

	const a2 = db.models.node.create({ name: "a" })
	const b2 = db.models.node.create({ name: "b", next: a2 })
	a2.set("next", b2)

	t.true(a1.hasSameValues(a2))

	b2.set("name", "c")
	t.false(a1.hasSameValues(a2))
})
