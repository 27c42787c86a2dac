import fs from "node:fs"
import os from "node:os"
import { resolve } from "node:path"

import test, { ExecutionContext } from "ava"
import { nanoid } from "nanoid"

import { KeyValueStore, MemoryStore } from "@linkdb/store"
import { SqliteStore } from "@linkdb/store-sqlite"

export const testStores = (
	name: string,
	run: (t: ExecutionContext<unknown>, openStore: (t: ExecutionContext) => KeyValueStore) => void,
) => {
	const macro = test.macro(run)

	test(`Memory - ${name}`, macro, (t) => {
		const store = new MemoryStore()
		t.teardown(() => store.close())
		return store
	})

	test(`Sqlite - ${name}`, macro, (t) => {
		const store = new SqliteStore({ path: null })
		t.teardown(() => store.close())
		return store
	})
}

export function getDirectory(t: ExecutionContext<unknown>): string {
	const directory = resolve(os.tmpdir(), nanoid())
	fs.mkdirSync(directory)
	t.log("Created temporary directory", directory)
	t.teardown(() => {
		fs.rmSync(directory, { recursive: true })
		t.log("Removed temporary directory", directory)
	})
	return directory
}

/** Index entries in ascending id order */
export const lookup = (store: KeyValueStore, model: string, field: string, value: string) =>
	Array.from(store.indexLookup(model, field, value)).sort((a, b) => a - b)
