import { Logger, logger } from "@libp2p/logger"

import { RecordId, SchemaError } from "@linkdb/fields"
import type { KeyValueStore, StoreEffect } from "@linkdb/store"

import { Config } from "./config.js"
import { ModelAPI } from "./ModelAPI.js"
import { ModelRecord } from "./ModelRecord.js"
import { saveRecords } from "./cascade.js"
import { withStore } from "./utils.js"
import type { ModelSchema, SaveOptions } from "./types.js"

export interface ModelDBInit {
	store: KeyValueStore
	models: ModelSchema
}

export class ModelDB {
	public readonly config: Config
	public readonly store: KeyValueStore
	public readonly models: Record<string, ModelAPI> = {}

	protected readonly log: Logger = logger("linkdb:orm")

	public constructor({ store, models }: ModelDBInit) {
		this.config = Config.parse(models, { freeze: true })
		this.store = store

		for (const model of this.config.models) {
			this.models[model.name] = new ModelAPI(this, model)
		}

		this.log("opened with models %o", Object.keys(this.models))
	}

	public getModel(name: string): ModelAPI {
		const api = this.models[name]
		if (api === undefined) {
			throw new SchemaError(`model "${name}" not found`)
		}

		return api
	}

	/**
	 * Save records of any model in one atomic batch. With `cascadeSave`
	 * (the default), resolved linked records are saved along with them.
	 */
	public save(records: ModelRecord[], options: SaveOptions = {}): RecordId[] {
		const ids = saveRecords(records, options, (effects) => this.apply(effects))
		this.log("saved %d records", ids.length)
		return ids
	}

	public apply(effects: StoreEffect[]) {
		this.log.trace("applying %d effects", effects.length)
		withStore(this.log, "apply", () => this.store.apply(effects))
	}

	public close() {
		this.log("closing")
		this.store.close()
	}
}
