import { Field, ReferenceField, SchemaError, createField } from "@linkdb/fields"
import { namePattern } from "@linkdb/store"
import { assert } from "@linkdb/utils"

import type { Model, ModelInit, ModelSchema } from "./types.js"

export class Config {
	public static reservedFieldNames = ["id"]

	public static parse(init: ModelSchema, options: { freeze?: boolean } = {}): Config {
		if (typeof init !== "object" || init === null) {
			throw new SchemaError("error parsing model schema - expected an object")
		}

		const models: Model[] = []
		for (const [modelName, modelInit] of Object.entries(init)) {
			models.push(Config.parseModel(modelName, modelInit))
		}

		return new Config(models, options)
	}

	private static parseModel(modelName: string, init: ModelInit): Model {
		if (!namePattern.test(modelName)) {
			throw new SchemaError(`error defining ${modelName}: expected model name to match /^[a-zA-Z0-9$:_\\-\\.]+$/`)
		}

		const fields: Field[] = []
		const indexes: string[] = []

		for (const [fieldName, fieldInit] of Object.entries(init)) {
			if (fieldName === "$indexes") {
				continue
			} else if (fieldName.startsWith("$")) {
				throw new SchemaError(`error defining ${modelName}: unknown model option "${fieldName}"`)
			} else if (!namePattern.test(fieldName)) {
				throw new SchemaError(`error defining ${modelName}: expected field names to match /^[a-zA-Z0-9$:_\\-\\.]+$/`)
			} else if (Config.reservedFieldNames.includes(fieldName)) {
				throw new SchemaError(`error defining ${modelName}: "${fieldName}" is a reserved field name`)
			} else if (fieldInit === undefined || Array.isArray(fieldInit)) {
				throw new SchemaError(`error defining ${modelName}.${fieldName}: expected a type name or a field spec object`)
			}

			fields.push(createField(fieldName, fieldInit))
		}

		const { $indexes = [] } = init
		if (!Array.isArray($indexes)) {
			throw new SchemaError(`error defining ${modelName}: $indexes must be an array of field names`)
		}

		for (const index of $indexes) {
			const field = fields.find((field) => field.name === index)
			if (field === undefined) {
				throw new SchemaError(`invalid index "${index}" - field "${index}" does not exist`)
			} else if (!field.canIndex) {
				throw new SchemaError(`invalid index "${index}" - ${field.type} fields cannot be indexed`)
			} else if (indexes.includes(index)) {
				throw new SchemaError(`invalid index "${index}" - duplicate index`)
			}

			indexes.push(index)
		}

		return { name: modelName, fields, indexes }
	}

	#frozen = false

	public constructor(
		public readonly models: Model[],
		options: { freeze?: boolean } = {},
	) {
		for (const model of models) {
			for (const field of model.fields) {
				if (field instanceof ReferenceField) {
					if (!models.some((model) => model.name === field.target)) {
						throw new SchemaError(`invalid reference target - no "${field.target}" model`)
					}
				}
			}
		}

		if (options.freeze) {
			this.freeze()
		}
	}

	public freeze() {
		assert(this.#frozen === false, "Config already frozen")
		this.#frozen = true
		for (const model of this.models) {
			Object.freeze(model.fields)
			Object.freeze(model.indexes)
			Object.freeze(model)
		}

		Object.freeze(this.models)
		Object.freeze(this)
	}

	public getModel(name: string): Model {
		const model = this.models.find((model) => model.name === name)
		if (model === undefined) {
			throw new SchemaError(`model "${name}" not found`)
		}

		return model
	}
}
