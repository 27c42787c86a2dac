import { isNullSentinel } from "./NullSentinel.js"
import { Field, FieldOptions } from "./Field.js"
import { SchemaError } from "./errors.js"
import type { FieldValue, PlainValue, StoredValue } from "./types.js"

/**
 * Composes several descriptors into one field. Storage runs the stages in
 * declared order, each stage's stored form feeding the next; retrieval
 * runs them in reverse. A null sentinel ends the pipeline in either
 * direction.
 */
export class FieldChain extends Field {
	public readonly type = "chain"

	constructor(
		name: string,
		public readonly stages: Field[],
		options: FieldOptions = {},
	) {
		super(name, options)
		if (stages.length === 0) {
			throw new SchemaError(`field chain "${name}" must have at least one stage`)
		}

		for (const stage of stages) {
			if (stage.type === "chain" || stage.type === "reference") {
				throw new SchemaError(`field chain "${name}" cannot contain ${stage.type} fields`)
			}
		}
	}

	public override get canIndex() {
		return this.stages.every((stage) => stage.canIndex)
	}

	public override get hashIndex() {
		return super.hashIndex || this.stages.some((stage) => stage.hashIndex)
	}

	public override get defaultValue() {
		return this.options.defaultValue === undefined ? this.stages[0].defaultValue : this.options.defaultValue
	}

	protected override nullValue() {
		return this.stages[0].fromInput(null)
	}

	public override toStorage(value: FieldValue): StoredValue {
		let stored: FieldValue = value
		for (const stage of this.stages) {
			if (isNullSentinel(stored)) {
				return ""
			}

			stored = stage.toStorage(stored)
		}

		return isNullSentinel(stored) ? "" : this.encode(stored)
	}

	public override fromStorage(raw: StoredValue): FieldValue {
		let value: FieldValue = raw
		for (const stage of [...this.stages].reverse()) {
			if (isNullSentinel(value)) {
				return value
			} else if (typeof value !== "string" && !(value instanceof Uint8Array)) {
				this.fail(`stage ${stage} received a non-storage value`)
			}

			value = stage.fromStorage(value)
		}

		return value
	}

	protected encode(value: PlainValue): StoredValue {
		if (typeof value === "string" || value instanceof Uint8Array) {
			return value
		} else {
			this.fail(`final stage produced a non-storage value`)
		}
	}

	protected decode(raw: StoredValue) {
		return raw
	}

	protected parse(value: {}) {
		return this.stages[0].fromInput(value)
	}
}
