import {
	BooleanField,
	BytesField,
	Field,
	FieldOptions,
	FloatField,
	IntegerField,
	RawField,
	StringField,
} from "./Field.js"
import { FixedPointField } from "./FixedPointField.js"
import { CompressedField } from "./CompressedField.js"
import { SerializedField } from "./SerializedField.js"
import { Base64Field } from "./Base64Field.js"
import { FieldChain } from "./FieldChain.js"
import { ReferenceField } from "./ReferenceField.js"
import { SchemaError } from "./errors.js"
import type { FieldInit, FieldSpec, ReferenceTypeName } from "./types.js"

export const referenceTypePattern = /^@([a-zA-Z0-9$:_\-.]+)$/

export const isReferenceType = (type: string): type is ReferenceTypeName => referenceTypePattern.test(type)

/** Build the descriptor for a field from its declaration in a model schema */
export function createField(name: string, init: FieldInit): Field {
	const spec: FieldSpec = typeof init === "string" ? { type: init } : init
	if (typeof spec !== "object" || spec === null || typeof spec.type !== "string") {
		throw new SchemaError(`error defining field "${name}": expected a type name or a field spec object`)
	}

	const options: FieldOptions = { hashIndex: spec.hashIndex, defaultValue: spec.default }

	switch (spec.type) {
		case "string":
			return new StringField(name, options)
		case "bytes":
			return new BytesField(name, options)
		case "raw":
			return new RawField(name, options)
		case "integer":
			return new IntegerField(name, options)
		case "float":
			return new FloatField(name, options)
		case "boolean":
			return new BooleanField(name, options)
		case "serialized":
			return new SerializedField(name, options)
		case "base64":
			return new Base64Field(name, options)
		case "decimal":
			return new FixedPointField(name, { ...options, decimalPlaces: spec.decimalPlaces })
		case "compressed":
			return new CompressedField(name, { defaultValue: spec.default, mode: spec.mode })
		case "chain":
			if (!Array.isArray(spec.fields)) {
				throw new SchemaError(`error defining field "${name}": chain fields must list their stages`)
			}

			return new FieldChain(
				name,
				spec.fields.map((stage) => createField(name, stage)),
				options,
			)
		default:
			return createReferenceField(name, spec.type, options)
	}
}

function createReferenceField(name: string, type: string, options: FieldOptions): Field {
	const result = referenceTypePattern.exec(type)
	if (result === null) {
		throw new SchemaError(`error defining field "${name}": invalid type "${type}"`)
	}

	const [_, target] = result
	return new ReferenceField(name, target, options)
}
