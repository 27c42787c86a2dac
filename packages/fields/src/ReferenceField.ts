import { Field, FieldOptions, describeValue } from "./Field.js"
import { ValueConversionError } from "./errors.js"
import { toText } from "./bytes.js"
import type { PlainValue, RecordId, StoredValue } from "./types.js"

export const isRecordId = (value: unknown): value is RecordId =>
	typeof value === "number" && Number.isSafeInteger(value) && value > 0

const recordIdPattern = /^[1-9]\d*$/

export function parseRecordId(text: string): RecordId {
	const id = Number(text)
	if (!recordIdPattern.test(text) || !isRecordId(id)) {
		throw new ValueConversionError(`invalid record id ${JSON.stringify(text)}`)
	}

	return id
}

/** Stores the id of a record in the `target` model, as decimal text */
export class ReferenceField extends Field {
	public readonly type = "reference"

	constructor(
		name: string,
		public readonly target: string,
		options: FieldOptions = {},
	) {
		super(name, options)
	}

	protected encode(value: PlainValue) {
		if (isRecordId(value)) {
			return value.toString()
		} else {
			this.fail(`expected a record id, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return parseRecordId(toText(raw))
	}

	protected parse(value: {}) {
		if (isRecordId(value)) {
			return value
		} else if (typeof value === "string") {
			return parseRecordId(value)
		} else {
			this.fail(`expected a record id, received ${describeValue(value)}`)
		}
	}
}
