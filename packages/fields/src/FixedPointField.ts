import { Field, FieldOptions, describeValue } from "./Field.js"
import { SchemaError } from "./errors.js"
import { toText } from "./bytes.js"
import type { PlainValue, StoredValue } from "./types.js"

export interface FixedPointFieldOptions extends FieldOptions {
	decimalPlaces?: number
}

const decimalPattern = /^[+-]?\d+(?:\.\d+)?$/

// toFixed switches to exponential notation from here on
const maxMagnitude = 1e21

/**
 * A bounded-precision number, formatted to exactly `decimalPlaces`
 * fractional digits before storage so that equal values always have equal
 * stored (and indexed) forms.
 */
export class FixedPointField extends Field {
	public static defaultDecimalPlaces = 5

	public readonly type = "decimal"
	public readonly decimalPlaces: number

	constructor(name: string, { decimalPlaces = FixedPointField.defaultDecimalPlaces, ...options }: FixedPointFieldOptions = {}) {
		super(name, options)
		if (!Number.isSafeInteger(decimalPlaces) || decimalPlaces < 0 || decimalPlaces > 20) {
			throw new SchemaError(`field "${name}": decimalPlaces must be an integer between 0 and 20`)
		}

		this.decimalPlaces = decimalPlaces
	}

	protected encode(value: PlainValue) {
		if (typeof value === "number" && Number.isFinite(value)) {
			return this.checkRange(value).toFixed(this.decimalPlaces)
		} else {
			this.fail(`expected a finite number, received ${describeValue(value)}`)
		}
	}

	protected decode(raw: StoredValue) {
		return this.parseText(toText(raw))
	}

	protected parse(value: {}) {
		if (typeof value === "number" && Number.isFinite(value)) {
			return this.round(value)
		} else if (typeof value === "string") {
			return this.parseText(value.trim())
		} else {
			this.fail(`expected a finite number, received ${describeValue(value)}`)
		}
	}

	private parseText(text: string): number {
		if (!decimalPattern.test(text)) {
			this.fail(`invalid decimal ${JSON.stringify(text)}`)
		}

		return this.round(Number(text))
	}

	private round(value: number): number {
		return Number(this.checkRange(value).toFixed(this.decimalPlaces))
	}

	private checkRange(value: number): number {
		if (Math.abs(value) >= maxMagnitude) {
			this.fail(`expected a magnitude below 1e21, received ${value}`)
		}

		return value
	}
}
