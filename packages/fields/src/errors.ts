export class LinkDBError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/** Invalid field or model declaration. Raised while the schema is parsed. */
export class SchemaError extends LinkDBError {}

/** Input that a typed field cannot convert. */
export class ValueConversionError extends LinkDBError {}

/** The backing store failed or returned something malformed. */
export class StorageRoundTripError extends LinkDBError {}

/** A link that would point at a record with no persisted id, or at the wrong model. */
export class ReferentialIntegrityError extends LinkDBError {}
