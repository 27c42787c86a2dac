export * from "./types.js"
export * from "./errors.js"
export * from "./NullSentinel.js"
export * from "./equality.js"
export * from "./hash.js"
export * from "./Field.js"
export * from "./FixedPointField.js"
export * from "./CompressedField.js"
export * from "./SerializedField.js"
export * from "./Base64Field.js"
export * from "./FieldChain.js"
export * from "./ReferenceField.js"
export * from "./createField.js"

export { toBytes, toText } from "./bytes.js"
