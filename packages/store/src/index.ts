export * from "./types.js"
export * from "./AbstractStore.js"
export * from "./MemoryStore.js"

export { validateEffect, namePattern } from "./validate.js"
