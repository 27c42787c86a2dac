export * from "./types.js"
export * from "./config.js"
export * from "./ModelDB.js"
export * from "./ModelAPI.js"
export * from "./ModelRecord.js"
export * from "./ForeignLink.js"
export * from "./Query.js"

export { FetchContext, SavePlan } from "./cascade.js"
