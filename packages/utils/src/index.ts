export * from "./assert.js"
export * from "./signalInvalidType.js"
export * from "./JSValue.js"
export * from "./deepEqual.js"
export * from "./zip.js"
