export * from "./SqliteStore.js"
