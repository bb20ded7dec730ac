export * from "./connection"
export * from "./packet"
export * from "./varint"
export * from "./errors"
export * from "./events"
export * from "./reader"
export * from "./utils"
