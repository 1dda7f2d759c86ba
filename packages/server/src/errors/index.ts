export * from "./create-error-handler"
export * from "./errors"
export * from "./server-error"
export * from "./validation"
