export { type BuiltServer, buildServer, productErrorMappings } from "./build-server"
export { run } from "./run"
