export { createRuntimeFactory } from './createRuntime'
export type { CreateServerRuntime, ServerRuntime } from './createRuntime'
