export { INITIAL_VERSION_ID, IdentityAssigner } from './IdentityAssigner'
export type { IdentityOptions } from './IdentityAssigner'
