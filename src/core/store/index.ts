export { ResourceStore } from './ResourceStore'
export type { ResourcePartition } from './ResourceStore'
