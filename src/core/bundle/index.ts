export { BundleTransactionProcessor } from './BundleTransactionProcessor'
export type { BundleProcessContext, BundleTransactionProcessorOptions } from './BundleTransactionProcessor'
