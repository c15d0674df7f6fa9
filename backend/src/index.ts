export { default as createVaultLookupService, VaultLookupService } from './lookup-services/VaultLookupServiceFactory.js'
export type { JournalSource } from './lookup-services/VaultLookupServiceFactory.js'
export { VaultStorageManager } from './lookup-services/VaultStorageManager.js'
export * from './types.js'
