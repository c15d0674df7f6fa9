/**
 * Type definitions for CheckVault backend services
 * @module types
 */

// Re-export lookup service types
export type {
  VaultQuery,
  VaultLookupQuestion,
  VaultEventRecord,
  VaultLookupResult,
  VaultEventFilters,
  VaultEventStore
} from './lookup-services/types.js'
export { VAULT_EVENT_KINDS } from './lookup-services/types.js'
