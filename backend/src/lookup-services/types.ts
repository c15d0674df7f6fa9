import { PubKeyHex } from '@bsv/sdk'
import type { VaultEventKind } from '@checkvault/core'

/**
 * Every event kind the vault journals
 */
export const VAULT_EVENT_KINDS: readonly VaultEventKind[] = [
  'deposit',
  'redeem',
  'merge',
  'aggregate',
  'transfer',
  'approval'
]

/**
 * Query parameters for vault event lookups
 */
export interface VaultQuery {
  account?: PubKeyHex
  /** Decimal item id */
  itemId?: string
  kind?: VaultEventKind
  /** Only events after this sequence number */
  sinceSequence?: number
  /** Exactly the event with this sequence number */
  sequence?: number
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * A lookup request addressed to a service
 */
export interface VaultLookupQuestion {
  service: string
  query: unknown
}

/**
 * A journal event as stored in the lookup database
 */
export interface VaultEventRecord {
  sequence: number
  eventId: string
  kind: VaultEventKind
  /** Every identity the event touches */
  accounts: PubKeyHex[]
  /** Every item the event touches, as decimal strings */
  itemIds: string[]
  /** Items the event consumed */
  consumedItemIds: string[]
  amount?: string
  rank?: number
  /** The event as JSON, bigints as decimal strings */
  payload: string
  createdAt: Date
}

/**
 * Query result
 */
export type VaultLookupResult = Omit<VaultEventRecord, 'createdAt'>

/**
 * Filters understood by the event store
 */
export interface VaultEventFilters {
  account?: PubKeyHex
  itemId?: string
  kind?: VaultEventKind
  sinceSequence?: number
}

/**
 * Persistence used by the lookup service
 */
export interface VaultEventStore {
  storeRecord(record: VaultEventRecord): Promise<void>
  findWithFilters(
    filters: VaultEventFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ): Promise<VaultEventRecord[]>
  findAllRecords(limit?: number, skip?: number, sortOrder?: 'asc' | 'desc'): Promise<VaultEventRecord[]>
  findBySequence(sequence: number): Promise<VaultEventRecord | null>
  latestSequence(): Promise<number>
}
