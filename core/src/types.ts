/**
 * CheckVault Core Type Definitions
 *
 * Type definitions for the conversion ledger and its collaborators.
 */

import type { HexString, PubKeyHex } from '@bsv/sdk'
import type { VaultErrorCode } from './errors.js'

// ---------------------------------------------------------------------------
// Identity and Item Types
// ---------------------------------------------------------------------------

/** An account or custodian identity (compressed public key, hex) */
export type Identity = PubKeyHex

/** Unique, numerically ordered item identifier */
export type ItemId = bigint

/** Discrete rarity tier, 0..MAX_RANK */
export type Rank = number

/**
 * An item as reported by the item registry.
 *
 * Consumed items are kept as tombstones with `exists: false`.
 */
export interface RegistryItem {
  id: ItemId
  rank: Rank
  /** Visual attribute; never affects conversion */
  seed: number
  exists: boolean
}

/** Where an item sits from the vault's point of view */
export type CustodyState = 'external' | 'in-custody' | 'consumed'

// ---------------------------------------------------------------------------
// Collaborator Interfaces
// ---------------------------------------------------------------------------

/**
 * Implemented by holders that want to be notified of safe transfers.
 * Throwing from the hook reverts the transfer.
 */
export interface ItemReceiver {
  onItemReceived(sender: ItemRegistry, operator: Identity, from: Identity, itemId: ItemId): void
}

/**
 * The external registry that owns the items and their lifecycle.
 *
 * Every mutating call is atomic: it either applies fully or throws.
 * `operator` is the identity on whose authority the call is made.
 */
export interface ItemRegistry {
  /** Returns undefined for ids that were never minted */
  getItem(itemId: ItemId): RegistryItem | undefined
  /** Throws ItemNotFound for unknown or consumed items */
  ownerOf(itemId: ItemId): Identity
  getApproved(itemId: ItemId): Identity | undefined
  isApprovedForAll(owner: Identity, operator: Identity): boolean
  isAuthorized(owner: Identity, operator: Identity, itemId: ItemId): boolean
  transfer(operator: Identity, from: Identity, to: Identity, itemId: ItemId): void
  safeTransfer(operator: Identity, from: Identity, to: Identity, itemId: ItemId, data?: number[]): void
  mergePair(operator: Identity, keepId: ItemId, burnId: ItemId, swap: boolean): void
  mergeAggregate(operator: Identity, itemIds: readonly ItemId[]): void
  registerReceiver(holder: Identity, receiver: ItemReceiver): void
}

// ---------------------------------------------------------------------------
// Event Types
// ---------------------------------------------------------------------------

/** An item moved into custody and its prior custodian was credited */
export interface DepositEvent {
  kind: 'deposit'
  account: Identity
  operator: Identity
  itemId: ItemId
  rank: Rank
  amount: bigint
}

/** An item left custody against a debit of the caller */
export interface RedeemEvent {
  kind: 'redeem'
  account: Identity
  itemId: ItemId
  rank: Rank
  amount: bigint
}

/** Two custodied items were merged; `rank` is the survivor's new rank */
export interface MergeEvent {
  kind: 'merge'
  operator: Identity
  keepId: ItemId
  burnId: ItemId
  rank: Rank
}

/** A full aggregate produced a maximal-rank item */
export interface AggregateEvent {
  kind: 'aggregate'
  operator: Identity
  survivorId: ItemId
  consumedIds: ItemId[]
  rank: Rank
}

/** Fungible units moved between accounts */
export interface TransferEvent {
  kind: 'transfer'
  from: Identity
  to: Identity
  amount: bigint
  /** Set when the move spent an allowance */
  spender?: Identity
}

/** An allowance was set */
export interface ApprovalEvent {
  kind: 'approval'
  owner: Identity
  spender: Identity
  amount: bigint
}

export type VaultEventPayload =
  | DepositEvent
  | RedeemEvent
  | MergeEvent
  | AggregateEvent
  | TransferEvent
  | ApprovalEvent

export type VaultEventKind = VaultEventPayload['kind']

/** A committed journal entry */
export type VaultEvent = VaultEventPayload & {
  /** Position in the journal, starting at 1 */
  sequence: number
  /** sha256 over the sequence and payload */
  id: HexString
}

// ---------------------------------------------------------------------------
// Operation Result Types
// ---------------------------------------------------------------------------

/** Fields shared by every failed result */
export interface VaultFailureFields {
  /** Error message if failed */
  error?: string
  /** Machine-readable failure kind if failed */
  errorCode?: VaultErrorCode | 'Unknown'
}

/** One credited item of a deposit */
export interface DepositReceipt {
  itemId: ItemId
  account: Identity
  rank: Rank
  amount: bigint
}

/**
 * Result of a deposit
 */
export interface DepositResult extends VaultFailureFields {
  success: boolean
  /** Per-item credits, in request order */
  receipts: DepositReceipt[]
  /** Sum of all credits */
  totalAmount: bigint
}

/**
 * Result of a redemption
 */
export interface RedeemResult extends VaultFailureFields {
  success: boolean
  itemId: ItemId
  /** Amount debited from the caller */
  amount: bigint
}

/**
 * Result of a pairwise merge
 */
export interface MergeResult extends VaultFailureFields {
  success: boolean
  keepId: ItemId
  burnId: ItemId
  /** Rank of the surviving item */
  rank?: Rank
}

/**
 * Result of an aggregate merge
 */
export interface AggregateResult extends VaultFailureFields {
  success: boolean
  survivorId?: ItemId
  consumedIds: ItemId[]
}

/**
 * Result of a fungible transfer or approval
 */
export interface TransferResult extends VaultFailureFields {
  success: boolean
  amount: bigint
}

/**
 * Result of a raw value transfer; never succeeds
 */
export interface ValueTransferResult extends VaultFailureFields {
  success: false
}

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * CheckVault configuration options
 */
export interface VaultConfig {
  /** The registry holding the items */
  registry: ItemRegistry
  /** Custodian identity of the vault (default: derived from a fresh random key) */
  identity?: Identity
  /** Fungible token name (default: 'Black Check') */
  name?: string
  /** Fungible token symbol (default: '$BLKCHK') */
  symbol?: string
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedVaultConfig {
  registry: ItemRegistry
  identity: Identity
  name: string
  symbol: string
}
