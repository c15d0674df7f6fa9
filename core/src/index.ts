/**
 * @checkvault/core - item/fungible conversion vault
 *
 * A vault that holds ranked items from an external registry and keeps a
 * fungible ledger backed by them.
 *
 * This library provides:
 * - Deposits that credit an item's value to its prior custodian
 * - Redemptions that debit the item's current value
 * - Permissionless merges of custodied items
 * - A committed event journal for indexers
 *
 * Conversion is geometric in the rank: a rank-r item is worth
 * 2^r / 4096 units, and the single maximal-rank item is worth the whole
 * supply ceiling of one unit.
 *
 * @example
 * ```typescript
 * import { CheckVault, InMemoryItemRegistry } from '@checkvault/core'
 *
 * const registry = new InMemoryItemRegistry()
 * registry.mint(alice, 1n, 3)
 *
 * const vault = new CheckVault({ registry })
 * const result = vault.deposit(alice, [1n])
 * console.log('Credited:', result.totalAmount)
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { CheckVault } from './CheckVault.js'

// Components
export { ConversionEngine } from './ConversionEngine.js'
export { MergeOrchestrator } from './MergeOrchestrator.js'
export {
  CustodyLedger,
  TRANSFER_GRANTS,
  custodianGrant,
  singleItemGrant,
  blanketGrant,
  callRegistry
} from './CustodyLedger.js'
export type { TransferGrant } from './CustodyLedger.js'
export { FungibleLedger } from './FungibleLedger.js'
export type { LedgerSnapshot } from './FungibleLedger.js'
export { EventJournal } from './EventJournal.js'
export { UnitOfWork, runAtomically } from './UnitOfWork.js'
export type { RequestContext } from './UnitOfWork.js'
export {
  ReentrancyGuard,
  assertWithinCeiling,
  assertLedgerConsistent,
  rejectUnsolicitedValue
} from './GuardRails.js'
export { InMemoryItemRegistry } from './InMemoryItemRegistry.js'

// Rank model
export { isValidRank, amountForRank, conversionTable } from './RankModel.js'

// Errors
export {
  VaultError,
  SupplyCeilingExceeded,
  InsufficientBalance,
  InsufficientAllowance,
  InvalidOrder,
  InvalidBatch,
  NotAuthorized,
  NotInCustody,
  AlreadyInCustody,
  ItemNotFound,
  RegistryRejected,
  UnsolicitedValueRejected,
  ReentrantCall,
  OnlyRegistry,
  InvalidIdentity,
  InvariantViolation,
  toFailure
} from './errors.js'
export type { VaultErrorCode } from './errors.js'

// Logging
export { log, logWithTimestamp, setLogLevel } from './logging.js'
export type { LogLevel } from './logging.config.js'

// Types
export type {
  Identity,
  ItemId,
  Rank,
  RegistryItem,
  CustodyState,
  ItemReceiver,
  ItemRegistry,
  DepositEvent,
  RedeemEvent,
  MergeEvent,
  AggregateEvent,
  TransferEvent,
  ApprovalEvent,
  VaultEventPayload,
  VaultEventKind,
  VaultEvent,
  VaultFailureFields,
  DepositReceipt,
  DepositResult,
  RedeemResult,
  MergeResult,
  AggregateResult,
  TransferResult,
  ValueTransferResult,
  VaultConfig,
  ResolvedVaultConfig
} from './types.js'

// Constants
export {
  DECIMALS,
  UNIT,
  MAX_SUPPLY,
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
  MIN_RANK,
  MAX_RANK,
  RANK_DIVISOR,
  AGGREGATE_RANK,
  AGGREGATE_COUNT,
  VAULT_LOOKUP_SERVICE
} from './constants.js'
