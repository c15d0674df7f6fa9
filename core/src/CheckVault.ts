/**
 * CheckVault - item/fungible conversion vault
 *
 * Main class of the library. Provides high-level methods for:
 * - Depositing items in exchange for fungible units
 * - Redeeming custodied items against fungible units
 * - Merging custodied items, pairwise or into a maximal-rank item
 * - Moving fungible units between accounts
 *
 */

import { PrivateKey, PublicKey } from '@bsv/sdk'

import { MAX_SUPPLY, DEFAULT_TOKEN_NAME, DEFAULT_TOKEN_SYMBOL } from './constants.js'
import { ConversionEngine } from './ConversionEngine.js'
import { CustodyLedger } from './CustodyLedger.js'
import { InvalidIdentity, OnlyRegistry, toFailure } from './errors.js'
import { EventJournal } from './EventJournal.js'
import { FungibleLedger } from './FungibleLedger.js'
import { ReentrancyGuard } from './GuardRails.js'
import { log, logWithTimestamp } from './logging.js'
import { MergeOrchestrator } from './MergeOrchestrator.js'
import { runAtomically } from './UnitOfWork.js'
import type { RequestContext } from './UnitOfWork.js'
import type {
  AggregateResult,
  CustodyState,
  DepositResult,
  Identity,
  ItemId,
  ItemReceiver,
  ItemRegistry,
  MergeResult,
  RedeemResult,
  ResolvedVaultConfig,
  TransferResult,
  ValueTransferResult,
  VaultConfig,
  VaultEvent,
  VaultFailureFields
} from './types.js'

const COMPRESSED_KEY = /^0[23][0-9a-fA-F]{64}$/

/**
 * CheckVault - item/fungible conversion vault
 *
 * @example
 * ```typescript
 * const registry = new InMemoryItemRegistry()
 * const vault = new CheckVault({ registry })
 *
 * // Deposit an item held by alice
 * const result = vault.deposit(alice, [42n])
 * console.log('Credited:', result.totalAmount)
 *
 * // Take it back out
 * vault.redeem(alice, 42n)
 * ```
 */
export class CheckVault implements ItemReceiver {
  private config: ResolvedVaultConfig
  private ledger: FungibleLedger
  private journal: EventJournal
  private context: RequestContext
  private custody: CustodyLedger
  private engine: ConversionEngine
  private merger: MergeOrchestrator

  constructor(config: VaultConfig) {
    this.config = this.resolveConfig(config)
    this.ledger = new FungibleLedger(this.config.name, this.config.symbol)
    this.journal = new EventJournal()
    this.context = { guard: new ReentrancyGuard(), ledger: this.ledger, journal: this.journal }
    this.custody = new CustodyLedger(this.config.registry, this.config.identity)
    this.engine = new ConversionEngine(this.config.registry, this.custody, this.context)
    this.merger = new MergeOrchestrator(this.config.registry, this.custody, this.context)

    this.config.registry.registerReceiver(this.config.identity, this)
  }

  /** The vault's custodian identity */
  get identity(): Identity {
    return this.config.identity
  }

  // ---------------------------------------------------------------------------
  // Conversion
  // ---------------------------------------------------------------------------

  /**
   * Deposit items and credit their prior custodians.
   *
   * The caller must hold each item or be approved to move it. Credits go to
   * the custodian, not the caller. Either every item is deposited or none is.
   *
   * @param caller - The identity initiating the deposit
   * @param itemIds - Items to deposit
   * @returns Deposit result with per-item receipts
   */
  deposit(caller: Identity, itemIds: readonly ItemId[]): DepositResult {
    try {
      this.assertIdentity(caller)
      const receipts = this.engine.deposit(caller, itemIds)
      const totalAmount = receipts.reduce((sum, r) => sum + r.amount, 0n)
      logWithTimestamp('CheckVault', `deposit of ${receipts.length} item(s) committed`, { totalAmount })
      return { success: true, receipts, totalAmount }
    } catch (error) {
      return { success: false, receipts: [], totalAmount: 0n, ...this.fail('deposit', error) }
    }
  }

  /**
   * Redeem a custodied item, paying its current value from the caller's balance.
   *
   * @param caller - The identity receiving the item
   * @param itemId - The item to take out
   */
  redeem(caller: Identity, itemId: ItemId): RedeemResult {
    try {
      this.assertIdentity(caller)
      const receipt = this.engine.redeem(caller, itemId)
      logWithTimestamp('CheckVault', `redeemed item ${itemId}`, { amount: receipt.amount })
      return { success: true, itemId, amount: receipt.amount }
    } catch (error) {
      return { success: false, itemId, amount: 0n, ...this.fail('redeem', error) }
    }
  }

  /**
   * Registry hook for safe transfers to the vault.
   *
   * Throws on failure so that the registry reverts the transfer.
   */
  onItemReceived(sender: ItemRegistry, operator: Identity, from: Identity, itemId: ItemId): void {
    if (sender !== this.config.registry) {
      throw new OnlyRegistry()
    }
    this.engine.onItemReceived(sender, operator, from, itemId)
    logWithTimestamp('CheckVault', `received item ${itemId} from ${from.slice(0, 8)}...`)
  }

  /**
   * Raw value sent to the vault is always refused, with or without data.
   */
  receiveValue(sender: Identity, amount: bigint, data?: number[]): ValueTransferResult {
    try {
      return this.engine.receiveValue()
    } catch (error) {
      log.debug(`refused ${amount} from ${sender}`, data !== undefined ? `with ${data.length} byte(s) of data` : 'without data')
      return { success: false, ...this.fail('receiveValue', error) }
    }
  }

  // ---------------------------------------------------------------------------
  // Merging
  // ---------------------------------------------------------------------------

  /**
   * Merge two custodied items of equal rank. Anyone may call this.
   *
   * @param caller - The identity requesting the merge
   * @param keepId - The surviving item; must be lower than burnId
   * @param burnId - The consumed item
   */
  mergePair(caller: Identity, keepId: ItemId, burnId: ItemId): MergeResult {
    try {
      this.assertIdentity(caller)
      const rank = this.merger.mergePair(caller, keepId, burnId)
      logWithTimestamp('CheckVault', `merged ${burnId} into ${keepId}`, { rank })
      return { success: true, keepId, burnId, rank }
    } catch (error) {
      return { success: false, keepId, burnId, ...this.fail('mergePair', error) }
    }
  }

  /**
   * Aggregate a full set of custodied items into one maximal-rank item.
   * The first id must be the smallest and is the one that survives.
   */
  mergeAggregate(caller: Identity, itemIds: readonly ItemId[]): AggregateResult {
    try {
      this.assertIdentity(caller)
      this.merger.mergeAggregate(caller, itemIds)
      const [survivorId, ...consumedIds] = itemIds
      logWithTimestamp('CheckVault', `aggregated ${itemIds.length} items into ${survivorId}`)
      return { success: true, survivorId, consumedIds }
    } catch (error) {
      return { success: false, consumedIds: [], ...this.fail('mergeAggregate', error) }
    }
  }

  // ---------------------------------------------------------------------------
  // Fungible Transfers
  // ---------------------------------------------------------------------------

  transfer(from: Identity, to: Identity, amount: bigint): TransferResult {
    try {
      this.assertIdentity(from)
      this.assertIdentity(to)
      runAtomically(this.context, 'transfer', work => {
        work.ledger.transfer(from, to, amount)
        work.emit({ kind: 'transfer', from, to, amount })
      })
      return { success: true, amount }
    } catch (error) {
      return { success: false, amount, ...this.fail('transfer', error) }
    }
  }

  approve(owner: Identity, spender: Identity, amount: bigint): TransferResult {
    try {
      this.assertIdentity(owner)
      this.assertIdentity(spender)
      runAtomically(this.context, 'approve', work => {
        work.ledger.approve(owner, spender, amount)
        work.emit({ kind: 'approval', owner, spender, amount })
      })
      return { success: true, amount }
    } catch (error) {
      return { success: false, amount, ...this.fail('approve', error) }
    }
  }

  transferFrom(spender: Identity, from: Identity, to: Identity, amount: bigint): TransferResult {
    try {
      this.assertIdentity(spender)
      this.assertIdentity(from)
      this.assertIdentity(to)
      runAtomically(this.context, 'transferFrom', work => {
        work.ledger.transferFrom(spender, from, to, amount)
        work.emit({ kind: 'transfer', from, to, amount, spender })
      })
      return { success: true, amount }
    } catch (error) {
      return { success: false, amount, ...this.fail('transferFrom', error) }
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  name(): string {
    return this.ledger.name
  }

  symbol(): string {
    return this.ledger.symbol
  }

  decimals(): number {
    return this.ledger.decimals
  }

  maxSupply(): bigint {
    return MAX_SUPPLY
  }

  totalIssued(): bigint {
    return this.ledger.totalIssued()
  }

  balanceOf(account: Identity): bigint {
    return this.ledger.balanceOf(account)
  }

  allowance(owner: Identity, spender: Identity): bigint {
    return this.ledger.allowance(owner, spender)
  }

  /**
   * Current conversion amount of an item.
   *
   * @throws ItemNotFound for unknown or consumed items
   */
  quote(itemId: ItemId): bigint {
    return this.engine.quote(itemId)
  }

  custodyState(itemId: ItemId): CustodyState {
    return this.custody.custodyState(itemId)
  }

  /**
   * Committed events after the given sequence number.
   */
  events(since: number = 0): VaultEvent[] {
    return this.journal.since(since)
  }

  /** The committed event journal, for indexers */
  getJournal(): EventJournal {
    return this.journal
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private assertIdentity(identity: Identity): void {
    if (!COMPRESSED_KEY.test(identity)) {
      throw new InvalidIdentity(identity)
    }
    try {
      PublicKey.fromString(identity)
    } catch {
      throw new InvalidIdentity(identity)
    }
  }

  private fail(operation: string, error: unknown): Required<VaultFailureFields> {
    const failure = toFailure(error)
    if (failure.errorCode === 'Unknown') {
      log.error(`${operation} failed unexpectedly:`, failure.error)
    } else {
      log.info(`${operation} rejected: ${failure.error}`)
    }
    return failure
  }

  private resolveConfig(config: VaultConfig): ResolvedVaultConfig {
    return {
      registry: config.registry,
      identity: config.identity ?? PrivateKey.fromRandom().toPublicKey().toString(),
      name: config.name ?? DEFAULT_TOKEN_NAME,
      symbol: config.symbol ?? DEFAULT_TOKEN_SYMBOL
    }
  }
}
