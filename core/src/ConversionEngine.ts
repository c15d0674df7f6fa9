/**
 * ConversionEngine - deposits and redemptions
 *
 * Item states from the vault's point of view:
 *
 *   External --deposit--> InCustody --redeem--> External
 *                             |
 *                             +--merge (burn side)--> Consumed
 */

import type { CustodyLedger } from './CustodyLedger.js'
import { AlreadyInCustody, InvalidBatch, OnlyRegistry } from './errors.js'
import { assertWithinCeiling, rejectUnsolicitedValue } from './GuardRails.js'
import { amountForRank } from './RankModel.js'
import { runAtomically } from './UnitOfWork.js'
import type { RequestContext, UnitOfWork } from './UnitOfWork.js'
import type { DepositReceipt, Identity, ItemId, ItemReceiver, ItemRegistry, RegistryItem } from './types.js'

export class ConversionEngine implements ItemReceiver {
  constructor(
    private readonly registry: ItemRegistry,
    private readonly custody: CustodyLedger,
    private readonly context: RequestContext
  ) { }

  // ---------------------------------------------------------------------------
  // Deposits
  // ---------------------------------------------------------------------------

  /**
   * Move items into custody and credit each item's prior custodian.
   *
   * The whole batch is validated before any item moves, then applied item
   * by item. A failure on any item aborts the batch with nothing changed.
   *
   * @param caller - The identity initiating the deposit; must be the custodian or approved
   * @param itemIds - Items to deposit, processed in order
   * @returns One receipt per item
   */
  deposit(caller: Identity, itemIds: readonly ItemId[]): DepositReceipt[] {
    return runAtomically(this.context, 'deposit', work => {
      this.validateBatch(itemIds)
      this.preflight(caller, itemIds)
      return itemIds.map(itemId => this.depositOne(work, caller, itemId))
    }).value
  }

  /**
   * Push-path deposit: the registry reports an item that was safe-transferred
   * to the vault. Throwing here makes the registry revert the transfer.
   */
  onItemReceived(sender: ItemRegistry, operator: Identity, from: Identity, itemId: ItemId): void {
    if (sender !== this.registry) {
      throw new OnlyRegistry()
    }
    runAtomically(this.context, 'onItemReceived', work => {
      // a move from the vault to itself brings nothing new in
      if (from === this.custody.vault) {
        throw new AlreadyInCustody(itemId)
      }
      const item = this.custody.requireInCustody(itemId)
      const amount = amountForRank(item.rank)
      assertWithinCeiling(work.ledger.totalIssued(), amount)
      this.issue(work, from, operator, item, amount)
    })
  }

  // ---------------------------------------------------------------------------
  // Redemption
  // ---------------------------------------------------------------------------

  /**
   * Take a custodied item out against a debit of its current value.
   *
   * The charge follows the item's rank now, not the rank it had when it was
   * deposited; merges in custody change what it costs to take out.
   */
  redeem(caller: Identity, itemId: ItemId): DepositReceipt {
    return runAtomically(this.context, 'redeem', work => {
      const item = this.custody.requireInCustody(itemId)
      const amount = amountForRank(item.rank)
      work.ledger.debit(caller, amount)
      this.custody.release(work, itemId, caller)
      work.emit({ kind: 'redeem', account: caller, itemId, rank: item.rank, amount })
      return { itemId, account: caller, rank: item.rank, amount }
    }).value
  }

  // ---------------------------------------------------------------------------
  // Queries and Guards
  // ---------------------------------------------------------------------------

  /**
   * What depositing or redeeming the item is worth right now.
   */
  quote(itemId: ItemId): bigint {
    return amountForRank(this.custody.requireItem(itemId).rank)
  }

  receiveValue(): never {
    return rejectUnsolicitedValue()
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private validateBatch(itemIds: readonly ItemId[]): void {
    if (itemIds.length === 0) {
      throw new InvalidBatch('no items given')
    }
    const seen = new Set<ItemId>()
    for (const itemId of itemIds) {
      if (seen.has(itemId)) {
        throw new InvalidBatch(`item ${itemId} appears more than once`)
      }
      seen.add(itemId)
    }
  }

  /**
   * Run every check of the batch against the running supply before anything moves.
   */
  private preflight(caller: Identity, itemIds: readonly ItemId[]): void {
    let projected = this.context.ledger.totalIssued()
    for (const itemId of itemIds) {
      const { item } = this.custody.requireDepositable(caller, itemId)
      const amount = amountForRank(item.rank)
      assertWithinCeiling(projected, amount)
      projected += amount
    }
  }

  private depositOne(work: UnitOfWork, caller: Identity, itemId: ItemId): DepositReceipt {
    const { item, owner } = this.custody.requireDepositable(caller, itemId)
    const amount = amountForRank(item.rank)
    assertWithinCeiling(work.ledger.totalIssued(), amount)
    this.custody.moveIntoCustody(work, caller, owner, itemId)
    return this.issue(work, owner, caller, item, amount)
  }

  private issue(
    work: UnitOfWork,
    account: Identity,
    operator: Identity,
    item: RegistryItem,
    amount: bigint
  ): DepositReceipt {
    work.ledger.credit(account, amount)
    work.emit({ kind: 'deposit', account, operator, itemId: item.id, rank: item.rank, amount })
    return { itemId: item.id, account, rank: item.rank, amount }
  }
}
