/**
 * MergeOrchestrator - permissionless merges of custodied items
 *
 * The ordering rules and custody of every input are checked here. Rank
 * compatibility is the registry's rule and is left to it.
 */

import { AGGREGATE_COUNT } from './constants.js'
import { callRegistry } from './CustodyLedger.js'
import type { CustodyLedger } from './CustodyLedger.js'
import { InvalidBatch, InvalidOrder } from './errors.js'
import { runAtomically } from './UnitOfWork.js'
import type { RequestContext } from './UnitOfWork.js'
import type { Identity, ItemId, ItemRegistry, Rank } from './types.js'

export class MergeOrchestrator {
  constructor(
    private readonly registry: ItemRegistry,
    private readonly custody: CustodyLedger,
    private readonly context: RequestContext
  ) { }

  /**
   * Merge `burnId` into `keepId`. Both must be custodied and of equal rank.
   *
   * @returns The surviving item's new rank
   * @throws InvalidOrder unless keepId < burnId, before the registry is consulted
   * @throws NotInCustody when the vault does not hold either item
   */
  mergePair(caller: Identity, keepId: ItemId, burnId: ItemId): Rank {
    if (keepId >= burnId) {
      throw new InvalidOrder(`keepId ${keepId} must be lower than burnId ${burnId}`)
    }
    return runAtomically(this.context, 'mergePair', work => {
      this.custody.requireInCustody(keepId)
      this.custody.requireInCustody(burnId)
      callRegistry('mergePair', () => this.registry.mergePair(this.custody.vault, keepId, burnId, false))
      const rank = this.custody.requireItem(keepId).rank
      work.emit({ kind: 'merge', operator: caller, keepId, burnId, rank })
      return rank
    }).value
  }

  /**
   * Collapse a full set of custodied items into one maximal-rank item.
   *
   * The first id survives and must be the smallest of the set; every other
   * item is consumed.
   *
   * @returns The survivor's rank
   */
  mergeAggregate(caller: Identity, itemIds: readonly ItemId[]): Rank {
    if (itemIds.length !== AGGREGATE_COUNT) {
      throw new InvalidBatch(`aggregation takes exactly ${AGGREGATE_COUNT} items, got ${itemIds.length}`)
    }
    const [survivorId, ...consumedIds] = itemIds
    for (const itemId of consumedIds) {
      if (itemId < survivorId) {
        throw new InvalidOrder(`first item ${survivorId} is not the smallest; ${itemId} is lower`)
      }
    }
    return runAtomically(this.context, 'mergeAggregate', work => {
      for (const itemId of itemIds) {
        this.custody.requireInCustody(itemId)
      }
      callRegistry('mergeAggregate', () => this.registry.mergeAggregate(this.custody.vault, itemIds))
      const rank = this.custody.requireItem(survivorId).rank
      work.emit({ kind: 'aggregate', operator: caller, survivorId, consumedIds, rank })
      return rank
    }).value
  }
}
