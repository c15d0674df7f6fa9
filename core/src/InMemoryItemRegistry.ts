/**
 * InMemoryItemRegistry - reference item registry
 *
 * Keeps every item ever minted in an arena; consumed items stay as
 * tombstones so that their ids are never reused. Every mutating call
 * validates fully before it changes anything.
 */

import { AGGREGATE_COUNT, AGGREGATE_RANK, MAX_RANK } from './constants.js'
import { ItemNotFound, NotAuthorized, RegistryRejected } from './errors.js'
import { isValidRank } from './RankModel.js'
import type { Identity, ItemId, ItemReceiver, ItemRegistry, Rank, RegistryItem } from './types.js'

interface ItemRecord {
  id: ItemId
  rank: Rank
  seed: number
  owner: Identity
  exists: boolean
}

export class InMemoryItemRegistry implements ItemRegistry {
  private items = new Map<ItemId, ItemRecord>()
  private approvals = new Map<ItemId, Identity>()
  private operators = new Map<Identity, Set<Identity>>()
  private receivers = new Map<Identity, ItemReceiver>()

  // ---------------------------------------------------------------------------
  // Minting
  // ---------------------------------------------------------------------------

  /**
   * Create an item. Ids are unique for the lifetime of the registry.
   */
  mint(to: Identity, itemId: ItemId, rank: Rank, seed: number = 0): RegistryItem {
    if (this.items.has(itemId)) {
      throw new RegistryRejected(`item ${itemId} already minted`)
    }
    if (!isValidRank(rank)) {
      throw new RegistryRejected(`invalid rank ${rank}`)
    }
    const record: ItemRecord = { id: itemId, rank, seed, owner: to, exists: true }
    this.items.set(itemId, record)
    return toView(record)
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getItem(itemId: ItemId): RegistryItem | undefined {
    const record = this.items.get(itemId)
    return record !== undefined ? toView(record) : undefined
  }

  ownerOf(itemId: ItemId): Identity {
    return this.requireLive(itemId).owner
  }

  /**
   * Number of live items held by `owner`.
   */
  balanceOf(owner: Identity): number {
    let count = 0
    for (const record of this.items.values()) {
      if (record.exists && record.owner === owner) count++
    }
    return count
  }

  getApproved(itemId: ItemId): Identity | undefined {
    this.requireLive(itemId)
    return this.approvals.get(itemId)
  }

  isApprovedForAll(owner: Identity, operator: Identity): boolean {
    return this.operators.get(owner)?.has(operator) ?? false
  }

  isAuthorized(owner: Identity, operator: Identity, itemId: ItemId): boolean {
    return owner === operator ||
      this.approvals.get(itemId) === operator ||
      this.isApprovedForAll(owner, operator)
  }

  // ---------------------------------------------------------------------------
  // Approvals
  // ---------------------------------------------------------------------------

  /**
   * Grant `approved` the right to move one item. Pass undefined to clear.
   */
  approve(operator: Identity, approved: Identity | undefined, itemId: ItemId): void {
    const record = this.requireLive(itemId)
    if (record.owner !== operator && !this.isApprovedForAll(record.owner, operator)) {
      throw new NotAuthorized(operator, itemId)
    }
    if (approved === undefined) {
      this.approvals.delete(itemId)
    } else {
      this.approvals.set(itemId, approved)
    }
  }

  setApprovalForAll(owner: Identity, operator: Identity, approved: boolean): void {
    if (owner === operator) {
      throw new RegistryRejected('cannot approve yourself as operator')
    }
    const granted = this.operators.get(owner) ?? new Set<Identity>()
    if (approved) {
      granted.add(operator)
    } else {
      granted.delete(operator)
    }
    this.operators.set(owner, granted)
  }

  registerReceiver(holder: Identity, receiver: ItemReceiver): void {
    this.receivers.set(holder, receiver)
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  transfer(operator: Identity, from: Identity, to: Identity, itemId: ItemId): void {
    const record = this.requireLive(itemId)
    if (record.owner !== from) {
      throw new RegistryRejected(`item ${itemId} is not held by ${from}`)
    }
    if (!this.isAuthorized(from, operator, itemId)) {
      throw new NotAuthorized(operator, itemId)
    }
    this.approvals.delete(itemId)
    record.owner = to
  }

  /**
   * Transfer, then notify the recipient if it registered a receiver.
   * A throwing receiver reverts the transfer and the error propagates.
   */
  safeTransfer(operator: Identity, from: Identity, to: Identity, itemId: ItemId, data?: number[]): void {
    const approval = this.approvals.get(itemId)
    this.transfer(operator, from, to, itemId)

    const receiver = this.receivers.get(to)
    if (receiver === undefined) return
    try {
      receiver.onItemReceived(this, operator, from, itemId)
    } catch (error) {
      this.requireLive(itemId).owner = from
      if (approval !== undefined) {
        this.approvals.set(itemId, approval)
      }
      throw error
    }
  }

  // ---------------------------------------------------------------------------
  // Merges
  // ---------------------------------------------------------------------------

  /**
   * Combine two items of equal rank: keep goes up one rank, burn is consumed.
   * With `swap` the survivor takes over the burned item's seed.
   * Only the holder of both items may merge them; approvals do not count.
   */
  mergePair(operator: Identity, keepId: ItemId, burnId: ItemId, swap: boolean): void {
    if (keepId === burnId) {
      throw new RegistryRejected('cannot merge an item with itself')
    }
    const keep = this.requireHeld(operator, keepId)
    const burn = this.requireHeld(operator, burnId)
    if (keep.rank !== burn.rank) {
      throw new RegistryRejected(`rank mismatch: ${keep.rank} and ${burn.rank}`)
    }
    if (keep.rank >= AGGREGATE_RANK) {
      throw new RegistryRejected(`items of rank ${keep.rank} can only be aggregated`)
    }

    keep.rank += 1
    if (swap) {
      keep.seed = burn.seed
    }
    this.consume(burn)
  }

  /**
   * Combine a full set of aggregate-rank items into one maximal-rank item.
   * The first id survives.
   */
  mergeAggregate(operator: Identity, itemIds: readonly ItemId[]): void {
    if (itemIds.length !== AGGREGATE_COUNT) {
      throw new RegistryRejected(`expected ${AGGREGATE_COUNT} items, got ${itemIds.length}`)
    }
    if (new Set(itemIds).size !== itemIds.length) {
      throw new RegistryRejected('duplicate items')
    }
    const records = itemIds.map(itemId => this.requireHeld(operator, itemId))
    for (const record of records) {
      if (record.rank !== AGGREGATE_RANK) {
        throw new RegistryRejected(`item ${record.id} has rank ${record.rank}, expected ${AGGREGATE_RANK}`)
      }
    }

    const [survivor, ...consumed] = records
    survivor.rank = MAX_RANK
    for (const record of consumed) {
      this.consume(record)
    }
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private requireLive(itemId: ItemId): ItemRecord {
    const record = this.items.get(itemId)
    if (record === undefined || !record.exists) {
      throw new ItemNotFound(itemId)
    }
    return record
  }

  private requireHeld(operator: Identity, itemId: ItemId): ItemRecord {
    const record = this.requireLive(itemId)
    if (record.owner !== operator) {
      throw new RegistryRejected(`${operator} does not hold item ${itemId}`)
    }
    return record
  }

  private consume(record: ItemRecord): void {
    record.exists = false
    this.approvals.delete(record.id)
  }
}

function toView(record: ItemRecord): RegistryItem {
  return { id: record.id, rank: record.rank, seed: record.seed, exists: record.exists }
}
