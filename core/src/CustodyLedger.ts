/**
 * CustodyLedger - pre-conditions and custody moves for items
 *
 * The registry stays the source of truth for ownership and approvals;
 * nothing is cached here, every check re-queries it at the time of use.
 */

import { AlreadyInCustody, ItemNotFound, NotAuthorized, NotInCustody, RegistryRejected, VaultError } from './errors.js'
import type { UnitOfWork } from './UnitOfWork.js'
import type { CustodyState, Identity, ItemId, ItemRegistry, RegistryItem } from './types.js'

/**
 * One way an operator can be entitled to move somebody's item.
 */
export type TransferGrant = (registry: ItemRegistry, owner: Identity, operator: Identity, itemId: ItemId) => boolean

/** The custodian itself */
export const custodianGrant: TransferGrant = (_registry, owner, operator) => owner === operator

/** Approval for this one item */
export const singleItemGrant: TransferGrant = (registry, _owner, operator, itemId) =>
  registry.getApproved(itemId) === operator

/** Approval for every item of the custodian */
export const blanketGrant: TransferGrant = (registry, owner, operator) =>
  registry.isApprovedForAll(owner, operator)

/** Any one grant is sufficient */
export const TRANSFER_GRANTS: readonly TransferGrant[] = [custodianGrant, singleItemGrant, blanketGrant]

/**
 * Invoke the registry, reporting foreign failures as RegistryRejected.
 */
export function callRegistry<T>(description: string, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof VaultError) {
      throw error
    }
    throw new RegistryRejected(`${description}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

export class CustodyLedger {
  constructor(
    private readonly registry: ItemRegistry,
    readonly vault: Identity,
    private readonly grants: readonly TransferGrant[] = TRANSFER_GRANTS
  ) { }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Fetch a live item.
   *
   * @throws ItemNotFound for unknown or consumed items
   */
  requireItem(itemId: ItemId): RegistryItem {
    const item = callRegistry(`getItem(${itemId})`, () => this.registry.getItem(itemId))
    if (item === undefined || !item.exists) {
      throw new ItemNotFound(itemId)
    }
    return item
  }

  custodyState(itemId: ItemId): CustodyState {
    const item = this.requireKnownItem(itemId)
    if (!item.exists) {
      return 'consumed'
    }
    return this.ownerOf(itemId) === this.vault ? 'in-custody' : 'external'
  }

  canTransfer(operator: Identity, owner: Identity, itemId: ItemId): boolean {
    return this.grants.some(grant => grant(this.registry, owner, operator, itemId))
  }

  /**
   * Validate a deposit of `itemId` initiated by `caller`.
   *
   * @returns The item and its current custodian
   * @throws AlreadyInCustody when the vault holds the item, whoever asks
   */
  requireDepositable(caller: Identity, itemId: ItemId): { item: RegistryItem, owner: Identity } {
    const item = this.requireItem(itemId)
    const owner = this.ownerOf(itemId)
    if (owner === this.vault) {
      throw new AlreadyInCustody(itemId)
    }
    if (!this.canTransfer(caller, owner, itemId)) {
      throw new NotAuthorized(caller, itemId)
    }
    return { item, owner }
  }

  /**
   * Validate that the vault holds `itemId`.
   */
  requireInCustody(itemId: ItemId): RegistryItem {
    const item = this.requireItem(itemId)
    if (this.ownerOf(itemId) !== this.vault) {
      throw new NotInCustody(itemId)
    }
    return item
  }

  // ---------------------------------------------------------------------------
  // Custody Moves
  // ---------------------------------------------------------------------------

  /**
   * Move an item from its custodian into the vault on the caller's authority.
   */
  moveIntoCustody(work: UnitOfWork, caller: Identity, owner: Identity, itemId: ItemId): void {
    callRegistry(`transfer(${itemId})`, () => this.registry.transfer(caller, owner, this.vault, itemId))
    work.onRollback(() => this.registry.transfer(this.vault, this.vault, owner, itemId))
  }

  /**
   * Hand a custodied item over to `to`.
   */
  release(work: UnitOfWork, itemId: ItemId, to: Identity): void {
    callRegistry(`transfer(${itemId})`, () => this.registry.transfer(this.vault, this.vault, to, itemId))
    work.onRollback(() => this.registry.transfer(to, to, this.vault, itemId))
  }

  private ownerOf(itemId: ItemId): Identity {
    return callRegistry(`ownerOf(${itemId})`, () => this.registry.ownerOf(itemId))
  }

  private requireKnownItem(itemId: ItemId): RegistryItem {
    const item = callRegistry(`getItem(${itemId})`, () => this.registry.getItem(itemId))
    if (item === undefined) {
      throw new ItemNotFound(itemId)
    }
    return item
  }
}
