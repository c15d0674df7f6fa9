/**
 * Error kinds raised by the conversion ledger.
 *
 * Every message starts with the error code, followed by the detail.
 */

import type { ItemId } from './types.js'

export type VaultErrorCode =
  | 'SupplyCeilingExceeded'
  | 'InsufficientBalance'
  | 'InsufficientAllowance'
  | 'InvalidOrder'
  | 'InvalidBatch'
  | 'NotAuthorized'
  | 'NotInCustody'
  | 'AlreadyInCustody'
  | 'ItemNotFound'
  | 'RegistryRejected'
  | 'UnsolicitedValueRejected'
  | 'ReentrantCall'
  | 'OnlyRegistry'
  | 'InvalidIdentity'
  | 'InvariantViolation'

export class VaultError extends Error {
  readonly code: VaultErrorCode

  constructor(code: VaultErrorCode, detail?: string) {
    super(detail !== undefined ? `${code}: ${detail}` : code)
    this.name = 'VaultError'
    this.code = code
  }
}

export class SupplyCeilingExceeded extends VaultError {
  constructor(readonly totalIssued: bigint, readonly amount: bigint, readonly maxSupply: bigint) {
    super('SupplyCeilingExceeded', `issuing ${amount} on top of ${totalIssued} exceeds ${maxSupply}`)
  }
}

export class InsufficientBalance extends VaultError {
  constructor(readonly balance: bigint, readonly required: bigint) {
    super('InsufficientBalance', `have ${balance}, need ${required}`)
  }
}

export class InsufficientAllowance extends VaultError {
  constructor(readonly allowance: bigint, readonly required: bigint) {
    super('InsufficientAllowance', `allowance ${allowance}, need ${required}`)
  }
}

export class InvalidOrder extends VaultError {
  constructor(detail: string) {
    super('InvalidOrder', detail)
  }
}

export class InvalidBatch extends VaultError {
  constructor(detail: string) {
    super('InvalidBatch', detail)
  }
}

export class NotAuthorized extends VaultError {
  constructor(readonly caller: string, readonly itemId: ItemId) {
    super('NotAuthorized', `${caller} may not move item ${itemId}`)
  }
}

export class NotInCustody extends VaultError {
  constructor(readonly itemId: ItemId) {
    super('NotInCustody', `item ${itemId} is not held by the vault`)
  }
}

export class AlreadyInCustody extends VaultError {
  constructor(readonly itemId: ItemId) {
    super('AlreadyInCustody', `item ${itemId} is already held by the vault`)
  }
}

export class ItemNotFound extends VaultError {
  constructor(readonly itemId: ItemId) {
    super('ItemNotFound', `item ${itemId} does not exist`)
  }
}

export class RegistryRejected extends VaultError {
  constructor(detail: string) {
    super('RegistryRejected', detail)
  }
}

export class UnsolicitedValueRejected extends VaultError {
  constructor() {
    super('UnsolicitedValueRejected', 'the vault only accepts item deposits')
  }
}

export class ReentrantCall extends VaultError {
  constructor(readonly operation: string) {
    super('ReentrantCall', `${operation} called while another request is in flight`)
  }
}

export class OnlyRegistry extends VaultError {
  constructor() {
    super('OnlyRegistry', 'item notifications are only accepted from the configured registry')
  }
}

export class InvalidIdentity extends VaultError {
  constructor(readonly identity: string) {
    super('InvalidIdentity', `not a public key: ${identity}`)
  }
}

export class InvariantViolation extends VaultError {
  constructor(detail: string) {
    super('InvariantViolation', detail)
  }
}

/**
 * Map a thrown value onto the failure fields of an operation result.
 */
export function toFailure(error: unknown): { error: string, errorCode: VaultErrorCode | 'Unknown' } {
  if (error instanceof VaultError) {
    return { error: error.message, errorCode: error.code }
  }
  return {
    error: error instanceof Error ? error.message : 'Unknown error',
    errorCode: 'Unknown'
  }
}
