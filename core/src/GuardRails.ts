/**
 * GuardRails - checks that surround every state change
 */

import { MAX_SUPPLY } from './constants.js'
import {
  InvariantViolation,
  ReentrantCall,
  SupplyCeilingExceeded,
  UnsolicitedValueRejected
} from './errors.js'
import type { FungibleLedger } from './FungibleLedger.js'

/**
 * Rejects a request that starts while another one is still running,
 * e.g. a registry callback re-entering the vault mid-transfer.
 */
export class ReentrancyGuard {
  private active?: string

  get locked(): boolean {
    return this.active !== undefined
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.active !== undefined) {
      throw new ReentrantCall(operation)
    }
    this.active = operation
    try {
      return fn()
    } finally {
      this.active = undefined
    }
  }
}

/**
 * Throws unless issuing `amount` keeps the supply within the ceiling.
 */
export function assertWithinCeiling(totalIssued: bigint, amount: bigint, maxSupply: bigint = MAX_SUPPLY): void {
  if (totalIssued + amount > maxSupply) {
    throw new SupplyCeilingExceeded(totalIssued, amount, maxSupply)
  }
}

/**
 * Supply equals the sum of balances and stays within the ceiling.
 */
export function assertLedgerConsistent(ledger: FungibleLedger, maxSupply: bigint = MAX_SUPPLY): void {
  const totalIssued = ledger.totalIssued()
  const sum = ledger.sumOfBalances()
  if (totalIssued !== sum) {
    throw new InvariantViolation(`total issued ${totalIssued} differs from balance sum ${sum}`)
  }
  if (totalIssued > maxSupply) {
    throw new InvariantViolation(`total issued ${totalIssued} exceeds ${maxSupply}`)
  }
}

/**
 * The vault takes items, never raw value.
 */
export function rejectUnsolicitedValue(): never {
  throw new UnsolicitedValueRejected()
}
