/**
 * FungibleLedger - balance storage for the fungible unit
 *
 * Holds the account balances, the issued supply counter and allowances.
 * Issuance limits are not enforced here; the conversion engine checks the
 * supply ceiling before it credits.
 */

import { DECIMALS } from './constants.js'
import { InsufficientAllowance, InsufficientBalance } from './errors.js'
import type { Identity } from './types.js'

/**
 * Point-in-time copy of the ledger, used to abort a request.
 */
export interface LedgerSnapshot {
  balances: Map<Identity, bigint>
  allowances: Map<string, bigint>
  totalIssued: bigint
}

export class FungibleLedger {
  readonly decimals = DECIMALS

  private balances = new Map<Identity, bigint>()
  private allowances = new Map<string, bigint>()
  private issued = 0n

  constructor(
    readonly name: string,
    readonly symbol: string
  ) { }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  balanceOf(account: Identity): bigint {
    return this.balances.get(account) ?? 0n
  }

  totalIssued(): bigint {
    return this.issued
  }

  allowance(owner: Identity, spender: Identity): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n
  }

  /**
   * Sum of every account balance. Equals totalIssued() when the ledger is consistent.
   */
  sumOfBalances(): bigint {
    let sum = 0n
    for (const balance of this.balances.values()) {
      sum += balance
    }
    return sum
  }

  // ---------------------------------------------------------------------------
  // Issuance and Redemption
  // ---------------------------------------------------------------------------

  /**
   * Issue new units to an account. The account is created on first credit.
   */
  credit(account: Identity, amount: bigint): void {
    assertAmount(amount)
    this.balances.set(account, this.balanceOf(account) + amount)
    this.issued += amount
  }

  /**
   * Remove units from an account and from the issued supply.
   */
  debit(account: Identity, amount: bigint): void {
    assertAmount(amount)
    const balance = this.balanceOf(account)
    if (balance < amount) {
      throw new InsufficientBalance(balance, amount)
    }
    this.balances.set(account, balance - amount)
    this.issued -= amount
  }

  // ---------------------------------------------------------------------------
  // Third-party Transfers
  // ---------------------------------------------------------------------------

  transfer(from: Identity, to: Identity, amount: bigint): void {
    assertAmount(amount)
    const balance = this.balanceOf(from)
    if (balance < amount) {
      throw new InsufficientBalance(balance, amount)
    }
    this.balances.set(from, balance - amount)
    this.balances.set(to, this.balanceOf(to) + amount)
  }

  approve(owner: Identity, spender: Identity, amount: bigint): void {
    assertAmount(amount)
    this.allowances.set(allowanceKey(owner, spender), amount)
  }

  /**
   * Move units on behalf of `from`, spending the allowance granted to `spender`.
   */
  transferFrom(spender: Identity, from: Identity, to: Identity, amount: bigint): void {
    assertAmount(amount)
    const allowed = this.allowance(from, spender)
    if (allowed < amount) {
      throw new InsufficientAllowance(allowed, amount)
    }
    this.transfer(from, to, amount)
    this.allowances.set(allowanceKey(from, spender), allowed - amount)
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  snapshot(): LedgerSnapshot {
    return {
      balances: new Map(this.balances),
      allowances: new Map(this.allowances),
      totalIssued: this.issued
    }
  }

  restore(snapshot: LedgerSnapshot): void {
    this.balances = new Map(snapshot.balances)
    this.allowances = new Map(snapshot.allowances)
    this.issued = snapshot.totalIssued
  }
}

function allowanceKey(owner: Identity, spender: Identity): string {
  return `${owner}:${spender}`
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Amount must not be negative, got ${amount}`)
  }
}
