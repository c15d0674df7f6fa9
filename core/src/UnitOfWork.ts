/**
 * UnitOfWork - all-or-nothing execution of one vault request
 *
 * Captures the ledger before the request starts and records an undo step
 * for every custody move made through the registry. On failure the moves
 * are undone newest first, the ledger is restored and staged events are
 * dropped; on success the ledger invariants are checked and the staged
 * events are published.
 */

import type { EventJournal } from './EventJournal.js'
import type { FungibleLedger, LedgerSnapshot } from './FungibleLedger.js'
import { assertLedgerConsistent } from './GuardRails.js'
import type { ReentrancyGuard } from './GuardRails.js'
import { log } from './logging.js'
import type { VaultEvent, VaultEventPayload } from './types.js'

export class UnitOfWork {
  private readonly snapshot: LedgerSnapshot
  private readonly undoSteps: Array<() => void> = []

  constructor(
    readonly ledger: FungibleLedger,
    private readonly journal: EventJournal
  ) {
    this.snapshot = ledger.snapshot()
  }

  /**
   * Register the inverse of an external effect that has just succeeded.
   */
  onRollback(step: () => void): void {
    this.undoSteps.push(step)
  }

  emit(payload: VaultEventPayload): void {
    this.journal.stage(payload)
  }

  commit(): VaultEvent[] {
    return this.journal.commit()
  }

  /**
   * Run every undo step, newest first, even when one of them throws.
   *
   * @returns The first error an undo step raised, if any
   */
  rollback(): unknown {
    let undoError: unknown
    for (const step of [...this.undoSteps].reverse()) {
      try {
        step()
      } catch (error) {
        undoError ??= error
      }
    }
    this.ledger.restore(this.snapshot)
    this.journal.discard()
    return undoError
  }
}

/**
 * Shared plumbing for the engine and the merge orchestrator.
 */
export interface RequestContext {
  guard: ReentrancyGuard
  ledger: FungibleLedger
  journal: EventJournal
}

/**
 * Run `fn` as one guarded, atomic request.
 */
export function runAtomically<T>(
  context: RequestContext,
  operation: string,
  fn: (work: UnitOfWork) => T
): { value: T, events: VaultEvent[] } {
  return context.guard.run(operation, () => {
    const work = new UnitOfWork(context.ledger, context.journal)
    let value: T
    try {
      value = fn(work)
      assertLedgerConsistent(context.ledger)
    } catch (error) {
      const undoError = work.rollback()
      if (undoError !== undefined) {
        log.error(`Could not fully undo ${operation}:`, undoError)
      }
      throw error
    }
    return { value, events: work.commit() }
  })
}
