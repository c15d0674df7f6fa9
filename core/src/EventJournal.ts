/**
 * EventJournal - ordered record of committed accounting events
 *
 * Events raised while a request runs are staged and only become visible
 * once the request commits. An aborted request discards its staged events.
 */

import { Hash, Utils } from '@bsv/sdk'
import type { HexString } from '@bsv/sdk'
import type { VaultEvent, VaultEventPayload } from './types.js'

export class EventJournal {
  private committed: VaultEvent[] = []
  private staged: VaultEventPayload[] = []

  /**
   * Queue an event for the current request.
   */
  stage(payload: VaultEventPayload): void {
    this.staged.push(payload)
  }

  /**
   * Publish the staged events and return them with their sequence numbers.
   */
  commit(): VaultEvent[] {
    const published: VaultEvent[] = []
    for (const payload of this.staged) {
      const sequence = this.committed.length + 1
      const event: VaultEvent = { ...payload, sequence, id: EventJournal.computeEventId(sequence, payload) }
      this.committed.push(event)
      published.push(event)
    }
    this.staged = []
    return published
  }

  discard(): void {
    this.staged = []
  }

  /**
   * Committed events with a sequence number greater than `sequence`.
   */
  since(sequence: number = 0): VaultEvent[] {
    return this.committed.slice(Math.max(sequence, 0))
  }

  latestSequence(): number {
    return this.committed.length
  }

  /**
   * Deterministic event id: sha256 over the sequence number and payload.
   */
  static computeEventId(sequence: number, payload: VaultEventPayload): HexString {
    const serialized = `${sequence}:${EventJournal.serialize(payload)}`
    return Utils.toHex(Hash.sha256(Utils.toArray(serialized, 'utf8')))
  }

  /**
   * JSON encoding with bigints written as decimal strings.
   */
  static serialize(payload: VaultEventPayload): string {
    return JSON.stringify(payload, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    )
  }
}
