import { VaultStorageManager } from './VaultStorageManager.js'
import { EventJournal, VAULT_LOOKUP_SERVICE, log } from '@checkvault/core'
import type { CustodyState, ItemId, VaultEvent } from '@checkvault/core'
import { Db } from 'mongodb'
import {
  VAULT_EVENT_KINDS,
  VaultEventRecord,
  VaultEventStore,
  VaultLookupQuestion,
  VaultLookupResult,
  VaultQuery
} from './types.js'
import docs from '../docs/VaultLookupDocs.js'

/**
 * Anything that can replay committed vault events
 */
export interface JournalSource {
  since(sequence?: number): VaultEvent[]
}

/**
 * Indexes vault journal events and answers queries over them
 * @public
 */
class VaultLookupService {
  private static readonly SERVICE_ID = VAULT_LOOKUP_SERVICE

  constructor(public storageManager: VaultEventStore) { }

  /**
   * Store every journal event newer than the newest stored one.
   *
   * @returns Number of events stored
   */
  async sync(journal: JournalSource): Promise<number> {
    const latest = await this.storageManager.latestSequence()
    const pending = journal.since(latest)

    for (const event of pending) {
      try {
        await this.storageManager.storeRecord(toRecord(event))
      } catch (error) {
        log.error(`Error indexing vault event ${event.sequence}:`, error)
        throw error
      }
    }
    return pending.length
  }

  async lookup(question: VaultLookupQuestion): Promise<VaultLookupResult[]> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== VaultLookupService.SERVICE_ID) {
      throw new Error('Lookup service not supported')
    }

    const query = parseQuery(question.query)

    if (query.sequence !== undefined) {
      const record = await this.storageManager.findBySequence(query.sequence)
      return record !== null ? [withoutCreatedAt(record)] : []
    }

    // Check if we have any filters to apply
    const hasFilters = query.account !== undefined ||
      query.itemId !== undefined ||
      query.kind !== undefined ||
      query.sinceSequence !== undefined

    let results: VaultEventRecord[]

    if (hasFilters) {
      results = await this.storageManager.findWithFilters(
        {
          account: query.account,
          itemId: query.itemId,
          kind: query.kind,
          sinceSequence: query.sinceSequence
        },
        query.limit,
        query.skip,
        query.sortOrder
      )
    } else {
      results = await this.storageManager.findAllRecords(
        query.limit,
        query.skip,
        query.sortOrder
      )
    }

    return results.map(withoutCreatedAt)
  }

  /**
   * Custody state of an item as far as the indexed events tell.
   *
   * @returns undefined for items the vault never handled
   */
  async custodyOf(itemId: ItemId): Promise<CustodyState | undefined> {
    const id = itemId.toString()
    const [newest] = await this.storageManager.findWithFilters({ itemId: id }, 1, 0, 'desc')
    if (newest === undefined) {
      return undefined
    }
    if (newest.consumedItemIds.includes(id)) {
      return 'consumed'
    }
    return newest.kind === 'redeem' ? 'external' : 'in-custody'
  }

  async getDocumentation(): Promise<string> {
    return docs
  }

  async getMetaData(): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'CheckVault Lookup Service',
      shortDescription: 'Find vault events by account, item or kind.'
    }
  }
}

/**
 * Flatten a journal event into its indexed form.
 */
function toRecord(event: VaultEvent): VaultEventRecord {
  const base = {
    sequence: event.sequence,
    eventId: event.id,
    kind: event.kind,
    payload: EventJournal.serialize(event),
    createdAt: new Date()
  }

  switch (event.kind) {
    case 'deposit':
      return {
        ...base,
        accounts: unique([event.account, event.operator]),
        itemIds: [event.itemId.toString()],
        consumedItemIds: [],
        amount: event.amount.toString(),
        rank: event.rank
      }
    case 'redeem':
      return {
        ...base,
        accounts: [event.account],
        itemIds: [event.itemId.toString()],
        consumedItemIds: [],
        amount: event.amount.toString(),
        rank: event.rank
      }
    case 'merge':
      return {
        ...base,
        accounts: [event.operator],
        itemIds: [event.keepId.toString(), event.burnId.toString()],
        consumedItemIds: [event.burnId.toString()],
        rank: event.rank
      }
    case 'aggregate':
      return {
        ...base,
        accounts: [event.operator],
        itemIds: [event.survivorId, ...event.consumedIds].map(id => id.toString()),
        consumedItemIds: event.consumedIds.map(id => id.toString()),
        rank: event.rank
      }
    case 'transfer':
      return {
        ...base,
        accounts: unique(event.spender !== undefined ? [event.from, event.to, event.spender] : [event.from, event.to]),
        itemIds: [],
        consumedItemIds: [],
        amount: event.amount.toString()
      }
    case 'approval':
      return {
        ...base,
        accounts: unique([event.owner, event.spender]),
        itemIds: [],
        consumedItemIds: [],
        amount: event.amount.toString()
      }
  }
}

function withoutCreatedAt({ createdAt, ...result }: VaultEventRecord): VaultLookupResult {
  return result
}

function unique(values: string[]): string[] {
  return [...new Set(values)]
}

/**
 * Validate a raw lookup query.
 */
function parseQuery(raw: unknown): VaultQuery {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('A valid query must be provided')
  }
  const field = (key: string): unknown => Reflect.get(raw, key)
  const query: VaultQuery = {}

  const account = field('account')
  if (account !== undefined) {
    if (typeof account !== 'string' || !/^[0-9a-fA-F]{66}$/.test(account)) {
      throw new Error('account must be a hex public key')
    }
    query.account = account
  }

  const itemId = field('itemId')
  if (itemId !== undefined) {
    if (typeof itemId !== 'string' || !/^\d+$/.test(itemId)) {
      throw new Error('itemId must be a decimal string')
    }
    query.itemId = BigInt(itemId).toString()
  }

  const kind = field('kind')
  if (kind !== undefined) {
    const known = VAULT_EVENT_KINDS.find(k => k === kind)
    if (known === undefined) {
      throw new Error(`Unknown event kind: ${String(kind)}`)
    }
    query.kind = known
  }

  query.sinceSequence = readCount(field('sinceSequence'), 'sinceSequence')
  query.sequence = readCount(field('sequence'), 'sequence')
  query.limit = readCount(field('limit'), 'limit')
  query.skip = readCount(field('skip'), 'skip')

  const sortOrder = field('sortOrder')
  if (sortOrder !== undefined) {
    if (sortOrder !== 'asc' && sortOrder !== 'desc') {
      throw new Error('sortOrder must be asc or desc')
    }
    query.sortOrder = sortOrder
  }

  return query
}

function readCount(value: unknown, name: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`)
  }
  return value
}

// Factory function
export default (db: Db): VaultLookupService => {
  return new VaultLookupService(new VaultStorageManager(db))
}

export { VaultLookupService }
