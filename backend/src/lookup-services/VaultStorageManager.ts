import { Collection, Db, Filter } from 'mongodb'
import { log } from '@checkvault/core'
import { VaultEventFilters, VaultEventRecord, VaultEventStore } from './types.js'

/**
 * Storage manager for indexed vault events using MongoDB.
 */
export class VaultStorageManager implements VaultEventStore {
  private readonly records: Collection<VaultEventRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (db: Db) {
    this.records = db.collection<VaultEventRecord>('vaultEvents')

    // Journal position is the natural key
    this.records
      .createIndex({ sequence: 1 }, { unique: true })
      .catch(error => log.error('Failed to create sequence index:', error))

    this.records
      .createIndex({ itemIds: 1 })
      .catch(error => log.error('Failed to create itemIds index:', error))

    this.records
      .createIndex({ accounts: 1 })
      .catch(error => log.error('Failed to create accounts index:', error))

    this.records
      .createIndex({ kind: 1 })
      .catch(error => log.error('Failed to create kind index:', error))
  }

  /**
   * Insert an event record.
   */
  async storeRecord (record: VaultEventRecord): Promise<void> {
    await this.records.insertOne({ ...record })
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: VaultEventFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<VaultEventRecord[]> {
    const query: Filter<VaultEventRecord> = {}

    if (filters.account !== undefined) {
      query.accounts = filters.account
    }

    if (filters.itemId !== undefined) {
      query.itemIds = filters.itemId
    }

    if (filters.kind !== undefined) {
      query.kind = filters.kind
    }

    if (filters.sinceSequence !== undefined) {
      query.sequence = { $gt: filters.sinceSequence }
    }

    return await this.findRecordWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<VaultEventRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  async findBySequence (sequence: number): Promise<VaultEventRecord | null> {
    return await this.records.findOne({ sequence }, { projection: { _id: 0 } })
  }

  /**
   * Sequence number of the newest stored event, 0 when empty.
   */
  async latestSequence (): Promise<number> {
    const newest = await this.records.findOne({}, { sort: { sequence: -1 } })
    return newest?.sequence ?? 0
  }

  /**
   * Helper function for querying from the database
   */
  private async findRecordWithQuery (
    query: Filter<VaultEventRecord>,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<VaultEventRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.records
      .find(query, { projection: { _id: 0 } })
      .sort({ sequence: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
