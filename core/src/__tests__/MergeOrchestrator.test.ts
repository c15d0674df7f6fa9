import { ConversionEngine } from '../ConversionEngine.js'
import { CustodyLedger } from '../CustodyLedger.js'
import { EventJournal } from '../EventJournal.js'
import { FungibleLedger } from '../FungibleLedger.js'
import { ReentrancyGuard } from '../GuardRails.js'
import { InMemoryItemRegistry } from '../InMemoryItemRegistry.js'
import { MergeOrchestrator } from '../MergeOrchestrator.js'
import { InsufficientBalance, InvalidBatch, InvalidOrder, NotInCustody } from '../errors.js'
import { UNIT } from '../constants.js'
import type { Identity, ItemId } from '../types.js'

const VAULT = '03' + 'f'.repeat(64)
const ALICE = '02' + 'a'.repeat(64)
const BOB = '03' + 'b'.repeat(64)

const RANK_2 = 976562500000000n
const RANK_3 = 1953125000000000n
const RANK_6 = 15625000000000000n

function setup() {
  const registry = new InMemoryItemRegistry()
  const ledger = new FungibleLedger('Test', 'TST')
  const journal = new EventJournal()
  const context = { guard: new ReentrancyGuard(), ledger, journal }
  const custody = new CustodyLedger(registry, VAULT)
  const engine = new ConversionEngine(registry, custody, context)
  const merger = new MergeOrchestrator(registry, custody, context)
  return { registry, ledger, journal, custody, engine, merger }
}

function ownerKey(index: number): Identity {
  return '02' + index.toString(16).padStart(64, '0')
}

describe('MergeOrchestrator', () => {
  describe('mergePair', () => {
    it('merges two custodied items without touching balances', () => {
      const { registry, ledger, journal, custody, engine, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 2)
      engine.deposit(ALICE, [1n, 2n])

      const rank = merger.mergePair(BOB, 1n, 2n)

      expect(rank).toBe(3)
      expect(custody.custodyState(1n)).toBe('in-custody')
      expect(custody.custodyState(2n)).toBe('consumed')
      expect(ledger.balanceOf(ALICE)).toBe(2n * RANK_2)
      expect(ledger.totalIssued()).toBe(RANK_3)
      expect(engine.quote(1n)).toBe(RANK_3)
      expect(journal.since(2)).toMatchObject([
        { kind: 'merge', operator: BOB, keepId: 1n, burnId: 2n, rank: 3, sequence: 3 }
      ])
    })

    it('lets the merged item be redeemed at its new value', () => {
      const { registry, ledger, engine, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 2)
      engine.deposit(ALICE, [1n, 2n])
      merger.mergePair(ALICE, 1n, 2n)

      expect(engine.redeem(ALICE, 1n).amount).toBe(RANK_3)
      expect(registry.getItem(1n)?.rank).toBe(3)
      expect(ledger.totalIssued()).toBe(0n)
    })

    it('rejects a keep id that is not lower than the burn id before asking the registry', () => {
      const { registry, engine, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 2)
      engine.deposit(ALICE, [1n, 2n])
      const spy = jest.spyOn(registry, 'mergePair')

      expect(() => merger.mergePair(ALICE, 2n, 1n)).toThrow(InvalidOrder)
      expect(() => merger.mergePair(ALICE, 1n, 1n)).toThrow(InvalidOrder)
      expect(() => merger.mergePair(ALICE, 9n, 8n)).toThrow(InvalidOrder)
      expect(spy).not.toHaveBeenCalled()
    })

    it('leaves rank rules to the registry', () => {
      const { registry, journal, engine, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 3)
      engine.deposit(ALICE, [1n, 2n])

      expect(() => merger.mergePair(ALICE, 1n, 2n)).toThrow('RegistryRejected: rank mismatch: 2 and 3')
      expect(journal.latestSequence()).toBe(2)
    })

    it('refuses items outside custody before asking the registry', () => {
      const { registry, engine, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 2)
      engine.deposit(ALICE, [1n])
      const spy = jest.spyOn(registry, 'mergePair')

      expect(() => merger.mergePair(ALICE, 1n, 2n)).toThrow('NotInCustody: item 2 is not held by the vault')
      expect(spy).not.toHaveBeenCalled()
      expect(registry.getItem(1n)?.rank).toBe(2)
      expect(registry.ownerOf(2n)).toBe(ALICE)
    })

    it('leaves items alone whose holder approved the vault for everything', () => {
      const { registry, journal, merger } = setup()
      registry.mint(ALICE, 1n, 2)
      registry.mint(ALICE, 2n, 2)
      registry.setApprovalForAll(ALICE, VAULT, true)

      expect(() => merger.mergePair(BOB, 1n, 2n)).toThrow(NotInCustody)
      expect(registry.getItem(1n)).toMatchObject({ rank: 2, exists: true })
      expect(registry.getItem(2n)).toMatchObject({ rank: 2, exists: true })
      expect(registry.ownerOf(2n)).toBe(ALICE)
      expect(journal.latestSequence()).toBe(0)
    })
  })

  describe('mergeAggregate', () => {
    function depositAggregateSet(): { ids: ItemId[], context: ReturnType<typeof setup> } {
      const context = setup()
      const ids: ItemId[] = []
      for (let i = 0; i < 64; i++) {
        const id = 100n + BigInt(i)
        context.registry.mint(ownerKey(i + 1), id, 6)
        context.engine.deposit(ownerKey(i + 1), [id])
        ids.push(id)
      }
      return { ids, context }
    }

    it('collapses 64 custodied rank-6 items into one rank-7 item', () => {
      const { ids, context } = depositAggregateSet()
      const { ledger, journal, custody, engine, merger } = context
      expect(ledger.totalIssued()).toBe(UNIT)

      const rank = merger.mergeAggregate(BOB, ids)

      expect(rank).toBe(7)
      expect(custody.custodyState(100n)).toBe('in-custody')
      expect(custody.custodyState(163n)).toBe('consumed')
      expect(engine.quote(100n)).toBe(UNIT)
      expect(ledger.totalIssued()).toBe(UNIT)
      expect(journal.since(64)).toMatchObject([
        { kind: 'aggregate', operator: BOB, survivorId: 100n, consumedIds: ids.slice(1), rank: 7, sequence: 65 }
      ])
    })

    it('leaves every depositor short of the aggregated item', () => {
      const { ids, context } = depositAggregateSet()
      context.merger.mergeAggregate(BOB, ids)

      expect(context.ledger.balanceOf(ownerKey(1))).toBe(RANK_6)
      expect(() => context.engine.redeem(ownerKey(1), 100n)).toThrow(InsufficientBalance)
    })

    it('requires exactly 64 items', () => {
      const { ids, context } = depositAggregateSet()
      expect(() => context.merger.mergeAggregate(BOB, ids.slice(1))).toThrow(
        'InvalidBatch: aggregation takes exactly 64 items, got 63'
      )
      expect(() => context.merger.mergeAggregate(BOB, [])).toThrow(InvalidBatch)
    })

    it('requires the survivor to be the smallest id', () => {
      const { ids, context } = depositAggregateSet()
      const spy = jest.spyOn(context.registry, 'mergeAggregate')
      const reordered = [ids[1], ids[0], ...ids.slice(2)]

      expect(() => context.merger.mergeAggregate(BOB, reordered)).toThrow(InvalidOrder)
      expect(spy).not.toHaveBeenCalled()
    })

    it('fails without changes when an item is not in custody', () => {
      const context = setup()
      const ids: ItemId[] = []
      for (let i = 0; i < 64; i++) {
        const id = 100n + BigInt(i)
        context.registry.mint(ALICE, id, 6)
        ids.push(id)
      }
      context.engine.deposit(ALICE, ids.slice(0, 63))

      const spy = jest.spyOn(context.registry, 'mergeAggregate')

      expect(() => context.merger.mergeAggregate(BOB, ids)).toThrow('NotInCustody: item 163 is not held by the vault')
      expect(spy).not.toHaveBeenCalled()
      expect(context.registry.getItem(100n)?.rank).toBe(6)
      expect(context.journal.latestSequence()).toBe(63)
    })
  })
})
