import { InMemoryItemRegistry } from '../InMemoryItemRegistry.js'
import { ItemNotFound, NotAuthorized, RegistryRejected } from '../errors.js'
import type { Identity, ItemId, ItemReceiver, ItemRegistry } from '../types.js'

const ALICE = '02' + 'a'.repeat(64)
const BOB = '03' + 'b'.repeat(64)
const CAROL = '02' + 'c'.repeat(64)

function mintRun(registry: InMemoryItemRegistry, owner: Identity, first: bigint, count: number, rank: number): ItemId[] {
  const ids: ItemId[] = []
  for (let i = 0; i < count; i++) {
    const id = first + BigInt(i)
    registry.mint(owner, id, rank)
    ids.push(id)
  }
  return ids
}

describe('InMemoryItemRegistry', () => {
  let registry: InMemoryItemRegistry

  beforeEach(() => {
    registry = new InMemoryItemRegistry()
  })

  describe('mint', () => {
    it('creates a live item', () => {
      registry.mint(ALICE, 1n, 3, 99)
      expect(registry.getItem(1n)).toEqual({ id: 1n, rank: 3, seed: 99, exists: true })
      expect(registry.ownerOf(1n)).toBe(ALICE)
      expect(registry.balanceOf(ALICE)).toBe(1)
    })

    it('never reuses an id', () => {
      registry.mint(ALICE, 1n, 0)
      expect(() => registry.mint(BOB, 1n, 0)).toThrow(RegistryRejected)
    })

    it('rejects invalid ranks', () => {
      expect(() => registry.mint(ALICE, 1n, 8)).toThrow('RegistryRejected: invalid rank 8')
    })
  })

  describe('queries', () => {
    it('reports unknown items', () => {
      expect(registry.getItem(5n)).toBeUndefined()
      expect(() => registry.ownerOf(5n)).toThrow(ItemNotFound)
    })

    it('hands out copies', () => {
      registry.mint(ALICE, 1n, 0)
      const view = registry.getItem(1n)
      if (view === undefined) throw new Error('missing item')
      view.rank = 5
      expect(registry.getItem(1n)?.rank).toBe(0)
    })
  })

  describe('approvals', () => {
    it('lets the owner approve and clear a single item', () => {
      registry.mint(ALICE, 1n, 0)
      registry.approve(ALICE, BOB, 1n)
      expect(registry.getApproved(1n)).toBe(BOB)
      expect(registry.isAuthorized(ALICE, BOB, 1n)).toBe(true)

      registry.approve(ALICE, undefined, 1n)
      expect(registry.getApproved(1n)).toBeUndefined()
    })

    it('lets an operator approve on the owner\'s behalf', () => {
      registry.mint(ALICE, 1n, 0)
      registry.setApprovalForAll(ALICE, BOB, true)
      registry.approve(BOB, CAROL, 1n)
      expect(registry.getApproved(1n)).toBe(CAROL)
    })

    it('refuses approvals from strangers', () => {
      registry.mint(ALICE, 1n, 0)
      expect(() => registry.approve(BOB, BOB, 1n)).toThrow(NotAuthorized)
    })

    it('grants and revokes blanket approval', () => {
      registry.setApprovalForAll(ALICE, BOB, true)
      expect(registry.isApprovedForAll(ALICE, BOB)).toBe(true)
      registry.setApprovalForAll(ALICE, BOB, false)
      expect(registry.isApprovedForAll(ALICE, BOB)).toBe(false)
      expect(() => registry.setApprovalForAll(ALICE, ALICE, true)).toThrow(RegistryRejected)
    })
  })

  describe('transfer', () => {
    it('moves the item and clears its approval', () => {
      registry.mint(ALICE, 1n, 0)
      registry.approve(ALICE, CAROL, 1n)
      registry.transfer(ALICE, ALICE, BOB, 1n)
      expect(registry.ownerOf(1n)).toBe(BOB)
      expect(registry.getApproved(1n)).toBeUndefined()
    })

    it('accepts an approved operator', () => {
      registry.mint(ALICE, 1n, 0)
      registry.approve(ALICE, BOB, 1n)
      registry.transfer(BOB, ALICE, BOB, 1n)
      expect(registry.ownerOf(1n)).toBe(BOB)
    })

    it('rejects a wrong source and unauthorized operators', () => {
      registry.mint(ALICE, 1n, 0)
      expect(() => registry.transfer(BOB, BOB, CAROL, 1n)).toThrow(RegistryRejected)
      expect(() => registry.transfer(BOB, ALICE, BOB, 1n)).toThrow(NotAuthorized)
      expect(registry.ownerOf(1n)).toBe(ALICE)
    })
  })

  describe('safeTransfer', () => {
    it('notifies a registered receiver', () => {
      const received: Array<[ItemRegistry, Identity, Identity, ItemId]> = []
      const receiver: ItemReceiver = {
        onItemReceived: (sender, operator, from, itemId) => { received.push([sender, operator, from, itemId]) }
      }
      registry.registerReceiver(BOB, receiver)
      registry.mint(ALICE, 1n, 0)

      registry.safeTransfer(ALICE, ALICE, BOB, 1n)
      expect(received).toEqual([[registry, ALICE, ALICE, 1n]])
      expect(registry.ownerOf(1n)).toBe(BOB)
    })

    it('reverts when the receiver throws', () => {
      registry.registerReceiver(BOB, {
        onItemReceived: () => { throw new Error('not today') }
      })
      registry.mint(ALICE, 1n, 0)
      registry.approve(ALICE, CAROL, 1n)

      expect(() => registry.safeTransfer(CAROL, ALICE, BOB, 1n)).toThrow('not today')
      expect(registry.ownerOf(1n)).toBe(ALICE)
      expect(registry.getApproved(1n)).toBe(CAROL)
    })

    it('acts as a plain transfer without a receiver', () => {
      registry.mint(ALICE, 1n, 0)
      registry.safeTransfer(ALICE, ALICE, BOB, 1n, [1, 2, 3])
      expect(registry.ownerOf(1n)).toBe(BOB)
    })
  })

  describe('mergePair', () => {
    it('raises the survivor and consumes the other item', () => {
      registry.mint(ALICE, 1n, 2, 10)
      registry.mint(ALICE, 2n, 2, 20)
      registry.mergePair(ALICE, 1n, 2n, false)

      expect(registry.getItem(1n)).toEqual({ id: 1n, rank: 3, seed: 10, exists: true })
      expect(registry.getItem(2n)?.exists).toBe(false)
      expect(() => registry.ownerOf(2n)).toThrow(ItemNotFound)
      expect(registry.balanceOf(ALICE)).toBe(1)
    })

    it('takes over the burned seed when swapping', () => {
      registry.mint(ALICE, 1n, 0, 10)
      registry.mint(ALICE, 2n, 0, 20)
      registry.mergePair(ALICE, 1n, 2n, true)
      expect(registry.getItem(1n)?.seed).toBe(20)
    })

    it('rejects mismatched ranks', () => {
      registry.mint(ALICE, 1n, 1)
      registry.mint(ALICE, 2n, 2)
      expect(() => registry.mergePair(ALICE, 1n, 2n, false)).toThrow('RegistryRejected: rank mismatch: 1 and 2')
    })

    it('rejects aggregate-rank items', () => {
      registry.mint(ALICE, 1n, 6)
      registry.mint(ALICE, 2n, 6)
      expect(() => registry.mergePair(ALICE, 1n, 2n, false)).toThrow(RegistryRejected)
    })

    it('rejects merging an item with itself', () => {
      registry.mint(ALICE, 1n, 0)
      expect(() => registry.mergePair(ALICE, 1n, 1n, false)).toThrow(RegistryRejected)
    })

    it('requires holding both items', () => {
      registry.mint(ALICE, 1n, 0)
      registry.mint(BOB, 2n, 0)
      expect(() => registry.mergePair(ALICE, 1n, 2n, false)).toThrow(`RegistryRejected: ${ALICE} does not hold item 2`)
      expect(registry.getItem(1n)?.rank).toBe(0)
    })

    it('does not let approved operators merge', () => {
      registry.mint(ALICE, 1n, 0)
      registry.mint(ALICE, 2n, 0)
      registry.setApprovalForAll(ALICE, BOB, true)
      registry.approve(ALICE, BOB, 2n)

      expect(() => registry.mergePair(BOB, 1n, 2n, false)).toThrow(RegistryRejected)
      expect(registry.getItem(2n)?.exists).toBe(true)
    })
  })

  describe('mergeAggregate', () => {
    it('turns 64 rank-6 items into one rank-7 item', () => {
      const ids = mintRun(registry, ALICE, 100n, 64, 6)
      registry.mergeAggregate(ALICE, ids)

      expect(registry.getItem(100n)?.rank).toBe(7)
      expect(registry.getItem(163n)?.exists).toBe(false)
      expect(registry.balanceOf(ALICE)).toBe(1)
    })

    it('requires exactly 64 items', () => {
      const ids = mintRun(registry, ALICE, 100n, 63, 6)
      expect(() => registry.mergeAggregate(ALICE, ids)).toThrow('RegistryRejected: expected 64 items, got 63')
    })

    it('does not let an approved operator aggregate', () => {
      const ids = mintRun(registry, ALICE, 100n, 64, 6)
      registry.setApprovalForAll(ALICE, BOB, true)
      expect(() => registry.mergeAggregate(BOB, ids)).toThrow(`RegistryRejected: ${BOB} does not hold item 100`)
      expect(registry.balanceOf(ALICE)).toBe(64)
    })

    it('rejects duplicates', () => {
      const ids = mintRun(registry, ALICE, 100n, 63, 6)
      expect(() => registry.mergeAggregate(ALICE, [...ids, 100n])).toThrow('RegistryRejected: duplicate items')
    })

    it('rejects items of another rank without changing anything', () => {
      const ids = mintRun(registry, ALICE, 100n, 63, 6)
      registry.mint(ALICE, 500n, 5)
      expect(() => registry.mergeAggregate(ALICE, [...ids, 500n])).toThrow(RegistryRejected)
      expect(registry.getItem(100n)?.rank).toBe(6)
      expect(registry.balanceOf(ALICE)).toBe(64)
    })
  })
})
