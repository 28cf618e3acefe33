import { describe, it, expect } from 'vitest'
import { IndexFailError, Rope } from '../src/index.js'
import type { RopeOptions } from '../src/index.js'

// 再現可能な疑似乱数生成器（xorshift32）
function createRng(seed: number) {
  let state = seed
  return () => {
    state ^= state << 13
    state ^= state >> 17
    state ^= state << 5
    return (state >>> 0) / 0xffffffff
  }
}

/** get で全要素を取り出す */
function contents<T>(rope: Rope<T>): T[] {
  const out: T[] = []
  for (let i = 0; i < rope.length; i++) out.push(rope.get(i))
  return out
}

describe('統合テスト: 配列モデルとの比較', () => {
  const configs: Array<[label: string, options: RopeOptions]> = [
    ['既定（容量129）', {}],
    ['容量9', { itemSize: 128 }],
    ['容量3', { itemSize: 512 }],
    ['容量1', { itemSize: 2048 }],
    ['容量9・自動再バランス頻発', { itemSize: 128, rebalanceMinDepth: 4, rebalanceDepthFactor: 1 }],
  ]

  for (const [label, options] of configs) {
    it(`insert / set / delete を混ぜた3000操作 (${label})`, () => {
      const rng = createRng(99)
      let rope = Rope.empty<number>(options)
      const arr: number[] = []

      for (let i = 0; i < 3000; i++) {
        const r = rng()
        if (arr.length > 0 && r < 0.25) {
          const pos = Math.floor(rng() * arr.length)
          rope = rope.delete(pos)
          arr.splice(pos, 1)
        } else if (arr.length > 0 && r < 0.4) {
          const pos = Math.floor(rng() * arr.length)
          rope = rope.set(pos, -i)
          arr[pos] = -i
        } else {
          const pos = Math.floor(rng() * (arr.length + 1))
          rope = rope.insert(pos, i)
          arr.splice(pos, 0, i)
        }
        expect(rope.length).toBe(arr.length)
      }

      expect(contents(rope)).toEqual(arr)
      expect(contents(rope.rebalance())).toEqual(arr)
    })
  }

  it('途中の版は後の編集の影響を受けない', () => {
    const rng = createRng(5)
    let rope = Rope.empty<number>({ itemSize: 128 })
    let arr: number[] = []
    const versions: Array<[rope: Rope<number>, expected: number[]]> = []

    for (let i = 0; i < 1500; i++) {
      if (arr.length > 0 && rng() < 0.3) {
        const pos = Math.floor(rng() * arr.length)
        rope = rope.delete(pos)
        arr = [...arr.slice(0, pos), ...arr.slice(pos + 1)]
      } else {
        const pos = Math.floor(rng() * (arr.length + 1))
        rope = rope.insert(pos, i)
        arr = [...arr.slice(0, pos), i, ...arr.slice(pos)]
      }
      if (i % 100 === 0) versions.push([rope, arr])
    }

    for (const [version, expected] of versions) {
      expect(version.length).toBe(expected.length)
      expect(contents(version)).toEqual(expected)
    }
  })

  it('insert は前を保ち後ろを1つずらす', () => {
    const base = Rope.from(Array.from({ length: 50 }, (_, i) => i), { itemSize: 128 })
    for (let off = 0; off <= base.length; off++) {
      const next = base.insert(off, 999)
      expect(next.length).toBe(51)
      expect(next.get(off)).toBe(999)
      for (let i = 0; i < off; i++) expect(next.get(i)).toBe(base.get(i))
      for (let i = off; i < base.length; i++) expect(next.get(i + 1)).toBe(base.get(i))
      expect(base.length).toBe(50)
    }
  })

  it('delete は insert の逆にずらす', () => {
    const base = Rope.from(Array.from({ length: 50 }, (_, i) => i), { itemSize: 128 })
    for (let off = 0; off < base.length; off++) {
      const next = base.delete(off)
      expect(next.length).toBe(49)
      for (let i = 0; i < off; i++) expect(next.get(i)).toBe(base.get(i))
      for (let i = off; i < next.length; i++) expect(next.get(i)).toBe(base.get(i + 1))
    }
  })

  it('set は指定位置だけを変える', () => {
    const base = Rope.from(Array.from({ length: 50 }, (_, i) => i), { itemSize: 128 })
    for (let off = 0; off < base.length; off++) {
      const next = base.set(off, -1)
      expect(next.length).toBe(50)
      for (let i = 0; i < base.length; i++) {
        expect(next.get(i)).toBe(i === off ? -1 : i)
      }
    }
  })
})

describe('統合テスト: 10,000件のランダム挿入', () => {
  it('内容が配列モデルと一致し、rebalance() で深さが増えない', () => {
    const rng = createRng(42)
    // itemSize 128 → ブロック容量9（早い段階から分割が起きる）
    let rope = Rope.empty<number>({ itemSize: 128 })
    const arr: number[] = []

    for (let i = 0; i < 10_000; i++) {
      const pos = Math.floor(rng() * (arr.length + 1))
      rope = rope.insert(pos, i)
      arr.splice(pos, 0, i)
    }

    expect(rope.length).toBe(10_000)
    expect(contents(rope)).toEqual(arr)

    const before = rope.stats()
    expect(before.depth).toBe(17)

    const balanced = rope.rebalance()
    const after = balanced.stats()
    expect(balanced.length).toBe(10_000)
    expect(contents(balanced)).toEqual(arr)
    expect(after.depth).toBe(16)
    expect(after.depth).toBeLessThanOrEqual(before.depth)
    expect(after.depth).toBeLessThanOrEqual(3 * Math.log2(10_000 / 9))
  })

  it('範囲外の操作は途中でも IndexFail', () => {
    let rope = Rope.empty<number>({ itemSize: 128 })
    for (let i = 0; i < 100; i++) rope = rope.insert(rope.length, i)
    expect(() => rope.insert(101, 0)).toThrow(IndexFailError)
    expect(() => rope.get(100)).toThrow(IndexFailError)
    expect(rope.insert(100, 100).get(100)).toBe(100)
  })
})
