/**
 * ブロックの二分木による永続 Rope
 *
 * リスト値の内部表現として使う。編集のたびに新しいハンドルを返し、
 * 変更していない部分木は元のハンドルと参照で共有する（深いコピーはしない）。
 * 連結・分割・範囲取得は持たない。
 */

import { blockCapacity, HANDLE_BYTES, resolveConfig } from './config.js'
import type { RopeConfig, RopeOptions } from './config.js'
import { IndexFailError } from './errors.js'
import { createBlock, emptyBlock, nodeFootprint, nodeStats } from './node.js'
import { buildBottomsUp, canRebalance, rebuild, targetDepth } from './rebalance.js'
import { deleteAt, getAt, insertAt, setAt } from './tree.js'
import type { BlockNode, RopeNode, RopeStats } from './types.js'

/** 0 以上の整数かつ limit 未満か */
function inRange(index: number, limit: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < limit
}

/**
 * 永続 Rope のハンドル
 *
 * - get(index): O(depth)
 * - insert / set / delete: 経路上のノードだけを作り直して新しいハンドルを返す
 * - rebalance(): 常に木を組み直す
 * - length: O(1)
 */
export class Rope<T> {
  private constructor(
    private readonly _config: RopeConfig,
    private readonly _root: RopeNode<T>,
    private readonly _length: number,
    private _autoRebalance: boolean,
  ) {}

  /** 空の列 */
  static empty<T>(options?: RopeOptions): Rope<T> {
    const config = resolveConfig(options)
    return new Rope<T>(config, emptyBlock<T>(), 0, config.autoRebalance)
  }

  /**
   * items を順に持つ列。
   * 満杯のブロックに詰めてから、再バランスと同じ手順で木を組む。
   */
  static from<T>(items: Iterable<T>, options?: RopeOptions): Rope<T> {
    const config = resolveConfig(options)
    const capacity = blockCapacity(config)
    const blocks: BlockNode<T>[] = []
    let chunk: T[] = []
    let length = 0
    for (const item of items) {
      chunk.push(item)
      length++
      if (chunk.length === capacity) {
        blocks.push(createBlock(chunk))
        chunk = []
      }
    }
    if (chunk.length > 0) blocks.push(createBlock(chunk))
    if (blocks.length === 0) return new Rope<T>(config, emptyBlock<T>(), 0, config.autoRebalance)

    blocks.reverse()
    const { node } = buildBottomsUp(targetDepth(length), blocks)
    return new Rope<T>(config, node, length, config.autoRebalance)
  }

  /** 要素数 */
  get length(): number {
    return this._length
  }

  /** insert 後に自動で再バランスするか */
  get autoRebalance(): boolean {
    return this._autoRebalance
  }

  /** 解決済みの設定（派生したハンドルで共有） */
  get config(): RopeConfig {
    return this._config
  }

  /**
   * 自動再バランスの有効・無効を切り替える。
   * このハンドルと、ここから派生するハンドルの insert に効く。
   */
  setAutoRebalance(flag: boolean): this {
    this._autoRebalance = flag
    return this
  }

  /** 推定メモリ使用量（バイト）。アロケータへの問い合わせではない */
  footprint(): number {
    return HANDLE_BYTES + nodeFootprint(this._root, this._config.itemSize)
  }

  /** 木の深さ・ブロック数・内部ノード数 */
  stats(): RopeStats {
    return nodeStats(this._root)
  }

  /** 位置 index の要素。index >= length なら IndexFailError */
  get(index: number): T {
    if (!inRange(index, this._length)) {
      throw new IndexFailError(index, this._length)
    }
    return getAt(this._root, index)
  }

  /**
   * 位置 offset に value を挿入した新しい列。offset は [0, length]（末尾への追加も可）。
   * 降下の最大深さを見て、必要なら木を組み直してから返す。
   */
  insert(offset: number, value: T): Rope<T> {
    if (!inRange(offset, this._length + 1)) {
      throw new IndexFailError(offset, this._length, 'offset')
    }
    const length = this._length + 1
    const { root, maxDepth } = insertAt(this._root, offset, value, blockCapacity(this._config))
    return this.derive(this.maybeRebalance(root, maxDepth, length), length)
  }

  /** 位置 offset の要素を value に置き換えた新しい列。offset は [0, length) */
  set(offset: number, value: T): Rope<T> {
    if (!inRange(offset, this._length)) {
      throw new IndexFailError(offset, this._length, 'offset')
    }
    return this.derive(setAt(this._root, offset, value), this._length)
  }

  /** 位置 offset の要素を取り除いた新しい列。offset は [0, length) */
  delete(offset: number): Rope<T> {
    if (!inRange(offset, this._length)) {
      throw new IndexFailError(offset, this._length, 'offset')
    }
    return this.derive(deleteAt(this._root, offset), this._length - 1)
  }

  /** 内容はそのままで、木を組み直した新しい列 */
  rebalance(): Rope<T> {
    return this.derive(rebuild(this._root, this._length), this._length)
  }

  private maybeRebalance(root: RopeNode<T>, maxDepth: number, length: number): RopeNode<T> {
    if (!this._autoRebalance) return root
    if (!canRebalance(maxDepth, length, blockCapacity(this._config), this._config)) return root
    return rebuild(root, length, maxDepth)
  }

  private derive(root: RopeNode<T>, length: number): Rope<T> {
    return new Rope<T>(this._config, root, length, this._autoRebalance)
  }

  /** @internal 木のルート（テスト用） */
  get _rootNode(): RopeNode<T> {
    return this._root
  }
}

