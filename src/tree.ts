/**
 * 木の読み書き（コピーオンライト）
 *
 * 編集はルートから対象ブロックまでの経路上のノードだけを作り直し、
 * 経路から外れた兄弟サブツリーは参照のまま再利用する。
 * 降下は経路を配列に記録するループで行い、下から上へ組み直す。
 */

import { createBlock, createBranch } from './node.js'
import { debugSplit } from './logger.js'
import type { BlockNode, BranchNode, InsertResult, RopeNode } from './types.js'

/** 降下経路の1ステップ */
interface PathStep<T> {
  /** 通過した内部ノード */
  branch: BranchNode<T>
  /** 左に進んだか */
  wentLeft: boolean
}

/** 降下の結果: 経路・到達したブロック・ブロック内オフセット */
interface Descent<T> {
  path: PathStep<T>[]
  block: BlockNode<T>
  offset: number
}

/**
 * off を含む側へ降りる。
 * off < weight なら左、そうでなければ weight を引いて右。
 */
function descend<T>(root: RopeNode<T>, off: number): Descent<T> {
  const path: PathStep<T>[] = []
  let node = root
  let offset = off
  while (node.kind === 'branch') {
    if (offset < node.weight) {
      path.push({ branch: node, wentLeft: true })
      node = node.left
    } else {
      offset -= node.weight
      path.push({ branch: node, wentLeft: false })
      node = node.right
    }
  }
  return { path, block: node, offset }
}

/**
 * 経路を下から組み直す。
 * 左に進んだ内部ノードだけ weight に delta を足す（insert: +1, delete: -1, set: 0）。
 */
function rebuildPath<T>(path: readonly PathStep<T>[], replacement: RopeNode<T>, delta: number): RopeNode<T> {
  let node = replacement
  for (let i = path.length - 1; i >= 0; i--) {
    const { branch, wentLeft } = path[i]
    node = wentLeft
      ? createBranch(node, branch.right, branch.weight + delta)
      : createBranch(branch.left, node, branch.weight)
  }
  return node
}

/** 位置 off の要素を取得。割り当ては行わない */
export function getAt<T>(root: RopeNode<T>, off: number): T {
  let node = root
  let offset = off
  while (node.kind === 'branch') {
    if (offset < node.weight) {
      node = node.left
    } else {
      offset -= node.weight
      node = node.right
    }
  }
  return node.items[offset]
}

/**
 * 満杯のブロックを2つに分けて挿入する。
 * 左が ⌈n/2⌉、右が ⌊n/2⌋。要素数0か1なら全部を左に置く。
 */
export function splitInsert<T>(items: readonly T[], off: number, value: T): BranchNode<T> {
  const n = items.length
  const mid = n <= 1 ? n : Math.ceil(n / 2)
  const left = items.slice(0, mid)
  const right = items.slice(mid)

  if (off < left.length) {
    left.splice(off, 0, value)
  } else {
    right.splice(off - left.length, 0, value)
  }

  debugSplit('split %d -> %d + %d', n, left.length, right.length)
  return createBranch(createBlock(left), createBlock(right), left.length)
}

/**
 * 位置 off に value を挿入した新しいルートを返す。
 * capacity はブロックの最大要素数で、これに達したブロックだけを分割する。
 */
export function insertAt<T>(root: RopeNode<T>, off: number, value: T, capacity: number): InsertResult<T> {
  const { path, block, offset } = descend(root, off)

  let replacement: RopeNode<T>
  if (block.items.length < capacity) {
    const items = block.items.slice(0, offset)
    items.push(value)
    for (let i = offset; i < block.items.length; i++) items.push(block.items[i])
    replacement = createBlock(items)
  } else {
    replacement = splitInsert(block.items, offset, value)
  }

  return {
    root: rebuildPath(path, replacement, 1),
    maxDepth: path.length + 1,
  }
}

/** 位置 off の要素を置き換えた新しいルートを返す。weight は変わらない */
export function setAt<T>(root: RopeNode<T>, off: number, value: T): RopeNode<T> {
  const { path, block, offset } = descend(root, off)
  const items = block.items.slice()
  items[offset] = value
  return rebuildPath(path, createBlock(items), 0)
}

/** 位置 off の要素を取り除いた新しいルートを返す。空になったブロックはそのまま残す */
export function deleteAt<T>(root: RopeNode<T>, off: number): RopeNode<T> {
  const { path, block, offset } = descend(root, off)
  const items = block.items.slice(0, offset)
  for (let i = offset + 1; i < block.items.length; i++) items.push(block.items[i])
  return rebuildPath(path, createBlock(items), -1)
}
