/**
 * ノードの生成と計測
 *
 * ノードは凍結したプレーンオブジェクト。木の走査はすべて明示的なスタックで行い、
 * 偏った木でも再帰の深さに依存しない。
 */

import { NODE_BYTES } from './config.js'
import type { BlockNode, BranchNode, RopeNode, RopeStats } from './types.js'

/** リーフブロックを作成（items は呼び出し側から受け取った新しい配列） */
export function createBlock<T>(items: T[]): BlockNode<T> {
  const block: BlockNode<T> = { kind: 'block', items: Object.freeze(items) }
  return Object.freeze(block)
}

/** 空のリーフブロック */
export function emptyBlock<T>(): BlockNode<T> {
  return createBlock<T>([])
}

/** 内部ノードを作成。weight は左サブツリーの要素数 */
export function createBranch<T>(
  left: RopeNode<T>,
  right: RopeNode<T>,
  weight: number,
): BranchNode<T> {
  const branch: BranchNode<T> = { kind: 'branch', weight, left, right }
  return Object.freeze(branch)
}

/** サブツリーの要素数。右の背骨だけを辿る */
export function count<T>(node: RopeNode<T>): number {
  let n = 0
  let current = node
  while (current.kind === 'branch') {
    n += current.weight
    current = current.right
  }
  return n + current.items.length
}

/**
 * 推定バイト数
 * ブロック: ノード固定分 + 要素数 × itemSize、内部ノード: ノード固定分 + 子の合計
 */
export function nodeFootprint<T>(root: RopeNode<T>, itemSize: number): number {
  let bytes = 0
  const stack: RopeNode<T>[] = [root]
  let node: RopeNode<T> | undefined
  while ((node = stack.pop())) {
    bytes += NODE_BYTES
    if (node.kind === 'block') {
      bytes += node.items.length * itemSize
    } else {
      stack.push(node.right, node.left)
    }
  }
  return bytes
}

/** 深さ・ブロック数・内部ノード数を数える */
export function nodeStats<T>(root: RopeNode<T>): RopeStats {
  const stats: RopeStats = { depth: 0, blocks: 0, branches: 0 }
  const stack: Array<readonly [node: RopeNode<T>, depth: number]> = [[root, 1]]
  let entry: readonly [RopeNode<T>, number] | undefined
  while ((entry = stack.pop())) {
    const [node, depth] = entry
    if (depth > stats.depth) stats.depth = depth
    if (node.kind === 'block') {
      stats.blocks++
    } else {
      stats.branches++
      stack.push([node.right, depth + 1], [node.left, depth + 1])
    }
  }
  return stats
}
