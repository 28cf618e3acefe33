/**
 * 再バランス
 *
 * 厳密なバランスは保証しない。insert の降下が深くなりすぎたときだけ、
 * リーフブロックを左から順に集めてほぼ完全二分木に組み直す。
 */

import { count, createBranch, emptyBlock } from './node.js'
import { FatalError } from './errors.js'
import { debugError, debugRebalance } from './logger.js'
import type { RopeConfig } from './config.js'
import type { BlockNode, RopeNode } from './types.js'

/**
 * insert 後に再バランスを試みるか判定する。
 *
 * maxDepth が rebalanceMinDepth 未満なら常に false（小さな列で再構築を繰り返さない）。
 * それ以外は maxDepth > log2(length / capacity) × rebalanceDepthFactor のとき true。
 */
export function canRebalance(
  maxDepth: number,
  length: number,
  capacity: number,
  config: RopeConfig,
): boolean {
  if (maxDepth < config.rebalanceMinDepth) return false
  const blocks = Math.floor(length / capacity)
  return maxDepth > Math.log2(blocks) * config.rebalanceDepthFactor
}

/**
 * リーフブロックを左から順に集める。
 * 右の子をスタックに積んで左へ降り、ブロックに着いたら出力してスタックから取り出す。
 */
export function collectBlocks<T>(root: RopeNode<T>): BlockNode<T>[] {
  const acc: BlockNode<T>[] = []
  const stack: RopeNode<T>[] = []
  let node: RopeNode<T> | undefined = root
  while (node) {
    if (node.kind === 'branch') {
      stack.push(node.right)
      node = node.left
    } else {
      acc.push(node)
      node = stack.pop()
    }
  }
  return acc
}

/** 再構築する木の深さ d = ceil(log2(length)) + 1（最小1） */
export function targetDepth(length: number): number {
  if (length <= 1) return 1
  return Math.ceil(Math.log2(length)) + 1
}

/**
 * 下から順に組み上げる。blocks は逆順に並べておき、末尾から pop して使う。
 *
 * 深さ1では1つか2つのブロックを内部ノードにまとめる（1つだけなら空ブロックと組む）。
 * 深さ2以上では左半分、右半分の順に depth - 1 で組んでまとめる。
 * 返り値は組んだノードとその要素数。
 */
export function buildBottomsUp<T>(depth: number, blocks: BlockNode<T>[]): { node: RopeNode<T>; count: number } {
  if (depth <= 1) {
    const left = blocks.pop()
    if (left === undefined) return { node: emptyBlock<T>(), count: 0 }
    const right = blocks.pop() ?? emptyBlock<T>()
    const weight = left.items.length
    return { node: createBranch(left, right, weight), count: weight + right.items.length }
  }

  if (blocks.length === 0) return { node: emptyBlock<T>(), count: 0 }

  const left = buildBottomsUp(depth - 1, blocks)
  const right = buildBottomsUp(depth - 1, blocks)
  return {
    node: createBranch(left.node, right.node, left.count),
    count: left.count + right.count,
  }
}

/**
 * 木を組み直す。
 * 深さ d の枠には 2^d 個までしかブロックが入らないので、溢れるときだけ空ブロックを捨てる。
 * 組み直した木の要素数が length と一致しなければ FatalError。
 */
export function rebuild<T>(root: RopeNode<T>, length: number, maxDepth?: number): RopeNode<T> {
  const depth = targetDepth(length)
  let blocks = collectBlocks(root)
  if (blocks.length > 2 ** depth) {
    blocks = blocks.filter(block => block.items.length > 0)
  }
  blocks.reverse()

  debugRebalance(
    'rebalanced %d leaf nodes, max_depth:%s, target depth:%d',
    blocks.length,
    maxDepth ?? 'forced',
    depth,
  )

  const built = buildBottomsUp(depth, blocks)
  const actual = count(built.node)
  if (actual !== length) {
    const err = new FatalError(length, actual)
    debugError('%s', err.message)
    throw err
  }
  return built.node
}
