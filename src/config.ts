/**
 * Rope の設定
 *
 * JavaScript には size_of(T) が無いので、要素1個あたりのバイト数は
 * 呼び出し側が itemSize として渡す。ブロック容量はここから決まる。
 */

/** リーフブロックの容量（バイト） */
export const DEFAULT_LEAF_CAP_BYTES = 1024

/** 要素1個あたりの推定バイト数（参照1スロット分） */
export const DEFAULT_ITEM_SIZE = 8

/** この深さ未満なら再バランスしない */
export const DEFAULT_REBALANCE_MIN_DEPTH = 30

/** 深さが log2(ブロック数) のこの倍数を超えたら再バランス */
export const DEFAULT_REBALANCE_DEPTH_FACTOR = 3

/** ハンドル自身の固定サイズ（footprint 用の推定値） */
export const HANDLE_BYTES = 24

/** ノード1個の固定サイズ（footprint 用の推定値） */
export const NODE_BYTES = 32

/** Rope 生成時のオプション（すべて省略可） */
export interface RopeOptions {
  /** リーフブロックの容量（バイト） */
  leafCapBytes?: number
  /** 要素1個あたりのバイト数 */
  itemSize?: number
  /** insert 後に自動で再バランスするか */
  autoRebalance?: boolean
  /** 再バランスを検討する最小の深さ */
  rebalanceMinDepth?: number
  /** log2(ブロック数) に掛ける係数 */
  rebalanceDepthFactor?: number
}

/** 既定値を補完・検証済みの設定 */
export interface RopeConfig {
  readonly leafCapBytes: number
  readonly itemSize: number
  readonly autoRebalance: boolean
  readonly rebalanceMinDepth: number
  readonly rebalanceDepthFactor: number
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} は正の整数である必要があります: ${value}`)
  }
  return value
}

/** オプションに既定値を補って検証する */
export function resolveConfig(options: RopeOptions = {}): RopeConfig {
  const factor = options.rebalanceDepthFactor ?? DEFAULT_REBALANCE_DEPTH_FACTOR
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`rebalanceDepthFactor は正の有限数である必要があります: ${factor}`)
  }

  return Object.freeze({
    leafCapBytes: positiveInteger('leafCapBytes', options.leafCapBytes ?? DEFAULT_LEAF_CAP_BYTES),
    itemSize: positiveInteger('itemSize', options.itemSize ?? DEFAULT_ITEM_SIZE),
    autoRebalance: options.autoRebalance ?? true,
    rebalanceMinDepth: positiveInteger(
      'rebalanceMinDepth',
      options.rebalanceMinDepth ?? DEFAULT_REBALANCE_MIN_DEPTH,
    ),
    rebalanceDepthFactor: factor,
  })
}

/** ブロック容量 C = floor(leafCapBytes / itemSize) + 1 */
export function blockCapacity(config: RopeConfig): number {
  return Math.floor(config.leafCapBytes / config.itemSize) + 1
}
