// 型定義
export type {
  BlockNode,
  BranchNode,
  RopeNode,
  RopeStats,
  InsertResult,
} from './types.js'

// 設定
export type { RopeOptions, RopeConfig } from './config.js'
export {
  DEFAULT_LEAF_CAP_BYTES,
  DEFAULT_ITEM_SIZE,
  DEFAULT_REBALANCE_MIN_DEPTH,
  DEFAULT_REBALANCE_DEPTH_FACTOR,
  HANDLE_BYTES,
  NODE_BYTES,
  resolveConfig,
  blockCapacity,
} from './config.js'

// エラー
export type { RopeErrorType } from './errors.js'
export {
  RopeError,
  IndexFailError,
  FatalError,
  isRopeError,
} from './errors.js'

// 木の読み書き
export {
  getAt,
  insertAt,
  setAt,
  deleteAt,
  splitInsert,
} from './tree.js'

// 再バランス
export {
  canRebalance,
  collectBlocks,
  targetDepth,
  buildBottomsUp,
  rebuild,
} from './rebalance.js'

// Rope
export { Rope } from './rope.js'
