// ===== ノード =====

/** リーフ: 連続した要素の並び */
export interface BlockNode<T> {
  readonly kind: 'block'
  /** 保持する要素（構築後は変更しない） */
  readonly items: readonly T[]
}

/** 内部ノード */
export interface BranchNode<T> {
  readonly kind: 'branch'
  /** 左サブツリーの要素数 */
  readonly weight: number
  /** 左の子 */
  readonly left: RopeNode<T>
  /** 右の子 */
  readonly right: RopeNode<T>
}

/**
 * Rope の木のノード。
 * 一度作ったら変更せず、複数のハンドル・複数の版から参照で共有する。
 */
export type RopeNode<T> = BlockNode<T> | BranchNode<T>

// ===== 木の統計 =====

/** 木の形の統計（テスト・ベンチマーク・デモ用） */
export interface RopeStats {
  /** ルートから最も深いリーフまでのノード数（ルート単体なら1） */
  depth: number
  /** リーフブロック数（空ブロックを含む） */
  blocks: number
  /** 内部ノード数 */
  branches: number
}

// ===== 編集結果 =====

/** insert の結果: 新しいルートと降下で到達した最大の深さ */
export interface InsertResult<T> {
  root: RopeNode<T>
  maxDepth: number
}
