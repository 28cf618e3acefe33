/** エラー種別。呼び出し側は errorType で振り分ける */
export type RopeErrorType = 'IndexFail' | 'Fatal'

/** Rope が投げるエラーの基底クラス */
export abstract class RopeError extends Error {
  abstract readonly errorType: RopeErrorType

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * インデックス／オフセットが操作の有効範囲外。
 * 入力側の誤りなので呼び出し側で回復できる。
 */
export class IndexFailError extends RopeError {
  readonly errorType = 'IndexFail'

  constructor(
    readonly index: number,
    readonly length: number,
    label = 'index',
  ) {
    super(`${label} ${index} が範囲外です (length=${length})`)
  }
}

/**
 * 再構築後の整合性チェックに失敗した。
 * 実装の欠陥を示すので、握りつぶさずにそのまま伝播させる。
 */
export class FatalError extends RopeError {
  readonly errorType = 'Fatal'

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`再バランス後の長さが一致しません: ${actual} != ${expected}`)
  }
}

export function isRopeError(err: unknown): err is RopeError {
  return err instanceof RopeError
}
