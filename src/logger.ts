/**
 * デバッグログ
 *
 * DEBUG=rope-list:* で有効化する。既定では何も出力しない。
 */

import createDebug from 'debug'

export const debugRebalance = createDebug('rope-list:rebalance')
export const debugSplit = createDebug('rope-list:split')
export const debugError = createDebug('rope-list:error')
