/**
 * 木の形のデモストーリー
 *
 * 挿入を続けると木が深くなり、rebalance() で浅く組み直されることを確認する。
 * 古いハンドルは編集後もそのまま残る（版の履歴として一覧に表示する）。
 */

import type { Meta, StoryObj } from '@storybook/html-vite'
import { Rope } from '../src/index.js'
import type { RopeStats } from '../src/index.js'

// --- スタイル定義 ---

const STYLES = `
  .demo-container {
    font-family: system-ui, -apple-system, sans-serif;
    max-width: 900px;
    margin: 24px auto;
    padding: 24px;
  }
  .controls {
    display: flex;
    gap: 12px;
    margin-bottom: 16px;
  }
  .controls button {
    padding: 8px 20px;
    font-size: 14px;
    background: #4a90d9;
    color: white;
    border: none;
    border-radius: 6px;
    cursor: pointer;
  }
  .controls button:hover { background: #357abd; }
  .stats {
    font-family: monospace;
    font-size: 14px;
    padding: 12px;
    background: #f0f6ff;
    border: 2px solid #4a90d9;
    border-radius: 8px;
    margin-bottom: 16px;
  }
  .history {
    border: 1px solid #ddd;
    border-radius: 8px;
    padding: 12px;
    background: #fafafa;
    font-family: monospace;
    font-size: 12px;
    max-height: 240px;
    overflow-y: auto;
  }
  .history-entry.rebalance { color: #2d7d2d; }
`

// --- ユーティリティ ---

/** 統計の1行表現 */
function formatStats(label: string, rope: Rope<number>, stats: RopeStats): string {
  return `${label}: length=${rope.length} depth=${stats.depth} blocks=${stats.blocks} branches=${stats.branches} footprint=${rope.footprint()}B`
}

/** 再現可能な疑似乱数生成器（xorshift32） */
function createRng(seed: number) {
  let state = seed
  return () => {
    state ^= state << 13
    state ^= state >> 17
    state ^= state << 5
    return (state >>> 0) / 0xffffffff
  }
}

// --- ストーリー定義 ---

interface DemoArgs {
  /** 挿入ボタン1回あたりの挿入数 */
  batch: number
  /** 挿入位置: 末尾に追加するか、ランダムな位置か */
  mode: 'append' | 'random'
  /** 要素1個あたりのバイト数（大きいほどブロックが小さくなる） */
  itemSize: number
}

const meta: Meta<DemoArgs> = {
  title: '木の形と再バランス',
  args: { batch: 100, mode: 'append', itemSize: 128 },
  argTypes: {
    mode: { control: 'radio', options: ['append', 'random'] },
  },
}

export default meta

type Story = StoryObj<DemoArgs>

/** デモUIを構築する */
function createDemoUI(args: DemoArgs): HTMLElement {
  const container = document.createElement('div')

  const style = document.createElement('style')
  style.textContent = STYLES
  container.appendChild(style)

  const wrapper = document.createElement('div')
  wrapper.className = 'demo-container'
  container.appendChild(wrapper)

  const controls = document.createElement('div')
  controls.className = 'controls'
  wrapper.appendChild(controls)

  const insertBtn = document.createElement('button')
  insertBtn.textContent = `${args.batch}件挿入`
  controls.appendChild(insertBtn)

  const rebalanceBtn = document.createElement('button')
  rebalanceBtn.textContent = 'rebalance()'
  controls.appendChild(rebalanceBtn)

  const stats = document.createElement('div')
  stats.className = 'stats'
  wrapper.appendChild(stats)

  const history = document.createElement('div')
  history.className = 'history'
  wrapper.appendChild(history)

  // 自動再バランスは切っておき、深くなる様子を見せる
  const rng = createRng(42)
  const versions: Rope<number>[] = [Rope.empty<number>({ itemSize: args.itemSize }).setAutoRebalance(false)]

  const current = (): Rope<number> => versions[versions.length - 1] ?? Rope.empty<number>()

  const render = (label: string, rebalanced: boolean) => {
    const rope = current()
    const line = formatStats(label, rope, rope.stats())
    stats.textContent = line
    const entry = document.createElement('div')
    entry.className = rebalanced ? 'history-entry rebalance' : 'history-entry'
    entry.textContent = `v${versions.length - 1} ${line}`
    history.prepend(entry)
  }

  insertBtn.addEventListener('click', () => {
    let rope = current()
    for (let i = 0; i < args.batch; i++) {
      const pos = args.mode === 'append' ? rope.length : Math.floor(rng() * (rope.length + 1))
      rope = rope.insert(pos, rope.length)
    }
    versions.push(rope)
    render('insert', false)
  })

  rebalanceBtn.addEventListener('click', () => {
    versions.push(current().rebalance())
    render('rebalance', true)
  })

  render('empty', false)
  return container
}

/** 末尾への追加: 右の背骨だけが伸びていく */
export const Append: Story = {
  render: (args) => createDemoUI(args),
}

/** ランダムな位置への挿入 */
export const RandomInsert: Story = {
  args: { mode: 'random' },
  render: (args) => createDemoUI(args),
}
