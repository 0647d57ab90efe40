/**
 * Ink-based TUI for the chat client
 * Two-pane layout: conversation list on the left, message panel on the right.
 * Components only draw the RenderModel; every decision is made in the
 * projector and the dispatcher.
 */

import React, { useEffect, useState } from 'react'
import { isDeepStrictEqual } from 'util'
import { render, Box, Text, useInput, useStdout } from 'ink'
import type { Key } from 'ink'
import type { ActionDispatcher, FocusOwner, KeyEvent } from '../dispatcher'
import type { ConversationStore } from '../store'
import type { SearchIndex } from '../search'
import type { UpdateReconciler } from '../reconciler'
import type { TextMetrics } from '../text-metrics'
import { FrameScheduler } from '../frame-scheduler'
import {
  AVATAR_WIDTH,
  project,
  type ConversationRow,
  type Layout,
  type MessagePanel as PanelModel,
  type RenderHeader,
  type RenderModel,
} from '../projector'

// ==================== Layout ====================

const ROW_HEIGHT = 2
const MIN_LIST_WIDTH = 24
const MAX_LIST_WIDTH = 42
// Header, status bar and help bar
const CHROME_ROWS = 3

export function computeLayout(columns: number, rows: number): Layout {
  const listWidth = Math.max(MIN_LIST_WIDTH, Math.min(MAX_LIST_WIDTH, Math.floor(columns * 0.35)))
  return {
    listWidth,
    // Separator column plus one space either side
    panelWidth: Math.max(1, columns - listWidth - 3),
    // Panel title takes a line
    panelHeight: Math.max(1, rows - CHROME_ROWS - 1),
  }
}

// ==================== Key translation ====================

/**
 * Map Ink's key report to a dispatcher key. Returns null for keys the
 * dispatcher has no use for.
 */
export function toKeyEvent(input: string, key: Key): KeyEvent | null {
  if (key.ctrl && input === 'c') return { name: 'interrupt' }
  if (key.tab) return { name: 'tab' }
  if (key.return) return { name: 'enter' }
  if (key.escape) return { name: 'escape' }
  if (key.upArrow) return { name: 'up' }
  if (key.downArrow) return { name: 'down' }
  // Most terminals send DEL for Backspace, which Ink reports as delete
  if (key.backspace || key.delete) return { name: 'backspace' }
  if (key.ctrl || key.meta || !input) return null
  return { name: 'char', char: input }
}

// ==================== Components ====================

interface HeaderProps {
  header: RenderHeader
}

function Header({ header }: HeaderProps) {
  const searching = header.focus === 'search'
  return (
    <Box width="100%" height={1}>
      <Text bold color="cyan">
        {header.label} ({header.count})
      </Text>
      {header.otherFolderUnread > 0 && (
        <Text color="yellow">
          {'  '}
          {header.folder === 'main' ? 'Archive' : 'Chats'}: {header.otherFolderUnread} unread
        </Text>
      )}
      <Text color="gray">{'   '}</Text>
      <Text color={searching ? 'green' : 'gray'} inverse={searching}>
        🔍 {header.query || (searching ? '' : 'press / to search')}
        {searching ? '▏' : ''}
      </Text>
    </Box>
  )
}

interface ConversationListProps {
  rows: ConversationRow[]
  selectedIndex: number
  height: number
  width: number
  focused: boolean
  metrics: TextMetrics
}

function ConversationList({ rows, selectedIndex, height, width, focused, metrics }: ConversationListProps) {
  if (rows.length === 0) {
    return (
      <Box flexDirection="column" width={width}>
        <Text color="gray">No conversations</Text>
      </Box>
    )
  }

  const visibleCount = Math.max(1, Math.floor(height / ROW_HEIGHT))
  const startIndex = Math.max(
    0,
    Math.min(selectedIndex - Math.floor(visibleCount / 2), rows.length - visibleCount)
  )
  const visibleRows = rows.slice(startIndex, startIndex + visibleCount)

  return (
    <Box flexDirection="column" width={width}>
      {visibleRows.map((row) => {
        const badgeWidth = row.unreadBadge ? metrics.width(row.unreadBadge) + 1 : 0
        const titleWidth = Math.max(0, width - AVATAR_WIDTH - badgeWidth)
        const highlight = row.selected && focused
        return (
          <Box key={row.id} flexDirection="column">
            <Text inverse={highlight} color={row.selected ? 'green' : undefined}>
              {metrics.fit(` ${row.avatar}`, AVATAR_WIDTH)}
              <Text bold={row.unreadBadge !== ''}>{metrics.fit(row.title, titleWidth)}</Text>
              {row.unreadBadge && <Text color="yellow"> {row.unreadBadge}</Text>}
            </Text>
            <Text color="gray">
              {' '.repeat(AVATAR_WIDTH)}
              {row.preview}
            </Text>
          </Box>
        )
      })}
    </Box>
  )
}

interface MessagePanelProps {
  panel: PanelModel | null
  width: number
  focused: boolean
}

function MessagePanel({ panel, width, focused }: MessagePanelProps) {
  if (!panel) {
    return (
      <Box flexDirection="column" width={width}>
        <Text color="gray">Select a conversation and press Enter</Text>
      </Box>
    )
  }

  return (
    <Box flexDirection="column" width={width}>
      <Text bold color={focused ? 'cyan' : 'white'}>
        {panel.title}
        {panel.loading ? ' ⏳' : ''}
      </Text>
      {panel.lines.map((line) => {
        if (line.kind === 'notice') {
          return (
            <Text key={line.key} color="gray" dimColor>
              {line.text}
            </Text>
          )
        }
        if (line.kind === 'meta') {
          return (
            <Text key={line.key} color={line.own ? 'green' : 'blue'} bold>
              {line.text}
            </Text>
          )
        }
        return (
          <Text key={line.key} color={line.own ? 'greenBright' : undefined}>
            {line.text}
          </Text>
        )
      })}
      {panel.compose !== null && (
        <Text color="green">
          {panel.compose}
          {focused ? '▏' : ''}
        </Text>
      )}
    </Box>
  )
}

interface StatusBarProps {
  text: string
  width: number
}

function StatusBar({ text, width }: StatusBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text inverse color="blue">
        {text.padEnd(Math.max(0, width))}
      </Text>
    </Box>
  )
}

type HelpMode = FocusOwner | 'compose'

const HELP_BINDINGS: Record<HelpMode, Array<{ key: string; label: string }>> = {
  list: [
    { key: '↑↓', label: 'select' },
    { key: 'Enter', label: 'open' },
    { key: '/', label: 'search' },
    { key: '[ ]', label: 'folder' },
    { key: 'a', label: 'archive' },
    { key: 'R', label: 'refresh' },
    { key: 'q', label: 'quit' },
  ],
  panel: [
    { key: '↑↓', label: 'scroll' },
    { key: 'i', label: 'write' },
    { key: 'Esc', label: 'back' },
    { key: '/', label: 'search' },
    { key: 'q', label: 'quit' },
  ],
  compose: [
    { key: 'type', label: 'message' },
    { key: 'Enter', label: 'send' },
    { key: 'Esc', label: 'cancel' },
    { key: 'Q', label: 'quit' },
  ],
  search: [
    { key: 'type', label: 'filter' },
    { key: 'Enter', label: 'results' },
    { key: 'Esc', label: 'clear' },
    { key: 'Q', label: 'quit' },
  ],
}

interface HelpBarProps {
  mode: HelpMode
}

function HelpBar({ mode }: HelpBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text color="gray">{HELP_BINDINGS[mode].map((b) => `${b.key}=${b.label}`).join(' · ')}</Text>
    </Box>
  )
}

// ==================== Main App ====================

export interface AppProps {
  store: ConversationStore
  search: SearchIndex
  dispatcher: ActionDispatcher
  reconciler: UpdateReconciler
  metrics: TextMetrics
  frameMs: number
}

export function App({ store, search, dispatcher, reconciler, metrics, frameMs }: AppProps) {
  const { stdout } = useStdout()
  const [size, setSize] = useState({ columns: stdout.columns || 80, rows: stdout.rows || 24 })

  const compute = (): RenderModel => {
    const nav = dispatcher.getState()
    const model = project({
      store,
      searchResult: search.query(nav.query, nav.folder),
      nav,
      layout: computeLayout(size.columns, size.rows),
      status: reconciler.getStatus(),
      loading: reconciler.getLoading(),
      metrics,
    })
    dispatcher.syncPanel(model.panel?.maxScroll ?? 0)
    return model
  }

  const [model, setModel] = useState<RenderModel>(compute)

  useEffect(() => {
    const scheduler = new FrameScheduler(() => {
      const next = compute()
      setModel((previous) => (isDeepStrictEqual(previous, next) ? previous : next))
    }, frameMs)

    const unsubscribers = [
      store.subscribe(() => scheduler.request()),
      dispatcher.subscribe(() => scheduler.request()),
      reconciler.subscribeStatus(() => scheduler.request()),
    ]
    // Layout changed since the first render
    scheduler.flush()

    return () => {
      scheduler.cancel()
      for (const unsubscribe of unsubscribers) unsubscribe()
    }
    // compute closes over size; re-subscribing on resize keeps it current
  }, [store, search, dispatcher, reconciler, metrics, frameMs, size])

  // Update dimensions on resize
  useEffect(() => {
    const handleResize = () => {
      setSize({ columns: stdout.columns || 80, rows: stdout.rows || 24 })
    }
    stdout.on('resize', handleResize)
    return () => {
      stdout.off('resize', handleResize)
    }
  }, [stdout])

  useInput((input, key) => {
    const event = toKeyEvent(input, key)
    if (event) dispatcher.handleKey(event)
  })

  const layout = computeLayout(size.columns, size.rows)
  const bodyHeight = Math.max(1, size.rows - CHROME_ROWS)
  const focus = model.header.focus
  const composing = focus === 'panel' && model.panel !== null && model.panel.compose !== null

  return (
    <Box flexDirection="column" width={size.columns} height={size.rows}>
      <Header header={model.header} />
      <Box flexDirection="row" height={bodyHeight}>
        <ConversationList
          rows={model.rows}
          selectedIndex={model.selectedIndex}
          height={bodyHeight}
          width={layout.listWidth}
          focused={focus === 'list'}
          metrics={metrics}
        />
        <Box width={3} justifyContent="center">
          <Text color="gray">│</Text>
        </Box>
        <MessagePanel panel={model.panel} width={layout.panelWidth} focused={focus === 'panel'} />
      </Box>
      <StatusBar text={model.status} width={size.columns} />
      <HelpBar mode={composing ? 'compose' : focus} />
    </Box>
  )
}

// ==================== Render helper ====================

export function renderApp(props: AppProps) {
  return render(<App {...props} />, { exitOnCtrlC: false })
}
