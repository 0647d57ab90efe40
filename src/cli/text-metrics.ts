/**
 * Terminal text measurement.
 * Widths come from string-width, grapheme boundaries from Intl.Segmenter, so
 * emoji sequences and wide CJK characters are never cut in half.
 */

import stringWidth from 'string-width'
import { emojify } from 'node-emoji'
import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'

const log = createLogger('text')

export const ELLIPSIS = '…'

export interface TextMeasurer {
  width(text: string): number
  segment(text: string): string[]
}

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

export const defaultMeasurer: TextMeasurer = {
  width: (text) => stringWidth(text),
  segment: (text) => Array.from(graphemeSegmenter.segment(text), (part) => part.segment),
}

export interface TextMetrics {
  /** Display width in terminal columns */
  width(text: string): number
  /** Grapheme clusters of text */
  segment(text: string): string[]
  /** Cut text to maxWidth columns, appending … when something was cut */
  truncate(text: string, maxWidth: number): string
  /** Truncate, then pad with spaces to exactly width columns */
  fit(text: string, width: number): string
}

export function createTextMetrics(measurer: TextMeasurer = defaultMeasurer): TextMetrics {
  let failureReported = false

  const reportFailure = (error: unknown): void => {
    if (failureReported) return
    failureReported = true
    log.warn(`Text measurement unavailable, falling back to unmeasured text: ${errorMessage(error)}`)
  }

  const width = (text: string): number => {
    try {
      return measurer.width(text)
    } catch (error) {
      reportFailure(error)
      return Array.from(text).length
    }
  }

  const segment = (text: string): string[] => {
    try {
      return measurer.segment(text)
    } catch (error) {
      reportFailure(error)
      return Array.from(text)
    }
  }

  const truncate = (text: string, maxWidth: number): string => {
    const limit = Math.floor(maxWidth)
    if (limit <= 0) return ''
    try {
      if (measurer.width(text) <= limit) return text
      const ellipsisWidth = measurer.width(ELLIPSIS)
      if (limit < ellipsisWidth) return ''

      let prefix = ''
      let used = 0
      for (const grapheme of measurer.segment(text)) {
        const graphemeWidth = measurer.width(grapheme)
        if (used + graphemeWidth + ellipsisWidth > limit) break
        prefix += grapheme
        used += graphemeWidth
      }
      return prefix + ELLIPSIS
    } catch (error) {
      reportFailure(error)
      return text
    }
  }

  const fit = (text: string, targetWidth: number): string => {
    const cut = truncate(text, targetWidth)
    const padding = Math.floor(targetWidth) - width(cut)
    return padding > 0 ? cut + ' '.repeat(padding) : cut
  }

  return { width, segment, truncate, fit }
}

// ==================== Normalisation ====================

const CONTROL_CHARACTERS = /\p{Cc}/gu

/**
 * Prepare backend text for the terminal: emoji shortcodes become emoji,
 * tabs become spaces, other control characters except newlines are removed.
 */
export function normalizeText(text: string): string {
  return emojify(text)
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, ' ')
    .replace(CONTROL_CHARACTERS, (char) => (char === '\n' ? char : ''))
}
