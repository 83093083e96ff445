import { clampRectInto, type Point, type Rect, type Size } from "@deskpet/shared"

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export interface BubbleMetrics {
  readonly padX: number
  readonly padY: number
  readonly tailWidth: number
  readonly tailHeight: number
  readonly minWidth: number
  readonly maxWidth: number
  /** Space between the tail tip and the anchor */
  readonly gapY: number
  readonly dynamicSpacing: number
  readonly buttonSpacing: number
}

export const BUBBLE_METRICS: BubbleMetrics = {
  padX: 12,
  padY: 10,
  tailWidth: 16,
  tailHeight: 10,
  minWidth: 160,
  maxWidth: 360,
  gapY: 18,
  dynamicSpacing: 4,
  buttonSpacing: 6,
}

export const CLOSE_BUTTON_LABEL = "✕"

// ---------------------------------------------------------------------------
// Text measuring
// ---------------------------------------------------------------------------

export type TextRole = "title" | "message" | "dynamic" | "button"

/**
 * Lays text out word-wrapped at `maxWidth` and reports the natural size.
 * Supplied by whatever renders the overlay.
 */
export interface TextMeasurer {
  measure(text: string, role: TextRole, maxWidth: number): Size
}

const ROLE_METRICS: Record<TextRole, { readonly charWidth: number; readonly lineHeight: number }> = {
  title: { charWidth: 7, lineHeight: 17 },
  message: { charWidth: 7, lineHeight: 17 },
  dynamic: { charWidth: 6, lineHeight: 15 },
  button: { charWidth: 7, lineHeight: 24 },
}

/**
 * Fixed-advance measurer for headless runs and tests.
 */
export class MonospaceTextMeasurer implements TextMeasurer {
  measure(text: string, role: TextRole, maxWidth: number): Size {
    const trimmed = text.trim()
    if (trimmed === "") return { width: 0, height: 0 }

    const { charWidth, lineHeight } = ROLE_METRICS[role]
    const lines = wrapWords(trimmed, Math.max(1, Math.floor(maxWidth / charWidth)))
    const longest = Math.max(...lines.map((line) => line.length))
    return { width: longest * charWidth, height: lines.length * lineHeight }
  }
}

/**
 * Greedy word wrap at `maxChars`; words longer than a line are split.
 */
export function wrapWords(text: string, maxChars: number): string[] {
  const lines: string[] = []
  let line = ""

  for (const word of text.split(/\s+/)) {
    let rest = word
    while (rest.length > maxChars) {
      if (line !== "") {
        lines.push(line)
        line = ""
      }
      lines.push(rest.slice(0, maxChars))
      rest = rest.slice(maxChars)
    }
    if (rest === "") continue

    if (line === "") {
      line = rest
    } else if (line.length + 1 + rest.length <= maxChars) {
      line = `${line} ${rest}`
    } else {
      lines.push(line)
      line = rest
    }
  }
  if (line !== "") lines.push(line)
  return lines
}

// ---------------------------------------------------------------------------
// Sizing and placement
// ---------------------------------------------------------------------------

export interface BubbleContent {
  readonly title: string
  readonly message: string
  /** Periodically refreshed line (countdown); null when absent */
  readonly dynamicLine: string | null
  /** Button labels including the trailing close button; empty for none */
  readonly buttons: readonly string[]
}

export interface BubbleLayout {
  readonly size: Size
  readonly contentWidth: number
}

/**
 * Size the bubble around its content: width from the widest of title,
 * message and dynamic line (never under the minimum nor over the maximum),
 * then heights re-measured at that width.
 */
export function measureBubble(
  content: BubbleContent,
  measurer: TextMeasurer,
  metrics: BubbleMetrics = BUBBLE_METRICS
): BubbleLayout {
  const maxContentWidth = metrics.maxWidth - metrics.padX * 2
  const minContentWidth = metrics.minWidth - metrics.padX * 2

  let width = Math.max(
    measurer.measure(content.title, "title", maxContentWidth).width,
    measurer.measure(content.message, "message", maxContentWidth).width,
    minContentWidth
  )
  if (content.dynamicLine !== null) {
    width = Math.max(width, measurer.measure(content.dynamicLine, "dynamic", maxContentWidth).width)
  }
  width = Math.min(width, maxContentWidth)

  let contentHeight =
    measurer.measure(content.title, "title", width).height +
    measurer.measure(content.message, "message", width).height

  if (content.dynamicLine !== null) {
    contentHeight +=
      metrics.dynamicSpacing + measurer.measure(content.dynamicLine, "dynamic", width).height
  }

  if (content.buttons.length > 0) {
    const rowHeight = Math.max(
      ...content.buttons.map((label) => measurer.measure(label, "button", maxContentWidth).height)
    )
    contentHeight += metrics.buttonSpacing + rowHeight
  }

  return {
    contentWidth: width,
    size: {
      width: width + metrics.padX * 2,
      height: contentHeight + metrics.padY * 2 + metrics.tailHeight,
    },
  }
}

/**
 * Center the bubble over the anchor with its bottom `gapY` above it, then
 * clamp into the given monitor area on each axis.
 */
export function placeBubble(size: Size, anchor: Point, area: Rect, gapY: number): Rect {
  const preferred: Rect = {
    x: anchor.x - Math.floor(size.width / 2),
    y: anchor.y - size.height - gapY,
    width: size.width,
    height: size.height,
  }
  return clampRectInto(preferred, area)
}
