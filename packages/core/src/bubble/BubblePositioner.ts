import { Hash } from "effect"
import type { Point, Rect } from "@deskpet/shared"
import type { PetEventBus } from "../events/PetEventBus"
import { createLogger } from "../logging/logger"
import type { TimerQueue } from "../scheduler/TimerQueue"
import { describeError } from "../util/error-utils"
import type { ScreenGeometry } from "../window/ScreenGeometry"
import {
  BUBBLE_METRICS,
  CLOSE_BUTTON_LABEL,
  measureBubble,
  placeBubble,
  type BubbleContent,
  type BubbleMetrics,
  type TextMeasurer,
} from "./layout"

const log = createLogger("Bubble")

export const BUBBLE_HIDE_KEY = "bubble:auto-hide"
export const BUBBLE_REFRESH_KEY = "bubble:refresh"
export const MIN_REFRESH_INTERVAL_MS = 250
export const DEFAULT_REFRESH_INTERVAL_MS = 1000

// ============================================================================
// Types
// ============================================================================

export interface BubbleButton {
  readonly label: string
  readonly action: () => void
}

export interface BubbleRequest {
  readonly title: string
  readonly message: string
  readonly anchor: Point
  /** 0 keeps the bubble until it is closed */
  readonly durationMs: number
  readonly buttons?: readonly BubbleButton[]
  /** Polled for the dynamic line, e.g. a countdown */
  readonly dynamicSource?: () => string
  readonly refreshIntervalMs?: number
}

/**
 * Everything the overlay needs to draw one bubble.
 */
export interface BubbleFrame extends BubbleContent {
  readonly rect: Rect
}

export interface BubbleSurface {
  render(frame: BubbleFrame): void
  hide(): void
}

export interface BubbleModel {
  readonly anchor: Point
  readonly visible: boolean
  readonly contentHash: number
  readonly hasDynamicSource: boolean
}

export interface BubblePositionerDeps {
  readonly screens: ScreenGeometry
  readonly surface: BubbleSurface
  readonly measurer: TextMeasurer
  readonly queue: TimerQueue
  readonly events: PetEventBus
  readonly metrics?: BubbleMetrics
}

interface ShownBubble {
  readonly title: string
  readonly message: string
  readonly buttons: readonly BubbleButton[]
  readonly dynamicSource: (() => string) | null
  dynamicLine: string | null
}

// ============================================================================
// BubblePositioner
// ============================================================================

/**
 * The single speech-bubble overlay: sizes it around its content, keeps it
 * above the pet's head and on screen, and owns its two timers.
 */
export class BubblePositioner {
  private readonly metrics: BubbleMetrics
  private gapY: number
  private anchor: Point = { x: 0, y: 0 }
  private visible = false
  private current: ShownBubble | null = null
  private lastFrame: BubbleFrame | null = null

  constructor(private readonly deps: BubblePositionerDeps) {
    this.metrics = deps.metrics ?? BUBBLE_METRICS
    this.gapY = this.metrics.gapY
  }

  get isVisible(): boolean {
    return this.visible
  }

  get model(): BubbleModel {
    return {
      anchor: { ...this.anchor },
      visible: this.visible,
      contentHash: this.current ? Hash.string(contentKey(this.current)) : 0,
      hasDynamicSource: this.current?.dynamicSource != null,
    }
  }

  /** Last frame handed to the surface, null once hidden. */
  get frame(): BubbleFrame | null {
    return this.visible ? this.lastFrame : null
  }

  show(request: BubbleRequest): void {
    const { queue, events } = this.deps
    this.anchor = { ...request.anchor }

    const dynamicSource = request.dynamicSource ?? null
    this.current = {
      title: request.title,
      message: request.message,
      buttons: request.buttons ?? [],
      dynamicSource,
      dynamicLine: null,
    }

    if (dynamicSource !== null) {
      this.pollDynamic()
      const interval = Math.max(
        MIN_REFRESH_INTERVAL_MS,
        request.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS
      )
      queue.every(BUBBLE_REFRESH_KEY, interval, () => this.refresh())
    } else {
      queue.cancel(BUBBLE_REFRESH_KEY)
    }

    this.visible = true
    this.render()

    if (request.durationMs > 0) {
      queue.schedule(BUBBLE_HIDE_KEY, request.durationMs, () => this.close())
    } else {
      queue.cancel(BUBBLE_HIDE_KEY)
    }

    events.emit("bubble:shown", {
      title: request.title,
      message: request.message,
      durationMs: request.durationMs,
    })
  }

  /** Track a new anchor without touching either timer. */
  updateAnchor(point: Point): void {
    this.anchor = { ...point }
    if (this.visible) this.render()
  }

  setGap(gapY: number): void {
    this.gapY = gapY
    if (this.visible) this.render()
  }

  /** Close button, auto-hide, or an explicit close. */
  close(): void {
    const wasVisible = this.visible
    this.dismiss()
    if (wasVisible) this.deps.events.emit("bubble:closed", {})
  }

  /** Hide without a closed notification (Hide all). */
  hide(): void {
    this.dismiss()
  }

  /**
   * Invoke a button by its label. Returns false when no visible button
   * carries it.
   */
  pressButton(label: string): boolean {
    if (!this.visible || this.current === null) return false
    if (this.current.buttons.length > 0 && label === CLOSE_BUTTON_LABEL) {
      this.close()
      return true
    }
    const button = this.current.buttons.find((candidate) => candidate.label === label)
    if (!button) return false
    button.action()
    return true
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private dismiss(): void {
    const { queue, surface } = this.deps
    queue.cancel(BUBBLE_HIDE_KEY)
    queue.cancel(BUBBLE_REFRESH_KEY)
    if (this.visible) surface.hide()
    this.visible = false
  }

  private refresh(): void {
    if (!this.visible || this.current?.dynamicSource == null) {
      this.deps.queue.cancel(BUBBLE_REFRESH_KEY)
      return
    }
    if (this.pollDynamic()) this.render()
  }

  /** Returns false when the source threw; the previous line stays. */
  private pollDynamic(): boolean {
    const bubble = this.current
    if (bubble?.dynamicSource == null) return false
    try {
      bubble.dynamicLine = bubble.dynamicSource()
      return true
    } catch (error) {
      log.debug(`Dynamic line refresh failed: ${describeError(error)}`)
      return false
    }
  }

  private render(): void {
    const bubble = this.current
    if (bubble === null) return

    const content: BubbleContent = {
      title: bubble.title,
      message: bubble.message,
      dynamicLine: bubble.dynamicSource !== null ? (bubble.dynamicLine ?? "") : null,
      buttons:
        bubble.buttons.length > 0
          ? [...bubble.buttons.map((button) => button.label), CLOSE_BUTTON_LABEL]
          : [],
    }
    const { size } = measureBubble(content, this.deps.measurer, this.metrics)
    const area = this.deps.screens.availableRectAt(this.anchor)
    const rect = placeBubble(size, this.anchor, area, this.gapY)

    this.lastFrame = { ...content, rect }
    this.deps.surface.render(this.lastFrame)
  }
}

const contentKey = (bubble: ShownBubble): string =>
  [
    bubble.title,
    bubble.message,
    bubble.dynamicLine ?? "",
    ...bubble.buttons.map((button) => button.label),
  ].join("\u0000")
