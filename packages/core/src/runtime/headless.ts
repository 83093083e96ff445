import { closeSync, existsSync, openSync, readSync } from "node:fs"
import type { Size } from "@deskpet/shared"
import type { AnimationLoader, AnimationSurface } from "../animation/AnimationSet"
import type { BubbleFrame, BubbleSurface } from "../bubble/BubblePositioner"
import { createLogger } from "../logging/logger"
import type { WindowSurface } from "../window/PetWindow"

// ============================================================================
// Headless surfaces: the pet runs in a terminal, its output is log lines
// ============================================================================

const windowLog = createLogger("Window")
const bubbleLog = createLogger("Bubble")
const animationLog = createLogger("Animation")

export class LoggingWindowSurface implements WindowSurface {
  move(x: number, y: number): void {
    windowLog.debug(`move ${x},${y}`)
  }

  resize(width: number, height: number): void {
    windowLog.debug(`resize ${width}x${height}`)
  }

  show(): void {
    windowLog.info("shown")
  }

  hide(): void {
    windowLog.info("hidden")
  }
}

export class LoggingBubbleSurface implements BubbleSurface {
  private lastText = ""

  render(frame: BubbleFrame): void {
    const text = [frame.title, frame.message, frame.dynamicLine ?? ""]
      .filter((part) => part !== "")
      .join(" | ")
    // Re-placement on every walk tick would flood the log otherwise
    if (text === this.lastText) return
    this.lastText = text
    const buttons = frame.buttons.length > 0 ? ` [${frame.buttons.join("] [")}]` : ""
    bubbleLog.info(`${text}${buttons}`)
  }

  hide(): void {
    this.lastText = ""
    bubbleLog.debug("closed")
  }
}

// ============================================================================
// GIF-backed animations
// ============================================================================

const GIF_HEADER_BYTES = 10

/**
 * Logical screen size from a GIF header, or null when the file is not a GIF.
 */
export function readGifSize(path: string): Size | null {
  const header = Buffer.alloc(GIF_HEADER_BYTES)
  const fd = openSync(path, "r")
  try {
    const read = readSync(fd, header, 0, GIF_HEADER_BYTES, 0)
    if (read < GIF_HEADER_BYTES || header.toString("ascii", 0, 4) !== "GIF8") return null
    return { width: header.readUInt16LE(6), height: header.readUInt16LE(8) }
  } finally {
    closeSync(fd)
  }
}

class HeadlessAnimation implements AnimationSurface {
  private playing = false

  constructor(
    private readonly path: string,
    private readonly frameSize: Size | null
  ) {}

  start(): void {
    if (!this.playing) animationLog.debug(`play ${this.path}`)
    this.playing = true
  }

  stop(): void {
    this.playing = false
  }

  currentFrameSize(): Size | null {
    return this.frameSize
  }

  setPlaybackSpeedPercent(percent: number): void {
    animationLog.debug(`${this.path} at ${percent}%`)
  }

  setRenderedSize(size: Size): void {
    animationLog.debug(`${this.path} rendered at ${size.width}x${size.height}`)
  }
}

/**
 * Opens pose GIFs from disk; frames are never decoded, only the header is
 * read for the base size.
 */
export class GifFileLoader implements AnimationLoader {
  exists(path: string): boolean {
    return existsSync(path)
  }

  open(path: string): AnimationSurface {
    return new HeadlessAnimation(path, readGifSize(path))
  }
}
